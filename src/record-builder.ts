import { ShapeMismatchError } from './errors';
import { CellValue, MappingRecord, NamedRecord, RecordShape } from './types';

export interface RecordBuilder<R> {
  readonly shape: RecordShape;
  /** Keys of the records this builder produces, in field order. */
  readonly keys: readonly string[];
  build(values: readonly CellValue[]): R;
}

export class MappingRecordBuilder implements RecordBuilder<MappingRecord> {
  readonly shape = 'mapping';

  constructor(readonly keys: readonly string[]) {}

  build(values: readonly CellValue[]): MappingRecord {
    const record = new Map<string, CellValue>();
    this.keys.forEach((key, i) => record.set(key, values[i] ?? null));
    return record;
  }
}

const NON_WORD = /[^\p{L}\p{N}_]/gu;
const IDENTIFIER = /^[\p{L}_$][\p{L}\p{N}_$]*$/u;

export function memberName(fieldName: string): string {
  const name = fieldName.replace(NON_WORD, '_');
  return /^\p{N}/u.test(name) ? `_${name}` : name;
}

/**
 * Builds frozen objects whose members are the field names made safe as
 * identifiers. Member names are worked out once, in the constructor.
 */
export class NamedRecordBuilder implements RecordBuilder<NamedRecord> {
  readonly shape = 'named';
  readonly keys: readonly string[];

  constructor(readonly fieldNames: readonly string[]) {
    const owners = new Map<string, string>();
    this.keys = fieldNames.map(field => {
      const member = memberName(field);
      if (!IDENTIFIER.test(member)) {
        throw new ShapeMismatchError(field, `field '${field}' cannot be used as a member name`);
      }
      const owner = owners.get(member);
      if (owner !== undefined) {
        throw new ShapeMismatchError(
          field,
          `fields '${owner}' and '${field}' both map to member '${member}'`
        );
      }
      owners.set(member, field);
      return member;
    });
  }

  build(values: readonly CellValue[]): NamedRecord {
    const entries = this.keys.map((key, i): [string, CellValue] => [key, values[i] ?? null]);
    return Object.freeze(Object.fromEntries(entries));
  }
}

export function createRecordBuilder(shape: 'mapping', fieldNames: readonly string[]): MappingRecordBuilder;
export function createRecordBuilder(shape: 'named', fieldNames: readonly string[]): NamedRecordBuilder;
export function createRecordBuilder(
  shape: RecordShape,
  fieldNames: readonly string[]
): MappingRecordBuilder | NamedRecordBuilder;
export function createRecordBuilder(
  shape: RecordShape,
  fieldNames: readonly string[]
): MappingRecordBuilder | NamedRecordBuilder {
  return shape === 'named' ? new NamedRecordBuilder(fieldNames) : new MappingRecordBuilder(fieldNames);
}
