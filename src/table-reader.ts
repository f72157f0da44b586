import { GridCursor, GridSource } from './grid-source';
import { buildFieldNames } from './header-builder';
import { logger } from './logger';
import { createRecordBuilder, RecordBuilder } from './record-builder';
import { scanRows } from './row-scanner';
import { createScanConfig } from './scan-config';
import { MappingRecord, NamedRecord, ScanConfig, ScanOptions, TableOptions } from './types';

/**
 * One scan over one sheet. Field names are read as soon as the reader is
 * constructed; records are produced lazily and only once. Iterating a second
 * time yields nothing, because the underlying cursor only moves forward.
 */
export class TableReader<R> implements Iterable<R> {
  readonly config: ScanConfig;
  readonly fieldNames: readonly string[];
  private readonly builder: RecordBuilder<R>;
  private cursor: GridCursor;
  private closed = false;

  constructor(
    private readonly source: GridSource,
    options: ScanOptions,
    createBuilder: (fieldNames: readonly string[]) => RecordBuilder<R>
  ) {
    this.config = createScanConfig(options);
    this.cursor = source.open(this.config.startRow, this.config.startCol);
    this.fieldNames = Object.freeze(buildFieldNames(this.cursor, this.config, source));
    this.builder = createBuilder(this.fieldNames);
    logger.debug(`${source.name}: ${this.fieldNames.length} fields [${this.fieldNames.join(', ')}]`);
  }

  get shape(): RecordBuilder<R>['shape'] {
    return this.builder.shape;
  }

  /** Member names of the records, which differ from `fieldNames` for named records. */
  get keys(): readonly string[] {
    return this.builder.keys;
  }

  *[Symbol.iterator](): Iterator<R> {
    if (this.closed) return;
    let count = 0;
    try {
      for (const values of scanRows(this.cursor, this.config, this.fieldNames.length)) {
        count++;
        yield this.builder.build(values);
      }
    } finally {
      logger.debug(`${this.source.name}: ${count} records read`);
      this.cursor = { nextRow: () => undefined };
    }
  }

  toArray(): R[] {
    return [...this];
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.source.close();
  }
}

export function openTable(source: GridSource, options: TableOptions & { shape: 'named' }): TableReader<NamedRecord>;
export function openTable(source: GridSource, options?: TableOptions & { shape?: 'mapping' }): TableReader<MappingRecord>;
export function openTable(
  source: GridSource,
  options?: TableOptions
): TableReader<MappingRecord> | TableReader<NamedRecord>;
export function openTable(
  source: GridSource,
  options: TableOptions = {}
): TableReader<MappingRecord> | TableReader<NamedRecord> {
  const { shape = 'mapping', ...scanOptions } = options;
  if (shape === 'named') {
    return new TableReader(source, scanOptions, fieldNames => createRecordBuilder('named', fieldNames));
  }
  return new TableReader(source, scanOptions, fieldNames => createRecordBuilder('mapping', fieldNames));
}
