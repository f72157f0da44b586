import { describe, expect, it } from 'vitest';

import { ShapeMismatchError } from '../src/errors';
import {
  createRecordBuilder,
  MappingRecordBuilder,
  memberName,
  NamedRecordBuilder
} from '../src/record-builder';

describe('MappingRecordBuilder', () => {
  it('keeps field order, even for numeric-looking names', () => {
    const builder = new MappingRecordBuilder(['2024', 'Name', '1']);
    const record = builder.build([10, 'x', 20]);
    expect([...record.keys()]).toEqual(['2024', 'Name', '1']);
    expect(record.get('2024')).toBe(10);
  });

  it('keeps suffixed names verbatim', () => {
    const record = new MappingRecordBuilder(['a b', 'a b_1']).build([1, 2]);
    expect([...record.entries()]).toEqual([
      ['a b', 1],
      ['a b_1', 2]
    ]);
  });

  it('fills missing values with null', () => {
    expect(new MappingRecordBuilder(['a', 'b']).build(['x']).get('b')).toBeNull();
  });
});

describe('NamedRecordBuilder', () => {
  it('derives identifier-safe member names once', () => {
    const builder = new NamedRecordBuilder(['First Name', 'Age', '2024 Q1', '名前', 'cost-$']);
    expect(builder.keys).toEqual(['First_Name', 'Age', '_2024_Q1', '名前', 'cost__']);

    const keys = builder.keys;
    builder.build(['Al', 30, 1, 'x', 2]);
    expect(builder.keys).toBe(keys);
  });

  it('builds frozen records', () => {
    const record = new NamedRecordBuilder(['First Name', 'Age']).build(['Al', 30]);
    expect(record).toEqual({ First_Name: 'Al', Age: 30 });
    expect(Object.isFrozen(record)).toBe(true);
  });

  it('rejects fields that collide after substitution', () => {
    expect(() => new NamedRecordBuilder(['a b', 'a_b'])).toThrow(ShapeMismatchError);
    expect(() => new NamedRecordBuilder(['a b', 'a_b'])).toThrow("fields 'a b' and 'a_b' both map to member 'a_b'");
  });

  it('rejects an empty field name', () => {
    expect(() => new NamedRecordBuilder([''])).toThrow("field '' cannot be used as a member name");
  });
});

describe('memberName', () => {
  it('replaces every non-alphanumeric character', () => {
    expect(memberName('a.b/c d')).toBe('a_b_c_d');
    expect(memberName('Totals_A')).toBe('Totals_A');
    expect(memberName('1st')).toBe('_1st');
  });
});

describe('createRecordBuilder', () => {
  it('selects the builder by shape', () => {
    expect(createRecordBuilder('named', ['a'])).toBeInstanceOf(NamedRecordBuilder);
    expect(createRecordBuilder('mapping', ['a'])).toBeInstanceOf(MappingRecordBuilder);
  });
});
