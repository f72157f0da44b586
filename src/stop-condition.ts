import { UnresolvableBoundaryError } from './errors';
import { cellText } from './normalize';
import { Boundary, CellValue, RawRow } from './types';

export type StopTest = (index: number, value: CellValue, cells: RawRow) => boolean;

function numericValue(value: CellValue): number | undefined {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isNaN(parsed) ? undefined : parsed;
  }
  return undefined;
}

/**
 * Turn a boundary into the test the scanners run for each row or column.
 * The boundary's kind is settled here once, not per row.
 */
export function compileStop(boundary: Boundary, axis: 'row' | 'column'): StopTest {
  switch (boundary.kind) {
    case 'unbounded':
      return () => false;
    case 'index':
      return index => index === boundary.index;
    case 'text':
      return (_index, value) => cellText(value) === boundary.value;
    case 'number':
      return (_index, value) => numericValue(value) === boundary.value;
    case 'predicate':
      return (index, value, cells) => {
        try {
          return boundary.test(value, index, cells);
        } catch (error) {
          throw new UnresolvableBoundaryError(axis, index, error);
        }
      };
  }
}
