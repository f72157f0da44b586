import { GridCursor } from './grid-source';
import { isBlank, trimRow } from './normalize';
import { compileStop } from './stop-condition';
import { CellValue, RawRow, ScanConfig } from './types';

function alignRow(row: RawRow, width: number, empty: CellValue): CellValue[] {
  const values = row.slice(0, width);
  while (values.length < width) values.push(empty);
  return values;
}

/**
 * Lazily yield normalized data rows, starting right after the header rows.
 *
 * Scanning ends for good at the first row with no cells, the first row that
 * satisfies `config.stopRow` (which is not yielded), or when the cursor runs
 * dry. Each row is cut or padded to `width` cells.
 */
export function* scanRows(
  cursor: GridCursor,
  config: ScanConfig,
  width: number
): Generator<CellValue[], void, undefined> {
  const isStop = compileStop(config.stopRow, 'row');
  let previous: CellValue[] | undefined;

  for (let absRow = config.startRow + config.headerRows; ; absRow++) {
    const raw = cursor.nextRow();
    if (raw === undefined) return;

    const substituted = raw.map(value => (isBlank(value) ? config.empty : value));
    if (substituted.length < 1 || isStop(absRow, substituted[0], substituted)) return;

    let values = alignRow(substituted, width, config.empty);
    if (config.repeat && previous) {
      const prior = previous;
      values = values.map((value, i) => (isBlank(value) ? prior[i] : value));
    }
    if (config.trim) values = trimRow(values);

    yield values;
    previous = values;
  }
}
