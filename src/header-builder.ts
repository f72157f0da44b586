import { columnLetters } from './address';
import { GridCursor, GridSource, mergeRegionAt } from './grid-source';
import { cellText, isBlank } from './normalize';
import { compileStop } from './stop-condition';
import { CellValue, RawRow, ScanConfig } from './types';

const NEWLINES = /\r?\n/g;

/** Append `_1`, `_2`, ... to every name already used earlier in the list. */
export function dedupeFieldNames(names: readonly string[]): string[] {
  const fields = [...names];
  for (let k = 0; k < fields.length; k++) {
    const earlier = new Set(fields.slice(0, k));
    if (!earlier.has(fields[k])) continue;
    for (let n = 1; ; n++) {
      const alt = `${fields[k]}_${n}`;
      if (!earlier.has(alt)) {
        fields[k] = alt;
        break;
      }
    }
  }
  return fields;
}

function headerFragment(value: CellValue | undefined): string | undefined {
  if (isBlank(value)) return undefined;
  const text = cellText(value);
  return text.endsWith('.0') ? text.slice(0, -2) : text;
}

/**
 * Pull `config.headerRows` rows from the cursor and synthesize one field name
 * per column.
 *
 * A merged header cell contributes its text only on the anchor row, to every
 * column the region spans, even when the anchor lies left of `config.startCol`. Contributions from several rows are joined with
 * `_`. Columns with no text are named after their letters. The first column
 * that satisfies `config.stopCol` ends the list and is not part of it.
 */
export function buildFieldNames(
  cursor: GridCursor,
  config: ScanConfig,
  source: Pick<GridSource, 'mergeRegions' | 'cellAt'>
): string[] {
  const merges = source.mergeRegions();
  const rows: RawRow[] = [];
  for (let i = 0; i < config.headerRows; i++) {
    rows.push(cursor.nextRow() ?? []);
  }

  const isStop = compileStop(config.stopCol, 'column');
  const width = Math.max(0, ...rows.map(row => row.length));
  const fields: string[] = [];

  for (let col = 0; col < width; col++) {
    const absCol = config.startCol + col;
    const fragments: string[] = [];
    const cells: CellValue[] = [];

    rows.forEach((row, r) => {
      const absRow = config.startRow + r;
      const region = mergeRegionAt(merges, absRow, absCol);
      let value: CellValue | undefined;
      if (!region) {
        value = row[col];
      } else if (region.rowLo === absRow) {
        const anchor = region.colLo - config.startCol;
        value = anchor >= 0 ? row[anchor] : source.cellAt(region.rowLo, region.colLo);
      }
      cells.push(value ?? null);
      const fragment = headerFragment(value);
      if (fragment !== undefined) fragments.push(fragment);
    });

    const field = fragments.join('_').replace(NEWLINES, '');
    if (isStop(absCol, field, cells)) break;
    fields.push(field || columnLetters(absCol));
  }

  return dedupeFieldNames(fields);
}
