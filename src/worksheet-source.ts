import * as XLSX from 'xlsx';
import { GridCursor, GridSource } from './grid-source';
import { CellValue, MergeRegion, RawRow } from './types';

function cellValue(cell: XLSX.CellObject | undefined): CellValue {
  if (!cell) return null;
  switch (cell.t) {
    case 'z':
      return null;
    case 'e':
      return cell.w ?? XLSX.utils.format_cell(cell);
    case 'n':
    case 's':
    case 'b':
      return typeof cell.v === 'number' || typeof cell.v === 'string' || typeof cell.v === 'boolean'
        ? cell.v
        : null;
    case 'd':
      return cell.v instanceof Date ? cell.v : null;
    default:
      return null;
  }
}

/**
 * Grid source over a decoded SheetJS worksheet. Cached formula results are
 * read as plain values.
 */
export class WorksheetGridSource implements GridSource {
  private worksheet: XLSX.WorkSheet | undefined;
  private readonly range: XLSX.Range | undefined;
  private readonly merges: MergeRegion[];

  constructor(worksheet: XLSX.WorkSheet, readonly name: string) {
    this.worksheet = worksheet;
    const ref = worksheet['!ref'];
    this.range = ref ? XLSX.utils.decode_range(ref) : undefined;
    this.merges = (worksheet['!merges'] ?? []).map(merge => ({
      rowLo: merge.s.r,
      rowHi: merge.e.r + 1,
      colLo: merge.s.c,
      colHi: merge.e.c + 1
    }));
  }

  open(startRow: number, startCol: number): GridCursor {
    let row = startRow;
    return {
      nextRow: (): RawRow | undefined => {
        const sheet = this.worksheet;
        if (!sheet || !this.range || row > this.range.e.r) return undefined;
        const values: CellValue[] = [];
        for (let col = startCol; col <= this.range.e.c; col++) {
          values.push(cellValue(sheet[XLSX.utils.encode_cell({ r: row, c: col })]));
        }
        row++;
        return values;
      }
    };
  }

  mergeRegions(): readonly MergeRegion[] {
    return this.merges;
  }

  cellAt(row: number, col: number): CellValue {
    const sheet = this.worksheet;
    return sheet ? cellValue(sheet[XLSX.utils.encode_cell({ r: row, c: col })]) : null;
  }

  close(): void {
    this.worksheet = undefined;
  }
}
