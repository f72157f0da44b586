import { CellValue, MergeRegion, RawRow } from './types';

/** Forward-only row cursor. Returns undefined once the source is exhausted. */
export interface GridCursor {
  nextRow(): RawRow | undefined;
}

export interface GridSource {
  readonly name: string;
  /** Opens a cursor whose first row is `startRow`, each row starting at `startCol`. */
  open(startRow: number, startCol: number): GridCursor;
  mergeRegions(): readonly MergeRegion[];
  /** Random access by absolute position, for merge anchors outside the scanned columns. */
  cellAt(row: number, col: number): CellValue;
  close(): void;
}

export function mergeRegionAt(
  regions: readonly MergeRegion[],
  row: number,
  col: number
): MergeRegion | undefined {
  return regions.find(
    region => region.rowLo <= row && row < region.rowHi && region.colLo <= col && col < region.colHi
  );
}

/**
 * Grid held in memory. Rows may be ragged; cells past the end of a row are
 * simply absent.
 */
export class MatrixGridSource implements GridSource {
  private closed = false;

  constructor(
    private readonly rows: readonly RawRow[],
    private readonly merges: readonly MergeRegion[] = [],
    readonly name: string = 'Sheet1'
  ) {}

  open(startRow: number, startCol: number): GridCursor {
    let next = startRow;
    return {
      nextRow: (): RawRow | undefined => {
        if (this.closed || next >= this.rows.length) return undefined;
        const row = this.rows[next++];
        return row.slice(startCol);
      }
    };
  }

  mergeRegions(): readonly MergeRegion[] {
    return this.merges;
  }

  cellAt(row: number, col: number): CellValue {
    if (this.closed) return null;
    return this.rows[row]?.[col] ?? null;
  }

  close(): void {
    this.closed = true;
  }
}
