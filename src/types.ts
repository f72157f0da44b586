import { CalendarDate } from './calendar-date';

export type CellValue = string | number | boolean | Date | CalendarDate | null;

export type RawRow = readonly CellValue[];

export interface MergeRegion {
  rowLo: number;
  rowHi: number;
  colLo: number;
  colHi: number;
}

/**
 * Receives the value being tested (the first cell of a row, or the synthesized
 * name of a header column), its absolute index, and the cells it came from.
 */
export type StopPredicate = (value: CellValue, index: number, cells: RawRow) => boolean;

export type Boundary =
  | { kind: 'unbounded' }
  | { kind: 'index'; index: number }
  | { kind: 'number'; value: number }
  | { kind: 'text'; value: string }
  | { kind: 'predicate'; test: StopPredicate };

export type Literal =
  | { kind: 'integer'; value: number }
  | { kind: 'number'; value: number }
  | { kind: 'text'; value: string };

export interface ScanConfig {
  readonly startRow: number;
  readonly startCol: number;
  readonly stopRow: Boundary;
  readonly stopCol: Boundary;
  readonly headerRows: number;
  readonly empty: CellValue;
  readonly repeat: boolean;
  readonly trim: boolean;
}

export type RecordShape = 'mapping' | 'named';

export type MappingRecord = ReadonlyMap<string, CellValue>;

export type NamedRecord = Readonly<Record<string, CellValue>>;

export interface ScanOptions {
  startRow?: number;
  startCol?: number;
  /** Absolute zero-based index, a boundary, or a predicate over the row's first cell. */
  stopRow?: number | Boundary | StopPredicate;
  /** Absolute zero-based index, a boundary, or a predicate over the header name. */
  stopCol?: number | Boundary | StopPredicate;
  headerRows?: number;
  empty?: CellValue;
  repeat?: boolean;
  trim?: boolean;
}

export interface TableOptions extends ScanOptions {
  shape?: RecordShape;
}

export type InputFormat = 'workbook' | 'csv' | 'tsv';

export type OutputFormat = 'csv' | 'tsv' | 'json' | 'yaml' | 'markdown';

export interface LoaderConfig {
  password?: string;
  safetyChecks?: boolean;
  maxFileSize?: number;
}

export interface SheetInfo {
  name: string;
  range: string;
  rowCount: number;
  columnCount: number;
  mergeCount: number;
}

export type ContainerKind = 'zip' | 'cfb' | 'text' | 'unknown';

export interface SafetyResult {
  isSafe: boolean;
  issues: string[];
  warnings: string[];
  hash: string;
  fileSize: number;
  container: ContainerKind;
  encrypted: boolean;
}

export interface WriteOptions {
  format: OutputFormat;
  header?: boolean;
}
