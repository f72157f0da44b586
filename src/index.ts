// Main exports for the xltable library
export { openTable, TableReader } from './table-reader';
export { createScanConfig } from './scan-config';
export { buildFieldNames, dedupeFieldNames } from './header-builder';
export { scanRows } from './row-scanner';
export {
  createRecordBuilder,
  MappingRecordBuilder,
  NamedRecordBuilder,
  memberName
} from './record-builder';
export type { RecordBuilder } from './record-builder';
export {
  columnIndex,
  columnLetters,
  decomposeAddress,
  resolveColumnBoundary,
  resolveRowBoundary,
  resolveStartColumn,
  resolveStartRow
} from './address';
export { parseLiteral, trimValue, trimRow, cellText, isBlank } from './normalize';
export { CalendarDate } from './calendar-date';
export { MatrixGridSource, mergeRegionAt } from './grid-source';
export type { GridCursor, GridSource } from './grid-source';
export { WorksheetGridSource } from './worksheet-source';
export { WorkbookLoader, inferCellValue } from './workbook-loader';
export { SafetyManager } from './safety-manager';
export { writeRecords } from './output-writer';
export { logger, setLogLevel } from './logger';
export type { LogLevel } from './logger';
export * from './errors';
export * from './types';

// Default export
export { openTable as default } from './table-reader';
