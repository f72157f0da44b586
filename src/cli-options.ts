import { z } from 'zod';
import {
  decomposeAddress,
  resolveColumnBoundary,
  resolveRowBoundary,
  resolveStartColumn,
  resolveStartRow
} from './address';
import { parseLiteral } from './normalize';
import { OutputFormat, ScanOptions } from './types';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['csv', 'tsv', 'json', 'yaml', 'markdown'];

export const extractOptionsSchema = z.object({
  start: z.string().optional(),
  stop: z.string().optional(),
  startRow: z.string().optional(),
  stopRow: z.string().optional(),
  startCol: z.string().optional(),
  stopCol: z.string().optional(),
  header: z.boolean().default(false),
  headerRows: z.coerce.number().int().min(1, 'header rows must be at least 1').default(1),
  empty: z.string().optional(),
  repeat: z.boolean().default(false),
  raw: z.boolean().default(false),
  format: z.enum(['csv', 'tsv', 'json', 'yaml', 'markdown']).default('csv'),
  output: z.string().optional(),
  password: z.string().optional(),
  safety: z.boolean().default(true),
  verbose: z.boolean().default(false),
  quiet: z.boolean().default(false)
});

export type ExtractOptions = z.infer<typeof extractOptionsSchema>;

export interface SheetSpec {
  path: string;
  sheet?: string;
}

/** `book.xlsx!Sheet 2` names a sheet; a bare path means the leftmost one. */
export function parseSheetSpec(spec: string): SheetSpec {
  const bang = spec.indexOf('!');
  if (bang < 0) return { path: spec };
  const sheet = spec.slice(bang + 1);
  return sheet ? { path: spec.slice(0, bang), sheet } : { path: spec.slice(0, bang) };
}

/**
 * Turn command-line addresses into scan options. Separate row and column
 * flags win over the combined `--start`/`--stop` addresses.
 */
export function toScanOptions(options: ExtractOptions): ScanOptions {
  const start = options.start ? decomposeAddress(options.start) : undefined;
  const stop = options.stop ? decomposeAddress(options.stop) : undefined;

  const startRow = options.startRow || start?.row || '1';
  const startCol = options.startCol || start?.col || 'A';
  const stopRow = options.stopRow || stop?.row;
  const stopCol = options.stopCol || stop?.col;

  return {
    startRow: resolveStartRow(startRow),
    startCol: resolveStartColumn(startCol),
    stopRow: resolveRowBoundary(stopRow),
    stopCol: resolveColumnBoundary(stopCol),
    headerRows: options.headerRows,
    empty: options.empty === undefined ? '' : parseLiteral(options.empty).value,
    repeat: options.repeat,
    trim: !options.raw
  };
}
