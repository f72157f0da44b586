import { z } from 'zod';
import { CalendarDate } from './calendar-date';
import { InvalidScanConfigError } from './errors';
import { Boundary, ScanConfig, ScanOptions, StopPredicate } from './types';

const predicateSchema = z.custom<StopPredicate>(
  value => typeof value === 'function',
  'expected a predicate function'
);

const boundarySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('unbounded') }),
  z.object({ kind: z.literal('index'), index: z.number().int().min(0) }),
  z.object({ kind: z.literal('number'), value: z.number().finite() }),
  z.object({ kind: z.literal('text'), value: z.string() }),
  z.object({ kind: z.literal('predicate'), test: predicateSchema })
]);

const stopSchema = z.union([z.number().int().min(0), predicateSchema, boundarySchema]).optional();

const cellValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.date(),
  z.instanceof(CalendarDate),
  z.null()
]);

const scanOptionsSchema = z.object({
  startRow: z.number().int().min(0).default(0),
  startCol: z.number().int().min(0).default(0),
  stopRow: stopSchema,
  stopCol: stopSchema,
  headerRows: z.number().int().min(1).default(1),
  empty: cellValueSchema.default(''),
  repeat: z.boolean().default(false),
  trim: z.boolean().default(true)
});

function toBoundary(stop: z.infer<typeof stopSchema>): Boundary {
  if (stop === undefined) return { kind: 'unbounded' };
  if (typeof stop === 'number') return { kind: 'index', index: stop };
  if (typeof stop === 'function') return { kind: 'predicate', test: stop };
  return stop;
}

/** Validate caller options, fill in defaults and settle the stop boundaries. */
export function createScanConfig(options: ScanOptions = {}): ScanConfig {
  const parsed = scanOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new InvalidScanConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || 'options'}: ${issue.message}`)
    );
  }

  const { stopRow, stopCol, ...rest } = parsed.data;
  const config: ScanConfig = {
    ...rest,
    stopRow: toBoundary(stopRow),
    stopCol: toBoundary(stopCol)
  };

  const issues: string[] = [];
  if (config.stopRow.kind === 'index') {
    const firstDataRow = config.startRow + config.headerRows;
    if (config.stopRow.index < config.startRow) {
      issues.push(`stopRow: ${config.stopRow.index} is above startRow ${config.startRow}`);
    } else if (config.stopRow.index < firstDataRow) {
      issues.push(`stopRow: ${config.stopRow.index} falls within the header rows, data starts at ${firstDataRow}`);
    }
  }
  if (config.stopCol.kind === 'index' && config.stopCol.index < config.startCol) {
    issues.push(`stopCol: ${config.stopCol.index} is left of startCol ${config.startCol}`);
  }
  if (issues.length) throw new InvalidScanConfigError(issues);

  return Object.freeze(config);
}
