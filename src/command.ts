import * as fs from 'fs/promises';
import { ExtractOptions, parseSheetSpec, toScanOptions } from './cli-options';
import { logger } from './logger';
import { writeRecords } from './output-writer';
import { openTable } from './table-reader';
import { SheetInfo } from './types';
import { WorkbookLoader } from './workbook-loader';

export interface ExtractResult {
  sheet: string;
  fieldNames: readonly string[];
  recordCount: number;
  output: string;
}

/**
 * Read one table from `path[!sheet]` and serialize it. Writes to
 * `options.output` when given; the serialized text is returned either way.
 */
export async function extractTable(sheetSpec: string, options: ExtractOptions): Promise<ExtractResult> {
  const scanOptions = toScanOptions(options);
  const { path, sheet } = parseSheetSpec(sheetSpec);
  const loader = new WorkbookLoader({ password: options.password, safetyChecks: options.safety });

  const source = await loader.openSheet(path, sheet);
  try {
    const table = openTable(source, scanOptions);
    let recordCount = 0;
    const counted = (function* () {
      for (const record of table) {
        recordCount++;
        yield record;
      }
    })();
    const output = await writeRecords(table.fieldNames, counted, {
      format: options.format,
      header: options.header
    });
    logger.info(`${source.name}: ${recordCount} records, ${table.fieldNames.length} fields`);

    if (options.output) {
      await fs.writeFile(options.output, output, 'utf8');
    }
    return { sheet: source.name, fieldNames: table.fieldNames, recordCount, output };
  } finally {
    source.close();
  }
}

export async function listSheets(
  filePath: string,
  options: { password?: string; safety?: boolean }
): Promise<SheetInfo[]> {
  const loader = new WorkbookLoader({ password: options.password, safetyChecks: options.safety });
  return loader.listSheets(filePath);
}
