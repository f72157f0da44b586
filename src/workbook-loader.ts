import * as fs from 'fs';
import * as path from 'path';
import * as XLSX from 'xlsx';
import { parse as csvParse } from 'csv-parse';
import { decrypt, isEncrypted } from 'officecrypto-tool';
import { WorkbookError } from './errors';
import { GridSource, MatrixGridSource } from './grid-source';
import { logger } from './logger';
import { SafetyManager, sniffContainer } from './safety-manager';
import { CellValue, InputFormat, LoaderConfig, SheetInfo } from './types';
import { WorksheetGridSource } from './worksheet-source';

const NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?)?$/;

/** Type a CSV field the way a spreadsheet would have stored it. */
export function inferCellValue(text: string): CellValue {
  if (text === '') return null;
  if (NUMBER.test(text)) return Number(text);

  const lower = text.toLowerCase();
  if (lower === 'true') return true;
  if (lower === 'false') return false;

  const match = TIMESTAMP.exec(text);
  if (match) {
    const [year, month, day, hours, minutes, seconds] = match.slice(1).map(part => Number(part ?? 0));
    const date = new Date(year, month - 1, day, hours, minutes, seconds);
    if (!Number.isNaN(date.getTime())) return date;
  }

  return text;
}

export function inputFormat(filePath: string): InputFormat {
  const extension = path.extname(filePath).toLowerCase();
  switch (extension) {
    case '.xlsx':
    case '.xlsm':
    case '.xls':
    case '.ods':
      return 'workbook';
    case '.csv':
    case '.txt':
      return 'csv';
    case '.tsv':
      return 'tsv';
    default:
      throw new WorkbookError(`Unsupported file format: ${extension || '(none)'}`);
  }
}

/**
 * Opens workbooks and delimited text files as grid sources. Encrypted
 * workbooks are decrypted in memory when a password is configured.
 */
export class WorkbookLoader {
  private config: LoaderConfig;
  private safetyManager: SafetyManager;

  constructor(config: LoaderConfig = {}) {
    this.config = {
      ...config,
      safetyChecks: config.safetyChecks ?? true,
      maxFileSize: config.maxFileSize ?? 500 * 1024 * 1024
    };

    this.safetyManager = new SafetyManager(this.config.maxFileSize);
  }

  async openSheet(filePath: string, sheetName?: string): Promise<GridSource> {
    await this.checkFile(filePath);

    switch (inputFormat(filePath)) {
      case 'workbook':
        return this.fromWorkbook(await this.readWorkbook(filePath), sheetName);
      case 'csv':
        return this.readDelimited(filePath, ',', sheetName);
      case 'tsv':
        return this.readDelimited(filePath, '\t', sheetName);
    }
  }

  async listSheets(filePath: string): Promise<SheetInfo[]> {
    await this.checkFile(filePath);

    const format = inputFormat(filePath);
    if (format !== 'workbook') {
      const source = await this.readDelimited(filePath, format === 'tsv' ? '\t' : ',');
      const rows: number[] = [];
      const cursor = source.open(0, 0);
      for (let row = cursor.nextRow(); row; row = cursor.nextRow()) rows.push(row.length);
      const columnCount = Math.max(0, ...rows);
      return [{
        name: source.name,
        range: rows.length ? `A1:${XLSX.utils.encode_cell({ r: rows.length - 1, c: Math.max(0, columnCount - 1) })}` : '',
        rowCount: rows.length,
        columnCount,
        mergeCount: 0
      }];
    }

    const workbook = await this.readWorkbook(filePath);
    return workbook.SheetNames.map(name => {
      const sheet = workbook.Sheets[name];
      const ref = sheet?.['!ref'] ?? '';
      const range = ref ? XLSX.utils.decode_range(ref) : undefined;
      return {
        name,
        range: ref,
        rowCount: range ? range.e.r - range.s.r + 1 : 0,
        columnCount: range ? range.e.c - range.s.c + 1 : 0,
        mergeCount: sheet?.['!merges']?.length ?? 0
      };
    });
  }

  /** Wrap an already decoded workbook. The leftmost sheet is used when no name is given. */
  fromWorkbook(workbook: XLSX.WorkBook, sheetName?: string): WorksheetGridSource {
    if (!workbook.SheetNames || workbook.SheetNames.length === 0) {
      throw new WorkbookError('No sheets found in workbook');
    }

    const name = sheetName || workbook.SheetNames[0];
    const worksheet = workbook.Sheets[name];
    if (!worksheet) {
      throw new WorkbookError(
        `Sheet '${name}' not found (available: ${workbook.SheetNames.join(', ')})`
      );
    }
    return new WorksheetGridSource(worksheet, name);
  }

  private async checkFile(filePath: string): Promise<void> {
    if (!this.config.safetyChecks) return;

    const safety = await this.safetyManager.validateFile(filePath);
    if (!safety.isSafe) {
      throw new WorkbookError(safety.issues.join('; '));
    }
    safety.warnings.forEach(warning => logger.warn(warning));
    if (safety.encrypted && !this.config.password) {
      logger.warn(`${path.basename(filePath)} appears to be encrypted; pass a password to open it`);
    }
    logger.debug(`${path.basename(filePath)}: ${safety.fileSize} bytes, ${safety.container}, sha256 ${safety.hash}`);
  }

  private async readWorkbook(filePath: string): Promise<XLSX.WorkBook> {
    const fileName = path.basename(filePath);
    const data = await this.decryptWorkbook(fileName, await fs.promises.readFile(filePath));
    try {
      return XLSX.read(data, { type: 'buffer', cellDates: true });
    } catch (error) {
      throw new WorkbookError(
        `Cannot read ${fileName}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  }

  // Decrypted bytes stay in memory; nothing is written back to disk.
  private async decryptWorkbook(fileName: string, data: Buffer): Promise<Buffer> {
    if (sniffContainer(data) !== 'cfb' || !isEncrypted(data)) return data;
    if (!this.config.password) {
      throw new WorkbookError(`${fileName} is password-protected; pass a password to open it`);
    }

    try {
      const decrypted = await decrypt(data, { password: this.config.password });
      logger.debug(`${fileName}: decrypted ${decrypted.length} bytes`);
      return decrypted;
    } catch (error) {
      throw new WorkbookError(
        `Cannot decrypt ${fileName}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  }

  private async readDelimited(filePath: string, delimiter: string, sheetName?: string): Promise<GridSource> {
    const name = path.basename(filePath, path.extname(filePath));
    if (sheetName && sheetName !== name) {
      logger.warn(`${path.basename(filePath)} has a single sheet; ignoring sheet name '${sheetName}'`);
    }

    return new Promise((resolve, reject) => {
      const rows: CellValue[][] = [];
      const fileStream = fs.createReadStream(filePath);
      const fail = (error: Error): void => {
        fileStream.destroy();
        reject(new WorkbookError(`Cannot read ${path.basename(filePath)}: ${error.message}`, { cause: error }));
      };

      fileStream.on('error', fail);
      fileStream
        .pipe(csvParse({
          delimiter,
          relax_column_count: true,
          trim: true
        }))
        .on('data', (row: string[]) => {
          rows.push(row.map(inferCellValue));
        })
        .on('end', () => resolve(new MatrixGridSource(rows, [], name)))
        .on('error', fail);
    });
  }
}
