import { createHash } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import { ContainerKind, SafetyResult } from './types';

const ZIP_SIGNATURE = Buffer.from([0x50, 0x4b, 0x03, 0x04]);
const CFB_SIGNATURE = Buffer.from([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1]);

const WORKBOOK_EXTENSIONS = new Set(['.xlsx', '.xlsm', '.xls', '.ods']);
const TEXT_EXTENSIONS = new Set(['.csv', '.tsv', '.txt']);

// Extensions whose files are zip packages when they are not encrypted.
const ZIP_EXTENSIONS = new Set(['.xlsx', '.xlsm', '.ods']);

export function sniffContainer(head: Buffer): ContainerKind {
  if (head.subarray(0, ZIP_SIGNATURE.length).equals(ZIP_SIGNATURE)) return 'zip';
  if (head.subarray(0, CFB_SIGNATURE.length).equals(CFB_SIGNATURE)) return 'cfb';
  if (head.length > 0 && !head.includes(0)) return 'text';
  return 'unknown';
}

/** Pre-flight checks run on an input file before it is decoded. */
export class SafetyManager {
  private readonly maxFileSize: number;
  private readonly allowedExtensions: Set<string>;

  constructor(maxFileSize: number = 500 * 1024 * 1024) {
    this.maxFileSize = maxFileSize;
    this.allowedExtensions = new Set([...WORKBOOK_EXTENSIONS, ...TEXT_EXTENSIONS]);
  }

  async validateFile(filePath: string): Promise<SafetyResult> {
    const issues: string[] = [];
    const warnings: string[] = [];

    let buffer: Buffer;
    try {
      buffer = await fs.readFile(filePath);
    } catch (error) {
      issues.push(`Cannot read file: ${error instanceof Error ? error.message : String(error)}`);
      return { isSafe: false, issues, warnings, hash: '', fileSize: 0, container: 'unknown', encrypted: false };
    }

    const ext = path.extname(filePath).toLowerCase();
    if (!this.allowedExtensions.has(ext)) {
      issues.push(`Unsupported file extension: ${ext || '(none)'}`);
    }

    if (buffer.length > this.maxFileSize) {
      issues.push(`File too large: ${buffer.length} bytes (max: ${this.maxFileSize})`);
    }

    const container = sniffContainer(buffer.subarray(0, 512));
    // Office stores encrypted packages inside an OLE compound document.
    const encrypted = ZIP_EXTENSIONS.has(ext) && container === 'cfb';

    if (WORKBOOK_EXTENSIONS.has(ext) && container === 'text') {
      warnings.push(`${path.basename(filePath)} looks like a text file despite its ${ext} extension`);
    }
    if (ZIP_EXTENSIONS.has(ext) && container === 'unknown') {
      issues.push(`${path.basename(filePath)} is not a ${ext} package`);
    }

    return {
      isSafe: issues.length === 0,
      issues,
      warnings,
      hash: createHash('sha256').update(buffer).digest('hex'),
      fileSize: buffer.length,
      container,
      encrypted
    };
  }
}
