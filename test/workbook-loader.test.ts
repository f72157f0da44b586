import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { encrypt } from 'officecrypto-tool';
import * as XLSX from 'xlsx';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { CalendarDate } from '../src/calendar-date';
import { WorkbookError } from '../src/errors';
import { openTable } from '../src/table-reader';
import { inferCellValue, inputFormat, WorkbookLoader } from '../src/workbook-loader';
import { WorksheetGridSource } from '../src/worksheet-source';

let dir: string;

function buildWorkbook(): Buffer {
  const data = XLSX.utils.aoa_to_sheet([
    ['Totals', null],
    ['A', 'B'],
    [1, 2]
  ]);
  data['!merges'] = [XLSX.utils.decode_range('A1:B1')];

  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, data, 'Data');
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([['x']]), 'Other');

  return XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
}

function writeWorkbook(fileName: string): string {
  const filePath = path.join(dir, fileName);
  fs.writeFileSync(filePath, buildWorkbook());
  return filePath;
}

async function writeLockedWorkbook(fileName: string): Promise<string> {
  const filePath = path.join(dir, fileName);
  fs.writeFileSync(filePath, await encrypt(buildWorkbook(), { password: 'test-secret' }));
  return filePath;
}

beforeAll(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'xltable-loader-'));
});

afterAll(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('WorksheetGridSource', () => {
  it('reads typed cells across the used range', () => {
    const sheet = XLSX.utils.aoa_to_sheet([
      ['Name', 'Ok', 'Err'],
      ['Al', true, null]
    ]);
    sheet['C2'] = { t: 'e', v: 7, w: '#DIV/0!' };
    sheet['D2'] = { t: 'd', v: new Date(2020, 0, 5) };
    sheet['!ref'] = 'A1:D2';

    const cursor = new WorksheetGridSource(sheet, 'S').open(1, 0);
    expect(cursor.nextRow()).toEqual(['Al', true, '#DIV/0!', new Date(2020, 0, 5)]);
    expect(cursor.nextRow()).toBeUndefined();
  });

  it('starts rows at the requested column and exposes merges', () => {
    const sheet = XLSX.utils.aoa_to_sheet([['a', 'b', 'c']]);
    sheet['!merges'] = [XLSX.utils.decode_range('B1:C2')];
    const source = new WorksheetGridSource(sheet, 'S');

    expect(source.open(0, 1).nextRow()).toEqual(['b', 'c']);
    expect(source.open(0, 3).nextRow()).toEqual([]);
    expect(source.mergeRegions()).toEqual([{ rowLo: 0, rowHi: 2, colLo: 1, colHi: 3 }]);
  });

  it('returns nothing once closed', () => {
    const source = new WorksheetGridSource(XLSX.utils.aoa_to_sheet([['a']]), 'S');
    const cursor = source.open(0, 0);
    source.close();
    expect(cursor.nextRow()).toBeUndefined();
  });
});

describe('WorkbookLoader', () => {
  it('opens a named sheet of an xlsx file', async () => {
    const filePath = writeWorkbook('book.xlsx');
    const source = await new WorkbookLoader().openSheet(filePath, 'Data');
    const table = openTable(source, { headerRows: 2 });

    expect(source.name).toBe('Data');
    expect(table.fieldNames).toEqual(['Totals_A', 'Totals_B']);
    expect(table.toArray().map(record => Object.fromEntries(record))).toEqual([{ Totals_A: 1, Totals_B: 2 }]);
  });

  it('opens the leftmost sheet by default', async () => {
    const source = await new WorkbookLoader().openSheet(writeWorkbook('default.xlsx'));
    expect(source.name).toBe('Data');
  });

  it('lists sheets with their ranges', async () => {
    const sheets = await new WorkbookLoader().listSheets(writeWorkbook('list.xlsx'));
    expect(sheets).toEqual([
      { name: 'Data', range: 'A1:B3', rowCount: 3, columnCount: 2, mergeCount: 1 },
      { name: 'Other', range: 'A1', rowCount: 1, columnCount: 1, mergeCount: 0 }
    ]);
  });

  it('reports unknown sheets', async () => {
    const filePath = writeWorkbook('missing.xlsx');
    await expect(new WorkbookLoader().openSheet(filePath, 'Nope')).rejects.toThrow(
      "Sheet 'Nope' not found (available: Data, Other)"
    );
  });

  it('opens a password-protected workbook with the right password', async () => {
    const filePath = await writeLockedWorkbook('locked.xlsx');
    const source = await new WorkbookLoader({ password: 'test-secret' }).openSheet(filePath);
    const table = openTable(source, { headerRows: 2 });

    expect(source.name).toBe('Data');
    expect(table.fieldNames).toEqual(['Totals_A', 'Totals_B']);
    expect(table.toArray()).toEqual([new Map([['Totals_A', 1], ['Totals_B', 2]])]);
  });

  it('refuses a password-protected workbook without the right password', async () => {
    const filePath = await writeLockedWorkbook('locked-wrong.xlsx');
    await expect(new WorkbookLoader().openSheet(filePath)).rejects.toThrow(
      'locked-wrong.xlsx is password-protected; pass a password to open it'
    );
    await expect(new WorkbookLoader({ password: 'not-it' }).openSheet(filePath)).rejects.toThrow(WorkbookError);
  });

  it('reads csv files with typed values', async () => {
    const filePath = path.join(dir, 'people.csv');
    fs.writeFileSync(filePath, 'Name,Age,Born\nAl,30,2000-01-02\nBo,,\n');

    const source = await new WorkbookLoader().openSheet(filePath);
    const records = openTable(source).toArray().map(record => Object.fromEntries(record));

    expect(source.name).toBe('people');
    expect(records).toEqual([
      { Name: 'Al', Age: 30, Born: new CalendarDate(2000, 1, 2) },
      { Name: 'Bo', Age: '', Born: '' }
    ]);
  });

  it('rejects malformed csv input', async () => {
    const filePath = path.join(dir, 'broken.csv');
    fs.writeFileSync(filePath, 'a,b\n1,"unterminated\n');
    await expect(new WorkbookLoader().openSheet(filePath)).rejects.toThrow(/^Cannot read broken\.csv: /);
    await expect(new WorkbookLoader().openSheet(filePath)).rejects.toThrow(WorkbookError);
  });

  it('lists a delimited file as one sheet', async () => {
    const filePath = path.join(dir, 'grid.tsv');
    fs.writeFileSync(filePath, 'a\tb\tc\n1\t2\t3\n');
    expect(await new WorkbookLoader().listSheets(filePath)).toEqual([
      { name: 'grid', range: 'A1:C2', rowCount: 2, columnCount: 3, mergeCount: 0 }
    ]);
  });

  it('refuses files that fail the safety checks', async () => {
    const filePath = path.join(dir, 'notes.doc');
    fs.writeFileSync(filePath, 'hello');
    await expect(new WorkbookLoader().openSheet(filePath)).rejects.toThrow(WorkbookError);
    await expect(new WorkbookLoader().openSheet(filePath)).rejects.toThrow('Unsupported file extension: .doc');
  });

  it('still rejects unknown formats with safety checks off', async () => {
    const filePath = path.join(dir, 'notes.doc');
    fs.writeFileSync(filePath, 'hello');
    await expect(new WorkbookLoader({ safetyChecks: false }).openSheet(filePath)).rejects.toThrow(
      'Unsupported file format: .doc'
    );
  });
});

describe('inferCellValue', () => {
  it('types numbers, booleans and timestamps', () => {
    expect(inferCellValue('')).toBeNull();
    expect(inferCellValue('42')).toBe(42);
    expect(inferCellValue('-1.5e3')).toBe(-1500);
    expect(inferCellValue('TRUE')).toBe(true);
    expect(inferCellValue('2021-03-04 05:06')).toEqual(new Date(2021, 2, 4, 5, 6, 0));
  });

  it('keeps other text', () => {
    expect(inferCellValue('abc')).toBe('abc');
    expect(inferCellValue('0x10')).toBe('0x10');
    expect(inferCellValue('1,000')).toBe('1,000');
  });
});

describe('inputFormat', () => {
  it('maps extensions', () => {
    expect(inputFormat('a.XLSX')).toBe('workbook');
    expect(inputFormat('a.ods')).toBe('workbook');
    expect(inputFormat('a.csv')).toBe('csv');
    expect(inputFormat('a.tsv')).toBe('tsv');
    expect(() => inputFormat('a.pdf')).toThrow(WorkbookError);
  });
});
