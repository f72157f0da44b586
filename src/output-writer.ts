import { stringify } from 'csv-stringify';
import * as yaml from 'js-yaml';
import { CalendarDate, formatTimestamp } from './calendar-date';
import { cellText } from './normalize';
import { CellValue, MappingRecord, WriteOptions } from './types';

const NBSP = /\u00a0/g;

export function outputText(value: CellValue | undefined): string {
  return cellText(value).replace(NBSP, ' ');
}

type PlainValue = string | number | boolean | null;

function plainValue(value: CellValue | undefined): PlainValue {
  if (value === undefined || value === null) return null;
  if (value instanceof Date) return formatTimestamp(value);
  if (value instanceof CalendarDate) return value.toString();
  return typeof value === 'string' ? value.replace(NBSP, ' ') : value;
}

function toDelimited(rows: string[][], delimiter: string): Promise<string> {
  return new Promise((resolve, reject) => {
    stringify(rows, { delimiter, record_delimiter: 'unix' }, (error, output) => {
      if (error) reject(error);
      else resolve(output);
    });
  });
}

function toMarkdown(fieldNames: readonly string[], rows: string[][]): string {
  const escape = (text: string): string => text.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
  const lines = [
    `| ${fieldNames.map(escape).join(' | ')} |`,
    `| ${fieldNames.map(() => '---').join(' | ')} |`,
    ...rows.map(row => `| ${row.map(escape).join(' | ')} |`)
  ];
  return `${lines.join('\n')}\n`;
}

/** Serialize records in field order. The header line only applies to csv and tsv. */
export async function writeRecords(
  fieldNames: readonly string[],
  records: Iterable<MappingRecord>,
  options: WriteOptions
): Promise<string> {
  const names = fieldNames.map(name => name.replace(NBSP, ' '));

  switch (options.format) {
    case 'csv':
    case 'tsv': {
      const rows: string[][] = options.header ? [names] : [];
      for (const record of records) {
        rows.push(fieldNames.map(name => outputText(record.get(name))));
      }
      if (rows.length === 0) return '';
      return toDelimited(rows, options.format === 'tsv' ? '\t' : ',');
    }
    case 'json':
    case 'yaml': {
      const objects = [...records].map(record =>
        Object.fromEntries(
          fieldNames.map((name, i): [string, PlainValue] => [names[i], plainValue(record.get(name))])
        )
      );
      return options.format === 'json' ? `${JSON.stringify(objects, null, 2)}\n` : yaml.dump(objects);
    }
    case 'markdown': {
      const rows = [...records].map(record => fieldNames.map(name => outputText(record.get(name))));
      return toMarkdown(names, rows);
    }
  }
}
