import * as XLSX from 'xlsx';
import { MalformedAddressError } from './errors';
import { parseLiteral } from './normalize';
import { Boundary } from './types';

const R1C1_FORMAT = /^R(\d+)C(\d+)$/i;
const A1_FORMAT = /^\$?([A-Z]+)\$?(\d+)$/i;
const COLUMN_LETTERS = /^\$?[A-Z]{1,3}$/i;

export interface AddressParts {
  row: string;
  col: string;
}

/** Zero-based index of `A`, `$BZ`, `xfd`..., or undefined for anything else. */
export function columnIndex(letters: string): number | undefined {
  if (!COLUMN_LETTERS.test(letters)) return undefined;
  return XLSX.utils.decode_col(letters.replace('$', '').toUpperCase());
}

export function columnLetters(index: number): string {
  return XLSX.utils.encode_col(index);
}

/**
 * Split a combined address such as `B3` or `R3C2` into its row and column
 * parts, both still 1-based text.
 */
export function decomposeAddress(address: string): AddressParts {
  const trimmed = address.trim();
  let match = R1C1_FORMAT.exec(trimmed);
  if (match) return { row: match[1], col: match[2] };
  match = A1_FORMAT.exec(trimmed);
  if (match) return { row: match[2], col: match[1] };
  throw new MalformedAddressError(address);
}

function oneBased(address: string, value: number): number {
  if (value < 1) {
    throw new MalformedAddressError(address, 'row and column numbers start at 1');
  }
  return value - 1;
}

export function resolveRowBoundary(text: string | undefined): Boundary {
  if (text === undefined || text === '') return { kind: 'unbounded' };
  const literal = parseLiteral(text);
  switch (literal.kind) {
    case 'integer':
      return { kind: 'index', index: oneBased(text, literal.value) };
    case 'number':
      return { kind: 'number', value: literal.value };
    case 'text':
      return { kind: 'text', value: literal.value };
  }
}

export function resolveColumnBoundary(text: string | undefined): Boundary {
  if (text === undefined || text === '') return { kind: 'unbounded' };
  const literal = parseLiteral(text);
  switch (literal.kind) {
    case 'integer':
      return { kind: 'index', index: oneBased(text, literal.value) };
    case 'number':
      return { kind: 'number', value: literal.value };
    case 'text': {
      // An explicit text marker is never read as column letters.
      const forced = text.startsWith('T:') || text.startsWith('T(');
      const index = forced ? undefined : columnIndex(literal.value);
      return index === undefined ? { kind: 'text', value: literal.value } : { kind: 'index', index };
    }
  }
}

function requireIndex(text: string, boundary: Boundary): number {
  if (boundary.kind !== 'index') {
    throw new MalformedAddressError(text, 'a start position must be a row or column number');
  }
  return boundary.index;
}

export function resolveStartRow(text: string): number {
  return requireIndex(text, resolveRowBoundary(text));
}

export function resolveStartColumn(text: string): number {
  return requireIndex(text, resolveColumnBoundary(text));
}
