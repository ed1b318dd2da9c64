/**
 * RFC 4180 CSV reading and writing for the dataset file.
 *
 * Absent cells are written as empty fields. The reader is strict about
 * structure: an unterminated quote or a row whose width differs from
 * the header is an error rather than a guess.
 */

import { csvEscape } from '../output/format-utils.js';

export class CsvSyntaxError extends Error {
  constructor(message: string, public readonly line: number) {
    super(`${message} (line ${line})`);
    this.name = 'CsvSyntaxError';
  }
}

/** Split CSV text into rows of raw string fields */
export function parseCsvRows(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let fieldStarted = false;
  let line = 1;
  let quoteLine = 1;

  const endField = () => {
    row.push(field);
    field = '';
    fieldStarted = false;
  };
  const endRow = () => {
    endField();
    rows.push(row);
    row = [];
  };

  const body = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  for (let i = 0; i < body.length; i++) {
    const ch = body[i];

    if (inQuotes) {
      if (ch === '"') {
        if (body[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (ch === '\n') line++;
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      if (fieldStarted) {
        throw new CsvSyntaxError('Unexpected quote inside unquoted field', line);
      }
      inQuotes = true;
      fieldStarted = true;
      quoteLine = line;
    } else if (ch === ',') {
      endField();
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && body[i + 1] === '\n') i++;
      // blank lines carry no row
      if (fieldStarted || row.length > 0) endRow();
      line++;
    } else {
      field += ch;
      fieldStarted = true;
    }
  }

  if (inQuotes) {
    throw new CsvSyntaxError('Unterminated quoted field', quoteLine);
  }
  // Text not ending in a newline leaves one row open
  if (fieldStarted || row.length > 0) {
    endRow();
  }

  return rows;
}

export function serializeCsvRows(rows: ReadonlyArray<readonly string[]>): string {
  return rows.map(r => r.map(csvEscape).join(',')).join('\n') + '\n';
}
