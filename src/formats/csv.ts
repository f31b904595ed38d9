// src/formats/csv.ts
// Minimal RFC 4180 reader/writer: quoted fields, doubled quotes, CRLF or LF.

import { FormatError } from '../errors';

export interface CsvRow {
  /** 1-based line where the row starts */
  line: number;
  cells: string[];
}

export function parseCsv(text: string, file?: string): CsvRow[] {
  const rows: CsvRow[] = [];
  let cells: string[] = [];
  let field = '';
  let quoted = false;
  let line = 1;
  let rowLine = 1;
  let i = 0;

  const endRow = () => {
    cells.push(field);
    // a line holding nothing at all is not a row
    if (!(cells.length === 1 && cells[0] === '')) rows.push({ line: rowLine, cells });
    cells = [];
    field = '';
  };

  while (i < text.length) {
    const ch = text.charAt(i);
    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        quoted = false;
      } else {
        if (ch === '\n') line++;
        field += ch;
      }
      i++;
      continue;
    }

    if (ch === '"' && field === '') {
      quoted = true;
    } else if (ch === ',') {
      cells.push(field);
      field = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      endRow();
      line++;
      rowLine = line;
    } else {
      field += ch;
    }
    i++;
  }

  if (quoted) throw new FormatError('unterminated quoted field', file, rowLine);
  if (field !== '' || cells.length > 0) endRow();
  return rows;
}

function quote(cell: string): string {
  return /[",\r\n]/.test(cell) ? `"${cell.replace(/"/g, '""')}"` : cell;
}

export function formatCsvRow(cells: ReadonlyArray<string | number>): string {
  return cells.map((c) => quote(String(c))).join(',');
}

export function formatCsv(rows: ReadonlyArray<ReadonlyArray<string | number>>): string {
  return rows.map(formatCsvRow).join('\n') + '\n';
}
