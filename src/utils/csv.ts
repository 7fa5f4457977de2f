/**
 * Minimal RFC 4180 CSV reading and writing.
 *
 * Cells containing a comma, quote, CR or LF are quoted on write; quoted
 * cells may span lines on read. Rows are keyed by the header line.
 */
import { ValidationError, ErrorCodes } from './errors.js';

export type CsvCell = string | number | boolean;

export interface CsvTable {
  header: string[];
  /** Data rows keyed by header name; missing trailing cells are absent. */
  rows: Array<Record<string, string>>;
  /** Physical line each data row starts on, parallel to `rows`. */
  lines: number[];
}

export interface CsvRecord {
  cells: string[];
  /** 1-based line the record starts on */
  line: number;
}

function escapeCell(value: CsvCell): string {
  const text = typeof value === 'boolean' ? (value ? '1' : '0') : String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Serialise records under a fixed column order. Columns a record lacks are written empty.
 */
export function formatCsv(columns: readonly string[], records: ReadonlyArray<Readonly<Record<string, CsvCell>>>): string {
  const lines = [columns.map(escapeCell).join(',')];
  for (const record of records) {
    lines.push(columns.map((column) => {
      const value = record[column];
      return value === undefined ? '' : escapeCell(value);
    }).join(','));
  }
  return `${lines.join('\n')}\n`;
}

/**
 * Split CSV text into records tagged with their starting line. Quoted
 * cells spanning lines advance the line count without starting a record.
 */
export function readCsvRecords(content: string): CsvRecord[] {
  const records: CsvRecord[] = [];
  let row: string[] = [];
  let cell = '';
  let inQuotes = false;
  let lineNumber = 1;
  let rowStart = 1;

  for (let i = 0; i < content.length; i++) {
    const ch = content[i];
    if (inQuotes) {
      if (ch === '"') {
        if (content[i + 1] === '"') {
          cell += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (ch === '\n') lineNumber++;
        cell += ch;
      }
      continue;
    }
    if (ch === '"' && cell === '') {
      inQuotes = true;
    } else if (ch === ',') {
      row.push(cell);
      cell = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && content[i + 1] === '\n') i++;
      row.push(cell);
      records.push({ cells: row, line: rowStart });
      row = [];
      cell = '';
      lineNumber++;
      rowStart = lineNumber;
    } else {
      cell += ch;
    }
  }

  if (inQuotes) {
    throw new ValidationError(ErrorCodes.INVALID_CSV, `Unterminated quoted cell at line ${lineNumber}`, { line: lineNumber });
  }
  if (cell !== '' || row.length > 0) {
    row.push(cell);
    records.push({ cells: row, line: rowStart });
  }
  // Blank lines carry no data
  return records.filter(({ cells }) => !(cells.length === 1 && cells[0] === ''));
}

/**
 * Split CSV text into raw cell arrays.
 */
export function parseCsvLines(content: string): string[][] {
  return readCsvRecords(content).map((record) => record.cells);
}

/**
 * Parse CSV text with a header line into keyed rows.
 */
export function parseCsv(content: string): CsvTable {
  const [first, ...body] = readCsvRecords(content);
  if (!first) {
    return { header: [], rows: [], lines: [] };
  }
  const header = first.cells;
  const rows = body.map(({ cells }) => {
    const row: Record<string, string> = {};
    header.forEach((name, index) => {
      const value = cells[index];
      if (value !== undefined) {
        row[name] = value;
      }
    });
    return row;
  });
  return { header, rows, lines: body.map((record) => record.line) };
}
