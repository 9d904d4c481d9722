import type { CsvRow } from '../types/index.js';

export interface ParsedCsv {
  headers: string[];
  rows: CsvRow[];
}

/**
 * Parse RFC 4180 CSV text. Quoted fields may contain commas, doubled quotes
 * and line breaks. A leading UTF-8 BOM is dropped and blank lines are skipped.
 */
export function parseCsv(text: string): ParsedCsv {
  const records = parseRecords(text.charCodeAt(0) === 0xfeff ? text.slice(1) : text);
  if (records.length === 0) return { headers: [], rows: [] };

  const headers = records[0];
  const rows = records.slice(1).map(fields => {
    const row: CsvRow = {};
    headers.forEach((header, i) => {
      row[header] = fields[i] ?? '';
    });
    return row;
  });
  return { headers, rows };
}

/** Read only the header row. */
export function parseCsvHeader(text: string): string[] {
  return parseCsv(text).headers;
}

export function toCsv(headers: readonly string[], rows: readonly CsvRow[]): string {
  const lines = [headers.map(csvEscape).join(',')];
  for (const row of rows) {
    lines.push(headers.map(h => csvEscape(row[h] ?? '')).join(','));
  }
  return lines.join('\n') + '\n';
}

export function csvEscape(value: string): string {
  if (/[",\r\n]/.test(value) || value !== value.trim()) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function parseRecords(text: string): string[][] {
  const records: string[][] = [];
  let fields: string[] = [];
  let field = '';
  let inQuotes = false;
  let fieldStarted = false;

  const endRecord = () => {
    fields.push(field);
    // A record with one empty field is a blank line.
    if (fields.length > 1 || fields[0] !== '' || fieldStarted) records.push(fields);
    fields = [];
    field = '';
    fieldStarted = false;
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += ch;
      }
      continue;
    }

    switch (ch) {
      case '"':
        inQuotes = true;
        fieldStarted = true;
        break;
      case ',':
        fields.push(field);
        field = '';
        fieldStarted = true;
        break;
      case '\r':
        if (text[i + 1] === '\n') i++;
        endRecord();
        break;
      case '\n':
        endRecord();
        break;
      default:
        field += ch;
    }
  }

  if (field !== '' || fields.length > 0 || fieldStarted) endRecord();
  return records;
}
