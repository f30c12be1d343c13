/**
 * CSV — Minimal reader and writer for the gradebook's CSV files
 *
 * Handles comma-separated records with optional double-quoted fields ("" is an
 * escaped quote). A quoted field may contain commas and line breaks, so one
 * record can span several lines. Row numbers are the line a record starts on,
 * counting the header as line 1.
 */

export type CsvRow = Record<string, string>;

export interface CsvTable {
  header: string[];
  // Each row is keyed by header name; cells missing from short records are ''
  rows: { line: number; values: CsvRow }[];
}

export function parseCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (inQuotes) {
      if (char === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (char === '"') {
        inQuotes = false;
      } else {
        current += char;
      }
    } else if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      fields.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  fields.push(current);
  return fields;
}

// Splits text into records on line breaks outside quotes. Each record keeps the
// 1-based line it starts on.
function splitRecords(text: string): { line: number; text: string }[] {
  const records: { line: number; text: string }[] = [];
  let current = '';
  let inQuotes = false;
  let line = 1;
  let start = 1;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (char === '"') inQuotes = !inQuotes;

    if (!inQuotes && (char === '\n' || (char === '\r' && text[i + 1] === '\n'))) {
      records.push({ line: start, text: current });
      current = '';
      if (char === '\r') i++;
      line++;
      start = line;
      continue;
    }

    if (char === '\n') line++;
    current += char;
  }
  records.push({ line: start, text: current });
  return records;
}

export function parseCsv(text: string): CsvTable {
  const [first, ...rest] = splitRecords(text.replace(/^\uFEFF/, ''));
  const header = parseCsvLine(first?.text ?? '').map(h => h.trim());
  const rows: CsvTable['rows'] = [];

  for (const record of rest) {
    if (!record.text.trim()) continue;

    const cells = parseCsvLine(record.text);
    const values: CsvRow = {};
    header.forEach((column, index) => {
      values[column] = cells[index] ?? '';
    });
    rows.push({ line: record.line, values });
  }

  return { header, rows };
}

export function formatCsvField(value: string | number): string {
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function formatCsv(header: string[], rows: (string | number)[][]): string {
  const lines = [header, ...rows].map(row => row.map(formatCsvField).join(','));
  return lines.join('\n') + '\n';
}
