/**
 * Minimal RFC 4180 reader/writer for the content and metrics files.
 * Quoted fields may contain delimiters, doubled quotes and line breaks.
 */

export const BOM = '\uFEFF';

export interface CsvParseOptions {
  delimiter?: string;
}

/**
 * Parse CSV content into rows of raw string cells. Blank lines are dropped.
 */
export function parseCsv(content: string, options: CsvParseOptions = {}): string[][] {
  const delimiter = options.delimiter ?? ',';
  const text = content.startsWith(BOM) ? content.slice(1) : content;

  const rows: string[][] = [];
  let row: string[] = [];
  let current = '';
  let inQuotes = false;

  const endRow = (): void => {
    row.push(current);
    current = '';
    if (row.length > 1 || row[0] !== '') rows.push(row);
    row = [];
  };

  for (let i = 0; i < text.length; i++) {
    const char = text.charAt(i);
    const nextChar = text.charAt(i + 1);

    if (inQuotes) {
      if (char === '"' && nextChar === '"') {
        // Escaped quote
        current += '"';
        i++;
      } else if (char === '"') {
        inQuotes = false;
      } else {
        current += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === delimiter) {
      row.push(current);
      current = '';
    } else if (char === '\r' && nextChar === '\n') {
      endRow();
      i++;
    } else if (char === '\n' || char === '\r') {
      endRow();
    } else {
      current += char;
    }
  }

  if (current !== '' || row.length > 0) endRow();

  return rows;
}

function escapeCell(value: string | number | boolean, delimiter: string): string {
  const text = String(value);
  if (text.includes('"') || text.includes(delimiter) || /[\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function stringifyCsvRow(values: ReadonlyArray<string | number | boolean>, delimiter = ','): string {
  return values.map(v => escapeCell(v, delimiter)).join(delimiter);
}

/**
 * Serialize rows, one line each, with a trailing newline.
 */
export function stringifyCsv(rows: ReadonlyArray<ReadonlyArray<string | number | boolean>>, delimiter = ','): string {
  return rows.map(r => stringifyCsvRow(r, delimiter)).join('\n') + '\n';
}

/**
 * Map a data row onto its header, filling absent cells with ''.
 */
export function rowToRecord(header: readonly string[], row: readonly string[]): Record<string, string> {
  const record: Record<string, string> = {};
  header.forEach((column, index) => {
    record[column] = row[index] ?? '';
  });
  return record;
}
