export type CsvParseResult = {
  headers: string[];
  rows: string[][];
  delimiter: string;
};

export type CsvRecord = Record<string, string>;

const CANDIDATE_DELIMITERS = [',', '\t', ';'];

function countOutsideQuotes(line: string, delimiter: string): number {
  let count = 0;
  let inQuotes = false;
  for (let i = 0; i < line.length; i += 1) {
    const ch = line[i];
    if (ch === '"') {
      if (inQuotes && line[i + 1] === '"') {
        i += 1;
        continue;
      }
      inQuotes = !inQuotes;
    } else if (!inQuotes && ch === delimiter) {
      count += 1;
    }
  }
  return count;
}

export function detectDelimiter(headerLine: string): string {
  let best = ',';
  let bestCount = -1;
  for (const delimiter of CANDIDATE_DELIMITERS) {
    const count = countOutsideQuotes(headerLine, delimiter);
    if (count > bestCount) {
      bestCount = count;
      best = delimiter;
    }
  }
  return best;
}

function isBlank(row: string[]): boolean {
  return row.every((value) => value.trim() === '');
}

/**
 * RFC 4180-style parser: quoted fields may hold delimiters, doubled quotes
 * and line breaks. Blank lines are skipped; the first row is the header.
 */
export function parseCsv(text: string, delimiter?: string): CsvParseResult {
  const source = text.replace(/^\uFEFF/, '');
  const firstLineEnd = source.search(/\r?\n/);
  const sep = delimiter ?? detectDelimiter(firstLineEnd >= 0 ? source.slice(0, firstLineEnd) : source);

  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;

  const endRow = () => {
    row.push(field);
    field = '';
    if (!isBlank(row)) rows.push(row);
    row = [];
  };

  for (let i = 0; i < source.length; i += 1) {
    const ch = source[i];

    if (inQuotes) {
      if (ch !== '"') {
        field += ch;
      } else if (source[i + 1] === '"') {
        field += '"';
        i += 1;
      } else {
        inQuotes = false;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
    } else if (ch === sep) {
      row.push(field);
      field = '';
    } else if (ch === '\n') {
      endRow();
    } else if (ch !== '\r') {
      field += ch;
    }
  }
  if (field.length > 0 || row.length > 0) {
    endRow();
  }

  const [headerRow, ...dataRows] = rows;
  return { headers: (headerRow ?? []).map((header) => header.trim()), rows: dataRows, delimiter: sep };
}

/** Keys each row by its header. Missing trailing cells become empty strings. */
export function toRecords(result: CsvParseResult): CsvRecord[] {
  return result.rows.map((row) => {
    const record: CsvRecord = {};
    result.headers.forEach((header, index) => {
      record[header] = (row[index] ?? '').trim();
    });
    return record;
  });
}
