import { readFile } from 'node:fs/promises';
import { ArtifactNotFoundError, ConfigSchemaError } from './errors.js';
import { isMissingFile } from './files.js';

export interface DelimitedTable {
  readonly source: string;
  readonly columns: readonly string[];
  /** Rows keyed by column name, in file order. */
  readonly rows: ReadonlyArray<Readonly<Record<string, string>>>;
}

export interface ReadTableOptions {
  delimiter?: string;
  /** Header must equal this list exactly (names and order). */
  expectedColumns?: readonly string[];
  description?: string;
}

function splitLine(line: string, delimiter: string): string[] {
  const cells: string[] = [];
  let current = '';
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (char === '"') {
      if (quoted && line[i + 1] === '"') {
        current += '"';
        i++;
      } else {
        quoted = !quoted;
      }
    } else if (char === delimiter && !quoted) {
      cells.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }
  cells.push(current.trim());
  return cells;
}

/**
 * Parse a delimited text table with a header row. Blank lines are skipped.
 */
export function parseDelimited(text: string, source: string, options: ReadTableOptions = {}): DelimitedTable {
  const delimiter = options.delimiter ?? ';';
  const lines = text
    .replace(/^\uFEFF/, '')
    .split(/\r?\n/)
    .filter((line) => line.trim() !== '');

  const header = lines[0];
  if (header === undefined) {
    throw new ConfigSchemaError(source, 'Table is empty', options.expectedColumns, []);
  }

  const columns = splitLine(header, delimiter);
  const expected = options.expectedColumns;
  if (expected && (expected.length !== columns.length || expected.some((name, i) => name !== columns[i]))) {
    throw new ConfigSchemaError(source, 'Columns are not named as expected', expected, columns);
  }

  const rows = lines.slice(1).map((line, index) => {
    const cells = splitLine(line, delimiter);
    if (cells.length !== columns.length) {
      throw new ConfigSchemaError(
        source,
        `Row ${index + 2} has ${cells.length} cells, expected ${columns.length}`
      );
    }
    const row: Record<string, string> = {};
    columns.forEach((column, i) => {
      row[column] = cells[i] ?? '';
    });
    return Object.freeze(row);
  });

  return Object.freeze({ source, columns, rows });
}

export async function readDelimited(path: string, options: ReadTableOptions = {}): Promise<DelimitedTable> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      throw new ArtifactNotFoundError(options.description ?? 'Table', path);
    }
    throw error;
  }
  return parseDelimited(text, path, options);
}

export function toDelimited(columns: readonly string[], rows: ReadonlyArray<Record<string, string>>, delimiter = ';'): string {
  const escape = (value: string) =>
    value.includes(delimiter) || value.includes('"') ? `"${value.replace(/"/g, '""')}"` : value;
  const lines = [columns.map(escape).join(delimiter)];
  for (const row of rows) {
    lines.push(columns.map((column) => escape(row[column] ?? '')).join(delimiter));
  }
  return `${lines.join('\n')}\n`;
}

/** Accept "0,25" as well as "0.25". */
export function parseDecimal(value: string): number {
  const normalized = value.trim().replace(',', '.');
  if (normalized === '') return Number.NaN;
  return Number(normalized);
}
