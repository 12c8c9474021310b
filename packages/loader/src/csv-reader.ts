import { readFile } from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';

const CsvRowsSchema = z.array(z.array(z.string()));

export interface CsvTable {
  header: string[];
  rows: CsvRow[];
}

/**
 * One data row addressed by column name. Cells are trimmed; missing
 * columns read as the empty string.
 */
export class CsvRow {
  private readonly cells: ReadonlyMap<string, string>;

  constructor(
    header: readonly string[],
    values: readonly string[],
    /** 1-based data row number, header excluded */
    readonly index: number
  ) {
    const cells = new Map<string, string>();
    header.forEach((column, i) => {
      if (!cells.has(column)) {
        cells.set(column, (values[i] ?? '').trim());
      }
    });
    this.cells = cells;
  }

  has(column: string): boolean {
    return this.cells.has(column);
  }

  get(column: string): string {
    return this.cells.get(column) ?? '';
  }

  /** First non-empty value among the columns, in order. */
  first(...columns: string[]): string {
    for (const column of columns) {
      const value = this.get(column);
      if (value !== '') return value;
    }
    return '';
  }

  /** Like `first`, but blank reads as null. */
  optional(...columns: string[]): string | null {
    const value = this.first(...columns);
    return value === '' ? null : value;
  }

  /** Column/value pairs in header order. */
  entries(): Array<[string, string]> {
    return [...this.cells.entries()];
  }

  isBlank(): boolean {
    return [...this.cells.values()].every((value) => value === '');
  }
}

export function parseCsvTable(content: string): CsvTable {
  const parsed: unknown = parse(content, {
    bom: true,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
  });
  const records = CsvRowsSchema.parse(parsed);

  const [headerRow, ...dataRows] = records;
  const header = (headerRow ?? []).map((column) => column.trim());
  return {
    header,
    rows: dataRows.map((values, i) => new CsvRow(header, values, i + 1)),
  };
}

export async function readCsvTable(filePath: string): Promise<CsvTable> {
  return parseCsvTable(await readFile(filePath, 'utf-8'));
}
