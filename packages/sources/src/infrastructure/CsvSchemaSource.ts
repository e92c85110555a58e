import { readFile } from 'node:fs/promises';
import Papa from 'papaparse';
import type { ObservedSchema, SchemaSource } from '@frameschema/core';
import type { InferenceOptions } from '../domain/services/TypeInference.js';
import { TypeInference } from '../domain/services/TypeInference.js';

export interface CsvSchemaSourceOptions extends InferenceOptions {
  /** Column delimiter (e.g. `','`, `';'`, `'\t'`). Auto-detected when omitted. */
  readonly delimiter?: string;
  /** Whether the first row holds column names. Without a header, columns are named `column_1`, `column_2`, ... Default: `true`. */
  readonly hasHeader?: boolean;
  /** Encoding used by `fromFile()`. Default: `'utf-8'`. */
  readonly encoding?: BufferEncoding;
}

/**
 * Schema source for CSV text, using PapaParse.
 *
 * CSV carries no types, so column types are inferred from the first rows.
 */
export class CsvSchemaSource implements SchemaSource {
  private readonly load: () => Promise<string>;
  private readonly options: CsvSchemaSourceOptions;
  private readonly inference: TypeInference;

  constructor(content: string | Buffer | (() => Promise<string>), options?: CsvSchemaSourceOptions) {
    this.load =
      typeof content === 'function'
        ? content
        : () => Promise.resolve(typeof content === 'string' ? content : content.toString(options?.encoding ?? 'utf-8'));
    this.options = options ?? {};
    this.inference = new TypeInference(options);
  }

  /** Read the CSV from a local file each time the schema is described. Node.js only. */
  static fromFile(filePath: string, options?: CsvSchemaSourceOptions): CsvSchemaSource {
    return new CsvSchemaSource(() => readFile(filePath, { encoding: options?.encoding ?? 'utf-8' }), options);
  }

  async describe(): Promise<ObservedSchema> {
    const content = await this.load();
    const hasHeader = this.options.hasHeader ?? true;
    const sampled = this.inference.inferSchemaLength;

    // Only the sampled rows are parsed; 0 means no limit.
    const result = Papa.parse<string[]>(content, {
      header: false,
      delimiter: this.options.delimiter ?? '',
      skipEmptyLines: true,
      dynamicTyping: false,
      preview: Number.isFinite(sampled) ? sampled + (hasHeader ? 1 : 0) : 0,
    });

    const rows = result.data;
    if (rows.length === 0) return new Map();

    const columns = hasHeader ? this.headerColumns(rows[0] ?? []) : defaultColumnNames(widest(rows));
    const dataRows = hasHeader ? rows.slice(1) : rows;

    return this.inference.inferSchema(
      dataRows.map((cells) => toRecord(columns, cells)),
      columns,
    );
  }

  private headerColumns(header: readonly string[]): string[] {
    const columns = header.map((name) => name.trim());
    const seen = new Set<string>();

    for (const name of columns) {
      if (seen.has(name)) {
        throw new Error(`CsvSchemaSource: duplicate column '${name}' in header`);
      }
      seen.add(name);
    }

    return columns;
  }
}

function defaultColumnNames(width: number): string[] {
  return Array.from({ length: width }, (_, i) => `column_${String(i + 1)}`);
}

function widest(rows: readonly (readonly string[])[]): number {
  return rows.reduce((width, row) => Math.max(width, row.length), 0);
}

function toRecord(columns: readonly string[], cells: readonly string[]): Record<string, string> {
  const record: Record<string, string> = {};
  columns.forEach((name, i) => {
    const cell = cells[i];
    if (cell !== undefined) record[name] = cell;
  });
  return record;
}
