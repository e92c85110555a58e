import { readFile } from 'node:fs/promises';
import type { ObservedSchema, SchemaSource } from '@frameschema/core';
import type { InferenceOptions } from '../domain/services/TypeInference.js';
import { TypeInference } from '../domain/services/TypeInference.js';

export interface JsonSchemaSourceOptions extends InferenceOptions {
  /** Payload format: 'array' for a JSON array of objects, 'ndjson' for newline-delimited JSON. Default: 'auto'. */
  readonly format?: 'array' | 'ndjson' | 'auto';
}

type JsonRecord = Readonly<Record<string, unknown>>;

/**
 * Schema source for JSON payloads or in-memory records. Zero dependencies.
 *
 * Column order follows first appearance across the sampled records.
 */
export class JsonSchemaSource implements SchemaSource {
  private readonly load: () => Promise<readonly JsonRecord[]>;
  private readonly inference: TypeInference;

  private constructor(load: () => Promise<readonly JsonRecord[]>, options?: JsonSchemaSourceOptions) {
    this.load = load;
    this.inference = new TypeInference(options);
  }

  /** Parse a JSON array or NDJSON payload. */
  static fromText(content: string | Buffer, options?: JsonSchemaSourceOptions): JsonSchemaSource {
    const text = typeof content === 'string' ? content : content.toString('utf-8');
    return new JsonSchemaSource(() => Promise.resolve(parseRecords(text, options?.format ?? 'auto')), options);
  }

  /** Read a JSON array or NDJSON file each time the schema is described. Node.js only. */
  static fromFile(filePath: string, options?: JsonSchemaSourceOptions): JsonSchemaSource {
    return new JsonSchemaSource(async () => {
      const text = await readFile(filePath, { encoding: 'utf-8' });
      return parseRecords(text, options?.format ?? 'auto');
    }, options);
  }

  /** Describe records already in memory, e.g. query results. */
  static fromRecords(records: readonly JsonRecord[], options?: JsonSchemaSourceOptions): JsonSchemaSource {
    return new JsonSchemaSource(() => Promise.resolve(records), options);
  }

  async describe(): Promise<ObservedSchema> {
    const records = await this.load();
    return this.inference.inferSchema(records);
  }
}

function parseRecords(content: string, format: 'array' | 'ndjson' | 'auto'): JsonRecord[] {
  const trimmed = content.trim();
  if (trimmed === '') return [];

  const resolved = format === 'auto' ? (trimmed.startsWith('[') ? 'array' : 'ndjson') : format;
  return resolved === 'array' ? parseArray(trimmed) : parseNdjson(trimmed);
}

function parseArray(content: string): JsonRecord[] {
  const parsed: unknown = JSON.parse(content);

  if (!Array.isArray(parsed)) {
    throw new Error('JsonSchemaSource: expected a JSON array of objects');
  }

  return parsed.map((item: unknown) => {
    if (!isPlainObject(item)) {
      throw new Error('JsonSchemaSource: each item in the array must be a plain object');
    }
    return item;
  });
}

function parseNdjson(content: string): JsonRecord[] {
  const records: JsonRecord[] = [];

  for (const line of content.split('\n')) {
    const trimmedLine = line.trim();
    if (trimmedLine === '') continue;

    const parsed: unknown = JSON.parse(trimmedLine);
    if (!isPlainObject(parsed)) {
      throw new Error('JsonSchemaSource: each NDJSON line must be a plain object');
    }
    records.push(parsed);
  }

  return records;
}

function isPlainObject(value: unknown): value is JsonRecord {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
