/**
 * Format names from file extensions, for pandoc's -f and -t options.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { ConfigurationError } from './errors.js';

interface FormatTables {
  readers: Map<string, string>;
  writers: Map<string, string>;
  binary: string[];
}

let tables: FormatTables | undefined;

function isStringRecord(value: unknown): value is Record<string, string> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    && Object.values(value).every(v => typeof v === 'string');
}

function loadTables(): FormatTables {
  if (tables) return tables;
  const parsed: unknown = JSON.parse(fs.readFileSync(new URL('../data/formats.json', import.meta.url), 'utf8'));
  if (typeof parsed !== 'object' || parsed === null || !('readers' in parsed) || !('writers' in parsed) || !('binary' in parsed)) {
    throw new ConfigurationError('Malformed format table');
  }
  const { readers, writers, binary } = parsed;
  if (!isStringRecord(readers) || !isStringRecord(writers) || !Array.isArray(binary)) {
    throw new ConfigurationError('Malformed format table');
  }
  tables = {
    readers: new Map(Object.entries(readers)),
    writers: new Map(Object.entries(writers)),
    binary: binary.filter((b): b is string => typeof b === 'string'),
  };
  return tables;
}

/** Reader for a file name: "notes.md" → "markdown". Undefined when unknown. */
export function defaultReaderName(filename: string): string | undefined {
  return loadTables().readers.get(path.extname(filename));
}

/**
 * Writer for a file name: "out.html" → "html". A one-digit extension is
 * a man page section; "x.tei.xml" is TEI; no extension is markdown.
 */
export function defaultWriterName(filename: string): string | undefined {
  const name = filename.endsWith('.tei.xml') ? filename.slice(0, -4) : filename;
  const ext = path.extname(name);
  if (/^\.\d$/.test(ext)) return 'man';
  return loadTables().writers.get(ext);
}

/** Output pandoc writes as bytes rather than UTF-8 text. */
export function isBinaryOutput(format: string, outputPath?: string): boolean {
  return loadTables().binary.some(tag => format.includes(tag)) || (outputPath?.endsWith('.pdf') ?? false);
}
