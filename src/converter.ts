/**
 * Converter — documents in and out of any format pandoc knows.
 *
 * JSON is handled in-process. Every other format goes through the pandoc
 * program, working on files in a scratch directory that is removed
 * whatever the outcome.
 */

import { execFile } from 'node:child_process';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { promisify } from 'node:util';
import { ensureConfigured } from './config.js';
import type { SchemaContext } from './context.js';
import { makeDocument, parseJson, stringifyJson } from './document.js';
import { ConversionError } from './errors.js';
import { defaultReaderName, defaultWriterName, isBinaryOutput } from './formats.js';
import { createLogger } from './logger.js';
import type { Value } from './tree.js';

const execFileAsync = promisify(execFile);
const logger = createLogger('converter');

/** Upper bound for one pandoc run. */
const PANDOC_TIMEOUT_MS = 120_000;

export interface ConvertOptions {
  /** File to read from or write to */
  file?: string;
  /** pandoc format name; guessed from `file` when absent, else markdown */
  format?: string;
  /** Extra pandoc command-line options */
  options?: readonly string[];
  /** Schema context; the configured default when absent */
  context?: SchemaContext;
}

// --- Helpers ---

async function withScratchDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'pandoc-ast-'));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true, maxRetries: 10, retryDelay: 100 });
  }
}

function stderrOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'stderr' in error && typeof error.stderr === 'string') {
    return error.stderr.trim() || undefined;
  }
  return undefined;
}

async function runPandoc(pandocPath: string, args: string[]): Promise<void> {
  logger.debug(`Running ${pandocPath} ${args.join(' ')}`);
  try {
    await execFileAsync(pandocPath, args, { encoding: 'utf8', timeout: PANDOC_TIMEOUT_MS });
  } catch (error) {
    const stderr = stderrOf(error);
    const reason = stderr ?? (error instanceof Error ? error.message : String(error));
    throw new ConversionError(`pandoc failed: ${reason}`, { path: pandocPath, args, stderr }, error);
  }
}

function requirePandoc(context: SchemaContext, format: string, action: 'Reading' | 'Writing'): string {
  if (context.pandocPath === undefined) {
    throw new ConversionError(`${action} the '${format}' format requires the pandoc program`, { format });
  }
  return context.pandocPath;
}

// --- read ---

/**
 * Read a document from `source` (text or bytes) or from `options.file`,
 * never both.
 */
export async function read(source?: string | Buffer, options: ConvertOptions = {}): Promise<Value> {
  const { file } = options;
  if (source !== undefined && file !== undefined) {
    throw new ConversionError('read() takes a source or a file, not both');
  }
  let input: string | Buffer;
  if (source !== undefined) input = source;
  else if (file !== undefined) input = await readFile(file);
  else throw new ConversionError('read() needs a source or a file');

  const context = options.context ?? ensureConfigured();
  const format = options.format ?? (file !== undefined ? defaultReaderName(file) : undefined) ?? 'markdown';

  if (format === 'json') {
    return parseJson(typeof input === 'string' ? input : input.toString('utf8'), context);
  }

  const pandocPath = requirePandoc(context, format, 'Reading');
  const json = await withScratchDir(async dir => {
    const inputPath = path.join(dir, 'input');
    const outputPath = path.join(dir, 'output.json');
    await writeFile(inputPath, input);
    await runPandoc(pandocPath, ['-t', 'json', '-o', outputPath, ...(options.options ?? []), '-f', format, inputPath]);
    return readFile(outputPath, 'utf8');
  });
  return parseJson(json, context);
}

// --- write ---

/**
 * Write a document, block(s) or inline(s). Binary formats (word
 * processor files, EPUB, PDF) come back as a Buffer, others as text. With
 * `options.file` the output is also saved there.
 */
export async function write(doc: Value, options: ConvertOptions = {}): Promise<string | Buffer> {
  const { file } = options;
  const context = options.context ?? ensureConfigured();
  const document = makeDocument(doc, context);
  const format = options.format ?? (file !== undefined ? defaultWriterName(file) : undefined) ?? 'markdown';
  const json = stringifyJson(document, context);

  let bytes: Buffer;
  let outputName: string | undefined;
  if (format === 'json') {
    bytes = Buffer.from(json, 'utf8');
  } else {
    const pandocPath = requirePandoc(context, format, 'Writing');
    // pandoc looks at the output extension, e.g. to produce PDF.
    outputName = file !== undefined ? path.basename(file) : 'output';
    const name = outputName;
    bytes = await withScratchDir(async dir => {
      const inputPath = path.join(dir, 'input.json');
      const outputPath = path.join(dir, name);
      await writeFile(inputPath, json, 'utf8');
      await runPandoc(pandocPath, ['-t', format, '-o', outputPath, ...(options.options ?? []), '-f', 'json', inputPath]);
      return readFile(outputPath);
    });
  }

  if (file !== undefined) await writeFile(file, bytes);
  return isBinaryOutput(format, outputName) ? bytes : bytes.toString('utf8');
}
