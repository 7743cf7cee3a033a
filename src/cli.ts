/**
 * Command-line front end.
 *
 *   pandoc-ast read [FILE] [-f FORMAT] [-o OUTPUT] [--types-version V]
 *   pandoc-ast write [FILE] [-f FORMAT] [-o OUTPUT] [--types-version V]
 *
 * `read` converts a document and prints its tree; `write` takes a JSON
 * document and converts it to FORMAT. FILE defaults to standard input,
 * OUTPUT to standard output.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { ensureConfigured, findExecutable } from './config.js';
import { type SchemaContext, createContext } from './context.js';
import { read, write } from './converter.js';
import { parseJson } from './document.js';
import { AstError } from './errors.js';
import { loadSettings } from './settings.js';
import { repr } from './tree.js';

export const USAGE = `Usage: pandoc-ast <command> [FILE] [options]

Commands:
  read     Convert FILE (default: stdin) and print its document tree
  write    Convert the JSON document in FILE (default: stdin) to FORMAT

Options:
  -f, --format FORMAT     input format (read) or output format (write)
  -o, --output OUTPUT     output file (default: stdout)
      --types-version V   pandoc-types version to use
  -h, --help              show this help`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export type CliCommand =
  | { command: 'help' }
  | {
      command: 'read' | 'write';
      file?: string;
      format?: string;
      output?: string;
      typesVersion?: string;
    };

function parseArgv(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        format: { type: 'string', short: 'f' },
        output: { type: 'string', short: 'o' },
        'types-version': { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

/** Parse arguments (without the node and script entries). */
export function parseCommandLine(argv: readonly string[]): CliCommand {
  const { values, positionals } = parseArgv(argv);
  if (values.help || positionals.length === 0) return { command: 'help' };

  const [command, file, ...rest] = positionals;
  if (command !== 'read' && command !== 'write') {
    throw new UsageError(`Unknown command '${command}'`);
  }
  if (rest.length > 0) {
    throw new UsageError(`Unexpected argument '${rest[0]}'`);
  }
  return {
    command,
    file,
    format: values.format,
    output: values.output,
    typesVersion: values['types-version'],
  };
}

async function readStdin(): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), 'utf8'));
  }
  return Buffer.concat(chunks);
}

function contextFor(typesVersion: string | undefined): SchemaContext {
  if (typesVersion === undefined) return ensureConfigured();
  const pandocPath = loadSettings().pandocPath ?? findExecutable('pandoc');
  return createContext(typesVersion, { pandocPath });
}

/** Run the command line; resolves to the process exit code. */
export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  try {
    const cmd = parseCommandLine(argv);
    if (cmd.command === 'help') {
      console.log(USAGE);
      return 0;
    }

    const context = contextFor(cmd.typesVersion);

    if (cmd.command === 'read') {
      const source = cmd.file === undefined ? await readStdin() : undefined;
      const doc = await read(source, { file: cmd.file, format: cmd.format, context });
      const content = `${repr(doc)}\n`;
      if (cmd.output === undefined) process.stdout.write(content);
      else await writeFile(cmd.output, content, 'utf8');
      return 0;
    }

    const text = cmd.file === undefined ? (await readStdin()).toString('utf8') : await readFile(cmd.file, 'utf8');
    const doc = parseJson(text, context);
    const result = await write(doc, { file: cmd.output, format: cmd.format, context });
    if (cmd.output === undefined) process.stdout.write(result);
    return 0;
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`error: ${err.message}\n\n${USAGE}`);
      return 2;
    }
    if (err instanceof AstError) {
      console.error(`error: ${err.message}`);
      return 1;
    }
    throw err;
  }
}
