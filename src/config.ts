/**
 * Configuration — which pandoc program and which pandoc-types schema to use.
 *
 *   configure({ auto: true })            // pandoc from PATH, schema from its version
 *   configure({ version: '2.19.2' })     // schema for that pandoc release
 *   configure({ typesVersion: '1.23' })  // schema only, JSON in/out without pandoc
 *
 * A successful call initializes the default schema context.
 */

import { execFileSync } from 'node:child_process';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { type SchemaContext, currentContext, init, isInitialized, reset } from './context.js';
import { ConfigurationError } from './errors.js';
import { createLogger } from './logger.js';
import { compareVersions, parseVersion } from './schema-version.js';
import { loadSettings } from './settings.js';

const logger = createLogger('config');

export interface ConfigureOptions {
  /** Look `pandoc` up on PATH. */
  auto?: boolean;
  /** pandoc executable */
  path?: string;
  /** pandoc program version, e.g. "2.19.2" */
  version?: string;
  /** pandoc-types version, e.g. "1.22.2.1" */
  typesVersion?: string;
}

export interface Configuration {
  auto: boolean;
  path?: string;
  version?: string;
  typesVersion: string;
}

let configuration: Configuration | undefined;

// --- pandoc releases ---

type VersionTable = Record<string, string[]>;

let versionTable: VersionTable | undefined;

function isVersionTable(value: unknown): value is VersionTable {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    && Object.values(value).every(v => Array.isArray(v) && v.every(item => typeof item === 'string'));
}

function loadVersionTable(): VersionTable {
  if (!versionTable) {
    const parsed: unknown = JSON.parse(fs.readFileSync(new URL('../data/pandoc-versions.json', import.meta.url), 'utf8'));
    if (!isVersionTable(parsed)) {
      throw new ConfigurationError('Malformed pandoc version table');
    }
    versionTable = parsed;
  }
  return versionTable;
}

/** pandoc-types versions known to ship with a pandoc release, oldest first. */
export function resolveTypesVersions(pandocVersion: string): string[] {
  const [major = 0, minor = 0] = parseVersion(pandocVersion);
  const found = loadVersionTable()[`${major}.${minor}`] ?? [];
  return [...found].sort((a, b) => compareVersions(parseVersion(a), parseVersion(b)));
}

// --- pandoc program ---

function isExecutableFile(file: string): boolean {
  try {
    if (!fs.statSync(file).isFile()) return false;
    fs.accessSync(file, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/** First `name` on a PATH-style search list. */
export function findExecutable(name: string, searchPath: string = process.env.PATH ?? ''): string | undefined {
  const suffixes = process.platform === 'win32' ? ['.exe', '.cmd', ''] : [''];
  for (const dir of searchPath.split(path.delimiter)) {
    if (!dir) continue;
    for (const suffix of suffixes) {
      const candidate = path.join(dir, name + suffix);
      if (isExecutableFile(candidate)) return candidate;
    }
  }
  return undefined;
}

/** Program version from the first line of `pandoc --version`: "pandoc 3.1.2" → "3.1.2". */
export function parseProgramVersion(output: string): string {
  const firstLine = output.split('\n', 1)[0].trim();
  const version = firstLine.split(/\s+/)[1];
  if (!version || !/^\d+(\.\d+)*$/.test(version)) {
    throw new ConfigurationError(`Cannot read a version from '${firstLine}'`, { output: firstLine });
  }
  return version;
}

function programVersion(pandocPath: string): string {
  let output: string;
  try {
    output = execFileSync(pandocPath, ['--version'], { encoding: 'utf8' });
  } catch (err) {
    throw new ConfigurationError(`Cannot run ${pandocPath} --version`, { path: pandocPath }, err);
  }
  return parseProgramVersion(output);
}

// --- configure ---

/**
 * Resolve and apply a configuration. Each given value must agree with
 * what the previous ones imply: an explicit `path` must be the one
 * `auto` finds, and so on.
 */
export function configure(options: ConfigureOptions): Configuration {
  const auto = options.auto ?? false;
  let { path: pandocPath, version, typesVersion } = options;

  if (!auto && pandocPath === undefined && version === undefined && typesVersion === undefined) {
    throw new ConfigurationError('configure expects at least one of auto, path, version or typesVersion');
  }

  if (auto) {
    const found = findExecutable('pandoc');
    if (found === undefined) {
      throw new ConfigurationError('Cannot find the pandoc program on PATH', { searchPath: process.env.PATH });
    }
    if (pandocPath === undefined) {
      pandocPath = found;
    } else if (path.resolve(pandocPath) !== path.resolve(found)) {
      throw new ConfigurationError(`Found pandoc at '${found}' with auto, but path is '${pandocPath}'`);
    }
  }

  if (pandocPath !== undefined) {
    const found = programVersion(pandocPath);
    if (version === undefined) {
      version = found;
    } else if (version !== found) {
      throw new ConfigurationError(`The pandoc program is version '${found}', but version is '${version}'`);
    }
  }

  if (version !== undefined) {
    const candidates = resolveTypesVersions(version);
    if (typesVersion === undefined) {
      typesVersion = candidates.at(-1);
      if (typesVersion === undefined) {
        throw new ConfigurationError(`Cannot find a pandoc-types version matching pandoc ${version}`, { version });
      }
    } else if (!candidates.includes(typesVersion)) {
      throw new ConfigurationError(`pandoc ${version} does not use pandoc-types ${typesVersion}`, {
        version,
        typesVersion,
      });
    }
  }

  if (typesVersion === undefined) {
    throw new ConfigurationError('No pandoc-types version could be determined');
  }

  init(typesVersion, { pandocPath });
  configuration = { auto, path: pandocPath, version, typesVersion };
  logger.info(`Configured pandoc-types ${typesVersion}${pandocPath ? ` with ${pandocPath}` : ''}`);
  return { ...configuration };
}

/** A copy of the active configuration. */
export function readConfiguration(): Configuration | undefined {
  return configuration && isInitialized() ? { ...configuration } : undefined;
}

export function resetConfiguration(): void {
  configuration = undefined;
  reset();
}

/**
 * The default context, configured on first use from the settings file
 * and environment, or from the pandoc found on PATH.
 */
export function ensureConfigured(): SchemaContext {
  if (isInitialized()) return currentContext();
  const settings = loadSettings();
  if (settings.pandocPath !== undefined || settings.typesVersion !== undefined) {
    configure({ path: settings.pandocPath, typesVersion: settings.typesVersion });
  } else {
    configure({ auto: true });
  }
  return currentContext();
}
