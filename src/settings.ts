/**
 * Settings file loading
 *
 * Finds and parses `pandoc-ast.yaml`, then applies environment
 * overrides. Keys in the file are snake_case:
 *
 *   pandoc_path: /usr/local/bin/pandoc
 *   types_version: "1.22"
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as yaml from 'yaml';
import { ConfigurationError } from './errors.js';
import { createLogger } from './logger.js';

const logger = createLogger('config');

// --- Constants ---

export const SETTINGS_FILE_NAME = 'pandoc-ast.yaml';

/** Environment variable naming a settings file, checked before the walk-up search */
export const SETTINGS_PATH_ENV = 'PANDOC_AST_CONFIG';

export const ENV_OVERRIDES = {
  pandocPath: 'PANDOC_PATH',
  typesVersion: 'PANDOC_TYPES_VERSION',
} as const;

export interface Settings {
  pandocPath?: string;
  typesVersion?: string;
}

const YAML_KEYS = new Map<string, keyof Settings>([
  ['pandoc_path', 'pandocPath'],
  ['types_version', 'typesVersion'],
]);

// --- Discovery ---

/**
 * The settings file to use: `PANDOC_AST_CONFIG` when set, else the
 * nearest `pandoc-ast.yaml` walking up from `startDir`.
 */
export function findSettingsFile(startDir: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): string | undefined {
  const override = env[SETTINGS_PATH_ENV];
  if (override) {
    const resolved = path.resolve(override);
    if (!fs.existsSync(resolved)) {
      throw new ConfigurationError(`Settings file not found: ${resolved}`, { path: resolved });
    }
    return resolved;
  }

  let currentDir = path.resolve(startDir);
  for (;;) {
    const candidate = path.join(currentDir, SETTINGS_FILE_NAME);
    if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) return candidate;
    const parent = path.dirname(currentDir);
    if (parent === currentDir) return undefined;
    currentDir = parent;
  }
}

// --- Parsing ---

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse settings YAML. Scalars are read as text, so `types_version: 1.20`
 * stays "1.20".
 */
export function parseSettings(content: string, filePath?: string): Settings {
  const where = filePath ? ` (${filePath})` : '';
  let parsed: unknown;
  try {
    parsed = yaml.parse(content, { schema: 'failsafe' });
  } catch (err) {
    throw new ConfigurationError(
      `Failed to parse YAML settings${where}: ${err instanceof Error ? err.message : String(err)}`,
      { path: filePath },
      err,
    );
  }
  if (parsed === null || parsed === undefined || parsed === '') return {};
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Settings file must contain a mapping${where}`, { path: filePath });
  }

  const settings: Settings = {};
  for (const [key, value] of Object.entries(parsed)) {
    const target = YAML_KEYS.get(key);
    if (target === undefined) {
      logger.warn(`Ignoring unknown settings key '${key}'${where}`);
      continue;
    }
    if (typeof value !== 'string' || value.trim() === '') {
      throw new ConfigurationError(`Settings key '${key}' must be a non-empty string${where}`, { path: filePath, key });
    }
    settings[target] = value.trim();
  }
  return settings;
}

/** Environment variables win over the file. */
export function applyEnvironment(settings: Settings, env: NodeJS.ProcessEnv = process.env): Settings {
  const result: Settings = { ...settings };
  const pandocPath = env[ENV_OVERRIDES.pandocPath]?.trim();
  if (pandocPath) result.pandocPath = pandocPath;
  const typesVersion = env[ENV_OVERRIDES.typesVersion]?.trim();
  if (typesVersion) result.typesVersion = typesVersion;
  return result;
}

export function loadSettings(startDir?: string, env: NodeJS.ProcessEnv = process.env): Settings {
  const file = findSettingsFile(startDir, env);
  let settings: Settings = {};
  if (file !== undefined) {
    logger.debug(`Loading settings from ${file}`);
    settings = parseSettings(fs.readFileSync(file, 'utf8'), file);
  }
  return applyEnvironment(settings, env);
}
