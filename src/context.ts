/**
 * Schema context — a schema version, its codec generation and the
 * registry built for it. Codec calls take one explicitly; the
 * process-wide default is managed with init / reset.
 */

import { createRegistry } from './base-grammars.js';
import { ConfigurationError } from './errors.js';
import { type CodecGeneration, type SchemaVersion, codecGeneration, formatVersion, parseVersion } from './schema-version.js';
import type { TypeRegistry } from './type-registry.js';

export interface SchemaContext {
  /** pandoc-types version as written, e.g. "1.22.2.1" */
  readonly typesVersion: string;
  readonly version: SchemaVersion;
  readonly generation: CodecGeneration;
  readonly registry: TypeRegistry;
  /** pandoc executable, when one is configured */
  readonly pandocPath?: string;
}

export interface ContextOptions {
  registry?: TypeRegistry;
  pandocPath?: string;
}

export function createContext(typesVersion: string, options: ContextOptions = {}): SchemaContext {
  const version = parseVersion(typesVersion);
  const generation = codecGeneration(version);
  return {
    typesVersion: formatVersion(version),
    version,
    generation,
    registry: options.registry ?? createRegistry(version),
    pandocPath: options.pandocPath,
  };
}

// --- Default context ---

let current: SchemaContext | undefined;

/** Configure the default context for `typesVersion`, replacing any previous one. */
export function init(typesVersion: string, options: ContextOptions = {}): SchemaContext {
  current = undefined;
  current = createContext(typesVersion, options);
  return current;
}

export function reset(): void {
  current = undefined;
}

export function isInitialized(): boolean {
  return current !== undefined;
}

export function currentContext(): SchemaContext {
  if (!current) {
    throw new ConfigurationError('No schema version configured; call init() or configure() first');
  }
  return current;
}
