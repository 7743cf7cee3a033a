/**
 * Built-in grammars — the pandoc-types schemas shipped in `grammars/`.
 *
 * Each file holds the full type set of one pandoc-types release; a
 * version between two files uses the older one.
 */

import { readFileSync } from 'node:fs';
import { UnsupportedVersionError } from './errors.js';
import { type SchemaVersion, codecGeneration, compareVersions, formatVersion, parseVersion } from './schema-version.js';
import { TypeRegistry } from './type-registry.js';

export const BUILTIN_GRAMMAR_VERSIONS: readonly string[] = ['1.12', '1.16', '1.17', '1.21', '1.23'];

const GRAMMAR_DIR = new URL('../grammars/', import.meta.url);

/** The newest built-in grammar not newer than `version`. */
export function grammarVersionFor(version: SchemaVersion): string {
  codecGeneration(version);
  let chosen: string | undefined;
  for (const candidate of BUILTIN_GRAMMAR_VERSIONS) {
    if (compareVersions(parseVersion(candidate), version) <= 0) chosen = candidate;
  }
  if (chosen === undefined) {
    throw new UnsupportedVersionError(formatVersion(version), 'no built-in grammar');
  }
  return chosen;
}

export function readBuiltinGrammar(version: SchemaVersion): string {
  const file = new URL(`${grammarVersionFor(version)}.txt`, GRAMMAR_DIR);
  return readFileSync(file, 'utf8');
}

/** A fresh registry holding the built-in grammar for `version`. */
export function createRegistry(version: SchemaVersion): TypeRegistry {
  const registry = new TypeRegistry().loadGrammar(readBuiltinGrammar(version));
  registry.checkReferences();
  return registry;
}
