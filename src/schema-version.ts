/**
 * Schema versions — pandoc-types release numbers and the wire-format
 * generation each one selects.
 */

import { UnsupportedVersionError } from './errors.js';

export type SchemaVersion = readonly number[];

/** The two JSON wire-format generations. */
export type CodecGeneration = 'v1' | 'v2';

export const OLDEST_SUPPORTED: SchemaVersion = [1, 12];
export const V2_THRESHOLD: SchemaVersion = [1, 17];
export const FIRST_UNSUPPORTED: SchemaVersion = [2];

/** Parse "1.22.2.1" into [1, 22, 2, 1]. */
export function parseVersion(text: string): number[] {
  const trimmed = text.trim();
  if (!/^\d+(\.\d+)*$/.test(trimmed)) {
    throw new UnsupportedVersionError(text, 'expected dot-separated integers');
  }
  return trimmed.split('.').map(Number);
}

export function formatVersion(version: SchemaVersion): string {
  return version.join('.');
}

/** Lexicographic comparison; missing components count as 0. */
export function compareVersions(a: SchemaVersion, b: SchemaVersion): number {
  const n = Math.max(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const d = (a[i] ?? 0) - (b[i] ?? 0);
    if (d !== 0) return d < 0 ? -1 : 1;
  }
  return 0;
}

export function codecGeneration(version: SchemaVersion): CodecGeneration {
  if (compareVersions(version, OLDEST_SUPPORTED) < 0 || compareVersions(version, FIRST_UNSUPPORTED) >= 0) {
    throw new UnsupportedVersionError(
      formatVersion(version),
      `supported range is ${formatVersion(OLDEST_SUPPORTED)} up to (excluding) ${formatVersion(FIRST_UNSUPPORTED)}`,
    );
  }
  return compareVersions(version, V2_THRESHOLD) < 0 ? 'v1' : 'v2';
}
