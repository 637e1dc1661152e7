/**
 * Canonical fingerprints of property maps.
 *
 * @packageDocumentation
 */

import { createHash } from 'node:crypto';

/**
 * Hashes a property map independently of its insertion order.
 *
 * Entries are sorted by key and serialized as JSON (so separators inside keys
 * or values cannot collide), optionally followed by a qualifier such as the
 * validation context type, then hashed with SHA-256.
 *
 * @param properties - The property map.
 * @param qualifier - Extra discriminator folded into the hash.
 * @returns Hex-encoded SHA-256 digest.
 */
export function fingerprintProperties(
  properties: ReadonlyMap<string, string>,
  qualifier?: string
): string {
  const entries = [...properties.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const canonical = JSON.stringify(qualifier === undefined ? [entries] : [entries, qualifier]);
  return createHash('sha256').update(canonical, 'utf8').digest('hex');
}
