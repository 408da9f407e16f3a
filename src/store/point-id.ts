import { createHash } from 'node:crypto';

/**
 * Deterministic point id for a symbol: the MD5 digest of its UTF-8 id,
 * formatted as a lowercase 8-4-4-4-12 UUID string.
 *
 * @example
 * pointIdFor('pkg.Foo.bar') // same value on every run and machine
 */
export function pointIdFor(symbolId: string): string {
  const hex = createHash('md5').update(symbolId, 'utf8').digest('hex');
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20, 32),
  ].join('-');
}
