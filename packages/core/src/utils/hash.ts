/**
 * FNV-1a Hash implementation for strings.
 * Fast, non-cryptographic, synchronous.
 * Used for content-derived graph keys, not for cache fingerprints.
 */
export function hashString(str: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < str.length; i++) {
    hash ^= str.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0; // Ensure positive 32-bit integer
}

/**
 * FNV-1a hash as a fixed-width hex string.
 */
export function hashHex(str: string): string {
  return hashString(str).toString(16).padStart(8, '0');
}
