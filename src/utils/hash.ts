const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

// FNV-1a 32-bit over one or more byte sequences, hashed as if concatenated
export function fnv1a32(...chunks: ArrayLike<number>[]): number {
  let hash = FNV_OFFSET >>> 0;
  for (const bytes of chunks) {
    for (let i = 0; i < bytes.length; i++) {
      hash ^= bytes[i] & 0xff;
      hash = Math.imul(hash, FNV_PRIME) >>> 0;
    }
  }
  return hash >>> 0;
}

export function fnv1aHex(...chunks: ArrayLike<number>[]): string {
  return fnv1a32(...chunks).toString(16).padStart(8, '0');
}
