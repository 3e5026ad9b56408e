const C1 = 0xcc9e2d51;
const C2 = 0x1b873593;

const utf8 = new TextEncoder();

const mixBlock = (hash: number, block: number): number => {
  let k1 = Math.imul(block, C1);
  k1 = (k1 << 15) | (k1 >>> 17);
  k1 = Math.imul(k1, C2);

  let h1 = hash ^ k1;
  h1 = (h1 << 13) | (h1 >>> 19);
  return Math.imul(h1, 5) + 0xe6546b64;
};

const finalize = (hash: number, length: number): number => {
  let h1 = hash ^ length;
  h1 ^= h1 >>> 16;
  h1 = Math.imul(h1, 0x85ebca6b);
  h1 ^= h1 >>> 13;
  h1 = Math.imul(h1, 0xc2b2ae35);
  h1 ^= h1 >>> 16;
  return h1 >>> 0;
};

/** MurmurHash3 (x86, 32-bit) over the UTF-8 bytes of `key`. */
export const murmurHash3 = (key: string, seed: number = 0): number => {
  const bytes = utf8.encode(key);
  const remainder = bytes.length % 4;
  const blocks = bytes.length - remainder;
  let h1 = seed;

  for (let i = 0; i < blocks; i += 4) {
    h1 = mixBlock(
      h1,
      bytes[i] |
        (bytes[i + 1] << 8) |
        (bytes[i + 2] << 16) |
        (bytes[i + 3] << 24),
    );
  }

  if (remainder > 0) {
    let k1 = 0;
    for (let i = remainder - 1; i >= 0; i -= 1) {
      k1 = (k1 << 8) | bytes[blocks + i];
    }
    k1 = Math.imul(k1, C1);
    k1 = (k1 << 15) | (k1 >>> 17);
    k1 = Math.imul(k1, C2);
    h1 ^= k1;
  }

  return finalize(h1, bytes.length);
};

/**
 * Hashes an ordered list of fields. Each part is length-prefixed before
 * hashing so that `["ab", "c"]` and `["a", "bc"]` never collide by construction.
 */
export const hashParts = (
  parts: readonly (string | number)[],
  seed: number = 0,
): number =>
  murmurHash3(
    parts
      .map((part) => {
        const text = typeof part === "number" ? `#${part}` : `$${part}`;
        return `${text.length}:${text}`;
      })
      .join(""),
    seed,
  );
