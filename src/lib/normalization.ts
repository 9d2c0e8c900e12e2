/** Hyphen-minus plus the Unicode hyphen/dash block and the minus sign */
const DASH_CHARS = /[-\u2010-\u2015\u2212]/g;

/** Lower-case, trim and collapse runs of whitespace */
export function normalizeName(text: string | null | undefined): string {
  if (!text) return "";
  return text.toLowerCase().trim().split(/\s+/).filter(Boolean).join(" ");
}

export function namesEqual(a: string | null | undefined, b: string | null | undefined): boolean {
  return normalizeName(a) === normalizeName(b);
}

/**
 * Similarity of two names in [0, 1] after normalization.
 *
 * Ratcliff/Obershelp: take the longest common substring, recurse on the
 * pieces to its left and right, and score 2·M / (|a| + |b|) where M is the
 * total matched length.
 */
export function nameSimilarity(a: string, b: string): number {
  const na = normalizeName(a);
  const nb = normalizeName(b);
  const total = na.length + nb.length;
  if (total === 0) return 1;
  return (2 * countMatches(na, 0, na.length, nb, 0, nb.length)) / total;
}

function countMatches(
  a: string, aLo: number, aHi: number,
  b: string, bLo: number, bHi: number
): number {
  const [i, j, size] = longestMatch(a, aLo, aHi, b, bLo, bHi);
  if (size === 0) return 0;
  return (
    size +
    countMatches(a, aLo, i, b, bLo, j) +
    countMatches(a, i + size, aHi, b, j + size, bHi)
  );
}

/**
 * Longest common substring of a[aLo:aHi] and b[bLo:bHi]. Ties go to the match
 * starting earliest in `a`, then earliest in `b`.
 */
function longestMatch(
  a: string, aLo: number, aHi: number,
  b: string, bLo: number, bHi: number
): [number, number, number] {
  let bestI = aLo;
  let bestJ = bLo;
  let bestSize = 0;
  // lengths[j] = length of the common run ending at a[i-1], b[j-1]
  let prev = new Array<number>(bHi - bLo + 1).fill(0);

  for (let i = aLo; i < aHi; i++) {
    const next = new Array<number>(bHi - bLo + 1).fill(0);
    for (let j = bLo; j < bHi; j++) {
      if (a[i] !== b[j]) continue;
      const k = prev[j - bLo] + 1;
      next[j - bLo + 1] = k;
      if (k > bestSize) {
        bestI = i - k + 1;
        bestJ = j - k + 1;
        bestSize = k;
      }
    }
    prev = next;
  }

  return [bestI, bestJ, bestSize];
}

/**
 * Match key for a serial number: case-folded, every dash removed, then
 * leading zeros stripped. "9-0824", "90824" and "090824" share one key.
 * Returns null for a missing or blank serial.
 */
export function serialKey(serial: string | null | undefined): string | null {
  if (!serial) return null;
  const dashless = serial.trim().toLowerCase().replace(DASH_CHARS, "");
  if (!dashless) return null;
  return dashless.replace(/^0+/, "") || dashless;
}
