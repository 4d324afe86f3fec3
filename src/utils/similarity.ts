interface Block {
  aStart: number;
  bStart: number;
  size: number;
}

function longestCommonBlock(
  a: string,
  b: string,
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number,
): Block {
  let best: Block = { aStart: aLo, bStart: bLo, size: 0 };
  let prev = new Array<number>(bHi - bLo + 1).fill(0);
  for (let i = aLo; i < aHi; i++) {
    const curr = new Array<number>(bHi - bLo + 1).fill(0);
    for (let j = bLo; j < bHi; j++) {
      if (a[i] !== b[j]) continue;
      const k = prev[j - bLo] + 1;
      curr[j - bLo + 1] = k;
      if (k > best.size) best = { aStart: i - k + 1, bStart: j - k + 1, size: k };
    }
    prev = curr;
  }
  return best;
}

/**
 * Total characters in the matching blocks found by recursively taking the
 * longest common block and recursing left and right of it (Ratcliff/Obershelp).
 * Uses an explicit stack so long inputs cannot blow the call stack.
 */
export function matchingCharacters(a: string, b: string): number {
  let matched = 0;
  const stack: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  while (stack.length > 0) {
    const next = stack.pop();
    if (!next) break;
    const [aLo, aHi, bLo, bHi] = next;
    if (aLo >= aHi || bLo >= bHi) continue;
    const block = longestCommonBlock(a, b, aLo, aHi, bLo, bHi);
    if (block.size === 0) continue;
    matched += block.size;
    stack.push([aLo, block.aStart, bLo, block.bStart]);
    stack.push([block.aStart + block.size, aHi, block.bStart + block.size, bHi]);
  }
  return matched;
}

/** Character-level sequence similarity in [0, 1]: 2*M / (|a| + |b|). */
export function sequenceRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * matchingCharacters(a, b)) / total;
}

/** Lower-cased words; letters and digits of any script count. */
export function tokenize(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .replace(/[^\p{L}\p{N}\s]/gu, ' ')
      .split(/\s+/)
      .filter((w) => w.length > 0),
  );
}

/**
 * Jaccard similarity between two word sets. A side with no words shares
 * nothing, so the result is 0 rather than a vacuous 1.
 */
export function setJaccard(words1: ReadonlySet<string>, words2: ReadonlySet<string>): number {
  if (words1.size === 0 || words2.size === 0) return 0;

  let intersection = 0;
  for (const w of words1) if (words2.has(w)) intersection++;
  return intersection / (words1.size + words2.size - intersection);
}

/**
 * Jaccard similarity between the word sets of two strings
 */
export function jaccardSimilarity(str1: string, str2: string): number {
  return setJaccard(tokenize(str1), tokenize(str2));
}
