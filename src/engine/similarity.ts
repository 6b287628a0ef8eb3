/**
 * Lower-case, collapse whitespace, split into word tokens.
 */
export function tokenize(text: string): string[] {
  const normalized = text.toLowerCase().replace(/\s+/g, ' ').trim();
  return normalized === '' ? [] : normalized.split(' ');
}

interface Match {
  a: number;
  b: number;
  size: number;
}

/**
 * Longest run of equal tokens within a[aLo:aHi] and b[bLo:bHi]. Ties go to
 * the earliest start in `a`, then in `b`.
 */
function longestMatch(
  a: readonly string[],
  aLo: number,
  aHi: number,
  bIndex: ReadonlyMap<string, number[]>,
  bLo: number,
  bHi: number,
): Match {
  let best: Match = { a: aLo, b: bLo, size: 0 };
  // runLengths.get(j) = length of the match ending at a[i-1], b[j]
  let runLengths = new Map<number, number>();

  for (let i = aLo; i < aHi; i++) {
    const next = new Map<number, number>();
    const positions = bIndex.get(a[i] ?? '') ?? [];
    for (const j of positions) {
      if (j < bLo) continue;
      if (j >= bHi) break;
      const size = (runLengths.get(j - 1) ?? 0) + 1;
      next.set(j, size);
      if (size > best.size) {
        best = { a: i - size + 1, b: j - size + 1, size };
      }
    }
    runLengths = next;
  }

  return best;
}

/**
 * Total size of the matching blocks found by recursively taking the longest
 * common run and repeating on both sides of it.
 */
export function matchingTokens(a: readonly string[], b: readonly string[]): number {
  const bIndex = new Map<string, number[]>();
  b.forEach((token, j) => {
    const list = bIndex.get(token);
    if (list) list.push(j);
    else bIndex.set(token, [j]);
  });

  let total = 0;
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  while (queue.length > 0) {
    const range = queue.pop();
    if (!range) break;
    const [aLo, aHi, bLo, bHi] = range;
    const m = longestMatch(a, aLo, aHi, bIndex, bLo, bHi);
    if (m.size === 0) continue;
    total += m.size;
    if (aLo < m.a && bLo < m.b) queue.push([aLo, m.a, bLo, m.b]);
    if (m.a + m.size < aHi && m.b + m.size < bHi) queue.push([m.a + m.size, aHi, m.b + m.size, bHi]);
  }
  return total;
}

/**
 * Sequence-matching ratio 2·M / (|a| + |b|) over normalized word tokens, in
 * [0, 1]. Two empty texts are identical (1).
 */
export function similarityRatio(a: string, b: string): number {
  const ta = tokenize(a);
  const tb = tokenize(b);
  const length = ta.length + tb.length;
  if (length === 0) return 1;
  return (2 * matchingTokens(ta, tb)) / length;
}
