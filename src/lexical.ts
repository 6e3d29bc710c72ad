import type { IssueRecord, LexicalWeights } from "./types.js";

export const DEFAULT_WEIGHTS: LexicalWeights = {
  sequence: 0.8,
  tokenOverlap: 0.2,
  length: 0,
  phrase: 0,
};

export const DEFAULT_STOPWORDS: ReadonlySet<string> = new Set([
  "a", "an", "and", "are", "as", "at", "be", "but", "by", "for", "from", "has", "have", "i",
  "in", "is", "it", "its", "of", "on", "or", "that", "the", "this", "to", "was", "were", "with",
]);

export interface LexicalOptions {
  weights?: LexicalWeights;
  stopwords?: ReadonlySet<string>;
}

export interface LexicalSignals {
  sequence: number;
  tokenOverlap: number;
  length: number;
  phrase: number;
}

export function preprocess(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s]/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Ratcliff/Obershelp ratio: 2·M / (|a| + |b|), M being the total length of
 * the longest common blocks found recursively left and right of each match.
 */
export function sequenceRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;

  const b2j = new Map<string, number[]>();
  for (let j = 0; j < b.length; j++) {
    const positions = b2j.get(b[j]);
    if (positions) positions.push(j);
    else b2j.set(b[j], [j]);
  }

  let matched = 0;
  const pending: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  while (pending.length > 0) {
    const next = pending.pop();
    if (!next) break;
    const [alo, ahi, blo, bhi] = next;
    const [i, j, size] = longestMatch(a, alo, ahi, blo, bhi, b2j);
    if (size === 0) continue;
    matched += size;
    if (alo < i && blo < j) pending.push([alo, i, blo, j]);
    if (i + size < ahi && j + size < bhi) pending.push([i + size, ahi, j + size, bhi]);
  }
  return (2 * matched) / total;
}

// leftmost longest block in a[alo:ahi] × b[blo:bhi]; ties resolve to the smallest i, then j
function longestMatch(
  a: string,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number,
  b2j: Map<string, number[]>,
): [number, number, number] {
  let besti = alo;
  let bestj = blo;
  let bestSize = 0;
  let j2len = new Map<number, number>();
  for (let i = alo; i < ahi; i++) {
    const nextJ2len = new Map<number, number>();
    for (const j of b2j.get(a[i]) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (j2len.get(j - 1) ?? 0) + 1;
      nextJ2len.set(j, k);
      if (k > bestSize) {
        besti = i - k + 1;
        bestj = j - k + 1;
        bestSize = k;
      }
    }
    j2len = nextJ2len;
  }
  return [besti, bestj, bestSize];
}

export function tokenize(text: string, stopwords: ReadonlySet<string> = DEFAULT_STOPWORDS): Set<string> {
  const tokens = new Set<string>();
  for (const word of text.split(" ")) {
    if (word && !stopwords.has(word)) tokens.add(word);
  }
  return tokens;
}

export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) return 1;
  if (a.size === 0 || b.size === 0) return 0;
  let shared = 0;
  for (const t of a) if (b.has(t)) shared++;
  return shared / (a.size + b.size - shared);
}

function shingles(text: string): Set<string> {
  const words = text.split(" ").filter(Boolean);
  const out = new Set<string>();
  for (const n of [3, 4]) {
    for (let i = 0; i + n <= words.length; i++) out.add(words.slice(i, i + n).join(" "));
  }
  return out;
}

export function lexicalSignals(a: string, b: string, stopwords: ReadonlySet<string> = DEFAULT_STOPWORDS): LexicalSignals {
  const phrasesA = shingles(a);
  const phrasesB = shingles(b);
  return {
    sequence: sequenceRatio(a, b),
    tokenOverlap: jaccard(tokenize(a, stopwords), tokenize(b, stopwords)),
    length: Math.min(a.length, b.length) / Math.max(a.length, b.length),
    // texts shorter than three words have no phrases to compare
    phrase: phrasesA.size > 0 && phrasesB.size > 0 ? jaccard(phrasesA, phrasesB) : 0,
  };
}

/** Similarity of two raw strings on the 0–100 scale. */
export function lexicalSimilarity(text1: string, text2: string, options: LexicalOptions = {}): number {
  const a = preprocess(text1);
  const b = preprocess(text2);
  if (!a || !b) return 0;
  if (a === b) return 100;

  const weights = options.weights ?? DEFAULT_WEIGHTS;
  const weightSum = weights.sequence + weights.tokenOverlap + weights.length + weights.phrase;
  if (!(weightSum > 0)) throw new RangeError("lexical weights must sum to a positive number");

  const s = lexicalSignals(a, b, options.stopwords);
  const blended =
    (s.sequence * weights.sequence +
      s.tokenOverlap * weights.tokenOverlap +
      s.length * weights.length +
      s.phrase * weights.phrase) /
    weightSum;
  return Math.min(100, Math.max(0, Math.round(blended * 10000) / 100));
}

export function recordText(record: Pick<IssueRecord, "title" | "description">): string {
  return `${record.title} ${record.description}`;
}

export function scoreLexical(
  queryTitle: string,
  queryDescription: string,
  record: IssueRecord,
  options: LexicalOptions = {},
): number {
  return lexicalSimilarity(`${queryTitle} ${queryDescription}`, recordText(record), options);
}
