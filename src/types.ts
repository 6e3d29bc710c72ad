export interface IssueRecord {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  readonly logExcerpt: string;
}

export interface DuplicateIdReport {
  id: string;
  row: number;
  firstRow: number;
}

export interface Corpus {
  records: readonly IssueRecord[];
  signature: string;
  source: string;
  // populated only when duplicate ids are kept-first instead of rejected
  duplicates: DuplicateIdReport[];
}

export interface DetectionQuery {
  title: string;
  description: string;
}

export type StrategyPreference = "lexical" | "semantic" | "auto";
export type StrategyUsed = "lexical" | "semantic";
export type CacheStatus = "hit" | "miss" | "unavailable";
export type DegradeReason = "embedding_unavailable" | "timeout" | "cache_read" | "cache_write";

export type Strategy = { kind: "lexical" } | { kind: "semantic"; modelId: string };

export interface CacheKey {
  corpusSignature: string;
  modelId: string;
}

export interface CachedVector {
  issueId: string;
  vector: Float32Array;
}

export interface CacheEntry {
  key: CacheKey;
  vectors: CachedVector[];
  dimensions: number;
  createdAt: string;
}

export interface CacheStats {
  entryCount: number;
  totalBytesEstimate: number;
  keys: CacheKey[];
}

export interface MatchResult {
  issue: IssueRecord;
  similarity: number;
}

export interface DetectionOutcome {
  matches: MatchResult[];
  strategyUsed: StrategyUsed;
  cacheStatus: CacheStatus;
  degraded?: DegradeReason;
  modelId?: string;
  corpusSignature: string;
  corpusSize: number;
}

export type DetectionState =
  | { name: "idle" }
  | { name: "loading"; corpus: string }
  | { name: "scoring"; strategy: Strategy }
  | { name: "ranking"; candidates: number }
  | { name: "done"; matches: number }
  | { name: "failed"; reason: string };

export interface EmbeddingProvider {
  model: string;
  dimensions: number;
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
  embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

export interface LexicalWeights {
  sequence: number;
  tokenOverlap: number;
  length: number;
  phrase: number;
}
