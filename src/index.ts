// Public API: the detection engine and its collaborators for programmatic use

export { type CacheBounds, type EmbeddingCache, MemoryEmbeddingCache, cacheKeyId } from "./cache.js";
export { type EnvConfig, type SieveConfig, lexicalWeights, loadConfig, loadEnvConfig, parseConfig, stopwords } from "./config.js";
export {
  type CorpusOptions,
  type DuplicateIdPolicy,
  corpusFromRows,
  corpusSignature,
  describeCorpus,
  loadCorpus,
  parseCorpus,
} from "./corpus.js";
export { type ProviderConfig, createEmbeddingProvider, prepareEmbeddingText } from "./embeddings.js";
export {
  type DetectRequest,
  type DetectorOptions,
  type SerializedOutcome,
  DuplicateDetector,
  rankMatches,
  toSerializable,
} from "./engine.js";
export {
  CacheIOError,
  ConfigError,
  CorpusFormatError,
  DetectionError,
  DetectionTimeout,
  EmbeddingUnavailable,
  SieveError,
} from "./errors.js";
export { DEFAULT_STOPWORDS, DEFAULT_WEIGHTS, type LexicalOptions, lexicalSimilarity, scoreLexical } from "./lexical.js";
export { createLogger } from "./logger.js";
export { cosineSimilarity, isZeroVector, semanticSimilarity } from "./similarity.js";
export { SqliteEmbeddingCache } from "./store.js";
export type {
  CacheEntry,
  CacheKey,
  CacheStats,
  CacheStatus,
  Corpus,
  DetectionOutcome,
  DetectionQuery,
  DetectionState,
  EmbeddingProvider,
  IssueRecord,
  MatchResult,
  Strategy,
  StrategyPreference,
} from "./types.js";
