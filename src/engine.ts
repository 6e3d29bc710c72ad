import { type EmbeddingCache, cacheKeyId, checkDimensions } from "./cache.js";
import { type CorpusOptions, loadCorpus } from "./corpus.js";
import { prepareEmbeddingText, prepareQueryText } from "./embeddings.js";
import {
  CacheIOError,
  CorpusFormatError,
  DetectionError,
  DetectionTimeout,
  EmbeddingUnavailable,
  SieveError,
  errorMessage,
} from "./errors.js";
import { type LexicalOptions, scoreLexical } from "./lexical.js";
import { type Logger, createChildLogger, silentLogger } from "./logger.js";
import { isZeroVector, semanticSimilarity } from "./similarity.js";
import type {
  CacheEntry,
  CacheKey,
  CacheStats,
  CacheStatus,
  CachedVector,
  Corpus,
  DegradeReason,
  DetectionOutcome,
  DetectionQuery,
  DetectionState,
  EmbeddingProvider,
  MatchResult,
  Strategy,
  StrategyPreference,
} from "./types.js";

export interface DetectorOptions {
  cache?: EmbeddingCache;
  /** Absent means semantic scoring is unavailable and requests degrade to lexical. */
  provider?: EmbeddingProvider;
  lexical?: LexicalOptions;
  corpus?: CorpusOptions;
  defaults?: {
    threshold?: number;
    maxResults?: number;
    strategy?: StrategyPreference;
  };
  timeouts?: {
    embeddingMs?: number;
    cacheMs?: number;
  };
  batchSize?: number;
  /** Fail the request instead of continuing uncached when a cache write fails. */
  requirePersistence?: boolean;
  logger?: Logger;
  onStateChange?: (state: DetectionState) => void;
}

export interface DetectRequest {
  query: DetectionQuery;
  /** A corpus file path, or a corpus already loaded by the caller. */
  corpus: string | Corpus;
  threshold?: number;
  maxResults?: number;
  strategy?: StrategyPreference;
  signal?: AbortSignal;
}

export interface DetectorDescription {
  strategies: Array<Strategy["kind"]>;
  modelId?: string;
  cache?: CacheStats;
}

interface CorpusVectors {
  vectors: Float32Array[];
  stored: boolean;
}

interface Flight {
  promise: Promise<CorpusVectors>;
  controller: AbortController;
  waiters: number;
}

interface SemanticScores {
  scores: number[];
  cacheStatus: CacheStatus;
  degraded?: DegradeReason;
}

/** Rejects with the signal's reason once it aborts, even if `promise` never settles. */
function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(signal.reason);
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

/** Runs `task` under a signal that fires on timeout or when `parent` aborts. */
async function bounded<T>(task: (signal: AbortSignal) => Promise<T>, timeoutMs: number, parent?: AbortSignal): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new DetectionTimeout(timeoutMs)), timeoutMs);
  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) onParentAbort();
  else parent?.addEventListener("abort", onParentAbort, { once: true });
  try {
    return await abortable(task(controller.signal), controller.signal);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", onParentAbort);
  }
}

/** Shared dimension of freshly embedded vectors; unusable output makes semantic scoring unavailable. */
function embeddedDimensions(vectors: readonly CachedVector[]): number {
  try {
    return checkDimensions(vectors);
  } catch (err) {
    throw new EmbeddingUnavailable(`provider returned unusable vectors: ${errorMessage(err)}`, { cause: err });
  }
}

function checkQueryVector(vector: readonly number[], dimensions: number): void {
  if (vector.length !== dimensions) {
    throw new EmbeddingUnavailable(`query embedding has ${vector.length} dimensions, corpus has ${dimensions}`);
  }
  if (isZeroVector(vector)) throw new EmbeddingUnavailable("query embedding is a zero vector");
}

function sameOrder(entry: CacheEntry, corpus: Corpus): boolean {
  if (entry.vectors.length !== corpus.records.length) return false;
  return entry.vectors.every((v, i) => v.issueId === corpus.records[i].id);
}

export function rankMatches(
  records: Corpus["records"],
  scores: readonly number[],
  threshold: number,
  maxResults: number,
): MatchResult[] {
  return records
    .map((issue, i) => ({ issue, similarity: scores[i] }))
    .filter((m) => m.similarity >= threshold)
    .sort((a, b) => b.similarity - a.similarity)
    .slice(0, maxResults);
}

/**
 * Ranks a corpus against a new issue. Semantic scoring is attempted when
 * requested and a provider is configured; any embedding failure or timeout
 * falls back to lexical scoring and is reported on the outcome.
 */
export class DuplicateDetector {
  private cache?: EmbeddingCache;
  private provider?: EmbeddingProvider;
  private lexical: LexicalOptions;
  private corpusOptions: CorpusOptions;
  private threshold: number;
  private maxResults: number;
  private strategy: StrategyPreference;
  private embeddingMs: number;
  private cacheMs: number;
  private batchSize: number;
  private requirePersistence: boolean;
  private logger: Logger;
  private onStateChange?: (state: DetectionState) => void;
  private inflight = new Map<string, Flight>();

  constructor(options: DetectorOptions = {}) {
    this.cache = options.cache;
    this.provider = options.provider;
    this.lexical = options.lexical ?? {};
    this.corpusOptions = options.corpus ?? {};
    this.threshold = options.defaults?.threshold ?? 80;
    this.maxResults = options.defaults?.maxResults ?? 5;
    this.strategy = options.defaults?.strategy ?? "auto";
    this.embeddingMs = options.timeouts?.embeddingMs ?? 30_000;
    this.cacheMs = options.timeouts?.cacheMs ?? 5_000;
    this.batchSize = options.batchSize ?? 32;
    this.requirePersistence = options.requirePersistence ?? false;
    this.logger = createChildLogger(options.logger ?? silentLogger, { module: "engine" });
    this.onStateChange = options.onStateChange;
  }

  async detect(request: DetectRequest): Promise<DetectionOutcome> {
    this.transition({ name: "idle" });
    try {
      return await this.run(request);
    } catch (err) {
      const failure = this.toFailure(err, request.signal);
      this.transition({ name: "failed", reason: failure?.reason ?? "internal" });
      throw failure ?? err;
    }
  }

  private async run(request: DetectRequest): Promise<DetectionOutcome> {
    const threshold = request.threshold ?? this.threshold;
    const maxResults = request.maxResults ?? this.maxResults;
    this.validate(request.query, threshold, maxResults);
    request.signal?.throwIfAborted();

    const corpusRef = typeof request.corpus === "string" ? request.corpus : request.corpus.source;
    this.transition({ name: "loading", corpus: corpusRef });
    const corpus = typeof request.corpus === "string" ? loadCorpus(request.corpus, this.corpusOptions) : request.corpus;
    if (corpus.duplicates.length > 0) {
      this.logger.warn({ corpus: corpus.source, duplicates: corpus.duplicates }, "duplicate issue ids dropped, first occurrence kept");
    }

    let strategy = this.resolveStrategy(request.strategy ?? this.strategy);
    let cacheStatus: CacheStatus = "unavailable";
    let degraded: DegradeReason | undefined;
    let scores: number[] | undefined;

    if (strategy.kind === "semantic") {
      this.transition({ name: "scoring", strategy });
      try {
        const semantic = await this.semanticScores(corpus, request.query, strategy.modelId, request.signal);
        scores = semantic.scores;
        cacheStatus = semantic.cacheStatus;
        degraded = semantic.degraded;
      } catch (err) {
        request.signal?.throwIfAborted();
        if (err instanceof EmbeddingUnavailable || err instanceof DetectionTimeout) {
          degraded = err instanceof DetectionTimeout ? "timeout" : "embedding_unavailable";
          this.logger.warn({ err: errorMessage(err), degraded }, "semantic scoring failed, falling back to lexical");
          strategy = { kind: "lexical" };
          cacheStatus = "unavailable";
        } else {
          throw err;
        }
      }
    } else if ((request.strategy ?? this.strategy) !== "lexical") {
      degraded = "embedding_unavailable";
      this.logger.warn("no embedding provider configured, using lexical scoring");
    }

    if (!scores) {
      this.transition({ name: "scoring", strategy });
      const { title, description } = request.query;
      scores = corpus.records.map((record) => scoreLexical(title, description, record, this.lexical));
    }

    this.transition({ name: "ranking", candidates: scores.length });
    const matches = rankMatches(corpus.records, scores, threshold, maxResults);
    this.transition({ name: "done", matches: matches.length });

    const outcome: DetectionOutcome = {
      matches,
      strategyUsed: strategy.kind,
      cacheStatus,
      corpusSignature: corpus.signature,
      corpusSize: corpus.records.length,
    };
    if (degraded) outcome.degraded = degraded;
    if (strategy.kind === "semantic") outcome.modelId = strategy.modelId;
    return outcome;
  }

  private validate(query: DetectionQuery, threshold: number, maxResults: number): void {
    if (!query.title.trim() && !query.description.trim()) {
      throw new DetectionError("invalid_request", "provide a title or a description for the new issue");
    }
    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 100) {
      throw new DetectionError("invalid_request", `threshold must be between 0 and 100, got ${threshold}`);
    }
    if (!Number.isInteger(maxResults) || maxResults < 1) {
      throw new DetectionError("invalid_request", `maxResults must be a positive integer, got ${maxResults}`);
    }
  }

  private resolveStrategy(preference: StrategyPreference): Strategy {
    if (preference === "lexical" || !this.provider) return { kind: "lexical" };
    return { kind: "semantic", modelId: this.provider.model };
  }

  private async semanticScores(
    corpus: Corpus,
    query: DetectionQuery,
    modelId: string,
    signal?: AbortSignal,
  ): Promise<SemanticScores> {
    const provider = this.requireProvider();
    // nothing to embed or cache
    if (corpus.records.length === 0) return { scores: [], cacheStatus: "unavailable" };
    const key: CacheKey = { corpusSignature: corpus.signature, modelId };
    let cacheStatus: CacheStatus = this.cache ? "miss" : "unavailable";
    let degraded: DegradeReason | undefined;
    let vectors: Float32Array[] | undefined;

    if (this.cache) {
      try {
        const cache = this.cache;
        const entry = await bounded(() => cache.get(key), this.cacheMs, signal);
        if (entry && sameOrder(entry, corpus)) {
          vectors = entry.vectors.map((v) => v.vector);
          cacheStatus = "hit";
        } else if (entry) {
          this.logger.warn({ keyId: cacheKeyId(key) }, "cached vectors do not line up with the corpus, recomputing");
        }
      } catch (err) {
        signal?.throwIfAborted();
        if (!(err instanceof CacheIOError || err instanceof DetectionTimeout)) throw err;
        this.logger.warn({ err: errorMessage(err) }, "embedding cache read failed, recomputing");
        cacheStatus = "unavailable";
        degraded = "cache_read";
      }
    }

    if (!vectors) {
      const computed = await this.corpusVectors(corpus, key, signal);
      vectors = computed.vectors;
      if (!computed.stored && cacheStatus === "miss") {
        cacheStatus = "unavailable";
        degraded = "cache_write";
      }
    }

    const queryVector = await bounded(
      (s) => this.guardProvider(() => provider.embed(prepareQueryText(query), s), s),
      this.embeddingMs,
      signal,
    );
    checkQueryVector(queryVector, vectors[0].length);
    const scores = vectors.map((v) => semanticSimilarity(queryVector, v));
    return { scores, cacheStatus, degraded };
  }

  private requireProvider(): EmbeddingProvider {
    if (!this.provider) throw new EmbeddingUnavailable("no embedding provider configured");
    return this.provider;
  }

  /**
   * Single flight per cache key: concurrent misses share one computation.
   * The computation is aborted on timeout, or once every waiter has gone.
   */
  private async corpusVectors(corpus: Corpus, key: CacheKey, signal?: AbortSignal): Promise<CorpusVectors> {
    signal?.throwIfAborted();
    const id = cacheKeyId(key);
    let flight = this.inflight.get(id);
    if (!flight || flight.controller.signal.aborted) {
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(new DetectionTimeout(this.embeddingMs)), this.embeddingMs);
      const promise = abortable(this.embedAndStore(corpus, key, controller.signal), controller.signal).finally(() => {
        clearTimeout(timer);
        if (this.inflight.get(id)?.controller === controller) this.inflight.delete(id);
      });
      promise.catch((err: unknown) => this.logger.debug({ keyId: id, err: errorMessage(err) }, "embedding run ended without result"));
      flight = { promise, controller, waiters: 0 };
      this.inflight.set(id, flight);
    } else {
      this.logger.debug({ keyId: id }, "joining in-flight embedding run");
    }

    const current = flight;
    current.waiters++;
    const onAbort = () => {
      current.waiters--;
      if (current.waiters === 0) current.controller.abort(signal?.reason);
    };
    signal?.addEventListener("abort", onAbort, { once: true });
    try {
      return await (signal ? abortable(current.promise, signal) : current.promise);
    } finally {
      signal?.removeEventListener("abort", onAbort);
      if (!signal?.aborted) current.waiters--;
    }
  }

  private async embedAndStore(corpus: Corpus, key: CacheKey, signal: AbortSignal): Promise<CorpusVectors> {
    const provider = this.requireProvider();
    const started = Date.now();
    const vectors: CachedVector[] = [];
    for (let i = 0; i < corpus.records.length; i += this.batchSize) {
      const batch = corpus.records.slice(i, i + this.batchSize);
      const embedded = await this.guardProvider(
        () => provider.embedBatch(batch.map((r) => prepareEmbeddingText(r)), signal),
        signal,
      );
      if (embedded.length !== batch.length) {
        throw new EmbeddingUnavailable(`provider returned ${embedded.length} vectors for ${batch.length} texts`);
      }
      batch.forEach((record, j) => vectors.push({ issueId: record.id, vector: Float32Array.from(embedded[j]) }));
    }
    const dimensions = embeddedDimensions(vectors);
    signal.throwIfAborted();
    this.logger.info({ issues: vectors.length, dimensions, model: key.modelId, ms: Date.now() - started }, "embedded corpus");

    if (!this.cache) return { vectors: vectors.map((v) => v.vector), stored: false };
    const cache = this.cache;
    try {
      await bounded(() => cache.put(key, vectors), this.cacheMs, signal);
      return { vectors: vectors.map((v) => v.vector), stored: true };
    } catch (err) {
      signal.throwIfAborted();
      if (this.requirePersistence) {
        throw new DetectionError("cache_io", `could not persist embeddings: ${errorMessage(err)}`, { cause: err });
      }
      this.logger.warn({ err: errorMessage(err) }, "embedding cache write failed, continuing without cache");
      return { vectors: vectors.map((v) => v.vector), stored: false };
    }
  }

  // anything a provider throws, other than an abort, makes semantic scoring unavailable
  private async guardProvider<T>(call: () => Promise<T>, signal: AbortSignal): Promise<T> {
    try {
      return await call();
    } catch (err) {
      if (signal.aborted) throw signal.reason;
      if (err instanceof SieveError) throw err;
      throw new EmbeddingUnavailable(`embedding provider failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  private toFailure(err: unknown, signal?: AbortSignal): DetectionError | undefined {
    if (err instanceof DetectionError) return err;
    if (signal?.aborted) return new DetectionError("aborted", "detection was cancelled", { cause: err });
    if (err instanceof CorpusFormatError) return new DetectionError("corpus_format", err.message, { cause: err });
    if (err instanceof CacheIOError) return new DetectionError("cache_io", err.message, { cause: err });
    return undefined;
  }

  private transition(state: DetectionState): void {
    this.logger.debug({ state }, "detection state");
    this.onStateChange?.(state);
  }

  async describe(): Promise<DetectorDescription> {
    const description: DetectorDescription = {
      strategies: this.provider ? ["lexical", "semantic"] : ["lexical"],
    };
    if (this.provider) description.modelId = this.provider.model;
    if (this.cache) description.cache = await this.cache.stats();
    return description;
  }
}

export interface SerializedMatch {
  id: string;
  title: string;
  descriptionExcerpt: string;
  similarity: number;
}

export interface SerializedOutcome {
  matches: SerializedMatch[];
  strategyUsed: DetectionOutcome["strategyUsed"];
  cacheStatus: DetectionOutcome["cacheStatus"];
  degraded?: DegradeReason;
}

export function excerpt(text: string, length: number): string {
  if (text.length <= length) return text;
  return `${text.slice(0, Math.max(0, length - 1)).trimEnd()}…`;
}

export function toSerializable(outcome: DetectionOutcome, excerptLength = 200): SerializedOutcome {
  const out: SerializedOutcome = {
    matches: outcome.matches.map((m) => ({
      id: m.issue.id,
      title: m.issue.title,
      descriptionExcerpt: excerpt(m.issue.description, excerptLength),
      similarity: m.similarity,
    })),
    strategyUsed: outcome.strategyUsed,
    cacheStatus: outcome.cacheStatus,
  };
  if (outcome.degraded) out.degraded = outcome.degraded;
  return out;
}
