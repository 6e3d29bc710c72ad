#!/usr/bin/env node
import { copyFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import chalk from "chalk";
import Table from "cli-table3";
import { Command } from "commander";
import ora from "ora";
import { CONFIG_FILENAME, lexicalWeights, loadConfig, loadEnvConfig, stopwords } from "./config.js";
import type { EnvConfig, SieveConfig } from "./config.js";
import { describeCorpus, loadCorpus } from "./corpus.js";
import { createEmbeddingProvider } from "./embeddings.js";
import { DuplicateDetector, toSerializable } from "./engine.js";
import { DetectionError, EmbeddingUnavailable, SieveError, errorMessage } from "./errors.js";
import { type Logger, createChildLogger, createLogger } from "./logger.js";
import { SqliteEmbeddingCache } from "./store.js";
import type { DetectionOutcome, EmbeddingProvider, StrategyPreference } from "./types.js";

const program = new Command();

program
  .name("sieve")
  .description("Find previously recorded issues that duplicate a new one, by lexical or embedding similarity")
  .version("0.1.0")
  .option("-c, --config <path>", `Path to ${CONFIG_FILENAME}`);

// ── pipeline context ────────────────────────────────────────────

interface PipelineContext {
  config: SieveConfig;
  env: EnvConfig;
  logger: Logger;
  cache: SqliteEmbeddingCache;
  provider?: EmbeddingProvider;
  detector: DuplicateDetector;
}

async function resolveProvider(env: EnvConfig, logger: Logger): Promise<EmbeddingProvider | undefined> {
  try {
    return await createEmbeddingProvider({
      provider: env.EMBEDDING_PROVIDER,
      apiKey: env.EMBEDDING_API_KEY,
      model: env.EMBEDDING_MODEL,
    });
  } catch (err) {
    if (!(err instanceof EmbeddingUnavailable)) throw err;
    logger.info({ reason: err.message }, "semantic scoring disabled");
    return undefined;
  }
}

function openCache(config: SieveConfig, logger: Logger): SqliteEmbeddingCache {
  return new SqliteEmbeddingCache(resolve(process.cwd(), config.cache.path), {
    maxEntries: config.cache.max_entries,
    maxBytes: config.cache.max_bytes,
    busyTimeoutMs: config.timeouts.cache_ms,
    logger: createChildLogger(logger, { module: "cache" }),
  });
}

async function createPipelineContext(withProvider = true): Promise<PipelineContext> {
  const configPath = program.opts<{ config?: string }>().config;
  const config = loadConfig(configPath);
  const env = loadEnvConfig();
  const logger = createLogger(env.LOG_LEVEL);
  const cache = openCache(config, logger);
  const provider = withProvider ? await resolveProvider(env, logger) : undefined;
  const detector = new DuplicateDetector({
    cache,
    provider,
    lexical: { weights: lexicalWeights(config), stopwords: stopwords(config) },
    corpus: { duplicateIds: config.duplicate_ids },
    defaults: { threshold: config.threshold, maxResults: config.max_results, strategy: config.strategy },
    timeouts: { embeddingMs: config.timeouts.embedding_ms, cacheMs: config.timeouts.cache_ms },
    batchSize: config.batch_size,
    requirePersistence: config.cache.require_persistence,
    logger,
  });
  return { config, env, logger, cache, provider, detector };
}

function parseNumber(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isFinite(n)) throw new SieveError("invalid_option", `--${name} must be a number, got "${value}"`);
  return n;
}

function parseStrategy(value: string | undefined): StrategyPreference | undefined {
  if (value === undefined) return undefined;
  if (value === "lexical" || value === "semantic" || value === "auto") return value;
  throw new SieveError("invalid_option", `--strategy must be lexical, semantic or auto, got "${value}"`);
}

function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / 1024 / 1024).toFixed(1)} MB`;
}

async function withContext(action: (ctx: PipelineContext) => Promise<void>, withProvider = true): Promise<void> {
  let ctx: PipelineContext | undefined;
  try {
    ctx = await createPipelineContext(withProvider);
    await action(ctx);
  } catch (err) {
    const prefix = err instanceof DetectionError ? `detection failed (${err.reason})` : "error";
    console.error(chalk.red(`${prefix}: ${errorMessage(err)}`));
    process.exitCode = 1;
  } finally {
    ctx?.cache.close();
  }
}

// ── init ────────────────────────────────────────────────────────
program
  .command("init")
  .description("Create sieve.config.yaml and .env in the current directory")
  .action(() => {
    const root = fileURLToPath(new URL("..", import.meta.url));
    const envExample = resolve(root, ".env.example");
    const configExample = resolve(root, CONFIG_FILENAME);

    if (!existsSync(".env") && existsSync(envExample)) {
      copyFileSync(envExample, ".env");
      console.log(chalk.green("✓") + " Created .env (pick an embedding provider)");
    } else if (existsSync(".env")) {
      console.log(chalk.yellow("⊘") + " .env already exists");
    }

    if (!existsSync(CONFIG_FILENAME) && existsSync(configExample)) {
      copyFileSync(configExample, CONFIG_FILENAME);
      console.log(chalk.green("✓") + ` Created ${CONFIG_FILENAME} (point it at your issue corpus)`);
    } else if (existsSync(CONFIG_FILENAME)) {
      console.log(chalk.yellow("⊘") + ` ${CONFIG_FILENAME} already exists`);
    }

    console.log("\n" + chalk.bold("Next steps:"));
    console.log(`  1. Set corpus: in ${CONFIG_FILENAME} to your CSV or JSON issue export`);
    console.log("  2. Optionally set EMBEDDING_PROVIDER in .env for semantic matching");
    console.log('  3. Run: sieve detect --title "..." --description "..."');
  });

interface DetectOptions {
  title: string;
  description: string;
  corpus?: string;
  threshold?: string;
  maxResults?: string;
  strategy?: string;
  json?: boolean;
}

// ── detect ──────────────────────────────────────────────────────
program
  .command("detect")
  .description("Rank corpus issues by similarity to a new issue")
  .option("-t, --title <title>", "Title of the new issue", "")
  .option("-d, --description <text>", "Description of the new issue", "")
  .option("--corpus <path>", "Issue corpus (CSV or JSON); defaults to the config's corpus")
  .option("--threshold <number>", "Minimum similarity (0-100)")
  .option("-n, --max-results <number>", "Maximum number of matches")
  .option("-s, --strategy <strategy>", "lexical, semantic or auto")
  .option("--json", "Print the outcome as JSON")
  .action(async (opts: DetectOptions) => {
    await withContext(async ({ config, detector }) => {
      const corpus: string | undefined = opts.corpus ?? config.corpus;
      if (!corpus) throw new SieveError("invalid_option", `no corpus given. pass --corpus or set corpus: in ${CONFIG_FILENAME}`);
      const spinner = opts.json ? undefined : ora(`Searching ${corpus}...`).start();
      let outcome: DetectionOutcome;
      try {
        outcome = await detector.detect({
          query: { title: opts.title, description: opts.description },
          corpus,
          threshold: parseNumber(opts.threshold, "threshold"),
          maxResults: parseNumber(opts.maxResults, "max-results"),
          strategy: parseStrategy(opts.strategy),
        });
      } catch (err) {
        spinner?.fail("Search failed");
        throw err;
      }

      if (opts.json) {
        console.log(JSON.stringify(toSerializable(outcome), null, 2));
        return;
      }

      spinner?.succeed(`Found ${outcome.matches.length} candidate duplicate(s) among ${outcome.corpusSize} issues`);
      const method = outcome.strategyUsed === "semantic" ? `semantic (${outcome.modelId})` : "lexical";
      console.log(chalk.dim(`Strategy: ${method} | cache: ${outcome.cacheStatus}`));
      if (outcome.degraded) console.log(chalk.yellow(`Degraded: ${outcome.degraded.replace(/_/g, " ")}`));
      if (outcome.matches.length === 0) return;

      const table = new Table({
        head: ["#", "ID", "Similarity", "Title", "Description"],
        colWidths: [4, 14, 12, 40, 50],
      });
      toSerializable(outcome, 48).matches.forEach((m, i) => {
        table.push([i + 1, m.id, `${m.similarity.toFixed(2)}%`, m.title.slice(0, 38), m.descriptionExcerpt]);
      });
      console.log(table.toString());
    });
  });

// ── corpus ──────────────────────────────────────────────────────
program
  .command("corpus [path]")
  .description("Validate an issue corpus and print its statistics and signature")
  .action(async (path: string | undefined) => {
    await withContext(async ({ config }) => {
      const source = path ?? config.corpus;
      if (!source) throw new SieveError("invalid_option", `no corpus given. pass a path or set corpus: in ${CONFIG_FILENAME}`);
      const info = describeCorpus(loadCorpus(source, { duplicateIds: config.duplicate_ids }));
      console.log(chalk.bold(`corpus ${info.name}\n`));
      console.log(`  Issues:     ${info.totalIssues}`);
      console.log(`  With logs:  ${info.withLogExcerpt}`);
      if (info.duplicatesDropped > 0) console.log(chalk.yellow(`  Dropped:    ${info.duplicatesDropped} duplicate ids`));
      console.log(`  Signature:  ${info.signature}`);
    }, false);
  });

// ── status ──────────────────────────────────────────────────────
program
  .command("status")
  .description("Show available strategies and embedding cache usage")
  .action(async () => {
    await withContext(async ({ config, env, detector }) => {
      const info = await detector.describe();
      console.log(chalk.bold("issue-sieve status\n"));
      console.log(`  Strategies: ${info.strategies.join(", ")} (default ${config.strategy})`);
      console.log(`  Provider:   ${env.EMBEDDING_PROVIDER}${info.modelId ? ` (${info.modelId})` : ""}`);
      if (info.cache) {
        console.log(`  Cache:      ${info.cache.entryCount}/${config.cache.max_entries} entries, ${formatBytes(info.cache.totalBytesEstimate)}`);
      }
    });
  });

// ── cache ───────────────────────────────────────────────────────
const cacheCommand = program.command("cache").description("Inspect or manage the embedding cache");

cacheCommand
  .command("stats")
  .description("List cached (corpus signature, model) entries, most recently used first")
  .action(async () => {
    await withContext(async ({ cache }) => {
      const stats = await cache.stats();
      console.log(chalk.bold(`${stats.entryCount} entries, ${formatBytes(stats.totalBytesEstimate)}`));
      if (stats.entryCount === 0) return;
      const table = new Table({ head: ["Corpus signature", "Model"], colWidths: [20, 40] });
      for (const key of stats.keys) table.push([key.corpusSignature.slice(0, 16), key.modelId]);
      console.log(table.toString());
    }, false);
  });

cacheCommand
  .command("clear")
  .description("Delete every cached entry")
  .action(async () => {
    await withContext(async ({ cache }) => {
      const removed = await cache.clear();
      console.log(chalk.green("✓") + ` Removed ${removed} cache entries`);
    }, false);
  });

cacheCommand
  .command("prune")
  .description("Evict least recently used entries beyond the configured limits")
  .action(async () => {
    await withContext(async ({ cache }) => {
      const removed = cache.prune();
      console.log(chalk.green("✓") + ` Evicted ${removed} cache entries`);
    }, false);
  });

program.parseAsync().catch((err: unknown) => {
  console.error(chalk.red(errorMessage(err)));
  process.exitCode = 1;
});
