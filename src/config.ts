import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { config as loadEnv } from "dotenv";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { DEFAULT_STOPWORDS } from "./lexical.js";
import type { LexicalWeights } from "./types.js";

const WeightsSchema = z.object({
  sequence: z.number().min(0).default(0.8),
  token_overlap: z.number().min(0).default(0.2),
  length: z.number().min(0).default(0),
  phrase: z.number().min(0).default(0),
});

const LexicalSchema = z.object({
  weights: WeightsSchema.optional().transform((v) => WeightsSchema.parse(v ?? {})),
  stopwords: z.array(z.string()).optional(),
});

const CacheSchema = z.object({
  path: z.string().default("data/sieve.db"),
  max_entries: z.number().int().positive().default(16),
  max_bytes: z.number().int().positive().default(256 * 1024 * 1024),
  require_persistence: z.boolean().default(false),
});

const TimeoutsSchema = z.object({
  embedding_ms: z.number().int().positive().default(30_000),
  cache_ms: z.number().int().positive().default(5_000),
});

const ConfigSchema = z.object({
  version: z.number().optional().default(1),
  corpus: z.string().optional(),
  strategy: z.enum(["lexical", "semantic", "auto"]).default("auto"),
  threshold: z.number().min(0).max(100).default(80),
  max_results: z.number().int().positive().default(5),
  duplicate_ids: z.enum(["reject", "keep-first"]).default("reject"),
  lexical: LexicalSchema.optional().transform((v) => LexicalSchema.parse(v ?? {})),
  cache: CacheSchema.optional().transform((v) => CacheSchema.parse(v ?? {})),
  timeouts: TimeoutsSchema.optional().transform((v) => TimeoutsSchema.parse(v ?? {})),
  batch_size: z.number().int().positive().default(32),
});

export type SieveConfig = z.infer<typeof ConfigSchema>;

const EnvSchema = z.object({
  EMBEDDING_PROVIDER: z.enum(["none", "openai", "kimi", "ollama", "voyageai", "jina"]).default("none"),
  EMBEDDING_API_KEY: z.string().optional(),
  EMBEDDING_MODEL: z.string().optional(),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

export const CONFIG_FILENAME = "sieve.config.yaml";

export function parseConfig(raw: unknown): SieveConfig {
  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigError(`invalid config: ${issues.join("; ")}`);
  }
  const parsed = result.data;
  if (parsed.version > 1) {
    throw new ConfigError(
      `config version ${parsed.version} requires a newer version of issue-sieve. run \`npm install -g issue-sieve\` to upgrade.`,
    );
  }
  const w = parsed.lexical.weights;
  if (w.sequence + w.token_overlap + w.length + w.phrase <= 0) {
    throw new ConfigError("invalid config: lexical.weights must not all be zero");
  }
  return parsed;
}

/**
 * Reads `sieve.config.yaml` from the working directory (or `configPath`).
 * An explicit path that does not exist is an error; a missing default file
 * yields the defaults.
 */
export function loadConfig(configPath?: string): SieveConfig {
  const p = configPath || resolve(process.cwd(), CONFIG_FILENAME);
  if (!existsSync(p)) {
    if (configPath) throw new ConfigError(`config not found at ${p}. run \`sieve init\` to create one`);
    return parseConfig({});
  }
  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(p, "utf-8"));
  } catch (err) {
    throw new ConfigError(`could not parse ${p}`, { cause: err });
  }
  return parseConfig(raw);
}

export function loadEnvConfig(envPath?: string): EnvConfig {
  loadEnv({ path: envPath || resolve(process.cwd(), ".env") });
  const result = EnvSchema.safeParse(process.env);
  if (!result.success) {
    throw new ConfigError(`invalid environment: ${result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`);
  }
  return result.data;
}

export function lexicalWeights(config: SieveConfig): LexicalWeights {
  const w = config.lexical.weights;
  return { sequence: w.sequence, tokenOverlap: w.token_overlap, length: w.length, phrase: w.phrase };
}

export function stopwords(config: SieveConfig): ReadonlySet<string> {
  return config.lexical.stopwords ? new Set(config.lexical.stopwords.map((s) => s.toLowerCase())) : DEFAULT_STOPWORDS;
}
