import { z } from "zod";
import { EmbeddingUnavailable, errorMessage } from "./errors.js";
import type { EmbeddingProvider, IssueRecord } from "./types.js";

export type ProviderName = "none" | "openai" | "kimi" | "ollama" | "voyageai" | "jina";

export interface ProviderConfig {
  provider: ProviderName;
  apiKey?: string;
  model?: string;
  baseUrl?: string;
}

const OpenAIResponse = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })),
});

const OllamaResponse = z.object({
  embeddings: z.array(z.array(z.number())),
});

export function sanitizeEmbeddingInput(text: string): string {
  return text.replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, "").trim() || " ";
}

async function postJson(
  url: string,
  body: unknown,
  headers: Record<string, string>,
  label: string,
  signal?: AbortSignal,
): Promise<unknown> {
  let resp: Response;
  try {
    resp = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...headers },
      body: JSON.stringify(body),
      signal,
    });
  } catch (err) {
    if (signal?.aborted) throw signal.reason;
    throw new EmbeddingUnavailable(`${label} unreachable: ${errorMessage(err)}`, { cause: err });
  }
  if (!resp.ok) {
    const text = await resp.text().catch(() => "");
    throw new EmbeddingUnavailable(`${label} error (${resp.status}): ${text.slice(0, 200)}`);
  }
  return resp.json();
}

function parseOrUnavailable<T>(schema: z.ZodType<T>, payload: unknown, label: string): T {
  const result = schema.safeParse(payload);
  if (!result.success) throw new EmbeddingUnavailable(`${label} returned an unexpected payload`);
  return result.data;
}

function firstVector(vectors: number[][], label: string): number[] {
  const [result] = vectors;
  if (!result || result.length === 0) throw new EmbeddingUnavailable(`${label} returned no embedding`);
  return result;
}

class OpenAIEmbeddings implements EmbeddingProvider {
  private apiKey: string;
  private baseUrl: string;
  private label: string;
  model: string;
  dimensions = 1536;

  constructor(config: ProviderConfig, label = "OpenAI") {
    if (!config.apiKey) throw new EmbeddingUnavailable(`EMBEDDING_API_KEY required for ${label}`);
    this.apiKey = config.apiKey;
    this.model = config.model || "text-embedding-3-small";
    this.baseUrl = config.baseUrl || "https://api.openai.com/v1";
    this.label = label;
    if (this.model.includes("3-large")) this.dimensions = 3072;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    return firstVector(await this.embedBatch([text], signal), this.label);
  }

  async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const payload = await postJson(
      `${this.baseUrl}/embeddings`,
      { input: texts.map(sanitizeEmbeddingInput), model: this.model },
      { Authorization: `Bearer ${this.apiKey}` },
      `${this.label} embeddings`,
      signal,
    );
    const data = parseOrUnavailable(OpenAIResponse, payload, this.label).data.map((d) => d.embedding);
    if (data.length > 0) this.dimensions = data[0].length;
    return data;
  }
}

class OllamaEmbeddings implements EmbeddingProvider {
  private baseUrl: string;
  model: string;
  dimensions = 0; // set by init()
  private initialized = false;

  constructor(config: ProviderConfig) {
    this.model = config.model || "qwen3-embedding:0.6b";
    this.baseUrl = config.baseUrl || "http://localhost:11434";
  }

  async init(): Promise<void> {
    if (this.initialized) return;
    const probe = await this.embed("dimension probe");
    this.dimensions = probe.length;
    this.initialized = true;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    return firstVector(await this.embedBatch([text], signal), "Ollama");
  }

  async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const payload = await postJson(
      `${this.baseUrl}/api/embed`,
      { model: this.model, input: texts.map(sanitizeEmbeddingInput) },
      {},
      "Ollama (start it with: ollama serve)",
      signal,
    );
    const { embeddings } = parseOrUnavailable(OllamaResponse, payload, "Ollama");
    if (!this.initialized && embeddings.length > 0) {
      this.dimensions = embeddings[0].length;
      this.initialized = true;
    }
    return embeddings;
  }
}

/**
 * Resolves the configured provider. `none` and construction failures (e.g. a
 * missing API key) surface as EmbeddingUnavailable so callers can fall back
 * to lexical scoring.
 */
export async function createEmbeddingProvider(config: ProviderConfig): Promise<EmbeddingProvider> {
  switch (config.provider) {
    case "none":
      throw new EmbeddingUnavailable("no embedding provider configured (EMBEDDING_PROVIDER=none)");
    case "openai":
      return new OpenAIEmbeddings(config);
    case "kimi":
      return new OpenAIEmbeddings({ ...config, baseUrl: config.baseUrl || "https://api.moonshot.cn/v1" }, "Kimi");
    case "ollama": {
      const provider = new OllamaEmbeddings(config);
      await provider.init();
      return provider;
    }
    case "voyageai":
      return new OpenAIEmbeddings(
        { ...config, baseUrl: config.baseUrl || "https://api.voyageai.com/v1", model: config.model || "voyage-2" },
        "VoyageAI",
      );
    case "jina":
      return new OpenAIEmbeddings(
        { ...config, baseUrl: config.baseUrl || "https://api.jina.ai/v1", model: config.model || "jina-embeddings-v3" },
        "Jina",
      );
  }
}

export function prepareEmbeddingText(record: Pick<IssueRecord, "title" | "description" | "logExcerpt">): string {
  const title = (record.title || "Untitled").trim();
  const description = record.description.trim().slice(0, 2000);
  const logs = record.logExcerpt.trim().slice(0, 2000);
  return [title, description, logs].filter(Boolean).join("\n\n");
}

export function prepareQueryText(query: { title: string; description: string }): string {
  return [query.title.trim(), query.description.trim()].filter(Boolean).join("\n\n");
}
