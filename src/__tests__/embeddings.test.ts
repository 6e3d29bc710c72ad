import { afterEach, describe, expect, it, vi } from "vitest";
import {
  createEmbeddingProvider,
  prepareEmbeddingText,
  prepareQueryText,
  sanitizeEmbeddingInput,
} from "../embeddings.js";
import { EmbeddingUnavailable } from "../errors.js";

describe("prepareEmbeddingText", () => {
  it("joins title, description and log excerpt", () => {
    const result = prepareEmbeddingText({ title: "Crash", description: "Boom on start", logExcerpt: "NPE at init" });
    expect(result).toBe("Crash\n\nBoom on start\n\nNPE at init");
  });

  it("omits empty sections", () => {
    expect(prepareEmbeddingText({ title: "Crash", description: "", logExcerpt: "" })).toBe("Crash");
  });

  it("truncates long descriptions to 2000 chars", () => {
    const result = prepareEmbeddingText({ title: "T", description: "x".repeat(3000), logExcerpt: "" });
    expect(result).toBe(`T\n\n${"x".repeat(2000)}`);
  });

  it("falls back to Untitled", () => {
    expect(prepareEmbeddingText({ title: "", description: "body", logExcerpt: "" })).toBe("Untitled\n\nbody");
  });
});

describe("prepareQueryText", () => {
  it("trims and skips empty parts", () => {
    expect(prepareQueryText({ title: " Crash ", description: "" })).toBe("Crash");
    expect(prepareQueryText({ title: "Crash", description: "On start" })).toBe("Crash\n\nOn start");
  });
});

describe("sanitizeEmbeddingInput", () => {
  it("strips control characters but keeps newlines", () => {
    expect(sanitizeEmbeddingInput("a\u0000b\nc")).toBe("ab\nc");
  });

  it("never returns an empty string", () => {
    expect(sanitizeEmbeddingInput("  ")).toBe(" ");
  });
});

describe("createEmbeddingProvider", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("reports provider none as unavailable", async () => {
    await expect(createEmbeddingProvider({ provider: "none" })).rejects.toThrow(EmbeddingUnavailable);
  });

  it("requires an API key for hosted providers", async () => {
    await expect(createEmbeddingProvider({ provider: "openai" })).rejects.toThrow("EMBEDDING_API_KEY required");
    await expect(createEmbeddingProvider({ provider: "jina", apiKey: "" })).rejects.toThrow(EmbeddingUnavailable);
  });

  it("embeds through an OpenAI-compatible endpoint", async () => {
    const fetchMock = vi.fn(
      async (_url: string, _init: RequestInit) =>
        new Response(JSON.stringify({ data: [{ embedding: [1, 2] }, { embedding: [3, 4] }] }), { status: 200 }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const provider = await createEmbeddingProvider({ provider: "openai", apiKey: "test-key" });
    expect(provider.model).toBe("text-embedding-3-small");
    expect(await provider.embedBatch(["a", "b"])).toEqual([
      [1, 2],
      [3, 4],
    ]);
    expect(provider.dimensions).toBe(2);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][0]).toBe("https://api.openai.com/v1/embeddings");
  });

  it("surfaces HTTP errors as unavailable", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("overloaded", { status: 503 })),
    );
    const provider = await createEmbeddingProvider({ provider: "kimi", apiKey: "test-key", model: "moonshot-embed" });
    await expect(provider.embed("hello")).rejects.toThrow("Kimi embeddings error (503): overloaded");
  });

  it("rejects unexpected payloads", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response(JSON.stringify({ result: [] }), { status: 200 })),
    );
    const provider = await createEmbeddingProvider({ provider: "voyageai", apiKey: "test-key" });
    expect(provider.model).toBe("voyage-2");
    await expect(provider.embedBatch(["a"])).rejects.toThrow("VoyageAI returned an unexpected payload");
  });

  it("reports an empty embedding list as unavailable", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response(JSON.stringify({ data: [] }), { status: 200 })),
    );
    const provider = await createEmbeddingProvider({ provider: "openai", apiKey: "test-key" });
    await expect(provider.embed("hello")).rejects.toThrow("OpenAI returned no embedding");
  });

  it("probes ollama for its dimensions", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response(JSON.stringify({ embeddings: [[0.1, 0.2, 0.3]] }), { status: 200 })),
    );
    const provider = await createEmbeddingProvider({ provider: "ollama" });
    expect(provider.model).toBe("qwen3-embedding:0.6b");
    expect(provider.dimensions).toBe(3);
  });

  it("reports an unreachable server as unavailable", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      }),
    );
    await expect(createEmbeddingProvider({ provider: "ollama" })).rejects.toThrow(EmbeddingUnavailable);
  });
});
