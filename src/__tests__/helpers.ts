import { mkdirSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { resolve } from "node:path";
import { corpusFromRows } from "../corpus.js";
import { EmbeddingUnavailable } from "../errors.js";
import type { Corpus, EmbeddingProvider } from "../types.js";

/** Letter-frequency vectors: deterministic and cheap, similar texts land close together. */
export function letterVector(text: string): number[] {
  const v = new Array<number>(26).fill(0);
  for (const ch of text.toLowerCase()) {
    const code = ch.charCodeAt(0) - 97;
    if (code >= 0 && code < 26) v[code]++;
  }
  return v;
}

export class FakeProvider implements EmbeddingProvider {
  model: string;
  dimensions = 26;
  batchCalls = 0;
  embeddedTexts = 0;
  queryCalls = 0;
  available = true;
  /** Delay applied to every call, in ms. */
  delayMs = 0;

  constructor(model = "fake-letters-v1") {
    this.model = model;
  }

  private async wait(signal?: AbortSignal): Promise<void> {
    if (this.delayMs <= 0) return;
    await new Promise<void>((resolveWait, reject) => {
      const timer = setTimeout(resolveWait, this.delayMs);
      signal?.addEventListener("abort", () => {
        clearTimeout(timer);
        reject(signal.reason);
      });
    });
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    this.queryCalls++;
    await this.wait(signal);
    if (!this.available) throw new EmbeddingUnavailable("fake provider offline");
    return letterVector(text);
  }

  async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    this.batchCalls++;
    await this.wait(signal);
    if (!this.available) throw new EmbeddingUnavailable("fake provider offline");
    this.embeddedTexts += texts.length;
    return texts.map(letterVector);
  }
}

export function makeCorpus(rows: Array<Record<string, string>>, source = "test"): Corpus {
  return corpusFromRows(rows, source);
}

export const sampleRows: Array<Record<string, string>> = [
  { id: "A1", title: "App crashes on launch", description: "Crashes immediately after splash" },
  { id: "B2", title: "Battery drain overnight", description: "High battery usage while the screen is off" },
  { id: "C3", title: "WiFi disconnects randomly", description: "WiFi drops every few minutes" },
];

export function tmpDir(prefix: string): string {
  const dir = resolve(tmpdir(), `${prefix}-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

export function removeDirs(dirs: string[]): void {
  for (const dir of dirs) rmSync(dir, { recursive: true, force: true });
  dirs.length = 0;
}
