import { describe, expect, it } from "vitest";
import {
  jaccard,
  lexicalSignals,
  lexicalSimilarity,
  preprocess,
  scoreLexical,
  sequenceRatio,
  tokenize,
} from "../lexical.js";
import type { IssueRecord } from "../types.js";

function record(id: string, title: string, description: string): IssueRecord {
  return { id, title, description, logExcerpt: "" };
}

describe("preprocess", () => {
  it("case-folds, strips punctuation and collapses whitespace", () => {
    expect(preprocess("Hello, World!  Foo-bar")).toBe("hello world foo bar");
  });

  it("keeps non-latin letters and digits", () => {
    expect(preprocess("Café crash #42")).toBe("café crash 42");
  });
});

describe("sequenceRatio", () => {
  it("matches the gestalt ratio for overlapping strings", () => {
    expect(sequenceRatio("abcd", "bcde")).toBe(0.75);
  });

  it("only counts blocks in order", () => {
    expect(sequenceRatio("tide", "diet")).toBe(0.25);
  });

  it("handles empty input", () => {
    expect(sequenceRatio("", "")).toBe(1);
    expect(sequenceRatio("abc", "")).toBe(0);
  });
});

describe("token overlap", () => {
  it("drops stopwords", () => {
    expect([...tokenize("the app crashes on launch")]).toEqual(["app", "crashes", "launch"]);
  });

  it("treats two empty sets as identical", () => {
    expect(jaccard(new Set(), new Set())).toBe(1);
    expect(jaccard(new Set(["a"]), new Set())).toBe(0);
  });

  it("is insensitive to word order while sequence ratio is not", () => {
    const s = lexicalSignals("crash camera", "camera crash");
    expect(s.tokenOverlap).toBe(1);
    expect(s.sequence).toBe(0.5);
  });
});

describe("lexicalSignals", () => {
  it("computes length ratio and phrase overlap", () => {
    const s = lexicalSignals("the camera app crashes", "camera app crashes often");
    expect(s.length).toBeCloseTo(22 / 24, 10);
    expect(s.phrase).toBe(0.2);
    expect(s.tokenOverlap).toBe(0.75);
  });
});

describe("lexicalSimilarity", () => {
  it("scores identical text as 100", () => {
    expect(lexicalSimilarity("Camera crash on switch", "Camera crash on switch")).toBe(100);
  });

  it("ignores case", () => {
    expect(lexicalSimilarity("App Crash", "app crash")).toBe(100);
  });

  it("returns 0 when either side is empty after preprocessing", () => {
    expect(lexicalSimilarity("", "something")).toBe(0);
    expect(lexicalSimilarity("!!!", "something")).toBe(0);
  });

  it("blends sequence and token overlap with the default weights", () => {
    expect(lexicalSimilarity("camera crash", "camera crashes")).toBe(80.51);
  });

  it("honours custom weights", () => {
    const tokensOnly = { sequence: 0, tokenOverlap: 1, length: 0, phrase: 0 };
    expect(lexicalSimilarity("camera crash", "camera crashes", { weights: tokensOnly })).toBe(33.33);

    const fourWay = { sequence: 0.4, tokenOverlap: 0.3, length: 0.2, phrase: 0.1 };
    expect(lexicalSimilarity("the camera app crashes", "camera app crashes often", { weights: fourWay })).toBe(74.14);
  });

  it("rejects weights that sum to zero", () => {
    const zero = { sequence: 0, tokenOverlap: 0, length: 0, phrase: 0 };
    expect(() => lexicalSimilarity("a b", "b c", { weights: zero })).toThrow(RangeError);
  });

  it("uses a custom stopword list", () => {
    const none = new Set<string>();
    const s = lexicalSignals("crash at launch", "crash on launch", none);
    expect(s.tokenOverlap).toBe(0.5);
  });
});

describe("scoreLexical", () => {
  it("matches a paraphrased crash report above 60", () => {
    const a1 = record("A1", "App crashes on launch", "Crashes immediately after splash");
    const score = scoreLexical("App crashes at startup", "Crash right after splash screen", a1);
    expect(score).toBe(61.33);
  });

  it("is deterministic", () => {
    const b2 = record("B2", "Battery drain overnight", "High battery usage while the screen is off");
    const first = scoreLexical("App crashes at startup", "Crash right after splash screen", b2);
    expect(scoreLexical("App crashes at startup", "Crash right after splash screen", b2)).toBe(first);
    expect(first).toBe(36);
  });
});
