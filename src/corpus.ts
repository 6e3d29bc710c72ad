import { createHash } from "node:crypto";
import { readFileSync } from "node:fs";
import { basename, extname } from "node:path";
import { parse as parseCsv } from "csv-parse/sync";
import { CorpusFormatError, errorMessage } from "./errors.js";
import type { Corpus, DuplicateIdReport, IssueRecord } from "./types.js";

export const CORPUS_SCHEMA_VERSION = 1;

export type DuplicateIdPolicy = "reject" | "keep-first";

export interface CorpusOptions {
  duplicateIds?: DuplicateIdPolicy;
}

export type CorpusFormat = "csv" | "json";

const COLUMN_ALIASES = {
  id: ["id", "issue_id", "plm_id"],
  title: ["title", "problem_title", "issue_title"],
  description: ["description", "problem_description", "issue_description", "content"],
  logExcerpt: ["log_excerpt", "logs_analysis", "logs", "analysis"],
} as const;

type Field = keyof typeof COLUMN_ALIASES;

const FIELDS: readonly Field[] = ["id", "title", "description", "logExcerpt"];

export function normalizeColumnName(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, "_");
}

function resolveColumns(header: readonly string[]): Partial<Record<Field, string>> {
  const present = new Set(header.map(normalizeColumnName));
  const columns: Partial<Record<Field, string>> = {};
  for (const field of FIELDS) {
    const match = COLUMN_ALIASES[field].find((alias) => present.has(alias));
    if (match) columns[field] = match;
  }
  return columns;
}

/**
 * sha256 over a canonical JSON serialization of the rows in load order, so
 * the same issues loaded from CSV or JSON, or with reordered columns, share
 * a signature.
 */
export function corpusSignature(records: readonly IssueRecord[]): string {
  const canonical = JSON.stringify([
    CORPUS_SCHEMA_VERSION,
    records.map((r) => [r.id, r.title, r.description, r.logExcerpt]),
  ]);
  return createHash("sha256").update(canonical, "utf-8").digest("hex");
}

/**
 * Builds a corpus from rows of loosely-named columns. Rows are numbered from
 * 1 in error messages, excluding any header. Zero rows is a valid, empty
 * corpus; `header` lets a header-only file still have its columns checked.
 */
export function corpusFromRows(
  rows: ReadonlyArray<Record<string, string>>,
  source = "inline",
  options: CorpusOptions = {},
  header: readonly string[] = [...new Set(rows.flatMap((row) => Object.keys(row)))],
): Corpus {
  if (rows.length === 0 && header.length === 0) {
    return { records: Object.freeze([]), signature: corpusSignature([]), source, duplicates: [] };
  }

  const columns = resolveColumns(header);
  if (!columns.id) {
    throw new CorpusFormatError(
      "missing_column",
      `corpus ${source} has no id column (expected one of: ${COLUMN_ALIASES.id.join(", ")})`,
    );
  }
  if (!columns.title && !columns.description) {
    throw new CorpusFormatError(
      "missing_column",
      `corpus ${source} needs a title or description column`,
    );
  }

  const records: IssueRecord[] = [];
  const firstSeen = new Map<string, number>();
  const duplicates: DuplicateIdReport[] = [];
  const missing: string[] = [];

  rows.forEach((raw, index) => {
    const row = new Map<string, string>();
    for (const [key, value] of Object.entries(raw)) row.set(normalizeColumnName(key), value.trim());
    const get = (field: Field): string => {
      const column = columns[field];
      return column ? row.get(column) ?? "" : "";
    };

    const rowNumber = index + 1;
    const id = get("id");
    if (!id) {
      missing.push(`row ${rowNumber}`);
      return;
    }
    const first = firstSeen.get(id);
    if (first !== undefined) {
      duplicates.push({ id, row: rowNumber, firstRow: first });
      return;
    }
    firstSeen.set(id, rowNumber);
    records.push(
      Object.freeze({
        id,
        title: get("title"),
        description: get("description"),
        logExcerpt: get("logExcerpt"),
      }),
    );
  });

  if (missing.length > 0) {
    throw new CorpusFormatError("missing_id", `corpus ${source} has rows without an id: ${missing.join(", ")}`, missing);
  }
  if (duplicates.length > 0 && (options.duplicateIds ?? "reject") === "reject") {
    const details = duplicates.map((d) => `${d.id} (row ${d.row}, first seen at row ${d.firstRow})`);
    throw new CorpusFormatError("duplicate_id", `corpus ${source} has duplicate ids: ${details.join("; ")}`, details);
  }

  Object.freeze(records);
  return { records, signature: corpusSignature(records), source, duplicates };
}

interface ParsedRows {
  header?: string[];
  rows: Record<string, string>[];
}

function csvRows(text: string, source: string): ParsedRows {
  let parsed: unknown;
  try {
    parsed = parseCsv(text, { bom: true, skip_empty_lines: true, relax_column_count: true });
  } catch (err) {
    throw new CorpusFormatError("unreadable", `could not parse CSV ${source}: ${errorMessage(err)}`, [], { cause: err });
  }
  if (!Array.isArray(parsed) || parsed.length === 0) {
    throw new CorpusFormatError("empty_corpus", `corpus ${source} has no header row`);
  }
  const [header, ...body] = parsed.map((line: unknown) => (Array.isArray(line) ? line.map(String) : []));
  const rows = body.map((cells) => {
    const row: Record<string, string> = {};
    header.forEach((name, i) => {
      row[name] = cells[i] ?? "";
    });
    return row;
  });
  return { header, rows };
}

function jsonRows(text: string, source: string): ParsedRows {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new CorpusFormatError("unreadable", `could not parse JSON ${source}: ${errorMessage(err)}`, [], { cause: err });
  }
  if (!Array.isArray(parsed)) {
    throw new CorpusFormatError("unreadable", `JSON corpus ${source} must be an array of issues`);
  }
  const rows = parsed.map((item: unknown, index) => {
    if (typeof item !== "object" || item === null || Array.isArray(item)) {
      throw new CorpusFormatError("unreadable", `JSON corpus ${source}: entry ${index + 1} is not an object`);
    }
    const row: Record<string, string> = {};
    for (const [key, value] of Object.entries(item)) {
      row[key] = value === null || value === undefined ? "" : String(value);
    }
    return row;
  });
  return { rows };
}

export function parseCorpus(text: string, format: CorpusFormat, source = "inline", options: CorpusOptions = {}): Corpus {
  const { header, rows } = format === "json" ? jsonRows(text, source) : csvRows(text, source);
  return corpusFromRows(rows, source, options, header);
}

export function corpusFormatFor(path: string): CorpusFormat {
  return extname(path).toLowerCase() === ".json" ? "json" : "csv";
}

export function loadCorpus(path: string, options: CorpusOptions = {}): Corpus {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    throw new CorpusFormatError("unreadable", `could not read corpus ${path}: ${errorMessage(err)}`, [], { cause: err });
  }
  return parseCorpus(text, corpusFormatFor(path), path, options);
}

export interface CorpusDescription {
  source: string;
  name: string;
  signature: string;
  totalIssues: number;
  withLogExcerpt: number;
  duplicatesDropped: number;
}

export function describeCorpus(corpus: Corpus): CorpusDescription {
  return {
    source: corpus.source,
    name: basename(corpus.source),
    signature: corpus.signature,
    totalIssues: corpus.records.length,
    withLogExcerpt: corpus.records.filter((r) => r.logExcerpt.length > 0).length,
    duplicatesDropped: corpus.duplicates.length,
  };
}
