import {
  BINARY_SNIFF_SIZE,
  MAX_TOKEN_LENGTH,
  MIN_TOKEN_LENGTH,
} from "./constants.js";
import type { Entry, SearchHit, SearchIndex } from "./types.js";

const textDecoder = new TextDecoder("utf-8");
const TOKEN_PATTERN = /[\p{L}\p{N}]+/gu;
// Streamed text is only cut before a run of these: they can join a token or
// change how their neighbours fold
const WORD_CHAR = /^[\p{L}\p{N}\p{M}]+$/u;
/** Runs longer than this (in UTF-16 units) are not indexed when streaming */
const MAX_PENDING_RUN = 4096;

/** Case- and compatibility-folded text used by both indexing and scanning */
export function normalizeText(text: string): string {
  return text.normalize("NFKC").toLowerCase();
}

/**
 * Split text into keyword tokens with their occurrence counts. Tokens are
 * runs of letters and digits, between 2 and 64 characters after folding.
 */
export function tokenize(text: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const [token] of normalizeText(text).matchAll(TOKEN_PATTERN)) {
    if (token.length < MIN_TOKEN_LENGTH || token.length > MAX_TOKEN_LENGTH) {
      continue;
    }
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

/** Content with a NUL byte near the start is treated as binary and not indexed */
export function isBinary(content: Uint8Array): boolean {
  const end = Math.min(content.byteLength, BINARY_SNIFF_SIZE);
  for (let i = 0; i < end; i++) {
    if (content[i] === 0) return true;
  }
  return false;
}

export function decodeText(content: Uint8Array): string {
  return textDecoder.decode(content);
}

/**
 * Streaming tokenizer for content read in chunks. Text is only cut before a
 * run of letters, digits and marks, so the counts equal `tokenize()` over the
 * whole decoded content.
 */
export class TokenCounter {
  #decoder = new TextDecoder("utf-8");
  #counts = new Map<string, number>();
  #pending = "";
  #skipping = false;
  #sniffed = 0;
  #binary = false;

  push(chunk: Uint8Array): void {
    if (this.#binary) return;
    const end = Math.min(chunk.byteLength, BINARY_SNIFF_SIZE - this.#sniffed);
    for (let i = 0; i < end; i++) {
      if (chunk[i] === 0) {
        this.#binary = true;
        this.#pending = "";
        this.#counts.clear();
        return;
      }
    }
    this.#sniffed += Math.max(end, 0);
    this.#consume(this.#decoder.decode(chunk, { stream: true }), false);
  }

  /** Token counts of everything pushed, or undefined for binary content */
  finish(): Map<string, number> | undefined {
    if (this.#binary) return undefined;
    this.#consume(this.#decoder.decode(), true);
    return this.#counts;
  }

  #consume(decoded: string, final: boolean): void {
    let text = this.#pending + decoded;
    this.#pending = "";
    if (this.#skipping) {
      const runEnd = leadingRunEnd(text);
      if (runEnd === text.length && !final) return;
      this.#skipping = false;
      text = text.slice(runEnd);
    }
    const cut = final ? text.length : trailingRunStart(text);
    for (const [token, count] of tokenize(text.slice(0, cut))) {
      this.#counts.set(token, (this.#counts.get(token) ?? 0) + count);
    }
    this.#pending = text.slice(cut);
    if (this.#pending.length > MAX_PENDING_RUN) {
      this.#pending = "";
      this.#skipping = true;
    }
  }
}

function isWordChar(char: string): boolean {
  return WORD_CHAR.test(char);
}

function trailingRunStart(text: string): number {
  let i = text.length;
  while (i > 0) {
    const size = i >= 2 && isLowSurrogate(text.charCodeAt(i - 1)) ? 2 : 1;
    if (!isWordChar(text.slice(i - size, i))) break;
    i -= size;
  }
  return i;
}

function leadingRunEnd(text: string): number {
  let i = 0;
  while (i < text.length) {
    const size = isHighSurrogate(text.charCodeAt(i)) && i + 1 < text.length ? 2 : 1;
    if (!isWordChar(text.slice(i, i + size))) break;
    i += size;
  }
  return i;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * Accumulates postings while entries are written. Entry positions are the
 * order in which entries are added, which is also their index order.
 */
export class SearchIndexBuilder {
  #index: SearchIndex = new Map();

  /** Index in-memory content */
  add(entryIndex: number, content: Uint8Array): void {
    const counter = new TokenCounter();
    counter.push(content);
    this.addTokens(entryIndex, counter.finish());
  }

  /** Record the counts from a TokenCounter; binary content has none */
  addTokens(entryIndex: number, counts: ReadonlyMap<string, number> | undefined): void {
    if (!counts) return;
    for (const [token, count] of counts) {
      let postings = this.#index.get(token);
      if (!postings) {
        postings = new Map();
        this.#index.set(token, postings);
      }
      postings.set(entryIndex, count);
    }
  }

  build(): SearchIndex {
    return this.#index;
  }
}

/**
 * Token lookup: every query token must be present in an entry for it to
 * match. The match count is the sum of the occurrences of the query tokens.
 */
export function queryIndex(
  index: SearchIndex,
  entries: readonly Entry[],
  queryTokens: readonly string[]
): SearchHit[] {
  let candidates: Map<number, number> | undefined;
  for (const token of queryTokens) {
    const postings = index.get(token);
    if (!postings) return [];
    const next = new Map<number, number>();
    for (const [entryIndex, occurrences] of postings) {
      if (candidates && !candidates.has(entryIndex)) continue;
      next.set(entryIndex, (candidates?.get(entryIndex) ?? 0) + occurrences);
    }
    candidates = next;
  }
  if (!candidates) return [];
  const hits: SearchHit[] = [];
  for (const [entryIndex, matches] of candidates) {
    const entry = entries[entryIndex];
    if (entry) hits.push({ path: entry.path, matches });
  }
  return hits;
}

/** Whether a folded query is exactly one indexable token */
export function isSingleToken(query: string): boolean {
  const tokens = [...tokenize(query).keys()];
  return tokens.length === 1 && tokens[0] === query;
}

/**
 * Matches of a folded query in text. A single-token query counts whole
 * tokens, the rule the search index applies; other queries count substring
 * occurrences in the folded text.
 */
export function countMatches(text: string, query: string): number {
  if (isSingleToken(query)) return tokenize(text).get(query) ?? 0;
  return countOccurrences(normalizeText(text), query);
}

/** Non-overlapping occurrences of needle in haystack */
export function countOccurrences(haystack: string, needle: string): number {
  if (needle.length === 0) return 0;
  let count = 0;
  let position = haystack.indexOf(needle);
  while (position !== -1) {
    count++;
    position = haystack.indexOf(needle, position + needle.length);
  }
  return count;
}

/**
 * Order hits by descending match density (matches per uncompressed byte), then
 * by path so equal scores come back in a stable order.
 */
export function rankHits(
  hits: SearchHit[],
  entries: readonly Entry[],
  limit: number
): SearchHit[] {
  const sizes = new Map(entries.map((entry) => [entry.path, entry.uncompressedSize]));
  const density = (hit: SearchHit) =>
    hit.matches / Math.max(sizes.get(hit.path) ?? 0, 1);
  return [...hits]
    .sort((a, b) => {
      const byDensity = density(b) - density(a);
      if (byDensity !== 0) return byDensity;
      return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
    })
    .slice(0, limit);
}
