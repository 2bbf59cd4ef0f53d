import { describe, it, assert } from "vitest";
import {
  countOccurrences,
  isBinary,
  normalizeText,
  queryIndex,
  rankHits,
  SearchIndexBuilder,
  TokenCounter,
  countMatches,
  tokenize,
} from "../src/search-index.js";
import type { Entry } from "../src/types.js";
import { textEncoder } from "./utils.js";

function entry(path: string, uncompressedSize: number): Entry {
  return {
    path,
    uncompressedSize,
    compressedSize: 0,
    offset: 0,
    mtimeMs: 0,
    mode: 0o644,
    crc32: 0,
  };
}

describe("Tokenizer", () => {
  it("should fold case and count occurrences", () => {
    assert.deepEqual(
      [...tokenize("Hello world, HELLO again!")],
      [
        ["hello", 2],
        ["world", 1],
        ["again", 1],
      ]
    );
  });

  it("should skip tokens shorter than two characters", () => {
    assert.deepEqual([...tokenize("a bb c")], [["bb", 1]]);
  });

  it("should skip tokens longer than 64 characters", () => {
    assert.deepEqual([...tokenize(`${"x".repeat(65)} ok`)], [["ok", 1]]);
  });

  it("should apply compatibility normalization", () => {
    // Fullwidth letters fold to ASCII
    assert.strictEqual(normalizeText("ＡＢＣ"), "abc");
    assert.deepEqual([...tokenize("ＡＢＣ abc")], [["abc", 2]]);
  });

  it("should keep letters and digits from other scripts", () => {
    assert.deepEqual([...tokenize("größe 42")], [["größe", 1], ["42", 1]]);
  });
});

describe("TokenCounter", () => {
  function countInChunks(bytes: Uint8Array, size: number) {
    const counter = new TokenCounter();
    for (let i = 0; i < bytes.byteLength; i += size) {
      counter.push(bytes.subarray(i, i + size));
    }
    return counter.finish();
  }

  it("should count tokens split across chunk boundaries", () => {
    const text = "Größe matters, größe WINS. ＡＢＣ abc";
    for (const size of [1, 2, 3, 7]) {
      assert.deepEqual(
        countInChunks(textEncoder.encode(text), size),
        new Map([
          ["größe", 2],
          ["matters", 1],
          ["wins", 1],
          ["abc", 2],
        ]),
        `chunk size ${size}`
      );
    }
  });

  it("should drop overlong runs that span chunks", () => {
    const bytes = textEncoder.encode(`${"x".repeat(5000)} ok`);
    assert.deepEqual(countInChunks(bytes, 1000), new Map([["ok", 1]]));
  });

  it("should report binary content", () => {
    const bytes = new Uint8Array([0x68, 0x69, 0x20, 0x00, 0x68, 0x69]);
    assert.isUndefined(countInChunks(bytes, 2));
  });
});

describe("Search index", () => {
  it("should not index binary content", () => {
    const builder = new SearchIndexBuilder();
    builder.add(0, new Uint8Array([0x68, 0x69, 0x00, 0x68, 0x69]));
    builder.add(1, textEncoder.encode("hi there"));
    const index = builder.build();
    assert.deepEqual([...(index.get("hi") ?? [])], [[1, 1]]);
  });

  it("should detect NUL bytes as binary", () => {
    assert.isTrue(isBinary(new Uint8Array([1, 2, 0])));
    assert.isFalse(isBinary(textEncoder.encode("plain text")));
  });

  it("should intersect candidate sets for multi-token queries", () => {
    const builder = new SearchIndexBuilder();
    builder.add(0, textEncoder.encode("red apple red"));
    builder.add(1, textEncoder.encode("green apple"));
    builder.add(2, textEncoder.encode("red car"));
    const entries = [entry("0", 13), entry("1", 11), entry("2", 7)];
    const index = builder.build();
    assert.deepEqual(queryIndex(index, entries, ["red", "apple"]), [
      { path: "0", matches: 3 },
    ]);
    assert.deepEqual(queryIndex(index, entries, ["blue"]), []);
  });

  it("should match single-token queries as whole tokens", () => {
    assert.strictEqual(countMatches("Othello said hello", "hello"), 1);
    assert.strictEqual(countMatches("othello", "hello"), 0);
    assert.strictEqual(countMatches("othello wrote", "lo wr"), 1);
  });

  it("should count non-overlapping occurrences", () => {
    assert.strictEqual(countOccurrences("aaaa", "aa"), 2);
    assert.strictEqual(countOccurrences("abcabc", "bc"), 2);
    assert.strictEqual(countOccurrences("abc", "x"), 0);
    assert.strictEqual(countOccurrences("abc", ""), 0);
  });

  it("should rank by match density, then by path", () => {
    const entries = [entry("b", 10), entry("a", 10), entry("c", 100), entry("empty", 0)];
    const ranked = rankHits(
      [
        { path: "c", matches: 5 },
        { path: "b", matches: 2 },
        { path: "a", matches: 2 },
        { path: "empty", matches: 1 },
      ],
      entries,
      10
    );
    assert.deepEqual(
      ranked.map((hit) => hit.path),
      ["empty", "a", "b", "c"]
    );
    assert.strictEqual(rankHits(ranked, entries, 2).length, 2);
  });
});
