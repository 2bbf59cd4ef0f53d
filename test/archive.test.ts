import { chmod, mkdir, readdir, readFile, stat, utimes, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { describe, it, assert, expect } from "vitest";
import { ArchiveEngine } from "../src/archive.js";
import { ARCHIVE_MAGIC, HEADER_SIZE } from "../src/constants.js";
import { crc32 } from "../src/crc32.js";
import { decodeHeader } from "../src/header.js";
import {
  expectRejection,
  pseudoRandomBytes,
  setupEngine,
  silentLogger,
  textEncoder,
  writeFiles,
} from "./utils.js";

const testKey = new Uint8Array(32).fill(7);

describe("ArchiveEngine", () => {
  describe("create and extract", () => {
    it("should archive two files and restore them byte for byte", async () => {
      const { dir, engine } = await setupEngine();
      const src = join(dir, "src");
      const inputs = await writeFiles(src, { "a.txt": "hello world", "b.txt": "goodbye" });
      const archivePath = join(dir, "out.fvlt");

      const summary = await engine.create(archivePath, inputs, { baseDir: src });
      assert.deepEqual(
        summary.entries.map((entry) => entry.path),
        ["a.txt", "b.txt"]
      );
      assert.strictEqual(summary.compression, "brotli");
      assert.strictEqual(summary.encryption, "none");
      assert.strictEqual(summary.entries[0].offset, 0);
      assert.strictEqual(summary.entries[1].offset, summary.entries[0].compressedSize);
      assert.strictEqual(summary.indexOffset, HEADER_SIZE + summary.dataSize);
      assert.strictEqual(summary.indexOffset + summary.indexLength, summary.fileSize);

      const bytes = await readFile(archivePath);
      assert.strictEqual(bytes.byteLength, summary.fileSize);
      assert.strictEqual(bytes.readUInt32BE(0), ARCHIVE_MAGIC);

      const out = join(dir, "out");
      const result = await engine.extract(archivePath, "all", out);
      assert.deepEqual(result.missing, []);
      assert.deepEqual(
        result.extracted.map(({ path, size }) => ({ path, size })),
        [
          { path: "a.txt", size: 11 },
          { path: "b.txt", size: 7 },
        ]
      );
      assert.strictEqual(await readFile(join(out, "a.txt"), "utf8"), "hello world");
      assert.strictEqual(await readFile(join(out, "b.txt"), "utf8"), "goodbye");

      const found = await engine.search(archivePath, "hello");
      assert.deepEqual(
        found.hits.map((hit) => hit.path),
        ["a.txt"]
      );
      const partial = join(dir, "partial");
      await engine.extract(archivePath, ["b.txt"], partial);
      assert.deepEqual(await readdir(partial), ["b.txt"]);
    });

    it("should stream inputs larger than one read chunk", async () => {
      const { dir, engine } = await setupEngine();
      const text = "alpha beta gamma ".repeat(12_000);
      const inputs = await writeFiles(dir, { "big.txt": text });
      const archivePath = join(dir, "big.fvlt");
      const summary = await engine.create(archivePath, inputs, { baseDir: dir });
      assert.strictEqual(summary.entries[0].uncompressedSize, 204_000);
      assert.strictEqual(summary.entries[0].crc32, crc32(textEncoder.encode(text)));
      // Chunk boundaries fall inside words
      for (const mode of ["index", "scan"] as const) {
        const result = await engine.search(archivePath, "alpha", { mode });
        assert.deepEqual(result.hits, [{ path: "big.txt", matches: 12_000 }], mode);
      }
      await engine.extract(archivePath, "all", join(dir, "out"));
      assert.strictEqual(await readFile(join(dir, "out", "big.txt"), "utf8"), text);
    });

    for (const compression of ["store", "brotli", "gzip"] as const) {
      it(`should round-trip nested directories with ${compression}`, async () => {
        const { dir, engine } = await setupEngine();
        const src = join(dir, "src");
        await writeFiles(src, {
          "docs/readme.md": "# Title\n\nSome words here.",
          "docs/deep/notes.txt": "nested ".repeat(1000),
          "bin/blob.dat": pseudoRandomBytes(50_000),
          "empty.txt": "",
        });
        const archivePath = join(dir, "tree.fvlt");
        const summary = await engine.create(archivePath, [src], {
          compression,
          baseDir: join(dir, "elsewhere"),
        });
        // Inputs outside baseDir are stored relative to their parent
        assert.deepEqual(
          summary.entries.map((entry) => entry.path),
          ["src/bin/blob.dat", "src/docs/deep/notes.txt", "src/docs/readme.md", "src/empty.txt"]
        );
        assert.strictEqual(decodeHeader(await readFile(archivePath)).compression, compression);

        const out = join(dir, "out");
        await engine.extract(archivePath, "all", out);
        for (const name of ["bin/blob.dat", "docs/deep/notes.txt", "docs/readme.md", "empty.txt"]) {
          assert.deepEqual(
            await readFile(join(out, "src", name)),
            await readFile(join(src, name)),
            name
          );
        }
      });
    }

    it("should restore permission bits and modification times", async () => {
      const { dir, engine } = await setupEngine();
      const [script] = await writeFiles(dir, { "run.sh": "#!/bin/sh\necho hi\n" });
      await chmod(script, 0o750);
      await utimes(script, 1_600_000_000, 1_600_000_000);
      const archivePath = join(dir, "modes.fvlt");
      const summary = await engine.create(archivePath, [script], { baseDir: dir });
      assert.strictEqual(summary.entries[0].mode, 0o750);
      assert.strictEqual(summary.entries[0].mtimeMs, 1_600_000_000_000);

      const out = join(dir, "out");
      const result = await engine.extract(archivePath, ["run.sh"], out);
      assert.strictEqual(result.extracted[0].mode, 0o750);
      const restored = await stat(join(out, "run.sh"));
      assert.strictEqual(restored.mode & 0o7777, 0o750);
      assert.strictEqual(Math.floor(restored.mtimeMs), 1_600_000_000_000);
    });

    it("should reject duplicate archive paths before charging a token", async () => {
      const { dir, ledger, engine } = await setupEngine({ tokens: 1 });
      const [a] = await writeFiles(join(dir, "one"), { "same.txt": "1" });
      const [b] = await writeFiles(join(dir, "two"), { "same.txt": "2" });
      await expectRejection(
        engine.create(join(dir, "dup.fvlt"), [a, b], { baseDir: join(dir, "elsewhere") }),
        "INVALID_ARGUMENT"
      );
      assert.strictEqual(await ledger.availableTokens(), 1);
    });

    it("should reject missing inputs before charging a token", async () => {
      const { dir, ledger, engine } = await setupEngine({ tokens: 1 });
      await expectRejection(
        engine.create(join(dir, "x.fvlt"), [join(dir, "nope.txt")]),
        "ARCHIVE_READ_FAILURE"
      );
      await expectRejection(engine.create(join(dir, "x.fvlt"), []), "INVALID_ARGUMENT");
      assert.strictEqual(await ledger.availableTokens(), 1);
    });

    it("should report unknown requested entries without failing", async () => {
      const { dir, engine } = await setupEngine();
      const inputs = await writeFiles(dir, { "a.txt": "alpha", "b.txt": "beta" });
      const archivePath = join(dir, "p.fvlt");
      await engine.create(archivePath, inputs, { baseDir: dir });

      const out = join(dir, "out");
      const result = await engine.extract(archivePath, ["b.txt", "missing.txt"], out);
      assert.deepEqual(
        result.extracted.map((file) => file.path),
        ["b.txt"]
      );
      assert.strictEqual(result.missing.length, 1);
      assert.strictEqual(result.missing[0].path, "missing.txt");
      assert.strictEqual(result.missing[0].error.code, "PARTIAL_EXTRACT_FAILURE");
      assert.deepEqual(await readdir(out), ["b.txt"]);
    });
  });

  describe("corruption", () => {
    async function archiveWithText(): Promise<{ engine: ArchiveEngine; dir: string; archivePath: string }> {
      const { dir, engine } = await setupEngine();
      const inputs = await writeFiles(dir, { "a.txt": "hello world ".repeat(50) });
      const archivePath = join(dir, "c.fvlt");
      await engine.create(archivePath, inputs, { baseDir: dir, compression: "store" });
      return { engine, dir, archivePath };
    }

    it("should detect a single bit flip anywhere in the data block", async () => {
      const { engine, dir, archivePath } = await archiveWithText();
      const original = await readFile(archivePath);
      const { indexOffset } = decodeHeader(original);
      for (const position of [HEADER_SIZE, HEADER_SIZE + 100, indexOffset - 1]) {
        const corrupted = Buffer.from(original);
        corrupted[position] ^= 0x10;
        const path = join(dir, `flip-${position}.fvlt`);
        await writeFile(path, corrupted);
        await expectRejection(engine.extract(path, "all", join(dir, "out")), "CHECKSUM_MISMATCH");
        await expectRejection(engine.verify(path), "CHECKSUM_MISMATCH");
      }
    });

    it("should reject random bytes as INVALID_FORMAT", async () => {
      const { dir, engine } = await setupEngine();
      const path = join(dir, "random.bin");
      await writeFile(path, pseudoRandomBytes(128, 3));
      await expectRejection(engine.extract(path, "all", join(dir, "out")), "INVALID_FORMAT");
      await expectRejection(engine.inspect(path), "INVALID_FORMAT");
    });

    it("should reject a truncated archive", async () => {
      const { engine, dir, archivePath } = await archiveWithText();
      const original = await readFile(archivePath);
      const path = join(dir, "short.fvlt");
      await writeFile(path, original.subarray(0, original.byteLength - 1));
      await expectRejection(engine.inspect(path), "INVALID_FORMAT");
    });

    it("should report a missing archive as ARCHIVE_READ_FAILURE", async () => {
      const { dir, engine } = await setupEngine();
      await expectRejection(engine.inspect(join(dir, "absent.fvlt")), "ARCHIVE_READ_FAILURE");
    });
  });

  describe("search", () => {
    async function searchable() {
      const setup = await setupEngine();
      const inputs = await writeFiles(setup.dir, {
        "one.txt": "apple banana apple",
        "two.txt": "banana split with cherry on top of the banana and more words",
        "three.txt": "cherry pie",
        "blob.bin": new Uint8Array([0x61, 0x70, 0x00, 0x61, 0x70, 0x70, 0x6c, 0x65]),
      });
      const archivePath = join(setup.dir, "s.fvlt");
      await setup.engine.create(archivePath, inputs, { baseDir: setup.dir });
      return { ...setup, archivePath };
    }

    it("should answer single-token queries from the index", async () => {
      const { engine, archivePath } = await searchable();
      const result = await engine.search(archivePath, "Banana");
      assert.strictEqual(result.strategy, "index");
      assert.deepEqual(result.hits, [
        { path: "one.txt", matches: 1 },
        { path: "two.txt", matches: 2 },
      ]);
    });

    it("should return the same hits from the index and from a scan", async () => {
      const { engine, archivePath } = await searchable();
      for (const query of ["apple", "banana", "cherry", "pie", "absent"]) {
        const indexed = await engine.search(archivePath, query, { mode: "index" });
        const scanned = await engine.search(archivePath, query, { mode: "scan" });
        assert.strictEqual(indexed.strategy, "index");
        assert.strictEqual(scanned.strategy, "scan");
        assert.deepEqual(indexed.hits, scanned.hits, query);
      }
    });

    it("should match single-token queries as whole words in every mode", async () => {
      const { dir, engine } = await setupEngine();
      const inputs = await writeFiles(dir, { "a.txt": "othello wrote", "b.txt": "goodbye" });
      const archivePath = join(dir, "w.fvlt");
      await engine.create(archivePath, inputs, { baseDir: dir });
      for (const mode of ["auto", "index", "scan"] as const) {
        const partialWord = await engine.search(archivePath, "hello", { mode });
        assert.deepEqual(partialWord.hits, [], mode);
        const wholeWord = await engine.search(archivePath, "Othello", { mode });
        assert.deepEqual(wholeWord.hits, [{ path: "a.txt", matches: 1 }], mode);
      }
      const phrase = await engine.search(archivePath, "hello wr");
      assert.deepEqual(phrase, { strategy: "scan", hits: [{ path: "a.txt", matches: 1 }] });
    });

    it("should scan for phrases", async () => {
      const { engine, archivePath } = await searchable();
      const result = await engine.search(archivePath, "cherry on");
      assert.strictEqual(result.strategy, "scan");
      assert.deepEqual(result.hits, [{ path: "two.txt", matches: 1 }]);
    });

    it("should stop scanning after limit matches", async () => {
      const { engine, archivePath } = await searchable();
      const result = await engine.search(archivePath, "a", { mode: "scan", limit: 1 });
      assert.strictEqual(result.hits.length, 1);
      // The scan visits entries in index order
      assert.strictEqual(result.hits[0].path, "one.txt");
    });

    it("should reject empty queries", async () => {
      const { engine, archivePath } = await searchable();
      await expectRejection(engine.search(archivePath, "   "), "INVALID_ARGUMENT");
    });

    it("should fall back to scanning when the archive has no search index", async () => {
      const { dir, engine } = await setupEngine();
      const inputs = await writeFiles(dir, { "a.txt": "needle in a haystack" });
      const archivePath = join(dir, "plain.fvlt");
      await engine.create(archivePath, inputs, { baseDir: dir, searchIndex: false });
      assert.isFalse((await engine.inspect(archivePath)).hasSearchIndex);
      const result = await engine.search(archivePath, "needle");
      assert.strictEqual(result.strategy, "scan");
      assert.deepEqual(result.hits, [{ path: "a.txt", matches: 1 }]);
      await expectRejection(
        engine.search(archivePath, "needle", { mode: "index" }),
        "INVALID_ARGUMENT"
      );
    });
  });

  describe("token metering", () => {
    it("should allow exactly N creates for N tokens", async () => {
      const { dir, ledger, engine } = await setupEngine({ tokens: 2 });
      const inputs = await writeFiles(dir, { "a.txt": "metered" });
      await engine.create(join(dir, "1.fvlt"), inputs, { baseDir: dir });
      await engine.create(join(dir, "2.fvlt"), inputs, { baseDir: dir });
      await expectRejection(
        engine.create(join(dir, "3.fvlt"), inputs, { baseDir: dir }),
        "NO_TOKENS_AVAILABLE"
      );
      await expect(stat(join(dir, "3.fvlt"))).rejects.toThrow();
      assert.strictEqual(await ledger.availableTokens(), 0);
    });

    it("should not charge for extract, search, inspect or verify", async () => {
      const { dir, ledger, engine } = await setupEngine({ tokens: 1 });
      const inputs = await writeFiles(dir, { "a.txt": "free reads" });
      const archivePath = join(dir, "r.fvlt");
      await engine.create(archivePath, inputs, { baseDir: dir });
      assert.strictEqual(await ledger.availableTokens(), 0);
      await engine.extract(archivePath, "all", join(dir, "out"));
      await engine.search(archivePath, "free");
      await engine.inspect(archivePath);
      await engine.verify(archivePath);
      assert.strictEqual(await ledger.availableTokens(), 0);
    });

    it("should not refund a token when writing the archive fails", async () => {
      const { dir, ledger, engine } = await setupEngine({ tokens: 2 });
      const inputs = await writeFiles(dir, { "a.txt": "data" });
      // An existing non-empty directory cannot be replaced by the archive
      const target = join(dir, "occupied");
      await mkdir(join(target, "child"), { recursive: true });
      await expectRejection(
        engine.create(target, inputs, { baseDir: dir }),
        "ARCHIVE_WRITE_FAILURE"
      );
      assert.strictEqual(await ledger.availableTokens(), 1);
      const leftovers = (await readdir(dir)).filter((name) => name.includes(".partial-"));
      assert.deepEqual(leftovers, []);
    });
  });

  describe("encryption", () => {
    it("should round-trip an encrypted archive", async () => {
      const { dir, engine } = await setupEngine({ encryptionKey: testKey });
      const inputs = await writeFiles(dir, { "secret.txt": "attack at dawn" });
      const archivePath = join(dir, "e.fvlt");
      const summary = await engine.create(archivePath, inputs, { baseDir: dir });
      assert.strictEqual(summary.encryption, "aes-256-gcm");
      // IV and tag around the compressed frame
      assert.isAtLeast(summary.entries[0].compressedSize, 12 + 16);

      const raw = await readFile(archivePath);
      assert.strictEqual(raw.indexOf("attack at dawn"), -1);

      const out = join(dir, "out");
      await engine.extract(archivePath, "all", out);
      assert.strictEqual(await readFile(join(out, "secret.txt"), "utf8"), "attack at dawn");
      const result = await engine.search(archivePath, "dawn", { mode: "scan" });
      assert.deepEqual(result.hits, [{ path: "secret.txt", matches: 1 }]);
    });

    it("should not store a plaintext search index", async () => {
      const { dir, ledger, compression, engine } = await setupEngine({ encryptionKey: testKey });
      const inputs = await writeFiles(dir, { "secret.txt": "launch codes zebra" });
      const archivePath = join(dir, "z.fvlt");
      await engine.create(archivePath, inputs, { baseDir: dir });
      const raw = await readFile(archivePath);
      assert.strictEqual(raw.indexOf("zebra"), -1);
      assert.isFalse((await engine.inspect(archivePath)).hasSearchIndex);
      assert.deepEqual(await engine.search(archivePath, "zebra"), {
        strategy: "scan",
        hits: [{ path: "secret.txt", matches: 1 }],
      });

      const noKey = new ArchiveEngine({ ledger, compression, logger: silentLogger });
      await expectRejection(noKey.search(archivePath, "zebra"), "INVALID_ARGUMENT");
      await expectRejection(
        noKey.search(archivePath, "zebra", { mode: "index" }),
        "INVALID_ARGUMENT"
      );
    });

    it("should fail authentication with the wrong key", async () => {
      const { dir, ledger, compression, engine } = await setupEngine({ encryptionKey: testKey });
      const inputs = await writeFiles(dir, { "secret.txt": "attack at dawn" });
      const archivePath = join(dir, "e.fvlt");
      await engine.create(archivePath, inputs, { baseDir: dir });

      const wrongKey = new ArchiveEngine({
        ledger,
        compression,
        encryptionKey: new Uint8Array(32).fill(8),
        logger: silentLogger,
      });
      await expectRejection(
        wrongKey.extract(archivePath, "all", join(dir, "out")),
        "CHECKSUM_MISMATCH"
      );

      const noKey = new ArchiveEngine({ ledger, compression, logger: silentLogger });
      await expectRejection(
        noKey.extract(archivePath, "all", join(dir, "out")),
        "INVALID_ARGUMENT"
      );
    });

    it("should reject keys that are not 32 bytes", async () => {
      const { ledger, compression } = await setupEngine();
      assert.throws(
        () =>
          new ArchiveEngine({
            ledger,
            compression,
            encryptionKey: new Uint8Array(16),
            logger: silentLogger,
          }),
        /32 bytes/
      );
    });
  });

  describe("inspect", () => {
    it("should list entries and header fields without decompressing", async () => {
      const { dir, engine } = await setupEngine();
      const inputs = await writeFiles(dir, { "a.txt": "hello world", "b.txt": "goodbye" });
      const archivePath = join(dir, "i.fvlt");
      const summary = await engine.create(archivePath, inputs, {
        baseDir: dir,
        compression: "gzip",
      });
      const listing = await engine.inspect(archivePath);
      expect(listing).toEqual({ ...summary, hasSearchIndex: true });
    });
  });
});
