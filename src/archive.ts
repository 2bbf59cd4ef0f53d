import { randomBytes } from "node:crypto";
import {
  chmod,
  mkdir,
  open,
  readdir,
  rename,
  stat,
  unlink,
  utimes,
  writeFile,
} from "node:fs/promises";
import {
  basename,
  dirname,
  isAbsolute,
  join,
  relative,
  resolve,
  sep,
} from "node:path";
import { ReadableStream, TransformStream } from "node:stream/web";
import { ArchiveReader } from "./archive-reader.js";
import type { CompressionEngine } from "./compression.js";
import { FORMAT_VERSION, HEADER_SIZE } from "./constants.js";
import { crc32 } from "./crc32.js";
import { createSealStream, openFrame, validateKey } from "./encryption.js";
import { ArchiveError, wrapError } from "./errors.js";
import { FileSink } from "./file-sink.js";
import { encodeHeader, tagFromAlgorithm } from "./header.js";
import { encodeIndex } from "./index-block.js";
import type { UsageLedger } from "./ledger.js";
import { componentLogger, type Logger } from "./logger.js";
import { FRAME_CHUNK_SIZE } from "./readable-from-bytes.js";
import {
  countMatches,
  decodeText,
  isBinary,
  isSingleToken,
  normalizeText,
  queryIndex,
  rankHits,
  SearchIndexBuilder,
  TokenCounter,
  tokenize,
} from "./search-index.js";
import type {
  ArchiveListing,
  ArchiveSummary,
  CompressionAlgorithm,
  CreateOptions,
  Entry,
  ExtractedFile,
  Header,
  ExtractResult,
  MissingEntry,
  SearchHit,
  SearchOptions,
  SearchResult,
} from "./types.js";
import { isNotFound, permissionBits, toHex, validateEntryPath } from "./utils.js";

export const DEFAULT_SEARCH_LIMIT = 100;

export interface ArchiveEngineOptions {
  /** Charged one token per create */
  ledger: Pick<UsageLedger, "consumeToken">;
  compression: CompressionEngine;
  /** 32-byte AES-256-GCM key. New archives are encrypted when set */
  encryptionKey?: Uint8Array;
  defaultCompression?: CompressionAlgorithm;
  searchLimit?: number;
  logger?: Logger;
  now?: () => number;
}

interface SourceFile {
  absolutePath: string;
  archivePath: string;
  size: number;
  mtimeMs: number;
  mode: number;
}

/**
 * Creates, extracts and searches archives. Each operation logs its failure
 * once and rethrows it as an ArchiveError.
 */
export class ArchiveEngine {
  #ledger: Pick<UsageLedger, "consumeToken">;
  #compression: CompressionEngine;
  #key: Uint8Array | undefined;
  #defaultCompression: CompressionAlgorithm;
  #searchLimit: number;
  #log: Logger;
  #now: () => number;

  constructor({
    ledger,
    compression,
    encryptionKey,
    defaultCompression = "brotli",
    searchLimit = DEFAULT_SEARCH_LIMIT,
    logger,
    now = Date.now,
  }: ArchiveEngineOptions) {
    this.#ledger = ledger;
    this.#compression = compression;
    this.#key = encryptionKey && validateKey(encryptionKey);
    this.#defaultCompression = defaultCompression;
    this.#searchLimit = validateLimit(searchLimit);
    this.#log = componentLogger(logger, "archive");
    this.#now = now;
  }

  /**
   * Write a new archive at `outputPath` from files and directories. One
   * token is charged once the inputs have been checked, and is not refunded
   * if writing fails. Encrypted archives carry no search index, since its
   * tokens would be stored in the clear.
   */
  async create(
    outputPath: string,
    inputPaths: readonly string[],
    options: CreateOptions = {}
  ): Promise<ArchiveSummary> {
    const log = this.#log.child({ operation: "create", archive: outputPath });
    try {
      const compression = options.compression ?? this.#defaultCompression;
      tagFromAlgorithm(compression);
      if (inputPaths.length === 0) {
        throw new ArchiveError("INVALID_ARGUMENT", "At least one input path is required");
      }
      const sources = await collectSources(
        inputPaths,
        resolve(options.baseDir ?? process.cwd())
      );
      log.info({ files: sources.length, compression }, "Creating archive");

      const remaining = await this.#ledger.consumeToken();
      log.debug({ remaining }, "Token charged");

      const summary = await this.#writeArchive(
        outputPath,
        sources,
        compression,
        (options.searchIndex ?? true) && !this.#key,
        log
      );
      log.info(
        { entries: summary.entries.length, fileSize: summary.fileSize },
        "Archive created"
      );
      return summary;
    } catch (err) {
      const error = wrapError(err, "ARCHIVE_WRITE_FAILURE", "Create failed", {
        path: outputPath,
      });
      log.error({ err: error }, "Create failed");
      throw error;
    }
  }

  /**
   * Extract entries into `destinationDir`. Requested paths that are not in
   * the archive are reported in `missing` instead of failing the call.
   */
  async extract(
    archivePath: string,
    outputs: readonly string[] | "all",
    destinationDir: string
  ): Promise<ExtractResult> {
    const log = this.#log.child({ operation: "extract", archive: archivePath });
    try {
      return await this.#withReader(archivePath, async (reader) => {
        const key = this.#keyFor(reader);
        await reader.verifyDataChecksum();

        const { entries } = reader.index;
        const missing: MissingEntry[] = [];
        let selected: Entry[];
        if (outputs === "all") {
          selected = entries;
        } else {
          const byPath = new Map(entries.map((entry) => [entry.path, entry]));
          selected = [];
          for (const path of new Set(outputs)) {
            const entry = byPath.get(path);
            if (entry) {
              selected.push(entry);
            } else {
              missing.push({
                path,
                error: new ArchiveError(
                  "PARTIAL_EXTRACT_FAILURE",
                  `Entry not found in archive: ${path}`,
                  { path }
                ),
              });
            }
          }
        }

        const root = resolve(destinationDir);
        const extracted: ExtractedFile[] = [];
        for (const entry of selected) {
          const content = await this.#readEntry(reader, entry, key);
          extracted.push(await writeEntry(root, entry, content));
        }
        if (missing.length > 0) {
          log.warn({ missing: missing.map((m) => m.path) }, "Requested entries not found");
        }
        log.info({ extracted: extracted.length }, "Archive extracted");
        return { extracted, missing };
      });
    } catch (err) {
      const error = wrapError(err, "ARCHIVE_READ_FAILURE", "Extract failed", {
        path: archivePath,
      });
      log.error({ err: error }, "Extract failed");
      throw error;
    }
  }

  /**
   * Find entries containing `query`. A single-token query matches whole
   * tokens and is answered from the search index when the archive has one;
   * anything else decodes frames in index order until `limit` entries match.
   */
  async search(
    archivePath: string,
    query: string,
    { mode = "auto", limit = this.#searchLimit }: SearchOptions = {}
  ): Promise<SearchResult> {
    const log = this.#log.child({ operation: "search", archive: archivePath });
    try {
      validateLimit(limit);
      const needle = normalizeText(query).trim();
      if (needle.length === 0) {
        throw new ArchiveError("INVALID_ARGUMENT", "Search query must not be empty");
      }
      const tokens = [...tokenize(needle).keys()];

      return await this.#withReader<SearchResult>(archivePath, async (reader) => {
        const key = this.#keyFor(reader);
        const { entries, search } = reader.index;
        const useIndex =
          mode === "index" ||
          (mode === "auto" && search !== undefined && isSingleToken(needle));

        if (useIndex) {
          if (!search) {
            throw new ArchiveError(
              "INVALID_ARGUMENT",
              "Archive was created without a search index"
            );
          }
          if (tokens.length === 0) {
            throw new ArchiveError(
              "INVALID_ARGUMENT",
              `Query ${JSON.stringify(query)} has no indexable tokens`
            );
          }
          const hits = rankHits(queryIndex(search, entries, tokens), entries, limit);
          log.info({ strategy: "index", hits: hits.length }, "Search finished");
          return { strategy: "index", hits };
        }

        const found: SearchHit[] = [];
        for (const entry of entries) {
          if (found.length >= limit) break;
          const content = await this.#readEntry(reader, entry, key);
          if (isBinary(content)) continue;
          const matches = countMatches(decodeText(content), needle);
          if (matches > 0) found.push({ path: entry.path, matches });
        }
        const hits = rankHits(found, entries, limit);
        log.info({ strategy: "scan", hits: hits.length }, "Search finished");
        return { strategy: "scan", hits };
      });
    } catch (err) {
      const error = wrapError(err, "ARCHIVE_READ_FAILURE", "Search failed", {
        path: archivePath,
      });
      log.error({ err: error }, "Search failed");
      throw error;
    }
  }

  /** Header and entry table, without decompressing or verifying anything */
  async inspect(archivePath: string): Promise<ArchiveListing> {
    const log = this.#log.child({ operation: "inspect", archive: archivePath });
    try {
      return await this.#withReader(archivePath, async (reader) => reader.listing());
    } catch (err) {
      const error = wrapError(err, "ARCHIVE_READ_FAILURE", "Inspect failed", {
        path: archivePath,
      });
      log.error({ err: error }, "Inspect failed");
      throw error;
    }
  }

  /** Check the data block checksum and decode every frame */
  async verify(archivePath: string): Promise<ArchiveListing> {
    const log = this.#log.child({ operation: "verify", archive: archivePath });
    try {
      return await this.#withReader(archivePath, async (reader) => {
        const key = this.#keyFor(reader);
        await reader.verifyDataChecksum();
        for (const entry of reader.index.entries) {
          await this.#readEntry(reader, entry, key);
        }
        log.info({ entries: reader.index.entries.length }, "Archive verified");
        return reader.listing();
      });
    } catch (err) {
      const error = wrapError(err, "ARCHIVE_READ_FAILURE", "Verify failed", {
        path: archivePath,
      });
      log.error({ err: error }, "Verify failed");
      throw error;
    }
  }

  async #writeArchive(
    outputPath: string,
    sources: SourceFile[],
    compression: CompressionAlgorithm,
    buildSearchIndex: boolean,
    log: Logger
  ): Promise<ArchiveSummary> {
    const tempPath = join(
      dirname(outputPath),
      `${basename(outputPath)}.partial-${randomBytes(6).toString("hex")}`
    );
    const sink = await FileSink.create(tempPath);
    let closed = false;
    try {
      // Placeholder, rewritten once offsets and checksum are known
      await sink.write(new Uint8Array(HEADER_SIZE));
      sink.beginDataBlock();

      const entries: Entry[] = [];
      const searchIndex = buildSearchIndex ? new SearchIndexBuilder() : undefined;
      for (const source of sources) {
        const offset = sink.position - HEADER_SIZE;
        const tokens = searchIndex ? new TokenCounter() : undefined;
        const { stats, stream } = inspectContent(tokens);
        const content = (await openSource(source.absolutePath)).pipeThrough(stream);
        await this.#writeFrame(sink, content, compression, source.size);
        const entry: Entry = {
          path: source.archivePath,
          uncompressedSize: stats.size,
          compressedSize: sink.position - HEADER_SIZE - offset,
          offset,
          mtimeMs: source.mtimeMs,
          mode: source.mode,
          crc32: stats.crc32,
        };
        searchIndex?.addTokens(entries.length, tokens?.finish());
        entries.push(entry);
        log.debug(
          { entry: entry.path, size: entry.uncompressedSize, compressed: entry.compressedSize },
          "Frame written"
        );
      }

      const dataChecksum = sink.endDataBlock();
      const indexBytes = encodeIndex(
        searchIndex ? { entries, search: searchIndex.build() } : { entries }
      );
      const indexOffset = sink.position;
      await sink.write(indexBytes);

      const header: Header = {
        version: FORMAT_VERSION,
        compression,
        encryption: this.#key ? "aes-256-gcm" : "none",
        createdAt: this.#now(),
        indexOffset,
        indexLength: indexBytes.byteLength,
        dataChecksum,
      };
      await sink.writeAt(0, encodeHeader(header));
      const fileSize = sink.position;
      closed = true;
      await sink.close();
      try {
        await rename(tempPath, outputPath);
      } catch (err) {
        throw new ArchiveError(
          "ARCHIVE_WRITE_FAILURE",
          `Cannot move archive into place at ${outputPath}`,
          { path: outputPath, cause: err }
        );
      }

      return {
        path: outputPath,
        version: header.version,
        compression: header.compression,
        encryption: header.encryption,
        createdAt: header.createdAt,
        entries,
        dataSize: indexOffset - HEADER_SIZE,
        indexOffset,
        indexLength: header.indexLength,
        fileSize,
        dataChecksum: toHex(dataChecksum),
      };
    } catch (err) {
      if (!closed) {
        await sink.close().catch((closeErr: unknown) => {
          log.warn({ err: closeErr }, "Could not close partial archive");
        });
      }
      await unlink(tempPath).catch((cleanupErr: unknown) => {
        if (!isNotFound(cleanupErr)) {
          log.warn({ err: cleanupErr, path: tempPath }, "Could not remove partial archive");
        }
      });
      throw err;
    }
  }

  /** Compress (and seal) one frame at the sink's cursor */
  async #writeFrame(
    sink: FileSink,
    content: ReadableStream<Uint8Array>,
    compression: CompressionAlgorithm,
    sizeHint: number
  ): Promise<void> {
    if (!this.#key) {
      await this.#compression.compress(sink.frameWritable(), content, compression, sizeHint);
      return;
    }
    const seal = createSealStream(this.#key);
    await Promise.all([
      this.#compression.compress(seal.writable, content, compression, sizeHint),
      seal.readable.pipeTo(sink.frameWritable()),
    ]);
  }

  /** Open, decompress and check one entry's frame */
  async #readEntry(
    reader: ArchiveReader,
    entry: Entry,
    key: Uint8Array | undefined
  ): Promise<Uint8Array> {
    const frame = await reader.readFrame(entry);
    const compressed = key ? openFrame(frame, key, entry.path) : frame;
    const content = await this.#compression
      .decompressToBytes(compressed, reader.header.compression)
      .catch((err: unknown) => {
        throw wrapError(err, "DECOMPRESSION_FAILURE", `Cannot decode ${entry.path}`, {
          path: entry.path,
        });
      });
    if (content.byteLength !== entry.uncompressedSize) {
      throw new ArchiveError(
        "CHECKSUM_MISMATCH",
        `Size mismatch for ${entry.path}: expected ${entry.uncompressedSize}, got ${content.byteLength}`,
        { path: entry.path }
      );
    }
    if (crc32(content) !== entry.crc32) {
      throw new ArchiveError("CHECKSUM_MISMATCH", `CRC-32 mismatch for ${entry.path}`, {
        path: entry.path,
      });
    }
    return content;
  }

  #keyFor(reader: ArchiveReader): Uint8Array | undefined {
    if (reader.header.encryption === "none") return undefined;
    if (!this.#key) {
      throw new ArchiveError(
        "INVALID_ARGUMENT",
        "Archive is encrypted and no encryption key is configured",
        { path: reader.path }
      );
    }
    return this.#key;
  }

  async #withReader<T>(
    archivePath: string,
    fn: (reader: ArchiveReader) => Promise<T>
  ): Promise<T> {
    const reader = await ArchiveReader.open(archivePath);
    try {
      return await fn(reader);
    } finally {
      await reader.close();
    }
  }
}

/**
 * Resolve inputs into the ordered list of files to archive. Paths inside
 * `baseDir` keep their relative location; anything else is stored relative
 * to its own parent directory.
 */
async function collectSources(
  inputPaths: readonly string[],
  baseDir: string
): Promise<SourceFile[]> {
  const sources: SourceFile[] = [];
  const seen = new Set<string>();
  for (const input of inputPaths) {
    const absolute = resolve(input);
    const fromBase = relative(baseDir, absolute);
    const root =
      fromBase === "" || fromBase.startsWith("..") || isAbsolute(fromBase)
        ? dirname(absolute)
        : baseDir;
    for (const file of await expandInput(absolute)) {
      const archivePath = relative(root, file).split(sep).join("/");
      validateEntryPath(archivePath);
      if (seen.has(archivePath)) {
        throw new ArchiveError(
          "INVALID_ARGUMENT",
          `Duplicate archive path: ${archivePath}`,
          { path: archivePath }
        );
      }
      seen.add(archivePath);
      const stats = await statSource(file);
      sources.push({
        absolutePath: file,
        archivePath,
        size: stats.size,
        mtimeMs: Math.floor(stats.mtimeMs),
        mode: permissionBits(stats.mode),
      });
    }
  }
  return sources;
}

async function expandInput(path: string): Promise<string[]> {
  const stats = await statSource(path);
  if (stats.isFile()) return [path];
  if (!stats.isDirectory()) {
    throw new ArchiveError(
      "INVALID_ARGUMENT",
      `Not a regular file or directory: ${path}`,
      { path }
    );
  }
  const dirents = await readdir(path, { withFileTypes: true }).catch(
    (err: unknown) => {
      throw new ArchiveError("ARCHIVE_READ_FAILURE", `Cannot list ${path}`, {
        path,
        cause: err,
      });
    }
  );
  const files: string[] = [];
  for (const dirent of dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))) {
    const child = join(path, dirent.name);
    if (dirent.isDirectory()) files.push(...(await expandInput(child)));
    else if (dirent.isFile()) files.push(child);
  }
  return files;
}

async function statSource(path: string) {
  try {
    return await stat(path);
  } catch (err) {
    throw new ArchiveError("ARCHIVE_READ_FAILURE", `Cannot stat ${path}`, {
      path,
      cause: err,
    });
  }
}

/** Stream a source file in frame-sized chunks; read errors surface as ArchiveErrors */
async function openSource(path: string): Promise<ReadableStream<Uint8Array>> {
  const handle = await open(path, "r").catch((err: unknown) => {
    throw new ArchiveError("ARCHIVE_READ_FAILURE", `Cannot read ${path}`, {
      path,
      cause: err,
    });
  });
  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      const buffer = new Uint8Array(FRAME_CHUNK_SIZE);
      let bytesRead: number;
      try {
        ({ bytesRead } = await handle.read(buffer, 0, buffer.byteLength, null));
      } catch (err) {
        await handle.close();
        throw new ArchiveError("ARCHIVE_READ_FAILURE", `Cannot read ${path}`, {
          path,
          cause: err,
        });
      }
      if (bytesRead === 0) {
        await handle.close();
        controller.close();
        return;
      }
      controller.enqueue(buffer.subarray(0, bytesRead));
    },
    async cancel() {
      await handle.close();
    },
  });
}

/** Pass-through that records size and CRC-32 and feeds the tokenizer */
function inspectContent(tokens: TokenCounter | undefined) {
  const stats = { size: 0, crc32: 0 };
  const stream = new TransformStream<Uint8Array, Uint8Array>({
    transform(chunk, controller) {
      stats.size += chunk.byteLength;
      stats.crc32 = crc32(chunk, stats.crc32);
      tokens?.push(chunk);
      controller.enqueue(chunk);
    },
  });
  return { stats, stream };
}

async function writeEntry(
  root: string,
  entry: Entry,
  content: Uint8Array
): Promise<ExtractedFile> {
  const outputPath = resolve(root, ...entry.path.split("/"));
  const fromRoot = relative(root, outputPath);
  if (fromRoot === "" || fromRoot.startsWith("..") || isAbsolute(fromRoot)) {
    throw new ArchiveError(
      "INVALID_FORMAT",
      `Entry path escapes the destination directory: ${entry.path}`,
      { path: entry.path }
    );
  }
  const mode = permissionBits(entry.mode);
  try {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, content, { mode });
    // The process umask applies on creation
    await chmod(outputPath, mode);
    const mtime = entry.mtimeMs / 1000;
    await utimes(outputPath, mtime, mtime);
  } catch (err) {
    throw new ArchiveError("ARCHIVE_WRITE_FAILURE", `Cannot write ${outputPath}`, {
      path: entry.path,
      cause: err,
    });
  }
  return { path: entry.path, outputPath, size: content.byteLength, mode };
}

function validateLimit(limit: number): number {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ArchiveError(
      "INVALID_ARGUMENT",
      `Search limit must be a positive integer (got ${limit})`
    );
  }
  return limit;
}
