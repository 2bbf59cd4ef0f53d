import {
  BIG_ENDIAN,
  INDEX_ENTRY_FIXED_SIZE,
  INDEX_FLAG_SEARCH,
  MAX_2_BYTE,
  MAX_4_BYTE,
} from "./constants.js";
import { ArchiveError } from "./errors.js";
import type { ArchiveIndex, Entry, SearchIndex } from "./types.js";
import {
  ByteReader,
  UINT8,
  UINT16,
  UINT32,
  UINT64,
  validateEntryPath,
  writeDataView,
} from "./utils.js";

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Serialize the index block: the entry table in frame order, followed by the
 * search index when one was built. Every variable-length part is
 * length-prefixed, so the block is self-delimiting.
 */
export function encodeIndex(index: ArchiveIndex): Uint8Array {
  const pathBytes = index.entries.map((entry) => validateEntryPath(entry.path));
  const tokens = index.search
    ? [...index.search.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([token, postings]) => ({
          tokenBytes: textEncoder.encode(token),
          postings: [...postings.entries()].sort(([a], [b]) => a - b),
        }))
    : [];

  let size = 1 + 4;
  for (const bytes of pathBytes) size += INDEX_ENTRY_FIXED_SIZE + bytes.length;
  if (index.search) {
    size += 4;
    for (const { tokenBytes, postings } of tokens) {
      if (tokenBytes.length > MAX_2_BYTE) {
        throw new RangeError("Search token exceeds maximum length of 65535 bytes");
      }
      size += 2 + tokenBytes.length + 4 + postings.length * 8;
    }
  }

  const block = new Uint8Array(size);
  const view = new DataView(block.buffer);
  let offset = writeDataView(view, [
    // Flags
    [UINT8, index.search ? INDEX_FLAG_SEARCH : 0, BIG_ENDIAN],
    // Entry count
    [UINT32, index.entries.length, BIG_ENDIAN],
  ]);

  index.entries.forEach((entry, i) => {
    validateEntryNumbers(entry);
    const nameBytes = pathBytes[i];
    offset = writeDataView(
      view,
      [[UINT16, nameBytes.length, BIG_ENDIAN]],
      offset
    );
    block.set(nameBytes, offset);
    offset += nameBytes.length;
    offset = writeDataView(
      view,
      [
        [UINT64, BigInt(entry.uncompressedSize), BIG_ENDIAN],
        [UINT64, BigInt(entry.compressedSize), BIG_ENDIAN],
        [UINT64, BigInt(entry.offset), BIG_ENDIAN],
        [UINT64, BigInt(Math.max(0, Math.floor(entry.mtimeMs))), BIG_ENDIAN],
        [UINT32, entry.mode, BIG_ENDIAN],
        [UINT32, entry.crc32, BIG_ENDIAN],
      ],
      offset
    );
  });

  if (index.search) {
    offset = writeDataView(view, [[UINT32, tokens.length, BIG_ENDIAN]], offset);
    for (const { tokenBytes, postings } of tokens) {
      offset = writeDataView(
        view,
        [[UINT16, tokenBytes.length, BIG_ENDIAN]],
        offset
      );
      block.set(tokenBytes, offset);
      offset += tokenBytes.length;
      offset = writeDataView(
        view,
        [[UINT32, postings.length, BIG_ENDIAN]],
        offset
      );
      for (const [entryIndex, occurrences] of postings) {
        offset = writeDataView(
          view,
          [
            [UINT32, entryIndex, BIG_ENDIAN],
            [UINT32, Math.min(occurrences, MAX_4_BYTE), BIG_ENDIAN],
          ],
          offset
        );
      }
    }
  }

  return block;
}

/**
 * Parse an index block. The block must be consumed exactly: the header's
 * index length is authoritative.
 */
export function decodeIndex(block: Uint8Array): ArchiveIndex {
  const reader = new ByteReader(block, "Index");
  const flags = reader.u8();
  if ((flags & ~INDEX_FLAG_SEARCH) !== 0) {
    throw new ArchiveError("INVALID_FORMAT", `Unknown index flags: ${flags}`);
  }
  const entryCount = reader.u32();
  const entries: Entry[] = [];
  const seen = new Set<string>();
  let expectedOffset = 0;

  for (let i = 0; i < entryCount; i++) {
    const path = decodeString(reader.bytes(reader.u16()), "entry path");
    try {
      validateEntryPath(path);
    } catch (err) {
      throw new ArchiveError("INVALID_FORMAT", `Index contains unsafe path ${JSON.stringify(path)}`, {
        path,
        cause: err,
      });
    }
    if (seen.has(path)) {
      throw new ArchiveError("INVALID_FORMAT", `Index contains duplicate path ${path}`, {
        path,
      });
    }
    seen.add(path);
    const entry: Entry = {
      path,
      uncompressedSize: reader.u64(),
      compressedSize: reader.u64(),
      offset: reader.u64(),
      mtimeMs: reader.u64(),
      mode: reader.u32(),
      crc32: reader.u32(),
    };
    // Frames are contiguous and appear in index order
    if (entry.offset !== expectedOffset) {
      throw new ArchiveError(
        "INVALID_FORMAT",
        `Entry ${path} starts at data offset ${entry.offset}, expected ${expectedOffset}`,
        { path }
      );
    }
    expectedOffset += entry.compressedSize;
    entries.push(entry);
  }

  let search: SearchIndex | undefined;
  if (flags & INDEX_FLAG_SEARCH) {
    search = new Map();
    const tokenCount = reader.u32();
    for (let i = 0; i < tokenCount; i++) {
      const token = decodeString(reader.bytes(reader.u16()), "search token");
      const postingCount = reader.u32();
      const postings = new Map<number, number>();
      for (let j = 0; j < postingCount; j++) {
        const entryIndex = reader.u32();
        const occurrences = reader.u32();
        if (entryIndex >= entries.length) {
          throw new ArchiveError(
            "INVALID_FORMAT",
            `Search token ${JSON.stringify(token)} references missing entry ${entryIndex}`
          );
        }
        postings.set(entryIndex, occurrences);
      }
      search.set(token, postings);
    }
  }

  if (reader.remaining !== 0) {
    throw new ArchiveError(
      "INVALID_FORMAT",
      `Index has ${reader.remaining} unexpected trailing bytes`
    );
  }

  return search ? { entries, search } : { entries };
}

/** Total size of all frames described by the index */
export function dataBlockSize(entries: readonly Entry[]): number {
  return entries.reduce((sum, entry) => sum + entry.compressedSize, 0);
}

function validateEntryNumbers(entry: Entry) {
  if (!Number.isInteger(entry.mode) || entry.mode < 0 || entry.mode > MAX_4_BYTE) {
    throw new RangeError(
      `File mode must be an unsigned 32-bit integer (got ${entry.mode})`
    );
  }
  if (!Number.isInteger(entry.crc32) || entry.crc32 < 0 || entry.crc32 > MAX_4_BYTE) {
    throw new RangeError(`CRC-32 must be an unsigned 32-bit integer (got ${entry.crc32})`);
  }
}

function decodeString(bytes: Uint8Array, what: string): string {
  try {
    return textDecoder.decode(bytes);
  } catch (err) {
    throw new ArchiveError("INVALID_FORMAT", `Index contains an invalid UTF-8 ${what}`, {
      cause: err,
    });
  }
}
