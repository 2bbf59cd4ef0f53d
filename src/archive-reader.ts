import { createHash } from "node:crypto";
import { open, type FileHandle } from "node:fs/promises";
import { HEADER_SIZE } from "./constants.js";
import { ArchiveError } from "./errors.js";
import { decodeHeader } from "./header.js";
import { dataBlockSize, decodeIndex } from "./index-block.js";
import type { ArchiveIndex, ArchiveListing, Entry, Header } from "./types.js";
import { toHex } from "./utils.js";

const CHECKSUM_CHUNK_SIZE = 1024 * 1024;

/**
 * Read side of an archive: header and index are decoded and the layout is
 * validated on open, frames are read on demand.
 */
export class ArchiveReader {
  readonly path: string;
  readonly header: Header;
  readonly index: ArchiveIndex;
  readonly fileSize: number;
  #handle: FileHandle;

  private constructor(
    path: string,
    handle: FileHandle,
    header: Header,
    index: ArchiveIndex,
    fileSize: number
  ) {
    this.path = path;
    this.#handle = handle;
    this.header = header;
    this.index = index;
    this.fileSize = fileSize;
  }

  static async open(path: string): Promise<ArchiveReader> {
    let handle: FileHandle;
    try {
      handle = await open(path, "r");
    } catch (err) {
      throw new ArchiveError("ARCHIVE_READ_FAILURE", `Cannot open archive ${path}`, {
        path,
        cause: err,
      });
    }
    try {
      const { size } = await handle.stat();
      const header = decodeHeader(
        await readRange(handle, path, 0, Math.min(size, HEADER_SIZE))
      );
      if (header.indexOffset + header.indexLength !== size) {
        throw new ArchiveError(
          "INVALID_FORMAT",
          `Index block (${header.indexOffset} + ${header.indexLength}) does not end at file size ${size}`,
          { path }
        );
      }
      const index = decodeIndex(
        await readRange(handle, path, header.indexOffset, header.indexLength)
      );
      const dataSize = dataBlockSize(index.entries);
      if (HEADER_SIZE + dataSize !== header.indexOffset) {
        throw new ArchiveError(
          "INVALID_FORMAT",
          `Frames end at ${HEADER_SIZE + dataSize} but the index starts at ${header.indexOffset}`,
          { path }
        );
      }
      return new ArchiveReader(path, handle, header, index, size);
    } catch (err) {
      await handle.close();
      throw err instanceof ArchiveError
        ? err
        : new ArchiveError("ARCHIVE_READ_FAILURE", `Cannot read archive ${path}`, {
            path,
            cause: err,
          });
    }
  }

  get dataSize(): number {
    return this.header.indexOffset - HEADER_SIZE;
  }

  listing(): ArchiveListing {
    const { header } = this;
    return {
      path: this.path,
      version: header.version,
      compression: header.compression,
      encryption: header.encryption,
      createdAt: header.createdAt,
      entries: this.index.entries,
      dataSize: this.dataSize,
      indexOffset: header.indexOffset,
      indexLength: header.indexLength,
      fileSize: this.fileSize,
      dataChecksum: toHex(header.dataChecksum),
      hasSearchIndex: this.index.search !== undefined,
    };
  }

  /** Hash the data block and compare it with the header's checksum */
  async verifyDataChecksum(): Promise<void> {
    const hash = createHash("sha256");
    for (let offset = 0; offset < this.dataSize; offset += CHECKSUM_CHUNK_SIZE) {
      const length = Math.min(CHECKSUM_CHUNK_SIZE, this.dataSize - offset);
      hash.update(await readRange(this.#handle, this.path, HEADER_SIZE + offset, length));
    }
    const actual = toHex(hash.digest());
    const expected = toHex(this.header.dataChecksum);
    if (actual !== expected) {
      throw new ArchiveError("CHECKSUM_MISMATCH", "Data block checksum mismatch", {
        path: this.path,
        context: { expected, actual },
      });
    }
  }

  /** Raw (compressed, possibly sealed) frame bytes of one entry */
  readFrame(entry: Entry): Promise<Uint8Array> {
    return readRange(
      this.#handle,
      this.path,
      HEADER_SIZE + entry.offset,
      entry.compressedSize
    );
  }

  close(): Promise<void> {
    return this.#handle.close();
  }
}

async function readRange(
  handle: FileHandle,
  path: string,
  position: number,
  length: number
): Promise<Uint8Array> {
  const buffer = new Uint8Array(length);
  let filled = 0;
  try {
    while (filled < length) {
      const { bytesRead } = await handle.read(
        buffer,
        filled,
        length - filled,
        position + filled
      );
      if (bytesRead === 0) break;
      filled += bytesRead;
    }
  } catch (err) {
    throw new ArchiveError("ARCHIVE_READ_FAILURE", `Read from ${path} failed`, {
      path,
      cause: err,
    });
  }
  if (filled < length) {
    throw new ArchiveError(
      "INVALID_FORMAT",
      `Archive is truncated: expected ${length} bytes at offset ${position}, got ${filled}`,
      { path }
    );
  }
  return buffer;
}
