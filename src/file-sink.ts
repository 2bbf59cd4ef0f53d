import { createHash, type Hash } from "node:crypto";
import { open, type FileHandle } from "node:fs/promises";
import { WritableStream } from "node:stream/web";
import { ArchiveError } from "./errors.js";

/**
 * Positioned writer over a new file. While a data block is open every
 * sequential write is also fed to a SHA-256 digest, so the checksum is known
 * as soon as the last frame lands.
 */
export class FileSink {
  readonly path: string;
  #handle: FileHandle;
  #position = 0;
  #hash: Hash | undefined;

  private constructor(path: string, handle: FileHandle) {
    this.path = path;
    this.#handle = handle;
  }

  /** Create `path`, failing if it already exists */
  static async create(path: string): Promise<FileSink> {
    try {
      return new FileSink(path, await open(path, "wx"));
    } catch (err) {
      throw new ArchiveError("ARCHIVE_WRITE_FAILURE", `Cannot create ${path}`, {
        path,
        cause: err,
      });
    }
  }

  get position(): number {
    return this.#position;
  }

  async write(chunk: Uint8Array): Promise<void> {
    if (chunk.byteLength === 0) return;
    await this.#writeAt(this.#position, chunk);
    this.#hash?.update(chunk);
    this.#position += chunk.byteLength;
  }

  /** Write without moving the cursor, e.g. to patch the header */
  async writeAt(offset: number, chunk: Uint8Array): Promise<void> {
    if (chunk.byteLength === 0) return;
    await this.#writeAt(offset, chunk);
  }

  beginDataBlock(): void {
    this.#hash = createHash("sha256");
  }

  /** @returns SHA-256 of everything written since `beginDataBlock()` */
  endDataBlock(): Uint8Array {
    const hash = this.#hash ?? createHash("sha256");
    this.#hash = undefined;
    return new Uint8Array(hash.digest());
  }

  /**
   * Web stream view of the sink for one frame. Closing it does not close the
   * file, so a fresh one is taken for every frame.
   */
  frameWritable(): WritableStream<Uint8Array> {
    return new WritableStream<Uint8Array>({
      write: (chunk) => this.write(chunk),
    });
  }

  async close(): Promise<void> {
    try {
      await this.#handle.close();
    } catch (err) {
      throw new ArchiveError("ARCHIVE_WRITE_FAILURE", `Cannot close ${this.path}`, {
        path: this.path,
        cause: err,
      });
    }
  }

  async #writeAt(offset: number, chunk: Uint8Array): Promise<void> {
    let written = 0;
    try {
      while (written < chunk.byteLength) {
        const { bytesWritten } = await this.#handle.write(
          chunk,
          written,
          chunk.byteLength - written,
          offset + written
        );
        written += bytesWritten;
      }
    } catch (err) {
      throw new ArchiveError("ARCHIVE_WRITE_FAILURE", `Write to ${this.path} failed`, {
        path: this.path,
        context: { offset: String(offset + written) },
        cause: err,
      });
    }
  }
}
