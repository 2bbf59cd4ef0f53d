import { Duplex } from "node:stream";
import {
  CompressionStream,
  DecompressionStream,
  TransformStream,
  WritableStream,
  type ReadableStream,
} from "node:stream/web";
import {
  constants,
  createBrotliCompress,
  createBrotliDecompress,
} from "node:zlib";
import pLimit, { type LimitFunction } from "p-limit";
import { CodecPool } from "./codec-pool.js";
import { defaultConcurrency } from "./config.js";
import { MAX_4_BYTE } from "./constants.js";
import { ArchiveError, wrapError } from "./errors.js";
import { parseCompressionAlgorithm } from "./header.js";
import { componentLogger, type Logger } from "./logger.js";
import { readableFromBytes } from "./readable-from-bytes.js";
import type { CompressionAlgorithm } from "./types.js";

export const BROTLI_QUALITY = 9;

interface CodecStream {
  readable: ReadableStream<Uint8Array>;
  writable: WritableStream<Uint8Array>;
}

type Direction = "compress" | "decompress";

export interface CompressionEngineOptions {
  /** Simultaneous codec operations (defaults to half the CPUs, minimum 1) */
  concurrency?: number;
  codecPool?: CodecPool;
  logger?: Logger;
}

/**
 * Streams one frame at a time through a codec. Every call holds one permit
 * from a bounded pool for its whole duration, so the number of frames being
 * encoded or decoded at once never exceeds `concurrency`, however many
 * callers there are.
 */
export class CompressionEngine {
  #limit: LimitFunction;
  #pool: CodecPool;
  #log: Logger;

  constructor({
    concurrency = defaultConcurrency(),
    codecPool = new CodecPool(),
    logger,
  }: CompressionEngineOptions = {}) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ArchiveError(
        "INVALID_ARGUMENT",
        `Concurrency must be a positive integer (got ${concurrency})`
      );
    }
    this.#limit = pLimit(concurrency);
    this.#pool = codecPool;
    this.#log = componentLogger(logger, "compressor");
  }

  get concurrency(): number {
    return this.#limit.concurrency;
  }

  /** Codec operations currently holding a permit */
  get activeCount(): number {
    return this.#limit.activeCount;
  }

  /** Codec operations waiting for a permit */
  get pendingCount(): number {
    return this.#limit.pendingCount;
  }

  get codecPool(): CodecPool {
    return this.#pool;
  }

  /**
   * Compress `source` as one independent frame into `destination`, which is
   * closed once the frame is complete. A streamed source is read only once a
   * permit is held; `sizeHint` is its expected length, if known.
   *
   * @returns Number of compressed bytes written
   */
  async compress(
    destination: WritableStream<Uint8Array>,
    source: Uint8Array | ReadableStream<Uint8Array>,
    algorithm: string,
    sizeHint?: number
  ): Promise<number> {
    const { bytesOut } = await this.#run(
      "compress",
      destination,
      source,
      algorithm,
      false,
      sizeHint
    );
    return bytesOut;
  }

  /**
   * Decode one frame into `destination`, which is closed at the end of the
   * frame.
   *
   * @returns Number of decompressed bytes written
   */
  async decompress(
    destination: WritableStream<Uint8Array>,
    source: Uint8Array,
    algorithm: string
  ): Promise<number> {
    const { bytesOut } = await this.#run("decompress", destination, source, algorithm, false);
    return bytesOut;
  }

  /** Decode one frame into memory */
  async decompressToBytes(
    source: Uint8Array,
    algorithm: string
  ): Promise<Uint8Array> {
    const { data } = await this.#run(
      "decompress",
      new WritableStream<Uint8Array>(),
      source,
      algorithm,
      true
    );
    return data;
  }

  async #run(
    direction: Direction,
    destination: WritableStream<Uint8Array>,
    source: Uint8Array | ReadableStream<Uint8Array>,
    name: string,
    keep: boolean,
    sizeHint = source instanceof Uint8Array ? source.byteLength : 0
  ): Promise<FrameResult> {
    let algorithm: CompressionAlgorithm;
    try {
      // Unknown names fail before a permit is taken
      algorithm = parseCompressionAlgorithm(name);
    } catch (err) {
      if (!(source instanceof Uint8Array)) await source.cancel(err);
      throw err;
    }
    return this.#limit(() =>
      this.#pool.use(algorithm, async (codec) => {
        this.#log.debug(
          { algorithm, direction, bytesIn: sizeHint },
          `Starting ${direction} stream`
        );
        const countIn = new TransformStream<Uint8Array, Uint8Array>({
          transform(chunk, controller) {
            codec.countIn(chunk.byteLength);
            controller.enqueue(chunk);
          },
        });
        const countOut = new TransformStream<Uint8Array, Uint8Array>({
          transform(chunk, controller) {
            codec.countOut(chunk, keep);
            controller.enqueue(chunk);
          },
        });
        try {
          const input = source instanceof Uint8Array ? readableFromBytes(source) : source;
          await input
            .pipeThrough(countIn)
            .pipeThrough(createCodecStream(direction, algorithm, sizeHint))
            .pipeThrough(countOut)
            .pipeTo(destination);
        } catch (err) {
          throw wrapError(
            err,
            direction === "compress" ? "COMPRESSION_FAILURE" : "DECOMPRESSION_FAILURE",
            `Failed to ${direction} ${algorithm} frame`,
            { context: { operation: direction, algorithm } }
          );
        }
        this.#log.debug(
          { algorithm, direction, bytesWritten: codec.bytesOut },
          `Finished ${direction} stream`
        );
        // The codec is reset when it goes back to the pool, so copy results out
        return {
          bytesOut: codec.bytesOut,
          data: keep ? codec.collect() : new Uint8Array(0),
        };
      })
    );
  }
}

interface FrameResult {
  bytesOut: number;
  data: Uint8Array;
}

function createCodecStream(
  direction: Direction,
  algorithm: CompressionAlgorithm,
  sizeHint: number
): CodecStream {
  switch (algorithm) {
    case "store":
      return new TransformStream<Uint8Array, Uint8Array>();
    case "gzip":
      return direction === "compress"
        ? new CompressionStream("gzip")
        : new DecompressionStream("gzip");
    case "brotli":
      return Duplex.toWeb(
        direction === "compress"
          ? createBrotliCompress({
              params: {
                [constants.BROTLI_PARAM_QUALITY]: BROTLI_QUALITY,
                [constants.BROTLI_PARAM_SIZE_HINT]: Math.min(sizeHint, MAX_4_BYTE),
              },
            })
          : createBrotliDecompress()
      );
  }
}
