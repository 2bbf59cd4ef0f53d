import type { CompressionAlgorithm } from "./types.js";
import { concatBytes } from "./utils.js";

/**
 * Per-frame bookkeeping: the output accumulator a decoder fills and the
 * counters for the frame in flight. Node's brotli and gzip streams cannot be
 * reused, so a fresh codec stream is built for every frame and only this
 * small object is recycled; pooling it saves no encoder setup. Objects must
 * come back from `reset()` indistinguishable from new ones.
 */
export class FrameCodec {
  readonly algorithm: CompressionAlgorithm;
  #chunks: Uint8Array[] = [];
  #bytesIn = 0;
  #bytesOut = 0;
  #uses = 0;

  constructor(algorithm: CompressionAlgorithm) {
    this.algorithm = algorithm;
  }

  /** Number of frames this object has processed */
  get uses(): number {
    return this.#uses;
  }

  get bytesIn(): number {
    return this.#bytesIn;
  }

  get bytesOut(): number {
    return this.#bytesOut;
  }

  countIn(byteLength: number): void {
    this.#bytesIn += byteLength;
  }

  /** Record produced output; `keep` retains the chunk for `collect()` */
  countOut(chunk: Uint8Array, keep = false): void {
    this.#bytesOut += chunk.byteLength;
    if (keep) this.#chunks.push(chunk);
  }

  collect(): Uint8Array {
    return concatBytes(this.#chunks, this.#bytesOut);
  }

  reset(): void {
    this.#chunks = [];
    this.#bytesIn = 0;
    this.#bytesOut = 0;
  }

  markUsed(): void {
    this.#uses++;
  }

  get isClean(): boolean {
    return this.#chunks.length === 0 && this.#bytesIn === 0 && this.#bytesOut === 0;
  }
}

export interface CodecPoolOptions {
  /** Idle objects kept per algorithm (defaults to 4) */
  maxIdle?: number;
}

/**
 * Recycling pool of FrameCodec objects keyed by algorithm. `use()` is a scoped
 * checkout: the object is reset on the way out of the pool and only returned
 * once the callback has settled successfully. A codec whose frame failed is
 * dropped, since its stream may not have been flushed.
 */
export class CodecPool {
  #idle = new Map<CompressionAlgorithm, FrameCodec[]>();
  #maxIdle: number;
  #created = 0;

  constructor({ maxIdle = 4 }: CodecPoolOptions = {}) {
    this.#maxIdle = maxIdle;
  }

  /** Total number of codec objects ever constructed */
  get created(): number {
    return this.#created;
  }

  idleCount(algorithm: CompressionAlgorithm): number {
    return this.#idle.get(algorithm)?.length ?? 0;
  }

  async use<T>(
    algorithm: CompressionAlgorithm,
    fn: (codec: FrameCodec) => Promise<T>
  ): Promise<T> {
    const codec = this.#acquire(algorithm);
    const result = await fn(codec);
    this.#release(codec);
    return result;
  }

  #acquire(algorithm: CompressionAlgorithm): FrameCodec {
    const codec = this.#idle.get(algorithm)?.pop();
    if (codec) {
      codec.reset();
      codec.markUsed();
      return codec;
    }
    this.#created++;
    const fresh = new FrameCodec(algorithm);
    fresh.markUsed();
    return fresh;
  }

  #release(codec: FrameCodec): void {
    const idle = this.#idle.get(codec.algorithm) ?? [];
    if (idle.length >= this.#maxIdle) return;
    codec.reset();
    idle.push(codec);
    this.#idle.set(codec.algorithm, idle);
  }
}
