import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { WritableStream } from "node:stream/web";
import { assert, onTestFinished } from "vitest";
import { ArchiveEngine } from "../src/archive.js";
import { CompressionEngine } from "../src/compression.js";
import { ArchiveError, type ArchiveErrorCode } from "../src/errors.js";
import { UsageLedger, type LicenseAuthority } from "../src/ledger.js";
import { createLogger } from "../src/logger.js";
import type { CompressionAlgorithm } from "../src/types.js";

export const silentLogger = createLogger({ level: "silent" });

export const textEncoder = new TextEncoder();

/** A fresh directory under the OS temp dir, removed when the test ends */
export async function makeTempDir(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), "framevault-test-"));
  onTestFinished(() => rm(dir, { recursive: true, force: true }));
  return dir;
}

/** Write `files` (path relative to `root` -> content) and return their paths */
export async function writeFiles(
  root: string,
  files: Record<string, string | Uint8Array>
): Promise<string[]> {
  const paths: string[] = [];
  for (const [name, content] of Object.entries(files)) {
    const path = join(root, ...name.split("/"));
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content);
    paths.push(path);
  }
  return paths;
}

export interface TestSetup {
  dir: string;
  ledger: UsageLedger;
  compression: CompressionEngine;
  engine: ArchiveEngine;
}

export async function setupEngine({
  tokens = 10,
  encryptionKey,
  defaultCompression,
  authority,
}: {
  tokens?: number;
  encryptionKey?: Uint8Array;
  defaultCompression?: CompressionAlgorithm;
  authority?: LicenseAuthority;
} = {}): Promise<TestSetup> {
  const dir = await makeTempDir();
  const ledger = await UsageLedger.open({
    path: join(dir, "state", "ledger.json"),
    freeTokens: tokens,
    authority,
    logger: silentLogger,
  });
  const compression = new CompressionEngine({ concurrency: 2, logger: silentLogger });
  const engine = new ArchiveEngine({
    ledger,
    compression,
    encryptionKey,
    defaultCompression,
    logger: silentLogger,
  });
  return { dir, ledger, compression, engine };
}

/** A writable that collects everything written to it */
export function collectingWritable(): {
  writable: WritableStream<Uint8Array>;
  bytes: () => Uint8Array;
} {
  const chunks: Uint8Array[] = [];
  const writable = new WritableStream<Uint8Array>({
    write(chunk) {
      chunks.push(chunk);
    },
  });
  return {
    writable,
    bytes: () => new Uint8Array(Buffer.concat(chunks)),
  };
}

/** Deterministic pseudo-random bytes */
export function pseudoRandomBytes(length: number, seed = 1): Uint8Array {
  const bytes = new Uint8Array(length);
  let state = seed;
  for (let i = 0; i < length; i++) {
    state = (state * 1103515245 + 12345) & 0x7fffffff;
    bytes[i] = state >>> 16;
  }
  return bytes;
}

/** Assert that `fn` throws an ArchiveError with `code` */
export function expectCode(fn: () => unknown, code: ArchiveErrorCode): ArchiveError {
  try {
    fn();
  } catch (err) {
    if (!(err instanceof ArchiveError)) throw err;
    assert.strictEqual(err.code, code);
    return err;
  }
  assert.fail(`expected ${code}`);
}

/** Assert that `promise` rejects with an ArchiveError with `code` */
export async function expectRejection(
  promise: Promise<unknown>,
  code: ArchiveErrorCode
): Promise<ArchiveError> {
  try {
    await promise;
  } catch (err) {
    if (!(err instanceof ArchiveError)) throw err;
    assert.strictEqual(err.code, code);
    return err;
  }
  assert.fail(`expected ${code}`);
}
