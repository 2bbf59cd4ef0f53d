import { MAX_2_BYTE } from "./constants.js";
import { ArchiveError } from "./errors.js";

const textEncoder = new TextEncoder();

/**
 * Validates an archive path to ensure it is within the limits of our encoding
 * and cannot escape the extraction directory. Returns the encoded path.
 */
export function validateEntryPath(path: string): Uint8Array {
  const pathBytes = textEncoder.encode(path);
  if (pathBytes.length === 0) {
    throw new ArchiveError("INVALID_ARGUMENT", "Entry path must not be empty");
  }
  if (pathBytes.length > MAX_2_BYTE) {
    throw new ArchiveError(
      "INVALID_ARGUMENT",
      `Entry path exceeds maximum length of 65535 bytes (got ${pathBytes.length} bytes)`,
      { path }
    );
  }
  if (
    path.startsWith("/") ||
    path.includes("\\") ||
    path.includes("\0") ||
    path.split("/").some((segment) => segment === ".." || segment === "")
  ) {
    throw new ArchiveError("INVALID_ARGUMENT", `Unsafe entry path: ${path}`, {
      path,
    });
  }
  return pathBytes;
}

/** Whether a filesystem call failed because the path does not exist */
export function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Unix permission bits, including setuid/setgid/sticky */
export function permissionBits(mode: number): number {
  return mode & 0o7777;
}

type DataViewValue =
  | [typeof UINT8, number, boolean]
  | [typeof UINT16, number, boolean]
  | [typeof UINT32, number, boolean]
  | [typeof UINT64, bigint, boolean];

export const UINT8 = "setUint8";
export const UINT16 = "setUint16";
export const UINT32 = "setUint32";
export const UINT64 = "setBigUint64";
type Ints = typeof UINT8 | typeof UINT16 | typeof UINT32 | typeof UINT64;

const OFFSETS = {
  setUint8: 1,
  setUint16: 2,
  setUint32: 4,
  setBigUint64: 8,
} satisfies Record<Ints, number>;

export function writeDataView(
  view: DataView,
  values: DataViewValue[],
  offset: number = 0
): number {
  for (const value of values) {
    switch (value[0]) {
      case UINT8:
        view.setUint8(offset, value[1]);
        break;
      case UINT16:
        view.setUint16(offset, value[1], value[2]);
        break;
      case UINT32:
        view.setUint32(offset, value[1], value[2]);
        break;
      case UINT64:
        view.setBigUint64(offset, value[1], value[2]);
        break;
    }
    offset += OFFSETS[value[0]];
  }
  return offset;
}

/**
 * Sequential big-endian reader over a byte array. Reading past the end throws
 * INVALID_FORMAT with the name of the structure being decoded.
 */
export class ByteReader {
  #view: DataView;
  #bytes: Uint8Array;
  #offset = 0;
  #structure: string;

  constructor(bytes: Uint8Array, structure: string) {
    this.#bytes = bytes;
    this.#view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this.#structure = structure;
  }

  get offset(): number {
    return this.#offset;
  }

  get remaining(): number {
    return this.#bytes.byteLength - this.#offset;
  }

  u8(): number {
    this.#ensure(1);
    const value = this.#view.getUint8(this.#offset);
    this.#offset += 1;
    return value;
  }

  u16(): number {
    this.#ensure(2);
    const value = this.#view.getUint16(this.#offset, false);
    this.#offset += 2;
    return value;
  }

  u32(): number {
    this.#ensure(4);
    const value = this.#view.getUint32(this.#offset, false);
    this.#offset += 4;
    return value;
  }

  /** Unsigned 64-bit value that must fit in a JavaScript number */
  u64(): number {
    this.#ensure(8);
    const value = this.#view.getBigUint64(this.#offset, false);
    this.#offset += 8;
    if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new ArchiveError(
        "INVALID_FORMAT",
        `${this.#structure} contains a 64-bit value out of range`
      );
    }
    return Number(value);
  }

  bytes(length: number): Uint8Array {
    this.#ensure(length);
    const value = this.#bytes.subarray(this.#offset, this.#offset + length);
    this.#offset += length;
    return value;
  }

  #ensure(length: number) {
    if (this.#offset + length > this.#bytes.byteLength) {
      throw new ArchiveError(
        "INVALID_FORMAT",
        `${this.#structure} is truncated (needed ${length} bytes at offset ${this.#offset})`
      );
    }
  }
}

export function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString(
    "hex"
  );
}

export function concatBytes(chunks: Uint8Array[], totalLength?: number): Uint8Array {
  const length =
    totalLength ?? chunks.reduce((sum, chunk) => sum + chunk.byteLength, 0);
  const result = new Uint8Array(length);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return result;
}
