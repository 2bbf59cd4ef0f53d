import {
  ARCHIVE_MAGIC,
  BIG_ENDIAN,
  CHECKSUM_SIZE,
  COMPRESSION_TAG_BROTLI,
  COMPRESSION_TAG_GZIP,
  COMPRESSION_TAG_STORE,
  ENCRYPTION_TAG_AES_256_GCM,
  ENCRYPTION_TAG_NONE,
  HEADER_SIZE,
  MAX_SUPPORTED_VERSION,
} from "./constants.js";
import { ArchiveError } from "./errors.js";
import type {
  CompressionAlgorithm,
  EncryptionAlgorithm,
  Header,
} from "./types.js";
import { ByteReader, UINT8, UINT16, UINT32, UINT64, writeDataView } from "./utils.js";

const COMPRESSION_TAGS = {
  store: COMPRESSION_TAG_STORE,
  brotli: COMPRESSION_TAG_BROTLI,
  gzip: COMPRESSION_TAG_GZIP,
} satisfies Record<CompressionAlgorithm, number>;

const ENCRYPTION_TAGS = {
  none: ENCRYPTION_TAG_NONE,
  "aes-256-gcm": ENCRYPTION_TAG_AES_256_GCM,
} satisfies Record<EncryptionAlgorithm, number>;

export function tagFromAlgorithm(algorithm: string): number {
  return COMPRESSION_TAGS[parseCompressionAlgorithm(algorithm)];
}

/** Narrow an algorithm name, failing on anything unknown */
export function parseCompressionAlgorithm(name: string): CompressionAlgorithm {
  if (!isCompressionAlgorithm(name)) {
    throw new ArchiveError(
      "UNSUPPORTED_ALGORITHM",
      `Unsupported compression algorithm: ${name}`,
      { context: { algorithm: name } }
    );
  }
  return name;
}

export function algorithmFromTag(tag: number): CompressionAlgorithm {
  for (const [algorithm, value] of Object.entries(COMPRESSION_TAGS)) {
    if (value === tag && isCompressionAlgorithm(algorithm)) return algorithm;
  }
  throw new ArchiveError(
    "UNSUPPORTED_ALGORITHM",
    `Unsupported compression tag: ${tag}`,
    { context: { tag: String(tag) } }
  );
}

export function isCompressionAlgorithm(
  value: string
): value is CompressionAlgorithm {
  return Object.hasOwn(COMPRESSION_TAGS, value);
}

function encryptionFromTag(tag: number): EncryptionAlgorithm {
  switch (tag) {
    case ENCRYPTION_TAG_NONE:
      return "none";
    case ENCRYPTION_TAG_AES_256_GCM:
      return "aes-256-gcm";
    default:
      throw new ArchiveError(
        "UNSUPPORTED_ALGORITHM",
        `Unsupported encryption tag: ${tag}`,
        { context: { tag: String(tag) } }
      );
  }
}

/**
 * Encode the fixed-size archive header. The same layout is written as a
 * zeroed placeholder when creation starts, then rewritten in place.
 */
export function encodeHeader(header: Header): Uint8Array {
  if (header.dataChecksum.byteLength !== CHECKSUM_SIZE) {
    throw new RangeError(
      `Data checksum must be ${CHECKSUM_SIZE} bytes (got ${header.dataChecksum.byteLength})`
    );
  }
  const bytes = new Uint8Array(HEADER_SIZE);
  const view = new DataView(bytes.buffer);

  const offset = writeDataView(view, [
    // Magic number
    [UINT32, ARCHIVE_MAGIC, BIG_ENDIAN],
    // Format version
    [UINT16, header.version, BIG_ENDIAN],
    // Compression and encryption algorithm tags
    [UINT8, COMPRESSION_TAGS[header.compression], BIG_ENDIAN],
    [UINT8, ENCRYPTION_TAGS[header.encryption], BIG_ENDIAN],
    // Creation time (ms)
    [UINT64, BigInt(header.createdAt), BIG_ENDIAN],
    // Index block location
    [UINT64, BigInt(header.indexOffset), BIG_ENDIAN],
    [UINT64, BigInt(header.indexLength), BIG_ENDIAN],
  ]);

  // SHA-256 of the data block
  bytes.set(header.dataChecksum, offset);
  return bytes;
}

/**
 * Decode and validate the archive header. The magic is checked before
 * anything else, so a file of another format never reaches version parsing.
 */
export function decodeHeader(bytes: Uint8Array): Header {
  if (bytes.byteLength < HEADER_SIZE) {
    throw new ArchiveError(
      "INVALID_FORMAT",
      `Not an archive: file is shorter than the ${HEADER_SIZE}-byte header`
    );
  }
  const reader = new ByteReader(bytes.subarray(0, HEADER_SIZE), "Header");
  if (reader.u32() !== ARCHIVE_MAGIC) {
    throw new ArchiveError(
      "INVALID_FORMAT",
      "Not an archive (magic number mismatch)"
    );
  }
  const version = reader.u16();
  if (version === 0) {
    throw new ArchiveError("INVALID_FORMAT", "Invalid format version 0");
  }
  if (version > MAX_SUPPORTED_VERSION) {
    throw new ArchiveError(
      "UNSUPPORTED_VERSION",
      `Archive format version ${version} is newer than supported version ${MAX_SUPPORTED_VERSION}`,
      { context: { version: String(version) } }
    );
  }
  const compression = algorithmFromTag(reader.u8());
  const encryption = encryptionFromTag(reader.u8());
  const createdAt = reader.u64();
  const indexOffset = reader.u64();
  const indexLength = reader.u64();
  const dataChecksum = reader.bytes(CHECKSUM_SIZE).slice();

  if (indexOffset < HEADER_SIZE) {
    throw new ArchiveError(
      "INVALID_FORMAT",
      `Index offset ${indexOffset} points inside the header`
    );
  }

  return {
    version,
    compression,
    encryption,
    createdAt,
    indexOffset,
    indexLength,
    dataChecksum,
  };
}
