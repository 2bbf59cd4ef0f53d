import type { ArchiveError } from "./errors.js";

export type CompressionAlgorithm = "store" | "brotli" | "gzip";

export type EncryptionAlgorithm = "none" | "aes-256-gcm";

export interface Header {
  /** Format version the archive was written with */
  version: number;
  compression: CompressionAlgorithm;
  encryption: EncryptionAlgorithm;
  /** Archive creation time, milliseconds since the Unix epoch */
  createdAt: number;
  /** Absolute byte offset of the index block */
  indexOffset: number;
  /** Length of the index block in bytes */
  indexLength: number;
  /** SHA-256 of the whole data block */
  dataChecksum: Uint8Array;
}

export interface Entry {
  /** Archive-relative path, POSIX separated */
  path: string;
  /** Original size in bytes */
  uncompressedSize: number;
  /** Size of the frame on disk, after compression and encryption */
  compressedSize: number;
  /** Byte offset of the frame within the data block */
  offset: number;
  /** Last modification time, milliseconds since the Unix epoch */
  mtimeMs: number;
  /** Permission bits */
  mode: number;
  /** CRC-32 of the original bytes */
  crc32: number;
}

/** token -> (entry position in the index -> occurrences) */
export type SearchIndex = Map<string, Map<number, number>>;

export interface ArchiveIndex {
  entries: Entry[];
  /** Absent when the archive was written without a search index */
  search?: SearchIndex;
}

export interface CreateOptions {
  /** Archive paths are relative to this directory. Defaults to `process.cwd()` */
  baseDir?: string;
  compression?: CompressionAlgorithm;
  /** Build the keyword search index (defaults to `true`) */
  searchIndex?: boolean;
}

export interface ArchiveSummary {
  path: string;
  version: number;
  compression: CompressionAlgorithm;
  encryption: EncryptionAlgorithm;
  createdAt: number;
  entries: Entry[];
  /** Size of the data block in bytes */
  dataSize: number;
  indexOffset: number;
  indexLength: number;
  fileSize: number;
  /** Hex SHA-256 of the data block */
  dataChecksum: string;
}

export interface ArchiveListing extends ArchiveSummary {
  hasSearchIndex: boolean;
}

export interface ExtractedFile {
  path: string;
  /** Filesystem path the entry was written to */
  outputPath: string;
  size: number;
  mode: number;
}

export interface MissingEntry {
  path: string;
  error: ArchiveError;
}

export interface ExtractResult {
  extracted: ExtractedFile[];
  missing: MissingEntry[];
}

export type SearchMode = "auto" | "index" | "scan";

export interface SearchOptions {
  mode?: SearchMode;
  /** Maximum number of hits; the scan stops once this many files match */
  limit?: number;
}

export interface SearchHit {
  path: string;
  matches: number;
}

export interface SearchResult {
  strategy: "index" | "scan";
  hits: SearchHit[];
}

export interface TokenState {
  licenseId: string | null;
  availableTokens: number;
  /** ISO-8601 time of the last successful sync (or of seeding) */
  lastSync: string;
}
