export { ArchiveEngine, DEFAULT_SEARCH_LIMIT } from "./archive.js";
export type { ArchiveEngineOptions } from "./archive.js";
export { ArchiveReader } from "./archive-reader.js";
export { createClient } from "./client.js";
export type { Client, ClientOptions } from "./client.js";
export { CodecPool, FrameCodec } from "./codec-pool.js";
export type { CodecPoolOptions } from "./codec-pool.js";
export { CompressionEngine } from "./compression.js";
export type { CompressionEngineOptions } from "./compression.js";
export { loadConfig, defaultConcurrency, defaultLedgerPath } from "./config.js";
export type { Config } from "./config.js";
export { ARCHIVE_MAGIC, FORMAT_VERSION, HEADER_SIZE } from "./constants.js";
export { crc32 } from "./crc32.js";
export { ArchiveError, isArchiveError } from "./errors.js";
export type { ArchiveErrorCode } from "./errors.js";
export {
  algorithmFromTag,
  decodeHeader,
  encodeHeader,
  tagFromAlgorithm,
} from "./header.js";
export { httpStatusForError } from "./http-status.js";
export { decodeIndex, encodeIndex } from "./index-block.js";
export { UsageLedger } from "./ledger.js";
export type { LicenseAuthority, LicenseStatus, UsageLedgerOptions } from "./ledger.js";
export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { MarketplaceClient } from "./marketplace.js";
export type { MarketplaceClientOptions, PurchaseOrder } from "./marketplace.js";
export { normalizeText, tokenize } from "./search-index.js";
export type * from "./types.js";
