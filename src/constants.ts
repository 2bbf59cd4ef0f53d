// Archive format constants (stored in file byte order)
export const ARCHIVE_MAGIC = 0x46564c54; // "FVLT"

// Version constants
export const FORMAT_VERSION = 1;
export const MAX_SUPPORTED_VERSION = 1;

// Compression tags
export const COMPRESSION_TAG_STORE = 0;
export const COMPRESSION_TAG_BROTLI = 1;
export const COMPRESSION_TAG_GZIP = 2;

// Encryption tags
export const ENCRYPTION_TAG_NONE = 0;
export const ENCRYPTION_TAG_AES_256_GCM = 1;

// Index flags
export const INDEX_FLAG_SEARCH = 0b0000_0001;

// Size constants
export const HEADER_SIZE = 64;
export const CHECKSUM_SIZE = 32; // SHA-256
export const INDEX_ENTRY_FIXED_SIZE = 2 + 8 + 8 + 8 + 8 + 4 + 4;
export const AES_KEY_SIZE = 32;
export const AES_IV_SIZE = 12;
export const AES_TAG_SIZE = 16;

// Limits
export const MAX_2_BYTE = 0xffff;
export const MAX_4_BYTE = 0xffffffff;
export const MIN_TOKEN_LENGTH = 2;
export const MAX_TOKEN_LENGTH = 64;
/** Bytes inspected when deciding whether content is binary */
export const BINARY_SNIFF_SIZE = 8 * 1024;

/** Big-endian for DataView methods */
export const BIG_ENDIAN = false;
