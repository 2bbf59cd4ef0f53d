import { isArchiveError, type ArchiveErrorCode } from "./errors.js";

const STATUS_BY_CODE: Partial<Record<ArchiveErrorCode, number>> = {
  INVALID_ARGUMENT: 400,
  NO_TOKENS_AVAILABLE: 402,
  PARTIAL_EXTRACT_FAILURE: 404,
  INVALID_FORMAT: 422,
  UNSUPPORTED_VERSION: 422,
  UNSUPPORTED_ALGORITHM: 422,
  CHECKSUM_MISMATCH: 422,
  REMOTE_AUTHORITY_FAILURE: 502,
  PERSISTENCE_FAILURE: 503,
};

/** HTTP status a service layer should answer with for a failed operation */
export function httpStatusForError(error: unknown): number {
  if (!isArchiveError(error)) return 500;
  return STATUS_BY_CODE[error.code] ?? 500;
}
