/** Stable archive error codes. */
export type ArchiveErrorCode =
  | "INVALID_FORMAT"
  | "UNSUPPORTED_VERSION"
  | "UNSUPPORTED_ALGORITHM"
  | "CHECKSUM_MISMATCH"
  | "ARCHIVE_READ_FAILURE"
  | "ARCHIVE_WRITE_FAILURE"
  | "COMPRESSION_FAILURE"
  | "DECOMPRESSION_FAILURE"
  | "NO_TOKENS_AVAILABLE"
  | "PERSISTENCE_FAILURE"
  | "PARTIAL_EXTRACT_FAILURE"
  | "REMOTE_AUTHORITY_FAILURE"
  | "INVALID_ARGUMENT";

// Data problems: retrying the same call can never succeed.
const NON_RETRIABLE: ReadonlySet<ArchiveErrorCode> = new Set([
  "INVALID_FORMAT",
  "UNSUPPORTED_VERSION",
  "UNSUPPORTED_ALGORITHM",
  "CHECKSUM_MISMATCH",
  "INVALID_ARGUMENT",
]);

export interface ArchiveErrorOptions {
  /** Archive-relative or filesystem path the error relates to */
  path?: string;
  /** Additional context for serialization */
  context?: Record<string, string>;
  cause?: unknown;
}

/** Error thrown by every archive, compression and ledger operation. */
export class ArchiveError extends Error {
  /** Machine-readable error code. */
  readonly code: ArchiveErrorCode;
  readonly path?: string;
  readonly context?: Record<string, string>;

  constructor(
    code: ArchiveErrorCode,
    message: string,
    options: ArchiveErrorOptions = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ArchiveError";
    this.code = code;
    this.path = options.path;
    this.context = options.context;
  }

  /** Whether the calling collaborator may reasonably retry the operation. */
  get retriable(): boolean {
    return !NON_RETRIABLE.has(this.code);
  }

  toJSON(): {
    name: string;
    code: ArchiveErrorCode;
    message: string;
    path?: string;
    context?: Record<string, string>;
    cause?: string;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.path === undefined ? {} : { path: this.path }),
      ...(this.context === undefined ? {} : { context: this.context }),
      ...(this.cause === undefined ? {} : { cause: describeCause(this.cause) }),
    };
  }
}

export function isArchiveError(
  value: unknown,
  code?: ArchiveErrorCode
): value is ArchiveError {
  return (
    value instanceof ArchiveError && (code === undefined || value.code === code)
  );
}

/**
 * Wrap an unknown failure with operation context. ArchiveErrors keep their
 * code and message so the innermost, most specific code wins; context keys
 * they do not carry yet are added.
 */
export function wrapError(
  err: unknown,
  code: ArchiveErrorCode,
  message: string,
  options: Omit<ArchiveErrorOptions, "cause"> = {}
): ArchiveError {
  if (err instanceof ArchiveError) return withContext(err, options.context);
  return new ArchiveError(code, `${message}: ${describeCause(err)}`, {
    ...options,
    cause: err,
  });
}

function withContext(
  error: ArchiveError,
  context: Record<string, string> | undefined
): ArchiveError {
  if (!context) return error;
  const inner = error.context ?? {};
  if (Object.keys(context).every((key) => key in inner)) return error;
  return new ArchiveError(error.code, error.message, {
    path: error.path,
    context: { ...context, ...inner },
    cause: error.cause,
  });
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
