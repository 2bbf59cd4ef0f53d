import { randomBytes } from "node:crypto";
import { mkdir, readFile, rename, unlink, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import Mutex from "p-mutex";
import { z } from "zod";
import { ArchiveError, wrapError } from "./errors.js";
import { componentLogger, type Logger } from "./logger.js";
import type { TokenState } from "./types.js";
import { isNotFound } from "./utils.js";

export const DEFAULT_FREE_TOKENS = 1;

/** Answer from the remote license authority */
export interface LicenseStatus {
  isValid: boolean;
  availableTokens: number;
  /** ISO-8601 time the authority last synced the license */
  lastSync: string;
}

export interface LicenseAuthority {
  validateLicense(licenseId: string): Promise<LicenseStatus>;
}

const TokenStateSchema = z.object({
  licenseId: z.string().min(1).nullable(),
  availableTokens: z.number().int().min(0),
  lastSync: z.string(),
});

export interface UsageLedgerOptions {
  /** Location of the JSON state file */
  path: string;
  licenseId?: string;
  /** Tokens granted when no state file exists yet */
  freeTokens?: number;
  authority?: LicenseAuthority;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Token ledger backed by a JSON file. Every operation runs under one mutex,
 * and a change is written to disk before it becomes visible in memory, so a
 * failed write leaves both the file and the in-memory state as they were.
 */
export class UsageLedger {
  readonly path: string;
  #state: TokenState;
  #mutex = new Mutex();
  #authority: LicenseAuthority | undefined;
  #log: Logger;
  #now: () => Date;

  private constructor(
    path: string,
    state: TokenState,
    authority: LicenseAuthority | undefined,
    log: Logger,
    now: () => Date
  ) {
    this.path = path;
    this.#state = state;
    this.#authority = authority;
    this.#log = log;
    this.#now = now;
  }

  static async open({
    path,
    licenseId,
    freeTokens = DEFAULT_FREE_TOKENS,
    authority,
    logger,
    now = () => new Date(),
  }: UsageLedgerOptions): Promise<UsageLedger> {
    if (!Number.isInteger(freeTokens) || freeTokens < 0) {
      throw new ArchiveError(
        "INVALID_ARGUMENT",
        `Free token allotment must be a non-negative integer (got ${freeTokens})`
      );
    }
    const log = componentLogger(logger, "ledger");
    const stored = await loadState(path);
    let state: TokenState;
    if (stored === undefined) {
      state = {
        licenseId: licenseId ?? null,
        availableTokens: freeTokens,
        lastSync: now().toISOString(),
      };
      await persistState(path, state, log);
      log.info({ path, availableTokens: freeTokens }, "Seeded new token ledger");
    } else if (licenseId !== undefined && licenseId !== stored.licenseId) {
      state = { ...stored, licenseId };
      await persistState(path, state, log);
    } else {
      state = stored;
    }
    return new UsageLedger(path, state, authority, log, now);
  }

  /**
   * Spend one token.
   *
   * @returns Tokens remaining after the charge
   */
  consumeToken(): Promise<number> {
    return this.#mutex.withLock(async () => {
      if (this.#state.availableTokens <= 0) {
        this.#log.warn("No tokens available");
        throw new ArchiveError("NO_TOKENS_AVAILABLE", "No tokens available");
      }
      const next = {
        ...this.#state,
        availableTokens: this.#state.availableTokens - 1,
      };
      await persistState(this.path, next, this.#log);
      this.#state = next;
      this.#log.debug({ availableTokens: next.availableTokens }, "Token consumed");
      return next.availableTokens;
    });
  }

  availableTokens(): Promise<number> {
    return this.#mutex.withLock(() => this.#state.availableTokens);
  }

  state(): Promise<TokenState> {
    return this.#mutex.withLock(() => ({ ...this.#state }));
  }

  /**
   * Replace the local count with the authority's. Without a license id
   * there is nothing to validate and `false` is returned.
   */
  validateOnline(): Promise<boolean> {
    return this.#mutex.withLock(async () => {
      const { licenseId } = this.#state;
      if (licenseId === null) return false;
      if (!this.#authority) {
        throw new ArchiveError(
          "REMOTE_AUTHORITY_FAILURE",
          "No license authority configured"
        );
      }
      let status: LicenseStatus;
      try {
        status = await this.#authority.validateLicense(licenseId);
      } catch (err) {
        this.#log.warn({ err }, "License validation failed");
        throw wrapError(err, "REMOTE_AUTHORITY_FAILURE", "License validation failed");
      }
      if (!status.isValid) {
        this.#log.warn("License rejected by authority");
        throw new ArchiveError(
          "REMOTE_AUTHORITY_FAILURE",
          "License is not valid"
        );
      }
      if (!Number.isInteger(status.availableTokens) || status.availableTokens < 0) {
        throw new ArchiveError(
          "REMOTE_AUTHORITY_FAILURE",
          `Authority returned an invalid token count: ${status.availableTokens}`
        );
      }
      const next: TokenState = {
        licenseId,
        availableTokens: status.availableTokens,
        lastSync: this.#now().toISOString(),
      };
      await persistState(this.path, next, this.#log);
      this.#state = next;
      this.#log.info(
        { availableTokens: next.availableTokens },
        "Token balance synced"
      );
      return true;
    });
  }
}

async function loadState(path: string): Promise<TokenState | undefined> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    if (isNotFound(err)) return undefined;
    throw new ArchiveError("PERSISTENCE_FAILURE", `Cannot read ledger ${path}`, {
      path,
      cause: err,
    });
  }
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new ArchiveError("PERSISTENCE_FAILURE", `Ledger ${path} is not valid JSON`, {
      path,
      cause: err,
    });
  }
  const parsed = TokenStateSchema.safeParse(json);
  if (!parsed.success) {
    throw new ArchiveError("PERSISTENCE_FAILURE", `Ledger ${path} is malformed`, {
      path,
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/** Write to a private temp file, then rename it over the state file */
async function persistState(
  path: string,
  state: TokenState,
  log: Logger
): Promise<void> {
  const tempPath = `${path}.tmp-${randomBytes(6).toString("hex")}`;
  try {
    await mkdir(dirname(path), { recursive: true, mode: 0o700 });
    await writeFile(tempPath, JSON.stringify(state, null, 2) + "\n", {
      mode: 0o600,
    });
    await rename(tempPath, path);
  } catch (err) {
    await unlink(tempPath).catch((cleanupErr: unknown) => {
      if (!isNotFound(cleanupErr)) {
        log.warn({ err: cleanupErr, path: tempPath }, "Could not remove temp file");
      }
    });
    throw new ArchiveError("PERSISTENCE_FAILURE", `Cannot write ledger ${path}`, {
      path,
      cause: err,
    });
  }
}
