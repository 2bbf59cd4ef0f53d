/**
 * Runtime configuration, read from FRAMEVAULT_* environment variables and
 * validated with zod. Every field has a default except the license id and the
 * encryption key, which stay unset unless provided.
 */

import { availableParallelism, homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { AES_KEY_SIZE } from "./constants.js";
import { ArchiveError } from "./errors.js";

export const DEFAULT_MARKETPLACE_URL = "https://marketplace.framevault.example";

/** Half the available processing units, minimum one */
export function defaultConcurrency(): number {
  return Math.max(1, Math.floor(availableParallelism() / 2));
}

export function defaultLedgerPath(): string {
  return join(homedir(), ".framevault", "ledger.json");
}

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value === "" ? undefined : value))
  .optional();

export const CompressionSchema = z.enum(["brotli", "gzip", "store"]);

export const LogLevelSchema = z.enum([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

export const ConfigSchema = z.object({
  FRAMEVAULT_LEDGER_PATH: optionalString,
  FRAMEVAULT_LICENSE_ID: optionalString,
  FRAMEVAULT_MARKETPLACE_URL: z.string().url().default(DEFAULT_MARKETPLACE_URL),
  FRAMEVAULT_MARKETPLACE_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .min(100)
    .max(120_000)
    .default(15_000),
  FRAMEVAULT_COMPRESSION: CompressionSchema.default("brotli"),
  FRAMEVAULT_CONCURRENCY: z.coerce.number().int().min(1).max(256).optional(),
  FRAMEVAULT_ENCRYPTION_KEY: optionalString.pipe(
    z
      .string()
      .regex(/^[0-9a-fA-F]+$/, "must be hexadecimal")
      .length(AES_KEY_SIZE * 2, `must be ${AES_KEY_SIZE * 2} hex characters`)
      .optional()
  ),
  FRAMEVAULT_FREE_TOKENS: z.coerce.number().int().min(0).default(1),
  FRAMEVAULT_SEARCH_LIMIT: z.coerce.number().int().min(1).default(100),
  FRAMEVAULT_LOG_LEVEL: LogLevelSchema.default("info"),
});

export interface Config {
  ledgerPath: string;
  licenseId?: string;
  marketplaceUrl: string;
  marketplaceTimeoutMs: number;
  compression: z.infer<typeof CompressionSchema>;
  concurrency: number;
  encryptionKey?: Uint8Array;
  freeTokens: number;
  searchLimit: number;
  logLevel: z.infer<typeof LogLevelSchema>;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): Config {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ArchiveError("INVALID_ARGUMENT", `Invalid configuration: ${issues}`, {
      cause: parsed.error,
    });
  }
  const values = parsed.data;
  return {
    ledgerPath: values.FRAMEVAULT_LEDGER_PATH ?? defaultLedgerPath(),
    licenseId: values.FRAMEVAULT_LICENSE_ID,
    marketplaceUrl: values.FRAMEVAULT_MARKETPLACE_URL,
    marketplaceTimeoutMs: values.FRAMEVAULT_MARKETPLACE_TIMEOUT_MS,
    compression: values.FRAMEVAULT_COMPRESSION,
    concurrency: values.FRAMEVAULT_CONCURRENCY ?? defaultConcurrency(),
    encryptionKey: values.FRAMEVAULT_ENCRYPTION_KEY
      ? Uint8Array.from(Buffer.from(values.FRAMEVAULT_ENCRYPTION_KEY, "hex"))
      : undefined,
    freeTokens: values.FRAMEVAULT_FREE_TOKENS,
    searchLimit: values.FRAMEVAULT_SEARCH_LIMIT,
    logLevel: values.FRAMEVAULT_LOG_LEVEL,
  };
}
