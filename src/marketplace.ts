import { z } from "zod";
import { DEFAULT_MARKETPLACE_URL } from "./config.js";
import { ArchiveError, wrapError } from "./errors.js";
import type { LicenseAuthority, LicenseStatus } from "./ledger.js";
import { componentLogger, type Logger } from "./logger.js";

export const DEFAULT_TIMEOUT_MS = 15_000;

const ValidateResponseSchema = z.object({
  is_valid: z.boolean(),
  available_tokens: z.number().int().min(0),
  last_sync: z.string(),
});

const PurchaseResponseSchema = z.object({
  payment_url: z.string().url(),
  order_id: z.string().min(1),
});

export interface PurchaseOrder {
  paymentUrl: string;
  orderId: string;
}

export interface MarketplaceClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
  logger?: Logger;
}

/** HTTP client for the token marketplace that issues and counts licenses */
export class MarketplaceClient implements LicenseAuthority {
  readonly baseUrl: string;
  #timeoutMs: number;
  #fetch: typeof fetch;
  #log: Logger;

  constructor({
    baseUrl = DEFAULT_MARKETPLACE_URL,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    fetch: fetchImpl = globalThis.fetch,
    logger,
  }: MarketplaceClientOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.#timeoutMs = timeoutMs;
    this.#fetch = fetchImpl;
    this.#log = componentLogger(logger, "marketplace");
  }

  async validateLicense(licenseId: string): Promise<LicenseStatus> {
    const body = await this.#request("/api/v1/tokens/validate", {
      method: "GET",
      headers: { Authorization: `Bearer ${licenseId}` },
    });
    const parsed = parseBody(ValidateResponseSchema, body, "validate");
    return {
      isValid: parsed.is_valid,
      availableTokens: parsed.available_tokens,
      lastSync: parsed.last_sync,
    };
  }

  /** Start a token purchase; the buyer completes it at `paymentUrl` */
  async initiatePurchase(
    licenseId: string,
    tokenCount: number
  ): Promise<PurchaseOrder> {
    if (!Number.isInteger(tokenCount) || tokenCount < 1) {
      throw new ArchiveError(
        "INVALID_ARGUMENT",
        `Token count must be a positive integer (got ${tokenCount})`
      );
    }
    const body = await this.#request("/api/v1/tokens/purchase", {
      method: "POST",
      headers: {
        Authorization: `Bearer ${licenseId}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({ token_count: tokenCount }),
    });
    const parsed = parseBody(PurchaseResponseSchema, body, "purchase");
    this.#log.info({ orderId: parsed.order_id, tokenCount }, "Purchase initiated");
    return { paymentUrl: parsed.payment_url, orderId: parsed.order_id };
  }

  async #request(path: string, init: RequestInit): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    let response: Response;
    try {
      response = await this.#fetch(url, {
        ...init,
        signal: AbortSignal.timeout(this.#timeoutMs),
      });
    } catch (err) {
      throw wrapError(err, "REMOTE_AUTHORITY_FAILURE", `Request to ${url} failed`, {
        context: { url },
      });
    }
    if (!response.ok) {
      throw new ArchiveError(
        "REMOTE_AUTHORITY_FAILURE",
        `Marketplace responded ${response.status} for ${path}`,
        { context: { url, status: String(response.status) } }
      );
    }
    try {
      return await response.json();
    } catch (err) {
      throw new ArchiveError(
        "REMOTE_AUTHORITY_FAILURE",
        `Marketplace returned a non-JSON body for ${path}`,
        { context: { url }, cause: err }
      );
    }
  }
}

function parseBody<T>(schema: z.ZodType<T>, body: unknown, operation: string): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new ArchiveError(
      "REMOTE_AUTHORITY_FAILURE",
      `Malformed ${operation} response from marketplace`,
      { context: { operation }, cause: parsed.error }
    );
  }
  return parsed.data;
}
