import { ArchiveEngine } from "./archive.js";
import { CompressionEngine } from "./compression.js";
import { loadConfig, type Config } from "./config.js";
import { ArchiveError } from "./errors.js";
import { UsageLedger, type LicenseAuthority } from "./ledger.js";
import { createLogger, type Logger } from "./logger.js";
import { MarketplaceClient, type PurchaseOrder } from "./marketplace.js";
import type {
  ArchiveListing,
  ArchiveSummary,
  CreateOptions,
  ExtractResult,
  SearchOptions,
  SearchResult,
} from "./types.js";

export interface ClientOptions {
  /** Defaults to `loadConfig()` */
  config?: Config;
  logger?: Logger;
  /** Replaces the HTTP marketplace client, e.g. in tests */
  marketplace?: LicenseAuthority & Pick<MarketplaceClient, "initiatePurchase">;
}

export interface Client {
  create(
    outputPath: string,
    inputPaths: readonly string[],
    options?: CreateOptions
  ): Promise<ArchiveSummary>;
  extract(
    archivePath: string,
    outputs: readonly string[] | "all",
    destinationDir: string
  ): Promise<ExtractResult>;
  search(
    archivePath: string,
    query: string,
    options?: SearchOptions
  ): Promise<SearchResult>;
  inspect(archivePath: string): Promise<ArchiveListing>;
  verify(archivePath: string): Promise<ArchiveListing>;
  availableTokens(): Promise<number>;
  /** Refresh the token balance from the marketplace */
  syncTokens(): Promise<boolean>;
  buyTokens(count: number): Promise<PurchaseOrder>;
}

/**
 * Wire up the ledger, compression engine, archive engine and marketplace
 * client from one configuration.
 */
export async function createClient({
  config = loadConfig(),
  logger = createLogger({ level: config.logLevel }),
  marketplace,
}: ClientOptions = {}): Promise<Client> {
  const authority =
    marketplace ??
    new MarketplaceClient({
      baseUrl: config.marketplaceUrl,
      timeoutMs: config.marketplaceTimeoutMs,
      logger,
    });
  const ledger = await UsageLedger.open({
    path: config.ledgerPath,
    licenseId: config.licenseId,
    freeTokens: config.freeTokens,
    authority,
    logger,
  });
  const engine = new ArchiveEngine({
    ledger,
    compression: new CompressionEngine({ concurrency: config.concurrency, logger }),
    encryptionKey: config.encryptionKey,
    defaultCompression: config.compression,
    searchLimit: config.searchLimit,
    logger,
  });

  return {
    create: (outputPath, inputPaths, options) =>
      engine.create(outputPath, inputPaths, options),
    extract: (archivePath, outputs, destinationDir) =>
      engine.extract(archivePath, outputs, destinationDir),
    search: (archivePath, query, options) =>
      engine.search(archivePath, query, options),
    inspect: (archivePath) => engine.inspect(archivePath),
    verify: (archivePath) => engine.verify(archivePath),
    availableTokens: () => ledger.availableTokens(),
    syncTokens: () => ledger.validateOnline(),
    async buyTokens(count) {
      const { licenseId } = await ledger.state();
      if (licenseId === null) {
        throw new ArchiveError(
          "INVALID_ARGUMENT",
          "A license id is required to buy tokens"
        );
      }
      return authority.initiatePurchase(licenseId, count);
    },
  };
}
