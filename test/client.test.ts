import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { describe, it, assert, expect, vi } from "vitest";
import { createClient } from "../src/client.js";
import { loadConfig } from "../src/config.js";
import { expectRejection, makeTempDir, silentLogger, writeFiles } from "./utils.js";

function fakeMarketplace() {
  return {
    validateLicense: vi.fn(async () => ({
      isValid: true,
      availableTokens: 3,
      lastSync: "2024-05-01T00:00:00Z",
    })),
    initiatePurchase: vi.fn(async (_licenseId: string, _count: number) => ({
      paymentUrl: "https://pay.test/order/9",
      orderId: "order-9",
    })),
  };
}

async function clientIn(dir: string, env: Record<string, string> = {}) {
  const marketplace = fakeMarketplace();
  const client = await createClient({
    config: loadConfig({
      FRAMEVAULT_LEDGER_PATH: join(dir, "ledger.json"),
      FRAMEVAULT_CONCURRENCY: "1",
      ...env,
    }),
    logger: silentLogger,
    marketplace,
  });
  return { client, marketplace };
}

describe("createClient", () => {
  it("should create, search and extract with the configured defaults", async () => {
    const dir = await makeTempDir();
    const { client } = await clientIn(dir, { FRAMEVAULT_COMPRESSION: "gzip" });
    const inputs = await writeFiles(dir, { "notes.txt": "remember the milk" });
    const archivePath = join(dir, "notes.fvlt");

    const summary = await client.create(archivePath, inputs, { baseDir: dir });
    assert.strictEqual(summary.compression, "gzip");
    assert.strictEqual(await client.availableTokens(), 0);

    const result = await client.search(archivePath, "milk");
    assert.deepEqual(result, { strategy: "index", hits: [{ path: "notes.txt", matches: 1 }] });

    const verified = await client.verify(archivePath);
    assert.strictEqual(verified.entries.length, 1);

    await client.extract(archivePath, ["notes.txt"], join(dir, "out"));
    assert.strictEqual(await readFile(join(dir, "out", "notes.txt"), "utf8"), "remember the milk");
  });

  it("should sync tokens through the marketplace", async () => {
    const dir = await makeTempDir();
    const { client, marketplace } = await clientIn(dir, {
      FRAMEVAULT_LICENSE_ID: "test-license",
    });
    assert.isTrue(await client.syncTokens());
    expect(marketplace.validateLicense).toHaveBeenCalledWith("test-license");
    assert.strictEqual(await client.availableTokens(), 3);
  });

  it("should buy tokens for the configured license", async () => {
    const dir = await makeTempDir();
    const { client, marketplace } = await clientIn(dir, {
      FRAMEVAULT_LICENSE_ID: "test-license",
    });
    const order = await client.buyTokens(10);
    expect(order).toEqual({ paymentUrl: "https://pay.test/order/9", orderId: "order-9" });
    expect(marketplace.initiatePurchase).toHaveBeenCalledWith("test-license", 10);
  });

  it("should require a license id to buy tokens", async () => {
    const dir = await makeTempDir();
    const { client, marketplace } = await clientIn(dir);
    await expectRejection(client.buyTokens(10), "INVALID_ARGUMENT");
    expect(marketplace.initiatePurchase).not.toHaveBeenCalled();
    assert.isFalse(await client.syncTokens());
  });
});
