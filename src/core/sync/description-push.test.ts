import assert from "node:assert/strict";
import test from "node:test";
import { InMemorySyncMappingRepository } from "../database/repositories";
import type { SyncMapping } from "../types/job";
import { pushDescriptions, translatedDescription } from "./description-push";
import { FakeWooCommerce } from "./fake-catalog";

const snapshot = (meta: Record<string, string>): string =>
  JSON.stringify({
    name: "Trail Jacket",
    description: "Waterproof shell.",
    meta_data: Object.entries(meta).map(([key, value]) => ({ key, value })),
  });

const mapping = (externalId: string, remoteProductId: number | null, lastPayloadSnapshot: string | null): SyncMapping => ({
  siteId: "fixture-shop",
  externalId,
  remoteProductId,
  lastSyncStatus: "success",
  lastSyncedAt: "2026-03-01T00:00:00.000Z",
  lastPayloadSnapshot,
  lastError: null,
});

async function setup() {
  const fake = new FakeWooCommerce();
  fake.products.set(500, { name: "Trail Jacket", description: "Waterproof shell.", sku: "A-1" });
  fake.products.set(501, { name: "Rain Cap", description: "Packable.", sku: "B-2" });

  const mappings = new InMemorySyncMappingRepository();
  await mappings.save(mapping("A-1", 500, snapshot({ brand: "Fixture Shop", description_translated: "Veste imperméable." })));
  await mappings.save(mapping("B-2", 501, snapshot({ brand: "Fixture Shop" })));
  await mappings.save(mapping("C-3", 502, snapshot({ description_translated: "Introuvable." })));
  await mappings.save(mapping("D-4", null, snapshot({ description_translated: "Jamais créé." })));
  return { fake, mappings, client: fake.client() };
}

test("translated descriptions are pushed to mapped products only", async () => {
  const { fake, mappings, client } = await setup();

  const stats = await pushDescriptions({ client, mappings });

  assert.deepEqual(stats, { total: 3, updated: 1, skipped: 1, failed: 1 });
  assert.deepEqual(
    fake.calls("PUT", /\/products\/\d+$/).map((r) => [r.path.split("/").pop(), r.body]),
    [
      ["500", { description: "Veste imperméable." }],
      ["502", { description: "Introuvable." }],
    ],
  );
  assert.deepEqual(fake.products.get(500), {
    name: "Trail Jacket",
    description: "Veste imperméable.",
    sku: "A-1",
  });
  assert.equal(fake.products.get(501)?.description, "Packable.");
});

test("a dry run counts without calling the catalog", async () => {
  const { fake, mappings, client } = await setup();

  const stats = await pushDescriptions({ client, mappings }, { dryRun: true });

  assert.deepEqual(stats, { total: 3, updated: 2, skipped: 1, failed: 0 });
  assert.equal(fake.requests.length, 0);
});

test("the limit caps how many mappings are visited", async () => {
  const { fake, mappings, client } = await setup();

  const stats = await pushDescriptions({ client, mappings }, { limit: 1 });

  assert.deepEqual(stats, { total: 1, updated: 1, skipped: 0, failed: 0 });
  assert.equal(fake.calls("PUT", /\/products\/500$/).length, 1);
});

test("snapshots without a usable translation yield nothing", () => {
  assert.equal(translatedDescription(null), null);
  assert.equal(translatedDescription("not json"), null);
  assert.equal(translatedDescription('{"meta_data":"oops"}'), null);
  assert.equal(translatedDescription(snapshot({ description_translated: "  " })), null);
  assert.equal(translatedDescription(snapshot({ description_translated: "Veste." })), "Veste.");
});
