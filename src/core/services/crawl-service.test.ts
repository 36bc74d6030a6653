import assert from "node:assert/strict";
import test from "node:test";
import { adapter as template } from "../../sites/apparel/_template/adapter";
import { InMemorySyncMappingRepository } from "../database/repositories";
import { ConfigurationError } from "../errors";
import type { RunOptions } from "../execution/orchestrator";
import { FakeWooCommerce } from "../sync/fake-catalog";
import type { ScrapeJob } from "../types/job";
import type { CanonicalProduct } from "../types/product";
import type { SiteProfile } from "../types/site";
import { createSyncEngine, resolveSiteKeys, runCrawl, sharedAttributeService } from "./crawl-service";

const profile = (key: string): SiteProfile => ({ ...template, key, displayName: key });

const sites = new Map<string, SiteProfile>([
  ["alpha", profile("alpha")],
  ["beta", profile("beta")],
  ["gamma", profile("gamma")],
]);

const job = (siteId: string, overrides: Partial<ScrapeJob> = {}): ScrapeJob => ({
  id: 1,
  siteId,
  status: "success",
  startedAt: "2026-03-01T00:00:00.000Z",
  finishedAt: "2026-03-01T00:05:00.000Z",
  totalFound: 3,
  totalCreated: 3,
  totalUpdated: 0,
  totalFailed: 0,
  errorMessage: null,
  ...overrides,
});

/** Records every run and answers through `outcome`. */
function recorder(outcome: (site: SiteProfile) => Promise<ScrapeJob>) {
  const runs: { site: string; options: RunOptions }[] = [];
  const createOrchestrator = () => ({
    run: (site: SiteProfile, options: RunOptions = {}) => {
      runs.push({ site: site.key, options });
      return outcome(site);
    },
  });
  return { runs, createOrchestrator };
}

test("unknown site keys are a configuration error", async () => {
  const { runs, createOrchestrator } = recorder(async (site) => job(site.key));

  await assert.rejects(runCrawl({ siteKeys: ["alpha", "nope"] }, { sites, createOrchestrator }), (error) => {
    assert.ok(error instanceof ConfigurationError);
    assert.match(error.message, /^Unknown site\(s\): nope\./);
    return true;
  });
  assert.equal(runs.length, 0);
});

test("unknown categories are a configuration error", () => {
  assert.throws(() => resolveSiteKeys({ category: "shoes" }, sites), ConfigurationError);
});

test("a category resolves to its sites in registry order", () => {
  assert.deepEqual(resolveSiteKeys({ category: "apparel" }), ["nike", "tommy-hilfiger", "lululemon"]);
  assert.deepEqual(resolveSiteKeys({}), ["nike", "tommy-hilfiger", "lululemon"]);
  assert.deepEqual(resolveSiteKeys({ category: "template" }), ["_template"]);
});

test("explicit site keys win over the category and are deduplicated", () => {
  assert.deepEqual(resolveSiteKeys({ siteKeys: ["beta", "alpha", "beta"], category: "apparel" }, sites), [
    "beta",
    "alpha",
  ]);
});

test("sites run sequentially with maxItems passed through", async () => {
  const { runs, createOrchestrator } = recorder(async (site) => job(site.key));

  const results = await runCrawl({ siteKeys: ["gamma", "alpha"], maxItems: 5 }, { sites, createOrchestrator });

  assert.deepEqual(runs, [
    { site: "gamma", options: { maxItems: 5 } },
    { site: "alpha", options: { maxItems: 5 } },
  ]);
  assert.deepEqual(
    results.map((r) => [r.siteKey, r.success, r.error]),
    [
      ["gamma", true, undefined],
      ["alpha", true, undefined],
    ],
  );
});

test("a failing site is recorded and the next site still runs", async () => {
  const { runs, createOrchestrator } = recorder(async (site) => {
    if (site.key === "alpha") throw new Error("listing endpoint moved");
    if (site.key === "beta") return job(site.key, { status: "failed", errorMessage: "HTTP 403" });
    return job(site.key);
  });

  const results = await runCrawl({ siteKeys: ["alpha", "beta", "gamma"] }, { sites, createOrchestrator });

  assert.deepEqual(
    runs.map((r) => r.site),
    ["alpha", "beta", "gamma"],
  );
  assert.deepEqual(
    results.map((r) => [r.siteKey, r.success, r.error]),
    [
      ["alpha", false, "listing endpoint moved"],
      ["beta", false, "HTTP 403"],
      ["gamma", true, undefined],
    ],
  );
  assert.equal(results[1]?.job?.status, "failed");
  assert.equal(results[0]?.job, undefined);
});

test("a configuration error stops the crawl", async () => {
  const { runs, createOrchestrator } = recorder(async () => {
    throw new ConfigurationError("WORDPRESS_BASE_URL must be set");
  });

  await assert.rejects(runCrawl({ siteKeys: ["alpha", "beta"] }, { sites, createOrchestrator }), ConfigurationError);
  assert.equal(runs.length, 1);
});

const sweater = (siteId: string): CanonicalProduct => ({
  siteId,
  externalId: "SW-1",
  title: "Wool Sweater",
  description: "",
  slug: "wool-sweater",
  price: 80,
  originalPrice: null,
  discountPercentage: null,
  currency: "USD",
  status: "published",
  inStock: true,
  images: [],
  variantMatrix: [
    {
      colourLabel: "Grey",
      colourSlug: "grey",
      colourCode: null,
      swatchUrl: null,
      pdpUrl: null,
      basePrice: 80,
      originalPrice: null,
      currency: "USD",
      discountPercentage: null,
      soldOut: false,
      images: [],
      sizeVariants: [{ size: "M", sku: null, stockAvailable: true, price: null }],
    },
  ],
  meta: { brand: siteId },
  sourceUrl: `https://${siteId}.test/p/wool-sweater`,
});

test("one catalog client keeps one attribute service", () => {
  const fake = new FakeWooCommerce();
  const client = fake.client();

  assert.equal(sharedAttributeService(client), sharedAttributeService(client));
  assert.notEqual(sharedAttributeService(client), sharedAttributeService(fake.client()));
});

test("attributes are looked up once for every crawl in the process", async () => {
  const fake = new FakeWooCommerce();
  const client = fake.client();
  const mappings = new InMemorySyncMappingRepository();
  const createOrchestrator = () => ({
    run: async (site: SiteProfile) => {
      await createSyncEngine(client, mappings).sync(sweater(site.key));
      return job(site.key);
    },
  });
  const attributeLookups = () => fake.calls("GET", /\/products\/attributes$/).length;

  await runCrawl({ siteKeys: ["alpha"] }, { sites, createOrchestrator });
  const afterFirst = attributeLookups();
  const results = await runCrawl({ siteKeys: ["beta", "gamma"] }, { sites, createOrchestrator });

  assert.deepEqual(
    results.map((r) => r.success),
    [true, true],
  );
  assert.ok(afterFirst > 0);
  assert.equal(attributeLookups(), afterFirst);
  assert.deepEqual(
    fake.attributes.map((a) => a.name),
    ["Color", "Size"],
  );
  assert.equal(fake.calls("POST", /\/products\/attributes$/).length, 2);
  assert.equal(fake.calls("POST", /\/products$/).length, 3);
});
