import assert from "node:assert/strict";
import test from "node:test";
import { LinkCollector } from "../collector/link-collector";
import { InMemoryJobRepository, InMemorySyncMappingRepository } from "../database/repositories";
import { ConfigurationError, TransientNetworkError } from "../errors";
import { FetchEngine } from "../fetch/engine";
import type { Renderer, RenderRequest } from "../render/bridge";
import { FakeWooCommerce } from "../sync/fake-catalog";
import { SyncEngine, type SyncOutcome } from "../sync/sync-service";
import type { HttpRequest, HttpResponse } from "../types/fetch";
import type { CanonicalProduct } from "../types/product";
import type { SiteProfile } from "../types/site";
import { Orchestrator } from "./orchestrator";

const ORIGIN = "https://shop.example.com";

const site: SiteProfile = {
  key: "fixture-shop",
  displayName: "Fixture Shop",
  origin: ORIGIN,
  currency: "CAD",
  listing: {
    kind: "api",
    endpoint: `${ORIGIN}/api/listing`,
    offsetParam: "anchor",
    countParam: "count",
    pageSize: 24,
    linkFields: ["pdpUrl"],
  },
  detail: {
    via: "http",
    selectors: {
      title: ["h1"],
      description: [],
      price: [".price"],
      originalPrice: [],
      discount: [],
      images: [],
      sizes: ["ul.sizes li"],
      colourLinks: [],
      colourLabel: [],
      externalId: ["[data-testid='style-code']"],
    },
  },
  productUrlPattern: /\/t\//,
  pacing: { roundSleepMs: 0, syncConcurrency: 1, batchSleepMs: 0 },
};

const productUrl = (n: number) => `${ORIGIN}/t/jacket-${n}/J-${n}`;

const detailHtml = (n: number) => `
  <h1>Jacket ${n}</h1>
  <span data-testid="style-code">J-${n}</span>
  <span class="price">$80</span>
  <ul class="sizes"><li>S</li><li class="disabled">M</li></ul>`;

/** Three listed products; the detail page of the third one is missing. */
function transport(req: HttpRequest): Promise<HttpResponse> {
  const url = new URL(req.url);
  if (url.pathname === "/api/listing") {
    const products = url.searchParams.get("anchor") === "0" ? [0, 1, 2].map((n) => ({ pdpUrl: productUrl(n) })) : [];
    return Promise.resolve({
      status: 200,
      url: req.url,
      body: JSON.stringify({ products }),
      contentType: "application/json",
      retryAfterSeconds: null,
    });
  }
  const n = [0, 1].find((i) => productUrl(i) === req.url);
  return Promise.resolve({
    status: n === undefined ? 404 : 200,
    url: req.url,
    body: n === undefined ? "" : detailHtml(n),
    contentType: "text/html",
    retryAfterSeconds: null,
  });
}

const noRender: Renderer = {
  render: async () => {
    throw new Error("no render expected");
  },
};

function pipeline() {
  const fetcher = new FetchEngine({ transport, maxAttempts: 1, waveSleepMs: 0, sleep: async () => {} });
  const collector = new LinkCollector({ fetcher, renderer: noRender, sleep: async () => {} });
  const fake = new FakeWooCommerce();
  const jobs = new InMemoryJobRepository();
  const syncer = new SyncEngine({
    client: fake.client(),
    mappings: new InMemorySyncMappingRepository(),
    defaultCategory: "",
    priceMultiplier: 1,
  });
  const sleeps: number[] = [];
  const deps = {
    jobs,
    collector,
    fetcher,
    renderer: noRender,
    syncer,
    sleep: async (ms: number) => {
      sleeps.push(ms);
    },
  };
  return { deps, fake, jobs, sleeps };
}

const outcomeFor = (product: CanonicalProduct): SyncOutcome => ({
  mapping: {
    siteId: product.siteId,
    externalId: product.externalId,
    remoteProductId: 1,
    lastSyncStatus: "success",
    lastSyncedAt: "2026-03-01T00:00:00.000Z",
    lastPayloadSnapshot: null,
    lastError: null,
  },
  action: "created",
  variations: { created: 0, updated: 0, failed: 0 },
});

test("a run collects, extracts and syncs, counting failed items", async () => {
  const { deps, fake, jobs } = pipeline();
  const orchestrator = new Orchestrator(deps);

  const job = await orchestrator.run(site, { maxItems: 0, debugDump: false });

  assert.equal(job.status, "success");
  assert.equal(job.totalFound, 3);
  assert.equal(job.totalCreated, 2);
  assert.equal(job.totalUpdated, 0);
  assert.equal(job.totalFailed, 1);
  assert.equal(job.errorMessage, null);
  assert.equal(typeof job.startedAt, "string");
  assert.equal(typeof job.finishedAt, "string");
  assert.deepEqual(
    Array.from(fake.products.values()).map((p) => p.sku),
    ["J-0", "J-1"],
  );

  const again = await new Orchestrator(deps).run(site, { maxItems: 0, debugDump: false });

  assert.equal(again.totalCreated, 0);
  assert.equal(again.totalUpdated, 2);
  assert.equal(fake.products.size, 2);
  assert.deepEqual(
    (await jobs.recent("fixture-shop", 5)).map((j) => j.id),
    [again.id, job.id],
  );
});

test("maxItems limits the run and batches are separated by the batch sleep", async () => {
  const { deps, sleeps } = pipeline();

  const job = await new Orchestrator(deps).run(site, {
    maxItems: 2,
    batchSize: 1,
    batchSleepMs: 250,
    debugDump: false,
  });

  assert.equal(job.totalFound, 2);
  assert.equal(job.totalCreated, 2);
  assert.deepEqual(sleeps, [250]);
});

test("a configuration error aborts the job", async () => {
  const { deps } = pipeline();
  let calls = 0;
  const orchestrator = new Orchestrator({
    ...deps,
    syncer: {
      sync: async () => {
        calls++;
        throw new ConfigurationError("WORDPRESS_BASE_URL must be set");
      },
    },
  });

  const job = await orchestrator.run(site, { maxItems: 0, debugDump: false });

  assert.equal(job.status, "failed");
  assert.equal(job.errorMessage, "WORDPRESS_BASE_URL must be set");
  assert.equal(calls, 1);
  assert.equal(job.totalCreated, 0);
});

test("the stored error message is truncated to 1000 characters", async () => {
  const { deps } = pipeline();
  const orchestrator = new Orchestrator({
    ...deps,
    collector: {
      collect: async () => {
        throw new Error("x".repeat(1500));
      },
    },
  });

  const job = await orchestrator.run(site, { debugDump: false });

  assert.equal(job.status, "failed");
  assert.equal(job.errorMessage?.length, 1000);
});

test("the first detail response is dumped once per orchestrator", async () => {
  const { deps } = pipeline();
  const stored: { path: string; html: string }[] = [];
  const orchestrator = new Orchestrator({
    ...deps,
    blobs: {
      store: async (bytes, path) => {
        stored.push({ path, html: bytes.toString("utf8") });
        return path;
      },
    },
  });

  await orchestrator.run(site, { maxItems: 0, debugDump: true });
  await orchestrator.run(site, { maxItems: 0, debugDump: true });

  assert.equal(orchestrator.dumped, true);
  assert.deepEqual(stored, [{ path: "debug/fixture-shop-first-detail.html", html: detailHtml(0) }]);
});

test("rendered detail pages go through the renderer with the side channel", async () => {
  const requests: RenderRequest[] = [];
  const renderer: Renderer = {
    render: async (request) => {
      requests.push(request);
      if (request.url === productUrl(1)) {
        return { ok: false, error: new TransientNetworkError("render timed out"), attempts: 3 };
      }
      return {
        ok: true,
        page: { url: request.url, html: detailHtml(0), sideChannel: {}, attempts: 1 },
      };
    },
  };
  const synced: string[] = [];
  const { deps } = pipeline();
  const orchestrator = new Orchestrator({
    ...deps,
    renderer,
    collector: {
      collect: async () => ({ urls: [productUrl(0), productUrl(1)], exhausted: true, rounds: 1, failedPages: 0 }),
    },
    syncer: {
      sync: async (product) => {
        synced.push(product.externalId);
        return outcomeFor(product);
      },
    },
  });
  const rendered: SiteProfile = {
    ...site,
    detail: { ...site.detail, via: "render", sideChannelName: "COLOR_VARIATIONS", waitSelector: "h1" },
    pacing: { ...site.pacing, renderTimeoutMs: 5000 },
  };

  const job = await orchestrator.run(rendered, { debugDump: false });

  assert.deepEqual(requests[0], {
    url: productUrl(0),
    waitHint: "h1",
    timeoutMs: 5000,
    interactions: true,
  });
  assert.deepEqual(synced, ["J-0"]);
  assert.equal(job.totalCreated, 1);
  assert.equal(job.totalFailed, 1);
});
