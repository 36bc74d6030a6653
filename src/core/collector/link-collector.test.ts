import assert from "node:assert/strict";
import test from "node:test";
import { FetchEngine } from "../fetch/engine";
import type { Renderer, RenderRequest, RenderResult } from "../render/bridge";
import type { HttpRequest, HttpResponse } from "../types/fetch";
import type { SiteProfile } from "../types/site";
import { dedupeByBaseProduct } from "../utils/url";
import { extractApiLinks, LinkCollector } from "./link-collector";

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
      price: [],
      originalPrice: [],
      discount: [],
      images: [],
      sizes: [],
      colourLinks: [],
      colourLabel: [],
    },
  },
  productUrlPattern: /\/t\//,
  pacing: { roundSleepMs: 0 },
};

/** Listing of `total` products spread over pages of 24; each product also appears in a second colour. */
function listingPage(offset: number, total: number): string {
  const products = [];
  for (let n = offset; n < Math.min(total, offset + 24); n++) {
    products.push({ pdpUrl: { url: `${ORIGIN}/t/shoe-${n}/SKU-${n}-A` } });
    products.push({ pdpUrl: { path: `/t/shoe-${n}/SKU-${n}-B` } });
  }
  return JSON.stringify({ productGroupings: [{ products }] });
}

function json(url: string, body: string): HttpResponse {
  return { status: 200, url, body, contentType: "application/json", retryAfterSeconds: null };
}

function collectorFor(transport: (req: HttpRequest) => Promise<HttpResponse>): LinkCollector {
  const fetcher = new FetchEngine({ transport, maxAttempts: 1, waveSleepMs: 0, sleep: async () => {} });
  const renderer: Renderer = {
    render: async () => {
      throw new Error("no render expected");
    },
  };
  return new LinkCollector({ fetcher, renderer, sleep: async () => {} });
}

const anchorOf = (url: string): number => Number(new URL(url).searchParams.get("anchor"));

test("24 + 10 + 0 listing rounds collect 34 product URLs", async () => {
  const anchors: number[] = [];
  const collector = collectorFor(async (req) => {
    anchors.push(anchorOf(req.url));
    return json(req.url, listingPage(anchorOf(req.url), 34));
  });

  const result = await collector.collect(site, { concurrency: 1 });

  assert.equal(result.urls.length, 34);
  assert.equal(result.exhausted, true);
  assert.deepEqual(anchors, [0, 24, 48]);
  assert.equal(result.urls[0], `${ORIGIN}/t/shoe-0/SKU-0-A`);
  assert.equal(result.urls[33], `${ORIGIN}/t/shoe-33/SKU-33-A`);
});

test("collect is idempotent and base-product dedup is a no-op on its output", async () => {
  const collector = collectorFor(async (req) => json(req.url, listingPage(anchorOf(req.url), 34)));

  const first = await collector.collect(site, { concurrency: 3 });
  const second = await collector.collect(site, { concurrency: 3 });

  assert.deepEqual(first.urls, second.urls);
  assert.deepEqual(dedupeByBaseProduct(first.urls), first.urls);
  assert.equal(first.rounds, 2);
});

test("an empty round with failed pages is retried before stopping", async () => {
  let failuresLeft = 1;
  const collector = collectorFor(async (req) => {
    if (anchorOf(req.url) === 24 && failuresLeft > 0) {
      failuresLeft--;
      return { status: 404, url: req.url, body: "", contentType: null, retryAfterSeconds: null };
    }
    return json(req.url, listingPage(anchorOf(req.url), 34));
  });

  const result = await collector.collect(site, { concurrency: 1 });

  assert.equal(result.urls.length, 34);
  assert.equal(result.exhausted, true);
  assert.equal(result.failedPages, 1);
  assert.equal(result.rounds, 4);
});

test("persistent page failures stop collection without claiming exhaustion", async () => {
  const collector = collectorFor(async (req) => {
    if (anchorOf(req.url) >= 24) {
      return { status: 500, url: req.url, body: "", contentType: null, retryAfterSeconds: null };
    }
    return json(req.url, listingPage(anchorOf(req.url), 100));
  });

  const result = await collector.collect(site, { concurrency: 1 });

  assert.equal(result.urls.length, 24);
  assert.equal(result.exhausted, false);
  // one good round, the failing round plus two retries
  assert.equal(result.rounds, 4);
  assert.equal(result.failedPages, 3);
});

test("maxItems cuts the deduplicated list", async () => {
  const collector = collectorFor(async (req) => json(req.url, listingPage(anchorOf(req.url), 34)));

  const result = await collector.collect(site, { concurrency: 2, maxItems: 5 });

  assert.deepEqual(
    result.urls,
    [0, 1, 2, 3, 4].map((n) => `${ORIGIN}/t/shoe-${n}/SKU-${n}-A`),
  );
});

test("rendered listings are rendered once with the item-count parameter", async () => {
  const requests: RenderRequest[] = [];
  const renderer: Renderer = {
    render: async (request): Promise<RenderResult> => {
      requests.push(request);
      return {
        ok: true,
        page: {
          url: request.url,
          html: `<ul>
            <li><a class="tile" href="/t/jacket-1/J1">Jacket</a></li>
            <li><a class="tile" href="/t/jacket-1/J1-RED">Jacket red</a></li>
            <li><a class="tile" href="https://shop.example.com/t/jacket-2/J2">Jacket 2</a></li>
            <li><a class="tile" href="/help/returns">Returns</a></li>
            <li><a class="tile" href="mailto:help@shop.example.com">Mail</a></li>
          </ul>`,
          sideChannel: {},
          attempts: 1,
        },
      };
    },
  };
  const fetcher = new FetchEngine({ transport: async () => json("", "{}"), waveSleepMs: 0 });
  const collector = new LinkCollector({ fetcher, renderer, sleep: async () => {} });

  const result = await collector.collect({
    ...site,
    listing: {
      kind: "rendered_html",
      url: `${ORIGIN}/w/jackets`,
      countParam: "limit",
      targetCount: 200,
      linkSelector: "a.tile",
      waitSelector: ".tile",
    },
  });

  assert.equal(requests.length, 1);
  assert.equal(requests[0].url, `${ORIGIN}/w/jackets?limit=200`);
  assert.equal(requests[0].waitHint, ".tile");
  assert.deepEqual(result.urls, [`${ORIGIN}/t/jacket-1/J1`, `${ORIGIN}/t/jacket-2/J2`]);
});

test("link fields may hold plain strings", () => {
  const links = extractApiLinks(
    { items: [{ href: "/t/cap/C1" }, { href: "javascript:void(0)" }, { name: "no link" }] },
    ["href"],
    ORIGIN,
  );
  assert.deepEqual(links, [`${ORIGIN}/t/cap/C1`]);
});
