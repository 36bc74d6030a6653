import assert from "node:assert/strict";
import test from "node:test";
import type { CrawlOptions, CrawlResult } from "./crawl-service";
import { processCrawlJob } from "./queue";

test("a crawl job passes its data to the crawl and reports partial failure", async () => {
  const seen: CrawlOptions[] = [];
  const crawl = async (options: CrawlOptions = {}): Promise<CrawlResult[]> => {
    seen.push(options);
    return [
      { siteKey: "nike", success: true },
      { siteKey: "lululemon", success: false, error: "render timed out" },
    ];
  };

  const result = await processCrawlJob({ id: "7", data: { category: "apparel", maxItems: 3 } }, crawl);

  assert.deepEqual(seen, [{ siteKeys: undefined, category: "apparel", maxItems: 3 }]);
  assert.equal(result.success, false);
  assert.equal(result.results.length, 2);
});

test("a crawl that throws fails the job", async () => {
  const crawl = async (): Promise<CrawlResult[]> => {
    throw new Error("Unknown site(s): shoes");
  };

  await assert.rejects(processCrawlJob({ id: "8", data: { siteKeys: ["shoes"] } }, crawl), /Unknown site/);
});
