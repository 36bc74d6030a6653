import assert from "node:assert/strict";
import test from "node:test";
import type { BinaryResponse } from "../fetch/transport";
import { MemoryBlobStore } from "./blob-store";
import { guessExtension, MediaDownloader, mediaPath, randomToken } from "./downloader";

test("extension comes from the URL when it is a known media type", () => {
  assert.equal(guessExtension("https://cdn.example.com/a/shoe.PNG?w=800", "image/jpeg"), "png");
  assert.equal(guessExtension("https://cdn.example.com/a/clip.mov", null), "mov");
});

test("extension falls back to the content type, then jpg", () => {
  assert.equal(guessExtension("https://cdn.example.com/a/image", "image/webp; charset=binary"), "webp");
  assert.equal(guessExtension("https://cdn.example.com/a/file.cgi", "video/quicktime"), "mov");
  assert.equal(guessExtension("https://cdn.example.com/a/image", "application/octet-stream"), "jpg");
  assert.equal(guessExtension("https://cdn.example.com/a/image", null), "jpg");
});

test("media paths follow products/{site}/{externalId}/{slug}-{token}.{ext}", () => {
  const path = mediaPath({ siteId: "fixture-shop", externalId: "DM0029", name: "Air Runner 90!" }, "webp", "Ab12Cd34");
  assert.equal(path, "products/fixture-shop/DM0029/air-runner-90-Ab12Cd34.webp");
});

test("random tokens are eight alphanumeric characters", () => {
  assert.equal(randomToken(8, () => 0), "AAAAAAAA");
  assert.match(randomToken(), /^[A-Za-z0-9]{8}$/);
});

test("downloadAll stores successes and leaves failures without a local path", async () => {
  const store = new MemoryBlobStore();
  const fetch = async (url: string): Promise<BinaryResponse> => {
    if (url.endsWith("missing.jpg")) return { status: 404, bytes: Buffer.alloc(0), contentType: null };
    if (url.endsWith("broken.jpg")) throw new Error("socket hang up");
    return { status: 200, bytes: Buffer.from("img"), contentType: "image/png" };
  };
  const downloader = new MediaDownloader(store, { fetch, token: () => "TOKEN123" });

  const images = await downloader.downloadAll(
    [
      { url: "https://cdn.example.com/front", altText: "Front", localPath: null },
      { url: "https://cdn.example.com/missing.jpg", altText: null, localPath: null },
      { url: "https://cdn.example.com/broken.jpg", altText: null, localPath: null },
    ],
    { siteId: "fixture-shop", externalId: "SKU1", name: "Trail Jacket" },
  );

  assert.deepEqual(
    images.map((i) => i.localPath),
    ["products/fixture-shop/SKU1/trail-jacket-TOKEN123.png", null, null],
  );
  assert.equal(store.blobs.size, 1);
  assert.equal(images[0].altText, "Front");
});
