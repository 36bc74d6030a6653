import assert from "node:assert/strict";
import test from "node:test";
import { detectWeight, normalizeName } from "./weight";

test("names are normalized before matching", () => {
  assert.equal(normalizeName("  Men's  Rain-Jackets!! "), "men s rain jackets ");
});

test("the first matching keyword wins and returns the range midpoint", () => {
  assert.equal(detectWeight("Insulated Jackets Collection"), 1.5);
  assert.equal(detectWeight("Merino Hiking Socks 3-pack"), 0.075);
  assert.equal(detectWeight("Blazers and suits"), 1.05);
});

test("keywords only match whole words", () => {
  assert.equal(detectWeight("Angel wings"), 0.3);
  assert.equal(detectWeight("Hair gel"), 0.2);
});

test("unknown or empty names fall back to the default weight", () => {
  assert.equal(detectWeight("Trail Jacket"), 0.3);
  assert.equal(detectWeight(""), 0.3);
  assert.equal(detectWeight("!!!"), 0.3);
});
