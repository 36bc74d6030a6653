import assert from "node:assert/strict";
import test from "node:test";
import { RemoteCatalogError } from "../errors";
import type { ColorwayVariant } from "../types/product";
import { AttributeService } from "./attributes";
import { FakeWooCommerce } from "./fake-catalog";

const colourway = (label: string, sizes: string[]): ColorwayVariant => ({
  colourLabel: label,
  colourSlug: label.toLowerCase(),
  colourCode: null,
  swatchUrl: null,
  pdpUrl: null,
  basePrice: null,
  originalPrice: null,
  currency: null,
  discountPercentage: null,
  soldOut: false,
  images: [],
  sizeVariants: sizes.map((size) => ({ size, sku: null, stockAvailable: true, price: null })),
});

test("two services over one catalog create the attribute once", async () => {
  const fake = new FakeWooCommerce();
  const first = new AttributeService(fake.client());
  const second = new AttributeService(fake.client());

  const [a, b] = await Promise.all([first.colorAttributeId(), second.colorAttributeId()]);

  assert.equal(a, b);
  assert.deepEqual(fake.attributes, [{ id: a, name: "Color", slug: "color" }]);
});

test("an attribute with a different slug is found by name", async () => {
  const fake = new FakeWooCommerce();
  const id = fake.seedAttribute("Color", "pa_colour");
  const service = new AttributeService(fake.client());

  assert.equal(await service.colorAttributeId(), id);
  assert.equal(fake.calls("POST", /\/attributes$/).length, 0);
});

test("a rejected create resolves through the slug lookup", async () => {
  const fake = new FakeWooCommerce();
  let raced = 0;
  fake.beforeCreateAttribute = () => {
    raced = fake.seedAttribute("Size");
    fake.beforeCreateAttribute = null;
  };
  const service = new AttributeService(fake.client());

  assert.equal(await service.sizeAttributeId(), raced);
  assert.equal(fake.attributes.length, 1);
});

test("a create that fails with nothing to fall back on is rethrown", async () => {
  const fake = new FakeWooCommerce();
  const service = new AttributeService(fake.client());

  await assert.rejects(service.ensureAttribute(""), RemoteCatalogError);
});

test("product attributes list colours then sizes and reuse cached terms", async () => {
  const fake = new FakeWooCommerce();
  const service = new AttributeService(fake.client());
  const matrix = [colourway("Black", ["S", "M"]), colourway("White", ["M"])];

  const attributes = await service.prepareProductAttributes(matrix);

  assert.deepEqual(attributes, [
    { id: 100, position: 0, visible: true, variation: true, options: ["Black", "White"] },
    { id: 103, position: 1, visible: true, variation: true, options: ["S", "M"] },
  ]);
  assert.deepEqual(
    fake.terms.get(100)?.map((t) => t.name),
    ["Black", "White"],
  );

  const postsBefore = fake.calls("POST", /./).length;
  await service.prepareProductAttributes(matrix);
  assert.equal(fake.calls("POST", /./).length, postsBefore);
  assert.equal(postsBefore, 6);
});
