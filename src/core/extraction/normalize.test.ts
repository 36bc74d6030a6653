import assert from "node:assert/strict";
import test from "node:test";
import type { ColorwayVariant, SizeVariant } from "../types/product";
import {
  collectProductImages,
  deriveStatus,
  groupVariantsByColour,
  mergeColourways,
  normalizeColourway,
  resolveSizePrice,
  sideChannelToColourways,
} from "./normalize";

const ctx = { origin: "https://shop.example.com", currency: "CAD" };

const size = (name: string, stockAvailable = true, price: number | null = null): SizeVariant => ({
  size: name,
  sku: null,
  stockAvailable,
  price,
});

function colourway(label: string, sizes: SizeVariant[], extra: Partial<ColorwayVariant> = {}): ColorwayVariant {
  return {
    colourLabel: label,
    colourSlug: label.toLowerCase(),
    colourCode: null,
    swatchUrl: null,
    pdpUrl: null,
    basePrice: null,
    originalPrice: null,
    currency: "CAD",
    discountPercentage: null,
    soldOut: false,
    images: [],
    sizeVariants: sizes,
    ...extra,
  };
}

test("size price falls back to the colourway base price", () => {
  assert.equal(resolveSizePrice(size("M"), { basePrice: 50 }), 50);
  assert.equal(resolveSizePrice(size("M", true, 45), { basePrice: 50 }), 45);
  assert.equal(resolveSizePrice(size("M"), { basePrice: null }, 60), 60);
  assert.equal(resolveSizePrice(size("M"), { basePrice: null }), null);
});

test("normalizeColourway maps labels, skus, stock and prices", () => {
  const cw = normalizeColourway(
    {
      id: "c1",
      label: "Black / White",
      url: "/t/runner/black-white",
      price: { price: 120, originalPrice: 150 },
      variants: [
        { size: "M", id: "sku-m", stockAvailability: true, price: { price: 110 } },
        { size: "L", catentryId: "cat-l", stockAvailability: 0 },
        { size: "" },
      ],
    },
    ctx,
  );

  assert.ok(cw);
  assert.equal(cw.colourLabel, "Black / White");
  assert.equal(cw.colourSlug, "black-white");
  assert.equal(cw.pdpUrl, "https://shop.example.com/t/runner/black-white");
  assert.equal(cw.basePrice, 120);
  assert.equal(cw.discountPercentage, 20);
  assert.deepEqual(cw.sizeVariants, [
    { size: "M", sku: "sku-m", stockAvailable: true, price: 110 },
    { size: "L", sku: "cat-l", stockAvailable: false, price: null },
  ]);
});

test("normalizeColourway rejects records without a label or sizes", () => {
  assert.equal(normalizeColourway({ id: "x", variants: [{ size: "M", stockAvailability: true }] }, ctx), null);
  assert.equal(normalizeColourway({ id: "x", colour: "Red", variants: [] }, ctx), null);
});

test("flat variants are grouped by colour in first-seen order", () => {
  const grouped = groupVariantsByColour({
    id: "p1",
    price: { price: 80 },
    variants: [
      { colour: "Red", size: "S", stockAvailability: true },
      { colour: "Blue", size: "S", stockAvailability: false },
      { colour: "Red", size: "M", stockAvailability: true },
    ],
  });

  assert.deepEqual(
    grouped.map((g) => [g.label, Array.isArray(g.variants) ? g.variants.length : -1]),
    [
      ["Red", 2],
      ["Blue", 1],
    ],
  );
  assert.deepEqual(grouped[0].price, { price: 80 });
});

test("duplicate labels merge into the first and empty colourways are dropped", () => {
  const img = (url: string) => ({ url, altText: null, localPath: null });
  const merged = mergeColourways([
    colourway("Black", [size("S"), size("M")], { images: [img("https://cdn.example.com/1.jpg")] }),
    colourway("White", []),
    colourway("Black", [size("M", false), size("L")], {
      basePrice: 90,
      images: [img("https://cdn.example.com/1.jpg"), img("https://cdn.example.com/2.jpg")],
    }),
  ]);

  assert.equal(merged.length, 1);
  assert.deepEqual(
    merged[0].sizeVariants.map((s) => [s.size, s.stockAvailable]),
    [
      ["S", true],
      ["M", true],
      ["L", true],
    ],
  );
  assert.equal(merged[0].basePrice, 90);
  assert.deepEqual(
    merged[0].images.map((i) => i.url),
    ["https://cdn.example.com/1.jpg", "https://cdn.example.com/2.jpg"],
  );
});

test("side-channel variations become colourways with sale pricing", () => {
  const [green] = sideChannelToColourways(
    {
      "Rainforest Green": {
        images: [{ url: "https://cdn.example.com/g1.jpg", alt: "front" }, "https://cdn.example.com/g2.jpg"],
        sizes: { available: ["XS", "S"], unavailable: ["L"] },
        price: 108,
        discount_price: 79,
      },
    },
    ctx,
  );

  assert.equal(green.colourLabel, "Rainforest Green");
  assert.equal(green.colourSlug, "rainforest-green");
  assert.equal(green.basePrice, 79);
  assert.equal(green.originalPrice, 108);
  assert.equal(green.discountPercentage, 26.85);
  assert.deepEqual(
    green.sizeVariants.map((s) => [s.size, s.stockAvailable]),
    [
      ["XS", true],
      ["S", true],
      ["L", false],
    ],
  );
  assert.deepEqual(
    green.images.map((i) => i.altText),
    ["front", "Rainforest Green"],
  );
});

test("an explicit side-channel discount wins over the computed one", () => {
  const [cw] = sideChannelToColourways(
    { Navy: { sizes: { available: ["M"] }, price: 100, discount_price: 80, discount_percent: 21 } },
    ctx,
  );
  assert.equal(cw.discountPercentage, 21);
});

test("status is out_of_stock only when no size is available", () => {
  const allOut = [colourway("A", [size("S", false), size("M", false)]), colourway("B", [size("L", false)])];
  const oneIn = [colourway("A", [size("S", false), size("M", false)]), colourway("B", [size("L", true)])];

  assert.equal(deriveStatus(allOut, true), "out_of_stock");
  assert.equal(deriveStatus(oneIn, false), "published");
  assert.equal(deriveStatus(null, true), "published");
  assert.equal(deriveStatus(null, false), "out_of_stock");
});

test("product images keep first-seen order across colourways", () => {
  const img = (url: string) => ({ url, altText: null, localPath: null });
  const images = collectProductImages(
    [img("https://cdn.example.com/a.jpg")],
    [
      colourway("A", [size("S")], { images: [img("https://cdn.example.com/b.jpg"), img("https://cdn.example.com/a.jpg")] }),
      colourway("B", [size("S")], { images: [img("https://cdn.example.com/c.jpg")] }),
    ],
  );
  assert.deepEqual(
    images.map((i) => i.url),
    ["https://cdn.example.com/a.jpg", "https://cdn.example.com/b.jpg", "https://cdn.example.com/c.jpg"],
  );
  assert.deepEqual(
    images.map((i) => i.isPrimary),
    [true, false, false],
  );
});
