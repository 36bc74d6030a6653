import type { SiteProfile } from "../../../core/types/site";

/** Starting point for a new shop; copy, rename and fill in the selectors. */
export const adapter: SiteProfile = {
  key: "_template",
  displayName: "Template",
  origin: "https://shop.example.com",
  currency: "EUR",
  listing: {
    kind: "api",
    endpoint: "https://shop.example.com/api/products",
    offsetParam: "offset",
    countParam: "limit",
    pageSize: 48,
    linkFields: ["url"],
  },
  detail: {
    via: "http",
    selectors: {
      title: ["h1", '[data-testid*="title" i]'],
      description: ['[itemprop="description"]', ".product-description"],
      price: [".price", '[data-testid*="price" i]'],
      originalPrice: ["del", ".old-price", ".compare-at"],
      discount: [".discount"],
      images: [".product-gallery img", ".gallery img"],
      sizes: [".sizes li", ".size-selector button"],
      colourLinks: [".colour-swatches a"],
      colourLabel: [".colour-name"],
    },
  },
  productUrlPattern: /\/product\//i,
};
