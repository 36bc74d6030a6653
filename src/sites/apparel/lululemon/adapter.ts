import type { SiteProfile } from "../../../core/types/site";

export const adapter: SiteProfile = {
  key: "lululemon",
  displayName: "lululemon",
  origin: "https://www.eu.lululemon.com",
  currency: "EUR",
  listing: {
    kind: "rendered_html",
    url: "https://www.eu.lululemon.com/en-lu/c/sale",
    countParam: "sz",
    targetCount: 500,
    linkSelector: "a.link.search-results-product-name",
    waitSelector: "a.link.search-results-product-name",
  },
  detail: {
    via: "render",
    sideChannelName: "COLOR_VARIATIONS",
    waitSelector: "h1.product-name",
    sizeDisabledClass: "unselectable",
    selectors: {
      title: ["h1.product-name"],
      description: ["div.why-we-made-this__text-container"],
      price: [".markdown-prices .price-sales", ".price-sales"],
      originalPrice: [".markdown-prices .price-standard", ".price-standard"],
      discount: [],
      images: ["div.product-images img", "picture img"],
      sizes: ['div.custom-select-btn input[type="radio"]'],
      colourLinks: [],
      colourLabel: ["[data-color-title]"],
      externalId: ["[data-productid]"],
      accordion: ["div#newAccordion"],
    },
  },
  productUrlPattern: /\/p\//,
  pacing: {
    detailConcurrency: 3,
    batchSize: 50,
    renderTimeoutMs: 90_000,
  },
};
