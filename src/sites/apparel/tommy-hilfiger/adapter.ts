import type { SiteProfile } from "../../../core/types/site";

export const adapter: SiteProfile = {
  key: "tommy-hilfiger",
  displayName: "Tommy Hilfiger",
  origin: "https://nl.tommy.com",
  currency: "EUR",
  listing: {
    kind: "rendered_html",
    url: "https://nl.tommy.com/heren-sale",
    countParam: "sz",
    targetCount: 960,
    linkSelector: "li.ProductGrid_ProductGridItem__VJcst a.Link_Link__RX3bc.ProductGrid_ProductGridLink__AQ1KN",
    waitSelector: "li.ProductGrid_ProductGridItem__VJcst",
  },
  detail: {
    via: "http",
    // Next.js page state carries colourways and size availability
    embeddedStateSelector: "script#__NEXT_DATA__",
    selectors: {
      title: ['h1[data-testid="ProductHeader-ProductName-typography-h1"]'],
      description: ['section#description div[data-testid="typography-div"]'],
      price: ['span[data-testid*="ProductHeaderPrice-PriceText"]'],
      originalPrice: ['span[data-testid*="ProductHeaderPrice-StrikethroughPrice"]'],
      discount: [],
      images: ['div[data-testid="CarouselItemWrapper"] img[data-testid="prod-mainImage_img"]'],
      sizes: ['[data-testid*="SizeButton"]'],
      colourLinks: [],
      colourLabel: ['[data-testid*="ColourName"]'],
      externalId: ["div.ProductAccordions_styleNumber__uzRY1"],
      outOfStock: ['[data-testid*="out-of-stock"]', '[data-testid*="OutOfStock"]'],
      accordion: ['section[data-testid*="accordion"]:not(#description)'],
    },
  },
  productUrlPattern: /\.html(?:$|\?)/,
  pacing: {
    detailConcurrency: 4,
    colourConcurrency: 8,
    renderTimeoutMs: 120_000,
  },
};
