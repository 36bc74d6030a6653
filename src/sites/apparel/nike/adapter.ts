import type { SiteProfile } from "../../../core/types/site";

const MARKETPLACE = "CA";
const CHANNEL = "d9a5bc42-4b9c-4976-858a-f159cf99c647";

export const adapter: SiteProfile = {
  key: "nike",
  displayName: "Nike",
  origin: "https://www.nike.com",
  currency: "CAD",
  listing: {
    kind: "api",
    endpoint: `https://api.nike.com/discover/product_wall/v1/marketplace/${MARKETPLACE}/language/en-GB/consumerChannelId/${CHANNEL}`,
    offsetParam: "anchor",
    countParam: "count",
    pageSize: 24,
    linkFields: ["pdpUrl"],
    query: {
      path: "/ca/w/sale-3yaep",
      attributeIds: "5b21a62a-0503-400c-8336-3ccfbff2a684",
      queryType: "PRODUCTS",
    },
    roundRetries: 2,
  },
  detail: {
    via: "http",
    colourPages: true,
    sizeDisabledClass: "disabled",
    selectors: {
      title: ['h1[data-testid="product_title"]', "h1#pdp_product_title", "h1"],
      description: ["div#product-description-container p", "div#product-description-container li"],
      price: ['[data-testid="currentPrice-container"]'],
      originalPrice: ['[data-testid="initialPrice-container"]'],
      discount: ['[data-testid="OfferPercentage"]'],
      images: ['div#hero-image img[data-testid="HeroImg"]'],
      sizes: ["div.css-1jas9ft.nds-grid-item"],
      colourLinks: ['a[data-testid^="colorway-link-"]'],
      colourLabel: ['[data-testid="colorway-label"]'],
      externalId: ['[data-testid="product-description-style-color"]'],
    },
  },
  productUrlPattern: /\/t\//,
  headers: {
    referer: "https://www.nike.com/",
    origin: "https://www.nike.com",
    "nike-api-caller-id": "com.nike.commerce.nikedotcom.web",
  },
  pacing: {
    listingConcurrency: 4,
    detailConcurrency: 6,
    colourConcurrency: 4,
    waveSleepMs: 1000,
    roundSleepMs: 2000,
  },
};
