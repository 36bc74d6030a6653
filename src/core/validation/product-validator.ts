/**
 * Canonical product validation
 */

import { MalformedSourceError } from "../errors";
import type { CanonicalProduct } from "../types/product";

/**
 * Checks the invariants the sync engine relies on
 * @throws MalformedSourceError naming the offending field
 */
export function validateProduct(product: CanonicalProduct): CanonicalProduct {
  if (!product.externalId.trim()) {
    throw new MalformedSourceError(`No external id for ${product.sourceUrl}`, "externalId");
  }

  if (!product.title.trim()) {
    throw new MalformedSourceError(`No title for ${product.sourceUrl}`, "title");
  }

  if (product.price !== null && !Number.isFinite(product.price)) {
    throw new MalformedSourceError("Product price must be a finite number or null", "price");
  }

  const matrix = product.variantMatrix;
  if (matrix === null) return product;

  if (matrix.length === 0) {
    throw new MalformedSourceError(
      `Empty variant matrix for ${product.sourceUrl}`,
      "variantMatrix",
    );
  }

  const labels = new Set<string>();
  for (const colourway of matrix) {
    if (labels.has(colourway.colourLabel)) {
      throw new MalformedSourceError(
        `Duplicate colour "${colourway.colourLabel}" in ${product.externalId}`,
        "variantMatrix",
      );
    }
    labels.add(colourway.colourLabel);

    if (colourway.sizeVariants.length === 0) {
      throw new MalformedSourceError(
        `Colour "${colourway.colourLabel}" has no sizes in ${product.externalId}`,
        "variantMatrix",
      );
    }
  }

  return product;
}
