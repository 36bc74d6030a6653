/**
 * Translation collaborator
 *
 * The service behind it is external; the pipeline only needs one call. A
 * failed translation never fails the product.
 */

import { errorMessage } from "../errors";
import { Logger } from "../utils/logger";

export interface Translator {
  translate(text: string): Promise<string>;
}

/** Translated text, or null when there is nothing to translate or the call fails. */
export async function translateSafely(
  translator: Translator | undefined,
  text: string | null,
  meta: { site?: string; url?: string } = {},
): Promise<string | null> {
  if (!translator || !text?.trim()) return null;
  try {
    const translated = (await translator.translate(text)).trim();
    return translated || null;
  } catch (error) {
    Logger.warn("Translation failed, continuing without it", {
      ...meta,
      error: errorMessage(error),
      preview: text.slice(0, 100),
    });
    return null;
  }
}
