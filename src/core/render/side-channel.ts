/**
 * Side-channel blocks printed by the render worker on stderr:
 *
 *   COLOR_VARIATIONS_START
 *   {"Black": {...}}
 *   COLOR_VARIATIONS_END
 */

import { parseJson, type JsonValue } from "../json/value";
import { Logger } from "../utils/logger";

const BLOCK = /([A-Z][A-Z0-9_]*)_START\s*\n([\s\S]*?)\n\1_END/g;

/**
 * Extracts every well-formed block keyed by name. When a name repeats, the
 * last block wins; blocks whose body is not JSON are skipped.
 */
export function extractSideChannel(stderr: string): Record<string, JsonValue> {
  const out: Record<string, JsonValue> = {};
  for (const m of stderr.matchAll(BLOCK)) {
    const [, name, body] = m;
    const value = parseJson(body.trim());
    if (value === null) {
      Logger.debug("Unparseable side-channel block", { block: name });
      continue;
    }
    out[name] = value;
  }
  return out;
}

/** Stderr with side-channel blocks removed, for logging. */
export function stripSideChannel(stderr: string): string {
  return stderr.replace(BLOCK, "").trim();
}
