/**
 * URL manipulation utilities
 */

/**
 * Normalizes a URL by removing query parameters and hash fragments
 */
export const normalizeUrlKey = (raw: string): string => {
  const u = new URL(raw);
  u.hash = "";
  u.search = "";
  return u.toString();
};

/**
 * Resolves a relative or absolute location URL against a base URL
 * @returns Resolved absolute URL or null if invalid
 */
export function resolveLocation(baseUrl: string, loc: string): string | null {
  const trimmed = loc.trim();
  if (!trimmed || /^(javascript|mailto|tel|data):/i.test(trimmed)) return null;
  try {
    if (/^https?:/i.test(trimmed)) return new URL(trimmed).toString();
    if (trimmed.startsWith("//")) return new URL(`https:${trimmed}`).toString();
    return new URL(trimmed, baseUrl).toString();
  } catch {
    return null;
  }
}

/** Path without trailing slash, or "" when the URL cannot be parsed. */
export function pathOf(raw: string): string {
  try {
    return new URL(raw).pathname.replace(/\/+$/, "");
  } catch {
    return "";
  }
}

export function lastPathSegment(raw: string): string | null {
  const segments = pathOf(raw).split("/").filter(Boolean);
  return segments.length > 0 ? segments[segments.length - 1] : null;
}

/**
 * Base-product key: origin plus the path with its final segment removed.
 * `/t/air-max-90/DM0029-100` and `/t/air-max-90/DM0029-001` share one key.
 */
export function baseProductKey(raw: string): string {
  try {
    const u = new URL(raw);
    const segments = u.pathname.split("/").filter(Boolean);
    const base = segments.length > 1 ? segments.slice(0, -1) : segments;
    return `${u.origin}/${base.join("/")}`;
  } catch {
    return raw;
  }
}

/** Exact-string dedup, first occurrence wins. */
export function dedupeExact(urls: Iterable<string>): string[] {
  return Array.from(new Set(urls));
}

/** Keeps only the first URL seen per base product. */
export function dedupeByBaseProduct(urls: Iterable<string>): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const url of urls) {
    const key = baseProductKey(url);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(url);
  }
  return out;
}

/** Two-stage dedup applied to every collected listing. */
export function dedupeProductUrls(urls: Iterable<string>): string[] {
  return dedupeByBaseProduct(dedupeExact(urls));
}

/** Lower-case, runs of non-alphanumerics to "-", trimmed of "-". */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}
