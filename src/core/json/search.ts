/**
 * Bounded recursive search over JSON values
 */

import { getPath, isJsonArray, isJsonObject, type JsonValue } from "./value";

export const DEFAULT_MAX_DEPTH = 10;

export interface SearchOptions {
  maxDepth?: number;
  /** When false, array elements are not descended into (object keys only). */
  descendArrays?: boolean;
}

/**
 * Depth-first search returning the first node accepted by `predicate`.
 * The root is depth 0; nodes deeper than `maxDepth` are never inspected.
 */
export function findFirst(
  root: JsonValue,
  predicate: (node: JsonValue) => boolean,
  options: SearchOptions = {},
): JsonValue | null {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const descendArrays = options.descendArrays ?? true;

  const visit = (node: JsonValue, depth: number): JsonValue | null => {
    if (depth > maxDepth) return null;
    if (predicate(node)) return node;

    if (isJsonObject(node)) {
      for (const child of Object.values(node)) {
        const hit = visit(child, depth + 1);
        if (hit !== null) return hit;
      }
    } else if (descendArrays && isJsonArray(node)) {
      for (const child of node) {
        const hit = visit(child, depth + 1);
        if (hit !== null) return hit;
      }
    }
    return null;
  };

  return visit(root, 0);
}

/** Collects every node accepted by `predicate`, without descending into hits. */
export function collectAll(
  root: JsonValue,
  predicate: (node: JsonValue) => boolean,
  options: SearchOptions = {},
): JsonValue[] {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const descendArrays = options.descendArrays ?? true;
  const out: JsonValue[] = [];

  const visit = (node: JsonValue, depth: number): void => {
    if (depth > maxDepth) return;
    if (predicate(node)) {
      out.push(node);
      return;
    }
    if (isJsonObject(node)) {
      for (const child of Object.values(node)) visit(child, depth + 1);
    } else if (descendArrays && isJsonArray(node)) {
      for (const child of node) visit(child, depth + 1);
    }
  };

  visit(root, 0);
  return out;
}

/**
 * Tries each fixed path in order, then falls back to the recursive search.
 */
export function findByPathsOrShape(
  root: JsonValue,
  paths: readonly string[],
  predicate: (node: JsonValue) => boolean,
  options: SearchOptions = {},
): JsonValue | null {
  for (const path of paths) {
    const value = getPath(root, path);
    if (value !== undefined && predicate(value)) return value;
  }
  return findFirst(root, predicate, options);
}
