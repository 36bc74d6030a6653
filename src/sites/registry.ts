// Centralized site registry and categories

import type { SiteProfile } from "../core/types/site";

// Apparel
import { adapter as lululemon } from "./apparel/lululemon/adapter";
import { adapter as nike } from "./apparel/nike/adapter";
import { adapter as tommyHilfiger } from "./apparel/tommy-hilfiger/adapter";

// Template
import { adapter as template } from "./apparel/_template/adapter";

// 1) Adapters dictionary (single source of truth for site keys)
const adapters = {
  nike,
  "tommy-hilfiger": tommyHilfiger,
  lululemon,
  _template: template,
} satisfies Record<string, SiteProfile>;

export type RegistryKey = keyof typeof adapters;

export interface SiteCategory {
  name: string;
  sites: readonly RegistryKey[];
  description: string;
}

// 2) Base categories without "all"
const BASE_CATEGORIES = {
  apparel: {
    name: "Apparel",
    sites: ["nike", "tommy-hilfiger", "lululemon"],
    description: "Fashion and sportswear retailers",
  },
  template: {
    name: "Template",
    sites: ["_template"],
    description: "Template for new profiles",
  },
} satisfies Record<string, SiteCategory>;

// 3) "all" is the union of non-template categories
const ALL_SITES: RegistryKey[] = Array.from(
  new Set(
    Object.entries(BASE_CATEGORIES)
      .filter(([key]) => key !== "template")
      .flatMap(([, cat]): readonly RegistryKey[] => cat.sites),
  ),
);

export const SITE_CATEGORIES: Record<keyof typeof BASE_CATEGORIES | "all", SiteCategory> = {
  ...BASE_CATEGORIES,
  all: {
    name: "All",
    sites: ALL_SITES,
    description: "All supported sites",
  },
};

export type CategoryKey = keyof typeof SITE_CATEGORIES;

export function isCategoryKey(value: string): value is CategoryKey {
  return Object.prototype.hasOwnProperty.call(SITE_CATEGORIES, value);
}

// 4) Defaults derived from a category (single place to change)
export const DEFAULT_SITES: readonly string[] = SITE_CATEGORIES.apparel.sites;

// 5) Registry map derived from adapters dictionary
export const registry: ReadonlyMap<string, SiteProfile> = new Map<string, SiteProfile>(Object.entries(adapters));
