import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";

const HOME = process.env.HOME ?? process.env.USERPROFILE ?? "~";
const CONFIG_PATH = join(HOME, ".phylo-scan", "config.json");

/**
 * How the ranking collector orders best-tree files before reading them.
 * The first file fixes the score line offset for all the others, so
 * `directory` (raw readdir order) can give different results per filesystem.
 */
export const LISTING_ORDERS = ["sorted", "directory"] as const;

export type ListingOrder = (typeof LISTING_ORDERS)[number];

export interface ScanConfig {
  bestTreeSuffix: string;
  scoresFile: string;
  listingOrder: ListingOrder;
}

export const CONFIG_KEYS = ["bestTreeSuffix", "scoresFile", "listingOrder"] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

export const DEFAULT_CONFIG: ScanConfig = {
  bestTreeSuffix: ".best.tre",
  scoresFile: "garli_scores.txt",
  listingOrder: "sorted",
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isListingOrder(value: unknown): value is ListingOrder {
  return typeof value === "string" && (LISTING_ORDERS as readonly string[]).includes(value);
}

export function isConfigKey(key: string): key is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(key);
}

/** Read config from disk. Returns defaults if the file doesn't exist or is unreadable. */
export function loadConfig(path: string = CONFIG_PATH): ScanConfig {
  if (!existsSync(path)) {
    return { ...DEFAULT_CONFIG };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch {
    console.warn(`Ignoring unreadable config at ${path}`);
    return { ...DEFAULT_CONFIG };
  }

  const config = { ...DEFAULT_CONFIG };
  if (!isRecord(parsed)) return config;

  if (typeof parsed.bestTreeSuffix === "string" && parsed.bestTreeSuffix) {
    config.bestTreeSuffix = parsed.bestTreeSuffix;
  }
  if (typeof parsed.scoresFile === "string" && parsed.scoresFile) {
    config.scoresFile = parsed.scoresFile;
  }
  if (isListingOrder(parsed.listingOrder)) {
    config.listingOrder = parsed.listingOrder;
  }
  return config;
}

/** Write config to disk. Creates parent dirs if needed. */
export function saveConfig(config: ScanConfig, path: string = CONFIG_PATH): void {
  const dir = dirname(path);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  writeFileSync(path, JSON.stringify(config, null, 2) + "\n", "utf-8");
}

/** Return a copy of `config` with one key changed. Throws on bad keys or values. */
export function applyConfigValue(config: ScanConfig, key: string, value: string): ScanConfig {
  if (!isConfigKey(key)) {
    throw new Error(`Unknown config key: "${key}"\nValid keys: ${CONFIG_KEYS.join(", ")}`);
  }

  switch (key) {
    case "listingOrder":
      if (!isListingOrder(value)) {
        throw new Error(`Invalid listingOrder: "${value}"\nValid values: ${LISTING_ORDERS.join(", ")}`);
      }
      return { ...config, listingOrder: value };
    case "bestTreeSuffix":
    case "scoresFile":
      if (!value.trim()) {
        throw new Error(`${key} cannot be empty`);
      }
      return key === "scoresFile"
        ? { ...config, scoresFile: value }
        : { ...config, bestTreeSuffix: value };
  }
}

export { CONFIG_PATH };
