import { readLines } from "./lines.js";
import type { GarliResult } from "./types.js";

const FIELDS = {
  bootstrapreps: /bootstrapreps\s*=\s*(\d+)/,
  searchreps: /searchreps\s*=\s*(\d+)/,
  availablememory: /availablememory\s*=\s*(\d+)/,
} as const;

type GarliKey = keyof typeof FIELDS;

const KEYS: readonly GarliKey[] = ["bootstrapreps", "searchreps", "availablememory"];

/**
 * garli.conf. The gateway runs either N bootstrap replicates or N search
 * replicates as N separate jobs, so whichever count drives the job is
 * moved into `runs` and the per-job count becomes 1.
 */
export function parseGarli(lines: string[]): GarliResult {
  const found: Partial<Record<GarliKey, string>> = {};

  for (const raw of lines) {
    const line = raw.trim();
    for (const key of KEYS) {
      if (found[key] !== undefined) continue;
      const match = FIELDS[key].exec(line);
      if (match) found[key] = match[1];
    }
  }

  const { bootstrapreps, searchreps, availablememory } = found;

  if (bootstrapreps === undefined || searchreps === undefined || availablememory === undefined) {
    const missing = KEYS.filter((k) => found[k] === undefined);
    return {
      fileType: "garli",
      errCode: 1,
      notices: [`garli.conf is missing required values: ${missing.join(", ")}`],
      bootstrapReps: bootstrapreps,
      searchReps: searchreps,
      availableMemory: availablememory,
    };
  }

  // Compared as captured text: "00" is not a zero here
  if (bootstrapreps === "0") {
    return {
      fileType: "garli",
      errCode: 0,
      notices: [],
      runs: searchreps,
      bootstrapReps: "1",
      searchReps: "1",
      availableMemory: availablememory,
    };
  }

  return {
    fileType: "garli",
    errCode: 0,
    notices: [],
    runs: bootstrapreps,
    bootstrapReps: "1",
    searchReps: searchreps,
    availableMemory: availablememory,
  };
}

export async function extractGarli(filePath: string): Promise<GarliResult> {
  return parseGarli(await readLines(filePath));
}
