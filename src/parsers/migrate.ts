import { DIGITS, readLines } from "./lines.js";
import type { MigrateInfileResult, MigrateParmResult } from "./types.js";

// ─── Parmfile ───

/**
 * Replicates come from `replicate=YES:<n>`. Without that line Migrate
 * runs a single replicate. The text is checked for digits before it is
 * parsed, so a value like `LastChains` is reported as-is with errCode 1.
 */
export function parseMigrateParm(lines: string[]): MigrateParmResult {
  let replicates = "1";

  for (const raw of lines) {
    const line = raw.trimEnd();
    if (line.includes("replicate=YES")) {
      const colon = line.indexOf(":");
      replicates = colon >= 0 ? line.slice(colon + 1) : "";
      break;
    }
  }

  if (!DIGITS.test(replicates)) {
    return { fileType: "migrate_parm", errCode: 1, notices: [], replicates };
  }

  return {
    fileType: "migrate_parm",
    errCode: 0,
    notices: [],
    replicates,
    replicateCount: Number.parseInt(replicates, 10),
  };
}

export async function extractMigrateParm(filePath: string): Promise<MigrateParmResult> {
  return parseMigrateParm(await readLines(filePath));
}

// ─── Infile ───

/** Header record is `<populations> <loci> [title]`; only the loci field is used. */
export function parseMigrateInfile(lines: string[]): MigrateInfileResult {
  const header = lines.find((l) => l.trim() !== "");
  const loci = header?.trim().split(/\s+/)[1];

  if (loci === undefined || !DIGITS.test(loci)) {
    const notices = loci === undefined ? ["Migrate infile has no locus count on its first record"] : [];
    return { fileType: "migrate_infile", errCode: 1, notices, loci };
  }

  return {
    fileType: "migrate_infile",
    errCode: 0,
    notices: [],
    loci,
    lociCount: Number.parseInt(loci, 10),
  };
}

export async function extractMigrateInfile(filePath: string): Promise<MigrateInfileResult> {
  return parseMigrateInfile(await readLines(filePath));
}
