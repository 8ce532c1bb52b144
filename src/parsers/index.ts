import { detectFileType } from "./detect.js";
import { extractBeast } from "./beast.js";
import { extractBeast2 } from "./beast2.js";
import { extractMigrateInfile, extractMigrateParm } from "./migrate.js";
import { extractGarli } from "./garli.js";
import { extractMrBayes } from "./mrbayes.js";
import type { DetectedType, ExtractionResult, Extractor, FileType } from "./types.js";

export const EXTRACTORS: Record<FileType, Extractor> = {
  beast: extractBeast,
  beast2: extractBeast2,
  migrate_parm: extractMigrateParm,
  migrate_infile: extractMigrateInfile,
  bayes: extractMrBayes,
  garli: extractGarli,
};

/** Run the extractor for `fileType`, detecting the type first when none is given. */
export async function extract(filePath: string, fileType?: DetectedType): Promise<ExtractionResult> {
  const type = fileType && fileType !== "unknown" ? fileType : await detectFileType(filePath);

  if (type === "unknown") {
    return { fileType: "unknown", errCode: 1, notices: [] };
  }

  return EXTRACTORS[type](filePath);
}
