import { readLines } from "./lines.js";
import type { BeastResult, ErrCode } from "./types.js";

const DATATYPE_PREFIX = /.*alignment.*data[tT]ype\s*=\s*"/;
const NPATTERNS_PREFIX = /.*npatterns\s*=\s*/;
const ACCEPTED_TYPES = new Set(["nucleotide", "aminoacid"]);

/**
 * BEAST (BEAUti-generated) XML.
 *
 * Every `npatterns=` line is one partition and its value is added to the
 * pattern total. The last alignment `dataType` wins.
 *
 * All three checks look at the whole, unstripped line. Running the
 * `npatterns`/`codon` checks on what is left after the dataType strip would
 * miss `<alignment dataType="nucleotide"> <!-- codon -->`.
 * Keep the whole-line checks.
 */
export function parseBeast(lines: string[]): BeastResult {
  let dataType: string | undefined;
  let codonPartitioning = false;
  let partitions = 0;
  let patterns = 0;

  for (const raw of lines) {
    const line = raw.trimEnd();

    if (DATATYPE_PREFIX.test(line)) {
      dataType = line
        .replace(DATATYPE_PREFIX, "")
        .replace(/".*/, "")
        .replace(/\s+/g, "");
    }

    if (NPATTERNS_PREFIX.test(line)) {
      const digits = line.replace(NPATTERNS_PREFIX, "").replace(/\D.*/, "");
      patterns += digits ? Number.parseInt(digits, 10) : 0;
      partitions++;
    }

    if (line.includes("codon")) {
      codonPartitioning = true;
    }
  }

  const validType = dataType !== undefined && ACCEPTED_TYPES.has(dataType);
  const errCode: ErrCode = !validType || partitions <= 0 || patterns <= 0 ? 1 : 0;

  return {
    fileType: "beast",
    errCode,
    notices: [],
    dataType,
    codonPartitioning,
    partitions,
    patterns,
  };
}

export async function extractBeast(filePath: string): Promise<BeastResult> {
  return parseBeast(await readLines(filePath));
}
