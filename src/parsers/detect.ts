import { readLines } from "./lines.js";
import type { DetectedType, FileType } from "./types.js";

export interface DetectRule {
  type: FileType;
  test: (line: string) => boolean;
}

/**
 * Signature checks, highest priority first. Each line is tried against
 * every rule before moving to the next line.
 *
 * migrate_infile has no signature and is never detected.
 */
export const DETECT_RULES: readonly DetectRule[] = [
  { type: "beast", test: (l) => l.includes("BEAUTi") },
  { type: "beast2", test: (l) => l.includes("<beast") && l.includes('version="2.0">') },
  { type: "migrate_parm", test: (l) => l.includes("Parmfile for Migrate") },
  { type: "bayes", test: (l) => l.includes("#NEXUS") },
  { type: "garli", test: (l) => l.includes("[general]") },
];

export function detectFromLines(lines: Iterable<string>): DetectedType {
  for (const line of lines) {
    const hit = DETECT_RULES.find((rule) => rule.test(line));
    if (hit) return hit.type;
  }
  return "unknown";
}

export async function detectFileType(filePath: string): Promise<DetectedType> {
  return detectFromLines(await readLines(filePath));
}
