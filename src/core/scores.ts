import Papa from "papaparse";
import { readdirSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { readLines } from "../parsers/lines.js";
import type { ErrCode } from "../parsers/types.js";
import { DEFAULT_CONFIG, type ListingOrder } from "./config.js";

/**
 * `[-?]` is a literal hyphen or question mark, not an optional sign:
 * unsigned scores never match. GARLI log-likelihoods are negative.
 */
export const SCORE_PATTERN = /GarliScore\s([-?]\d+[.\d]+)/;

const SCORE_MARKER = "GarliScore";

export const REPORT_HEADER = "### RANK OF GARLI SCORES (highest to lowest) ###\n\n Score:\tfilename";

export interface ScoreEntry {
  score: number;
  filename: string;
}

export interface RankingResult {
  errCode: ErrCode;
  entries: ScoreEntry[];      // highest score first
  problemFiles: string[];
  scoreLine?: number;         // 0-based line index taken from the first file
}

export interface RankOptions {
  suffix?: string;
  listingOrder?: ListingOrder;
}

/** Score on `line`, or 0 when the pattern doesn't match. */
export function collectScore(line: string): number {
  const match = SCORE_PATTERN.exec(line);
  if (!match) return 0;
  const score = Number(match[1]);
  return Number.isFinite(score) ? score : 0;
}

/** Best-tree files in `dir`, in the order the collector will read them. */
export function listBestTreeFiles(dir: string, opts?: RankOptions): string[] {
  const suffix = opts?.suffix ?? DEFAULT_CONFIG.bestTreeSuffix;
  const files = readdirSync(dir).filter((f) => f.endsWith(suffix));
  return (opts?.listingOrder ?? DEFAULT_CONFIG.listingOrder) === "sorted" ? files.sort() : files;
}

/**
 * Rank best-tree files by GarliScore.
 *
 * Only the first file is searched for the score line. Every other file is
 * assumed to share its layout and is read at the same line index.
 */
export async function collectScores(dir: string, opts?: RankOptions): Promise<RankingResult> {
  const scores = new Map<number, string>();
  const problemFiles: string[] = [];
  let scoreLine: number | undefined;

  for (const filename of listBestTreeFiles(dir, opts)) {
    const lines = await readLines(join(dir, filename));
    let score: number;

    if (scoreLine === undefined) {
      const idx = lines.findIndex((l) => l.includes(SCORE_MARKER));
      scoreLine = idx >= 0 ? idx : lines.length;
      score = idx >= 0 ? collectScore(lines[idx].trimEnd()) : 0;
    } else {
      const line = lines[scoreLine];
      score = line === undefined ? 0 : collectScore(line.trimEnd());
    }

    if (score === 0) {
      problemFiles.push(filename);
    } else {
      scores.set(score, filename);
    }
  }

  const entries = [...scores]
    .map(([score, filename]) => ({ score, filename }))
    .sort((a, b) => b.score - a.score);

  return {
    errCode: problemFiles.length > 0 ? 1 : 0,
    entries,
    problemFiles,
    scoreLine,
  };
}

/** Integral scores keep one decimal place (-1234.0), everything else prints as-is. */
export function formatScore(score: number): string {
  return Number.isInteger(score) ? score.toFixed(1) : String(score);
}

export function renderScoreReport(result: RankingResult): string {
  const lines = [REPORT_HEADER];
  for (const { score, filename } of result.entries) {
    lines.push(`${formatScore(score)}: ${filename}`);
  }
  return lines.join("\n") + "\n";
}

export function renderScoreCsv(result: RankingResult): string {
  return Papa.unparse(
    {
      fields: ["score", "filename"],
      data: result.entries.map((e) => [formatScore(e.score), e.filename]),
    },
    { newline: "\n" }
  );
}

/**
 * File name for the CSV export next to `scoresFile`. Never the report's own
 * name: `ranks.txt` gives `ranks.csv`, `ranks.csv` gives `ranks.scores.csv`.
 */
export function csvReportName(scoresFile: string): string {
  const base = scoresFile.replace(/\.[^./]*$/, "");
  const name = `${base}.csv`;
  return name === scoresFile ? `${base}.scores.csv` : name;
}

/**
 * Write the ranked report into `dir`. Returns the path written, or null when
 * any file failed; a partial ranking is never written.
 */
export async function writeScoreReport(
  dir: string,
  result: RankingResult,
  fileName: string = DEFAULT_CONFIG.scoresFile
): Promise<string | null> {
  if (result.errCode !== 0) return null;
  const outPath = join(dir, fileName);
  await writeFile(outPath, renderScoreReport(result), "utf-8");
  return outPath;
}
