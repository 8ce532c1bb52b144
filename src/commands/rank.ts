import { existsSync, statSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { loadConfig } from "../core/config.js";
import { collectScores, csvReportName, renderScoreCsv, writeScoreReport } from "../core/scores.js";

const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

export interface RankCommandOptions {
  output?: string; // "csv"
}

export async function rank(dir?: string, opts?: RankCommandOptions): Promise<void> {
  const target = resolve(dir ?? ".");

  if (!existsSync(target) || !statSync(target).isDirectory()) {
    console.error(`Error: Directory not found: ${target}`);
    process.exit(1);
  }

  if (opts?.output !== undefined && opts.output !== "csv") {
    console.error(`Error: Unsupported output format '${opts.output}'. Supported: csv`);
    process.exit(1);
  }

  const config = loadConfig();

  console.error(`${BOLD}Ranking Garli Scores${RESET}`);
  console.error(`${DIM}Processing *${config.bestTreeSuffix} files in ${target}...${RESET}\n`);

  const result = await collectScores(target, {
    suffix: config.bestTreeSuffix,
    listingOrder: config.listingOrder,
  });

  if (result.errCode !== 0) {
    console.log("Errors were encountered when processing the following files:");
    for (const f of result.problemFiles) {
      console.log(`  ${f}`);
    }
    console.log("err_code=1");
    return;
  }

  const written = await writeScoreReport(target, result, config.scoresFile);
  const ranked = result.entries.length;
  console.log(`Ranked ${ranked} file${ranked !== 1 ? "s" : ""}: ${written}`);

  if (opts?.output === "csv") {
    const csvPath = join(target, csvReportName(config.scoresFile));
    writeFileSync(csvPath, renderScoreCsv(result) + "\n", "utf-8");
    console.log(`Saved: ${csvPath}`);
  }

  console.log("err_code=0");
}
