import { readLines } from "./lines.js";
import type { MrBayesResult } from "./types.js";

const CONTROL_LINE = /^(mcmc|mcmcp)\s/;
const NRUNS = /nruns\s*=\s*(\d+)/;
const NCHAINS = /nchains\s*=\s*(\d+)/;

// MrBayes defaults when the mcmc command leaves them out
const DEFAULT_RUNS = 2;
const DEFAULT_CHAINS = 4;

export function parseMrBayes(lines: string[]): MrBayesResult {
  for (const raw of lines) {
    const line = raw.trim();
    if (!CONTROL_LINE.test(line)) continue;

    const runs = NRUNS.exec(line);
    const chains = NCHAINS.exec(line);

    return {
      fileType: "bayes",
      errCode: 0,
      notices: [],
      runs: runs ? Number.parseInt(runs[1], 10) : DEFAULT_RUNS,
      chains: chains ? Number.parseInt(chains[1], 10) : DEFAULT_CHAINS,
    };
  }

  return {
    fileType: "bayes",
    errCode: 1,
    notices: ["No mcmc block to process, so no values collected"],
  };
}

export async function extractMrBayes(filePath: string): Promise<MrBayesResult> {
  return parseMrBayes(await readLines(filePath));
}
