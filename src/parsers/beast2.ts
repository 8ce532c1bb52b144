import { readLines } from "./lines.js";
import type { Beast2Result } from "./types.js";

const LIKELIHOOD_TAG = '<distribution id="likelihood"';

/** Partitions = opening <distribution> tags nested after the likelihood distribution. */
export function parseBeast2(lines: string[]): Beast2Result {
  let counting = false;
  let partitions = 0;

  for (const raw of lines) {
    const line = raw.trimEnd();

    if (line.includes(LIKELIHOOD_TAG)) {
      counting = true;
      continue;
    }

    if (counting && line.includes("<distribution") && !line.includes("/>")) {
      partitions++;
    }
  }

  return {
    fileType: "beast2",
    errCode: partitions <= 0 ? 1 : 0,
    notices: [],
    partitions,
  };
}

export async function extractBeast2(filePath: string): Promise<Beast2Result> {
  return parseBeast2(await readLines(filePath));
}
