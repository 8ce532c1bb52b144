import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { extract } from "../parsers/index.js";
import { detectFileType } from "../parsers/detect.js";
import { FILE_TYPES, isFileType, type FileType } from "../parsers/types.js";
import { formatReport, toJson } from "../core/report.js";

const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

export interface ParseOptions {
  type?: string;
  json?: boolean;
}

function requireFile(file: string): string {
  const filepath = resolve(file);
  if (!existsSync(filepath)) {
    console.error(`Error: File not found: ${filepath}`);
    process.exit(1);
  }
  return filepath;
}

export async function parse(file: string, opts?: ParseOptions): Promise<void> {
  const filepath = requireFile(file);

  let fileType: FileType | undefined;
  if (opts?.type !== undefined) {
    if (!isFileType(opts.type)) {
      console.error(`Error: Invalid file type '${opts.type}'. Valid: ${FILE_TYPES.join(", ")}`);
      process.exit(1);
    }
    fileType = opts.type;
  }

  const result = await extract(filepath, fileType);

  for (const notice of result.notices) {
    console.error(`${DIM}${notice}${RESET}`);
  }

  if (opts?.json) {
    console.log(JSON.stringify(toJson(result)));
  } else {
    console.log(formatReport(result));
  }
}

export async function detect(file: string): Promise<void> {
  const filepath = requireFile(file);
  console.log(await detectFileType(filepath));
}
