import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";

/**
 * Split text into lines the way a universal-newline reader would:
 * \r\n, \r and \n all end a line, and a final terminator does not
 * produce an extra empty line.
 */
export function splitLines(text: string): string[] {
  if (text === "") return [];
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/** Read a whole text file as lines. Throws if the file is missing. */
export async function readLines(filePath: string): Promise<string[]> {
  if (!existsSync(filePath)) {
    throw new Error(`File not found: ${filePath}`);
  }
  const raw = await readFile(filePath, "utf-8");
  return splitLines(raw);
}

export const DIGITS = /^\d+$/;
