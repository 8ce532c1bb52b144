/**
 * Shared test helpers — scratch files under tmp/.
 */
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";

export const TMP_ROOT = "tmp";

/** Create (or empty) tmp/<name> and return its path */
export function freshDir(name: string): string {
  const dir = join(TMP_ROOT, name);
  rmSync(dir, { recursive: true, force: true });
  mkdirSync(dir, { recursive: true });
  return dir;
}

/** Write `lines` joined with `eol` and return the file path */
export function writeLines(dir: string, name: string, lines: string[], eol = "\n"): string {
  const path = join(dir, name);
  writeFileSync(path, lines.join(eol) + eol, "utf-8");
  return path;
}
