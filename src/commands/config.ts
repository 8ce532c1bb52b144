import {
  loadConfig,
  saveConfig,
  applyConfigValue,
  CONFIG_PATH,
} from "../core/config.js";

const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

export async function configShow(): Promise<void> {
  const cfg = loadConfig();

  console.log(`${BOLD}phylo-scan configuration${RESET}`);
  console.log(`${DIM}${CONFIG_PATH}${RESET}\n`);

  console.log(`  bestTreeSuffix: ${cfg.bestTreeSuffix}`);
  console.log(`  scoresFile:     ${cfg.scoresFile}`);
  console.log(`  listingOrder:   ${cfg.listingOrder}`);
}

export async function configSet(key: string, value: string): Promise<void> {
  try {
    const next = applyConfigValue(loadConfig(), key, value);
    saveConfig(next);
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
  console.log(`${key} set to: ${value}`);
}
