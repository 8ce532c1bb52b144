#!/usr/bin/env node

import { Command } from "commander";
import { parse, detect } from "./commands/parse.js";
import { rank } from "./commands/rank.js";
import { configShow, configSet } from "./commands/config.js";

const program = new Command();

program
  .name("phylo-scan")
  .description("Pull run parameters out of phylogenetics input files and rank GARLI best trees")
  .version("0.1.0");

program
  .command("parse <file>")
  .description("Extract key=value run parameters (type is auto-detected unless given)")
  .option("-t, --type <type>", "beast, beast2, migrate_parm, migrate_infile, bayes or garli")
  .option("-j, --json", "Output a JSON object instead of key=value lines")
  .action(async (file: string, options: { type?: string; json?: boolean }) => {
    await parse(file, { type: options.type, json: options.json });
  });

program
  .command("detect <file>")
  .description("Print the detected file type")
  .action(async (file: string) => {
    await detect(file);
  });

program
  .command("rank [dir]")
  .description("Rank *.best.tre files by GarliScore and write garli_scores.txt")
  .option("-o, --output <format>", "Also save the ranking as csv")
  .action(async (dir: string | undefined, options: { output?: string }) => {
    await rank(dir, { output: options.output });
  });

const configCmd = program
  .command("config")
  .description("View and modify configuration");

configCmd
  .command("show")
  .description("Show current configuration")
  .action(async () => {
    await configShow();
  });

configCmd
  .command("set <key> <value>")
  .description("Set a config value (bestTreeSuffix, scoresFile, listingOrder)")
  .action(async (key: string, value: string) => {
    await configSet(key, value);
  });

// `phylo-scan config` with no subcommand → show
configCmd.action(async () => {
  await configShow();
});

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
