import { DIGITS } from "../parsers/lines.js";
import type { ExtractionResult } from "../parsers/types.js";

export type ReportValue = string | number | boolean;

// Printed in place of values that were never found
const MISSING = -1;

/** Ordered key/value pairs for a result, always led by file_type and err_code. */
export function reportFields(result: ExtractionResult): [string, ReportValue][] {
  const head: [string, ReportValue][] = [
    ["file_type", result.fileType],
    ["err_code", result.errCode],
  ];

  switch (result.fileType) {
    case "beast":
      return [
        ...head,
        ["datatype", result.dataType ?? "unknown"],
        ["codon_partitioning", result.codonPartitioning],
        ["nu_partitions", result.partitions],
        ["pattern_count", result.patterns],
      ];
    case "beast2":
      return [...head, ["nu_partitions", result.partitions]];
    case "migrate_parm":
      return [...head, ["num_reps", result.replicates]];
    case "migrate_infile":
      return [...head, ["num_loci", result.loci ?? MISSING]];
    case "garli":
      return [
        ...head,
        ["nruns", result.runs ?? MISSING],
        ["bootstrapreps", result.bootstrapReps ?? MISSING],
        ["searchreps", result.searchReps ?? MISSING],
        ["availablememory", result.availableMemory ?? MISSING],
      ];
    case "bayes":
      return [
        ...head,
        ["nruns", result.runs ?? MISSING],
        ["nchains", result.chains ?? MISSING],
      ];
    case "unknown":
      return head;
  }
}

/** `key=value` lines, no trailing newline. */
export function formatReport(result: ExtractionResult): string {
  return reportFields(result)
    .map(([key, value]) => `${key}=${String(value)}`)
    .join("\n");
}

/**
 * Same keys as the text report. Digit strings that fit a safe integer become
 * numbers; longer ones stay strings so no digits are lost.
 */
export function toJson(result: ExtractionResult): Record<string, ReportValue> {
  return Object.fromEntries(
    reportFields(result).map(([key, value]): [string, ReportValue] => {
      if (typeof value !== "string" || !DIGITS.test(value)) return [key, value];
      const n = Number(value);
      return [key, Number.isSafeInteger(n) ? n : value];
    })
  );
}
