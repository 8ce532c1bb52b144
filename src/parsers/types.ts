export const FILE_TYPES = [
  "beast",
  "beast2",
  "migrate_parm",
  "migrate_infile",
  "bayes",
  "garli",
] as const;

export type FileType = (typeof FILE_TYPES)[number];
export type DetectedType = FileType | "unknown";

export type ErrCode = 0 | 1;

interface BaseResult {
  errCode: ErrCode;
  notices: string[];    // human-readable, printed to stderr by the CLI
}

export interface BeastResult extends BaseResult {
  fileType: "beast";
  dataType?: string;    // last dataType="..." on an alignment line
  codonPartitioning: boolean;
  partitions: number;
  patterns: number;
}

export interface Beast2Result extends BaseResult {
  fileType: "beast2";
  partitions: number;
}

export interface MigrateParmResult extends BaseResult {
  fileType: "migrate_parm";
  replicates: string;       // raw text after "replicate=YES:", "1" when absent
  replicateCount?: number;  // only set when `replicates` is all digits
}

export interface MigrateInfileResult extends BaseResult {
  fileType: "migrate_infile";
  loci?: string;            // 2nd field of the first record
  lociCount?: number;
}

// Digit text exactly as captured; no precision loss on very large values
export interface GarliResult extends BaseResult {
  fileType: "garli";
  runs?: string;
  bootstrapReps?: string;
  searchReps?: string;
  availableMemory?: string;
}

export interface MrBayesResult extends BaseResult {
  fileType: "bayes";
  runs?: number;
  chains?: number;
}

export interface UnknownResult extends BaseResult {
  fileType: "unknown";
}

export type ExtractionResult =
  | BeastResult
  | Beast2Result
  | MigrateParmResult
  | MigrateInfileResult
  | GarliResult
  | MrBayesResult
  | UnknownResult;

export type Extractor = (filePath: string) => Promise<ExtractionResult>;

export function isFileType(value: string): value is FileType {
  return (FILE_TYPES as readonly string[]).includes(value);
}
