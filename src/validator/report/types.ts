export type ReportFormat = "text" | "json";

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export interface TokenStats {
  minTokens: number;
  maxTokens: number;
  totalTokens: number;
  avgTokens: number;
}

export interface FileReport {
  filePath: string;
  valid: boolean;
  totalLines: number; // highest line number seen, blank lines included
  validLines: number;
  errors: string[];
  warnings: string[];
  tokenStats: TokenStats;
}

export interface JsonReport extends FileReport {
  recommendations: string[];
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}

export interface Heuristics {
  contextWarnTokens: number;
  contextLimitTokens: number;
  minExamples: number;
  shortAvgTokens: number;
  longAvgTokens: number;
  maxListed: number; // errors/warnings shown in the text report
}

export const DEFAULT_HEURISTICS: Heuristics = {
  contextWarnTokens: 4000,
  contextLimitTokens: 8000,
  minExamples: 10,
  shortAvgTokens: 50,
  longAvgTokens: 2000,
  maxListed: 10,
};
