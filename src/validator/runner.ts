import fs from "node:fs";
import { decodeExample } from "./readers/recordReader.js";
import type { FileReport } from "./report/types.js";
import { readLines } from "./utils/lines.js";
import { log } from "./utils/logger.js";
import { countExampleTokens, DEFAULT_CORRECTION_RATIO } from "./utils/tokens.js";

export async function runValidation(opts: {
  filePath: string;
  correctionRatio?: number;
}): Promise<FileReport> {
  const { filePath } = opts;
  const correctionRatio = opts.correctionRatio ?? DEFAULT_CORRECTION_RATIO;

  const report: FileReport = {
    filePath,
    valid: true,
    totalLines: 0,
    validLines: 0,
    errors: [],
    warnings: [],
    tokenStats: { minTokens: 0, maxTokens: 0, totalTokens: 0, avgTokens: 0 },
  };

  if (!fs.existsSync(filePath)) {
    report.valid = false;
    report.errors.push(`File not found: ${filePath}`);
    return report;
  }

  log.debug({ filePath }, "scan started");

  // no valid record yet
  let minTokens = Number.POSITIVE_INFINITY;
  const stats = report.tokenStats;

  try {
    let lineNumber = 0;
    for await (const raw of readLines(filePath)) {
      lineNumber++;
      report.totalLines = lineNumber;
      const line = raw.trim();
      if (!line) continue;

      let data: unknown;
      try {
        data = JSON.parse(line);
      } catch (err) {
        report.valid = false;
        report.errors.push(
          `Line ${lineNumber}: Invalid JSON - ${errorMessage(err)}`
        );
        log.debug({ line: lineNumber }, "invalid json");
        continue;
      }

      const decoded = decodeExample(data, lineNumber);
      if (decoded.ok) {
        report.validLines++;
        const tokens = countExampleTokens(decoded.value, correctionRatio);
        minTokens = Math.min(minTokens, tokens);
        stats.maxTokens = Math.max(stats.maxTokens, tokens);
        stats.totalTokens += tokens;
      } else {
        report.valid = false;
        report.errors.push(...decoded.errors);
        log.debug(
          { line: lineNumber, errors: decoded.errors.length },
          "invalid record"
        );
      }
      report.warnings.push(...decoded.warnings);
    }
  } catch (err) {
    report.valid = false;
    report.errors.push(`Error reading file: ${errorMessage(err)}`);
    log.warn({ filePath, err }, "scan aborted");
  }

  stats.avgTokens =
    report.validLines > 0 ? stats.totalTokens / report.validLines : 0;
  stats.minTokens = Number.isFinite(minTokens) ? minTokens : 0;

  log.info(
    {
      filePath,
      totalLines: report.totalLines,
      validLines: report.validLines,
      errors: report.errors.length,
      warnings: report.warnings.length,
    },
    "scan finished"
  );
  return report;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
