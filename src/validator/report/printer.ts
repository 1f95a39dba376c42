import path from "node:path";
import { DEFAULT_HEURISTICS, type FileReport, type Heuristics } from "./types.js";

export function tokenLimitFlags(
  report: FileReport,
  h: Heuristics = DEFAULT_HEURISTICS
): string[] {
  const { maxTokens } = report.tokenStats;
  const flags: string[] = [];
  if (maxTokens > h.contextWarnTokens) {
    flags.push(`Some examples exceed ${h.contextWarnTokens} tokens`);
  }
  if (maxTokens > h.contextLimitTokens) {
    flags.push(`Some examples exceed ${h.contextLimitTokens} tokens`);
  }
  return flags;
}

export function recommendations(
  report: FileReport,
  h: Heuristics = DEFAULT_HEURISTICS
): string[] {
  const recs: string[] = [];
  if (report.validLines < h.minExamples) {
    recs.push(
      `Consider adding more training examples (at least ${h.minExamples} recommended)`
    );
  }
  if (report.validLines > 0) {
    const avg = report.tokenStats.avgTokens;
    if (avg < h.shortAvgTokens) {
      recs.push("Examples seem quite short - consider adding more detail");
    } else if (avg > h.longAvgTokens) {
      recs.push(
        "Examples are quite long - consider breaking them into smaller parts"
      );
    }
  }
  if (report.errors.length === 0) {
    recs.push("File format is valid and ready for fine-tuning");
  }
  return recs;
}

export function renderHuman(
  report: FileReport,
  h: Heuristics = DEFAULT_HEURISTICS
): string[] {
  const pad = (s: string, n = 24) => (s + "...").padEnd(n, ".");
  const out: string[] = [];
  const stats = report.tokenStats;

  out.push(`Validation report — ${path.basename(report.filePath)}`);
  out.push(`File: ${report.filePath}`);
  out.push("");

  out.push("[RECORDS]");
  out.push(`  ${pad("total lines")}${report.totalLines}`);
  out.push(`  ${pad("valid examples")}${report.validLines}`);
  out.push(
    `  ${pad("errors")}${report.errors.length}${report.errors.length === 0 ? "  ✅" : "  ❌"}`
  );
  out.push(`  ${pad("warnings")}${report.warnings.length}`);
  out.push("");

  out.push("[TOKENS]");
  if (report.validLines > 0) {
    out.push(
      `  ${pad("min/avg/max tokens")}${stats.minTokens} / ${stats.avgTokens.toFixed(1)} / ${stats.maxTokens}`
    );
    out.push(`  ${pad("total tokens")}${stats.totalTokens}`);
    for (const flag of tokenLimitFlags(report, h)) {
      out.push(`  ⚠️  ${flag}`);
    }
  } else {
    out.push("  (no valid examples)");
  }
  out.push("");

  listSection(out, "ERRORS", "errors", report.errors, h.maxListed);
  listSection(out, "WARNINGS", "warnings", report.warnings, h.maxListed);

  out.push("[RECOMMENDATIONS]");
  for (const rec of recommendations(report, h)) {
    out.push(`  - ${rec}`);
  }
  out.push("");
  out.push(report.valid ? "PASS ✅" : "FAIL ❌");
  return out;
}

function listSection(
  out: string[],
  title: string,
  noun: string,
  items: string[],
  max: number
) {
  if (items.length === 0) return;
  out.push(`[${title}] (${items.length})`);
  for (const item of items.slice(0, max)) {
    out.push(`  ${item}`);
  }
  if (items.length > max) {
    out.push(`  ... and ${items.length - max} more ${noun}`);
  }
  out.push("");
}

export function printHuman(
  report: FileReport,
  h: Heuristics = DEFAULT_HEURISTICS,
  write: (line: string) => void = (line) => console.log(line)
) {
  for (const line of renderHuman(report, h)) {
    write(line);
  }
}
