import fs from "fs";
import { recommendations } from "./printer.js";
import {
  DEFAULT_HEURISTICS,
  type FileReport,
  type Heuristics,
  type JsonReport,
} from "./types.js";

export function toJsonReport(
  report: FileReport,
  timing: { started: number; finished: number },
  h: Heuristics = DEFAULT_HEURISTICS
): JsonReport {
  return {
    ...report,
    recommendations: recommendations(report, h),
    startedAt: new Date(timing.started).toISOString(),
    finishedAt: new Date(timing.finished).toISOString(),
    durationMs: timing.finished - timing.started,
  };
}

export async function writeJsonReport(path: string, report: JsonReport) {
  const json = JSON.stringify(report, null, 2);
  await fs.promises.writeFile(path, json, "utf8");
}
