import { Command, Option } from "commander";
import * as fs from "fs";
import path from "path";
import { runValidation, errorMessage } from "./runner.js";
import { printHuman } from "./report/printer.js";
import { toJsonReport, writeJsonReport } from "./report/json.js";
import type { ReportFormat } from "./report/types.js";
import { cfg, heuristics } from "./utils/config.js";

export interface CliIO {
  log(line: string): void;
  error(line: string): void;
  exit(code: number): void;
}

const processIO: CliIO = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
  exit: (code) => process.exit(code),
};

// validator-report-ddmmyyyy-hhmmss.json
export function getReportFileName(now = new Date()) {
  const pad = (n: number) => n.toString().padStart(2, "0");
  const dd = pad(now.getDate());
  const mm = pad(now.getMonth() + 1);
  const yyyy = now.getFullYear();
  const hh = pad(now.getHours());
  const min = pad(now.getMinutes());
  const ss = pad(now.getSeconds());
  return `validator-report-${dd}${mm}${yyyy}-${hh}${min}${ss}.json`;
}

export function createProgram(io: CliIO = processIO): Command {
  const program = new Command();

  program
    .name("chat-dataset-validator")
    .description(
      "Validates a JSONL chat fine-tuning dataset and reports token statistics"
    )
    .argument("<file>", "JSONL dataset to validate")
    .addOption(
      new Option("--format <format>", "report format")
        .choices(["text", "json"])
        .default("text")
    )
    .option(
      "--report-dir <dir>",
      "also write a timestamped JSON report into this folder",
      cfg.VALIDATOR_REPORT_FOLDER
    )
    .allowExcessArguments(false)
    .showHelpAfterError("(usage: chat-dataset-validator [--] <file.jsonl>)")
    .action(
      async (file: string, opts: { format: ReportFormat; reportDir?: string }) => {
        try {
          const text = opts.format === "text";
          if (text) {
            io.log("Validating training data...");
            io.log(`File: ${file}`);
            io.log("");
          }

          const started = Date.now();
          const report = await runValidation({
            filePath: file,
            correctionRatio: cfg.TOKEN_CORRECTION_RATIO,
          });
          const json = toJsonReport(
            report,
            { started, finished: Date.now() },
            heuristics
          );

          if (text) {
            printHuman(report, heuristics, io.log);
          } else {
            io.log(JSON.stringify(json, null, 2));
          }

          const reportDir = opts.reportDir?.trim();
          if (reportDir) {
            if (!fs.existsSync(reportDir)) {
              fs.mkdirSync(reportDir, { recursive: true });
            }
            const reportPath = path.join(reportDir, getReportFileName());
            await writeJsonReport(reportPath, json);
            if (text) io.log(`Report written: ${reportPath}`);
          }

          if (text && report.valid) {
            io.log("");
            io.log("Validation complete.");
          }
          io.exit(report.valid ? 0 : 1);
        } catch (err) {
          io.error(`Validator error: ${errorMessage(err)}`);
          io.exit(1);
        }
      }
    );

  return program;
}
