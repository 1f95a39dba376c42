import "dotenv/config";
import { z } from "zod";
import { DEFAULT_HEURISTICS, type Heuristics } from "../report/types.js";
import { DEFAULT_CORRECTION_RATIO } from "./tokens.js";

const schema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  VALIDATOR_REPORT_FOLDER: z.string().optional(),
  TOKEN_CORRECTION_RATIO: z.coerce
    .number()
    .min(0)
    .default(DEFAULT_CORRECTION_RATIO),
  CONTEXT_WARN_TOKENS: z.coerce
    .number()
    .int()
    .min(1)
    .default(DEFAULT_HEURISTICS.contextWarnTokens),
  CONTEXT_LIMIT_TOKENS: z.coerce
    .number()
    .int()
    .min(1)
    .default(DEFAULT_HEURISTICS.contextLimitTokens),
  MIN_EXAMPLES: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_HEURISTICS.minExamples),
  SHORT_AVG_TOKENS: z.coerce
    .number()
    .min(0)
    .default(DEFAULT_HEURISTICS.shortAvgTokens),
  LONG_AVG_TOKENS: z.coerce
    .number()
    .min(0)
    .default(DEFAULT_HEURISTICS.longAvgTokens),
  REPORT_MAX_ITEMS: z.coerce
    .number()
    .int()
    .min(1)
    .default(DEFAULT_HEURISTICS.maxListed),
});

export type AppConfig = z.infer<typeof schema>;
export const cfg: AppConfig = schema.parse(process.env);

export const heuristics: Heuristics = {
  contextWarnTokens: cfg.CONTEXT_WARN_TOKENS,
  contextLimitTokens: cfg.CONTEXT_LIMIT_TOKENS,
  minExamples: cfg.MIN_EXAMPLES,
  shortAvgTokens: cfg.SHORT_AVG_TOKENS,
  longAvgTokens: cfg.LONG_AVG_TOKENS,
  maxListed: cfg.REPORT_MAX_ITEMS,
};
