import { destination, pino } from "pino";
import { cfg } from "./config.js";

// stdout belongs to the report, logs go to stderr
const pretty =
  process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test";

export const log = pretty
  ? pino({
      level: cfg.LOG_LEVEL,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          destination: 2,
        },
      },
    })
  : pino({ level: cfg.LOG_LEVEL }, destination(2));
