#!/usr/bin/env node
import { createProgram } from "../validator/cli.js";

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error("Validator error:", err instanceof Error ? err.message : err);
    process.exit(1);
  });
