import { describe, it, expect } from "vitest";
import {
  printHuman,
  recommendations,
  renderHuman,
  tokenLimitFlags,
} from "../src/validator/report/printer.js";
import { DEFAULT_HEURISTICS, type FileReport } from "../src/validator/report/types.js";

function report(overrides: Partial<FileReport> = {}): FileReport {
  return {
    filePath: "/data/train.jsonl",
    valid: true,
    totalLines: 2,
    validLines: 2,
    errors: [],
    warnings: [],
    tokenStats: { minTokens: 4, maxTokens: 15, totalTokens: 19, avgTokens: 9.5 },
    ...overrides,
  };
}

function withMax(maxTokens: number): FileReport {
  return report({
    tokenStats: { minTokens: 1, maxTokens, totalTokens: maxTokens, avgTokens: 1 },
  });
}

describe("tokenLimitFlags", () => {
  it("flags each threshold independently", () => {
    expect(tokenLimitFlags(withMax(4000))).toEqual([]);
    expect(tokenLimitFlags(withMax(5000))).toEqual([
      "Some examples exceed 4000 tokens",
    ]);
    expect(tokenLimitFlags(withMax(9000))).toEqual([
      "Some examples exceed 4000 tokens",
      "Some examples exceed 8000 tokens",
    ]);
  });
});

describe("recommendations", () => {
  it("flags few and short examples", () => {
    expect(recommendations(report())).toEqual([
      "Consider adding more training examples (at least 10 recommended)",
      "Examples seem quite short - consider adding more detail",
      "File format is valid and ready for fine-tuning",
    ]);
  });

  it("flags long examples", () => {
    const long = report({
      validLines: 20,
      tokenStats: { minTokens: 2100, maxTokens: 2900, totalTokens: 50000, avgTokens: 2500 },
    });
    expect(recommendations(long)).toEqual([
      "Examples are quite long - consider breaking them into smaller parts",
      "File format is valid and ready for fine-tuning",
    ]);
  });

  it("skips the length advice without valid examples", () => {
    const empty = report({
      valid: false,
      validLines: 0,
      errors: ["Line 1: Missing 'messages' field"],
      tokenStats: { minTokens: 0, maxTokens: 0, totalTokens: 0, avgTokens: 0 },
    });
    expect(recommendations(empty)).toEqual([
      "Consider adding more training examples (at least 10 recommended)",
    ]);
  });

  it("uses the given heuristics", () => {
    const h = { ...DEFAULT_HEURISTICS, minExamples: 2, shortAvgTokens: 5 };
    expect(recommendations(report(), h)).toEqual([
      "File format is valid and ready for fine-tuning",
    ]);
  });
});

describe("renderHuman", () => {
  it("renders a passing report", () => {
    const lines = renderHuman(report());
    expect(lines[0]).toBe("Validation report — train.jsonl");
    expect(lines[1]).toBe("File: /data/train.jsonl");
    expect(lines).toContain("  total lines.............2");
    expect(lines).toContain("  errors..................0  ✅");
    expect(lines).toContain("  min/avg/max tokens......4 / 9.5 / 15");
    expect(lines).toContain("  total tokens............19");
    expect(lines).toContain("  - File format is valid and ready for fine-tuning");
    expect(lines).not.toContain("[ERRORS] (0)");
    expect(lines[lines.length - 1]).toBe("PASS ✅");
  });

  it("truncates long error lists", () => {
    const errors = Array.from({ length: 12 }, (_, i) => `Line ${i + 1}: Missing 'messages' field`);
    const lines = renderHuman(report({ valid: false, errors }));
    expect(lines).toContain("[ERRORS] (12)");
    expect(lines).toContain("  Line 10: Missing 'messages' field");
    expect(lines).not.toContain("  Line 11: Missing 'messages' field");
    expect(lines).toContain("  ... and 2 more errors");
    expect(lines[lines.length - 1]).toBe("FAIL ❌");
  });

  it("truncates warnings by maxListed", () => {
    const warnings = ["Line 1: No 'user' message found", "Line 2: No 'user' message found"];
    const lines = renderHuman(report({ warnings }), { ...DEFAULT_HEURISTICS, maxListed: 1 });
    expect(lines).toContain("[WARNINGS] (2)");
    expect(lines).toContain("  ... and 1 more warnings");
  });

  it("shows token limit flags", () => {
    expect(renderHuman(withMax(9000))).toContain("  ⚠️  Some examples exceed 8000 tokens");
  });

  it("omits token stats without valid examples", () => {
    const lines = renderHuman(
      report({ validLines: 0, tokenStats: { minTokens: 0, maxTokens: 0, totalTokens: 0, avgTokens: 0 } })
    );
    expect(lines).toContain("  (no valid examples)");
    expect(lines.some((l) => l.includes("min/avg/max"))).toBe(false);
  });
});

describe("printHuman", () => {
  it("writes every rendered line to the sink", () => {
    const written: string[] = [];
    printHuman(report(), DEFAULT_HEURISTICS, (line) => written.push(line));
    expect(written).toEqual(renderHuman(report()));
  });
});
