import fs from "node:fs";
import path from "node:path";
import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { DEFAULT_QUESTIONS_FILE, loadConfig } from "../config/env";
import {
  CountSchema,
  PracticeOptionsSchema,
  TimeLimitSchema,
  parseTimeLimit,
} from "../schemas/sessionSchemas";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      questionsFile: DEFAULT_QUESTIONS_FILE,
      defaultCount: 5,
      interviewCount: 15,
      optionsPerQuestion: 4,
      timeLimitSeconds: undefined,
      verbose: false,
    });
  });

  it("points at the bundled bank", () => {
    expect(DEFAULT_QUESTIONS_FILE.endsWith(path.join("data", "questions", "interview_questions.json"))).toBe(true);
    expect(fs.existsSync(DEFAULT_QUESTIONS_FILE)).toBe(true);
  });

  it("reads QUIZ_* variables", () => {
    const config = loadConfig({
      QUIZ_QUESTIONS_FILE: "bank.json",
      QUIZ_DEFAULT_COUNT: "8",
      QUIZ_INTERVIEW_COUNT: "20",
      QUIZ_OPTIONS_PER_QUESTION: "3",
      QUIZ_TIME_LIMIT: "2m",
      QUIZ_VERBOSE: "1",
    });
    expect(config).toEqual({
      questionsFile: "bank.json",
      defaultCount: 8,
      interviewCount: 20,
      optionsPerQuestion: 3,
      timeLimitSeconds: 120,
      verbose: true,
    });
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ QUIZ_DEFAULT_COUNT: "  ", QUIZ_TIME_LIMIT: "" });
    expect(config.defaultCount).toBe(5);
    expect(config.timeLimitSeconds).toBeUndefined();
  });

  it.each([
    ["QUIZ_DEFAULT_COUNT", "zero"],
    ["QUIZ_OPTIONS_PER_QUESTION", "1"],
    ["QUIZ_VERBOSE", "maybe"],
    ["QUIZ_TIME_LIMIT", "soon"],
  ])("rejects %s=%s", (key, value) => {
    expect(() => loadConfig({ [key]: value })).toThrow(ZodError);
  });
});

describe("parseTimeLimit", () => {
  it.each([
    ["90", 90],
    ["90s", 90],
    ["45min", 2700],
    ["2 m", 120],
    ["1 Minute", 60],
    [" 30sec ", 30],
  ])("%s → %d seconds", (input, seconds) => {
    expect(parseTimeLimit(input)).toBe(seconds);
  });

  it.each(["0", "abc", "-5", "1.5m", "10h", ""])("rejects %j", (input) => {
    expect(parseTimeLimit(input)).toBeNull();
  });

  it("explains a bad value", () => {
    const result = TimeLimitSchema.safeParse("soon");
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe('invalid time limit "soon" (use e.g. 90, 90s or 45min)');
    }
  });
});

describe("command option schemas", () => {
  it("coerces practice options from commander strings", () => {
    expect(
      PracticeOptionsSchema.parse({ count: "3", difficulty: "HARD", timeLimit: "30s", seed: "7" })
    ).toEqual({
      count: 3,
      difficulty: "hard",
      timeLimit: 30,
      seed: 7,
      interviewMode: false,
      repeat: false,
      shuffle: false,
    });
  });

  it("requires a positive whole count", () => {
    expect(CountSchema.safeParse("0").success).toBe(false);
    expect(CountSchema.safeParse("2.5").success).toBe(false);
    expect(CountSchema.parse("4")).toBe(4);
  });
});
