import path from "node:path";
import { z } from "zod";
import { DEFAULT_OPTIONS_PER_QUESTION, MIN_OPTIONS_PER_QUESTION } from "../types/question";
import { TimeLimitSchema } from "../schemas/sessionSchemas";

export const APP_NAME = "DevOps Interview Prep";
export const VERSION = "1.1.0";

export const DEFAULT_QUESTIONS_FILE = path.resolve(
  __dirname,
  "..",
  "..",
  "data",
  "questions",
  "interview_questions.json"
);

const flag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((v) => v === "true" || v === "1");

const EnvSchema = z.object({
  QUIZ_QUESTIONS_FILE: z.string().trim().optional(),
  QUIZ_DEFAULT_COUNT: z.coerce.number().int().positive().default(5),
  QUIZ_INTERVIEW_COUNT: z.coerce.number().int().positive().default(15),
  QUIZ_OPTIONS_PER_QUESTION: z.coerce
    .number()
    .int()
    .min(MIN_OPTIONS_PER_QUESTION)
    .default(DEFAULT_OPTIONS_PER_QUESTION),
  QUIZ_TIME_LIMIT: TimeLimitSchema.optional(),
  QUIZ_VERBOSE: flag,
});

export type AppConfig = {
  questionsFile: string;
  defaultCount: number;
  interviewCount: number;
  optionsPerQuestion: number;
  timeLimitSeconds: number | undefined;
  verbose: boolean;
};

// blank values in .env mean "unset"
function dropBlank(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (v !== undefined && v.trim() !== "") out[k] = v;
  }
  return out;
}

/** Throws ZodError when a QUIZ_* variable is malformed. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const e = EnvSchema.parse(dropBlank(env));
  return {
    questionsFile: e.QUIZ_QUESTIONS_FILE || DEFAULT_QUESTIONS_FILE,
    defaultCount: e.QUIZ_DEFAULT_COUNT,
    interviewCount: e.QUIZ_INTERVIEW_COUNT,
    optionsPerQuestion: e.QUIZ_OPTIONS_PER_QUESTION,
    timeLimitSeconds: e.QUIZ_TIME_LIMIT,
    verbose: e.QUIZ_VERBOSE,
  };
}
