import { z } from "zod";
import { DifficultySchema } from "./questionsSchemas";

const text = z.string().trim().min(1);

const TIME_LIMIT_RE = /^(\d+)\s*(s|secs?|seconds?|m|mins?|minutes?)?$/i;

/** "90", "90s", "45min", "2m" → seconds. Null when unparseable or zero. */
export function parseTimeLimit(value: string): number | null {
  const m = TIME_LIMIT_RE.exec(value.trim());
  if (!m) return null;
  const amount = Number(m[1]);
  const unit = (m[2] ?? "s").toLowerCase();
  const seconds = unit.startsWith("m") ? amount * 60 : amount;
  return seconds > 0 ? seconds : null;
}

export const TimeLimitSchema = z.string().transform((v, ctx) => {
  const seconds = parseTimeLimit(v);
  if (seconds === null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `invalid time limit "${v}" (use e.g. 90, 90s or 45min)`,
    });
    return z.NEVER;
  }
  return seconds;
});

export const CountSchema = z.coerce.number().int().positive();
export const SeedSchema = z.coerce.number().int();

export const GlobalOptionsSchema = z.object({
  questions: text.optional(),
  verbose: z.boolean().default(false),
});

export const PracticeOptionsSchema = z.object({
  difficulty: DifficultySchema.optional(),
  count: CountSchema.optional(),
  companyType: text.optional(),
  interviewMode: z.boolean().default(false),
  timeLimit: TimeLimitSchema.optional(),
  repeat: z.boolean().default(false),
  shuffle: z.boolean().default(false),
  seed: SeedSchema.optional(),
  export: text.optional(),
});

export const InterviewOptionsSchema = z.object({
  count: CountSchema.optional(),
  companyType: text.optional(),
  duration: TimeLimitSchema.optional(),
  shuffle: z.boolean().default(false),
  seed: SeedSchema.optional(),
  export: text.optional(),
  yes: z.boolean().default(false),
});

export const QuickOptionsSchema = z.object({
  topic: text.optional(),
  shuffle: z.boolean().default(false),
  seed: SeedSchema.optional(),
});
