import {
  DEFAULT_OPTIONS_PER_QUESTION,
  MIN_OPTIONS_PER_QUESTION,
  type Question,
} from "../types/question";
import {
  QuestionBankFileSchema,
  QuestionRecordSchema,
  type QuestionRecord,
} from "../schemas/questionsSchemas";
import type { Violation } from "../utils/errors";
import { formatZodError } from "../utils/zodError";

export type BankValidation = {
  questions: Question[];
  violations: Violation[];
};

function norm(s: string) {
  return s.toLowerCase().replace(/\s+/g, " ").trim();
}

function rawId(raw: unknown): string | undefined {
  if (typeof raw !== "object" || raw === null || !("id" in raw)) return undefined;
  return typeof raw.id === "string" && raw.id.trim() ? raw.id.trim() : undefined;
}

/** Cross-field checks zod's per-field rules can't express. */
export function checkQuestion(
  q: QuestionRecord,
  optionsPerQuestion: number = DEFAULT_OPTIONS_PER_QUESTION
): Violation[] {
  const out: Violation[] = [];

  if (q.options.length !== optionsPerQuestion) {
    out.push({
      code: "option_count",
      path: "options",
      message: `expected exactly ${optionsPerQuestion} options, got ${q.options.length}`,
    });
  }

  if (new Set(q.options.map(norm)).size !== q.options.length) {
    out.push({ code: "duplicate_option", path: "options", message: "options must be distinct" });
  }

  if (q.correct_answer < 1 || q.correct_answer > q.options.length) {
    out.push({
      code: "correct_answer_range",
      path: "correct_answer",
      message: `correct_answer must be between 1 and ${q.options.length}, got ${q.correct_answer}`,
    });
  }

  return out;
}

export function toQuestion(q: QuestionRecord): Question {
  return Object.freeze({
    id: q.id,
    topic: q.topic,
    difficulty: q.difficulty,
    question_text: q.question_text,
    options: Object.freeze([...q.options]),
    correct_answer: q.correct_answer,
    explanation: q.explanation,
    scenario: q.scenario ?? null,
    company_tags: Object.freeze([...new Set((q.company_tags ?? []).map((t) => t.toLowerCase()))]),
    real_world_context: q.real_world_context ?? null,
  });
}

/**
 * Validate a whole parsed bank file. Every entry is checked and every problem
 * is reported; `questions` is empty unless there are no violations at all.
 */
export function validateQuestionBank(
  data: unknown,
  optionsPerQuestion: number = DEFAULT_OPTIONS_PER_QUESTION
): BankValidation {
  if (!Number.isInteger(optionsPerQuestion) || optionsPerQuestion < MIN_OPTIONS_PER_QUESTION) {
    throw new RangeError(
      `optionsPerQuestion must be an integer >= ${MIN_OPTIONS_PER_QUESTION}, got ${optionsPerQuestion}`
    );
  }

  const file = QuestionBankFileSchema.safeParse(data);
  if (!file.success) {
    return { questions: [], violations: formatZodError(file.error) };
  }

  const violations: Violation[] = [];
  const questions: Question[] = [];
  const firstSeen = new Map<string, number>();

  file.data.questions.forEach((raw, i) => {
    const at = `questions.${i}`;

    const id = rawId(raw);
    if (id !== undefined) {
      const first = firstSeen.get(id);
      if (first === undefined) {
        firstSeen.set(id, i);
      } else {
        violations.push({
          code: "duplicate_id",
          path: `${at}.id`,
          message: `duplicate id "${id}" (first used by questions.${first})`,
        });
      }
    }

    const parsed = QuestionRecordSchema.safeParse(raw);
    if (!parsed.success) {
      violations.push(...formatZodError(parsed.error, ["questions", i]));
      return;
    }

    const problems = checkQuestion(parsed.data, optionsPerQuestion);
    if (problems.length > 0) {
      violations.push(...problems.map((p) => ({ ...p, path: `${at}.${p.path}` })));
      return;
    }

    questions.push(toQuestion(parsed.data));
  });

  return { questions: violations.length > 0 ? [] : questions, violations };
}
