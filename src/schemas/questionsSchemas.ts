import { z } from "zod";
import { DIFFICULTIES } from "../types/question";

const text = z.string().trim().min(1);

export const DifficultySchema = z.string().trim().toLowerCase().pipe(z.enum(DIFFICULTIES));

// bank files name the prompt `question`; `question_text` is accepted as well
function withQuestionText(raw: unknown): unknown {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) return raw;
  if ("question_text" in raw || !("question" in raw)) return raw;
  const { question, ...rest } = raw;
  return { ...rest, question_text: question };
}

/** One entry as it appears in the bank file. */
export const QuestionRecordSchema = z.preprocess(
  withQuestionText,
  z.object({
    id: text,
    topic: text.toLowerCase(),
    difficulty: DifficultySchema,
    question_text: text,
    options: z.array(text),
    correct_answer: z.number().int(),
    explanation: text,
    scenario: text.nullish(),
    company_tags: z.array(text).nullish(),
    real_world_context: text.nullish(),
  })
);
export type QuestionRecord = z.infer<typeof QuestionRecordSchema>;

/** Top-level file shape; a bare array of records is accepted too. */
export const QuestionBankFileSchema = z.preprocess(
  (raw) => (Array.isArray(raw) ? { questions: raw } : raw),
  z.object({
    questions: z.array(z.unknown()),
  })
);
