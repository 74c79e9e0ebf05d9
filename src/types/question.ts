// src/types/question.ts

export const DIFFICULTIES = ["easy", "medium", "hard"] as const;
export type Difficulty = (typeof DIFFICULTIES)[number];

export const DEFAULT_OPTIONS_PER_QUESTION = 4;
export const MIN_OPTIONS_PER_QUESTION = 2;

export type Question = Readonly<{
  id: string;
  topic: string;
  difficulty: Difficulty;
  question_text: string;
  options: readonly string[];
  correct_answer: number; // 1-based index into options
  explanation: string;
  scenario: string | null;
  company_tags: readonly string[];
  real_world_context: string | null;
}>;
