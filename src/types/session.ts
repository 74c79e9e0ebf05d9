// src/types/session.ts
import type { Difficulty, Question } from "./question";

export type SessionOptions = {
  topic?: string;
  difficulty?: Difficulty;
  count: number;
  interviewMode?: boolean;
  timeLimitSeconds?: number;
  allowRepeats?: boolean;
  companyTag?: string;
  shuffleOptions?: boolean;
};

export type SessionPhase =
  | "created"
  | "awaiting_answer"
  | "recorded"
  | "complete"
  | "summary";

export type EndReason = "exhausted" | "timed_out" | "abandoned";

export type ResponseOutcome = "answered" | "skipped" | "timed_out";

export type SessionResponse = {
  question_id: string;
  topic: string;
  difficulty: Difficulty;
  chosen_index: number | null; // 1-based, in the question's own option order
  is_correct: boolean;
  outcome: ResponseOutcome;
  elapsed_ms: number;
  answered_at: string;
};

export type PresentedQuestion = {
  question: Question;
  position: number; // 1-based
  total: number;
  /** Options in display order; equals question.options unless shuffled. */
  options: readonly string[];
  interviewMode: boolean;
  remainingMs: number | null;
};

export type SessionNotice = {
  kind: "reduced_count";
  requested: number;
  available: number;
};
