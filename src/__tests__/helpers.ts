import path from "node:path";
import type { AskOptions, Prompter } from "../services/prompter";
import type { Rng } from "../services/random";
import type { Question } from "../types/question";
import type { Logger } from "../utils/logger";

export const FIXTURES_DIR = path.join(__dirname, "fixtures");
export const SAMPLE_BANK = path.join(FIXTURES_DIR, "sample_questions.json");

export const T0 = Date.UTC(2026, 0, 15, 9, 0, 0);

/** Always picks index 0, so shuffles and samples keep the pool's order. */
export const firstRng: Rng = () => 0;

export function makeQuestion(overrides: Partial<Question> = {}): Question {
  return {
    id: "q-1",
    topic: "aws",
    difficulty: "easy",
    question_text: "Which service stores objects?",
    options: ["EBS", "S3", "EFS", "RDS"],
    correct_answer: 2,
    explanation: "S3 is object storage.",
    scenario: null,
    company_tags: [],
    real_world_context: null,
    ...overrides,
  };
}

export function rawQuestion(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: "q-1",
    topic: "aws",
    difficulty: "easy",
    question: "Which service stores objects?",
    options: ["EBS", "S3", "EFS", "RDS"],
    correct_answer: 2,
    explanation: "S3 is object storage.",
    ...overrides,
  };
}

export function fakeClock(start = T0) {
  let t = start;
  return {
    now: () => t,
    advance(ms: number) {
      t += ms;
    },
  };
}

export type AskedPrompt = { question: string; timeoutMs: number | null | undefined };

/**
 * Replays canned answers in order. A null entry (or running out of answers)
 * behaves like a timed-out or closed terminal.
 */
export class ScriptedPrompter implements Prompter {
  readonly asked: AskedPrompt[] = [];
  closed = false;

  constructor(
    private readonly answers: Array<string | null>,
    private readonly beforeAnswer?: (prompt: AskedPrompt) => void
  ) {}

  async ask(question: string, options: AskOptions = {}): Promise<string | null> {
    const prompt = { question, timeoutMs: options.timeoutMs };
    this.asked.push(prompt);
    this.beforeAnswer?.(prompt);
    const next = this.answers.shift();
    return next === undefined ? null : next;
  }

  close(): void {
    this.closed = true;
  }
}

export function captureLogger() {
  const lines: string[] = [];
  const errors: string[] = [];
  const debug: string[] = [];
  const join = (args: unknown[]) => args.map(String).join(" ");
  const log: Logger = {
    debug: (...args) => debug.push(join(args)),
    info: (...args) => lines.push(join(args)),
    warn: (...args) => errors.push(join(args)),
    error: (...args) => errors.push(join(args)),
  };
  return { log, lines, errors, debug };
}
