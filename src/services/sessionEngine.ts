import type { SessionOptions } from "../types/session";
import { NoQuestionsAvailableError } from "../utils/errors";
import { silentLogger, type Logger } from "../utils/logger";
import type { QuestionStore } from "./questionStore";
import { defaultRng, type Rng } from "./random";
import { QuizSession } from "./quizSession";

export type SessionEngineDeps = {
  rng?: Rng;
  now?: () => number;
  logger?: Logger;
};

export function describeCriteria(options: Partial<SessionOptions>): string {
  const parts = [
    options.topic ? `topic "${options.topic}"` : "all topics",
    options.difficulty ? `difficulty "${options.difficulty}"` : null,
    options.companyTag ? `company type "${options.companyTag}"` : null,
  ];
  return parts.filter((p): p is string => p !== null).join(", ");
}

/** Starts sessions against one question store. */
export class SessionEngine {
  private readonly rng: Rng;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(private readonly store: QuestionStore, deps: SessionEngineDeps = {}) {
    this.rng = deps.rng ?? defaultRng;
    this.now = deps.now ?? Date.now;
    this.log = deps.logger ?? silentLogger;
  }

  /**
   * Filter the bank, then sample. Without a topic the draw is uniform over
   * every matching question regardless of topic.
   */
  start(options: SessionOptions): QuizSession {
    if (!Number.isInteger(options.count) || options.count < 1) {
      throw new RangeError(`count must be a positive integer, got ${options.count}`);
    }

    const pool = this.store.filter({
      topic: options.topic,
      difficulty: options.difficulty,
      companyTag: options.companyTag,
    });
    if (pool.length === 0) {
      throw new NoQuestionsAvailableError(describeCriteria(options));
    }

    const drawn = this.store.sample(pool, options.count, {
      allowRepeats: options.allowRepeats,
      rng: this.rng,
    });
    this.log.debug(
      `[SESSION] pool=${pool.length} requested=${options.count} drawn=${drawn.length}` +
        ` repeats=${options.allowRepeats ? "yes" : "no"}`
    );

    return new QuizSession({ questions: drawn, options, rng: this.rng, now: this.now });
  }
}
