import fs from "node:fs";
import path from "node:path";
import {
  DEFAULT_OPTIONS_PER_QUESTION,
  type Difficulty,
  type Question,
} from "../types/question";
import { LoadError, UnknownTopicError, ValidationError } from "../utils/errors";
import { defaultRng, randomInt, shuffle, type Rng } from "./random";
import { validateQuestionBank } from "./validateQuestion";

export type QuestionFilter = {
  topic?: string;
  difficulty?: Difficulty;
  companyTag?: string;
};

export type SampleOptions = {
  allowRepeats?: boolean;
  rng?: Rng;
};

export type TopicSummary = {
  topic: string;
  total: number;
  byDifficulty: Record<Difficulty, number>;
};

export type StoreOptions = {
  optionsPerQuestion?: number;
  source?: string;
};

function emptyDifficultyCounts(): Record<Difficulty, number> {
  return { easy: 0, medium: 0, hard: 0 };
}

const eq = (a: string, b: string) => a.toLowerCase() === b.toLowerCase();

/**
 * The validated, read-only question bank. Built once per process from a
 * bank file and passed to whatever needs it.
 */
export class QuestionStore {
  readonly source: string;
  private readonly questions: readonly Question[];

  private constructor(questions: readonly Question[], source: string) {
    this.source = source;
    this.questions = Object.freeze([...questions]);
  }

  /** Read, parse and validate a bank file. */
  static load(file: string, options: Omit<StoreOptions, "source"> = {}): QuestionStore {
    const source = path.resolve(file);

    let text: string;
    try {
      text = fs.readFileSync(source, "utf-8");
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new LoadError(source, reason, { cause: err });
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (err) {
      const reason = err instanceof Error ? err.message : "invalid JSON";
      throw new LoadError(source, `not valid JSON (${reason})`, { cause: err });
    }

    return QuestionStore.fromData(data, { ...options, source });
  }

  /** Validate already-parsed bank data. Throws ValidationError listing every problem. */
  static fromData(data: unknown, options: StoreOptions = {}): QuestionStore {
    const source = options.source ?? "<memory>";
    const { questions, violations } = validateQuestionBank(
      data,
      options.optionsPerQuestion ?? DEFAULT_OPTIONS_PER_QUESTION
    );
    if (violations.length > 0) throw new ValidationError(source, violations);
    return new QuestionStore(questions, source);
  }

  get size(): number {
    return this.questions.length;
  }

  all(): readonly Question[] {
    return this.questions;
  }

  filter(criteria: QuestionFilter = {}): Question[] {
    const { topic, difficulty, companyTag } = criteria;

    return this.questions.filter(
      (q) =>
        (topic === undefined || eq(q.topic, topic)) &&
        (difficulty === undefined || q.difficulty === difficulty) &&
        (companyTag === undefined || q.company_tags.some((t) => eq(t, companyTag)))
    );
  }

  /**
   * Draw up to `count` questions from `pool`. Without repeats the result has no
   * duplicate ids and is cut short when the pool is smaller than `count`; with
   * repeats every draw is independent and the result has exactly `count` items
   * (none for an empty pool).
   */
  sample(pool: readonly Question[], count: number, options: SampleOptions = {}): Question[] {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`count must be a non-negative integer, got ${count}`);
    }
    const rng = options.rng ?? defaultRng;

    if (options.allowRepeats) {
      if (pool.length === 0) return [];
      return Array.from({ length: count }, () => pool[randomInt(rng, pool.length)]);
    }
    return shuffle(pool, rng, count);
  }

  topics(): string[] {
    return [...new Set(this.questions.map((q) => q.topic))].sort();
  }

  /** Canonical spelling of `topic`, or UnknownTopicError. */
  resolveTopic(topic: string): string {
    const wanted = topic.trim();
    const match = this.topics().find((t) => eq(t, wanted));
    if (match === undefined) throw new UnknownTopicError(wanted, this.topics());
    return match;
  }

  listTopics(): TopicSummary[] {
    const byTopic = new Map<string, TopicSummary>();
    for (const q of this.questions) {
      let entry = byTopic.get(q.topic);
      if (!entry) {
        entry = { topic: q.topic, total: 0, byDifficulty: emptyDifficultyCounts() };
        byTopic.set(q.topic, entry);
      }
      entry.total++;
      entry.byDifficulty[q.difficulty]++;
    }
    return [...byTopic.values()].sort((a, b) => a.topic.localeCompare(b.topic));
  }

  companyTags(): string[] {
    return [...new Set(this.questions.flatMap((q) => q.company_tags))].sort();
  }

  difficultyDistribution(): Record<Difficulty, number> {
    const counts = emptyDifficultyCounts();
    for (const q of this.questions) counts[q.difficulty]++;
    return counts;
  }
}
