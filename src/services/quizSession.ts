import type { Question } from "../types/question";
import type {
  EndReason,
  PresentedQuestion,
  ResponseOutcome,
  SessionNotice,
  SessionOptions,
  SessionPhase,
  SessionResponse,
} from "../types/session";
import { InvalidInputError, SessionStateError } from "../utils/errors";
import { shuffle, type Rng } from "./random";
import { buildSummary, type SummaryReport } from "./scoring";

export type SubmitResult =
  | { status: "accepted"; response: SessionResponse; correctOption: string }
  | { status: "invalid"; error: InvalidInputError }
  | { status: "timed_out"; response: SessionResponse };

export type QuizSessionInit = {
  questions: readonly Question[];
  options: SessionOptions;
  rng: Rng;
  now: () => number;
};

// order[k] is the 1-based original index of the option shown at position k + 1
type Draw = { question: Question; order: readonly number[] };

// the cached report is handed out on every summary() call
function freezeReport(report: SummaryReport): SummaryReport {
  for (const t of report.topics) Object.freeze(t);
  for (const d of report.difficulties) Object.freeze(d);
  for (const r of report.responses) Object.freeze(r);
  Object.freeze(report.topics);
  Object.freeze(report.difficulties);
  Object.freeze(report.responses);
  return Object.freeze(report);
}

function identityOrder(n: number): number[] {
  return Array.from({ length: n }, (_, i) => i + 1);
}

/**
 * One practice or interview run over a fixed draw of questions.
 *
 * created → awaiting_answer(i) → recorded(i) → awaiting_answer(i + 1) … → complete → summary
 *
 * Recording the last drawn question completes the session directly.
 * An out-of-range answer leaves the session in awaiting_answer. Once the time
 * limit (if any) has passed, the question being answered is recorded as
 * timed out and the session completes early.
 */
export class QuizSession {
  readonly options: Readonly<SessionOptions>;

  private readonly draws: readonly Draw[];
  private readonly now: () => number;
  private readonly recorded: SessionResponse[] = [];
  private phase: SessionPhase = "created";
  private started: number;
  private deadlineAt: number | null = null;
  private cursor = -1;
  private presentedAt = 0;
  private endedAt: number | null = null;
  private endReason: EndReason | null = null;
  private report: SummaryReport | null = null;

  constructor(init: QuizSessionInit) {
    this.options = Object.freeze({ ...init.options });
    this.now = init.now;
    this.started = init.now();
    this.draws = init.questions.map((question) => {
      const order = identityOrder(question.options.length);
      return {
        question,
        order: init.options.shuffleOptions ? shuffle(order, init.rng) : order,
      };
    });
  }

  get state(): SessionPhase {
    return this.phase;
  }

  get interviewMode(): boolean {
    return this.options.interviewMode ?? false;
  }

  get drawnQuestions(): readonly Question[] {
    return this.draws.map((d) => d.question);
  }

  get responses(): readonly SessionResponse[] {
    return [...this.recorded];
  }

  get endedBy(): EndReason | null {
    return this.endReason;
  }

  /** Set when the pool held fewer questions than were requested. */
  get notice(): SessionNotice | null {
    if (this.draws.length >= this.options.count) return null;
    return { kind: "reduced_count", requested: this.options.count, available: this.draws.length };
  }

  remainingMs(): number | null {
    if (this.deadlineAt === null) return null;
    return Math.max(0, this.deadlineAt - this.now());
  }

  isComplete(): boolean {
    return this.phase === "complete" || this.phase === "summary";
  }

  duration(): number {
    return (this.endedAt ?? this.now()) - this.started;
  }

  presentNext(): PresentedQuestion | undefined {
    if (this.isComplete()) return undefined;
    if (this.phase === "awaiting_answer") {
      throw new SessionStateError("The current question has not been answered yet");
    }
    if (this.phase === "created") this.beginClock();
    if (this.pastDeadline()) {
      this.finish("timed_out");
      return undefined;
    }
    if (this.cursor + 1 >= this.draws.length) {
      this.finish("exhausted");
      return undefined;
    }

    this.cursor++;
    this.phase = "awaiting_answer";
    this.presentedAt = this.now();

    const { question, order } = this.draws[this.cursor];
    return {
      question,
      position: this.cursor + 1,
      total: this.draws.length,
      options: order.map((i) => question.options[i - 1]),
      interviewMode: this.interviewMode,
      remainingMs: this.remainingMs(),
    };
  }

  /** `chosen` is 1-based in display order. */
  submitAnswer(chosen: number): SubmitResult {
    const draw = this.awaiting("submit an answer");

    if (this.pastDeadline()) {
      return { status: "timed_out", response: this.timeOut(draw) };
    }

    const n = draw.order.length;
    if (!Number.isInteger(chosen) || chosen < 1 || chosen > n) {
      return { status: "invalid", error: new InvalidInputError(chosen, n) };
    }

    const original = draw.order[chosen - 1];
    const response = this.record(draw, original, "answered");
    return {
      status: "accepted",
      response,
      correctOption: draw.question.options[draw.question.correct_answer - 1],
    };
  }

  /** Record the current question as wrong without an answer. A skip after the deadline is a time-out. */
  skip(): SessionResponse {
    const draw = this.awaiting("skip");
    if (this.pastDeadline()) return this.timeOut(draw);
    return this.record(draw, null, "skipped");
  }

  /**
   * Called when the bounded wait for an answer ran out. The pending question
   * (if any) is recorded as timed out and the session ends.
   */
  expire(): SessionResponse | undefined {
    if (this.isComplete()) return undefined;
    if (this.phase === "awaiting_answer") return this.timeOut(this.draws[this.cursor]);
    this.finish("timed_out");
    return undefined;
  }

  /**
   * End early; the unanswered current question is not recorded unless the
   * time limit has already passed, in which case it is timed out.
   */
  abandon(): void {
    if (this.isComplete()) return;
    if (this.pastDeadline()) {
      this.expire();
      return;
    }
    this.finish("abandoned");
  }

  summary(): SummaryReport {
    if (!this.isComplete() || this.endedAt === null || this.endReason === null) {
      throw new SessionStateError("The session is still in progress");
    }
    if (this.report === null) {
      this.report = freezeReport(buildSummary({
        responses: this.recorded,
        startedAt: this.started,
        endedAt: this.endedAt,
        endReason: this.endReason,
        requestedCount: this.options.count,
        drawnCount: this.draws.length,
        interviewMode: this.interviewMode,
      }));
      this.phase = "summary";
    }
    return this.report;
  }

  // ---- internals ----

  // the session clock starts with the first question, not at draw time
  private beginClock(): void {
    this.started = this.now();
    const limit = this.options.timeLimitSeconds;
    this.deadlineAt = limit !== undefined && limit > 0 ? this.started + limit * 1000 : null;
  }

  private pastDeadline(): boolean {
    return this.deadlineAt !== null && this.now() >= this.deadlineAt;
  }

  private awaiting(action: string): Draw {
    if (this.phase !== "awaiting_answer") {
      throw new SessionStateError(`Cannot ${action}: no question is awaiting an answer`);
    }
    return this.draws[this.cursor];
  }

  private timeOut(draw: Draw): SessionResponse {
    const response = this.record(draw, null, "timed_out");
    this.finish("timed_out");
    return response;
  }

  private record(draw: Draw, chosen: number | null, outcome: ResponseOutcome): SessionResponse {
    const at = this.now();
    const response: SessionResponse = Object.freeze({
      question_id: draw.question.id,
      topic: draw.question.topic,
      difficulty: draw.question.difficulty,
      chosen_index: chosen,
      is_correct: outcome === "answered" && chosen === draw.question.correct_answer,
      outcome,
      elapsed_ms: Math.max(0, at - this.presentedAt),
      answered_at: new Date(at).toISOString(),
    });
    this.recorded.push(response);
    this.phase = "recorded";
    if (this.cursor + 1 >= this.draws.length) this.finish("exhausted");
    return response;
  }

  private finish(reason: EndReason): void {
    this.phase = "complete";
    this.endReason = reason;
    this.endedAt = this.now();
  }
}
