import { describe, it, expect } from "vitest";
import { buildSummary, percentage, readinessTier, tally } from "../services/scoring";
import type { Difficulty } from "../types/question";
import type { SessionResponse } from "../types/session";
import { T0 } from "./helpers";

let seq = 0;
function response(topic: string, isCorrect: boolean, difficulty: Difficulty = "easy"): SessionResponse {
  seq++;
  return {
    question_id: `${topic}-${seq}`,
    topic,
    difficulty,
    chosen_index: isCorrect ? 1 : 2,
    is_correct: isCorrect,
    outcome: "answered",
    elapsed_ms: 1000,
    answered_at: new Date(T0).toISOString(),
  };
}

describe("readinessTier", () => {
  it.each([
    [0, "needs-foundational-review"],
    [39, "needs-foundational-review"],
    [39.9, "needs-foundational-review"],
    [40, "building-confidence"],
    [59.99, "building-confidence"],
    [60, "almost-ready"],
    [79, "almost-ready"],
    [80, "interview-ready"],
    [100, "interview-ready"],
  ])("%d%% is %s", (pct, tier) => {
    expect(readinessTier(pct)).toBe(tier);
  });
});

describe("percentage", () => {
  it("is 0 for an empty total", () => {
    expect(percentage(0, 0)).toBe(0);
    expect(percentage(1, 4)).toBe(25);
  });
});

describe("tally", () => {
  it("scores a session and breaks it down by topic and difficulty", () => {
    const responses = [
      response("kubernetes", true, "hard"),
      response("aws", true),
      response("aws", false, "medium"),
      response("aws", true),
    ];
    const t = tally(responses);

    expect(t.score).toBe(3);
    expect(t.total).toBe(4);
    expect(t.percentage).toBe(75);
    expect(t.byTopic).toEqual([
      { key: "aws", correct: 2, total: 3, percentage: (100 * 2) / 3 },
      { key: "kubernetes", correct: 1, total: 1, percentage: 100 },
    ]);
    expect(t.byDifficulty).toEqual([
      { key: "easy", correct: 2, total: 2, percentage: 100 },
      { key: "medium", correct: 0, total: 1, percentage: 0 },
      { key: "hard", correct: 1, total: 1, percentage: 100 },
    ]);
  });

  it("gives the same result on repeated calls", () => {
    const responses = [response("git", true), response("linux", false)];
    expect(tally(responses)).toEqual(tally(responses));
  });

  it("handles no responses", () => {
    expect(tally([])).toEqual({ score: 0, total: 0, percentage: 0, byTopic: [], byDifficulty: [] });
  });
});

describe("buildSummary", () => {
  it("derives the report from responses and timestamps", () => {
    const responses = [response("aws", true), response("docker", false)];
    const report = buildSummary({
      responses,
      startedAt: T0,
      endedAt: T0 + 95_000,
      endReason: "exhausted",
      requestedCount: 5,
      drawnCount: 3,
      interviewMode: false,
    });

    expect(report.score).toBe(1);
    expect(report.total).toBe(2);
    expect(report.percentage).toBe(50);
    expect(report.readiness).toBe("building-confidence");
    expect(report.durationMs).toBe(95_000);
    expect(report.startedAt).toBe("2026-01-15T09:00:00.000Z");
    expect(report.endedAt).toBe("2026-01-15T09:01:35.000Z");
    expect(report.timedOut).toBe(false);
    expect(report.unanswered).toBe(1);
    expect(report.responses).toEqual(responses);
    expect(report.responses[0]).not.toBe(responses[0]);
  });
});
