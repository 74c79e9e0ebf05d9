import { DIFFICULTIES, type Difficulty } from "../types/question";
import type { EndReason, SessionResponse } from "../types/session";

export type ReadinessTier =
  | "needs-foundational-review"
  | "building-confidence"
  | "almost-ready"
  | "interview-ready";

/**
 * Highest threshold first; a percentage gets the first tier whose `min` it
 * reaches. Each band is [min, next min), the top one closed at 100.
 */
export const READINESS_TIERS: ReadonlyArray<{ min: number; tier: ReadinessTier }> = [
  { min: 80, tier: "interview-ready" },
  { min: 60, tier: "almost-ready" },
  { min: 40, tier: "building-confidence" },
  { min: 0, tier: "needs-foundational-review" },
];

export type Breakdown<K extends string> = {
  key: K;
  correct: number;
  total: number;
  percentage: number;
};

export type Tally = {
  score: number;
  total: number;
  percentage: number;
  byTopic: Breakdown<string>[];
  byDifficulty: Breakdown<Difficulty>[];
};

export type SummaryReport = {
  score: number;
  total: number;
  percentage: number;
  readiness: ReadinessTier;
  topics: Breakdown<string>[];
  difficulties: Breakdown<Difficulty>[];
  durationMs: number;
  startedAt: string;
  endedAt: string;
  endReason: EndReason;
  timedOut: boolean;
  requestedCount: number;
  drawnCount: number;
  unanswered: number;
  interviewMode: boolean;
  responses: SessionResponse[];
};

export function percentage(correct: number, total: number): number {
  return total > 0 ? (100 * correct) / total : 0;
}

export function readinessTier(pct: number): ReadinessTier {
  const row = READINESS_TIERS.find((r) => pct >= r.min);
  return row ? row.tier : READINESS_TIERS[READINESS_TIERS.length - 1].tier;
}

function groupBy<K extends string>(
  responses: readonly SessionResponse[],
  keyOf: (r: SessionResponse) => K
): Map<K, { correct: number; total: number }> {
  const groups = new Map<K, { correct: number; total: number }>();
  for (const r of responses) {
    const key = keyOf(r);
    const g = groups.get(key) ?? { correct: 0, total: 0 };
    g.total++;
    if (r.is_correct) g.correct++;
    groups.set(key, g);
  }
  return groups;
}

function toBreakdown<K extends string>(key: K, g: { correct: number; total: number }): Breakdown<K> {
  return { key, correct: g.correct, total: g.total, percentage: percentage(g.correct, g.total) };
}

/** Pure function of `responses`. */
export function tally(responses: readonly SessionResponse[]): Tally {
  const score = responses.filter((r) => r.is_correct).length;
  const total = responses.length;

  const topics = groupBy(responses, (r) => r.topic);
  const byTopic = [...topics.keys()]
    .sort()
    .map((topic) => toBreakdown(topic, topics.get(topic) ?? { correct: 0, total: 0 }));

  const difficulties = groupBy(responses, (r) => r.difficulty);
  const byDifficulty = DIFFICULTIES.flatMap((d) => {
    const g = difficulties.get(d);
    return g ? [toBreakdown(d, g)] : [];
  });

  return { score, total, percentage: percentage(score, total), byTopic, byDifficulty };
}

export type SummaryInput = {
  responses: readonly SessionResponse[];
  startedAt: number;
  endedAt: number;
  endReason: EndReason;
  requestedCount: number;
  drawnCount: number;
  interviewMode: boolean;
};

export function buildSummary(input: SummaryInput): SummaryReport {
  const t = tally(input.responses);
  return {
    score: t.score,
    total: t.total,
    percentage: t.percentage,
    readiness: readinessTier(t.percentage),
    topics: t.byTopic,
    difficulties: t.byDifficulty,
    durationMs: Math.max(0, input.endedAt - input.startedAt),
    startedAt: new Date(input.startedAt).toISOString(),
    endedAt: new Date(input.endedAt).toISOString(),
    endReason: input.endReason,
    timedOut: input.endReason === "timed_out",
    requestedCount: input.requestedCount,
    drawnCount: input.drawnCount,
    unanswered: Math.max(0, input.drawnCount - t.total),
    interviewMode: input.interviewMode,
    responses: input.responses.map((r) => ({ ...r })),
  };
}
