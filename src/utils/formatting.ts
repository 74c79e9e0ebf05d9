import type { Question } from "../types/question";
import type { SummaryReport, ReadinessTier } from "../services/scoring";

export const SEPARATOR_LENGTH = 70;
export const SUMMARY_SEPARATOR_LENGTH = 50;

export function separator(length = SEPARATOR_LENGTH): string {
  return "=".repeat(length);
}

export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(Math.max(0, ms) / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes > 0 && seconds > 0) return `${minutes} min ${seconds} sec`;
  if (minutes > 0) return `${minutes} min`;
  return `${seconds} sec`;
}

export function formatPercent(value: number, digits = 1): string {
  return `${value.toFixed(digits)}%`;
}

export const TIER_LABELS: Record<ReadinessTier, string> = {
  "interview-ready": "🏆 Interview ready. Excellent work!",
  "almost-ready": "🎉 Almost ready. Polish the weaker topics.",
  "building-confidence": "👍 Building confidence. Focus on weak areas.",
  "needs-foundational-review": "📚 Needs foundational review. Keep practicing!",
};

export function performanceMarker(pct: number): string {
  if (pct < 50) return "🔴";
  if (pct < 70) return "🟡";
  return "🟢";
}

export function questionLines(
  q: Question,
  options: readonly string[],
  showScenario: boolean
): string[] {
  const lines: string[] = [];
  if (showScenario && q.scenario) lines.push(`📋 Scenario: ${q.scenario}`, "");
  lines.push(`❓ Question: ${q.question_text}`, "");
  options.forEach((o, i) => lines.push(`   ${i + 1}. ${o}`));
  lines.push("");
  return lines;
}

export function explanationLines(q: Question): string[] {
  const lines = [`💡 Explanation: ${q.explanation}`];
  if (q.real_world_context) lines.push(`🌍 Real-world context: ${q.real_world_context}`);
  return lines;
}

export function summaryLines(report: SummaryReport): string[] {
  const lines = [
    "",
    separator(SUMMARY_SEPARATOR_LENGTH),
    "📊 SESSION SUMMARY",
    separator(SUMMARY_SEPARATOR_LENGTH),
    `Score: ${report.score}/${report.total} (${formatPercent(report.percentage)})`,
    `Duration: ${formatDuration(report.durationMs)}`,
  ];

  if (report.timedOut) lines.push("⏰ Time limit reached before the session finished");
  if (report.unanswered > 0) lines.push(`⏭️  Not reached: ${report.unanswered}`);

  if (report.topics.length > 0) {
    lines.push("", "📈 Performance by Topic:");
    for (const t of report.topics) {
      lines.push(`  ${performanceMarker(t.percentage)} ${t.key}: ${t.correct}/${t.total} (${formatPercent(t.percentage, 0)})`);
    }
  }

  if (report.difficulties.length > 1) {
    lines.push("", "🎚️  Performance by Difficulty:");
    for (const d of report.difficulties) {
      lines.push(`  ${performanceMarker(d.percentage)} ${d.key}: ${d.correct}/${d.total} (${formatPercent(d.percentage, 0)})`);
    }
  }

  lines.push("", "🎯 Assessment:", TIER_LABELS[report.readiness]);
  return lines;
}
