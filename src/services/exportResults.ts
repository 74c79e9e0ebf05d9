import fs from "node:fs";
import path from "node:path";
import { ExportError } from "../utils/errors";
import type { SummaryReport } from "./scoring";

export function buildExport(report: SummaryReport) {
  return {
    session_summary: {
      score: report.score,
      total: report.total,
      percentage: report.percentage,
      readiness: report.readiness,
      duration_seconds: report.durationMs / 1000,
      started_at: report.startedAt,
      ended_at: report.endedAt,
      end_reason: report.endReason,
      by_topic: Object.fromEntries(
        report.topics.map((t) => [t.key, { correct: t.correct, total: t.total }])
      ),
    },
    results: report.responses,
  };
}

/** Write the finished session as JSON; returns the absolute path written. */
export function exportResults(report: SummaryReport, file: string): string {
  const target = path.resolve(file);
  try {
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, `${JSON.stringify(buildExport(report), null, 2)}\n`, {
      encoding: "utf8",
    });
  } catch (err) {
    throw new ExportError(target, { cause: err });
  }
  return target;
}
