import { exportResults } from "../services/exportResults";
import { seededRng, type Rng } from "../services/random";
import type { QuizSession } from "../services/quizSession";
import type { SummaryReport } from "../services/scoring";
import type { CommandContext } from "../types/context";
import { formatDuration } from "../utils/formatting";

export function rngFor(ctx: CommandContext, seed: number | undefined): Rng {
  return seed === undefined ? ctx.rng : seededRng(seed);
}

export function printNotice(ctx: CommandContext, session: QuizSession): void {
  const notice = session.notice;
  if (notice) {
    ctx.log.info(
      `⚠️  Adjusted to ${notice.available} questions (all available; ${notice.requested} requested)`
    );
  }
}

export function printTimeLimit(ctx: CommandContext, seconds: number | undefined): void {
  if (seconds !== undefined) ctx.log.info(`⏱️  Time limit: ${formatDuration(seconds * 1000)}`);
}

export function maybeExport(
  ctx: CommandContext,
  report: SummaryReport,
  file: string | undefined
): void {
  if (!file) return;
  const written = exportResults(report, file);
  ctx.log.info(`📄 Results exported to ${written}`);
}
