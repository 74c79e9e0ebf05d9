import { InterviewOptionsSchema } from "../schemas/sessionSchemas";
import type { SummaryReport } from "../services/scoring";
import { SessionEngine } from "../services/sessionEngine";
import type { CommandContext } from "../types/context";
import { maybeExport, printNotice, printTimeLimit, rngFor } from "./helpers";
import { confirm, runSession } from "./sessionRunner";

/**
 * `interview`: mixed topics, scenario text shown, feedback held back until
 * the review at the end. Resolves null when the user declines to begin.
 */
export async function interview(
  ctx: CommandContext,
  rawOptions: unknown
): Promise<SummaryReport | null> {
  const opts = InterviewOptionsSchema.parse(rawOptions);
  const count = opts.count ?? ctx.config.interviewCount;
  const timeLimitSeconds = opts.duration ?? ctx.config.timeLimitSeconds;

  const engine = new SessionEngine(ctx.store, {
    rng: rngFor(ctx, opts.seed),
    now: ctx.now,
    logger: ctx.log,
  });
  const session = engine.start({
    count,
    interviewMode: true,
    timeLimitSeconds,
    companyTag: opts.companyType,
    shuffleOptions: opts.shuffle,
  });

  ctx.log.info("🎭 INTERVIEW SIMULATION");
  ctx.log.info("=".repeat(30));
  ctx.log.info(`📝 Questions: ${session.drawnQuestions.length}`);
  if (opts.companyType) ctx.log.info(`🏢 Company type: ${opts.companyType}`);
  printTimeLimit(ctx, timeLimitSeconds);
  printNotice(ctx, session);

  const distribution = new Map<string, number>();
  for (const q of session.drawnQuestions) {
    distribution.set(q.topic, (distribution.get(q.topic) ?? 0) + 1);
  }
  ctx.log.info("\n📊 Question distribution:");
  for (const topic of [...distribution.keys()].sort()) {
    ctx.log.info(`  • ${topic}: ${distribution.get(topic)}`);
  }

  const print = (line: string) => ctx.log.info(line);
  if (!opts.yes && !(await confirm(ctx.prompter, "\n🚀 Ready to begin your interview? [Y/n] ", print))) {
    ctx.log.info("Interview cancelled.");
    return null;
  }

  const report = await runSession(session, ctx.prompter, {
    print,
    heading: (p) =>
      `🎯 Interview Question ${p.position}/${p.total}\n📚 Topic: ${p.question.topic} | 📊 Difficulty: ${p.question.difficulty}`,
  });

  maybeExport(ctx, report, opts.export);
  return report;
}
