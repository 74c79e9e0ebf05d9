import { PracticeOptionsSchema } from "../schemas/sessionSchemas";
import type { SummaryReport } from "../services/scoring";
import { SessionEngine } from "../services/sessionEngine";
import type { CommandContext } from "../types/context";
import { maybeExport, printNotice, printTimeLimit, rngFor } from "./helpers";
import { runSession } from "./sessionRunner";

/** `practice [topic]`: questions from one topic, or mixed when no topic is given. */
export async function practice(
  ctx: CommandContext,
  topicArg: string | undefined,
  rawOptions: unknown
): Promise<SummaryReport> {
  const opts = PracticeOptionsSchema.parse(rawOptions);
  const topic = topicArg === undefined ? undefined : ctx.store.resolveTopic(topicArg);
  const count = opts.count ?? ctx.config.defaultCount;
  const timeLimitSeconds = opts.timeLimit ?? ctx.config.timeLimitSeconds;

  ctx.log.debug(
    `[PRACTICE] topic=${topic ?? "*"} difficulty=${opts.difficulty ?? "*"} count=${count}` +
      ` company=${opts.companyType ?? "*"} interview=${opts.interviewMode}`
  );

  const engine = new SessionEngine(ctx.store, {
    rng: rngFor(ctx, opts.seed),
    now: ctx.now,
    logger: ctx.log,
  });
  const session = engine.start({
    topic,
    difficulty: opts.difficulty,
    count,
    interviewMode: opts.interviewMode,
    timeLimitSeconds,
    allowRepeats: opts.repeat,
    companyTag: opts.companyType,
    shuffleOptions: opts.shuffle,
  });

  ctx.log.info(`\n🎯 Starting practice: ${(topic ?? "mixed topics").toUpperCase()}`);
  if (opts.difficulty) ctx.log.info(`📊 Difficulty: ${opts.difficulty}`);
  if (opts.companyType) ctx.log.info(`🏢 Company type: ${opts.companyType}`);
  ctx.log.info(`📝 Questions: ${session.drawnQuestions.length}`);
  printTimeLimit(ctx, timeLimitSeconds);
  printNotice(ctx, session);

  const report = await runSession(session, ctx.prompter, {
    print: (line) => ctx.log.info(line),
    heading: (p) =>
      `📋 Question ${p.position}/${p.total} | ${p.question.topic} | ${p.question.difficulty.toUpperCase()}`,
  });

  maybeExport(ctx, report, opts.export);
  return report;
}
