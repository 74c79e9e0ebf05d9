import { QuickOptionsSchema } from "../schemas/sessionSchemas";
import type { SummaryReport } from "../services/scoring";
import { SessionEngine } from "../services/sessionEngine";
import type { CommandContext } from "../types/context";
import { rngFor } from "./helpers";
import { runSession } from "./sessionRunner";

/** `quick`: a single random question with immediate feedback. */
export async function quick(ctx: CommandContext, rawOptions: unknown): Promise<SummaryReport> {
  const opts = QuickOptionsSchema.parse(rawOptions);
  const topic = opts.topic === undefined ? undefined : ctx.store.resolveTopic(opts.topic);

  const session = new SessionEngine(ctx.store, {
    rng: rngFor(ctx, opts.seed),
    now: ctx.now,
    logger: ctx.log,
  }).start({ topic, count: 1, shuffleOptions: opts.shuffle });

  ctx.log.info("⚡ QUICK PRACTICE");
  ctx.log.info("=".repeat(20));

  const report = await runSession(session, ctx.prompter, {
    print: (line) => ctx.log.info(line),
    showSummary: false,
  });
  ctx.log.info(`\n⚡ Quick result: ${report.score}/${report.total}`);
  return report;
}
