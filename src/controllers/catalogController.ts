import type { TopicSummary } from "../services/questionStore";
import { DIFFICULTIES, type Difficulty } from "../types/question";
import type { CommandContext } from "../types/context";

/** `topics`: every topic with its question count and difficulties. */
export function topics(ctx: CommandContext): TopicSummary[] {
  const summaries = ctx.store.listTopics();
  if (summaries.length === 0) {
    ctx.log.info("❌ No topics available");
    return summaries;
  }

  ctx.log.info("📚 Available interview topics:");
  ctx.log.info("=".repeat(35));
  for (const t of summaries) {
    const levels = DIFFICULTIES.filter((d) => t.byDifficulty[d] > 0)
      .map((d) => `${d} ${t.byDifficulty[d]}`)
      .join(", ");
    ctx.log.info(`  • ${t.topic}: ${t.total} questions (${levels})`);
  }

  const tags = ctx.store.companyTags();
  if (tags.length > 0) ctx.log.info(`\n🏢 Company types: ${tags.join(", ")}`);
  return summaries;
}

export type BankStats = {
  total: number;
  topics: number;
  byDifficulty: Record<Difficulty, number>;
  byTopic: Record<string, number>;
};

/** `stats`: totals for the loaded bank. */
export function stats(ctx: CommandContext): BankStats {
  const summaries = ctx.store.listTopics();
  const result: BankStats = {
    total: ctx.store.size,
    topics: summaries.length,
    byDifficulty: ctx.store.difficultyDistribution(),
    byTopic: Object.fromEntries(summaries.map((t) => [t.topic, t.total])),
  };

  ctx.log.info("📊 QUESTION BANK STATISTICS");
  ctx.log.info("=".repeat(35));
  ctx.log.info(`📝 Total questions: ${result.total}`);
  ctx.log.info(`📚 Topics: ${result.topics}`);

  ctx.log.info("\n🎚️  By difficulty:");
  for (const d of DIFFICULTIES) {
    if (result.byDifficulty[d] > 0) ctx.log.info(`  • ${d}: ${result.byDifficulty[d]}`);
  }

  ctx.log.info("\n📚 By topic:");
  for (const t of summaries) ctx.log.info(`  • ${t.topic}: ${t.total}`);
  return result;
}
