// src/app.ts
import { Command } from "commander";
import { ZodError } from "zod";
import { APP_NAME, VERSION, loadConfig } from "./config/env";
import { stats, topics } from "./controllers/catalogController";
import { interview } from "./controllers/interviewController";
import { practice } from "./controllers/practiceController";
import { quick } from "./controllers/quickController";
import { GlobalOptionsSchema } from "./schemas/sessionSchemas";
import { ReadlinePrompter, type Prompter } from "./services/prompter";
import { QuestionStore } from "./services/questionStore";
import { defaultRng, type Rng } from "./services/random";
import type { CommandContext } from "./types/context";
import { QuizError, ValidationError } from "./utils/errors";
import { createLogger, type Logger } from "./utils/logger";
import { formatZodError } from "./utils/zodError";

export type AppDeps = {
  env?: NodeJS.ProcessEnv;
  createPrompter?: () => Prompter;
  createLogger?: (verbose: boolean) => Logger;
  rng?: Rng;
  now?: () => number;
};

/** Report a failure and return the exit code for it. */
export function handleError(err: unknown, log: Logger): number {
  // zod handler
  if (err instanceof ZodError) {
    const details = formatZodError(err);
    log.error("❌ Invalid input:");
    for (const d of details) log.error(`  - ${d.path}: ${d.message}`);
    log.debug("[ZOD] validation failed:", JSON.stringify(details, null, 2));
    return 64;
  }

  if (err instanceof ValidationError) {
    log.error(`❌ ${err.message}:`);
    for (const v of err.violations) log.error(`  - ${v.path}: ${v.message}`);
    return err.exitCode;
  }

  if (err instanceof QuizError) {
    log.error(`❌ ${err.message}`);
    if (err.cause !== undefined) log.debug("[ERR] cause:", err.cause);
    return err.exitCode;
  }

  // default handler
  log.error("[ERR]", err);
  return 1;
}

export function createProgram(deps: AppDeps = {}): Command {
  const makeLogger = deps.createLogger ?? createLogger;
  const program = new Command();

  program
    .name("interview-prep")
    .description(
      `${APP_NAME}: practice AWS, Kubernetes, Docker, Linux, Git, Networking, Terraform,\n` +
        "CI/CD, Security and Monitoring with multiple-choice interview questions."
    )
    .version(VERSION)
    .option("-q, --questions <file>", "question bank JSON file")
    .option("-v, --verbose", "enable verbose output");

  // load config + bank, run the handler, map failures to the exit code
  const withContext =
    <A extends unknown[]>(handler: (ctx: CommandContext, ...args: A) => unknown) =>
    async (...args: A): Promise<void> => {
      let log = makeLogger(false);
      let prompter: Prompter | null = null;
      try {
        const config = loadConfig(deps.env ?? process.env);
        const global = GlobalOptionsSchema.parse(program.opts());
        log = makeLogger(global.verbose || config.verbose);
        log.debug("Verbose mode is enabled.");

        const store = QuestionStore.load(global.questions ?? config.questionsFile, {
          optionsPerQuestion: config.optionsPerQuestion,
        });
        log.debug(`[LOAD] ✅ Loaded ${store.size} interview questions from ${store.source}`);

        prompter = (deps.createPrompter ?? (() => new ReadlinePrompter()))();
        await handler(
          {
            config,
            log,
            store,
            prompter,
            rng: deps.rng ?? defaultRng,
            now: deps.now ?? Date.now,
          },
          ...args
        );
      } catch (err) {
        process.exitCode = handleError(err, log);
      } finally {
        prompter?.close();
      }
    };

  program
    .command("practice")
    .description("Practice interview questions by topic (mixed topics when none is given)")
    .argument("[topic]", "topic to practice")
    .option("-d, --difficulty <level>", "difficulty level (easy, medium, hard)")
    .option("-c, --count <n>", "number of questions")
    .option("--company-type <type>", "company type (faang, startup, enterprise)")
    .option("-i, --interview-mode", "show scenarios and hold feedback until the end")
    .option("-t, --time-limit <limit>", "time limit for the whole session (e.g. 90s, 45min)")
    .option("--repeat", "allow the same question to be drawn more than once")
    .option("--shuffle", "shuffle answer options")
    .option("--seed <n>", "seed for reproducible question order")
    .option("--export <file>", "export results to a JSON file")
    .action(
      withContext(async (ctx, topic: string | undefined, options: unknown) => {
        await practice(ctx, topic, options);
      })
    );

  program
    .command("interview")
    .description("Full interview simulation with mixed topics")
    .option("-c, --count <n>", "number of questions")
    .option("--company-type <type>", "focus on a specific company type")
    .option("--duration <limit>", "time limit (e.g. 45min)")
    .option("--shuffle", "shuffle answer options")
    .option("--seed <n>", "seed for reproducible question order")
    .option("--export <file>", "export interview results to a JSON file")
    .option("-y, --yes", "start without asking for confirmation")
    .action(
      withContext(async (ctx, options: unknown) => {
        await interview(ctx, options);
      })
    );

  program
    .command("quick")
    .description("Answer a single random question")
    .option("--topic <topic>", "limit to one topic")
    .option("--shuffle", "shuffle answer options")
    .option("--seed <n>", "seed for reproducible question choice")
    .action(
      withContext(async (ctx, options: unknown) => {
        await quick(ctx, options);
      })
    );

  program
    .command("topics")
    .description("List all available interview topics")
    .action(withContext((ctx) => topics(ctx)));

  program
    .command("stats")
    .description("Show question bank statistics")
    .action(withContext((ctx) => stats(ctx)));

  return program;
}
