import type { AppConfig } from "../config/env";
import type { Prompter } from "../services/prompter";
import type { QuestionStore } from "../services/questionStore";
import type { Rng } from "../services/random";
import type { Logger } from "../utils/logger";

/** What every command handler receives. */
export type CommandContext = {
  config: AppConfig;
  log: Logger;
  store: QuestionStore;
  prompter: Prompter;
  rng: Rng;
  now: () => number;
};
