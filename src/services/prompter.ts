import { createInterface, type Interface } from "node:readline/promises";

export type AskOptions = {
  /** Give up after this many ms; null or undefined waits indefinitely. */
  timeoutMs?: number | null;
};

/** Line-based input. `ask` resolves null when the wait timed out or input ended. */
export interface Prompter {
  ask(question: string, options?: AskOptions): Promise<string | null>;
  close(): void;
}

export class ReadlinePrompter implements Prompter {
  private readonly rl: Interface;
  private readonly closed: Promise<null>;
  private isClosed = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = createInterface({ input, output });
    this.closed = new Promise((resolve) =>
      this.rl.once("close", () => {
        this.isClosed = true;
        resolve(null);
      })
    );
  }

  async ask(question: string, options: AskOptions = {}): Promise<string | null> {
    if (this.isClosed) return null;

    const { timeoutMs } = options;
    const controller = new AbortController();
    const timer =
      timeoutMs == null ? null : setTimeout(() => controller.abort(), Math.max(0, timeoutMs));

    try {
      return await Promise.race([
        this.rl.question(question, { signal: controller.signal }),
        this.closed,
      ]);
    } catch (err) {
      if (controller.signal.aborted) {
        this.output.write("\n");
        return null;
      }
      // a pending question is rejected when the input closes under it
      if (this.isClosed) return null;
      throw err;
    } finally {
      if (timer) clearTimeout(timer);
    }
  }

  close(): void {
    this.rl.close();
  }
}
