import { PassThrough } from "node:stream";
import { describe, it, expect } from "vitest";
import { ReadlinePrompter } from "../services/prompter";

function streams() {
  const input = new PassThrough();
  const output = new PassThrough();
  const written: string[] = [];
  output.on("data", (chunk: Buffer) => written.push(chunk.toString()));
  return { input, output, written };
}

describe("ReadlinePrompter", () => {
  it("resolves with the typed line", async () => {
    const { input, output, written } = streams();
    const prompter = new ReadlinePrompter(input, output);

    const answer = prompter.ask("Your answer: ");
    input.write("3\n");
    expect(await answer).toBe("3");
    expect(written.join("")).toContain("Your answer: ");
    prompter.close();
  });

  it("resolves null when the wait times out", async () => {
    const { input, output } = streams();
    const prompter = new ReadlinePrompter(input, output);
    expect(await prompter.ask("Quick: ", { timeoutMs: 10 })).toBeNull();
    prompter.close();
  });

  it("resolves null once input has ended", async () => {
    const { input, output } = streams();
    const prompter = new ReadlinePrompter(input, output);

    const pending = prompter.ask("Anything? ");
    input.end();
    expect(await pending).toBeNull();
    expect(await prompter.ask("Again? ")).toBeNull();
  });
});
