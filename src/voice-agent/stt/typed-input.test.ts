import { describe, expect, it } from "vitest";
import { PassThrough } from "node:stream";
import { TerminalTypedInput } from "./typed-input.js";

describe("TerminalTypedInput", () => {
  it("returns the typed line", async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const typed = new TerminalTypedInput(input, output);

    const answer = typed.ask("Type yes or no: ", 5);
    input.write("Yes\n");

    expect(await answer).toBe("Yes");
    expect(output.read()?.toString()).toBe("Type yes or no: ");
  });

  it("returns undefined when nothing is typed in time", async () => {
    const typed = new TerminalTypedInput(new PassThrough(), new PassThrough());

    expect(await typed.ask("Type yes or no: ", 0.05)).toBeUndefined();
  });

  it("returns undefined when input closes", async () => {
    const input = new PassThrough();
    const typed = new TerminalTypedInput(input, new PassThrough());

    const answer = typed.ask("> ", 5);
    input.end();

    expect(await answer).toBeUndefined();
    expect(await typed.ask("> ", 5)).toBeUndefined();
  });

  it("answers later questions from lines piped in together", async () => {
    const input = new PassThrough();
    const typed = new TerminalTypedInput(input, new PassThrough());

    const first = typed.ask("> ", 5);
    input.write("open the calculator\nyes\nyes\n");

    expect(await first).toBe("open the calculator");
    expect(await typed.ask("Type yes or no: ", 5)).toBe("yes");
    expect(await typed.ask("Type yes or no: ", 5)).toBe("yes");
  });

  it("keeps a line that arrives after a timed-out question", async () => {
    const input = new PassThrough();
    const typed = new TerminalTypedInput(input, new PassThrough());

    expect(await typed.ask("> ", 0.05)).toBeUndefined();
    input.write("late answer\n");
    await new Promise((resolve) => setTimeout(resolve, 10));

    expect(await typed.ask("> ", 5)).toBe("late answer");
  });
});
