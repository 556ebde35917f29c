import { beforeEach, describe, expect, it, vi } from "vitest";
import { CommandExecutor, splitCommand } from "./command-executor.js";

describe("splitCommand", () => {
  it("splits on runs of whitespace", () => {
    expect(splitCommand("  ls   -la\t/tmp ")).toEqual({ program: "ls", args: ["-la", "/tmp"] });
  });

  it("takes a lone program with no arguments", () => {
    expect(splitCommand("kcalc")).toEqual({ program: "kcalc", args: [] });
  });

  it("does not interpret quotes", () => {
    expect(splitCommand('echo "hello world"')).toEqual({
      program: "echo",
      args: ['"hello', 'world"'],
    });
  });

  it("returns undefined for blank text", () => {
    expect(splitCommand("   ")).toBeUndefined();
  });
});

describe("CommandExecutor", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  it("runs a command with its arguments", async () => {
    const result = await new CommandExecutor().execute("true  hello   world");

    expect(result).toMatchObject({
      success: true,
      program: "true",
      args: ["hello", "world"],
      exitCode: 0,
    });
    expect(console.log).toHaveBeenCalledWith("Command executed successfully.");
  });

  it("passes shell syntax through as plain arguments", async () => {
    // A shell would expand the unset variable to nothing and `test` would fail
    const result = await new CommandExecutor().execute("test $RELAY_UNSET_VARIABLE");

    expect(result).toMatchObject({ success: true, args: ["$RELAY_UNSET_VARIABLE"] });
  });

  it("reports a non-zero exit status", async () => {
    const result = await new CommandExecutor().execute("false");

    expect(result).toMatchObject({
      success: false,
      exitCode: 1,
      error: "Command returned non-zero exit status 1",
    });
    expect(console.error).toHaveBeenCalledWith(
      "Command execution failed: Command returned non-zero exit status 1"
    );
  });

  it("reports a program that does not exist", async () => {
    const result = await new CommandExecutor().execute("no-such-program-for-relay --flag");

    expect(result).toMatchObject({
      success: false,
      program: "no-such-program-for-relay",
      args: ["--flag"],
      error: "spawn no-such-program-for-relay ENOENT",
    });
  });

  it("kills commands that outlive the timeout", async () => {
    const result = await new CommandExecutor({ timeoutMs: 50 }).execute("sleep 5");

    expect(result).toMatchObject({ success: false, error: "Command timed out after 50ms" });
  });

  it("reports arguments that cannot be passed to a process", async () => {
    const result = await new CommandExecutor().execute("echo a\u0000b");

    expect(result.success).toBe(false);
    expect(result).toMatchObject({ program: "echo", args: ["a\u0000b"] });
    if (!result.success) {
      expect(result.error).toContain("null bytes");
    }
  });

  it("refuses empty command text", async () => {
    expect(await new CommandExecutor().execute("")).toEqual({
      success: false,
      error: "No command provided",
      duration_ms: 0,
    });
  });
});
