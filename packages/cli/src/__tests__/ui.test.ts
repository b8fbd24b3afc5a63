import { describe, it, expect, vi } from "vitest";
import pc from "picocolors";
import { createDebugLog, logError, logWarn, readLine } from "../shared/ui";
import { endedInput } from "./test-helpers";

describe("readLine", () => {
  it("returns the first line without its newline", async () => {
    expect(await readLine(endedInput("2\nrest\n"))).toBe("2");
  });

  it("returns an empty string for a blank line", async () => {
    expect(await readLine(endedInput("\n"))).toBe("");
  });

  it("returns a final line with no newline", async () => {
    expect(await readLine(endedInput("3"))).toBe("3");
  });

  it("returns null when the stream ends with no data", async () => {
    expect(await readLine(endedInput())).toBeNull();
  });

  it("strips a CRLF line ending", async () => {
    expect(await readLine(endedInput("1\r\n"))).toBe("1");
  });
});

describe("createDebugLog", () => {
  it("writes prefixed lines when verbose", () => {
    const write = vi.fn();
    const debug = createDebugLog(true, "ec2hop", write);
    debug("describing instance(s) by name");
    expect(write).toHaveBeenCalledWith(`${pc.dim("ec2hop: describing instance(s) by name")}\n`);
  });

  it("prefixes lines with the program name it was given", () => {
    const write = vi.fn();
    createDebugLog(true, "jump", write)("key path is: /keys");
    expect(write).toHaveBeenCalledWith(`${pc.dim("jump: key path is: /keys")}\n`);
  });

  it("is silent otherwise", () => {
    const write = vi.fn();
    createDebugLog(false, "ec2hop", write)("anything");
    expect(write).not.toHaveBeenCalled();
  });
});

describe("log helpers", () => {
  it("writes warnings and errors to stderr in colour", () => {
    const spy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    logWarn("careful");
    logError("Error: boom");
    expect(spy.mock.calls.map((c) => c[0])).toEqual([
      `${pc.yellow("careful")}\n`,
      `${pc.red("Error: boom")}\n`,
    ]);
    spy.mockRestore();
  });
});
