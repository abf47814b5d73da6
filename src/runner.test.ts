import { describe, it, expect } from "vitest";
import { createLoggingHost, createVM, runCode, runFile } from "./runner.js";
import { InterpretResult } from "./vm/vm.js";

describe("runner", () => {
  it("should log instrument actions", async () => {
    const log: string[] = [];
    const output: string[] = [];
    const vm = createVM({ host: createLoggingHost((line) => log.push(line)), output: (line) => output.push(line) });
    const status = await runCode("Scan\nSearch\nlen([1])?", vm);
    expect(status).toBe(InterpretResult.Ok);
    expect(log).toEqual(["[action] survey", "[action] scan"]);
    expect(output).toEqual(["1"]);
  });

  it("should log waits before delaying", async () => {
    const log: string[] = [];
    await createLoggingHost((line) => log.push(line)).wait(0);
    expect(log).toEqual(["[action] wait 0s"]);
  });

  it("should reject a missing file", async () => {
    await expect(runFile("does-not-exist.vela")).rejects.toThrow("File not found: does-not-exist.vela");
  });
});
