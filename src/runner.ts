/**
 * Vela Runner - Execute Vela scripts from files.
 */

import * as fs from "fs";
import * as path from "path";
import { setTimeout as delay } from "timers/promises";
import { VM, VMConfig, InstrumentHost, InterpretResult } from "./vm/vm.js";
import { createBuiltins } from "./builtins/builtins.js";

export const VERSION = "0.1.0";

/**
 * Instrument host that logs each action instead of driving hardware.
 */
export function createLoggingHost(
  log: (line: string) => void = (line) => console.log(line)
): InstrumentHost {
  return {
    survey: () => log("[action] survey"),
    segment: () => log("[action] segment"),
    filter: () => log("[action] filter"),
    mark: () => log("[action] mark"),
    manage: () => log("[action] manage"),
    scan: () => log("[action] scan"),
    wait: async (seconds) => {
      log(`[action] wait ${seconds}s`);
      await delay(seconds * 1000);
    },
  };
}

/**
 * Create a VM seeded with the builtins and bound to the logging host.
 * Options given here override those defaults.
 */
export function createVM(config: VMConfig = {}): VM {
  return new VM({ globals: createBuiltins(), host: createLoggingHost(), ...config });
}

/**
 * Run a Vela script file.
 */
export async function runFile(filepath: string, vm: VM = createVM()): Promise<InterpretResult> {
  const resolved = path.resolve(filepath);
  if (!fs.existsSync(resolved)) {
    throw new Error(`File not found: ${filepath}`);
  }
  const code = fs.readFileSync(resolved, "utf-8");
  return vm.run(code);
}

/**
 * Run Vela code, on a fresh VM unless one is given.
 */
export async function runCode(code: string, vm: VM = createVM()): Promise<InterpretResult> {
  return vm.run(code);
}
