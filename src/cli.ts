#!/usr/bin/env node
/**
 * Vela CLI - Command-line interface for the Vela instrument scripting language.
 */

import * as fs from "fs";
import { startRepl } from "./repl.js";
import { createVM, runFile, VERSION } from "./runner.js";
import { compile } from "./compiler/compiler.js";
import { disassemble } from "./bytecode/disassemble.js";
import { InterpretResult } from "./vm/vm.js";

function printUsage(): void {
  console.log(`
Vela v${VERSION} - Instrument automation scripting

Usage:
  vela [options] [file]

Options:
  -h, --help         Show this help message
  -v, --version      Show version
  -e, --eval         Evaluate code from command line
  -d, --disassemble  Print bytecode instead of running
  -i, --interactive  Start REPL after running file

Examples:
  vela                     Start interactive REPL
  vela survey.vela         Run a script file
  vela -e "var x = 2^3"    Evaluate code
  vela -d survey.vela      Show the compiled bytecode
`);
}

function printVersion(): void {
  console.log(`Vela ${VERSION}`);
}

/**
 * Print the bytecode listing for source text. Returns false on syntax errors.
 */
function printDisassembly(source: string): boolean {
  const { script, errors } = compile(source);
  if (script === null) {
    for (const err of errors) {
      console.error(`Syntax Error: ${err.message}`);
    }
    return false;
  }
  console.log(disassemble(script).join("\n"));
  return true;
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  let evalCode: string | null = null;
  let interactive = false;
  let listing = false;
  let file: string | null = null;

  // Parse arguments
  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      printUsage();
      return;
    } else if (arg === "-v" || arg === "--version") {
      printVersion();
      return;
    } else if (arg === "-e" || arg === "--eval") {
      i++;
      const code = args[i];
      if (code === undefined) {
        console.error("Error: -e requires an argument");
        process.exitCode = 1;
        return;
      }
      evalCode = code;
    } else if (arg === "-d" || arg === "--disassemble") {
      listing = true;
    } else if (arg === "-i" || arg === "--interactive") {
      interactive = true;
    } else if (arg.startsWith("-")) {
      console.error(`Error: Unknown option: ${arg}`);
      printUsage();
      process.exitCode = 1;
      return;
    } else {
      file = arg;
      break;
    }
    i++;
  }

  const vm = createVM();

  if (listing) {
    const source = evalCode ?? (file !== null ? fs.readFileSync(file, "utf-8") : null);
    if (source === null) {
      console.error("Error: -d needs a file or -e code");
      process.exitCode = 1;
      return;
    }
    if (!printDisassembly(source)) {
      process.exitCode = 1;
    }
    return;
  }

  let status = InterpretResult.Ok;
  if (evalCode !== null) {
    status = await vm.run(evalCode);
  } else if (file !== null) {
    status = await runFile(file, vm);
  } else {
    await startRepl(vm);
    return;
  }

  if (interactive) {
    await startRepl(vm);
  } else if (status !== InterpretResult.Ok) {
    process.exitCode = status === InterpretResult.CompileError ? 65 : 70;
  }
}

main().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
});
