/**
 * Vela REPL - Read-Eval-Print Loop for interactive scripting.
 */

import * as readline from "readline";
import { compile } from "./compiler/compiler.js";
import { disassemble } from "./bytecode/disassemble.js";
import { createVM, VERSION } from "./runner.js";
import type { VM } from "./vm/vm.js";

const PROMPT = ">>> ";
const CONTINUE_PROMPT = "... ";

/**
 * Start the interactive REPL. Globals persist between inputs.
 */
export async function startRepl(vm: VM = createVM()): Promise<void> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: true,
  });

  console.log(`Vela v${VERSION} - Type 'exit' or Ctrl+D to quit`);
  console.log("");

  let buffer = "";
  rl.setPrompt(PROMPT);
  rl.prompt();

  for await (const input of rl) {
    const line = input.trim();

    if (buffer === "" && (line === "exit" || line === "quit")) {
      break;
    }

    if (buffer === "" && line.startsWith("/")) {
      if (!handleCommand(line)) {
        break;
      }
      rl.prompt();
      continue;
    }

    buffer += (buffer ? "\n" : "") + input;

    if (isComplete(buffer)) {
      if (buffer.trim()) {
        await vm.run(buffer);
      }
      buffer = "";
      rl.setPrompt(PROMPT);
    } else {
      rl.setPrompt(CONTINUE_PROMPT);
    }
    rl.prompt();
  }

  console.log("Goodbye!");
  rl.close();
}

/**
 * Check if the input has balanced brackets outside of string and path
 * literals.
 */
export function isComplete(input: string): boolean {
  let depth = 0;
  let quote: string | null = null;

  for (const c of input) {
    if (quote !== null) {
      if (c === quote) {
        quote = null;
      }
      continue;
    }

    switch (c) {
      case '"':
      case "'":
        quote = c;
        break;
      case "{":
      case "[":
      case "(":
        depth++;
        break;
      case "}":
      case "]":
      case ")":
        depth--;
        break;
    }
  }

  return depth <= 0 && quote === null;
}

/**
 * Handle REPL commands. Returns false when the REPL should exit.
 */
function handleCommand(cmd: string): boolean {
  const [command = "", ...rest] = cmd.slice(1).split(/\s+/);

  switch (command.toLowerCase()) {
    case "help":
      console.log(`
REPL Commands:
  /help               Show this help
  /clear              Clear the screen
  /disassemble CODE   Show the bytecode for CODE
  /exit               Exit the REPL
`);
      return true;

    case "clear":
      console.clear();
      return true;

    case "disassemble": {
      const { script, errors } = compile(rest.join(" "));
      if (script === null) {
        for (const err of errors) {
          console.error(`Syntax Error: ${err.message}`);
        }
      } else {
        console.log(disassemble(script).join("\n"));
      }
      return true;
    }

    case "exit":
    case "quit":
      return false;

    default:
      console.log(`Unknown command: /${command}. Type /help for available commands.`);
      return true;
  }
}
