/**
 * Kestrel REPL - Read-Eval-Print Loop for interactive scripting.
 */

import * as readline from "readline";
import { Interpreter } from "./interpreter/interpreter.js";
import { ValueType } from "./object/object.js";
import { VERSION } from "./version.js";

const PROMPT = ">>> ";
const CONTINUE_PROMPT = "... ";

/**
 * Start the interactive REPL. Declarations persist for the session.
 * Without an interpreter, one is created whose `read` sees end of
 * input, since the terminal belongs to the prompt.
 */
export function startRepl(interpreter: Interpreter = new Interpreter({ input: () => null })): Promise<void> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: true,
  });

  console.log(`Kestrel v${VERSION} - Type 'exit' or Ctrl+D to quit`);
  console.log("");

  let buffer = "";
  let closing = false;

  return new Promise((resolve) => {
    rl.on("close", () => {
      if (!closing) {
        console.log("\nGoodbye!");
      }
      resolve();
    });

    const prompt = (): void => {
      rl.question(buffer ? CONTINUE_PROMPT : PROMPT, (input) => {
        const line = input.trim();

        // Handle exit commands
        if (!buffer && (line === "exit" || line === "quit")) {
          console.log("Goodbye!");
          closing = true;
          rl.close();
          return;
        }

        // Handle special commands
        if (!buffer && line.startsWith("/")) {
          handleCommand(line, interpreter);
          prompt();
          return;
        }

        // Accumulate input
        buffer += (buffer ? "\n" : "") + input;

        if (isComplete(buffer)) {
          if (buffer.trim()) {
            evaluate(buffer, interpreter);
          }
          buffer = "";
        }

        prompt();
      });
    };

    prompt();
  });
}

/**
 * Check if the input is syntactically complete: brackets balanced and
 * no string left open.
 */
export function isComplete(input: string): boolean {
  let braces = 0;
  let parens = 0;
  let brackets = 0;
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
        braces++;
        break;
      case "}":
        braces--;
        break;
      case "(":
        parens++;
        break;
      case ")":
        parens--;
        break;
      case "[":
        brackets++;
        break;
      case "]":
        brackets--;
        break;
    }
  }

  return braces <= 0 && parens <= 0 && brackets <= 0 && quote === null;
}

/**
 * Terminate the input with `;` if the user left it off.
 */
export function withTerminator(input: string): string {
  const trimmed = input.trimEnd();
  return trimmed.endsWith(";") ? trimmed : `${trimmed};`;
}

/**
 * Evaluate one entry and print its value or error.
 */
function evaluate(code: string, interpreter: Interpreter): void {
  const result = interpreter.tryRun(withTerminator(code), "<repl>");
  if (!result.ok) {
    console.error(`Error: ${result.error.message}`);
    return;
  }
  if (result.value.type !== ValueType.Null) {
    console.log(result.value.inspect());
  }
}

/**
 * Render the root-scope bindings for `/vars`.
 */
export function describeVariables(interpreter: Interpreter): string[] {
  return interpreter.globals.globals().map(([name, value]) => `${name} = ${value.inspect()}`);
}

/**
 * Handle REPL commands.
 */
function handleCommand(cmd: string, interpreter: Interpreter): void {
  const command = cmd.slice(1).split(/\s+/)[0].toLowerCase();

  switch (command) {
    case "help":
      console.log(`
REPL Commands:
  /help     Show this help
  /vars     List declared variables
  /clear    Clear the screen
  exit      Exit the REPL
`);
      break;

    case "vars": {
      const lines = describeVariables(interpreter);
      console.log(lines.length > 0 ? lines.join("\n") : "(no variables)");
      break;
    }

    case "clear":
      console.clear();
      break;

    default:
      console.log(`Unknown command: /${command}. Type /help for available commands.`);
  }
}
