#!/usr/bin/env node
/**
 * Kestrel CLI - Command-line interface for the Kestrel scripting language.
 */

import { startRepl } from "./repl.js";
import { runCode, readScript, formatTokens } from "./runner.js";
import { Interpreter } from "./interpreter/interpreter.js";
import { ValueType, type RuntimeValue } from "./object/object.js";
import { VERSION } from "./version.js";

function printUsage(): void {
  console.log(`
Kestrel v${VERSION} - Tiny embeddable scripting language

Usage:
  kestrel [options] [file]

Options:
  -h, --help         Show this help message
  -v, --version      Show version
  -e, --eval         Evaluate code from command line
  -i, --interactive  Start REPL after running file
  --tokens           Print the token stream instead of running

Examples:
  kestrel                      Start interactive REPL
  kestrel script.ks            Run a script file
  kestrel -e "print(1 + 2);"   Evaluate code
  kestrel -i script.ks         Run script then start REPL
  kestrel --tokens script.ks   Show how a script tokenizes
`);
}

function printVersion(): void {
  console.log(`Kestrel ${VERSION}`);
}

function printResult(result: RuntimeValue): void {
  if (result.type !== ValueType.Null) {
    console.log(result.inspect());
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  let evalCode: string | null = null;
  let interactive = false;
  let tokens = false;
  let file: string | null = null;

  // Parse arguments
  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      printUsage();
      process.exit(0);
    } else if (arg === "-v" || arg === "--version") {
      printVersion();
      process.exit(0);
    } else if (arg === "-e" || arg === "--eval") {
      i++;
      if (i >= args.length) {
        console.error("Error: -e requires an argument");
        process.exit(1);
      }
      evalCode = args[i];
    } else if (arg === "-i" || arg === "--interactive") {
      interactive = true;
    } else if (arg === "--tokens") {
      tokens = true;
    } else if (arg.startsWith("-")) {
      console.error(`Error: Unknown option: ${arg}`);
      printUsage();
      process.exit(1);
    } else {
      file = arg;
      break;
    }
    i++;
  }

  try {
    let source: { source: string; filename: string } | null = null;
    if (evalCode !== null) {
      source = { source: evalCode, filename: "<eval>" };
    } else if (file !== null) {
      source = readScript(file);
    }

    if (tokens) {
      if (source === null) {
        console.error("Error: --tokens needs a file or -e code");
        process.exit(1);
      }
      console.log(formatTokens(source.source, source.filename).join("\n"));
      return;
    }

    if (source === null) {
      await startRepl();
      return;
    }

    const interpreter = new Interpreter();
    printResult(runCode(source.source, source.filename, interpreter));
    if (interactive) {
      await startRepl(interpreter);
    }
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : err}`);
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
