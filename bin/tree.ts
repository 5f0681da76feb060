#!/usr/bin/env node
/**
 * ordered-tree workbench
 *
 * An interactive REPL for watching how insertion order shapes an unbalanced
 * search tree while the in-order traversal stays the same.
 *
 * Usage:
 *   ordered-tree [--count <n>] [--max <n>] [--seed <s>] [--verbose]
 */
import { hrtime } from "node:process";
import rsexport from "random-seed";
import tkexport from "terminal-kit";

import { parseWorkbenchArgs, usage } from "../lib/workbench/config.js";
import {
  helpText,
  type Message,
  WorkbenchSession,
} from "../lib/workbench/session.js";

const { create } = rsexport;
const { terminal } = tkexport;

const config = (() => {
  try {
    return parseWorkbenchArgs(process.argv.slice(2));
  } catch (e) {
    console.error(String(e));
    console.error("Use --help for usage information.");
    process.exit(1);
  }
})();

if (config.help) {
  console.log(usage);
  process.exit(0);
}

const seed = config.seed ?? hrtime.bigint().toString();
if (config.verbose) console.error(`[DEBUG] random seed ${seed}`);

const session = new WorkbenchSession(config, create(seed));
const commandHistory: string[] = [];

function print(message: Message): void {
  terminal("\n");
  switch (message.tone) {
    case "info":
      terminal.cyan(message.text + "\n");
      break;
    case "success":
      terminal.green(message.text + "\n");
      break;
    case "warning":
      terminal.yellow(message.text + "\n");
      break;
    case "error":
      terminal.red(message.text + "\n");
      break;
  }
}

function exit(code: number): never {
  terminal.grabInput(false);
  process.exit(code);
}

function repl(): void {
  terminal("\n> ");

  terminal.inputField({ history: commandHistory }, (error, input) => {
    if (error) {
      print({ tone: "error", text: "error: " + String(error) });
      exit(1);
    }

    const trimmedInput = (input ?? "").trim();
    if (trimmedInput) {
      commandHistory.push(trimmedInput);
    }

    if (config.verbose) console.error(`[DEBUG] command ${trimmedInput}`);
    session.run(trimmedInput).forEach(print);

    if (session.done) {
      exit(0);
    }
    repl();
  });
}

terminal.grabInput(true);
terminal.on("key", (name: string) => {
  if (name === "CTRL_C") {
    print({ tone: "success", text: "exiting workbench." });
    exit(0);
  }
});

terminal.bold.cyan("\nordered-tree workbench");
terminal.cyan(helpText + "\n");
repl();
