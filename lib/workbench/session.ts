/**
 * Command interpreter behind the `ordered-tree` REPL.
 *
 * A session owns the current tree of numbers and the trees it replaced, and
 * turns each line of input into a list of messages for the terminal to print.
 * It does no I/O of its own.
 *
 * @module
 */
import { IncomparableValuesError } from "../tree/incomparableValuesError.js";
import { randomInsertionOrder, type RandomSource } from "../tree/generator.js";
import { prettyPrintTree } from "../tree/render.js";
import {
  count,
  depth,
  empty,
  fromValues,
  insertAll,
  maximum,
  member,
  minimum,
  size,
  traverse,
  type Tree,
} from "../tree/tree.js";
import type { WorkbenchConfig } from "./config.js";

export type Tone = "info" | "success" | "warning" | "error";

export interface Message {
  tone: Tone;
  text: string;
}

const say = (tone: Tone, text: string): Message => ({ tone, text });

export const helpText = `
Available commands:
  <n> [n ...]            -- insert numbers (separated by spaces or commas)
  :t or :traverse        -- print the values in ascending order
  :p or :print           -- print the shape of the tree
  :stats                 -- print size, depth, minimum and maximum
  :m or :member <n>      -- check whether a value is present
  :g or :generate [n]    -- replace the tree with n random values
  :sorted [n]            -- replace the tree with 0..n-1 inserted in order
  :u or :undo            -- go back to the previous tree
  :reset                 -- start again from the empty tree
  :help                  -- display this help message
  :quit                  -- exit the workbench`;

const parseNumber = (token: string): number | undefined => {
  if (token === "NaN") return NaN;
  const value = Number(token);
  return token.trim() === "" || Number.isNaN(value) ? undefined : value;
};

export class WorkbenchSession {
  private current: Tree<number> = empty<number>();
  private readonly previous: Tree<number>[] = [];
  private finished = false;

  constructor(
    private readonly config: WorkbenchConfig,
    private readonly rs: RandomSource,
  ) {}

  get tree(): Tree<number> {
    return this.current;
  }

  get done(): boolean {
    return this.finished;
  }

  run(line: string): Message[] {
    const input = line.trim();
    if (input === "") return [];

    if (!input.startsWith(":")) {
      return this.insertLine(input);
    }

    const parts = input.slice(1).trim().split(/\s+/);
    const cmd = parts[0].toLowerCase();
    const arg = parts.length > 1 ? parts[1] : undefined;

    switch (cmd) {
      case "t":
      case "traverse":
        return [say("info", `[${traverse(this.current).join(", ")}]`)];
      case "p":
      case "print":
        return [say("success", prettyPrintTree(this.current))];
      case "stats":
        return [this.stats()];
      case "m":
      case "member":
        return this.member(arg);
      case "g":
      case "generate":
        return this.generate(arg);
      case "sorted":
        return this.sorted(arg);
      case "u":
      case "undo":
        return this.undo();
      case "reset":
        this.replace(empty<number>());
        return [say("info", "reset to the empty tree.")];
      case "help":
        return [say("info", helpText)];
      case "quit":
        this.finished = true;
        return [say("success", "exiting workbench.")];
      default:
        return [say("warning", "unknown command: " + input)];
    }
  }

  private replace(tree: Tree<number>): void {
    this.previous.push(this.current);
    this.current = tree;
  }

  private insertLine(input: string): Message[] {
    const tokens = input.split(/[\s,]+/).filter((t) => t !== "");
    const items: number[] = [];
    for (const token of tokens) {
      const value = parseNumber(token);
      if (value === undefined) {
        return [say("error", "not a number: " + token)];
      }
      items.push(value);
    }

    try {
      // all or nothing: a failure leaves the current tree in place
      const next = insertAll(items, this.current);
      this.replace(next);
      return [
        say("success", `inserted ${items.join(" ")}: ${prettyPrintTree(next)}`),
      ];
    } catch (e) {
      if (e instanceof IncomparableValuesError) {
        return [say("error", "insert failed: " + String(e))];
      }
      throw e;
    }
  }

  private stats(): Message {
    const tree = this.current;
    const min = minimum(tree);
    const max = maximum(tree);
    return say(
      "info",
      `size ${size(tree)}, depth ${depth(tree)}, ` +
        `min ${min ?? "-"}, max ${max ?? "-"}`,
    );
  }

  private member(arg: string | undefined): Message[] {
    if (arg === undefined) {
      return [say("warning", "usage: :member <n>")];
    }
    const value = parseNumber(arg);
    if (value === undefined) {
      return [say("error", "not a number: " + arg)];
    }

    try {
      if (!member(value, this.current)) {
        return [say("info", `${value} is absent`)];
      }
      return [
        say("info", `${value} is present (count ${count(value, this.current)})`),
      ];
    } catch (e) {
      if (e instanceof IncomparableValuesError) {
        return [say("error", "lookup failed: " + String(e))];
      }
      throw e;
    }
  }

  private countArg(arg: string | undefined): number | Message {
    if (arg === undefined) return this.config.generateCount;
    const n = Number(arg);
    if (!Number.isInteger(n) || n < 0) {
      return say("error", `count must be a non-negative integer, got ${arg}`);
    }
    return n;
  }

  private generate(arg: string | undefined): Message[] {
    const n = this.countArg(arg);
    if (typeof n !== "number") return [n];

    const items = randomInsertionOrder(this.rs, n, this.config.generateMax);
    const tree = fromValues(items);
    this.replace(tree);
    return [
      say("success", `generated ${items.join(" ")}: ${prettyPrintTree(tree)}`),
    ];
  }

  private sorted(arg: string | undefined): Message[] {
    const n = this.countArg(arg);
    if (typeof n !== "number") return [n];

    const items = Array.from({ length: n }, (_, i) => i);
    const tree = fromValues(items);
    this.replace(tree);
    return [
      say("success", `inserted 0..${n - 1} in order, depth ${depth(tree)}`),
    ];
  }

  private undo(): Message[] {
    const last = this.previous.pop();
    if (last === undefined) {
      return [say("warning", "nothing to undo.")];
    }
    this.current = last;
    return [say("info", "undone: " + prettyPrintTree(last))];
  }
}
