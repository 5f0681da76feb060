/**
 * Workbench configuration and command-line parsing.
 *
 * @module
 */

export interface WorkbenchConfig {
  /** how many values `:generate` and `:sorted` use when given no count */
  generateCount: number;
  /** largest value `:generate` may draw */
  generateMax: number;
  /** seed for the random source; the binary picks one when absent */
  seed?: string;
  verbose: boolean;
  help: boolean;
}

export const defaultWorkbenchConfig: WorkbenchConfig = {
  generateCount: 8,
  generateMax: 99,
  verbose: false,
  help: false,
};

const parseCount = (flag: string, raw: string | undefined): number => {
  if (raw === undefined) {
    throw new RangeError(`${flag} expects a value`);
  }
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isInteger(value) || value < 0) {
    throw new RangeError(`${flag} expects a non-negative integer, got ${raw}`);
  }
  return value;
};

export function parseWorkbenchArgs(args: readonly string[]): WorkbenchConfig {
  const config: WorkbenchConfig = { ...defaultWorkbenchConfig };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case "--help":
      case "-h":
        config.help = true;
        break;
      case "--verbose":
      case "-V":
        config.verbose = true;
        break;
      case "--count":
      case "-n":
        config.generateCount = parseCount(arg, args[++i]);
        break;
      case "--max":
        config.generateMax = parseCount(arg, args[++i]);
        break;
      case "--seed": {
        const seed = args[++i];
        if (seed === undefined) {
          throw new RangeError(`${arg} expects a value`);
        }
        config.seed = seed;
        break;
      }
      default:
        throw new Error(`unknown option: ${arg}`);
    }
  }

  return config;
}

export const usage = `
ordered-tree workbench

USAGE:
    ordered-tree [OPTIONS]

OPTIONS:
    -h, --help         Show this help message
    -V, --verbose      Write debug output to stderr
    -n, --count <n>    Values used by :generate and :sorted (default 8)
        --max <n>      Largest value :generate may draw (default 99)
        --seed <s>     Seed for :generate, for reproducible shapes
`;
