/**
 * Command-line argument parsing.
 */

export interface CliOptions {
  inputFile: string;
  outputFile: string | null;
  module: boolean;
  indent: number;
  check: boolean;
  color: boolean;
}

export type ParsedArgs =
  | { kind: "run"; options: CliOptions }
  | { kind: "help" }
  | { kind: "error"; message: string };

export function parseArgs(args: string[]): ParsedArgs {
  const options: CliOptions = {
    inputFile: "",
    outputFile: null,
    module: false,
    indent: 2,
    check: false,
    color: true,
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      return { kind: "help" };
    } else if (arg === "-o" || arg === "--output") {
      i++;
      if (i >= args.length) {
        return { kind: "error", message: "--output requires a file path" };
      }
      options.outputFile = args[i];
    } else if (arg === "--indent") {
      i++;
      const width = Number(args[i]);
      if (i >= args.length || !Number.isInteger(width) || width < 0) {
        return { kind: "error", message: "--indent requires a whole number" };
      }
      options.indent = width;
    } else if (arg === "--module") {
      options.module = true;
    } else if (arg === "--check") {
      options.check = true;
    } else if (arg === "--no-color") {
      options.color = false;
    } else if (arg.startsWith("-")) {
      return { kind: "error", message: `Unknown option: ${arg}` };
    } else {
      if (options.inputFile) {
        return { kind: "error", message: "Multiple input files not supported" };
      }
      options.inputFile = arg;
    }
    i++;
  }

  if (!options.inputFile) {
    return { kind: "error", message: "No input file specified" };
  }

  return { kind: "run", options };
}
