#!/usr/bin/env node
/**
 * Command-line renderer.
 *
 * Usage:
 *   matchcast <input-file> [options]
 *   matchcast --help
 *
 * Options:
 *   -o, --output <file>    Output file path (default: stdout)
 *   --module               Input is a module ({ "decls": [...] })
 *   --indent <n>           Spaces per indentation level (default: 2)
 *   --check                Fail unless the output parses
 *   --no-color             Plain error output
 *   -h, --help             Show help
 */

import * as fs from "fs";
import * as path from "path";
import { parseArgs } from "./cli-args";
import { compileSource } from "./compile";
import { formatError } from "./diagnostics";

const HELP = `
matchcast - render expression trees to AssemblyScript

Usage:
  matchcast <input-file> [options]

Options:
  -o, --output <file>    Output file path (default: stdout)
  --module               Input is a module ({ "decls": [...] })
  --indent <n>           Spaces per indentation level (default: 2)
  --check                Fail unless the output parses
  --no-color             Plain error output
  -h, --help             Show this help

Examples:
  matchcast expr.json
  matchcast shapes.json --module -o shapes.ts
  matchcast expr.json --check --indent 4
`;

function main(): void {
  const parsed = parseArgs(process.argv.slice(2));

  if (parsed.kind === "help") {
    console.log(HELP);
    process.exit(0);
  }
  if (parsed.kind === "error") {
    console.error(`Error: ${parsed.message}`);
    console.log(HELP);
    process.exit(1);
  }

  const { options } = parsed;

  // Read input file
  const inputPath = path.resolve(options.inputFile);
  let source: string;
  try {
    source = fs.readFileSync(inputPath, "utf-8");
  } catch (err) {
    console.error(`Error reading file: ${inputPath}`);
    if (err instanceof Error) {
      console.error(err.message);
    }
    process.exit(1);
  }

  let output: string;
  try {
    output = compileSource(source, options);
  } catch (err) {
    console.error(formatError(err, options.inputFile, options.color));
    process.exit(1);
  }

  // Write output
  if (options.outputFile) {
    const outputPath = path.resolve(options.outputFile);
    try {
      fs.writeFileSync(outputPath, output);
      console.error(`Rendered ${options.inputFile} -> ${options.outputFile}`);
    } catch (err) {
      console.error(`Error writing file: ${outputPath}`);
      if (err instanceof Error) {
        console.error(err.message);
      }
      process.exit(1);
    }
  } else {
    process.stdout.write(output);
  }
}

main();
