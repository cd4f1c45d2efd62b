/**
 * One input file's trip through the pipeline: JSON text in, target text out.
 */

import { render, renderModule, RenderOptions } from "./codegen";
import { decodeExpr, decodeModule, parseJson } from "./decode/decode";
import { assertValidSyntax } from "./check";

export type CompileOptions = {
  /** Input is a module rather than a single expression */
  module: boolean;
  /** Spaces per indentation level */
  indent: number;
  /** Fail unless the output parses */
  check: boolean;
};

/**
 * Decode, render and optionally check one input. Throws CompileError.
 */
export function compileSource(source: string, options: CompileOptions): string {
  const json = parseJson(source);
  const renderOptions: RenderOptions = { indent: " ".repeat(options.indent) };

  if (options.module) {
    const output = renderModule(decodeModule(json), renderOptions);
    if (options.check) {
      assertValidSyntax(output, "module");
    }
    return output;
  }

  const output = render(decodeExpr(json), renderOptions);
  if (options.check) {
    assertValidSyntax(output, "expression");
  }
  return `${output}\n`;
}
