/**
 * Codegen - renders expression trees and modules to target source text.
 *
 * Main entry point for code generation. Rendering is pure: the same tree and
 * options always give the same text, and any error aborts the whole call.
 */

import { Decl, Expr, Module, Pattern } from "../ast/expr-ast";
import { CodeBuilder } from "./code-builder";
import { RenderOptions, createContext } from "./context";
import { genDecl } from "./gen-decl";
import { genExpr } from "./gen-expr";
import { CompiledPattern, genPattern } from "./gen-pattern";

/**
 * Render a single expression.
 */
export function render(expr: Expr, options: RenderOptions = {}): string {
  return genExpr(expr, createContext(options));
}

/**
 * Render a module: optional header comment, then each declaration separated
 * by a blank line.
 */
export function renderModule(
  module: Module | Decl[],
  options: RenderOptions = {}
): string {
  const ctx = createContext(options);
  const decls = Array.isArray(module) ? module : module.decls;
  const builder = new CodeBuilder(ctx.indent);

  if (ctx.header !== undefined) {
    for (const line of ctx.header.split("\n")) {
      builder.writeLine(line.length > 0 ? `// ${line}` : "//");
    }
    builder.newline();
  }

  decls.forEach((decl, i) => {
    if (i > 0) {
      builder.newline();
    }
    builder.write(genDecl(decl, ctx));
  });

  return builder.build();
}

/**
 * Compile a pattern against the rendered expression `valueRef`.
 *
 * The condition is a single boolean expression; the bindings are declared,
 * in order, only where the condition holds.
 */
export function compilePattern(
  pattern: Pattern,
  valueRef: string,
  options: RenderOptions = {}
): CompiledPattern {
  return genPattern(pattern, valueRef, createContext(options));
}
