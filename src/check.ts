/**
 * Output check - parses rendered text with the TypeScript compiler.
 *
 * The target dialect is TypeScript syntax, so the TypeScript parser can tell
 * whether a rendering is at least syntactically well formed. Only syntax is
 * checked; names and types are left to the target toolchain.
 */

import * as ts from "typescript";
import { CompileError } from "./ast/expr-ast";

export type SyntaxIssue = {
  message: string;
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
};

export type CheckMode = "expression" | "module";

// Rendered expressions are checked as the initializer of this declaration
const EXPRESSION_PREFIX = "export const __checked = ";

/**
 * Syntax errors in rendered text. Positions refer to `code` itself.
 */
export function checkSyntax(code: string, mode: CheckMode): SyntaxIssue[] {
  const source =
    mode === "expression"
      ? `${EXPRESSION_PREFIX}${code};\n`
      : `${code}\nexport {};\n`;

  const result = ts.transpileModule(source, {
    reportDiagnostics: true,
    fileName: "rendered.ts",
    compilerOptions: {
      target: ts.ScriptTarget.ES2022,
      module: ts.ModuleKind.ESNext,
    },
  });

  return (result.diagnostics ?? [])
    .filter((d) => d.category === ts.DiagnosticCategory.Error)
    .map((d) => toIssue(d, mode));
}

/**
 * Throw a check-stage CompileError listing every syntax error.
 */
export function assertValidSyntax(code: string, mode: CheckMode): void {
  const issues = checkSyntax(code, mode);
  if (issues.length === 0) {
    return;
  }
  const error = new CompileError(
    `Rendered ${mode} is not valid syntax (${issues.length} error${issues.length === 1 ? "" : "s"})`,
    "check"
  );
  for (const issue of issues) {
    error.addNote(`${issue.line}:${issue.column} ${issue.message}`);
  }
  throw error;
}

function toIssue(diagnostic: ts.Diagnostic, mode: CheckMode): SyntaxIssue {
  const message = ts.flattenDiagnosticMessageText(diagnostic.messageText, "\n");
  if (!diagnostic.file || diagnostic.start === undefined) {
    return { message, line: 1, column: 1 };
  }

  const pos = diagnostic.file.getLineAndCharacterOfPosition(diagnostic.start);
  // The prefix shares the first line with the rendered code
  const column =
    mode === "expression" && pos.line === 0
      ? Math.max(pos.character - EXPRESSION_PREFIX.length, 0)
      : pos.character;
  return { message, line: pos.line + 1, column: column + 1 };
}
