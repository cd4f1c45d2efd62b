/**
 * Terminal formatting of compiler errors.
 */

import color from "cli-color";
import { CompileError, CompileErrorStage } from "./ast/expr-ast";

type Paint = (text: string) => string;

type Palette = {
  stage: Paint;
  path: Paint;
  note: Paint;
  file: Paint;
};

const COLORED: Palette = {
  stage: (text) => color.red.bold(text),
  path: (text) => color.cyan(text),
  note: (text) => color.blackBright(text),
  file: (text) => color.bold(text),
};

const plain: Paint = (text) => text;

const PLAIN: Palette = { stage: plain, path: plain, note: plain, file: plain };

const STAGE_LABELS: Record<CompileErrorStage, string> = {
  decode: "Decode error",
  render: "Render error",
  check: "Check error",
};

/**
 * Format an error for stderr:
 *
 * ```
 * tree.json: Decode error at $.arms[0].pattern.kind: Unknown pattern kind: tuple
 *   note: ...
 * ```
 */
export function formatError(
  error: unknown,
  filePath: string,
  useColor: boolean = true
): string {
  const paint = useColor ? COLORED : PLAIN;
  const file = paint.file(filePath);

  if (error instanceof CompileError) {
    const location = error.path ? ` at ${paint.path(error.path)}` : "";
    const lines = [
      `${file}: ${paint.stage(STAGE_LABELS[error.stage])}${location}: ${error.message}`,
      ...error.notes.map((n) => paint.note(`  note: ${n}`)),
    ];
    return lines.join("\n");
  }

  if (error instanceof Error) {
    return `${file}: ${error.message}`;
  }

  return `${file}: Unknown error: ${String(error)}`;
}
