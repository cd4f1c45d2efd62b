/**
 * Case and try code generation.
 *
 * A case becomes a closure taking the scrutinee as its parameter, so the
 * scrutinee is evaluated exactly once:
 * ```
 * ((_match: any) => {
 *   if (<pattern1-condition>) {
 *     <bindings>
 *     return <body1>;
 *   } else if (<pattern2-condition> && (<guard2>)) {
 *     return <body2>;
 *   } else {
 *     throw new Error("No match found for value: " + String(_match));
 *   }
 * })(<scrutinee>)
 * ```
 *
 * A try wraps its body in a target `try` and runs the same arm chain over
 * the caught value; when nothing matches the value is rethrown unchanged.
 */

import { CaseArm, CatchArm, Expr } from "../ast/expr-ast";
import { CodeBuilder } from "./code-builder";
import { RenderContext } from "./context";
import { genClosure, genExpr, writeConst } from "./gen-expr";
import { PatternBinding, genPattern } from "./gen-pattern";

type Arm = CaseArm | CatchArm;

export function genCase(
  scrutinee: Expr,
  arms: CaseArm[],
  ctx: RenderContext
): string {
  const { matchVar, dialect } = ctx;
  const builder = new CodeBuilder(ctx.indent);

  builder.block(
    `((${matchVar}: ${dialect.anyType}) => {`,
    () => writeArmChain(builder, arms, matchVar, dialect.noMatch(matchVar), ctx),
    `})(${genExpr(scrutinee, ctx)})`
  );
  return builder.build();
}

export function genTry(
  body: Expr,
  handlers: CatchArm[],
  ctx: RenderContext
): string {
  const { errorVar, dialect } = ctx;

  return genClosure(ctx, (builder) => {
    builder.block("try {", () => {
      builder.writeLine(`return ${genExpr(body, ctx)};`);
    });
    builder.block(` catch (${errorVar}: ${dialect.anyType}) {`, () => {
      writeArmChain(builder, handlers, errorVar, `throw ${errorVar};`, ctx);
    });
    builder.newline();
  });
}

/**
 * Write arms as an if / else if / else chain tested top to bottom.
 *
 * An unguarded arm whose condition is `true` ends the chain: it becomes the
 * final `else` (or the whole body when it comes first), so no fallback is
 * written and any arms after it are unreachable.
 */
function writeArmChain(
  builder: CodeBuilder,
  arms: Arm[],
  ref: string,
  fallback: string,
  ctx: RenderContext
): void {
  let opened = false;

  for (const arm of arms) {
    const { condition, bindings } = genPattern(arm.pattern, ref, ctx);
    const writeBody = () => {
      for (const b of bindings) {
        writeConst(builder, b.name, b.value);
      }
      builder.writeLine(`return ${genExpr(arm.body, ctx)};`);
    };

    if (!arm.guard && condition === "true") {
      if (opened) {
        builder.block(" else {", writeBody);
        builder.newline();
      } else {
        writeBody();
      }
      return;
    }

    const test = arm.guard
      ? `${condition} && ${genGuard(arm.guard, bindings, ctx)}`
      : condition;
    builder.block(`${opened ? " else if" : "if"} (${test}) {`, writeBody);
    opened = true;
  }

  if (!opened) {
    builder.writeLine(fallback);
    return;
  }
  builder.block(" else {", () => {
    builder.writeLine(fallback);
  });
  builder.newline();
}

/**
 * The guard may use the arm's bindings, which are only declared inside the
 * branch. When there are any, the guard runs in its own closure that
 * declares them first; && keeps it from running before the structural
 * test has passed.
 */
function genGuard(
  guard: Expr,
  bindings: PatternBinding[],
  ctx: RenderContext
): string {
  const code = genExpr(guard, ctx);
  if (bindings.length === 0) {
    return `(${code})`;
  }
  return genClosure(ctx, (builder) => {
    for (const b of bindings) {
      writeConst(builder, b.name, b.value);
    }
    builder.writeLine(`return ${code};`);
  });
}
