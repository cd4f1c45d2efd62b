/**
 * Expression code generation.
 *
 * Transforms Expr nodes to target-language code strings. Control forms that
 * are statements in the target (if, let, do, case, try) become
 * immediately-invoked closures ending in `return`, so every rendering is a
 * value that can sit anywhere an expression can.
 */

import {
  CompileError,
  DoStatement,
  Expr,
  ExprField,
  ExprOf,
  LambdaParam,
  LetBinding,
  isBinaryOperator,
  isUnaryOperator,
  unhandledKind,
} from "../ast/expr-ast";
import { exprToString } from "../ast/print";
import { CodeBuilder } from "./code-builder";
import { RenderContext } from "./context";
import { BinaryTemplate, Dialect, UnaryTemplate } from "./dialect";
import { genCase, genTry } from "./gen-match";

/**
 * Generate target code for an expression.
 */
export function genExpr(expr: Expr, ctx: RenderContext): string {
  switch (expr.kind) {
    case "int":
      return String(expr.value);

    case "string":
      return JSON.stringify(expr.value);

    case "bool":
      return expr.value ? "true" : "false";

    case "list":
      return `[${genList(expr.elements, ctx)}]`;

    case "record":
      return genRecord(expr.fields, ctx);

    case "variable":
      return expr.name;

    case "qualified":
      return expr.namespace ? `${expr.namespace}.${expr.name}` : expr.name;

    case "binary":
      return binaryTemplate(expr, ctx.dialect)(
        genExpr(expr.left, ctx),
        genExpr(expr.right, ctx)
      );

    case "unary":
      return unaryTemplate(expr, ctx.dialect)(genExpr(expr.operand, ctx));

    case "call":
      return `${genExpr(expr.fn, ctx)}(${genList(expr.args, ctx)})`;

    case "construct":
      return `new ${expr.constructor}(${genList(expr.args, ctx)})`;

    case "recordCreate":
      return `new ${expr.recordType}(${genRecord(expr.fields, ctx)})`;

    case "recordUpdate":
      return genRecordUpdate(expr.target, expr.updates, ctx);

    case "field":
      return genProperty(genExpr(expr.target, ctx), expr.name);

    case "index":
      return `${genExpr(expr.target, ctx)}[${genExpr(expr.index, ctx)}]`;

    case "if":
      return genIf(expr.condition, expr.then, expr.else, ctx);

    case "let":
      return genLet(expr.bindings, expr.body, ctx);

    case "case":
      return genCase(expr.scrutinee, expr.arms, ctx);

    case "lambda":
      return genLambda(expr.params, expr.body, ctx);

    case "try":
      return genTry(expr.body, expr.handlers, ctx);

    case "do":
      return genDo(expr.statements, expr.result, ctx);

    case "map":
      return `${genExpr(expr.collection, ctx)}.map((${expr.iterator}) => ${genExpr(expr.transform, ctx)})`;

    case "filter":
      return `${genExpr(expr.collection, ctx)}.filter((${expr.iterator}) => ${genExpr(expr.predicate, ctx)})`;

    case "fold":
      // Accumulator comes before the element, as reduce passes them
      return `${genExpr(expr.collection, ctx)}.reduce((${expr.accumulator}, ${expr.iterator}) => ${genExpr(expr.transform, ctx)}, ${genExpr(expr.initial, ctx)})`;

    case "annotate":
      return `(${genExpr(expr.expr, ctx)} as ${expr.annotation})`;

    default:
      throw unhandledKind("expression kind", expr);
  }
}

/**
 * Wrap statements in a zero-argument closure that is invoked on the spot:
 * `(() => { ... })()`.
 */
export function genClosure(
  ctx: RenderContext,
  body: (builder: CodeBuilder) => void
): string {
  const builder = new CodeBuilder(ctx.indent);
  builder.block("(() => {", () => body(builder), "})()");
  return builder.build();
}

/**
 * `const name = value;` lines for let bindings and do binds.
 */
export function writeConst(
  builder: CodeBuilder,
  name: string,
  value: string
): void {
  builder.writeLine(`const ${name} = ${value};`);
}

export function genParams(params: LambdaParam[]): string {
  return params
    .map((p) => (p.type ? `${p.name}: ${p.type}` : p.name))
    .join(", ");
}

// ============================================
// Operators
// ============================================

// Trees built outside the type system can carry any op string
function binaryTemplate(expr: ExprOf<"binary">, dialect: Dialect): BinaryTemplate {
  const op: string = expr.op;
  if (!isBinaryOperator(op)) {
    throw new CompileError(`Unknown binary operator: ${op}`).addNote(
      `in expression ${exprToString(expr)}`
    );
  }
  return dialect.binary[op];
}

function unaryTemplate(expr: ExprOf<"unary">, dialect: Dialect): UnaryTemplate {
  const op: string = expr.op;
  if (!isUnaryOperator(op)) {
    throw new CompileError(`Unknown unary operator: ${op}`).addNote(
      `in expression ${exprToString(expr)}`
    );
  }
  return dialect.unary[op];
}

// ============================================
// Lists and records
// ============================================

function genList(elements: Expr[], ctx: RenderContext): string {
  return elements.map((e) => genExpr(e, ctx)).join(", ");
}

function genRecord(fields: ExprField[], ctx: RenderContext): string {
  if (fields.length === 0) {
    return "{}";
  }
  return `{ ${genFields(fields, ctx)} }`;
}

function genRecordUpdate(
  target: Expr,
  updates: ExprField[],
  ctx: RenderContext
): string {
  const spread = `...${genExpr(target, ctx)}`;
  if (updates.length === 0) {
    return `({ ${spread} })`;
  }
  return `({ ${spread}, ${genFields(updates, ctx)} })`;
}

function genFields(fields: ExprField[], ctx: RenderContext): string {
  return fields
    .map((f) => `${genKey(f.name)}: ${genExpr(f.value, ctx)}`)
    .join(", ");
}

function genKey(name: string): string {
  return isValidIdentifier(name) ? name : JSON.stringify(name);
}

export function genProperty(target: string, name: string): string {
  if (isValidIdentifier(name)) {
    return `${target}.${name}`;
  }
  return `${target}[${JSON.stringify(name)}]`;
}

function isValidIdentifier(name: string): boolean {
  return /^[a-zA-Z_$][a-zA-Z0-9_$]*$/.test(name);
}

// ============================================
// Control forms
// ============================================

function genIf(
  condition: Expr,
  thenExpr: Expr,
  elseExpr: Expr,
  ctx: RenderContext
): string {
  return genClosure(ctx, (builder) => {
    builder.block(`if (${genExpr(condition, ctx)}) {`, () => {
      builder.writeLine(`return ${genExpr(thenExpr, ctx)};`);
    });
    builder.block(" else {", () => {
      builder.writeLine(`return ${genExpr(elseExpr, ctx)};`);
    });
    builder.newline();
  });
}

function genLet(
  bindings: LetBinding[],
  body: Expr,
  ctx: RenderContext
): string {
  return genClosure(ctx, (builder) => {
    for (const b of bindings) {
      writeConst(builder, b.name, genExpr(b.value, ctx));
    }
    builder.writeLine(`return ${genExpr(body, ctx)};`);
  });
}

function genDo(
  statements: DoStatement[],
  result: Expr,
  ctx: RenderContext
): string {
  return genClosure(ctx, (builder) => {
    for (const stmt of statements) {
      switch (stmt.kind) {
        case "bind":
          writeConst(builder, stmt.name, genExpr(stmt.value, ctx));
          break;
        case "expr":
          builder.writeLine(`${genExpr(stmt.expr, ctx)};`);
          break;
        default:
          throw unhandledKind("do statement", stmt);
      }
    }
    builder.writeLine(`return ${genExpr(result, ctx)};`);
  });
}

function genLambda(
  params: LambdaParam[],
  body: Expr,
  ctx: RenderContext
): string {
  const builder = new CodeBuilder(ctx.indent);
  // Parenthesized so the arrow stays one operand wherever it is embedded
  builder.block(
    `((${genParams(params)}) => {`,
    () => {
      builder.writeLine(`return ${genExpr(body, ctx)};`);
    },
    "})"
  );
  return builder.build();
}
