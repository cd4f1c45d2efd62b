/**
 * Constructors for expression, pattern and declaration nodes.
 */

import {
  BinaryOperator,
  CaseArm,
  CatchArm,
  Decl,
  DoStatement,
  Expr,
  ExprField,
  ExprOf,
  LambdaParam,
  LetBinding,
  LiteralExpr,
  Pattern,
  PatternField,
  PatternOf,
  UnaryOperator,
} from "./expr-ast";

// ============================================================================
// Literals and identifiers
// ============================================================================

export const int = (value: number): ExprOf<"int"> => ({ kind: "int", value });
export const str = (value: string): ExprOf<"string"> =>
  ({ kind: "string", value });
export const bool = (value: boolean): ExprOf<"bool"> =>
  ({ kind: "bool", value });

export const list = (...elements: Expr[]): ExprOf<"list"> =>
  ({ kind: "list", elements });

export const record = (fields: Record<string, Expr>): ExprOf<"record"> =>
  ({ kind: "record", fields: toFields(fields) });

export const varRef = (name: string): ExprOf<"variable"> =>
  ({ kind: "variable", name });

export const qualified = (
  namespace: string | undefined,
  name: string
): ExprOf<"qualified"> => ({ kind: "qualified", namespace, name });

// ============================================================================
// Operators
// ============================================================================

export const binop = (
  op: BinaryOperator,
  left: Expr,
  right: Expr
): ExprOf<"binary"> => ({ kind: "binary", op, left, right });

export const add = (left: Expr, right: Expr) => binop("Add", left, right);
export const sub = (left: Expr, right: Expr) => binop("Subtract", left, right);
export const mul = (left: Expr, right: Expr) => binop("Multiply", left, right);
export const eq = (left: Expr, right: Expr) => binop("Equal", left, right);
export const gtExpr = (left: Expr, right: Expr) =>
  binop("GreaterThan", left, right);
export const ltExpr = (left: Expr, right: Expr) =>
  binop("LessThan", left, right);

export const unary = (op: UnaryOperator, operand: Expr): ExprOf<"unary"> =>
  ({ kind: "unary", op, operand });

// ============================================================================
// Calls and records
// ============================================================================

export const call = (fn: Expr, ...args: Expr[]): ExprOf<"call"> =>
  ({ kind: "call", fn, args });

export const construct = (
  constructor: string,
  ...args: Expr[]
): ExprOf<"construct"> => ({ kind: "construct", constructor, args });

export const recordCreate = (
  recordType: string,
  fields: Record<string, Expr>
): ExprOf<"recordCreate"> =>
  ({ kind: "recordCreate", recordType, fields: toFields(fields) });

export const recordUpdate = (
  target: Expr,
  updates: Record<string, Expr>
): ExprOf<"recordUpdate"> =>
  ({ kind: "recordUpdate", target, updates: toFields(updates) });

export const field = (target: Expr, name: string): ExprOf<"field"> =>
  ({ kind: "field", target, name });

export const index = (target: Expr, idx: Expr): ExprOf<"index"> =>
  ({ kind: "index", target, index: idx });

// ============================================================================
// Control forms
// ============================================================================

export const ifExpr = (condition: Expr, then: Expr, els: Expr): ExprOf<"if"> =>
  ({ kind: "if", condition, then, else: els });

export const letExpr = (bindings: LetBinding[], body: Expr): ExprOf<"let"> =>
  ({ kind: "let", bindings, body });

export const binding = (name: string, value: Expr): LetBinding =>
  ({ name, value });

export const caseExpr = (scrutinee: Expr, ...arms: CaseArm[]): ExprOf<"case"> =>
  ({ kind: "case", scrutinee, arms });

export const arm = (pattern: Pattern, body: Expr, guard?: Expr): CaseArm =>
  guard ? { pattern, guard, body } : { pattern, body };

export const lambda = (params: LambdaParam[], body: Expr): ExprOf<"lambda"> =>
  ({ kind: "lambda", params, body });

export const param = (name: string, type?: string): LambdaParam =>
  type ? { name, type } : { name };

export const tryExpr = (body: Expr, ...handlers: CatchArm[]): ExprOf<"try"> =>
  ({ kind: "try", body, handlers });

export const doExpr = (
  statements: DoStatement[],
  result: Expr
): ExprOf<"do"> => ({ kind: "do", statements, result });

export const bind = (name: string, value: Expr): DoStatement =>
  ({ kind: "bind", name, value });

export const effect = (expr: Expr): DoStatement => ({ kind: "expr", expr });

// ============================================================================
// Collections
// ============================================================================

export const mapExpr = (
  collection: Expr,
  iterator: string,
  transform: Expr
): ExprOf<"map"> => ({ kind: "map", collection, iterator, transform });

export const filterExpr = (
  collection: Expr,
  iterator: string,
  predicate: Expr
): ExprOf<"filter"> => ({ kind: "filter", collection, iterator, predicate });

export const foldExpr = (
  collection: Expr,
  initial: Expr,
  accumulator: string,
  iterator: string,
  transform: Expr
): ExprOf<"fold"> =>
  ({ kind: "fold", collection, initial, accumulator, iterator, transform });

export const annotate = (expr: Expr, annotation: string): ExprOf<"annotate"> =>
  ({ kind: "annotate", expr, annotation });

// ============================================================================
// Patterns
// ============================================================================

export const wildcard: PatternOf<"wildcard"> = { kind: "wildcard" };

export const varPattern = (name: string): PatternOf<"variable"> =>
  ({ kind: "variable", name });

export const litPattern = (value: LiteralExpr): PatternOf<"literal"> =>
  ({ kind: "literal", value });

export const ctorPattern = (
  constructor: string,
  ...args: Pattern[]
): PatternOf<"constructor"> => ({ kind: "constructor", constructor, args });

export const recordPattern = (
  fields: Record<string, Pattern>
): PatternOf<"record"> => ({
  kind: "record",
  fields: Object.entries(fields).map(
    ([name, pattern]): PatternField => ({ name, pattern })
  ),
});

export const listPattern = (
  elements: Pattern[],
  tail?: Pattern
): PatternOf<"list"> =>
  tail ? { kind: "list", elements, tail } : { kind: "list", elements };

export const asPattern = (name: string, pattern: Pattern): PatternOf<"as"> =>
  ({ kind: "as", name, pattern });

export const orPattern = (...alternatives: Pattern[]): PatternOf<"or"> =>
  ({ kind: "or", alternatives });

// ============================================================================
// Declarations
// ============================================================================

export const constDecl = (
  name: string,
  value: Expr,
  options: { type?: string; exported?: boolean } = {}
): Decl => ({
  kind: "const",
  name,
  type: options.type,
  value,
  exported: options.exported ?? true,
});

export const functionDecl = (
  name: string,
  params: LambdaParam[],
  body: Expr,
  options: { returnType?: string; exported?: boolean } = {}
): Decl => ({
  kind: "function",
  name,
  params,
  returnType: options.returnType,
  body,
  exported: options.exported ?? true,
});

function toFields(fields: Record<string, Expr>): ExprField[] {
  return Object.entries(fields).map(([name, value]) => ({ name, value }));
}
