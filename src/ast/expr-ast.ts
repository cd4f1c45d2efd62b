/**
 * Expression tree - the input of the renderer.
 *
 * Every construct of the source expression language is one variant of a
 * closed union discriminated by `kind`. Type names (annotations, record and
 * constructor names) are opaque strings.
 */

import { inspect } from "util";

// ============================================
// Operators
// ============================================

export const BINARY_OPERATORS = [
  "Add",
  "Subtract",
  "Multiply",
  "Divide",
  "Modulo",
  "Power",
  "Equal",
  "NotEqual",
  "LessThan",
  "LessThanOrEqual",
  "GreaterThan",
  "GreaterThanOrEqual",
  "And",
  "Or",
  "Cons",
  "Append",
  "Compose",
  "Pipe",
] as const;

export type BinaryOperator = (typeof BINARY_OPERATORS)[number];

export const UNARY_OPERATORS = [
  "Negate",
  "Not",
  "Length",
  "Head",
  "Tail",
  "Reverse",
] as const;

export type UnaryOperator = (typeof UNARY_OPERATORS)[number];

// ============================================
// Expressions
// ============================================

export type Expr =
  | { kind: "int"; value: number }
  | { kind: "string"; value: string }
  | { kind: "bool"; value: boolean }
  | { kind: "list"; elements: Expr[] }
  | { kind: "record"; fields: ExprField[] }
  | { kind: "variable"; name: string }
  | { kind: "qualified"; namespace?: string; name: string }
  | { kind: "binary"; op: BinaryOperator; left: Expr; right: Expr }
  | { kind: "unary"; op: UnaryOperator; operand: Expr }
  | { kind: "call"; fn: Expr; args: Expr[] }
  | { kind: "construct"; constructor: string; args: Expr[] }
  | { kind: "recordCreate"; recordType: string; fields: ExprField[] }
  | { kind: "recordUpdate"; target: Expr; updates: ExprField[] }
  | { kind: "field"; target: Expr; name: string }
  | { kind: "index"; target: Expr; index: Expr }
  | { kind: "if"; condition: Expr; then: Expr; else: Expr }
  | { kind: "let"; bindings: LetBinding[]; body: Expr }
  | { kind: "case"; scrutinee: Expr; arms: CaseArm[] }
  | { kind: "lambda"; params: LambdaParam[]; body: Expr }
  | { kind: "try"; body: Expr; handlers: CatchArm[] }
  | { kind: "do"; statements: DoStatement[]; result: Expr }
  | { kind: "map"; collection: Expr; iterator: string; transform: Expr }
  | { kind: "filter"; collection: Expr; iterator: string; predicate: Expr }
  | {
      kind: "fold";
      collection: Expr;
      initial: Expr;
      accumulator: string;
      iterator: string;
      transform: Expr;
    }
  | { kind: "annotate"; expr: Expr; annotation: string };

export type ExprKind = Expr["kind"];

export type ExprOf<K extends ExprKind> = Extract<Expr, { kind: K }>;

/** Expressions allowed inside a literal pattern. */
export type LiteralExpr = Extract<Expr, { kind: "int" | "string" | "bool" }>;

export type ExprField = { name: string; value: Expr };

export type LetBinding = { name: string; value: Expr };

export type LambdaParam = {
  name: string;
  type?: string;
};

export type CaseArm = {
  pattern: Pattern;
  guard?: Expr;
  body: Expr;
};

export type CatchArm = {
  pattern: Pattern;
  guard?: Expr;
  body: Expr;
};

export type DoStatement =
  | { kind: "bind"; name: string; value: Expr }
  | { kind: "expr"; expr: Expr };

// ============================================
// Patterns
// ============================================

export type Pattern =
  | { kind: "wildcard" }
  | { kind: "variable"; name: string }
  | { kind: "literal"; value: LiteralExpr }
  | { kind: "constructor"; constructor: string; args: Pattern[] }
  | { kind: "record"; fields: PatternField[] }
  | { kind: "list"; elements: Pattern[]; tail?: Pattern }
  | { kind: "as"; name: string; pattern: Pattern }
  | { kind: "or"; alternatives: Pattern[] };

export type PatternKind = Pattern["kind"];

export type PatternOf<K extends PatternKind> = Extract<Pattern, { kind: K }>;

export type PatternField = { name: string; pattern: Pattern };

// ============================================
// Declarations
// ============================================

export type Decl =
  | {
      kind: "const";
      name: string;
      type?: string;
      value: Expr;
      exported: boolean;
    }
  | {
      kind: "function";
      name: string;
      params: LambdaParam[];
      returnType?: string;
      body: Expr;
      exported: boolean;
    };

export type Module = {
  decls: Decl[];
};

// ============================================
// Compiler Errors
// ============================================

export type CompileErrorStage = "decode" | "render" | "check";

export class CompileError extends Error {
  stage: CompileErrorStage;
  /** JSON path of the offending node, when known */
  path?: string;
  notes: string[];

  constructor(
    message: string,
    stage: CompileErrorStage = "render",
    path?: string
  ) {
    super(message);
    this.name = "CompileError";
    this.stage = stage;
    this.path = path;
    this.notes = [];
  }

  addNote(message: string): this {
    this.notes.push(message);
    return this;
  }
}

// ============================================
// Helper functions
// ============================================

export function isBinaryOperator(op: string): op is BinaryOperator {
  return BINARY_OPERATORS.some((known) => known === op);
}

export function isUnaryOperator(op: string): op is UnaryOperator {
  return UNARY_OPERATORS.some((known) => known === op);
}

/**
 * Error for a node whose kind is outside the closed set. Called from the
 * `default` branch of an exhaustive switch, so the argument is `never` to the
 * compiler; at runtime it is whatever a producer smuggled in.
 */
export function unhandledKind(what: string, node: never): CompileError {
  const value: unknown = node;
  return new CompileError(
    `Unhandled ${what}: ${inspect(value, { depth: 2, breakLength: Infinity })}`
  );
}
