/**
 * matchcast - renders expression trees with pattern matching to
 * AssemblyScript source text.
 */

// Tree model
export {
  BINARY_OPERATORS,
  UNARY_OPERATORS,
  CompileError,
  isBinaryOperator,
  isUnaryOperator,
} from "./ast/expr-ast";
export type {
  BinaryOperator,
  UnaryOperator,
  Expr,
  ExprKind,
  ExprOf,
  ExprField,
  LiteralExpr,
  LetBinding,
  LambdaParam,
  CaseArm,
  CatchArm,
  DoStatement,
  Pattern,
  PatternKind,
  PatternOf,
  PatternField,
  Decl,
  Module,
  CompileErrorStage,
} from "./ast/expr-ast";
export * from "./ast/builders";
export { exprToString, patternToString, patternVars } from "./ast/print";

// Rendering
export {
  render,
  renderModule,
  compilePattern,
  ASSEMBLYSCRIPT_DIALECT,
  CodeBuilder,
} from "./codegen";
export type {
  RenderOptions,
  CompiledPattern,
  PatternBinding,
  Dialect,
  BinaryTemplate,
  UnaryTemplate,
} from "./codegen";

// Input and output boundaries
export {
  parseJson,
  decodeExpr,
  decodePattern,
  decodeDecl,
  decodeModule,
} from "./decode/decode";
export { checkSyntax, assertValidSyntax } from "./check";
export type { SyntaxIssue, CheckMode } from "./check";
export { formatError } from "./diagnostics";
export { compileSource } from "./compile";
export type { CompileOptions } from "./compile";
