/**
 * Declaration code generation.
 *
 * Transforms module-level Decl nodes to target-language code strings, each
 * ending in a newline.
 */

import { Decl, Expr, LambdaParam, unhandledKind } from "../ast/expr-ast";
import { CodeBuilder } from "./code-builder";
import { RenderContext } from "./context";
import { genExpr, genParams } from "./gen-expr";

export function genDecl(decl: Decl, ctx: RenderContext): string {
  switch (decl.kind) {
    case "const":
      return genConstDecl(decl.name, decl.type, decl.value, decl.exported, ctx);

    case "function":
      return genFunctionDecl(
        decl.name,
        decl.params,
        decl.returnType,
        decl.body,
        decl.exported,
        ctx
      );

    default:
      throw unhandledKind("declaration kind", decl);
  }
}

// ============================================
// Const Declarations
// ============================================

function genConstDecl(
  name: string,
  type: string | undefined,
  value: Expr,
  exported: boolean,
  ctx: RenderContext
): string {
  const exportPrefix = exported ? "export " : "";
  const typeSuffix = type ? `: ${type}` : "";
  const builder = new CodeBuilder(ctx.indent);
  builder.writeLine(
    `${exportPrefix}const ${name}${typeSuffix} = ${genExpr(value, ctx)};`
  );
  return builder.build();
}

// ============================================
// Function Declarations
// ============================================

function genFunctionDecl(
  name: string,
  params: LambdaParam[],
  returnType: string | undefined,
  body: Expr,
  exported: boolean,
  ctx: RenderContext
): string {
  const exportPrefix = exported ? "export " : "";
  const returnSuffix = returnType ? `: ${returnType}` : "";
  const builder = new CodeBuilder(ctx.indent);
  builder.block(
    `${exportPrefix}function ${name}(${genParams(params)})${returnSuffix} {`,
    () => {
      builder.writeLine(`return ${genExpr(body, ctx)};`);
    }
  );
  builder.newline();
  return builder.build();
}
