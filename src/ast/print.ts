/**
 * Source-language pretty printing, used in diagnostics.
 */

import { Expr, Pattern } from "./expr-ast";

/**
 * Convert a pattern to a string for pretty printing.
 */
export function patternToString(pattern: Pattern): string {
  switch (pattern.kind) {
    case "wildcard":
      return "_";
    case "variable":
      return pattern.name;
    case "literal":
      return exprToString(pattern.value);
    case "constructor":
      return pattern.args.length === 0
        ? pattern.constructor
        : `${pattern.constructor}(${pattern.args.map(patternToString).join(", ")})`;
    case "record":
      return `{ ${pattern.fields
        .map((f) => `${f.name}: ${patternToString(f.pattern)}`)
        .join(", ")} }`;
    case "list": {
      const elements = pattern.elements.map(patternToString);
      if (pattern.tail) {
        elements.push(`...${patternToString(pattern.tail)}`);
      }
      return `[${elements.join(", ")}]`;
    }
    case "as":
      return `${patternToString(pattern.pattern)} as ${pattern.name}`;
    case "or":
      return pattern.alternatives.map(patternToString).join(" | ");
  }
}

/**
 * Extract all variable names a pattern binds, in binding order.
 */
export function patternVars(pattern: Pattern): string[] {
  switch (pattern.kind) {
    case "wildcard":
    case "literal":
      return [];
    case "variable":
      return [pattern.name];
    case "constructor":
      return pattern.args.flatMap(patternVars);
    case "record":
      return pattern.fields.flatMap((f) => patternVars(f.pattern));
    case "list":
      return [
        ...pattern.elements.flatMap(patternVars),
        ...(pattern.tail ? patternVars(pattern.tail) : []),
      ];
    case "as":
      return [pattern.name, ...patternVars(pattern.pattern)];
    case "or":
      return pattern.alternatives.flatMap(patternVars);
  }
}

/**
 * Short one-line rendering of an expression in source syntax.
 * Control forms are abbreviated.
 */
export function exprToString(expr: Expr): string {
  switch (expr.kind) {
    case "int":
      return String(expr.value);
    case "string":
      return JSON.stringify(expr.value);
    case "bool":
      return String(expr.value);
    case "list":
      return `[${expr.elements.map(exprToString).join(", ")}]`;
    case "record":
      return `{ ${expr.fields
        .map((f) => `${f.name} = ${exprToString(f.value)}`)
        .join(", ")} }`;
    case "variable":
      return expr.name;
    case "qualified":
      return expr.namespace ? `${expr.namespace}.${expr.name}` : expr.name;
    case "binary":
      return `${expr.op}(${exprToString(expr.left)}, ${exprToString(expr.right)})`;
    case "unary":
      return `${expr.op}(${exprToString(expr.operand)})`;
    case "call":
      return `${exprToString(expr.fn)}(${expr.args.map(exprToString).join(", ")})`;
    case "construct":
      return `${expr.constructor}(${expr.args.map(exprToString).join(", ")})`;
    case "recordCreate":
      return `${expr.recordType} { ${expr.fields.map((f) => f.name).join(", ")} }`;
    case "recordUpdate":
      return `{ ${exprToString(expr.target)} | ${expr.updates.map((f) => f.name).join(", ")} }`;
    case "field":
      return `${exprToString(expr.target)}.${expr.name}`;
    case "index":
      return `${exprToString(expr.target)}[${exprToString(expr.index)}]`;
    case "if":
      return `if ${exprToString(expr.condition)} then ... else ...`;
    case "let":
      return `let ${expr.bindings.map((b) => b.name).join(", ")} in ...`;
    case "case":
      return `case ${exprToString(expr.scrutinee)} of ...`;
    case "lambda":
      return `\\${expr.params.map((p) => p.name).join(" ")} -> ...`;
    case "try":
      return "try ...";
    case "do":
      return "do ...";
    case "map":
      return `map ${expr.iterator} in ${exprToString(expr.collection)}`;
    case "filter":
      return `filter ${expr.iterator} in ${exprToString(expr.collection)}`;
    case "fold":
      return `fold ${expr.accumulator}, ${expr.iterator} in ${exprToString(expr.collection)}`;
    case "annotate":
      return `${exprToString(expr.expr)} : ${expr.annotation}`;
  }
}
