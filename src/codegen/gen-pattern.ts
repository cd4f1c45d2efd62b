/**
 * Pattern compilation.
 *
 * A pattern tested against a value reference compiles to one boolean
 * condition plus the bindings to declare once the condition holds:
 *
 * ```
 * Some([x, ...rest])  against  _match
 *   condition: _match instanceof Some && Array.isArray(_match.value)
 *              && true && _match.value.length >= 1 && true
 *   bindings:  x = _match.value[0]
 *              rest = _match.value.slice(1)
 * ```
 *
 * Binding values are derived only from the reference, so they are safe to
 * evaluate after the condition and never before it.
 */

import { CompileError, Pattern, PatternOf, unhandledKind } from "../ast/expr-ast";
import { patternToString, patternVars } from "../ast/print";
import { RenderContext } from "./context";
import { genExpr, genProperty } from "./gen-expr";

export type PatternBinding = {
  name: string;
  value: string;
};

export type CompiledPattern = {
  condition: string;
  bindings: PatternBinding[];
};

const ALWAYS: CompiledPattern = { condition: "true", bindings: [] };

/**
 * Compile `pattern` against the already-rendered expression `ref`.
 */
export function genPattern(
  pattern: Pattern,
  ref: string,
  ctx: RenderContext
): CompiledPattern {
  switch (pattern.kind) {
    case "wildcard":
      return ALWAYS;

    case "variable":
      // Always matches; the bind is the whole effect
      return { condition: "true", bindings: [{ name: pattern.name, value: ref }] };

    case "literal":
      return {
        condition: ctx.dialect.equals(ref, genExpr(pattern.value, ctx)),
        bindings: [],
      };

    case "constructor":
      return genConstructorPattern(pattern, ref, ctx);

    case "record":
      return conjoin(
        ctx.dialect.notNull(ref),
        pattern.fields.map((f) =>
          genPattern(f.pattern, genProperty(ref, f.name), ctx)
        )
      );

    case "list":
      return genListPattern(pattern, ref, ctx);

    case "as": {
      const inner = genPattern(pattern.pattern, ref, ctx);
      return {
        condition: inner.condition,
        bindings: [{ name: pattern.name, value: ref }, ...inner.bindings],
      };
    }

    case "or":
      return genOrPattern(pattern, ref, ctx);

    default:
      throw unhandledKind("pattern kind", pattern);
  }
}

function genConstructorPattern(
  pattern: PatternOf<"constructor">,
  ref: string,
  ctx: RenderContext
): CompiledPattern {
  const arity = pattern.args.length;
  return conjoin(
    ctx.dialect.instanceOf(ref, pattern.constructor),
    pattern.args.map((arg, i) =>
      genPattern(arg, ctx.dialect.constructorArg(ref, i, arity), ctx)
    )
  );
}

/**
 * Fixed elements are tested by position. Without a tail (or with a wildcard
 * tail) the length must be exact; any other tail only needs the fixed prefix
 * and is matched against the remaining slice.
 */
function genListPattern(
  pattern: PatternOf<"list">,
  ref: string,
  ctx: RenderContext
): CompiledPattern {
  const { dialect } = ctx;
  const count = pattern.elements.length;
  const elements = pattern.elements.map((p, i) =>
    genPattern(p, `${ref}[${i}]`, ctx)
  );

  const exact = !pattern.tail || pattern.tail.kind === "wildcard";
  const lengthCheck: CompiledPattern = {
    condition: `${dialect.length(ref)} ${exact ? "===" : ">="} ${count}`,
    bindings: [],
  };

  const parts = [...elements, lengthCheck];
  if (pattern.tail) {
    parts.push(genPattern(pattern.tail, dialect.slice(ref, count), ctx));
  }
  return conjoin(dialect.isArray(ref), parts);
}

/**
 * Alternatives only contribute their tests. An alternative that binds would
 * leave its variables undefined whenever a sibling matched instead, so that
 * is rejected rather than rendered.
 */
function genOrPattern(
  pattern: PatternOf<"or">,
  ref: string,
  ctx: RenderContext
): CompiledPattern {
  if (pattern.alternatives.length === 0) {
    return { condition: "false", bindings: [] };
  }

  const compiled = pattern.alternatives.map((p) => genPattern(p, ref, ctx));
  const bound = patternVars(pattern);
  if (bound.length > 0) {
    throw new CompileError(
      `Or-pattern alternatives cannot bind variables: ${unique(bound).join(", ")}`
    ).addNote(`in pattern ${patternToString(pattern)}`);
  }

  const alternatives = compiled.map((c) => `(${c.condition})`);
  return {
    // Parenthesized as a whole: the result is usually conjoined with &&
    condition:
      alternatives.length === 1
        ? alternatives[0]
        : `(${alternatives.join(" || ")})`,
    bindings: [],
  };
}

function conjoin(head: string, parts: CompiledPattern[]): CompiledPattern {
  return {
    condition: [head, ...parts.map((p) => p.condition)].join(" && "),
    bindings: parts.flatMap((p) => p.bindings),
  };
}

function unique(names: string[]): string[] {
  return [...new Set(names)];
}
