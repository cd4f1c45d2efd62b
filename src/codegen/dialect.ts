/**
 * Target dialect - every spelling the renderer emits that is not structural.
 *
 * The traversal in gen-expr / gen-pattern / gen-match never hard-codes an
 * operator or runtime primitive; it asks the dialect. Swapping dialect means
 * passing another table.
 */

import { BinaryOperator, UnaryOperator } from "../ast/expr-ast";

export type BinaryTemplate = (left: string, right: string) => string;
export type UnaryTemplate = (operand: string) => string;

export type Dialect = {
  readonly binary: Readonly<Record<BinaryOperator, BinaryTemplate>>;
  readonly unary: Readonly<Record<UnaryOperator, UnaryTemplate>>;
  /** Type written on closure parameters whose type is unknown */
  readonly anyType: string;
  /** Structural equality between a value and a literal */
  readonly equals: (value: string, literal: string) => string;
  /** Runtime tag test for a constructor */
  readonly instanceOf: (value: string, constructor: string) => string;
  /** Reference to argument `index` of a constructor with `arity` arguments */
  readonly constructorArg: (value: string, index: number, arity: number) => string;
  readonly isArray: (value: string) => string;
  readonly notNull: (value: string) => string;
  readonly length: (value: string) => string;
  readonly slice: (value: string, start: number) => string;
  /** Statement raised when no case arm matches */
  readonly noMatch: (value: string) => string;
};

export const ASSEMBLYSCRIPT_DIALECT: Dialect = {
  binary: {
    Add: (l, r) => `(${l} + ${r})`,
    Subtract: (l, r) => `(${l} - ${r})`,
    Multiply: (l, r) => `(${l} * ${r})`,
    Divide: (l, r) => `(${l} / ${r})`,
    Modulo: (l, r) => `(${l} % ${r})`,
    Power: (l, r) => `Math.pow(${l}, ${r})`,
    Equal: (l, r) => `(${l} === ${r})`,
    NotEqual: (l, r) => `(${l} !== ${r})`,
    LessThan: (l, r) => `(${l} < ${r})`,
    LessThanOrEqual: (l, r) => `(${l} <= ${r})`,
    GreaterThan: (l, r) => `(${l} > ${r})`,
    GreaterThanOrEqual: (l, r) => `(${l} >= ${r})`,
    And: (l, r) => `(${l} && ${r})`,
    Or: (l, r) => `(${l} || ${r})`,
    // Prepend without mutating the list
    Cons: (l, r) => `[${l}].concat(${r})`,
    Append: (l, r) => `(${l}).concat(${r})`,
    // (f . g)(x) = f(g(x))
    Compose: (l, r) => `((_arg: any) => ${l}(${r}(_arg)))`,
    // (f |> g)(x) = g(f(x))
    Pipe: (l, r) => `((_arg: any) => ${r}(${l}(_arg)))`,
  },
  unary: {
    // Grouped so a negative operand never reads as --
    Negate: (o) => `(-(${o}))`,
    Not: (o) => `(!${o})`,
    Length: (o) => `(${o}.length)`,
    Head: (o) => `(${o}[0])`,
    Tail: (o) => `(${o}.slice(1))`,
    // Copy first; reverse() works in place
    Reverse: (o) => `(Array.from(${o}).reverse())`,
  },
  anyType: "any",
  equals: (value, literal) => `${value} === ${literal}`,
  instanceOf: (value, constructor) => `${value} instanceof ${constructor}`,
  constructorArg: (value, index, arity) =>
    arity === 1 ? `${value}.value` : `${value}.arg${index}`,
  isArray: (value) => `Array.isArray(${value})`,
  notNull: (value) => `${value} != null`,
  length: (value) => `${value}.length`,
  slice: (value, start) => `${value}.slice(${start})`,
  noMatch: (value) =>
    `throw new Error("No match found for value: " + String(${value}));`,
};
