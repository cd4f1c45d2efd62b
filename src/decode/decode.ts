/**
 * JSON tree decoder.
 *
 * Trees arrive from other tools as JSON mirroring the Expr / Pattern / Decl
 * types field for field. Decoding checks every node against its variant and
 * reports the first problem with the JSON path of the offending value, e.g.
 * `$.arms[1].pattern.args[0].kind`.
 */

import {
  CaseArm,
  CompileError,
  Decl,
  DoStatement,
  Expr,
  ExprField,
  LambdaParam,
  LetBinding,
  LiteralExpr,
  Module,
  Pattern,
  PatternField,
  isBinaryOperator,
  isUnaryOperator,
} from "../ast/expr-ast";

type JsonObject = Record<string, unknown>;

/**
 * Parse JSON source text, reporting syntax errors as decode errors.
 */
export function parseJson(source: string): unknown {
  try {
    return JSON.parse(source);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new CompileError(`Invalid JSON: ${message}`, "decode", "$");
  }
}

export function decodeExpr(json: unknown, path: string = "$"): Expr {
  const obj = expectObject(json, path);
  const kind = expectString(obj, "kind", path);

  switch (kind) {
    case "int": {
      const value = expectNumber(obj, "value", path);
      if (!Number.isInteger(value)) {
        throw decodeError(`Expected an integer, got ${value}`, `${path}.value`);
      }
      return { kind, value };
    }
    case "string":
      return { kind, value: expectString(obj, "value", path) };
    case "bool":
      return { kind, value: expectBoolean(obj, "value", path) };
    case "list":
      return { kind, elements: expectExprs(obj, "elements", path) };
    case "record":
      return { kind, fields: expectFields(obj, "fields", path) };
    case "variable":
      return { kind, name: expectString(obj, "name", path) };
    case "qualified":
      return {
        kind,
        namespace: optionalString(obj, "namespace", path),
        name: expectString(obj, "name", path),
      };
    case "binary": {
      const op = expectString(obj, "op", path);
      if (!isBinaryOperator(op)) {
        throw decodeError(`Unknown binary operator: ${op}`, `${path}.op`);
      }
      return {
        kind,
        op,
        left: decodeExpr(obj.left, `${path}.left`),
        right: decodeExpr(obj.right, `${path}.right`),
      };
    }
    case "unary": {
      const op = expectString(obj, "op", path);
      if (!isUnaryOperator(op)) {
        throw decodeError(`Unknown unary operator: ${op}`, `${path}.op`);
      }
      return { kind, op, operand: decodeExpr(obj.operand, `${path}.operand`) };
    }
    case "call":
      return {
        kind,
        fn: decodeExpr(obj.fn, `${path}.fn`),
        args: expectExprs(obj, "args", path),
      };
    case "construct":
      return {
        kind,
        constructor: expectString(obj, "constructor", path),
        args: expectExprs(obj, "args", path),
      };
    case "recordCreate":
      return {
        kind,
        recordType: expectString(obj, "recordType", path),
        fields: expectFields(obj, "fields", path),
      };
    case "recordUpdate":
      return {
        kind,
        target: decodeExpr(obj.target, `${path}.target`),
        updates: expectFields(obj, "updates", path),
      };
    case "field":
      return {
        kind,
        target: decodeExpr(obj.target, `${path}.target`),
        name: expectString(obj, "name", path),
      };
    case "index":
      return {
        kind,
        target: decodeExpr(obj.target, `${path}.target`),
        index: decodeExpr(obj.index, `${path}.index`),
      };
    case "if":
      return {
        kind,
        condition: decodeExpr(obj.condition, `${path}.condition`),
        then: decodeExpr(obj.then, `${path}.then`),
        else: decodeExpr(obj.else, `${path}.else`),
      };
    case "let":
      return {
        kind,
        bindings: expectArray(obj, "bindings", path).map(
          (b, i): LetBinding => decodeBinding(b, `${path}.bindings[${i}]`)
        ),
        body: decodeExpr(obj.body, `${path}.body`),
      };
    case "case":
      return {
        kind,
        scrutinee: decodeExpr(obj.scrutinee, `${path}.scrutinee`),
        arms: expectArms(obj, "arms", path),
      };
    case "lambda":
      return {
        kind,
        params: expectParams(obj, "params", path),
        body: decodeExpr(obj.body, `${path}.body`),
      };
    case "try":
      return {
        kind,
        body: decodeExpr(obj.body, `${path}.body`),
        handlers: expectArms(obj, "handlers", path),
      };
    case "do":
      return {
        kind,
        statements: expectArray(obj, "statements", path).map((s, i) =>
          decodeStatement(s, `${path}.statements[${i}]`)
        ),
        result: decodeExpr(obj.result, `${path}.result`),
      };
    case "map":
      return {
        kind,
        collection: decodeExpr(obj.collection, `${path}.collection`),
        iterator: expectString(obj, "iterator", path),
        transform: decodeExpr(obj.transform, `${path}.transform`),
      };
    case "filter":
      return {
        kind,
        collection: decodeExpr(obj.collection, `${path}.collection`),
        iterator: expectString(obj, "iterator", path),
        predicate: decodeExpr(obj.predicate, `${path}.predicate`),
      };
    case "fold":
      return {
        kind,
        collection: decodeExpr(obj.collection, `${path}.collection`),
        initial: decodeExpr(obj.initial, `${path}.initial`),
        accumulator: expectString(obj, "accumulator", path),
        iterator: expectString(obj, "iterator", path),
        transform: decodeExpr(obj.transform, `${path}.transform`),
      };
    case "annotate":
      return {
        kind,
        expr: decodeExpr(obj.expr, `${path}.expr`),
        annotation: expectString(obj, "annotation", path),
      };
    default:
      throw decodeError(`Unknown expression kind: ${kind}`, `${path}.kind`);
  }
}

export function decodePattern(json: unknown, path: string = "$"): Pattern {
  const obj = expectObject(json, path);
  const kind = expectString(obj, "kind", path);

  switch (kind) {
    case "wildcard":
      return { kind };
    case "variable":
      return { kind, name: expectString(obj, "name", path) };
    case "literal":
      return { kind, value: decodeLiteral(obj.value, `${path}.value`) };
    case "constructor":
      return {
        kind,
        constructor: expectString(obj, "constructor", path),
        args: expectPatterns(obj, "args", path),
      };
    case "record":
      return {
        kind,
        fields: expectArray(obj, "fields", path).map(
          (f, i): PatternField => {
            const fieldPath = `${path}.fields[${i}]`;
            const field = expectObject(f, fieldPath);
            return {
              name: expectString(field, "name", fieldPath),
              pattern: decodePattern(field.pattern, `${fieldPath}.pattern`),
            };
          }
        ),
      };
    case "list": {
      const elements = expectPatterns(obj, "elements", path);
      if (obj.tail === undefined || obj.tail === null) {
        return { kind, elements };
      }
      return { kind, elements, tail: decodePattern(obj.tail, `${path}.tail`) };
    }
    case "as":
      return {
        kind,
        name: expectString(obj, "name", path),
        pattern: decodePattern(obj.pattern, `${path}.pattern`),
      };
    case "or": {
      const alternatives = expectPatterns(obj, "alternatives", path);
      if (alternatives.length === 0) {
        throw decodeError(
          "Or-pattern needs at least one alternative",
          `${path}.alternatives`
        );
      }
      return { kind, alternatives };
    }
    default:
      throw decodeError(`Unknown pattern kind: ${kind}`, `${path}.kind`);
  }
}

export function decodeDecl(json: unknown, path: string = "$"): Decl {
  const obj = expectObject(json, path);
  const kind = expectString(obj, "kind", path);
  const exported = optionalBoolean(obj, "exported", path) ?? true;

  switch (kind) {
    case "const":
      return {
        kind,
        name: expectString(obj, "name", path),
        type: optionalString(obj, "type", path),
        value: decodeExpr(obj.value, `${path}.value`),
        exported,
      };
    case "function":
      return {
        kind,
        name: expectString(obj, "name", path),
        params: expectParams(obj, "params", path),
        returnType: optionalString(obj, "returnType", path),
        body: decodeExpr(obj.body, `${path}.body`),
        exported,
      };
    default:
      throw decodeError(`Unknown declaration kind: ${kind}`, `${path}.kind`);
  }
}

export function decodeModule(json: unknown, path: string = "$"): Module {
  const obj = expectObject(json, path);
  return {
    decls: expectArray(obj, "decls", path).map((d, i) =>
      decodeDecl(d, `${path}.decls[${i}]`)
    ),
  };
}

// ============================================
// Helper records
// ============================================

function decodeLiteral(json: unknown, path: string): LiteralExpr {
  const expr = decodeExpr(json, path);
  switch (expr.kind) {
    case "int":
    case "string":
    case "bool":
      return expr;
    default:
      throw decodeError(
        `Literal pattern needs an int, string or bool literal, got ${expr.kind}`,
        `${path}.kind`
      );
  }
}

function decodeBinding(json: unknown, path: string): LetBinding {
  const obj = expectObject(json, path);
  return {
    name: expectString(obj, "name", path),
    value: decodeExpr(obj.value, `${path}.value`),
  };
}

function decodeStatement(json: unknown, path: string): DoStatement {
  const obj = expectObject(json, path);
  const kind = expectString(obj, "kind", path);
  switch (kind) {
    case "bind":
      return {
        kind,
        name: expectString(obj, "name", path),
        value: decodeExpr(obj.value, `${path}.value`),
      };
    case "expr":
      return { kind, expr: decodeExpr(obj.expr, `${path}.expr`) };
    default:
      throw decodeError(`Unknown do statement kind: ${kind}`, `${path}.kind`);
  }
}

function expectArms(obj: JsonObject, key: string, path: string): CaseArm[] {
  const items = expectArray(obj, key, path);
  if (items.length === 0) {
    throw decodeError("Expected at least one arm", `${path}.${key}`);
  }
  return items.map((item, i) => {
    const armPath = `${path}.${key}[${i}]`;
    const arm = expectObject(item, armPath);
    const pattern = decodePattern(arm.pattern, `${armPath}.pattern`);
    const body = decodeExpr(arm.body, `${armPath}.body`);
    if (arm.guard === undefined || arm.guard === null) {
      return { pattern, body };
    }
    return { pattern, guard: decodeExpr(arm.guard, `${armPath}.guard`), body };
  });
}

function expectParams(
  obj: JsonObject,
  key: string,
  path: string
): LambdaParam[] {
  return expectArray(obj, key, path).map((p, i) => {
    const paramPath = `${path}.${key}[${i}]`;
    const param = expectObject(p, paramPath);
    const name = expectString(param, "name", paramPath);
    const type = optionalString(param, "type", paramPath);
    return type === undefined ? { name } : { name, type };
  });
}

function expectFields(obj: JsonObject, key: string, path: string): ExprField[] {
  return expectArray(obj, key, path).map((f, i) => {
    const fieldPath = `${path}.${key}[${i}]`;
    const field = expectObject(f, fieldPath);
    return {
      name: expectString(field, "name", fieldPath),
      value: decodeExpr(field.value, `${fieldPath}.value`),
    };
  });
}

function expectExprs(obj: JsonObject, key: string, path: string): Expr[] {
  return expectArray(obj, key, path).map((e, i) =>
    decodeExpr(e, `${path}.${key}[${i}]`)
  );
}

function expectPatterns(obj: JsonObject, key: string, path: string): Pattern[] {
  return expectArray(obj, key, path).map((p, i) =>
    decodePattern(p, `${path}.${key}[${i}]`)
  );
}

// ============================================
// Primitive checks
// ============================================

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expectObject(value: unknown, path: string): JsonObject {
  if (!isObject(value)) {
    throw decodeError(`Expected an object, got ${describe(value)}`, path);
  }
  return value;
}

function expectArray(obj: JsonObject, key: string, path: string): unknown[] {
  const value = obj[key];
  if (!Array.isArray(value)) {
    throw decodeError(`Expected an array, got ${describe(value)}`, `${path}.${key}`);
  }
  return value;
}

function expectString(obj: JsonObject, key: string, path: string): string {
  const value = obj[key];
  if (typeof value !== "string") {
    throw decodeError(`Expected a string, got ${describe(value)}`, `${path}.${key}`);
  }
  return value;
}

function optionalString(
  obj: JsonObject,
  key: string,
  path: string
): string | undefined {
  if (obj[key] === undefined || obj[key] === null) {
    return undefined;
  }
  return expectString(obj, key, path);
}

function expectNumber(obj: JsonObject, key: string, path: string): number {
  const value = obj[key];
  if (typeof value !== "number") {
    throw decodeError(`Expected a number, got ${describe(value)}`, `${path}.${key}`);
  }
  return value;
}

function expectBoolean(obj: JsonObject, key: string, path: string): boolean {
  const value = obj[key];
  if (typeof value !== "boolean") {
    throw decodeError(`Expected a boolean, got ${describe(value)}`, `${path}.${key}`);
  }
  return value;
}

function optionalBoolean(
  obj: JsonObject,
  key: string,
  path: string
): boolean | undefined {
  if (obj[key] === undefined || obj[key] === null) {
    return undefined;
  }
  return expectBoolean(obj, key, path);
}

function describe(value: unknown): string {
  if (value === undefined) return "nothing";
  if (value === null) return "null";
  if (Array.isArray(value)) return "an array";
  return typeof value;
}

function decodeError(message: string, path: string): CompileError {
  return new CompileError(message, "decode", path);
}
