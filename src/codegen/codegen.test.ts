/**
 * Tests for expression rendering.
 */

import { describe, test, expect } from "vitest";
import { CompileError, Expr } from "../ast/expr-ast";
import {
  add,
  annotate,
  arm,
  bind,
  binding,
  binop,
  bool,
  call,
  caseExpr,
  construct,
  ctorPattern,
  doExpr,
  effect,
  eq,
  field,
  filterExpr,
  foldExpr,
  gtExpr,
  ifExpr,
  index,
  int,
  lambda,
  letExpr,
  list,
  litPattern,
  mapExpr,
  mul,
  param,
  qualified,
  record,
  recordCreate,
  recordUpdate,
  str,
  tryExpr,
  unary,
  varPattern,
  varRef,
  wildcard,
} from "../ast/builders";
import { render } from "./codegen";
import { ASSEMBLYSCRIPT_DIALECT, Dialect } from "./dialect";

const lines = (...ls: string[]) => ls.join("\n");

describe("render", () => {
  describe("literals", () => {
    test("integers", () => {
      expect(render(int(42))).toBe("42");
      expect(render(int(-7))).toBe("-7");
    });

    test("strings are quoted and escaped", () => {
      expect(render(str("hello"))).toBe('"hello"');
      expect(render(str('say "hi"'))).toBe('"say \\"hi\\""');
    });

    test("booleans", () => {
      expect(render(bool(true))).toBe("true");
      expect(render(bool(false))).toBe("false");
    });

    test("lists", () => {
      expect(render(list(int(1), int(2)))).toBe("[1, 2]");
      expect(render(list())).toBe("[]");
    });

    test("records quote keys that are not identifiers", () => {
      expect(render(record({ a: int(1), "b-c": str("x") }))).toBe(
        '{ a: 1, "b-c": "x" }'
      );
      expect(render(record({}))).toBe("{}");
    });
  });

  describe("identifiers", () => {
    test("variables", () => {
      expect(render(varRef("count"))).toBe("count");
    });

    test("qualified identifiers", () => {
      expect(render(qualified("Math", "max"))).toBe("Math.max");
      expect(render(qualified(undefined, "max"))).toBe("max");
    });
  });

  describe("binary operators", () => {
    test("arithmetic is parenthesized", () => {
      expect(render(add(int(1), int(2)))).toBe("(1 + 2)");
      expect(render(mul(add(int(1), int(2)), int(3)))).toBe("((1 + 2) * 3)");
      expect(render(binop("Modulo", varRef("a"), int(2)))).toBe("(a % 2)");
    });

    test("power uses Math.pow", () => {
      expect(render(binop("Power", int(2), int(10)))).toBe("Math.pow(2, 10)");
    });

    test("equality is strict", () => {
      expect(render(eq(varRef("a"), varRef("b")))).toBe("(a === b)");
      expect(render(binop("NotEqual", varRef("a"), varRef("b")))).toBe(
        "(a !== b)"
      );
    });

    test("comparison and boolean operators", () => {
      expect(render(binop("LessThanOrEqual", varRef("a"), int(1)))).toBe(
        "(a <= 1)"
      );
      expect(render(binop("GreaterThanOrEqual", varRef("a"), int(1)))).toBe(
        "(a >= 1)"
      );
      expect(render(binop("And", varRef("p"), varRef("q")))).toBe("(p && q)");
      expect(render(binop("Or", varRef("p"), varRef("q")))).toBe("(p || q)");
    });

    test("list operators copy rather than mutate", () => {
      expect(render(binop("Cons", int(1), varRef("xs")))).toBe(
        "[1].concat(xs)"
      );
      expect(render(binop("Append", varRef("xs"), varRef("ys")))).toBe(
        "(xs).concat(ys)"
      );
    });

    test("compose applies the right function first", () => {
      expect(render(binop("Compose", varRef("f"), varRef("g")))).toBe(
        "((_arg: any) => f(g(_arg)))"
      );
    });

    test("pipe applies the left function first", () => {
      expect(render(binop("Pipe", varRef("f"), varRef("g")))).toBe(
        "((_arg: any) => g(f(_arg)))"
      );
    });

    test("unknown operator is an error", () => {
      const node: Expr = JSON.parse(
        '{"kind":"binary","op":"Xor","left":{"kind":"int","value":1},"right":{"kind":"int","value":2}}'
      );
      expect(() => render(node)).toThrow(CompileError);
      expect(() => render(node)).toThrow("Unknown binary operator: Xor");
    });

    test("unknown operator error names the expression", () => {
      const node: Expr = JSON.parse(
        '{"kind":"binary","op":"Xor","left":{"kind":"variable","name":"a"},"right":{"kind":"int","value":2}}'
      );
      let caught: unknown;
      try {
        render(node);
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(CompileError);
      if (caught instanceof CompileError) {
        expect(caught.notes).toEqual(["in expression Xor(a, 2)"]);
      }
    });
  });

  describe("unary operators", () => {
    test("each operator", () => {
      expect(render(unary("Negate", varRef("x")))).toBe("(-(x))");
      expect(render(unary("Negate", int(-1)))).toBe("(-(-1))");
      expect(render(unary("Not", varRef("x")))).toBe("(!x)");
      expect(render(unary("Length", varRef("xs")))).toBe("(xs.length)");
      expect(render(unary("Head", varRef("xs")))).toBe("(xs[0])");
      expect(render(unary("Tail", varRef("xs")))).toBe("(xs.slice(1))");
      expect(render(unary("Reverse", varRef("xs")))).toBe(
        "(Array.from(xs).reverse())"
      );
    });

    test("unknown operator is an error", () => {
      const node: Expr = JSON.parse(
        '{"kind":"unary","op":"Sqrt","operand":{"kind":"int","value":4}}'
      );
      expect(() => render(node)).toThrow("Unknown unary operator: Sqrt");
      try {
        render(node);
      } catch (err) {
        expect(err instanceof CompileError && err.notes).toEqual([
          "in expression Sqrt(4)",
        ]);
      }
    });
  });

  describe("calls and records", () => {
    test("function calls", () => {
      expect(render(call(qualified("Math", "max"), int(1), int(2)))).toBe(
        "Math.max(1, 2)"
      );
      expect(render(call(varRef("now")))).toBe("now()");
    });

    test("constructor calls", () => {
      expect(render(construct("Some", int(1)))).toBe("new Some(1)");
      expect(render(construct("None"))).toBe("new None()");
    });

    test("record creation", () => {
      expect(render(recordCreate("Point", { x: int(1), y: int(2) }))).toBe(
        "new Point({ x: 1, y: 2 })"
      );
    });

    test("record update spreads the target", () => {
      expect(render(recordUpdate(varRef("p"), { x: int(3) }))).toBe(
        "({ ...p, x: 3 })"
      );
    });

    test("field access", () => {
      expect(render(field(varRef("p"), "x"))).toBe("p.x");
      expect(render(field(varRef("p"), "first-name"))).toBe('p["first-name"]');
    });

    test("index access", () => {
      expect(render(index(varRef("xs"), add(varRef("i"), int(1))))).toBe(
        "xs[(i + 1)]"
      );
    });
  });

  describe("control forms", () => {
    test("if becomes an invoked closure", () => {
      expect(render(ifExpr(varRef("c"), int(1), int(2)))).toBe(
        lines(
          "(() => {",
          "  if (c) {",
          "    return 1;",
          "  } else {",
          "    return 2;",
          "  }",
          "})()"
        )
      );
    });

    test("let declares bindings in order", () => {
      const expr = letExpr(
        [binding("a", int(1)), binding("b", add(varRef("a"), int(2)))],
        mul(varRef("a"), varRef("b"))
      );
      expect(render(expr)).toBe(
        lines(
          "(() => {",
          "  const a = 1;",
          "  const b = (a + 2);",
          "  return (a * b);",
          "})()"
        )
      );
    });

    test("do runs statements in order and returns the result", () => {
      const expr = doExpr(
        [
          bind("x", call(varRef("read"))),
          effect(call(varRef("log"), varRef("x"))),
        ],
        varRef("x")
      );
      expect(render(expr)).toBe(
        lines(
          "(() => {",
          "  const x = read();",
          "  log(x);",
          "  return x;",
          "})()"
        )
      );
    });

    test("lambda with typed and untyped parameters", () => {
      const expr = lambda(
        [param("x", "i32"), param("y")],
        add(varRef("x"), varRef("y"))
      );
      expect(render(expr)).toBe(
        lines("((x: i32, y) => {", "  return (x + y);", "})")
      );
    });

    test("nested closures are indented under their statement", () => {
      const expr = letExpr(
        [binding("y", ifExpr(varRef("c"), int(1), int(2)))],
        varRef("y")
      );
      expect(render(expr)).toBe(
        lines(
          "(() => {",
          "  const y = (() => {",
          "    if (c) {",
          "      return 1;",
          "    } else {",
          "      return 2;",
          "    }",
          "  })();",
          "  return y;",
          "})()"
        )
      );
    });
  });

  describe("case", () => {
    test("constructor arm with wildcard fallback", () => {
      const expr = caseExpr(
        varRef("x"),
        arm(ctorPattern("Some", varPattern("v")), varRef("v")),
        arm(wildcard, int(0))
      );
      expect(render(expr)).toBe(
        lines(
          "((_match: any) => {",
          "  if (_match instanceof Some && true) {",
          "    const v = _match.value;",
          "    return v;",
          "  } else {",
          "    return 0;",
          "  }",
          "})(x)"
        )
      );
    });

    test("arms without a catch-all end in a no-match error", () => {
      const expr = caseExpr(
        varRef("n"),
        arm(litPattern(int(0)), str("zero")),
        arm(litPattern(int(1)), str("one"))
      );
      expect(render(expr)).toBe(
        lines(
          "((_match: any) => {",
          "  if (_match === 0) {",
          '    return "zero";',
          "  } else if (_match === 1) {",
          '    return "one";',
          "  } else {",
          '    throw new Error("No match found for value: " + String(_match));',
          "  }",
          "})(n)"
        )
      );
    });

    test("a leading catch-all arm is the whole body", () => {
      const expr = caseExpr(
        call(varRef("load")),
        arm(varPattern("v"), varRef("v")),
        arm(litPattern(int(1)), str("unreachable"))
      );
      expect(render(expr)).toBe(
        lines(
          "((_match: any) => {",
          "  const v = _match;",
          "  return v;",
          "})(load())"
        )
      );
    });

    test("guard without bindings is conjoined", () => {
      const expr = caseExpr(
        varRef("n"),
        arm(litPattern(int(1)), str("a"), varRef("flag")),
        arm(wildcard, str("b"))
      );
      expect(render(expr)).toBe(
        lines(
          "((_match: any) => {",
          "  if (_match === 1 && (flag)) {",
          '    return "a";',
          "  } else {",
          '    return "b";',
          "  }",
          "})(n)"
        )
      );
    });

    test("guard sees the arm's bindings", () => {
      const expr = caseExpr(
        varRef("opt"),
        arm(
          ctorPattern("Some", varPattern("n")),
          varRef("n"),
          gtExpr(varRef("n"), int(0))
        ),
        arm(wildcard, int(0))
      );
      expect(render(expr)).toBe(
        lines(
          "((_match: any) => {",
          "  if (_match instanceof Some && true && (() => {",
          "    const n = _match.value;",
          "    return (n > 0);",
          "  })()) {",
          "    const n = _match.value;",
          "    return n;",
          "  } else {",
          "    return 0;",
          "  }",
          "})(opt)"
        )
      );
    });

    test("a guarded catch-all does not end the chain", () => {
      const expr = caseExpr(
        varRef("n"),
        arm(varPattern("k"), varRef("k"), gtExpr(varRef("k"), int(9)))
      );
      expect(render(expr)).toBe(
        lines(
          "((_match: any) => {",
          "  if (true && (() => {",
          "    const k = _match;",
          "    return (k > 9);",
          "  })()) {",
          "    const k = _match;",
          "    return k;",
          "  } else {",
          '    throw new Error("No match found for value: " + String(_match));',
          "  }",
          "})(n)"
        )
      );
    });
  });

  describe("try", () => {
    test("catch arms test the caught value and rethrow otherwise", () => {
      const expr = tryExpr(
        call(varRef("parse"), varRef("s")),
        arm(ctorPattern("ParseError", varPattern("msg")), varRef("msg"))
      );
      expect(render(expr)).toBe(
        lines(
          "(() => {",
          "  try {",
          "    return parse(s);",
          "  } catch (_error: any) {",
          "    if (_error instanceof ParseError && true) {",
          "      const msg = _error.value;",
          "      return msg;",
          "    } else {",
          "      throw _error;",
          "    }",
          "  }",
          "})()"
        )
      );
    });

    test("a catch-all handler replaces the rethrow", () => {
      const expr = tryExpr(call(varRef("risky")), arm(wildcard, int(-1)));
      expect(render(expr)).toBe(
        lines(
          "(() => {",
          "  try {",
          "    return risky();",
          "  } catch (_error: any) {",
          "    return -1;",
          "  }",
          "})()"
        )
      );
    });
  });

  describe("collections", () => {
    test("map", () => {
      expect(
        render(mapExpr(varRef("xs"), "x", mul(varRef("x"), int(2))))
      ).toBe("xs.map((x) => (x * 2))");
    });

    test("filter", () => {
      expect(
        render(filterExpr(varRef("xs"), "x", gtExpr(varRef("x"), int(0))))
      ).toBe("xs.filter((x) => (x > 0))");
    });

    test("fold passes the accumulator before the element", () => {
      expect(
        render(
          foldExpr(
            varRef("xs"),
            int(0),
            "acc",
            "x",
            add(varRef("acc"), varRef("x"))
          )
        )
      ).toBe("xs.reduce((acc, x) => (acc + x), 0)");
    });
  });

  test("type annotation", () => {
    expect(render(annotate(varRef("x"), "i64"))).toBe("(x as i64)");
  });

  test("unhandled node kind is an error", () => {
    const node: Expr = JSON.parse('{"kind":"while"}');
    expect(() => render(node)).toThrow(
      "Unhandled expression kind: { kind: 'while' }"
    );
  });

  describe("options", () => {
    test("indent", () => {
      expect(
        render(ifExpr(varRef("c"), int(1), int(2)), { indent: "    " })
      ).toBe(
        lines(
          "(() => {",
          "    if (c) {",
          "        return 1;",
          "    } else {",
          "        return 2;",
          "    }",
          "})()"
        )
      );
    });

    test("match and error variable names", () => {
      const expr = tryExpr(
        caseExpr(varRef("x"), arm(varPattern("y"), varRef("y"))),
        arm(wildcard, int(0))
      );
      expect(render(expr, { matchVar: "$v", errorVar: "err" })).toBe(
        lines(
          "(() => {",
          "  try {",
          "    return (($v: any) => {",
          "      const y = $v;",
          "      return y;",
          "    })(x);",
          "  } catch (err: any) {",
          "    return 0;",
          "  }",
          "})()"
        )
      );
    });

    test("dialect tables can be swapped", () => {
      const dialect: Dialect = {
        ...ASSEMBLYSCRIPT_DIALECT,
        binary: {
          ...ASSEMBLYSCRIPT_DIALECT.binary,
          Equal: (l, r) => `${l}.equals(${r})`,
        },
        equals: (value, literal) => `${value}.equals(${literal})`,
      };
      expect(render(eq(varRef("a"), varRef("b")), { dialect })).toBe(
        "a.equals(b)"
      );
      expect(
        render(
          caseExpr(varRef("s"), arm(litPattern(str("x")), int(1)), arm(wildcard, int(2))),
          { dialect }
        )
      ).toBe(
        lines(
          "((_match: any) => {",
          '  if (_match.equals("x")) {',
          "    return 1;",
          "  } else {",
          "    return 2;",
          "  }",
          "})(s)"
        )
      );
    });
  });
});
