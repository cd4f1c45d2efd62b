import { describe, test, expect } from "vitest";
import {
  add,
  asPattern,
  call,
  ctorPattern,
  int,
  lambda,
  listPattern,
  litPattern,
  orPattern,
  param,
  recordPattern,
  str,
  unary,
  varPattern,
  varRef,
  wildcard,
} from "./builders";
import { exprToString, patternToString, patternVars } from "./print";

describe("patternVars", () => {
  test("names come out in binding order", () => {
    const pattern = asPattern(
      "all",
      ctorPattern(
        "Pair",
        recordPattern({ id: varPattern("id"), tag: wildcard }),
        listPattern([varPattern("h")], varPattern("t"))
      )
    );
    expect(patternVars(pattern)).toEqual(["all", "id", "h", "t"]);
  });

  test("literals and wildcards bind nothing", () => {
    expect(patternVars(orPattern(litPattern(int(1)), wildcard))).toEqual([]);
  });
});

describe("patternToString", () => {
  test("source syntax", () => {
    expect(
      patternToString(listPattern([varPattern("h"), litPattern(str("x"))], wildcard))
    ).toBe('[h, "x", ..._]');
    expect(patternToString(asPattern("s", ctorPattern("None")))).toBe("None as s");
  });
});

describe("exprToString", () => {
  test("operators print by name", () => {
    expect(exprToString(add(varRef("a"), unary("Negate", int(2))))).toBe(
      "Add(a, Negate(2))"
    );
  });

  test("control forms are abbreviated", () => {
    expect(exprToString(call(varRef("f"), lambda([param("x"), param("y")], varRef("x"))))).toBe(
      "f(\\x y -> ...)"
    );
  });
});
