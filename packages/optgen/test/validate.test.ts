import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { DiagnosticReporter, formatDiagnostic } from "../src/diagnostics.js";
import { parseOpt } from "../src/parser/index.js";
import { defineShape, isListField, isPrivateField, validateDefines } from "../src/validate.js";

function validate(text: string): string[] {
  const { defines, diagnostics } = parseOpt(text, "test.opt");
  assert.deepStrictEqual(diagnostics, [], "fixture should parse cleanly");
  const reporter = new DiagnosticReporter();
  validateDefines(defines, reporter);
  return reporter.diagnostics.map(formatDiagnostic);
}

describe("validateDefines: names", () => {
  test("duplicate define is reported once, at the second occurrence", () => {
    assert.deepStrictEqual(validate("define Lt {}\ndefine Lt {}"), ["test.opt:2:1: duplicate 'Lt' define statement"]);
  });

  test("a duplicate define is not checked further", () => {
    assert.deepStrictEqual(validate("define Lt {}\ndefine Lt { X Bogus }"), [
      "test.opt:2:1: duplicate 'Lt' define statement",
    ]);
  });

  test("field types may refer forward", () => {
    assert.deepStrictEqual(validate("define A { Child B }\ndefine B {}"), []);
  });
});

describe("validateDefines: field order", () => {
  test("private field must be last", () => {
    assert.deepStrictEqual(
      validate(`define Scan {
    Def  ScanPrivate
    Cols ExprList
}`),
      ["test.opt:2:5: private field 'Def' is not the last field in 'Scan'"],
    );
  });

  test("a define tagged Private makes a private field", () => {
    assert.deepStrictEqual(
      validate(`[Private]
define JoinOpts {
    Flags int
}
define Join {
    Opts JoinOpts
    Left Expr
}`),
      ["test.opt:6:5: private field 'Opts' is not the last field in 'Join'"],
    );
  });

  test("list field must be the last non-private field", () => {
    assert.deepStrictEqual(
      validate(`define Project {
    Projections ExprList
    Input       Expr
    Private     ProjectPrivate
}`),
      ["test.opt:2:5: list field 'Projections' is not the last non-private field in 'Project'"],
    );
  });

  test("two list fields: reported once, at the first", () => {
    assert.deepStrictEqual(
      validate(`define Union {
    Left  ExprList
    Right ExprList
}`),
      ["test.opt:2:5: list field 'Left' is not the last non-private field in 'Union'"],
    );
  });

  test("list field followed only by a private field is fine", () => {
    assert.deepStrictEqual(
      validate(`define Function {
    Args    ExprList
    Private FunctionPrivate
}`),
      [],
    );
  });

  test("every define is checked", () => {
    assert.deepStrictEqual(
      validate(`define A {
    P APrivate
    X Expr
}
define B {
    P BPrivate
    Y Expr
}`),
      [
        "test.opt:2:5: private field 'P' is not the last field in 'A'",
        "test.opt:6:5: private field 'P' is not the last field in 'B'",
      ],
    );
  });
});

describe("validateDefines: fields, tags and shapes", () => {
  test("duplicate field", () => {
    assert.deepStrictEqual(validate("define D {\n    X Expr\n    X Expr\n}"), [
      "test.opt:3:5: duplicate field 'X' in 'D'",
    ]);
  });

  test("unknown field type", () => {
    assert.deepStrictEqual(validate("define U {\n    X Bogus\n}"), [
      "test.opt:2:5: unknown type 'Bogus' for field 'X' in 'U'",
    ]);
  });

  test("duplicate tag is reported at the tag", () => {
    assert.deepStrictEqual(validate("[Value, Value]\ndefine V {\n    X string\n}"), ["test.opt:1:9: duplicate tag 'Value'"]);
  });

  test("Value and Slice are exclusive", () => {
    assert.deepStrictEqual(validate("[Value, Slice]\ndefine VS {\n    X string\n}"), [
      "test.opt:1:1: define 'VS' cannot be both Value and Slice",
    ]);
  });

  test("value and slice defines wrap exactly one field", () => {
    assert.deepStrictEqual(validate("[Value]\ndefine W {\n    A string\n    B string\n}\n[Slice]\ndefine S {}"), [
      "test.opt:1:1: value define 'W' must declare exactly one field",
      "test.opt:6:1: slice define 'S' must declare exactly one field",
    ]);
  });
});

describe("field classification", () => {
  const { defines } = parseOpt(`[Private]
define Opts {
    Flags int
}
[Value]
define Name {
    Value string
}
define Node {
    Items ExprList
    Extra NodePrivate
    Opts  Opts
}`);
  const table = validateDefines(defines, new DiagnosticReporter());
  const [items, extra, opts] = defines[2].fields.items;

  test("isListField", () => {
    assert.deepStrictEqual([items, extra, opts].map(isListField), [true, false, false]);
  });

  test("isPrivateField", () => {
    assert.deepStrictEqual(
      [items, extra, opts].map((f) => isPrivateField(f, table)),
      [false, true, true],
    );
  });

  test("defineShape", () => {
    assert.deepStrictEqual(defines.map(defineShape), ["ref", "value", "ref"]);
  });
});
