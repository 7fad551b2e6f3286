import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { compile, compileOrThrow } from "../src/compiler.js";
import { CompileError, formatDiagnostic } from "../src/diagnostics.js";
import type { Logger } from "../src/logger.js";
import { printNode } from "../src/printer.js";
import type { MatchExpr, Root } from "../src/types.js";

function errors(text: string): string[] {
  const result = compile(text, { fileName: "test.opt" });
  assert.equal(result.ok, false, "expected compile to fail");
  return result.ok ? [] : result.diagnostics.map(formatDiagnostic);
}

function compiled(text: string): Root {
  const result = compile(text, { fileName: "test.opt" });
  if (!result.ok) assert.fail(result.diagnostics.map(formatDiagnostic).join("\n"));
  return result.root;
}

const NOT = `define Not {
    Input Expr
}
`;

describe("compile", () => {
  test("duplicate define statement", () => {
    assert.deepStrictEqual(errors("define Lt {}\ndefine Lt {}"), ["test.opt:2:1: duplicate 'Lt' define statement"]);
  });

  test("EliminateNot compiles to nested matches", () => {
    const root = compiled(`${NOT}
[EliminateNot, Normalize]
(Not (Not $input:*)) => $input`);
    assert.equal(
      printNode(root),
      `(Root
  Defines=(DefineSet
    (Define
      Tags=(Tags)
      Name="Not"
      Fields=(DefineFields
        (DefineField Name="Input" Type="Expr")
      )
    )
  )
  Rules=(RuleSet
    (Rule
      Name="EliminateNot"
      Tags=(Tags Normalize)
      Match=(Match
        Names=(OpNames NotOp)
        Args=(List
          (Match
            Names=(OpNames NotOp)
            Args=(List
              (Bind Label="input" Target=(MatchAny))
            )
          )
        )
      )
      Replace=(Ref Label="input")
    )
  )
)`,
    );
  });

  test("op names resolve to their Op form on both sides", () => {
    const root = compiled(`${NOT}
define True {}
[R]
(Not | True) => (Not (True))`);
    const rule = root.rules.items[0];
    assert.deepStrictEqual(rule.match.names.items.map((n) => n.value), ["NotOp", "TrueOp"]);
    assert.equal(
      printNode(rule.replace),
      `(Construct
  OpName=NotOp
  Args=(List
    (Construct OpName=TrueOp Args=(List))
  )
)`,
    );
  });

  test("unknown op name", () => {
    assert.deepStrictEqual(errors(`${NOT}[R]\n(Nott $x:*) => $x`), ["test.opt:5:2: unrecognized op name 'Nott'"]);
  });

  test("unknown op name in a construct", () => {
    assert.deepStrictEqual(errors(`${NOT}[R]\n(Not $x:*) => (Nope $x)`), ["test.opt:5:16: unrecognized op name 'Nope'"]);
  });

  test("condition calls of unknown names become predicate invocations", () => {
    const root = compiled(`define Eq {
    Left  Expr
    Right Expr
}
define True {}
[FoldEq]
(Eq $l:* & (IsConst $l) $r:* & ^(IsNull $r "strict" 1)) => (True)`);
    const [left, right] = root.rules.items[0].match.args.items;

    assert.equal(left.kind, "Bind");
    if (left.kind !== "Bind" || left.target.kind !== "MatchAnd") return assert.fail("expected a bound conjunction");
    const invoke = left.target.right;
    assert.equal(invoke.kind, "MatchInvoke");
    if (invoke.kind !== "MatchInvoke") return;
    assert.equal(invoke.funcName.value, "IsConst");
    assert.deepStrictEqual(invoke.args.items.map((a: MatchExpr) => a.kind), ["Ref"]);

    if (right.kind !== "Bind" || right.target.kind !== "MatchAnd") return assert.fail("expected a bound conjunction");
    const not = right.target.right;
    if (not.kind !== "MatchNot") return assert.fail("expected a negation");
    assert.equal(not.input.kind, "MatchInvoke");
  });

  test("a define named in a condition is still an op match", () => {
    const root = compiled(`${NOT}
[R]
(Not $x:* & (Not *)) => $x`);
    const bind = root.rules.items[0].match.args.items[0];
    if (bind.kind !== "Bind" || bind.target.kind !== "MatchAnd") return assert.fail("expected a bound conjunction");
    assert.equal(bind.target.right.kind, "Match");
  });

  test("predicate arguments must be refs or literals", () => {
    assert.deepStrictEqual(errors(`${NOT}[R]\n(Not $x:* & (IsConst (Not *))) => $x`), [
      "test.opt:5:22: 'IsConst' arguments must be variable references or literals",
    ]);
  });

  test("unknown variable", () => {
    assert.deepStrictEqual(errors(`${NOT}[R]\n(Not $x:*) => $y`), ["test.opt:5:15: unrecognized variable name 'y'"]);
  });

  test("a ref must follow its bind", () => {
    assert.deepStrictEqual(errors(`${NOT}[R]\n(Not * & (Check $x) $x:*) => $x`), [
      "test.opt:5:17: unrecognized variable name 'x'",
    ]);
  });

  test("duplicate bind label", () => {
    assert.deepStrictEqual(errors(`define Eq {\n    Left  Expr\n    Right Expr\n}\n[R]\n(Eq $x:* $x:*) => $x`), [
      "test.opt:6:10: duplicate bind label 'x'",
    ]);
  });

  test("duplicate rule name", () => {
    assert.deepStrictEqual(errors(`${NOT}[R]\n(Not $x:*) => $x\n[R]\n(Not $x:*) => $x`), [
      "test.opt:6:1: duplicate 'R' rule",
    ]);
  });

  test("validation diagnostics come before resolution diagnostics", () => {
    assert.deepStrictEqual(errors(`[R]\n(Nope) => (Nope)\ndefine A {}\ndefine A {}`), [
      "test.opt:4:1: duplicate 'A' define statement",
      "test.opt:2:2: unrecognized op name 'Nope'",
      "test.opt:2:12: unrecognized op name 'Nope'",
    ]);
  });

  test("syntax errors fail the compile even when everything else resolves", () => {
    assert.deepStrictEqual(errors(`${NOT}[R]\n(Not $x:*) => $x\n[Broken]\n(Not`), [
      "test.opt:7:5: expected ')', found end of file",
    ]);
  });

  test("rules may name defines declared later in the file", () => {
    const root = compiled(`[R]\n(A) => (A)\ndefine A {}`);
    const rule = root.rules.items[0];
    assert.equal(printNode(rule.match.names), "(OpNames AOp)");
    assert.equal(printNode(rule.replace), "(Construct OpName=AOp Args=(List))");
  });

  test("duplicate rule tag", () => {
    assert.deepStrictEqual(errors(`${NOT}[R, Normalize, Normalize]\n(Not $x:*) => $x`), [
      "test.opt:4:16: duplicate tag 'Normalize'",
    ]);
  });

  test("errors in rules after an unterminated string are still reported", () => {
    assert.deepStrictEqual(errors(`define F {}
[R]
(F "abc) => (F)
[S]
(F) => (Nope)
[T]
(F) => (Nope2)`), [
      "test.opt:3:4: unterminated string literal",
      "test.opt:5:9: unrecognized op name 'Nope'",
      "test.opt:7:9: unrecognized op name 'Nope2'",
    ]);
  });

  test("a define that failed to parse is not reported again where it is used", () => {
    assert.deepStrictEqual(errors(`define Not { Input Expr\n[R]\n(Not $x:*) => (Not $x)`), [
      "test.opt:2:1: expected '}', found '['",
    ]);
    assert.deepStrictEqual(errors(`define Not { Input Expr\ndefine Wrap {\n    Inner Not\n}`), [
      "test.opt:2:1: expected '}', found 'define'",
    ]);
  });

  test("deeply nested patterns are diagnostics, not crashes", () => {
    const brackets = `${"(F ".repeat(300)}*${")".repeat(300)}`;
    assert.deepStrictEqual(errors(`define F {}\n[R]\n${brackets} => (F)`), [
      "test.opt:3:301: expression nested too deeply",
    ]);
    assert.deepStrictEqual(errors(`define F {}\n[R]\n(F ${"^".repeat(5000)}*) => (F)`), [
      "test.opt:3:103: expression nested too deeply",
    ]);
  });

  test("logs through the supplied logger", () => {
    const calls: unknown[][] = [];
    const logger: Logger = {
      debug: () => {},
      info: (...args) => calls.push(args),
      warn: () => {},
      error: () => {},
    };
    compile(`${NOT}[R]\n(Not $x:*) => $x`, { fileName: "not.opt", logger });
    assert.deepStrictEqual(calls, [["[optgen] compiled %s: %d defines, %d rules", "not.opt", 1, 1]]);
  });
});

describe("compileOrThrow", () => {
  test("returns the root on success", () => {
    assert.equal(compileOrThrow(NOT).defines.items.length, 1);
  });

  test("throws CompileError with every diagnostic and a capped message", () => {
    const text = "define A {}\ndefine A {}\ndefine A {}\ndefine A {}";
    assert.throws(
      () => compileOrThrow(text, { fileName: "a.opt" }),
      (err: unknown) => {
        assert.ok(err instanceof CompileError);
        assert.equal(err.diagnostics.length, 3);
        assert.equal(
          err.message,
          "a.opt:2:1: duplicate 'A' define statement\na.opt:3:1: duplicate 'A' define statement\n... too many errors (1 more)",
        );
        return true;
      },
    );
  });
});
