import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { runCli, type CliIO } from "../src/cli.js";

type Captured = { code: number; stdout: string; stderr: string };

const files = new Map<string, string>([
  ["lt.opt", "define Lt {}\n"],
  ["bad.opt", "define A {}\ndefine A {}\ndefine A {}\ndefine A {}\n"],
  ["not.opt", "define Not { Input Expr }\n[EliminateNot]\n(Not (Not $x:*)) => $x\n"],
]);

async function run(...argv: string[]): Promise<Captured> {
  let stdout = "";
  let stderr = "";
  const io: CliIO = {
    stdout: (text) => {
      stdout += text;
    },
    stderr: (text) => {
      stderr += text;
    },
    readFile: async (path) => {
      const text = files.get(path);
      if (text === undefined) throw new Error(`ENOENT: no such file or directory, open '${path}'`);
      return text;
    },
  };
  const code = await runCli(argv, io);
  return { code, stdout, stderr };
}

describe("optgen compile", () => {
  test("prints the canonical tree with positions", async () => {
    const out = await run("compile", "lt.opt");
    assert.deepStrictEqual(out, {
      code: 0,
      stdout: `(Root
  Defines=(DefineSet
    (Define Tags=(Tags) Name="Lt" Fields=(DefineFields) Src=<lt.opt:1:1>)
  )
  Rules=(RuleSet)
)
`,
      stderr: "",
    });
  });

  test("--no-positions", async () => {
    const out = await run("compile", "lt.opt", "--no-positions");
    assert.equal(out.code, 0);
    assert.equal(out.stdout.split("\n")[2], '    (Define Tags=(Tags) Name="Lt" Fields=(DefineFields))');
  });

  test("diagnostics go to stderr, capped, exit 1", async () => {
    const out = await run("compile", "bad.opt");
    assert.deepStrictEqual(out, {
      code: 1,
      stdout: "",
      stderr:
        "bad.opt:2:1: duplicate 'A' define statement\n" +
        "bad.opt:3:1: duplicate 'A' define statement\n" +
        "... too many errors (1 more)\n",
    });
  });

  test("--max-errors raises the cap", async () => {
    const out = await run("compile", "bad.opt", "--max-errors", "5");
    assert.equal(out.code, 1);
    assert.equal(out.stderr.split("\n").filter(Boolean).length, 3);
  });

  test("--max-errors must be a number", async () => {
    const out = await run("compile", "bad.opt", "--max-errors", "many");
    assert.equal(out.code, 1);
    assert.match(out.stderr, /expected a non-negative integer/);
  });

  test("unreadable file exits 2", async () => {
    const out = await run("compile", "missing.opt");
    assert.deepStrictEqual(out, {
      code: 2,
      stdout: "",
      stderr: "error: cannot read 'missing.opt': ENOENT: no such file or directory, open 'missing.opt'\n",
    });
  });

  test("--verbose logs compiler events to stderr", async () => {
    const out = await run("compile", "lt.opt", "--verbose");
    assert.equal(out.code, 0);
    assert.equal(
      out.stderr,
      "[optgen] lt.opt: parsed 1 defines and 0 rules\n[optgen] compiled lt.opt: 1 defines, 0 rules\n",
    );
  });
});

describe("optgen format", () => {
  test("prints normalised source", async () => {
    const out = await run("format", "not.opt");
    assert.deepStrictEqual(out, {
      code: 0,
      stdout: "define Not {\n    Input Expr\n}\n\n[EliminateNot]\n(Not (Not $x:*))\n=>\n$x\n",
      stderr: "",
    });
  });

  test("reports diagnostics like compile", async () => {
    const out = await run("format", "bad.opt", "--max-errors", "1");
    assert.equal(out.code, 1);
    assert.equal(out.stderr, "bad.opt:2:1: duplicate 'A' define statement\n... too many errors (2 more)\n");
  });
});

describe("optgen usage", () => {
  test("unknown command", async () => {
    const out = await run("frobnicate");
    assert.equal(out.code, 1);
    assert.match(out.stderr, /unknown command 'frobnicate'/);
  });

  test("missing file argument", async () => {
    const out = await run("compile");
    assert.equal(out.code, 1);
    assert.match(out.stderr, /missing required argument 'file'/);
  });
});
