import { SpanStatusCode, metrics, trace } from "@opentelemetry/api";
import { CompileError, DEFAULT_MAX_ERRORS, DiagnosticReporter, type Diagnostic } from "./diagnostics.js";
import { silentLogger, type Logger } from "./logger.js";
import { parseOpt } from "./parser/index.js";
import {
  OP_SUFFIX,
  type ConstructExpr,
  type Match,
  type MatchExpr,
  type MatchInvoke,
  type OpName,
  type Ref,
  type Root,
  type Rule,
  type SourcePos,
} from "./types.js";
import { checkDuplicateTags, validateDefines, type DefineTable } from "./validate.js";

const otelTracer = trace.getTracer("optgen");

const otelMeter = metrics.getMeter("optgen");
const compileCounter = otelMeter.createCounter("optgen.compile.runs", {
  description: "Total number of compile invocations",
});
const diagnosticCounter = otelMeter.createCounter("optgen.compile.diagnostics", {
  description: "Total number of diagnostics reported by compile invocations",
});

export type CompileOptions = {
  /** Name used in source positions and diagnostics, e.g. "ops/scalar.opt" */
  fileName?: string;
  /**
   * Structured logger for compiler events. Accepts any logger with `debug`,
   * `info`, `warn`, and `error` methods. Defaults to silent no-ops.
   */
  logger?: Logger;
};

/** Either a compiled root or the diagnostics explaining why there is none */
export type CompileResult =
  | { ok: true; root: Root }
  | { ok: false; diagnostics: readonly Diagnostic[] };

/**
 * Compile opt source text: parse, validate the defines, then resolve every
 * rule against them. Malformed input never throws.
 */
export function compile(text: string, options: CompileOptions = {}): CompileResult {
  const fileName = options.fileName ?? "";
  const logger = options.logger ?? silentLogger;
  const label = fileName || "<input>";

  return otelTracer.startActiveSpan("optgen.compile", (span): CompileResult => {
    try {
      span.setAttribute("optgen.file", label);
      const reporter = new DiagnosticReporter();

      const parsed = parseOpt(text, fileName);
      reporter.addAll(parsed.diagnostics);
      logger.debug("[optgen] %s: parsed %d defines and %d rules", label, parsed.defines.length, parsed.rules.length);

      // Names of defines that failed to parse are already reported
      const unparsed = new Set(parsed.failedDefines);
      const table = validateDefines(parsed.defines, reporter, unparsed);
      const rules = compileRules(parsed.rules, table, reporter, unparsed);

      if (reporter.count > 0) {
        compileCounter.add(1, { outcome: "error" });
        diagnosticCounter.add(reporter.count);
        span.setStatus({ code: SpanStatusCode.ERROR, message: `${reporter.count} diagnostics` });
        logger.debug("[optgen] %s: %d diagnostics", label, reporter.count);
        return { ok: false, diagnostics: [...reporter.diagnostics] };
      }

      compileCounter.add(1, { outcome: "ok" });
      logger.info("[optgen] compiled %s: %d defines, %d rules", label, parsed.defines.length, rules.length);
      return {
        ok: true,
        root: {
          kind: "Root",
          defines: { kind: "DefineSet", items: parsed.defines },
          rules: { kind: "RuleSet", items: rules },
        },
      };
    } finally {
      span.end();
    }
  });
}

/** Like `compile`, but throws a `CompileError` carrying the diagnostics */
export function compileOrThrow(text: string, options: CompileOptions & { maxErrors?: number } = {}): Root {
  const result = compile(text, options);
  if (!result.ok) throw new CompileError(result.diagnostics, options.maxErrors ?? DEFAULT_MAX_ERRORS);
  return result.root;
}

/**
 * Resolve every rule. Rule names must be unique; op names and labels are
 * resolved per rule, against the validated define table. Op names listed in
 * `unparsed` are left unresolved without a diagnostic.
 */
export function compileRules(
  rules: readonly Rule[],
  table: DefineTable,
  reporter: DiagnosticReporter,
  unparsed: ReadonlySet<string> = new Set<string>(),
): Rule[] {
  const names = new Set<string>();
  return rules.map((rule) => {
    const name = rule.name.value;
    if (names.has(name)) {
      reporter.error("semantic", rule.src, `duplicate '${name}' rule`);
    }
    names.add(name);
    checkDuplicateTags(rule.tags, rule.src, reporter);
    return new RuleCompiler(table, unparsed, reporter).compile(rule);
  });
}

/** Compiles a single rule; owns that rule's bind labels */
class RuleCompiler {
  private readonly bound = new Set<string>();

  constructor(
    private readonly table: DefineTable,
    private readonly unparsed: ReadonlySet<string>,
    private readonly reporter: DiagnosticReporter,
  ) {}

  compile(rule: Rule): Rule {
    // Match first: its binds are what the replace side may refer to
    const match = this.match(rule.match);
    const replace = this.construct(rule.replace);
    return { ...rule, match, replace };
  }

  // ── Match side ──────────────────────────────────────────────────────────

  private match(expr: Match): Match {
    return {
      ...expr,
      names: { kind: "OpNames", items: expr.names.items.map((n) => this.opName(n, expr.src)) },
      args: { kind: "List", items: expr.args.items.map((a) => this.matchExpr(a, false)) },
    };
  }

  /**
   * `condition` is set for operands of `&` and `^`, where a call of a name
   * that is not a define is an external predicate rather than an op match.
   */
  private matchExpr(expr: MatchExpr, condition: boolean): MatchExpr {
    switch (expr.kind) {
      case "Match":
        if (condition && this.isPredicateCall(expr)) return this.invoke(expr);
        return this.match(expr);
      case "MatchAnd":
        return { ...expr, left: this.matchExpr(expr.left, true), right: this.matchExpr(expr.right, true) };
      case "MatchNot":
        return { ...expr, input: this.matchExpr(expr.input, true) };
      case "MatchList":
      case "MatchListFirst":
      case "MatchListLast":
      case "MatchListSingle":
        return { ...expr, matchItem: this.matchExpr(expr.matchItem, false) };
      case "MatchInvoke":
        return { ...expr, args: { kind: "List", items: this.invokeArgs(expr.funcName.value, expr.args.items) } };
      case "Bind": {
        const label = expr.label.value;
        if (this.bound.has(label)) {
          this.reporter.error("resolution", expr.src, `duplicate bind label '${label}'`);
        }
        // Visible inside its own target: `$x:* & (IsConst $x)`
        this.bound.add(label);
        return { ...expr, target: this.matchExpr(expr.target, false) };
      }
      case "Ref":
        this.checkRef(expr);
        return expr;
      case "MatchAny":
      case "MatchListEmpty":
      case "String":
      case "Number":
        return expr;
    }
  }

  private isPredicateCall(expr: Match): boolean {
    const names = expr.names.items;
    return names.length === 1 && !this.isDeclared(names[0].value);
  }

  private isDeclared(name: string): boolean {
    return this.table.has(name) || this.unparsed.has(name);
  }

  private invoke(expr: Match): MatchInvoke {
    const name = expr.names.items[0];
    return {
      kind: "MatchInvoke",
      funcName: { kind: "String", value: name.value, src: name.src },
      args: { kind: "List", items: this.invokeArgs(name.value, expr.args.items) },
      src: expr.src,
    };
  }

  private invokeArgs(funcName: string, args: readonly MatchExpr[]): MatchExpr[] {
    return args.map((arg) => {
      switch (arg.kind) {
        case "Ref":
          this.checkRef(arg);
          return arg;
        case "String":
        case "Number":
          return arg;
        default:
          this.reporter.error("resolution", arg.src, `'${funcName}' arguments must be variable references or literals`);
          return arg;
      }
    });
  }

  // ── Replace side ────────────────────────────────────────────────────────

  private construct(expr: ConstructExpr): ConstructExpr {
    switch (expr.kind) {
      case "Construct":
        return {
          ...expr,
          opName: this.opName(expr.opName, expr.src),
          args: { kind: "List", items: expr.args.items.map((a) => this.construct(a)) },
        };
      case "ConstructList":
        return { ...expr, items: { kind: "List", items: expr.items.items.map((a) => this.construct(a)) } };
      case "Ref":
        this.checkRef(expr);
        return expr;
      case "String":
      case "Number":
        return expr;
    }
  }

  // ── Resolution ──────────────────────────────────────────────────────────

  /** Exact, case-sensitive match against a define; emitted as `<Name>Op` */
  private opName(name: OpName, at: SourcePos): OpName {
    if (!this.table.has(name.value)) {
      if (this.unparsed.has(name.value)) return name;
      this.reporter.error("resolution", name.src ?? at, `unrecognized op name '${name.value}'`);
      return name;
    }
    return { ...name, value: name.value + OP_SUFFIX };
  }

  private checkRef(ref: Ref): void {
    const label = ref.label.value;
    if (!this.bound.has(label)) {
      this.reporter.error("resolution", ref.src, `unrecognized variable name '${label}'`);
    }
  }
}
