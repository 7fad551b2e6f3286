/**
 * Render a compiled `Root` back to opt source text.
 *
 * Comments and original spacing are not part of the tree, so the output is a
 * normalised layout. Compiling it again gives a tree that prints the same as
 * the input's (positions aside).
 */
import { OP_SUFFIX, type ConstructExpr, type Define, type MatchExpr, type OpName, type Root, type Rule, type Tags } from "./types.js";

export function formatOpt(root: Root): string {
  const statements = [...root.defines.items.map(formatDefine), ...root.rules.items.map(formatRule)];
  return statements.length === 0 ? "" : statements.join("\n\n") + "\n";
}

function formatDefine(define: Define): string {
  const lines: string[] = [];
  if (define.tags.items.length > 0) lines.push(bracketList(define.tags.items.map((t) => t.value)));

  const fields = define.fields.items;
  if (fields.length === 0) {
    lines.push(`define ${define.name.value} {}`);
    return lines.join("\n");
  }

  const width = Math.max(...fields.map((f) => f.name.value.length));
  lines.push(`define ${define.name.value} {`);
  for (const field of fields) {
    lines.push(`    ${field.name.value.padEnd(width)} ${field.type.value}`);
  }
  lines.push("}");
  return lines.join("\n");
}

function formatRule(rule: Rule): string {
  return [
    bracketList([rule.name.value, ...tagNames(rule.tags)]),
    formatMatch(rule.match),
    "=>",
    formatReplace(rule.replace),
  ].join("\n");
}

function tagNames(tags: Tags): string[] {
  return tags.items.map((t) => t.value);
}

function bracketList(names: readonly string[]): string {
  return `[${names.join(", ")}]`;
}

/** `NotOp` → `Not`: names are written as declared */
function sourceName(name: OpName): string {
  return name.value.endsWith(OP_SUFFIX) ? name.value.slice(0, -OP_SUFFIX.length) : name.value;
}

function call(head: string, args: readonly string[]): string {
  return `(${[head, ...args].join(" ")})`;
}

function formatMatch(expr: MatchExpr): string {
  switch (expr.kind) {
    case "Match":
      return call(expr.names.items.map(sourceName).join(" | "), expr.args.items.map(formatMatch));
    case "MatchInvoke":
      return call(expr.funcName.value, expr.args.items.map(formatMatch));
    case "MatchAnd":
      return `${formatMatch(expr.left)} & ${formatMatch(expr.right)}`;
    case "MatchNot":
      return `^${formatMatch(expr.input)}`;
    case "MatchAny":
      return "*";
    case "MatchList":
      return `[ ... ${formatMatch(expr.matchItem)} ... ]`;
    case "MatchListFirst":
      return `[ ${formatMatch(expr.matchItem)} ... ]`;
    case "MatchListLast":
      return `[ ... ${formatMatch(expr.matchItem)} ]`;
    case "MatchListSingle":
      return `[ ${formatMatch(expr.matchItem)} ]`;
    case "MatchListEmpty":
      return "[]";
    case "Bind":
      return `$${expr.label.value}:${formatMatch(expr.target)}`;
    case "Ref":
      return `$${expr.label.value}`;
    case "String":
      return quoteString(expr.value);
    case "Number":
      return expr.value;
  }
}

function formatReplace(expr: ConstructExpr): string {
  switch (expr.kind) {
    case "Construct":
      return call(sourceName(expr.opName), expr.args.items.map(formatReplace));
    case "ConstructList":
      return `[${expr.items.items.map(formatReplace).join(" ")}]`;
    case "Ref":
      return `$${expr.label.value}`;
    case "String":
      return quoteString(expr.value);
    case "Number":
      return expr.value;
  }
}

/** Inverse of the lexer's unquoting */
export function quoteString(value: string): string {
  const escaped = value.replace(/[\\"\n\t]/g, (ch) => {
    switch (ch) {
      case "\n": return "\\n";
      case "\t": return "\\t";
      default: return "\\" + ch;
    }
  });
  return `"${escaped}"`;
}
