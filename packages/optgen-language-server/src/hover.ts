import { MarkupKind, type Hover, type Position } from "vscode-languageserver-types";
import { defineShape, parseOpt, type Define, type Rule } from "optgen";

const PRIMITIVES = new Map<string, string>([
  ["Expr", "any child expression"],
  ["ExprList", "variable-length list of child expressions"],
  ["string", "string payload"],
  ["int", "integer payload"],
  ["float", "floating point payload"],
  ["bool", "boolean payload"],
]);

/** Extract the identifier-like word that contains `character` on `line`. */
export function getWordAt(line: string, character: number): string {
  const before = line.slice(0, character).match(/\w*$/)?.[0] ?? "";
  const after = line.slice(character).match(/^\w*/)?.[0] ?? "";
  return before + after;
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n !== 1 ? "s" : ""}`;
}

function tagLine(tags: readonly { value: string }[]): string {
  return tags.length > 0 ? `\n\nTags: ${tags.map((t) => t.value).join(", ")}` : "";
}

function defineMarkdown(define: Define): string {
  const fields = define.fields.items;
  const width = Math.max(0, ...fields.map((f) => f.name.value.length));
  const body = fields.map((f) => `${f.name.value.padEnd(width)} ${f.type.value}`).join("\n");
  const header = `**Define** \`${define.name.value}\` (${defineShape(define)}, ${plural(fields.length, "field")})`;
  return header + tagLine(define.tags.items) + (body ? `\n\n\`\`\`\n${body}\n\`\`\`` : "");
}

function ruleMarkdown(rule: Rule): string {
  return `**Rule** \`${rule.name.value}\`` + tagLine(rule.tags.items);
}

/**
 * Hover for the word under the cursor: define names (wherever they are
 * used), rule names and primitive field types. Works on documents with
 * errors, using whatever statements parsed.
 */
export function hoverAt(text: string, position: Position): Hover | null {
  const line = text.split(/\r?\n/)[position.line] ?? "";
  const word = getWordAt(line, position.character);
  if (word.length === 0) return null;

  const { defines, rules } = parseOpt(text);

  const define = defines.find((d) => d.name.value === word);
  if (define) return { contents: { kind: MarkupKind.Markdown, value: defineMarkdown(define) } };

  const rule = rules.find((r) => r.name.value === word);
  if (rule) return { contents: { kind: MarkupKind.Markdown, value: ruleMarkdown(rule) } };

  const primitive = PRIMITIVES.get(word);
  if (primitive) {
    return { contents: { kind: MarkupKind.Markdown, value: `**Primitive type** \`${word}\`\n\n${primitive}` } };
  }
  return null;
}
