/**
 * Canonical printer: renders any compiled node as an indented S-expression.
 *
 *   (Rule
 *     Name="EliminateNot"
 *     Tags=(Tags)
 *     Match=(Match ...)
 *     Replace=(Ref Label="input")
 *   )
 *
 * Output is a pure function of the tree. Every ref field is printed with its
 * name, so trees of the same shape but different content never print alike.
 */
import { formatPos } from "./diagnostics.js";
import { NODE_SHAPES, type Node, type NodeKind, type NodeShape, type SourcePos } from "./types.js";

export type PrintOptions = {
  /** Append `Src=<file:line:col>` to every ref node that has a position */
  positions?: boolean;
};

type RefKind = { [K in NodeKind]: (typeof NODE_SHAPES)[K] extends "ref" ? K : never }[NodeKind];

/** Printed field names of every ref node, in print order */
export const REF_FIELDS = {
  Root: ["Defines", "Rules"],
  Define: ["Tags", "Name", "Fields"],
  DefineField: ["Name", "Type"],
  Rule: ["Name", "Tags", "Match", "Replace"],
  Match: ["Names", "Args"],
  MatchAnd: ["Left", "Right"],
  MatchNot: ["Input"],
  MatchAny: [],
  MatchList: ["MatchItem"],
  MatchListFirst: ["MatchItem"],
  MatchListLast: ["MatchItem"],
  MatchListSingle: ["MatchItem"],
  MatchListEmpty: [],
  MatchInvoke: ["FuncName", "Args"],
  Bind: ["Label", "Target"],
  Ref: ["Label"],
  Construct: ["OpName", "Args"],
  ConstructList: ["Items"],
} as const satisfies Record<RefKind, readonly string[]>;

/** A node reduced to what the printer needs of its shape */
export type PrintModel =
  | { shape: "ref"; kind: NodeKind; fields: [label: string, value: Node][]; src?: SourcePos }
  | { shape: "slice"; kind: NodeKind; items: readonly Node[] }
  | { shape: "value"; kind: NodeKind; text: string };

function ref(kind: RefKind, values: readonly Node[], src?: SourcePos): PrintModel {
  const labels: readonly string[] = REF_FIELDS[kind];
  if (labels.length !== values.length) {
    throw new Error(`internal: '${kind}' has ${values.length} fields, expected ${labels.length}`);
  }
  return { shape: "ref", kind, fields: values.map((v, i): [string, Node] => [labels[i], v]), src };
}

export function describeNode(node: Node): PrintModel {
  switch (node.kind) {
    case "Root":
      return ref(node.kind, [node.defines, node.rules]);
    case "Define":
      return ref(node.kind, [node.tags, node.name, node.fields], node.src);
    case "DefineField":
      return ref(node.kind, [node.name, node.type], node.src);
    case "Rule":
      return ref(node.kind, [node.name, node.tags, node.match, node.replace], node.src);
    case "Match":
      return ref(node.kind, [node.names, node.args], node.src);
    case "MatchAnd":
      return ref(node.kind, [node.left, node.right], node.src);
    case "MatchNot":
      return ref(node.kind, [node.input], node.src);
    case "MatchAny":
    case "MatchListEmpty":
      return ref(node.kind, [], node.src);
    case "MatchList":
    case "MatchListFirst":
    case "MatchListLast":
    case "MatchListSingle":
      return ref(node.kind, [node.matchItem], node.src);
    case "MatchInvoke":
      return ref(node.kind, [node.funcName, node.args], node.src);
    case "Bind":
      return ref(node.kind, [node.label, node.target], node.src);
    case "Ref":
      return ref(node.kind, [node.label], node.src);
    case "Construct":
      return ref(node.kind, [node.opName, node.args], node.src);
    case "ConstructList":
      return ref(node.kind, [node.items], node.src);
    case "DefineSet":
    case "RuleSet":
    case "DefineFields":
    case "Tags":
    case "OpNames":
    case "List":
      return { shape: "slice", kind: node.kind, items: node.items };
    case "String":
      return { shape: "value", kind: node.kind, text: JSON.stringify(node.value) };
    case "Number":
    case "Tag":
    case "OpName":
      return { shape: "value", kind: node.kind, text: node.value };
  }
}

export function printNode(node: Node, options: PrintOptions = {}): string {
  return render(node, options.positions ?? false);
}

function shapeOf(node: Node): NodeShape {
  return NODE_SHAPES[node.kind];
}

function render(node: Node, positions: boolean): string {
  const model = describeNode(node);
  if (model.shape !== shapeOf(node)) {
    throw new Error(`internal: '${node.kind}' printed as ${model.shape}, declared ${shapeOf(node)}`);
  }

  switch (model.shape) {
    case "value":
      return model.text;

    case "slice": {
      if (model.items.length === 0) return `(${model.kind})`;
      const items = model.items.map((item) => render(item, positions));
      if (model.items.every((item) => shapeOf(item) === "value")) {
        return `(${model.kind} ${items.join(" ")})`;
      }
      return block(model.kind, items);
    }

    case "ref": {
      const parts = model.fields.map(([label, value]) => `${label}=${render(value, positions)}`);
      if (positions && model.src) parts.push(`Src=<${formatPos(model.src)}>`);
      if (parts.length === 0) return `(${model.kind})`;
      if (parts.some((p) => p.includes("\n"))) return block(model.kind, parts);
      return `(${model.kind} ${parts.join(" ")})`;
    }
  }
}

function block(kind: string, parts: readonly string[]): string {
  const body = parts.map((p) => "  " + p.replace(/\n/g, "\n  ")).join("\n");
  return `(${kind}\n${body}\n)`;
}
