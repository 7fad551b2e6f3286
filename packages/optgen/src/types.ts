/**
 * Source location of a node: 1-based line and column, 0-based offset.
 *
 * `file` is whatever name the caller compiled the text under; it is only
 * used when rendering diagnostics and `Src=<...>` annotations.
 */
export type SourcePos = {
  readonly file: string;
  readonly line: number;
  readonly col: number;
  readonly offset: number;
};

/**
 * The three structural categories a node can take.
 *
 *   ref    named fields plus a source position ("(Define Name=... Src=...)")
 *   value  a wrapped primitive, compared by value ("NotOp", "\"input\"")
 *   slice  an ordered homogeneous sequence ("(OpNames NotOp NeOp)")
 */
export type NodeShape = "ref" | "value" | "slice";

// ── Value nodes ─────────────────────────────────────────────────────────────

/** Quoted string: define/field/rule names, labels, string literals */
export type StringExpr = { readonly kind: "String"; readonly value: string; readonly src?: SourcePos };

/** Numeric literal, kept as written ("1", "-2.5") */
export type NumberExpr = { readonly kind: "Number"; readonly value: string; readonly src?: SourcePos };

/** A tag from a `[Tag, ...]` list: "Scalar", "Value", "Slice", "Private", "Normalize" */
export type Tag = { readonly kind: "Tag"; readonly value: string; readonly src?: SourcePos };

/**
 * Operator name. The parser produces the name as written ("Not"); the rule
 * compiler replaces it with the downstream identifier ("NotOp").
 */
export type OpName = { readonly kind: "OpName"; readonly value: string; readonly src?: SourcePos };

// ── Slice nodes ─────────────────────────────────────────────────────────────

export type Tags = { readonly kind: "Tags"; readonly items: readonly Tag[] };

/** Alternation: the pattern matches when the operator is any of the names */
export type OpNames = { readonly kind: "OpNames"; readonly items: readonly OpName[] };

export type DefineFields = { readonly kind: "DefineFields"; readonly items: readonly DefineField[] };

export type DefineSet = { readonly kind: "DefineSet"; readonly items: readonly Define[] };

export type RuleSet = { readonly kind: "RuleSet"; readonly items: readonly Rule[] };

/** Positional arguments of a match, invoke or construct expression */
export type List<T extends Expr = Expr> = { readonly kind: "List"; readonly items: readonly T[] };

// ── Definitions ─────────────────────────────────────────────────────────────

/**
 * One operator / node type.
 *
 *   [Scalar, Boolean]
 *   define And {
 *       Left  Expr
 *       Right Expr
 *   }
 */
export type Define = {
  readonly kind: "Define";
  readonly tags: Tags;
  readonly name: StringExpr;
  readonly fields: DefineFields;
  readonly src: SourcePos;
};

export type DefineField = {
  readonly kind: "DefineField";
  readonly name: StringExpr;
  /** Primitive keyword ("Expr", "ExprList", "string", ...) or a define name */
  readonly type: StringExpr;
  readonly src: SourcePos;
};

/**
 * A named rewrite: when `match` succeeds against an expression, the engine
 * builds `replace` in its place.
 *
 *   [EliminateNot, Normalize]
 *   (Not (Not $input:*)) => $input
 */
export type Rule = {
  readonly kind: "Rule";
  readonly name: StringExpr;
  readonly tags: Tags;
  readonly match: Match;
  readonly replace: ConstructExpr;
  readonly src: SourcePos;
};

// ── Match expressions ───────────────────────────────────────────────────────

/** `(Eq | Ne $left:* $right:*)` */
export type Match = {
  readonly kind: "Match";
  readonly names: OpNames;
  readonly args: List<MatchExpr>;
  readonly src: SourcePos;
};

/** `left & right`: both sides must match the same expression */
export type MatchAnd = { readonly kind: "MatchAnd"; readonly left: MatchExpr; readonly right: MatchExpr; readonly src: SourcePos };

/** `^input` */
export type MatchNot = { readonly kind: "MatchNot"; readonly input: MatchExpr; readonly src: SourcePos };

/** `*` */
export type MatchAny = { readonly kind: "MatchAny"; readonly src: SourcePos };

/** `[ ... item ... ]`: some element matches */
export type MatchList = { readonly kind: "MatchList"; readonly matchItem: MatchExpr; readonly src: SourcePos };

/** `[ item ... ]`: first element matches */
export type MatchListFirst = { readonly kind: "MatchListFirst"; readonly matchItem: MatchExpr; readonly src: SourcePos };

/** `[ ... item ]`: last element matches */
export type MatchListLast = { readonly kind: "MatchListLast"; readonly matchItem: MatchExpr; readonly src: SourcePos };

/** `[ item ]`: exactly one element, and it matches */
export type MatchListSingle = { readonly kind: "MatchListSingle"; readonly matchItem: MatchExpr; readonly src: SourcePos };

/** `[]` */
export type MatchListEmpty = { readonly kind: "MatchListEmpty"; readonly src: SourcePos };

/**
 * Call of an externally defined predicate, e.g. `(IsConstValue $left)`.
 * Only produced by the rule compiler, for names that are not defines.
 */
export type MatchInvoke = {
  readonly kind: "MatchInvoke";
  readonly funcName: StringExpr;
  readonly args: List<MatchExpr>;
  readonly src: SourcePos;
};

/** `$label:target`: captures the matched sub-tree */
export type Bind = { readonly kind: "Bind"; readonly label: StringExpr; readonly target: MatchExpr; readonly src: SourcePos };

/** `$label`: the sub-tree captured by a Bind in the same rule */
export type Ref = { readonly kind: "Ref"; readonly label: StringExpr; readonly src: SourcePos };

export type MatchExpr =
  | Match
  | MatchAnd
  | MatchNot
  | MatchAny
  | MatchList
  | MatchListFirst
  | MatchListLast
  | MatchListSingle
  | MatchListEmpty
  | MatchInvoke
  | Bind
  | Ref
  | StringExpr
  | NumberExpr;

// ── Construct expressions ───────────────────────────────────────────────────

/** `(Not $input)` */
export type Construct = {
  readonly kind: "Construct";
  readonly opName: OpName;
  readonly args: List<ConstructExpr>;
  readonly src: SourcePos;
};

/** `[ $a $b ]` */
export type ConstructList = { readonly kind: "ConstructList"; readonly items: List<ConstructExpr>; readonly src: SourcePos };

export type ConstructExpr = Construct | ConstructList | Ref | StringExpr | NumberExpr;

export type Expr = MatchExpr | ConstructExpr;

// ── Root ────────────────────────────────────────────────────────────────────

/** The compiled unit: exactly one per source file */
export type Root = { readonly kind: "Root"; readonly defines: DefineSet; readonly rules: RuleSet };

/** Union of every node kind the printer can render */
export type Node =
  | Root
  | DefineSet
  | RuleSet
  | Define
  | DefineFields
  | DefineField
  | Rule
  | Tags
  | Tag
  | OpNames
  | OpName
  | List
  | Expr;

export type NodeKind = Node["kind"];

/**
 * Shape of every node kind. Mirrors the tags in `lang/lang.opt`, which
 * describes these nodes in the language itself.
 */
export const NODE_SHAPES = {
  Root: "ref",
  DefineSet: "slice",
  RuleSet: "slice",
  Define: "ref",
  DefineFields: "slice",
  DefineField: "ref",
  Rule: "ref",
  Tags: "slice",
  Tag: "value",
  OpNames: "slice",
  OpName: "value",
  List: "slice",
  Match: "ref",
  MatchAnd: "ref",
  MatchNot: "ref",
  MatchAny: "ref",
  MatchList: "ref",
  MatchListFirst: "ref",
  MatchListLast: "ref",
  MatchListSingle: "ref",
  MatchListEmpty: "ref",
  MatchInvoke: "ref",
  Bind: "ref",
  Ref: "ref",
  Construct: "ref",
  ConstructList: "ref",
  String: "value",
  Number: "value",
} as const satisfies Record<NodeKind, NodeShape>;

/** Suffix the downstream code generator appends to operator identifiers */
export const OP_SUFFIX = "Op";

/** Field type keywords that need no define */
export const PRIMITIVE_TYPES: ReadonlySet<string> = new Set(["Expr", "ExprList", "string", "int", "float", "bool"]);

/** Field type holding a variable-length list of child expressions */
export const LIST_TYPE = "ExprList";
