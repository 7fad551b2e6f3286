/**
 * Chevrotain CstParser + imperative CST→AST visitor for the opt language.
 *
 * The grammar is driven one statement at a time so that a syntax error only
 * costs the statement it occurs in: the driver records the error, skips to
 * the next synchronisation point and parses on. Parsing never throws for
 * malformed input; everything is reported as diagnostics next to a partial
 * AST of the statements that did parse.
 */
import { CstParser, EOF, type CstElement, type CstNode, type IParserErrorMessageProvider, type IToken, type TokenType } from "chevrotain";
import {
  allTokens,
  Ampersand,
  Arrow,
  Asterisk,
  Caret,
  Colon,
  Comma,
  DefineKw,
  Dollar,
  Ellipsis,
  Identifier,
  LCurly,
  LParen,
  LSquare,
  NumberLiteral,
  OptLexer,
  Pipe,
  RCurly,
  RParen,
  RSquare,
  StringLiteral,
  UnterminatedString,
  unquote,
} from "./lexer.js";
import type { Diagnostic } from "../diagnostics.js";
import type {
  ConstructExpr,
  Define,
  DefineField,
  List,
  Match,
  MatchExpr,
  NumberExpr,
  OpName,
  Rule,
  SourcePos,
  StringExpr,
  Tag,
} from "../types.js";

// ── Error messages ─────────────────────────────────────────────────────────

function describeToken(token: IToken): string {
  return token.tokenType === EOF ? "end of file" : `'${token.image}'`;
}

function tokenLabel(type: TokenType): string {
  return type.LABEL ?? type.name;
}

function oneOf(types: readonly TokenType[]): string {
  const labels = [...new Set(types.map(tokenLabel))];
  if (labels.length <= 1) return labels[0] ?? "end of statement";
  return `${labels.slice(0, -1).join(", ")} or ${labels[labels.length - 1]}`;
}

const parserErrors: IParserErrorMessageProvider = {
  buildMismatchTokenMessage({ expected, actual }) {
    return `expected ${tokenLabel(expected)}, found ${describeToken(actual)}`;
  },
  buildNotAllInputParsedMessage({ firstRedundant }) {
    return `unexpected ${describeToken(firstRedundant)}`;
  },
  buildNoViableAltMessage({ expectedPathsPerAlt, actual }) {
    const firsts = expectedPathsPerAlt.flatMap((alt) => alt.flatMap((path) => path.slice(0, 1)));
    return `expected ${oneOf(firsts)}, found ${describeToken(actual[0])}`;
  },
  buildEarlyExitMessage({ expectedIterationPaths, actual }) {
    const firsts = expectedIterationPaths.flatMap((path) => path.slice(0, 1));
    return `expected ${oneOf(firsts)}, found ${describeToken(actual[0])}`;
  },
};

// ═══════════════════════════════════════════════════════════════════════════
//  Grammar (CstParser)
// ═══════════════════════════════════════════════════════════════════════════

class OptParser extends CstParser {
  constructor() {
    super(allTokens, {
      recoveryEnabled: false,
      maxLookahead: 2,
      errorMessageProvider: parserErrors,
    });
    this.performSelfAnalysis();
  }

  // ── Statements ─────────────────────────────────────────────────────────

  /**
   * One top-level statement. A bracket list in front of `define` holds
   * tags; in front of a rule it holds the rule name followed by tags.
   */
  public statement = this.RULE("statement", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.defineBody) },
      {
        ALT: () => {
          this.SUBRULE(this.tagList);
          this.OR2([
            { ALT: () => this.SUBRULE2(this.defineBody) },
            { ALT: () => this.SUBRULE(this.ruleBody) },
          ]);
        },
      },
    ]);
  });

  /** [Name, Tag, Tag2] */
  public tagList = this.RULE("tagList", () => {
    this.CONSUME(LSquare);
    this.CONSUME(Identifier, { LABEL: "tag" });
    this.MANY(() => {
      this.CONSUME(Comma);
      this.CONSUME2(Identifier, { LABEL: "tag" });
    });
    this.CONSUME(RSquare);
  });

  /** define Name { Field Type ... } */
  public defineBody = this.RULE("defineBody", () => {
    this.CONSUME(DefineKw);
    this.CONSUME(Identifier, { LABEL: "name" });
    this.CONSUME(LCurly);
    this.MANY(() => this.SUBRULE(this.defineField));
    this.CONSUME(RCurly);
  });

  public defineField = this.RULE("defineField", () => {
    this.CONSUME(Identifier, { LABEL: "name" });
    this.CONSUME2(Identifier, { LABEL: "type" });
  });

  /** (match) => replace */
  public ruleBody = this.RULE("ruleBody", () => {
    this.SUBRULE(this.matchExpr);
    this.CONSUME(Arrow);
    this.SUBRULE(this.replaceExpr);
  });

  // ── Match side ─────────────────────────────────────────────────────────

  /** (Op | Op2 arg arg ...) */
  public matchExpr = this.RULE("matchExpr", () => {
    this.CONSUME(LParen);
    this.SUBRULE(this.opNames);
    this.MANY(() => this.SUBRULE(this.matchArg));
    this.CONSUME(RParen);
  });

  public opNames = this.RULE("opNames", () => {
    this.CONSUME(Identifier, { LABEL: "name" });
    this.MANY(() => {
      this.CONSUME(Pipe);
      this.CONSUME2(Identifier, { LABEL: "name" });
    });
  });

  public matchArg = this.RULE("matchArg", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.bindOrRef) },
      { ALT: () => this.SUBRULE(this.matchUnbound) },
    ]);
  });

  /** $label:target binds, a bare $label refers back */
  public bindOrRef = this.RULE("bindOrRef", () => {
    this.CONSUME(Dollar);
    this.CONSUME(Identifier, { LABEL: "label" });
    this.OPTION(() => {
      this.CONSUME(Colon);
      this.SUBRULE(this.matchUnbound, { LABEL: "target" });
    });
  });

  /** operand & operand & ... (right-associative) */
  public matchUnbound = this.RULE("matchUnbound", () => {
    this.SUBRULE(this.matchOperand, { LABEL: "left" });
    this.OPTION(() => {
      this.CONSUME(Ampersand);
      this.SUBRULE(this.matchUnbound, { LABEL: "right" });
    });
  });

  public matchOperand = this.RULE("matchOperand", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.matchExpr) },
      { ALT: () => this.SUBRULE(this.matchNot) },
      { ALT: () => this.CONSUME(Asterisk) },
      { ALT: () => this.SUBRULE(this.matchList) },
      { ALT: () => this.CONSUME(StringLiteral) },
      { ALT: () => this.CONSUME(NumberLiteral) },
    ]);
  });

  /** ^operand */
  public matchNot = this.RULE("matchNot", () => {
    this.CONSUME(Caret);
    this.SUBRULE(this.matchOperand);
  });

  /**
   * List patterns, by where the ellipses sit:
   *   []              empty
   *   [ ... x ... ]   any element
   *   [ x ... ]       first element
   *   [ ... x ]       last element
   *   [ x ]           single element
   */
  public matchList = this.RULE("matchList", () => {
    this.CONSUME(LSquare);
    this.OR([
      { ALT: () => this.CONSUME(RSquare) },
      {
        ALT: () => {
          this.CONSUME(Ellipsis, { LABEL: "leading" });
          this.SUBRULE(this.matchArg, { LABEL: "item" });
          this.OR2([
            {
              ALT: () => {
                this.CONSUME2(Ellipsis, { LABEL: "trailing" });
                this.CONSUME2(RSquare);
              },
            },
            { ALT: () => this.CONSUME3(RSquare) },
          ]);
        },
      },
      {
        ALT: () => {
          this.SUBRULE2(this.matchArg, { LABEL: "item" });
          this.OR3([
            {
              ALT: () => {
                this.CONSUME3(Ellipsis, { LABEL: "trailing" });
                this.CONSUME4(RSquare);
              },
            },
            { ALT: () => this.CONSUME5(RSquare) },
          ]);
        },
      },
    ]);
  });

  // ── Replace side ───────────────────────────────────────────────────────

  public replaceExpr = this.RULE("replaceExpr", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.construct) },
      { ALT: () => this.SUBRULE(this.constructList) },
      { ALT: () => this.SUBRULE(this.refExpr) },
      { ALT: () => this.CONSUME(StringLiteral) },
      { ALT: () => this.CONSUME(NumberLiteral) },
    ]);
  });

  /** (Op arg arg ...) */
  public construct = this.RULE("construct", () => {
    this.CONSUME(LParen);
    this.CONSUME(Identifier, { LABEL: "name" });
    this.MANY(() => this.SUBRULE(this.replaceExpr));
    this.CONSUME(RParen);
  });

  /** [ item item ... ] */
  public constructList = this.RULE("constructList", () => {
    this.CONSUME(LSquare);
    this.MANY(() => this.SUBRULE(this.replaceExpr));
    this.CONSUME(RSquare);
  });

  public refExpr = this.RULE("refExpr", () => {
    this.CONSUME(Dollar);
    this.CONSUME(Identifier, { LABEL: "label" });
  });
}

// Singleton parser instance; assigning `input` resets it
const parserInstance = new OptParser();

// ═══════════════════════════════════════════════════════════════════════════
//  Public API
// ═══════════════════════════════════════════════════════════════════════════

export type ParseResult = {
  defines: Define[];
  rules: Rule[];
  /** Lexical and syntax diagnostics, in source order */
  diagnostics: Diagnostic[];
  /** Names of `define` statements that failed to parse */
  failedDefines: string[];
};

/** Deepest nesting of brackets, `&` and `^` one statement may have */
export const MAX_NESTING = 100;

/**
 * Parse opt source text. Always returns the statements that parsed, even
 * when the file has errors elsewhere.
 */
export function parseOpt(text: string, fileName = ""): ParseResult {
  const diagnostics: Diagnostic[] = [];
  const defines: Define[] = [];
  const rules: Rule[] = [];
  const failedDefines: string[] = [];

  // 1. Lex
  const lexResult = OptLexer.tokenize(text);
  for (const e of lexResult.errors) {
    diagnostics.push({
      severity: "error",
      phase: "lexical",
      pos: { file: fileName, line: e.line ?? 1, col: e.column ?? 1, offset: e.offset },
      message: e.message,
    });
  }
  const tokens = lexResult.tokens;
  for (const t of tokens) {
    if (t.tokenType === UnterminatedString) {
      diagnostics.push({ severity: "error", phase: "lexical", pos: tokenPos(t, fileName), message: "unterminated string literal" });
    }
  }

  // 2. Parse statement by statement
  let index = 0;
  while (index < tokens.length) {
    const tooDeep = excessiveNesting(tokens, index);
    if (tooDeep >= 0) {
      diagnostics.push({
        severity: "error",
        phase: "syntax",
        pos: tokenPos(tokens[tooDeep], fileName),
        message: "expression nested too deeply",
      });
      const name = defineName(tokens, index);
      if (name !== undefined) failedDefines.push(name);
      index = nextStatement(tokens, Math.max(tooDeep, index + 1));
      continue;
    }

    parserInstance.input = tokens.slice(index);
    const cst = parserInstance.statement();

    // A statement followed by more input leaves a NotAllInputParsed record
    // pointing at the next statement's first token; anything else is a real error.
    const failure = parserInstance.errors.find((e) => e.name !== "NotAllInputParsedException");
    if (failure) {
      // An unterminated string was reported by the lexer; the statement ends there
      if (failure.token.tokenType !== UnterminatedString) {
        diagnostics.push({
          severity: "error",
          phase: "syntax",
          pos: failure.token.tokenType === EOF ? endPos(text, fileName) : tokenPos(failure.token, fileName),
          message: failure.message,
        });
      }
      const name = defineName(tokens, index);
      if (name !== undefined) failedDefines.push(name);
      const at = tokens.indexOf(failure.token);
      index = at < 0 ? tokens.length : nextStatement(tokens, Math.max(at, index + 1));
      continue;
    }

    const statement = buildStatement(cst, fileName);
    if (statement.kind === "Define") defines.push(statement);
    else rules.push(statement);

    const rest = parserInstance.errors[0];
    index = rest ? tokens.indexOf(rest.token) : tokens.length;
    if (index < 0) index = tokens.length;
  }

  // Report as a lazily consumed lexer would have: in source order
  diagnostics.sort((a, b) => a.pos.offset - b.pos.offset);
  return { defines, rules, diagnostics, failedDefines };
}

/**
 * Recovery synchronisation point: a `define` keyword or a `[` that starts a
 * line. Returns `tokens.length` when there is none left.
 */
function nextStatement(tokens: readonly IToken[], from: number): number {
  for (let i = from; i < tokens.length; i++) {
    if (isStatementStart(tokens[i])) return i;
  }
  return tokens.length;
}

function isStatementStart(t: IToken): boolean {
  return (t.tokenType === DefineKw || t.tokenType === LSquare) && t.startColumn === 1;
}

/**
 * Index of the first token that takes the statement starting at `from` past
 * `MAX_NESTING`, or -1. Brackets open a level; `&` and `^` each add one to
 * the level they appear in.
 */
function excessiveNesting(tokens: readonly IToken[], from: number): number {
  // `&` and `^` seen at each open bracket level
  const operators = [0];
  let nesting = 0;
  for (let i = from; i < tokens.length; i++) {
    const t = tokens[i];
    if (i > from && operators.length === 1 && isStatementStart(t)) break;
    if (t.tokenType === LParen || t.tokenType === LSquare) {
      operators.push(0);
      nesting++;
    } else if (t.tokenType === Ampersand || t.tokenType === Caret) {
      operators[operators.length - 1]++;
      nesting++;
    } else if ((t.tokenType === RParen || t.tokenType === RSquare) && operators.length > 1) {
      nesting -= 1 + (operators.pop() ?? 0);
    }
    if (nesting > MAX_NESTING) return i;
  }
  return -1;
}

/** Name of the `define` statement starting at `from`, past any tag list */
function defineName(tokens: readonly IToken[], from: number): string | undefined {
  let i = from;
  if (tokens[i].tokenType === LSquare) {
    while (i < tokens.length && tokens[i].tokenType !== RSquare) i++;
    i++;
  }
  if (i + 1 >= tokens.length) return undefined;
  const [keyword, name] = [tokens[i], tokens[i + 1]];
  return keyword.tokenType === DefineKw && name.tokenType === Identifier ? name.image : undefined;
}

function tokenPos(token: IToken, file: string): SourcePos {
  return { file, line: token.startLine ?? 1, col: token.startColumn ?? 1, offset: token.startOffset };
}

function endPos(text: string, file: string): SourcePos {
  const lastNewline = text.lastIndexOf("\n");
  const line = text.split("\n").length;
  return { file, line, col: text.length - lastNewline, offset: text.length };
}

// ═══════════════════════════════════════════════════════════════════════════
//  CST → AST transformation (imperative visitor)
// ═══════════════════════════════════════════════════════════════════════════

// ── Token / CST node helpers ────────────────────────────────────────────

function isCstNode(el: CstElement): el is CstNode {
  return "children" in el;
}

function isToken(el: CstElement): el is IToken {
  return "image" in el;
}

function subs(node: CstNode, ruleName: string): CstNode[] {
  return (node.children[ruleName] ?? []).filter(isCstNode);
}

function sub(node: CstNode, ruleName: string): CstNode | undefined {
  return subs(node, ruleName)[0];
}

function toks(node: CstNode, tokenName: string): IToken[] {
  return (node.children[tokenName] ?? []).filter(isToken);
}

function tok(node: CstNode, tokenName: string): IToken | undefined {
  return toks(node, tokenName)[0];
}

/** A child the grammar guarantees; its absence means the CST is broken */
function required<T>(value: T | undefined, node: CstNode, what: string): T {
  if (value === undefined) {
    throw new Error(`internal: '${node.name}' node has no ${what}`);
  }
  return value;
}

function stringExpr(token: IToken, file: string): StringExpr {
  return { kind: "String", value: token.image, src: tokenPos(token, file) };
}

function literal(token: IToken, file: string): StringExpr | NumberExpr {
  if (token.tokenType === StringLiteral) {
    return { kind: "String", value: unquote(token.image), src: tokenPos(token, file) };
  }
  return { kind: "Number", value: token.image, src: tokenPos(token, file) };
}

// ── Statements ──────────────────────────────────────────────────────────

function buildStatement(cst: CstNode, file: string): Define | Rule {
  const tagList = sub(cst, "tagList");
  const tagTokens = tagList ? toks(tagList, "tag") : [];

  const defineNode = sub(cst, "defineBody");
  if (defineNode) {
    const start = tagList ? tok(tagList, "LSquare") : tok(defineNode, "DefineKw");
    return buildDefine(defineNode, tagTokens, tokenPos(required(start, cst, "first token"), file), file);
  }

  const ruleNode = required(sub(cst, "ruleBody"), cst, "define or rule body");
  const list = required(tagList, cst, "rule name");
  const [nameToken, ...tags] = tagTokens;
  return {
    kind: "Rule",
    name: stringExpr(required(nameToken, list, "rule name"), file),
    tags: { kind: "Tags", items: tags.map((t) => buildTag(t, file)) },
    match: buildMatch(required(sub(ruleNode, "matchExpr"), ruleNode, "match"), file),
    replace: buildReplace(required(sub(ruleNode, "replaceExpr"), ruleNode, "replace"), file),
    src: tokenPos(required(tok(list, "LSquare"), list, "'['"), file),
  };
}

function buildTag(token: IToken, file: string): Tag {
  return { kind: "Tag", value: token.image, src: tokenPos(token, file) };
}

function buildDefine(node: CstNode, tagTokens: IToken[], src: SourcePos, file: string): Define {
  const fields: DefineField[] = subs(node, "defineField").map((f) => {
    const name = required(tok(f, "name"), f, "field name");
    return {
      kind: "DefineField",
      name: stringExpr(name, file),
      type: stringExpr(required(tok(f, "type"), f, "field type"), file),
      src: tokenPos(name, file),
    };
  });
  return {
    kind: "Define",
    tags: { kind: "Tags", items: tagTokens.map((t) => buildTag(t, file)) },
    name: stringExpr(required(tok(node, "name"), node, "define name"), file),
    fields: { kind: "DefineFields", items: fields },
    src,
  };
}

// ── Match side ──────────────────────────────────────────────────────────

function buildMatch(node: CstNode, file: string): Match {
  const names: OpName[] = toks(required(sub(node, "opNames"), node, "op names"), "name").map((t) => ({
    kind: "OpName",
    value: t.image,
    src: tokenPos(t, file),
  }));
  const args: List<MatchExpr> = { kind: "List", items: subs(node, "matchArg").map((a) => buildMatchArg(a, file)) };
  return {
    kind: "Match",
    names: { kind: "OpNames", items: names },
    args,
    src: tokenPos(required(tok(node, "LParen"), node, "'('"), file),
  };
}

function buildMatchArg(node: CstNode, file: string): MatchExpr {
  const bindOrRef = sub(node, "bindOrRef");
  if (bindOrRef) {
    const label = stringExpr(required(tok(bindOrRef, "label"), bindOrRef, "label"), file);
    const src = tokenPos(required(tok(bindOrRef, "Dollar"), bindOrRef, "'$'"), file);
    const target = sub(bindOrRef, "target");
    if (target) return { kind: "Bind", label, target: buildMatchUnbound(target, file), src };
    return { kind: "Ref", label, src };
  }
  return buildMatchUnbound(required(sub(node, "matchUnbound"), node, "pattern"), file);
}

function buildMatchUnbound(node: CstNode, file: string): MatchExpr {
  const left = buildOperand(required(sub(node, "left"), node, "operand"), file);
  const right = sub(node, "right");
  if (!right) return left;
  return {
    kind: "MatchAnd",
    left,
    right: buildMatchUnbound(right, file),
    src: tokenPos(required(tok(node, "Ampersand"), node, "'&'"), file),
  };
}

function buildOperand(node: CstNode, file: string): MatchExpr {
  const match = sub(node, "matchExpr");
  if (match) return buildMatch(match, file);

  const not = sub(node, "matchNot");
  if (not) {
    return {
      kind: "MatchNot",
      input: buildOperand(required(sub(not, "matchOperand"), not, "operand"), file),
      src: tokenPos(required(tok(not, "Caret"), not, "'^'"), file),
    };
  }

  const any = tok(node, "Asterisk");
  if (any) return { kind: "MatchAny", src: tokenPos(any, file) };

  const list = sub(node, "matchList");
  if (list) return buildMatchList(list, file);

  return literal(required(tok(node, "StringLiteral") ?? tok(node, "NumberLiteral"), node, "pattern"), file);
}

function buildMatchList(node: CstNode, file: string): MatchExpr {
  const src = tokenPos(required(tok(node, "LSquare"), node, "'['"), file);
  const itemNode = sub(node, "item");
  if (!itemNode) return { kind: "MatchListEmpty", src };

  const matchItem = buildMatchArg(itemNode, file);
  const leading = tok(node, "leading") !== undefined;
  const trailing = tok(node, "trailing") !== undefined;
  if (leading && trailing) return { kind: "MatchList", matchItem, src };
  if (leading) return { kind: "MatchListLast", matchItem, src };
  if (trailing) return { kind: "MatchListFirst", matchItem, src };
  return { kind: "MatchListSingle", matchItem, src };
}

// ── Replace side ────────────────────────────────────────────────────────

function buildReplace(node: CstNode, file: string): ConstructExpr {
  const construct = sub(node, "construct");
  if (construct) {
    const name = required(tok(construct, "name"), construct, "op name");
    return {
      kind: "Construct",
      opName: { kind: "OpName", value: name.image, src: tokenPos(name, file) },
      args: { kind: "List", items: subs(construct, "replaceExpr").map((a) => buildReplace(a, file)) },
      src: tokenPos(required(tok(construct, "LParen"), construct, "'('"), file),
    };
  }

  const list = sub(node, "constructList");
  if (list) {
    return {
      kind: "ConstructList",
      items: { kind: "List", items: subs(list, "replaceExpr").map((a) => buildReplace(a, file)) },
      src: tokenPos(required(tok(list, "LSquare"), list, "'['"), file),
    };
  }

  const ref = sub(node, "refExpr");
  if (ref) {
    return {
      kind: "Ref",
      label: stringExpr(required(tok(ref, "label"), ref, "label"), file),
      src: tokenPos(required(tok(ref, "Dollar"), ref, "'$'"), file),
    };
  }

  return literal(required(tok(node, "StringLiteral") ?? tok(node, "NumberLiteral"), node, "replace"), file);
}
