/**
 * Chevrotain Lexer for the opt language.
 *
 * Tokenizes .opt source text into a stream consumed by the CstParser.
 * Comments and whitespace are skipped. Lexing never stops early: illegal
 * characters are reported as lexer errors and unterminated strings come out
 * as `UnterminatedString` tokens, which the parser turns into diagnostics.
 */
import { createToken, Lexer, type ILexerErrorMessageProvider, type IToken } from "chevrotain";

// ── Whitespace & comments ──────────────────────────────────────────────────

export const Newline = createToken({
  name: "Newline",
  pattern: /\r?\n/,
  group: Lexer.SKIPPED,
});

export const WS = createToken({
  name: "WS",
  pattern: /[ \t]+/,
  group: Lexer.SKIPPED,
});

export const Comment = createToken({
  name: "Comment",
  pattern: /#[^\r\n]*/,
  group: Lexer.SKIPPED,
});

// ── Identifiers & keywords ─────────────────────────────────────────────────

export const Identifier = createToken({
  name: "Identifier",
  pattern: /[A-Za-z_][A-Za-z0-9_]*/,
  label: "name",
});

export const DefineKw = createToken({ name: "DefineKw", pattern: /define/, longer_alt: Identifier, label: "'define'" });

// ── Operators & punctuation ────────────────────────────────────────────────

export const Arrow     = createToken({ name: "Arrow",     pattern: /=>/,     label: "'=>'" });
export const Ellipsis  = createToken({ name: "Ellipsis",  pattern: /\.\.\./, label: "'...'" });
export const Dot       = createToken({ name: "Dot",       pattern: /\./,     label: "'.'" });
export const LCurly    = createToken({ name: "LCurly",    pattern: /\{/,     label: "'{'" });
export const RCurly    = createToken({ name: "RCurly",    pattern: /\}/,     label: "'}'" });
export const LSquare   = createToken({ name: "LSquare",   pattern: /\[/,     label: "'['" });
export const RSquare   = createToken({ name: "RSquare",   pattern: /\]/,     label: "']'" });
export const LParen    = createToken({ name: "LParen",    pattern: /\(/,     label: "'('" });
export const RParen    = createToken({ name: "RParen",    pattern: /\)/,     label: "')'" });
export const Colon     = createToken({ name: "Colon",     pattern: /:/,      label: "':'" });
export const Dollar    = createToken({ name: "Dollar",    pattern: /\$/,     label: "'$'" });
export const Comma     = createToken({ name: "Comma",     pattern: /,/,      label: "','" });
export const Pipe      = createToken({ name: "Pipe",      pattern: /\|/,     label: "'|'" });
export const Ampersand = createToken({ name: "Ampersand", pattern: /&/,      label: "'&'" });
export const Caret     = createToken({ name: "Caret",     pattern: /\^/,     label: "'^'" });
export const Asterisk  = createToken({ name: "Asterisk",  pattern: /\*/,     label: "'*'" });

// ── Literals ───────────────────────────────────────────────────────────────

export const StringLiteral = createToken({
  name: "StringLiteral",
  pattern: /"(?:[^"\\\r\n]|\\.)*"/,
  label: "string",
});

/** A string that runs into end of line or end of file without its closing quote */
export const UnterminatedString = createToken({
  name: "UnterminatedString",
  pattern: /"(?:[^"\\\r\n]|\\.)*/,
  label: "string",
});

export const NumberLiteral = createToken({
  name: "NumberLiteral",
  pattern: /-?\d+(?:\.\d+)?/,
  label: "number",
});

// ── Token ordering ─────────────────────────────────────────────────────────

export const allTokens = [
  WS,
  Comment,
  Newline,
  Arrow,
  Ellipsis,
  Dot,
  LCurly,
  RCurly,
  LSquare,
  RSquare,
  LParen,
  RParen,
  Colon,
  Dollar,
  Comma,
  Pipe,
  Ampersand,
  Caret,
  Asterisk,
  // Complete strings first so the unterminated form only matches leftovers
  StringLiteral,
  UnterminatedString,
  NumberLiteral,
  // Keywords before Identifier (longer_alt prevents prefix stealing)
  DefineKw,
  Identifier,
];

const lexerErrors: ILexerErrorMessageProvider = {
  buildUnexpectedCharactersMessage(fullText, startOffset, length) {
    const text = fullText.substring(startOffset, startOffset + length);
    return length === 1 ? `illegal character '${text}'` : `illegal characters '${text}'`;
  },
  buildUnableToPopLexerModeMessage(token: IToken) {
    return `unable to pop lexer mode at '${token.image}'`;
  },
};

export const OptLexer = new Lexer(allTokens, {
  ensureOptimizations: true,
  positionTracking: "full",
  errorMessageProvider: lexerErrors,
});

/** Decode the escapes of a string literal image, dropping the quotes */
export function unquote(image: string): string {
  const body = image.startsWith('"') ? image.slice(1) : image;
  const inner = body.endsWith('"') ? body.slice(0, -1) : body;
  return inner.replace(/\\(.)/g, (_, ch: string) => {
    switch (ch) {
      case "n": return "\n";
      case "t": return "\t";
      case '"':
      case "\\": return ch;
      default: return "\\" + ch;
    }
  });
}
