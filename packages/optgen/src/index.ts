export { MAX_NESTING, parseOpt } from "./parser/index.js";
export type { ParseResult } from "./parser/index.js";
export { compile, compileOrThrow, compileRules } from "./compiler.js";
export type { CompileOptions, CompileResult } from "./compiler.js";
export { validateDefines, defineShape, hasTag, isListField, isPrivateField } from "./validate.js";
export type { DefineTable } from "./validate.js";
export {
  CompileError,
  DEFAULT_MAX_ERRORS,
  DiagnosticReporter,
  formatDiagnostic,
  formatPos,
  renderDiagnostics,
} from "./diagnostics.js";
export type { Diagnostic, DiagnosticPhase } from "./diagnostics.js";
export { printNode, describeNode, REF_FIELDS } from "./printer.js";
export type { PrintModel, PrintOptions } from "./printer.js";
export { formatOpt } from "./opt-format.js";
export { runCli } from "./cli.js";
export type { CliIO } from "./cli.js";
export type { Logger } from "./logger.js";
export { NODE_SHAPES, OP_SUFFIX } from "./types.js";
export type {
  Bind,
  Construct,
  ConstructExpr,
  ConstructList,
  Define,
  DefineField,
  Expr,
  List,
  Match,
  MatchAnd,
  MatchExpr,
  MatchInvoke,
  MatchNot,
  Node,
  NodeKind,
  NodeShape,
  OpName,
  Ref,
  Root,
  Rule,
  SourcePos,
  StringExpr,
  NumberExpr,
  Tag,
} from "./types.js";
