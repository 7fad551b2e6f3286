import type { SourcePos } from "./types.js";

/** Pipeline phase that discovered a diagnostic */
export type DiagnosticPhase = "lexical" | "syntax" | "semantic" | "resolution";

export type Diagnostic = {
  severity: "error";
  phase: DiagnosticPhase;
  pos: SourcePos;
  message: string;
};

/** Number of diagnostics rendered in full before the summary line */
export const DEFAULT_MAX_ERRORS = 2;

/**
 * Collects diagnostics for one compile invocation, in discovery order.
 * Each invocation owns its reporter; nothing is shared between runs.
 */
export class DiagnosticReporter {
  private readonly items: Diagnostic[] = [];

  error(phase: DiagnosticPhase, pos: SourcePos, message: string): void {
    this.items.push({ severity: "error", phase, pos, message });
  }

  /** Append diagnostics produced elsewhere (e.g. by the parser) */
  addAll(diagnostics: readonly Diagnostic[]): void {
    this.items.push(...diagnostics);
  }

  get count(): number {
    return this.items.length;
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.items;
  }
}

export function formatPos(pos: SourcePos): string {
  return pos.file ? `${pos.file}:${pos.line}:${pos.col}` : `${pos.line}:${pos.col}`;
}

/** `test.opt:2:1: duplicate 'Lt' define statement` */
export function formatDiagnostic(d: Diagnostic): string {
  return `${formatPos(d.pos)}: ${d.message}`;
}

/**
 * Render diagnostics one per line, keeping output bounded: past `maxErrors`
 * the rest are folded into a single `... too many errors (N more)` line.
 */
export function renderDiagnostics(
  diagnostics: readonly Diagnostic[],
  maxErrors: number = DEFAULT_MAX_ERRORS,
): string[] {
  const limit = Math.max(0, maxErrors);
  const lines = diagnostics.slice(0, limit).map(formatDiagnostic);
  if (diagnostics.length > limit) {
    lines.push(`... too many errors (${diagnostics.length - limit} more)`);
  }
  return lines;
}

/**
 * Thrown by `compileOrThrow` when the source has errors.
 * The message is the capped rendering; `diagnostics` holds all of them.
 */
export class CompileError extends Error {
  readonly diagnostics: readonly Diagnostic[];

  constructor(diagnostics: readonly Diagnostic[], maxErrors: number = DEFAULT_MAX_ERRORS) {
    super(renderDiagnostics(diagnostics, maxErrors).join("\n"));
    this.name = "CompileError";
    this.diagnostics = diagnostics;
  }
}
