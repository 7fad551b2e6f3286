import { DiagnosticSeverity, type Diagnostic } from "vscode-languageserver-types";
import { compile, type Diagnostic as OptDiagnostic } from "optgen";

/** Length of the token that starts at `character`, at least one column */
function tokenLength(line: string, character: number): number {
  const word = line.slice(character).match(/^(?:\w+|"(?:[^"\\]|\\.)*"?|\.\.\.|=>|\S)/)?.[0] ?? "";
  return Math.max(word.length, 1);
}

const SEVERITY = {
  error: DiagnosticSeverity.Error,
} as const satisfies Record<OptDiagnostic["severity"], DiagnosticSeverity>;

function toLsp(d: OptDiagnostic, lines: readonly string[]): Diagnostic {
  const line = d.pos.line - 1;
  const character = d.pos.col - 1;
  return {
    severity: SEVERITY[d.severity],
    range: {
      start: { line, character },
      end: { line, character: character + tokenLength(lines[line] ?? "", character) },
    },
    message: d.message,
    source: "optgen",
  };
}

/**
 * Every diagnostic of a document, uncapped, as LSP diagnostics.
 * Each range covers the token the diagnostic points at.
 */
export function collectDiagnostics(text: string, fileName = ""): Diagnostic[] {
  const result = compile(text, { fileName });
  if (result.ok) return [];
  const lines = text.split(/\r?\n/);
  return result.diagnostics.map((d) => toLsp(d, lines));
}
