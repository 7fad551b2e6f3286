/**
 * opt Language Server: LSP features for .opt files.
 *
 * Runs as a standalone Node.js process spawned by an editor client and
 * talks the Language Server Protocol over stdio or IPC.
 *
 * Features:
 *   • Real-time diagnostics  (syntax, validation and resolution errors)
 *   • Hover information      (defines, rules, primitive field types)
 */
import lsp, { type Hover, type InitializeResult } from "vscode-languageserver/node.js";
import { TextDocument } from "vscode-languageserver-textdocument";
import { collectDiagnostics } from "./diagnostics.js";
import { hoverAt } from "./hover.js";

// CommonJS package: its named exports are only reachable through the default import
const { createConnection, ProposedFeatures, TextDocuments, TextDocumentSyncKind } = lsp;

// ── Connection & document manager ──────────────────────────────────────────

const connection = createConnection(ProposedFeatures.all);
const documents = new TextDocuments(TextDocument);

connection.onInitialize((): InitializeResult => ({
  capabilities: {
    textDocumentSync: TextDocumentSyncKind.Incremental,
    hoverProvider: true,
  },
}));

// ── Diagnostics ────────────────────────────────────────────────────────────

function fileNameOf(uri: string): string {
  return uri.slice(uri.lastIndexOf("/") + 1);
}

function validate(doc: TextDocument): void {
  connection.sendDiagnostics({
    uri: doc.uri,
    diagnostics: collectDiagnostics(doc.getText(), fileNameOf(doc.uri)),
  }).catch((err: unknown) => connection.console.error(`optgen: cannot publish diagnostics: ${String(err)}`));
}

documents.onDidChangeContent((change) => validate(change.document));
documents.onDidOpen((e) => validate(e.document));
documents.onDidClose((e) => {
  connection.sendDiagnostics({ uri: e.document.uri, diagnostics: [] })
    .catch((err: unknown) => connection.console.error(`optgen: cannot clear diagnostics: ${String(err)}`));
});

// ── Hover ──────────────────────────────────────────────────────────────────

connection.onHover((params): Hover | null => {
  const doc = documents.get(params.textDocument.uri);
  if (!doc) return null;
  return hoverAt(doc.getText(), params.position);
});

// ── Start ──────────────────────────────────────────────────────────────────

documents.listen(connection);
connection.listen();
