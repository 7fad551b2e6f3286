/**
 * `optgen` command line.
 *
 *   optgen compile <file> [--no-positions] [--max-errors <n>] [-v]
 *   optgen format <file> [--max-errors <n>] [-v]
 *
 * Exit codes: 0 on success, 1 when the file has errors, 2 when it cannot be
 * read. Usage errors exit with commander's code.
 */
import { Command, CommanderError, InvalidArgumentError } from "commander";
import { format } from "node:util";
import { compile } from "./compiler.js";
import { DEFAULT_MAX_ERRORS, renderDiagnostics } from "./diagnostics.js";
import { silentLogger, type Logger } from "./logger.js";
import { formatOpt } from "./opt-format.js";
import { printNode } from "./printer.js";
import type { Root } from "./types.js";

/** Where the CLI reads files and writes output; the real process in `bin/` */
export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readFile: (path: string) => Promise<string>;
}

type CommonFlags = { maxErrors: number; verbose?: boolean };
type CompileFlags = CommonFlags & { positions: boolean };

export const EXIT_OK = 0;
export const EXIT_DIAGNOSTICS = 1;
export const EXIT_UNREADABLE = 2;

function parseMaxErrors(value: string): number {
  if (!/^\d+$/.test(value)) throw new InvalidArgumentError("expected a non-negative integer");
  return Number(value);
}

function stderrLogger(io: CliIO): Logger {
  const write = (...args: unknown[]) => io.stderr(format(...args) + "\n");
  return { debug: write, info: write, warn: write, error: write };
}

function reason(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function runFile(
  file: string,
  flags: CommonFlags,
  io: CliIO,
  render: (root: Root) => string,
): Promise<number> {
  let text: string;
  try {
    text = await io.readFile(file);
  } catch (err) {
    io.stderr(`error: cannot read '${file}': ${reason(err)}\n`);
    return EXIT_UNREADABLE;
  }

  const logger = flags.verbose ? stderrLogger(io) : silentLogger;
  const result = compile(text, { fileName: file, logger });
  if (!result.ok) {
    for (const line of renderDiagnostics(result.diagnostics, flags.maxErrors)) io.stderr(line + "\n");
    return EXIT_DIAGNOSTICS;
  }
  io.stdout(render(result.root));
  return EXIT_OK;
}

/**
 * Build the commander program. `setExitCode` receives the outcome of the
 * subcommand that ran.
 */
export function createProgram(io: CliIO, setExitCode: (code: number) => void): Command {
  const program = new Command()
    .name("optgen")
    .description("Compile optimizer rule definitions (.opt files)")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text),
    });

  program
    .command("compile")
    .description("compile a file and print its canonical tree")
    .argument("<file>", "opt source file")
    .option("--no-positions", "omit Src=<file:line:col> annotations")
    .option("--max-errors <n>", "diagnostics to print in full", parseMaxErrors, DEFAULT_MAX_ERRORS)
    .option("-v, --verbose", "log compiler events to stderr")
    .action(async (file: string, flags: CompileFlags) => {
      setExitCode(await runFile(file, flags, io, (root) => printNode(root, { positions: flags.positions }) + "\n"));
    });

  program
    .command("format")
    .description("compile a file and print it back in canonical layout")
    .argument("<file>", "opt source file")
    .option("--max-errors <n>", "diagnostics to print in full", parseMaxErrors, DEFAULT_MAX_ERRORS)
    .option("-v, --verbose", "log compiler events to stderr")
    .action(async (file: string, flags: CommonFlags) => {
      setExitCode(await runFile(file, flags, io, formatOpt));
    });

  return program;
}

/** Run the CLI on `argv` (without the node and script entries) */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  let exitCode = EXIT_OK;
  const program = createProgram(io, (code) => {
    exitCode = code;
  });
  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }
  return exitCode;
}
