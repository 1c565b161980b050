#!/usr/bin/env node
import { CommanderError, type Command } from "commander";

import { renderCliError } from "./cli/error-format.js";
import { buildCli } from "./cli/index.js";

// =============================================================================
// ERROR HANDLING
// =============================================================================

const QUIET_COMMANDER_EXITS = new Set([
  "commander.helpDisplayed",
  "commander.help",
  "commander.version",
]);

// Commander's own messages are rendered through renderCliError instead.
function configureCliErrorHandling(program: Command): void {
  program.configureOutput({ outputError: () => undefined });
  program.exitOverride();
}

// argv wins over parsed options: parsing may have failed before --debug was read.
function resolveDebugEnabled(argv: string[], program: Command): boolean {
  let debug: boolean | undefined;
  for (const arg of argv) {
    if (arg === "--") break;
    if (arg === "--debug") debug = true;
    if (arg === "--no-debug") debug = false;
  }
  return debug ?? Boolean(program.opts<{ debug?: boolean }>().debug);
}

function resolveExitCode(error: unknown): number {
  if (error instanceof CommanderError && Number.isFinite(error.exitCode)) {
    return error.exitCode;
  }
  return 1;
}

export async function main(argv: string[]): Promise<void> {
  const program = buildCli();
  configureCliErrorHandling(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError && QUIET_COMMANDER_EXITS.has(error.code)) {
      process.exitCode = resolveExitCode(error);
      return;
    }

    console.error(renderCliError(error, { debug: resolveDebugEnabled(argv, program) }));
    const exitCode = resolveExitCode(error);
    process.exitCode = exitCode === 0 ? 1 : exitCode;
  }
}

// =============================================================================
// DIRECT EXECUTION
// =============================================================================

// Allow `node dist/src/index.js` direct execution
if (import.meta.url === `file://${process.argv[1]}`) {
  void main(process.argv);
}
