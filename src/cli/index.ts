import { Command, InvalidArgumentError } from "commander";

import { createPathsContext, type PathsContext } from "../core/paths.js";

import { DEFAULT_HISTORY_LIMIT, historyCommand } from "./history.js";
import { runCommand } from "./run.js";
import { validateCommand } from "./validate.js";

type GlobalOptions = {
  home?: string;
  debug?: boolean;
};

export function buildCli(): Command {
  const program = new Command();

  const resolvePaths = (): PathsContext => {
    const globals = program.opts<GlobalOptions>();
    return createPathsContext({ refwatchHome: globals.home });
  };

  program
    .name("refwatch")
    .description("Watch remote git refs and run Cloud Build workflow chains for every change")
    .version("0.1.0")
    .option("--home <dir>", "State directory for the journal and logs (defaults to $REFWATCH_HOME or ~/.refwatch)")
    .option("--debug", "Show error codes, causes and stacks", false);

  program
    .command("run")
    .description("Poll every configured target until SIGINT/SIGTERM")
    .requiredOption("--config <path>", "Path to the refwatch YAML config")
    .option("--poll-interval <seconds>", "Override poll_interval_seconds", parsePositiveNumber)
    .option("--journal <path>", "Override journal_path")
    .option("--no-echo-logs", "Do not echo log events to stdout")
    .action(async (opts) => {
      const globals = program.opts<GlobalOptions>();
      await runCommand({
        configPath: opts.config,
        paths: resolvePaths(),
        pollIntervalSeconds: opts.pollInterval,
        journalPath: opts.journal,
        echoLogs: opts.echoLogs,
        debug: globals.debug,
      });
    });

  program
    .command("validate")
    .description("Load the config and check every target's ref filters")
    .requiredOption("--config <path>", "Path to the refwatch YAML config")
    .action(async (opts) => {
      await validateCommand({ configPath: opts.config });
    });

  program
    .command("history")
    .description("Show recent polls of a target and the build steps they triggered")
    .argument("<alias>", "Target alias")
    .requiredOption("--config <path>", "Path to the refwatch YAML config")
    .option("--journal <path>", "Override journal_path")
    .option("--limit <n>", `Number of polls to show (default ${DEFAULT_HISTORY_LIMIT})`, parsePositiveInt)
    .action(async (alias: string, opts) => {
      await historyCommand({
        alias,
        configPath: opts.config,
        paths: resolvePaths(),
        journalPath: opts.journal,
        limit: opts.limit,
      });
    });

  return program;
}

function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive number.");
  }
  return parsed;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}
