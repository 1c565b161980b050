import { openRunContext, type RunContext } from "../app/orchestrator/run-context.js";
import { runSupervisor, type SupervisorSummary } from "../app/orchestrator/supervisor.js";
import type { PatrolConfig } from "../core/config.js";
import { loadPatrolConfig } from "../core/config-loader.js";
import { formatErrorMessage } from "../core/error-format.js";
import {
  ConfigError,
  JournalError,
  UserFacingError,
  USER_FACING_ERROR_CODES,
  type UserFacingErrorCode,
} from "../core/errors.js";
import type { PathsContext } from "../core/paths.js";

import { installShutdownHandler } from "./signal-handlers.js";

export type RunCommandOptions = {
  configPath: string;
  paths: PathsContext;
  pollIntervalSeconds?: number;
  journalPath?: string;
  echoLogs?: boolean;
  debug?: boolean;
};

export async function runCommand(opts: RunCommandOptions): Promise<SupervisorSummary> {
  const config = applyRunOverrides(loadPatrolConfig(opts.configPath), opts);

  let ctx: RunContext;
  try {
    ctx = openRunContext(config, opts.paths, {
      journalPath: opts.journalPath,
      echoLogs: opts.echoLogs ?? true,
      debug: opts.debug,
    });
  } catch (error) {
    throw normalizeRunCommandError(error);
  }

  console.log(
    `Watching ${config.targets.length} target(s) every ${config.poll_interval_seconds}s. Journal: ${ctx.journalPath}`,
  );

  const shutdown = installShutdownHandler({ notify: (line) => console.log(line) });

  let summary: SupervisorSummary;
  try {
    summary = await runSupervisor(ctx.ports, config, shutdown.signal);
  } finally {
    shutdown.dispose();
    ctx.close();
  }

  if (summary.started.length === 0) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "No targets to watch.",
      message: `All ${summary.rejected.length} configured target(s) were rejected.`,
      hint: RUN_COMMAND_CONFIG_HINT,
    });
  }

  console.log(`Stopped. Log: ${ctx.logPath}`);
  return summary;
}

export function applyRunOverrides(
  config: PatrolConfig,
  opts: Pick<RunCommandOptions, "pollIntervalSeconds">,
): PatrolConfig {
  if (opts.pollIntervalSeconds === undefined) return config;
  return { ...config, poll_interval_seconds: opts.pollIntervalSeconds };
}

// =============================================================================
// ERROR NORMALIZATION
// =============================================================================

const RUN_COMMAND_FAILURE_TITLE = "Run command failed.";
const RUN_COMMAND_CONFIG_HINT = "Run `refwatch validate --config <path>` to see why targets are rejected.";
const RUN_COMMAND_JOURNAL_HINT =
  "Check that the journal path is writable, or pass --journal <path> to use another file.";

function normalizeRunCommandError(error: unknown): UserFacingError {
  if (error instanceof UserFacingError) {
    return error;
  }

  return new UserFacingError({
    code: resolveCommandErrorCode(error),
    title: RUN_COMMAND_FAILURE_TITLE,
    message: formatErrorMessage(error),
    hint: error instanceof JournalError ? RUN_COMMAND_JOURNAL_HINT : undefined,
    cause: error,
  });
}

function resolveCommandErrorCode(error: unknown): UserFacingErrorCode {
  if (error instanceof ConfigError) {
    return USER_FACING_ERROR_CODES.config;
  }
  if (error instanceof JournalError) {
    return USER_FACING_ERROR_CODES.journal;
  }
  return USER_FACING_ERROR_CODES.unknown;
}
