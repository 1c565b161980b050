import type { BuildStepRecord, PollRecord } from "../app/orchestrator/ports.js";
import { resolveJournalPath } from "../app/orchestrator/run-context.js";
import { loadPatrolConfig } from "../core/config-loader.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import type { PathsContext } from "../core/paths.js";
import { SqliteJournalStore } from "../journal/sqlite-journal.js";

export type HistoryCommandOptions = {
  alias: string;
  configPath: string;
  paths: PathsContext;
  journalPath?: string;
  limit?: number;
};

export const DEFAULT_HISTORY_LIMIT = 10;

export async function historyCommand(opts: HistoryCommandOptions): Promise<void> {
  const config = loadPatrolConfig(opts.configPath);
  if (!config.targets.some((target) => target.alias === opts.alias)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Unknown target.",
      message: `No target with alias "${opts.alias}" in ${opts.configPath}.`,
      hint: `Known targets: ${config.targets.map((target) => target.alias).join(", ")}.`,
    });
  }

  const journal = SqliteJournalStore.open(resolveJournalPath(config, opts.paths, opts.journalPath));
  try {
    const polls = journal.listPolls(opts.alias, opts.limit ?? DEFAULT_HISTORY_LIMIT);
    if (polls.length === 0) {
      console.log(`No polls recorded for ${opts.alias}.`);
      return;
    }

    for (const poll of polls) {
      for (const line of formatPollHistory(poll, journal.listBuildSteps(poll.id))) {
        console.log(line);
      }
    }
  } finally {
    journal.close();
  }
}

// =============================================================================
// FORMATTING
// =============================================================================

export function formatPollHistory(poll: PollRecord, steps: BuildStepRecord[]): string[] {
  const refCount = Object.keys(poll.snapshot).length;
  const link = poll.linkToPrevious ? ` (changed since ${poll.linkToPrevious})` : "";
  const lines = [`${poll.timestamp.toISOString()} poll ${poll.id}: ${refCount} ref(s)${link}`];

  for (const step of steps) {
    const status = typeof step.status.status === "string" ? step.status.status : "unknown";
    lines.push(
      `  #${step.id} <- #${step.parentId} ${step.triggeringRef.refName} build ${step.status.id} ${status}`,
    );
  }
  return lines;
}
