/**
 * RunContext + default adapters for the patrol service.
 * Purpose: centralize service-scoped settings and injected ports to avoid globals.
 * Assumptions: ports are thin adapters over the git, gcloud and journal modules and are overrideable for tests.
 * Usage: const ctx = openRunContext(config, paths, opts); await runSupervisor(ctx.ports, config, signal); ctx.close();
 */

import { performance } from "node:perf_hooks";

import type { PatrolConfig } from "../../core/config.js";
import { createExecaCommandRunner, type CommandRunner } from "../../core/command-runner.js";
import { JsonlLogger, type EventLog } from "../../core/logger.js";
import { defaultJournalPath, serviceLogPath, type PathsContext } from "../../core/paths.js";
import { sleep } from "../../core/utils.js";
import { SqliteJournalStore } from "../../journal/sqlite-journal.js";

import { createCloudBuildRunner } from "./builds/cloud-build-runner.js";
import type { Clock, JournalStore, PatrolPorts } from "./ports.js";
import { createGitReferenceSource } from "./refs/git-reference-source.js";


// =============================================================================
// TYPES
// =============================================================================

export type RunContextOptions = {
  /** Overrides `journal_path` from the config. */
  journalPath?: string;
  /** Echo service events to stdout as well as the log file. */
  echoLogs?: boolean;
  debug?: boolean;
};

export type RunContext = {
  ports: PatrolPorts;
  journalPath: string;
  logPath: string;
  close(): void;
};


// =============================================================================
// DEFAULT ADAPTERS
// =============================================================================

export const systemClock: Clock = {
  now: () => new Date(),
  monotonicMs: () => performance.now(),
  sleep,
};

export function createDefaultPorts(input: {
  journal: JournalStore;
  log: EventLog;
  runner?: CommandRunner;
  clock?: Clock;
}): PatrolPorts {
  const runner = input.runner ?? createExecaCommandRunner();
  return {
    referenceSource: createGitReferenceSource(runner),
    buildRunner: createCloudBuildRunner(runner),
    journal: input.journal,
    clock: input.clock ?? systemClock,
    log: input.log,
  };
}

export function resolveJournalPath(
  config: PatrolConfig,
  paths: PathsContext,
  override?: string,
): string {
  return override ?? config.journal_path ?? defaultJournalPath(paths);
}

/** Opens the journal and the service log. Throws JournalError when the journal cannot be opened. */
export function openRunContext(
  config: PatrolConfig,
  paths: PathsContext,
  opts: RunContextOptions = {},
): RunContext {
  const journalPath = resolveJournalPath(config, paths, opts.journalPath);
  const journal = SqliteJournalStore.open(journalPath);

  const logPath = serviceLogPath(paths);
  const logger = new JsonlLogger(logPath, {
    echo: opts.echoLogs ? process.stdout : undefined,
    debug: opts.debug,
  });

  return {
    ports: createDefaultPorts({ journal, log: logger }),
    journalPath,
    logPath,
    close: () => {
      logger.close();
      journal.close();
    },
  };
}
