/**
 * Orchestrator ports define the boundary between the polling engine and adapters.
 * Purpose: make the git, build service, journal and timer dependencies explicit and replaceable.
 * Assumptions: ports stay small; adapters throw typed errors and the engine decides what is fatal.
 * Usage: createDefaultPorts(...) in `run-context.ts`, fakes in `__tests__/fakes.ts`.
 */

export type { CommandResult, CommandRunner } from "../../core/command-runner.js";

import type { EventLog, JsonObject } from "../../core/logger.js";
import type { ReferenceSnapshot, TriggeringRef } from "../../core/refs.js";

// =============================================================================
// REFERENCE SOURCE
// =============================================================================

export interface ReferenceSource {
  /** Throws GitError when the listing command fails. */
  listReferences(url: string, refFilters: readonly string[]): Promise<ReferenceSnapshot>;
  validateFilter(refFilter: string): Promise<boolean>;
}

// =============================================================================
// BUILD RUNNER
// =============================================================================

/** Opaque status document; must carry `id`, and `status` once terminal. */
export type BuildStatus = JsonObject & { id: string };

export const BUILD_SUCCESS_STATUS = "SUCCESS";

export type BuildRequest = {
  configPath: string;
  substitutions: Record<string, string>;
  /** Omitted means the build is started without a source archive. */
  sourceArchive?: string;
};

export interface BuildRunner {
  /** Resolves to the build id; throws BuildError when no id can be identified. */
  start(request: BuildRequest): Promise<string>;
  /** Blocks until the build service reports the build finished. */
  awaitCompletion(buildId: string): Promise<void>;
  describe(buildId: string): Promise<BuildStatus>;
}

// =============================================================================
// JOURNAL STORE
// =============================================================================

export type PollId = string;
export type BuildStepId = number;

/** parent_id of the first record of every build chain. */
export const ROOT_BUILD_STEP_ID: BuildStepId = 0;

export type PollRecordInput = {
  timestamp: Date;
  targetUrl: string;
  targetAlias: string;
  /** Set only when this poll found new or moved refs. */
  linkToPrevious?: PollId;
  snapshot: ReferenceSnapshot;
  refFilters: readonly string[];
};

export type PollRecord = PollRecordInput & { id: PollId };

export type BuildStepRecordInput = {
  parentId: BuildStepId;
  pollRecordId: PollId;
  timestamp: Date;
  targetAlias: string;
  triggeringRef: TriggeringRef;
  status: BuildStatus;
};

export type BuildStepRecord = BuildStepRecordInput & { id: BuildStepId };

export type LatestPoll = {
  id: PollId;
  snapshot: ReferenceSnapshot;
};

/** Writes are independent inserts and may be issued concurrently from every target. */
export interface JournalStore {
  latestPoll(targetAlias: string): Promise<LatestPoll | null>;
  recordPoll(record: PollRecordInput): Promise<PollId>;
  recordBuildStep(record: BuildStepRecordInput): Promise<BuildStepId>;
}

// =============================================================================
// CLOCK
// =============================================================================

export interface Clock {
  /** Wall-clock time for journal timestamps. */
  now(): Date;
  /** Monotonic milliseconds for scheduling. */
  monotonicMs(): number;
  /** Resolves after `ms`, or early when `signal` aborts. Never rejects. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

// =============================================================================
// BUNDLE
// =============================================================================

export type PatrolPorts = {
  referenceSource: ReferenceSource;
  buildRunner: BuildRunner;
  journal: JournalStore;
  clock: Clock;
  log: EventLog;
};
