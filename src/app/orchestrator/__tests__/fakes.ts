/**
 * Orchestrator test fakes.
 * Purpose: deterministic in-memory adapters for poller, chain, scheduler and supervisor tests.
 * Assumptions: fakes are in-memory and intentionally minimal; time only moves when a test moves it.
 * Usage: const { ports, referenceSource, buildRunner, journal, clock, log } = createTestPorts();
 */

import type { CommandResult, CommandRunner } from "../../../core/command-runner.js";
import type { TargetConfig, WorkflowConfig } from "../../../core/config.js";
import { eventWithTs, type EventLog, type LogEvent, type LogEventInput } from "../../../core/logger.js";
import { EMPTY_SNAPSHOT, type ReferenceSnapshot } from "../../../core/refs.js";
import type {
  BuildRequest,
  BuildRunner,
  BuildStatus,
  BuildStepId,
  BuildStepRecord,
  BuildStepRecordInput,
  Clock,
  JournalStore,
  LatestPoll,
  PatrolPorts,
  PollId,
  PollRecord,
  PollRecordInput,
  ReferenceSource,
} from "../ports.js";

// =============================================================================
// COMMAND RUNNER
// =============================================================================

type ScriptedCommand = {
  prefix: string;
  result: CommandResult;
};

/**
 * Answers each call with the first queued result whose prefix matches
 * `command args...`; unmatched calls exit 0 with empty output.
 */
export class FakeCommandRunner implements CommandRunner {
  private readonly scripted: ScriptedCommand[] = [];
  readonly calls: Array<{ command: string; args: string[] }> = [];

  respond(prefix: string, result: Partial<CommandResult>): void {
    this.scripted.push({
      prefix,
      result: { exitCode: 0, stdout: "", stderr: "", ...result },
    });
  }

  async run(command: string, args: string[]): Promise<CommandResult> {
    this.calls.push({ command, args });
    const line = [command, ...args].join(" ");
    const index = this.scripted.findIndex((entry) => line.startsWith(entry.prefix));
    if (index === -1) {
      return { exitCode: 0, stdout: "", stderr: "" };
    }
    const [entry] = this.scripted.splice(index, 1);
    return entry.result;
  }
}

// =============================================================================
// REFERENCE SOURCE
// =============================================================================

type QueuedListing = { snapshot: ReferenceSnapshot } | { error: Error };

type ListingQueue = { listings: QueuedListing[]; lastSnapshot: ReferenceSnapshot };

const ANY_URL = "*";

/** Listings queued without a url answer every url that has no queue of its own. */
export class FakeReferenceSource implements ReferenceSource {
  private readonly queues = new Map<string, ListingQueue>();

  readonly invalidFilters = new Set<string>();
  readonly listCalls: Array<{ url: string; refFilters: readonly string[] }> = [];
  readonly validateCalls: string[] = [];

  queueSnapshot(snapshot: ReferenceSnapshot, url: string = ANY_URL): void {
    this.queueFor(url).listings.push({ snapshot });
  }

  queueFailure(error: Error, url: string = ANY_URL): void {
    this.queueFor(url).listings.push({ error });
  }

  /** Once a queue runs dry its last successful snapshot is repeated. */
  async listReferences(url: string, refFilters: readonly string[]): Promise<ReferenceSnapshot> {
    this.listCalls.push({ url, refFilters });
    const queue = this.queues.get(url) ?? this.queueFor(ANY_URL);
    const next = queue.listings.shift();
    if (!next) return queue.lastSnapshot;
    if ("error" in next) throw next.error;
    queue.lastSnapshot = next.snapshot;
    return next.snapshot;
  }

  private queueFor(url: string): ListingQueue {
    let queue = this.queues.get(url);
    if (!queue) {
      queue = { listings: [], lastSnapshot: EMPTY_SNAPSHOT };
      this.queues.set(url, queue);
    }
    return queue;
  }

  async validateFilter(refFilter: string): Promise<boolean> {
    this.validateCalls.push(refFilter);
    return !this.invalidFilters.has(refFilter);
  }
}

// =============================================================================
// BUILD RUNNER
// =============================================================================

export type BuildScript = {
  /** Terminal status reported after completion; omit for a status document without one. */
  finalStatus?: string;
  startError?: Error;
  waitError?: Error;
};

type FakeBuild = {
  id: string;
  request: BuildRequest;
  script: BuildScript;
  finished: boolean;
};

/** Builds are scripted per build config path; unscripted configs succeed. */
export class FakeBuildRunner implements BuildRunner {
  private readonly scripts = new Map<string, BuildScript>();
  private readonly builds = new Map<string, FakeBuild>();
  private nextId = 1;

  readonly requests: BuildRequest[] = [];
  readonly calls: string[] = [];
  /** Awaited inside awaitCompletion, e.g. to hold builds open or move the clock. */
  onAwait: ((buildId: string) => Promise<void>) | null = null;

  script(configPath: string, script: BuildScript): void {
    this.scripts.set(configPath, script);
  }

  async start(request: BuildRequest): Promise<string> {
    this.requests.push(request);
    this.calls.push(`start ${request.configPath}`);
    const script = this.scripts.get(request.configPath) ?? { finalStatus: "SUCCESS" };
    if (script.startError) throw script.startError;

    const id = `build-${this.nextId++}`;
    this.builds.set(id, { id, request, script, finished: false });
    return id;
  }

  async awaitCompletion(buildId: string): Promise<void> {
    this.calls.push(`wait ${buildId}`);
    const build = this.requireBuild(buildId);
    if (this.onAwait) await this.onAwait(buildId);
    if (build.script.waitError) throw build.script.waitError;
    build.finished = true;
  }

  async describe(buildId: string): Promise<BuildStatus> {
    this.calls.push(`describe ${buildId}`);
    const build = this.requireBuild(buildId);
    if (!build.finished) {
      return { id: buildId, status: "QUEUED" };
    }
    if (build.script.finalStatus === undefined) {
      return { id: buildId };
    }
    return { id: buildId, status: build.script.finalStatus };
  }

  private requireBuild(buildId: string): FakeBuild {
    const build = this.builds.get(buildId);
    if (!build) throw new Error(`unknown build ${buildId}`);
    return build;
  }
}

// =============================================================================
// JOURNAL
// =============================================================================

export class FakeJournalStore implements JournalStore {
  readonly polls: PollRecord[] = [];
  readonly buildSteps: BuildStepRecord[] = [];
  private readonly seeded = new Map<string, LatestPoll>();
  private nextStepId = 1;

  /** Number of upcoming recordPoll / recordBuildStep calls that should fail. */
  failPollWrites = 0;
  failBuildStepWrites = 0;

  seedLatestPoll(targetAlias: string, poll: LatestPoll): void {
    this.seeded.set(targetAlias, poll);
  }

  async latestPoll(targetAlias: string): Promise<LatestPoll | null> {
    const recorded = this.polls.filter((poll) => poll.targetAlias === targetAlias).at(-1);
    if (recorded) return { id: recorded.id, snapshot: recorded.snapshot };
    return this.seeded.get(targetAlias) ?? null;
  }

  async recordPoll(record: PollRecordInput): Promise<PollId> {
    if (this.failPollWrites > 0) {
      this.failPollWrites -= 1;
      throw new Error("journal unavailable");
    }
    const id = `poll-${this.polls.length + 1}`;
    this.polls.push({ ...record, id });
    return id;
  }

  async recordBuildStep(record: BuildStepRecordInput): Promise<BuildStepId> {
    if (this.failBuildStepWrites > 0) {
      this.failBuildStepWrites -= 1;
      throw new Error("journal unavailable");
    }
    const id = this.nextStepId++;
    this.buildSteps.push({ ...record, id });
    return id;
  }

  stepsFor(refName: string): BuildStepRecord[] {
    return this.buildSteps.filter((step) => step.triggeringRef.refName === refName);
  }
}

// =============================================================================
// CLOCK
// =============================================================================

export const FAKE_WALL_CLOCK_START = Date.parse("2024-01-01T00:00:00.000Z");

/**
 * Virtual time. `sleep` moves the clock forward by the requested amount
 * unless the signal is (or becomes, inside `onSleep`) aborted.
 */
export class FakeClock implements Clock {
  private elapsedMs = 0;
  readonly sleeps: number[] = [];
  onSleep: ((ms: number, index: number) => void) | null = null;

  now(): Date {
    return new Date(FAKE_WALL_CLOCK_START + this.elapsedMs);
  }

  monotonicMs(): number {
    return this.elapsedMs;
  }

  advance(ms: number): void {
    this.elapsedMs += ms;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    this.sleeps.push(ms);
    this.onSleep?.(ms, this.sleeps.length - 1);
    if (signal?.aborted) return;
    this.advance(Math.max(0, ms));
  }
}

// =============================================================================
// EVENT LOG
// =============================================================================

export class MemoryEventLog implements EventLog {
  readonly events: LogEvent[] = [];

  log(event: LogEventInput): void {
    this.events.push(eventWithTs(event));
  }

  types(): string[] {
    return this.events.map((event) => event.type);
  }

  ofType(type: string): LogEvent[] {
    return this.events.filter((event) => event.type === type);
  }
}

// =============================================================================
// BUNDLE + BUILDERS
// =============================================================================

export type TestPorts = {
  ports: PatrolPorts;
  referenceSource: FakeReferenceSource;
  buildRunner: FakeBuildRunner;
  journal: FakeJournalStore;
  clock: FakeClock;
  log: MemoryEventLog;
};

export function createTestPorts(): TestPorts {
  const referenceSource = new FakeReferenceSource();
  const buildRunner = new FakeBuildRunner();
  const journal = new FakeJournalStore();
  const clock = new FakeClock();
  const log = new MemoryEventLog();
  return {
    ports: { referenceSource, buildRunner, journal, clock, log },
    referenceSource,
    buildRunner,
    journal,
    clock,
    log,
  };
}

export function makeWorkflow(alias: string, overrides: Partial<WorkflowConfig> = {}): WorkflowConfig {
  return {
    alias,
    build_config: `/builds/${alias}.yaml`,
    substitutions: {},
    ...overrides,
  };
}

export function makeTarget(alias: string, overrides: Partial<TargetConfig> = {}): TargetConfig {
  return {
    alias,
    url: `https://git.example.test/${alias}.git`,
    ref_filters: [],
    workflows: [makeWorkflow("build")],
    ...overrides,
  };
}

export function commitId(seed: string): string {
  return seed.repeat(40).slice(0, 40);
}
