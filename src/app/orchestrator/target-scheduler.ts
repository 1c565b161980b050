/**
 * TargetScheduler: the autonomous polling loop of one watched repository.
 * Purpose: poll on a drift-corrected fixed interval, journal every poll, and
 * trigger one build chain per new or moved ref.
 * Assumptions: owns its snapshot and poll id exclusively; shares only the ports.
 * Usage: const scheduler = new TargetScheduler(ports, { target, intervalMs, offsetMs });
 *        await scheduler.run(stopSignal);
 */

import type { TargetConfig } from "../../core/config.js";
import { formatErrorMessage } from "../../core/error-format.js";
import { logPatrolEvent } from "../../core/logger.js";
import {
  EMPTY_SNAPSHOT,
  computeRefDelta,
  isEmptySnapshot,
  snapshotEntries,
  type ReferenceSnapshot,
} from "../../core/refs.js";

import { runBuildChain } from "./build-chain.js";
import type { PatrolPorts, PollId } from "./ports.js";
import { pollReferences } from "./reference-poller.js";
import { alignWakeTime } from "./schedule.js";


// =============================================================================
// TYPES
// =============================================================================

export type TargetSchedulerState =
  | "created"
  | "sleeping"
  | "polling"
  | "triggering"
  | "idle"
  | "stopped";

export type TargetSchedulerOptions = {
  target: TargetConfig;
  intervalMs: number;
  /** Delay of the first poll relative to start. */
  offsetMs: number;
};

export type CycleResult =
  | { kind: "poll_failed" }
  | { kind: "journal_failed"; changed: number }
  | { kind: "unchanged"; pollId: PollId }
  | { kind: "triggered"; pollId: PollId; chains: Array<{ ref: string; success: boolean }> };


// =============================================================================
// SCHEDULER
// =============================================================================

export class TargetScheduler {
  private currentState: TargetSchedulerState = "created";
  private snapshot: ReferenceSnapshot = EMPTY_SNAPSHOT;
  private lastPollId: PollId | undefined;
  private wakeAt: number | null = null;
  private restored = false;

  constructor(
    private readonly ports: PatrolPorts,
    private readonly options: TargetSchedulerOptions,
  ) {}

  get alias(): string {
    return this.options.target.alias;
  }

  get state(): TargetSchedulerState {
    return this.currentState;
  }

  get lastSnapshot(): ReferenceSnapshot {
    return this.snapshot;
  }

  get lastKnownPollId(): PollId | undefined {
    return this.lastPollId;
  }

  /**
   * Anchors the schedule on first call, then restores the last journaled snapshot.
   * Rejects when the journal cannot be read; the anchor stays in place.
   */
  async start(): Promise<void> {
    if (this.wakeAt === null) {
      this.wakeAt = this.ports.clock.monotonicMs() + this.options.offsetMs;
    }
    const latest = await this.ports.journal.latestPoll(this.alias);
    if (latest) {
      this.snapshot = latest.snapshot;
      this.lastPollId = latest.id;
    }
    this.restored = true;

    logPatrolEvent(this.ports.log, "target.start", this.alias, {
      url: this.options.target.url,
      refs: Object.keys(this.snapshot).length,
      last_poll_id: this.lastPollId ?? null,
      offset_ms: this.options.offsetMs,
    });
  }

  /**
   * Sleeps until the next slot and runs one cycle, until `signal` aborts.
   * An abort during sleep stops immediately; an abort during a cycle lets the
   * cycle's build chains finish first. A slot whose snapshot restore fails is
   * skipped and the restore is retried on the next one.
   */
  async run(signal: AbortSignal): Promise<void> {
    if (this.wakeAt === null) {
      await this.tryStart();
    }

    while (!signal.aborted) {
      await this.sleepUntilNextSlot(signal);
      if (signal.aborted) break;

      if (!this.restored && !(await this.tryStart())) continue;
      await this.runCycle();
    }

    this.currentState = "stopped";
    logPatrolEvent(this.ports.log, "target.stop", this.alias);
  }

  /** One poll → journal → trigger pass. Resolves only after every spawned chain finished. */
  async runCycle(): Promise<CycleResult> {
    const { target } = this.options;
    this.currentState = "polling";

    const outcome = await pollReferences(this.ports, {
      alias: target.alias,
      url: target.url,
      refFilters: target.ref_filters,
    });
    if (!outcome.ok) {
      this.currentState = "idle";
      return { kind: "poll_failed" };
    }

    const current = outcome.snapshot;
    const delta = computeRefDelta(this.snapshot, current);
    const changed = !isEmptySnapshot(delta);

    let pollId: PollId;
    try {
      pollId = await this.ports.journal.recordPoll({
        timestamp: this.ports.clock.now(),
        targetUrl: target.url,
        targetAlias: target.alias,
        linkToPrevious: changed ? this.lastPollId : undefined,
        snapshot: current,
        refFilters: target.ref_filters,
      });
    } catch (err) {
      // Keep the previous snapshot so the same changes are seen again next cycle.
      logPatrolEvent(this.ports.log, "journal.write_failed", target.alias, {
        record: "poll",
        error: formatErrorMessage(err),
      });
      this.currentState = "idle";
      return { kind: "journal_failed", changed: Object.keys(delta).length };
    }

    this.snapshot = current;
    this.lastPollId = pollId;

    if (!changed) {
      logPatrolEvent(this.ports.log, "poll.unchanged", target.alias, { poll_id: pollId });
      this.currentState = "idle";
      return { kind: "unchanged", pollId };
    }

    logPatrolEvent(this.ports.log, "poll.changed", target.alias, { poll_id: pollId, refs: { ...delta } });
    this.currentState = "triggering";

    const refs = snapshotEntries(delta);
    const results = await Promise.all(
      refs.map((ref) =>
        runBuildChain(this.ports, {
          targetAlias: target.alias,
          pollId,
          ref,
          workflows: target.workflows,
        }),
      ),
    );

    this.currentState = "idle";
    return {
      kind: "triggered",
      pollId,
      chains: refs.map((ref, index) => ({ ref: ref.refName, success: results[index] ?? false })),
    };
  }

  private async tryStart(): Promise<boolean> {
    try {
      await this.start();
      return true;
    } catch (err) {
      logPatrolEvent(this.ports.log, "journal.read_failed", this.alias, {
        record: "latest_poll",
        error: formatErrorMessage(err),
      });
      this.currentState = "idle";
      return false;
    }
  }

  private async sleepUntilNextSlot(signal: AbortSignal): Promise<void> {
    const now = this.ports.clock.monotonicMs();
    const wakeAt = alignWakeTime(this.wakeAt ?? now, now, this.options.intervalMs);
    // The slot after this one; realigned next time if the cycle overruns it.
    this.wakeAt = wakeAt + this.options.intervalMs;

    const sleepMs = wakeAt - now;
    this.currentState = "sleeping";
    logPatrolEvent(this.ports.log, "target.sleep", this.alias, { sleep_ms: sleepMs });
    await this.ports.clock.sleep(sleepMs, signal);
  }
}
