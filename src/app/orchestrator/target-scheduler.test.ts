import { describe, expect, it, vi } from "vitest";

import {
  FAKE_WALL_CLOCK_START,
  commitId,
  createTestPorts,
  makeTarget,
} from "./__tests__/fakes.js";
import { TargetScheduler } from "./target-scheduler.js";

const A = commitId("a");
const B = commitId("b");

function createScheduler(intervalMs = 60_000, offsetMs = 15_000) {
  const testPorts = createTestPorts();
  const scheduler = new TargetScheduler(testPorts.ports, {
    target: makeTarget("upstream"),
    intervalMs,
    offsetMs,
  });
  return { ...testPorts, scheduler };
}

describe("TargetScheduler.runCycle", () => {
  it("journals every poll and links only polls that changed refs", async () => {
    const { scheduler, referenceSource, journal } = createScheduler();
    await scheduler.start();

    referenceSource.queueSnapshot({ "refs/tags/v1": A });
    expect(await scheduler.runCycle()).toEqual({
      kind: "triggered",
      pollId: "poll-1",
      chains: [{ ref: "refs/tags/v1", success: true }],
    });

    referenceSource.queueSnapshot({ "refs/tags/v1": A });
    expect(await scheduler.runCycle()).toEqual({ kind: "unchanged", pollId: "poll-2" });

    referenceSource.queueSnapshot({ "refs/tags/v1": A, "refs/heads/main": B });
    await scheduler.runCycle();

    expect(journal.polls.map((poll) => [poll.id, poll.linkToPrevious])).toEqual([
      ["poll-1", undefined],
      ["poll-2", undefined],
      ["poll-3", "poll-2"],
    ]);
    expect(journal.polls[2]?.snapshot).toEqual({ "refs/tags/v1": A, "refs/heads/main": B });
    expect(journal.stepsFor("refs/heads/main")).toHaveLength(2);
    expect(journal.stepsFor("refs/tags/v1")).toHaveLength(2);
  });

  it("resumes from the latest journaled poll", async () => {
    const { scheduler, referenceSource, journal, buildRunner } = createScheduler();
    journal.seedLatestPoll("upstream", { id: "poll-0", snapshot: { "refs/tags/v1": A } });
    await scheduler.start();

    expect(scheduler.lastKnownPollId).toBe("poll-0");

    referenceSource.queueSnapshot({ "refs/tags/v1": A });
    expect(await scheduler.runCycle()).toEqual({ kind: "unchanged", pollId: "poll-1" });
    expect(buildRunner.requests).toEqual([]);

    referenceSource.queueSnapshot({ "refs/tags/v1": B });
    await scheduler.runCycle();

    expect(journal.polls[1]?.linkToPrevious).toBe("poll-1");
    expect(buildRunner.requests).toHaveLength(1);
  });

  it("keeps the previous state when the poll cannot be journaled", async () => {
    const { scheduler, referenceSource, journal, log, buildRunner } = createScheduler();
    await scheduler.start();
    journal.failPollWrites = 1;

    referenceSource.queueSnapshot({ "refs/tags/v1": A });
    expect(await scheduler.runCycle()).toEqual({ kind: "journal_failed", changed: 1 });
    expect(log.ofType("journal.write_failed")[0]?.payload).toEqual({
      record: "poll",
      error: "journal unavailable",
    });
    expect(scheduler.lastSnapshot).toEqual({});
    expect(buildRunner.requests).toEqual([]);

    // The same listing comes back and is now seen as new.
    const retry = await scheduler.runCycle();

    expect(retry).toEqual({
      kind: "triggered",
      pollId: "poll-1",
      chains: [{ ref: "refs/tags/v1", success: true }],
    });
  });

  it("journals nothing when the poll fails", async () => {
    const { scheduler, referenceSource, journal } = createScheduler();
    await scheduler.start();
    referenceSource.queueFailure(new Error("network down"));

    expect(await scheduler.runCycle()).toEqual({ kind: "poll_failed" });
    expect(journal.polls).toEqual([]);
    expect(scheduler.state).toBe("idle");
  });

  it("runs the chains of one poll concurrently and waits for all of them", async () => {
    const { scheduler, referenceSource, buildRunner } = createScheduler();
    await scheduler.start();

    let waiting = 0;
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    buildRunner.onAwait = async () => {
      waiting += 1;
      await gate;
    };

    referenceSource.queueSnapshot({ "refs/tags/v1": A, "refs/tags/v2": B });
    let settled = false;
    const cycle = scheduler.runCycle().then((result) => {
      settled = true;
      return result;
    });

    await vi.waitFor(() => expect(waiting).toBe(2));
    expect(settled).toBe(false);
    expect(scheduler.state).toBe("triggering");

    release();
    const result = await cycle;

    expect(result).toEqual({
      kind: "triggered",
      pollId: "poll-1",
      chains: [
        { ref: "refs/tags/v1", success: true },
        { ref: "refs/tags/v2", success: true },
      ],
    });
    expect(scheduler.state).toBe("idle");
  });
});

describe("TargetScheduler.run", () => {
  it("wakes on a fixed grid and skips slots a long cycle overran", async () => {
    const { scheduler, referenceSource, buildRunner, clock, journal, log } = createScheduler();
    const controller = new AbortController();
    clock.onSleep = (_ms, index) => {
      if (index === 3) controller.abort();
    };
    // The single build of the first cycle takes 90s, longer than the interval.
    buildRunner.onAwait = async () => clock.advance(90_000);
    referenceSource.queueSnapshot({ "refs/tags/v1": A });

    await scheduler.run(controller.signal);

    expect(clock.sleeps).toEqual([15_000, 30_000, 60_000, 60_000]);
    expect(journal.polls.map((poll) => poll.timestamp.getTime() - FAKE_WALL_CLOCK_START)).toEqual([
      15_000, 135_000, 195_000,
    ]);
    expect(scheduler.state).toBe("stopped");
    expect(log.types().at(-1)).toBe("target.stop");
  });

  it("skips slots until the journaled snapshot can be restored", async () => {
    const { scheduler, referenceSource, buildRunner, clock, journal, log } = createScheduler();
    journal.seedLatestPoll("upstream", { id: "poll-0", snapshot: { "refs/tags/v1": A } });
    let failures = 2;
    const readLatest = journal.latestPoll.bind(journal);
    journal.latestPoll = async (alias) => {
      if (failures > 0) {
        failures -= 1;
        throw new Error("SQLITE_BUSY");
      }
      return readLatest(alias);
    };
    const controller = new AbortController();
    clock.onSleep = (_ms, index) => {
      if (index === 2) controller.abort();
    };
    referenceSource.queueSnapshot({ "refs/tags/v1": A });

    await scheduler.run(controller.signal);

    expect(clock.sleeps).toEqual([15_000, 60_000, 60_000]);
    expect(log.ofType("journal.read_failed").map((event) => event.payload)).toEqual([
      { record: "latest_poll", error: "SQLITE_BUSY" },
      { record: "latest_poll", error: "SQLITE_BUSY" },
    ]);
    expect(
      log.types().filter((type) => type === "journal.read_failed" || type === "target.start"),
    ).toEqual(["journal.read_failed", "journal.read_failed", "target.start"]);
    // Polled once, in the slot where the restore succeeded, against the restored snapshot.
    expect(referenceSource.listCalls).toHaveLength(1);
    expect(journal.polls.map((poll) => poll.timestamp.getTime() - FAKE_WALL_CLOCK_START)).toEqual([
      75_000,
    ]);
    expect(scheduler.lastKnownPollId).toBe("poll-1");
    expect(buildRunner.requests).toEqual([]);
  });

  it("lets in-flight chains finish when stopped mid-cycle", async () => {
    const { scheduler, referenceSource, buildRunner, clock, journal, log } = createScheduler();
    const controller = new AbortController();
    buildRunner.onAwait = async () => controller.abort();
    referenceSource.queueSnapshot({ "refs/tags/v1": A });

    await scheduler.run(controller.signal);

    expect(clock.sleeps).toEqual([15_000]);
    expect(journal.buildSteps).toHaveLength(2);
    expect(log.types().slice(-2)).toEqual(["chain.complete", "target.stop"]);
  });
});
