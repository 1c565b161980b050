/**
 * Supervisor: validates the configured targets and runs one scheduler per target.
 * Purpose: start every accepted target on a staggered offset and keep them isolated.
 * Assumptions: a rejected or crashed target never affects the others.
 * Usage: await runSupervisor(ports, config, stopSignal);
 */

import type { PatrolConfig, TargetConfig } from "../../core/config.js";
import { formatErrorMessage } from "../../core/error-format.js";
import { logPatrolEvent } from "../../core/logger.js";

import type { PatrolPorts } from "./ports.js";
import { staggerOffsetMs } from "./schedule.js";
import { TargetScheduler } from "./target-scheduler.js";


// =============================================================================
// TYPES
// =============================================================================

export type TargetValidation = { ok: true } | { ok: false; reason: string };

export type SupervisorSummary = {
  started: string[];
  rejected: Array<{ alias: string; reason: string }>;
  crashed: string[];
};


// =============================================================================
// VALIDATION
// =============================================================================

export async function validateTarget(
  deps: Pick<PatrolPorts, "referenceSource">,
  target: TargetConfig,
  maxRefFilters: number,
): Promise<TargetValidation> {
  if (target.ref_filters.length > maxRefFilters) {
    return {
      ok: false,
      reason: `${target.ref_filters.length} ref filters exceed the limit of ${maxRefFilters}`,
    };
  }

  const verdicts = await Promise.all(
    target.ref_filters.map(async (filter) => ({
      filter,
      valid: await deps.referenceSource.validateFilter(filter),
    })),
  );
  const invalid = verdicts.filter((verdict) => !verdict.valid).map((verdict) => verdict.filter);
  if (invalid.length > 0) {
    return { ok: false, reason: `invalid ref filters: ${invalid.join(", ")}` };
  }

  return { ok: true };
}


// =============================================================================
// SUPERVISOR
// =============================================================================

/**
 * Runs until `signal` aborts and every scheduler has wound down.
 * Targets keep their configured position for staggering even when an earlier one is rejected.
 */
export async function runSupervisor(
  ports: PatrolPorts,
  config: PatrolConfig,
  signal: AbortSignal,
): Promise<SupervisorSummary> {
  const intervalMs = config.poll_interval_seconds * 1000;
  const targetCount = config.targets.length;
  const summary: SupervisorSummary = { started: [], rejected: [], crashed: [] };

  logPatrolEvent(ports.log, "supervisor.start", undefined, {
    targets: config.targets.map((target) => target.alias),
    poll_interval_seconds: config.poll_interval_seconds,
  });

  const schedulers = await Promise.all(
    config.targets.map(async (target, index) => {
      const validation = await validateTargetSafely(ports, target, config.max_ref_filters);
      if (!validation.ok) {
        summary.rejected.push({ alias: target.alias, reason: validation.reason });
        logPatrolEvent(ports.log, "target.rejected", target.alias, { reason: validation.reason });
        return null;
      }

      return new TargetScheduler(ports, {
        target,
        intervalMs,
        offsetMs: staggerOffsetMs(index, targetCount, intervalMs),
      });
    }),
  );

  await Promise.all(
    schedulers.map(async (scheduler) => {
      if (!scheduler) return;
      summary.started.push(scheduler.alias);
      try {
        await scheduler.run(signal);
      } catch (err) {
        summary.crashed.push(scheduler.alias);
        logPatrolEvent(ports.log, "target.crashed", scheduler.alias, {
          error: formatErrorMessage(err),
        });
      }
    }),
  );

  logPatrolEvent(ports.log, "supervisor.stop", undefined, {
    started: summary.started,
    rejected: summary.rejected.map((entry) => entry.alias),
    crashed: summary.crashed,
  });
  return summary;
}

async function validateTargetSafely(
  ports: PatrolPorts,
  target: TargetConfig,
  maxRefFilters: number,
): Promise<TargetValidation> {
  try {
    return await validateTarget(ports, target, maxRefFilters);
  } catch (err) {
    return { ok: false, reason: `ref filter validation failed: ${formatErrorMessage(err)}` };
  }
}
