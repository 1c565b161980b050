/**
 * ReferencePoller: one poll of a target's remote refs.
 * Purpose: turn collaborator failures into a "nothing new this cycle" outcome.
 * Assumptions: ref filters were validated before the target was scheduled.
 * Usage: await pollReferences(ports, { alias, url, refFilters }).
 */

import { formatErrorMessage } from "../../core/error-format.js";
import { GitError, extractCommandOutput } from "../../core/errors.js";
import { logCommandFailure, logPatrolEvent, type EventLog } from "../../core/logger.js";
import type { ReferenceSnapshot } from "../../core/refs.js";

import type { ReferenceSource } from "./ports.js";


// =============================================================================
// TYPES
// =============================================================================

export type PollOutcome =
  | { ok: true; snapshot: ReferenceSnapshot }
  | { ok: false; error: string };

export type PollTarget = {
  alias: string;
  url: string;
  refFilters: readonly string[];
};


// =============================================================================
// PUBLIC API
// =============================================================================

export async function pollReferences(
  deps: { referenceSource: ReferenceSource; log: EventLog },
  target: PollTarget,
): Promise<PollOutcome> {
  try {
    const snapshot = await deps.referenceSource.listReferences(target.url, target.refFilters);
    return { ok: true, snapshot };
  } catch (err) {
    const error = formatErrorMessage(err);
    if (err instanceof GitError) {
      logCommandFailure(deps.log, {
        target: target.alias,
        command: "git ls-remote",
        ...extractCommandOutput(err),
      });
    }
    logPatrolEvent(deps.log, "poll.failed", target.alias, { url: target.url, error });
    return { ok: false, error };
  }
}
