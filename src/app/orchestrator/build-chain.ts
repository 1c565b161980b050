/**
 * BuildChainExecutor: runs a target's workflows in order for one changed ref.
 * Purpose: journal submission and completion of every step as one linked lineage.
 * Assumptions: no mid-chain cancellation; a chain runs to its end or its first failure.
 * Usage: await runBuildChain(ports, { targetAlias, pollId, ref, workflows }).
 */

import type { WorkflowConfig } from "../../core/config.js";
import { formatErrorMessage } from "../../core/error-format.js";
import { BuildError, extractCommandOutput } from "../../core/errors.js";
import { logCommandFailure, logPatrolEvent } from "../../core/logger.js";
import { deriveRefSubstitutions, type TriggeringRef } from "../../core/refs.js";

import {
  BUILD_SUCCESS_STATUS,
  ROOT_BUILD_STEP_ID,
  type BuildRequest,
  type BuildStatus,
  type BuildStepId,
  type PatrolPorts,
  type PollId,
} from "./ports.js";


// =============================================================================
// TYPES
// =============================================================================

export type BuildChainInput = {
  targetAlias: string;
  pollId: PollId;
  ref: TriggeringRef;
  workflows: readonly WorkflowConfig[];
};

type ChainDeps = Pick<PatrolPorts, "buildRunner" | "journal" | "clock" | "log">;

type ChainStage = "submit" | "describe" | "wait" | "journal" | "status";

// Build service command behind each stage, for command.failed events.
const STAGE_COMMANDS: Partial<Record<ChainStage, string>> = {
  submit: "gcloud builds submit",
  describe: "gcloud builds describe",
  wait: "gcloud builds log",
};

class ChainAbort extends Error {
  constructor(
    readonly stage: ChainStage,
    message: string,
  ) {
    super(message);
    this.name = "ChainAbort";
  }
}


// =============================================================================
// PUBLIC API
// =============================================================================

/** Resolves true only when every workflow finished with the success status. Never rejects. */
export async function runBuildChain(deps: ChainDeps, input: BuildChainInput): Promise<boolean> {
  const { targetAlias, ref } = input;
  logPatrolEvent(deps.log, "chain.start", targetAlias, {
    ref: ref.refName,
    commit: ref.commit,
    workflows: input.workflows.map((workflow) => workflow.alias),
  });

  let parentId: BuildStepId = ROOT_BUILD_STEP_ID;
  for (const [index, workflow] of input.workflows.entries()) {
    try {
      parentId = await runStep(deps, input, workflow, parentId);
    } catch (err) {
      const failedStage = err instanceof ChainAbort ? err.stage : "unexpected";
      logPatrolEvent(deps.log, "chain.abort", targetAlias, {
        ref: ref.refName,
        workflow: workflow.alias,
        step: index,
        stage: failedStage,
        error: formatErrorMessage(err),
      });
      return false;
    }
  }

  logPatrolEvent(deps.log, "chain.complete", targetAlias, {
    ref: ref.refName,
    steps: input.workflows.length,
  });
  return true;
}

export function composeSubstitutions(
  refName: string,
  workflow: WorkflowConfig,
): Record<string, string> {
  return { ...deriveRefSubstitutions(refName), ...workflow.substitutions };
}


// =============================================================================
// INTERNALS
// =============================================================================

// Returns the id of the step's completion record, the parent of the next step.
async function runStep(
  deps: ChainDeps,
  input: BuildChainInput,
  workflow: WorkflowConfig,
  parentId: BuildStepId,
): Promise<BuildStepId> {
  const { targetAlias, ref } = input;

  const request: BuildRequest = {
    configPath: workflow.build_config,
    substitutions: composeSubstitutions(ref.refName, workflow),
  };
  if (workflow.source_archive) {
    request.sourceArchive = workflow.source_archive;
  }

  const submittedAt = deps.clock.now();
  const buildId = await stage(deps, targetAlias, "submit", () => deps.buildRunner.start(request));
  const submitted = await stage(deps, targetAlias, "describe", () =>
    deps.buildRunner.describe(buildId),
  );
  const submitRecordId = await stage(deps, targetAlias, "journal", () =>
    deps.journal.recordBuildStep({
      parentId,
      pollRecordId: input.pollId,
      timestamp: submittedAt,
      targetAlias,
      triggeringRef: ref,
      status: submitted,
    }),
  );
  logPatrolEvent(deps.log, "chain.step.submitted", targetAlias, {
    ref: ref.refName,
    workflow: workflow.alias,
    build_id: buildId,
    journal_id: submitRecordId,
  });

  await stage(deps, targetAlias, "wait", () => deps.buildRunner.awaitCompletion(buildId));
  const finished = await stage(deps, targetAlias, "describe", () =>
    deps.buildRunner.describe(buildId),
  );
  const completeRecordId = await stage(deps, targetAlias, "journal", () =>
    deps.journal.recordBuildStep({
      parentId: submitRecordId,
      pollRecordId: input.pollId,
      timestamp: deps.clock.now(),
      targetAlias,
      triggeringRef: ref,
      status: finished,
    }),
  );

  const terminal = terminalStatus(finished);
  logPatrolEvent(deps.log, "chain.step.finished", targetAlias, {
    ref: ref.refName,
    workflow: workflow.alias,
    build_id: buildId,
    journal_id: completeRecordId,
    status: terminal,
  });

  if (terminal === null) {
    throw new ChainAbort("status", `build ${buildId} reported no terminal status`);
  }
  if (terminal !== BUILD_SUCCESS_STATUS) {
    throw new ChainAbort("status", `build ${buildId} finished with ${terminal}`);
  }

  return completeRecordId;
}

async function stage<T>(
  deps: ChainDeps,
  targetAlias: string,
  name: ChainStage,
  fn: () => Promise<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    const command = STAGE_COMMANDS[name];
    if (command && err instanceof BuildError) {
      logCommandFailure(deps.log, { target: targetAlias, command, ...extractCommandOutput(err) });
    }
    throw new ChainAbort(name, formatErrorMessage(err));
  }
}

function terminalStatus(status: BuildStatus): string | null {
  const value = status.status;
  return typeof value === "string" && value.length > 0 ? value : null;
}
