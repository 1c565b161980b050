/**
 * Cloud Build-backed build runner.
 * Purpose: map BuildRunner calls onto the gcloud command helpers.
 * Assumptions: gcloud is on PATH with an active account and project.
 * Usage: createCloudBuildRunner(createExecaCommandRunner()) and inject into PatrolPorts.
 */

import { describeBuild, submitBuild, waitForBuild } from "../../../cloud-build/gcloud.js";
import type { CommandRunner } from "../../../core/command-runner.js";
import type { BuildRunner } from "../ports.js";


// =============================================================================
// PUBLIC API
// =============================================================================

export function createCloudBuildRunner(runner: CommandRunner): BuildRunner {
  return {
    start: (request) => submitBuild(runner, request),
    awaitCompletion: (buildId) => waitForBuild(runner, buildId),
    describe: (buildId) => describeBuild(runner, buildId),
  };
}
