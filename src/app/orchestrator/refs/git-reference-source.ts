/**
 * Git-backed reference source.
 * Purpose: map ReferenceSource calls onto the git command helpers.
 * Assumptions: git is on PATH and can reach the remotes (credentials are ambient).
 * Usage: createGitReferenceSource(createExecaCommandRunner()) and inject into PatrolPorts.
 */

import type { CommandRunner } from "../../../core/command-runner.js";
import { isValidRefFilter, lsRemoteRefs } from "../../../git/git.js";
import type { ReferenceSource } from "../ports.js";


// =============================================================================
// PUBLIC API
// =============================================================================

export function createGitReferenceSource(runner: CommandRunner): ReferenceSource {
  return {
    listReferences: (url, refFilters) => lsRemoteRefs(runner, url, refFilters),
    validateFilter: (refFilter) => isValidRefFilter(runner, refFilter),
  };
}
