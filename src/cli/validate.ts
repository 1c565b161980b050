import type { ReferenceSource } from "../app/orchestrator/ports.js";
import { createGitReferenceSource } from "../app/orchestrator/refs/git-reference-source.js";
import { validateTarget } from "../app/orchestrator/supervisor.js";
import { createExecaCommandRunner } from "../core/command-runner.js";
import { loadPatrolConfig } from "../core/config-loader.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

export type ValidateCommandOptions = {
  configPath: string;
};

export type ValidateCommandDeps = {
  referenceSource?: ReferenceSource;
};

/** Prints one line per target; throws when any target would be rejected at startup. */
export async function validateCommand(
  opts: ValidateCommandOptions,
  deps: ValidateCommandDeps = {},
): Promise<void> {
  const config = loadPatrolConfig(opts.configPath);
  const referenceSource =
    deps.referenceSource ?? createGitReferenceSource(createExecaCommandRunner());

  const results = await Promise.all(
    config.targets.map(async (target) => ({
      target,
      validation: await validateTarget({ referenceSource }, target, config.max_ref_filters),
    })),
  );

  const rejected: string[] = [];
  for (const { target, validation } of results) {
    if (validation.ok) {
      console.log(
        `ok       ${target.alias}: ${target.ref_filters.length} filter(s), ${target.workflows.length} workflow(s)`,
      );
    } else {
      rejected.push(target.alias);
      console.log(`rejected ${target.alias}: ${validation.reason}`);
    }
  }

  if (rejected.length > 0) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Config has rejected targets.",
      message: `Rejected: ${rejected.join(", ")}.`,
      hint: `Keep at most ${config.max_ref_filters} ref filters per target and check their syntax with \`git check-ref-format --refspec-pattern\`.`,
    });
  }
}
