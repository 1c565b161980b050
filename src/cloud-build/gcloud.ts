import { z } from "zod";

import type { CommandRunner } from "../core/command-runner.js";
import { BuildError } from "../core/errors.js";
import { parseJsonObject } from "../core/utils.js";

import type { BuildRequest, BuildStatus } from "../app/orchestrator/ports.js";

// `gcloud builds submit --async` ends its output with a line starting with the
// build id, e.g. 16fd2706-8baf-433b-82eb-8c7fada847da.
const ASYNC_BUILD_ID_REGEX = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/;

// Only the fields the chain reads are checked; the rest is journaled as-is.
const BuildIdentitySchema = z.object({
  id: z.string().min(1),
  status: z.string().optional(),
});

export async function gcloud(
  runner: CommandRunner,
  args: string[],
): Promise<{ stdout: string; stderr: string }> {
  const res = await runner.run("gcloud", args);
  if (res.exitCode !== 0) {
    const label = args.slice(0, 2).join(" ");
    throw new BuildError(`gcloud ${label} returned ${res.exitCode}: ${res.stderr.trim()}`, {
      exitCode: res.exitCode,
      stdout: res.stdout,
      stderr: res.stderr,
    });
  }
  return { stdout: res.stdout, stderr: res.stderr };
}

export function buildSubmitArgs(request: BuildRequest): string[] {
  const args = ["builds", "submit", "--async", `--config=${request.configPath}`];

  const substitutions = Object.entries(request.substitutions).map(([key, value]) => `${key}=${value}`);
  if (substitutions.length > 0) {
    args.push(`--substitutions=${substitutions.join(",")}`);
  }

  args.push(request.sourceArchive ?? "--no-source");
  return args;
}

export function parseAsyncBuildId(stdout: string): string | null {
  const lines = stdout.split(/\r?\n/).filter((line) => line.trim().length > 0);
  const lastLine = lines.at(-1);
  if (!lastLine) return null;

  const match = ASYNC_BUILD_ID_REGEX.exec(lastLine.trim());
  return match ? match[0] : null;
}

export async function submitBuild(runner: CommandRunner, request: BuildRequest): Promise<string> {
  const { stdout } = await gcloud(runner, buildSubmitArgs(request));
  const buildId = parseAsyncBuildId(stdout);
  if (!buildId) {
    throw new BuildError("gcloud builds submit did not report a build id", {
      stdout,
      stderr: "",
    });
  }
  return buildId;
}

/** Streams the build log with output discarded; returns once the build finishes. */
export async function waitForBuild(runner: CommandRunner, buildId: string): Promise<void> {
  await gcloud(runner, ["builds", "log", "--stream", "--no-user-output-enabled", buildId]);
}

export async function describeBuild(runner: CommandRunner, buildId: string): Promise<BuildStatus> {
  const { stdout, stderr } = await gcloud(runner, ["builds", "describe", "--format=json", buildId]);

  const status = parseJsonObject(stdout);
  if (!status) {
    throw new BuildError(`gcloud builds describe ${buildId} did not return a JSON object`, {
      stdout,
      stderr,
    });
  }

  const identity = BuildIdentitySchema.safeParse(status);
  if (!identity.success) {
    throw new BuildError(`gcloud builds describe ${buildId} returned no build id`, {
      stdout,
      stderr,
    });
  }

  return { ...status, id: identity.data.id };
}
