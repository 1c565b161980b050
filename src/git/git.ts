import type { CommandRunner } from "../core/command-runner.js";
import { GitError } from "../core/errors.js";
import { parseLsRemoteOutput, type ReferenceSnapshot } from "../core/refs.js";

export async function git(
  runner: CommandRunner,
  args: string[],
): Promise<{ stdout: string; stderr: string }> {
  const res = await runner.run("git", args);
  if (res.exitCode !== 0) {
    throw new GitError(`git ${args[0] ?? ""} returned ${res.exitCode}: ${res.stderr.trim()}`, {
      exitCode: res.exitCode,
      stdout: res.stdout,
      stderr: res.stderr,
    });
  }
  return { stdout: res.stdout, stderr: res.stderr };
}

/**
 * Current refs of a remote repository via `git ls-remote --refs`, optionally
 * narrowed by ref filter patterns. Peeled tag entries are excluded by --refs.
 */
export async function lsRemoteRefs(
  runner: CommandRunner,
  url: string,
  refFilters: readonly string[] = [],
): Promise<ReferenceSnapshot> {
  const { stdout } = await git(runner, ["ls-remote", "--refs", url, ...refFilters]);
  return parseLsRemoteOutput(stdout);
}

export async function isValidRefFilter(runner: CommandRunner, refFilter: string): Promise<boolean> {
  const res = await runner.run("git", [
    "check-ref-format",
    "--allow-onelevel",
    "--refspec-pattern",
    refFilter,
  ]);
  return res.exitCode === 0;
}
