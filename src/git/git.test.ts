import { describe, expect, it } from "vitest";

import { FakeCommandRunner } from "../app/orchestrator/__tests__/fakes.js";
import { GitError, extractCommandOutput } from "../core/errors.js";

import { isValidRefFilter, lsRemoteRefs } from "./git.js";

const A = "a".repeat(40);
const B = "b".repeat(40);

describe("lsRemoteRefs", () => {
  it("lists refs with the filters appended", async () => {
    const runner = new FakeCommandRunner();
    runner.respond("git ls-remote", {
      stdout: `${A}\trefs/heads/main\n${B}\trefs/tags/v1\n`,
    });

    const snapshot = await lsRemoteRefs(runner, "https://git.example.test/repo.git", [
      "refs/heads/main",
      "refs/tags/*",
    ]);

    expect(snapshot).toEqual({ "refs/heads/main": A, "refs/tags/v1": B });
    expect(runner.calls).toEqual([
      {
        command: "git",
        args: [
          "ls-remote",
          "--refs",
          "https://git.example.test/repo.git",
          "refs/heads/main",
          "refs/tags/*",
        ],
      },
    ]);
  });

  it("throws GitError carrying the command output on a non-zero exit", async () => {
    const runner = new FakeCommandRunner();
    runner.respond("git ls-remote", {
      exitCode: 128,
      stderr: "fatal: could not read from remote repository\n",
    });

    const error = await lsRemoteRefs(runner, "https://git.example.test/repo.git").catch(
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(GitError);
    if (!(error instanceof GitError)) return;
    expect(error.message).toBe("git ls-remote returned 128: fatal: could not read from remote repository");
    expect(extractCommandOutput(error)).toEqual({
      exitCode: 128,
      stdout: "",
      stderr: "fatal: could not read from remote repository\n",
    });
  });
});

describe("isValidRefFilter", () => {
  it("checks the pattern with git check-ref-format", async () => {
    const runner = new FakeCommandRunner();

    expect(await isValidRefFilter(runner, "refs/tags/*")).toBe(true);
    expect(runner.calls[0]?.args).toEqual([
      "check-ref-format",
      "--allow-onelevel",
      "--refspec-pattern",
      "refs/tags/*",
    ]);
  });

  it("treats a non-zero exit as invalid", async () => {
    const runner = new FakeCommandRunner();
    runner.respond("git check-ref-format", { exitCode: 1 });

    expect(await isValidRefFilter(runner, "refs/heads/bad..name")).toBe(false);
  });
});
