/*
Purpose: core error types used across polling, build chains and CLI output.
Assumptions: UserFacingError instances are safe to display to end users.
Usage: throw new GitError("...", { stdout, stderr }); throw new UserFacingError({ code, title, message, hint, cause }).
*/

import { isRecord } from "./utils.js";

// =============================================================================
// CORE ERRORS
// =============================================================================

export class OrchestratorError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "OrchestratorError";
  }
}

export class ConfigError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class GitError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "GitError";
  }
}

export class BuildError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "BuildError";
  }
}

export class JournalError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "JournalError";
  }
}

// =============================================================================
// COMMAND OUTPUT
// =============================================================================

export type CommandOutput = {
  exitCode?: number;
  stdout: string;
  stderr: string;
};

export function extractCommandOutput(err: OrchestratorError): CommandOutput {
  const cause = err.cause;
  if (isRecord(cause)) {
    const output: CommandOutput = {
      stdout: typeof cause.stdout === "string" ? cause.stdout : "",
      stderr: typeof cause.stderr === "string" ? cause.stderr : "",
    };
    if (typeof cause.exitCode === "number") output.exitCode = cause.exitCode;
    return output;
  }
  return { stdout: "", stderr: "" };
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  git: "GIT_ERROR",
  build: "BUILD_ERROR",
  journal: "JOURNAL_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly next?: string;
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}
