import { execa } from "execa";

// =============================================================================
// TYPES
// =============================================================================

export type CommandResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

/** The single capability external processes are reached through. */
export interface CommandRunner {
  run(command: string, args: string[]): Promise<CommandResult>;
}

// =============================================================================
// EXECA
// =============================================================================

export type ExecaCommandRunnerOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

/**
 * Runs commands with execa without rejecting on non-zero exits; callers read
 * `exitCode`. Spawn failures (missing binary) surface as exit code -1.
 */
export function createExecaCommandRunner(options: ExecaCommandRunnerOptions = {}): CommandRunner {
  return {
    async run(command: string, args: string[]): Promise<CommandResult> {
      const res = await execa(command, args, {
        cwd: options.cwd,
        env: options.env ?? process.env,
        stdio: "pipe",
        reject: false,
      });

      return {
        exitCode: typeof res.exitCode === "number" ? res.exitCode : -1,
        stdout: typeof res.stdout === "string" ? res.stdout : "",
        stderr: typeof res.stderr === "string" ? res.stderr : "",
      };
    },
  };
}
