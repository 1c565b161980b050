import os from "node:os";
import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

export type PathsContext = {
  refwatchHome: string;
};

export type ResolveRefwatchHomeOptions = {
  refwatchHome?: string;
};


// =============================================================================
// CONTEXT
// =============================================================================

export function resolveRefwatchHome(opts: ResolveRefwatchHomeOptions = {}): string {
  if (opts.refwatchHome) {
    return path.resolve(opts.refwatchHome);
  }

  if (process.env.REFWATCH_HOME) {
    return path.resolve(process.env.REFWATCH_HOME);
  }

  return path.join(os.homedir(), ".refwatch");
}

export function createPathsContext(opts: ResolveRefwatchHomeOptions = {}): PathsContext {
  return { refwatchHome: resolveRefwatchHome(opts) };
}


// =============================================================================
// PATH HELPERS
// =============================================================================

export function defaultJournalPath(paths: PathsContext): string {
  return path.join(paths.refwatchHome, "journal.sqlite");
}

export function logsDir(paths: PathsContext): string {
  return path.join(paths.refwatchHome, "logs");
}

export function serviceLogPath(paths: PathsContext): string {
  return path.join(logsDir(paths), "refwatch.jsonl");
}
