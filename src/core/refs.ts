/*
Purpose: reference snapshots, `git ls-remote` output parsing and the change predicate.
Assumptions: commits are full 40-char lowercase SHA-1 hex; ref names start with refs/.
Usage: computeRefDelta(previous, current); parseLsRemoteOutput(stdout).
*/

// =============================================================================
// TYPES
// =============================================================================

/** Fully-qualified ref name -> commit id. Replaced wholesale on each poll, never mutated. */
export type ReferenceSnapshot = Readonly<Record<string, string>>;

export type TriggeringRef = {
  refName: string;
  commit: string;
};

export const EMPTY_SNAPSHOT: ReferenceSnapshot = Object.freeze({});

// The exact grammar of a ref name is involved; since this parses git's own
// output we assume it is well formed and only bound the length.
const LS_REMOTE_LINE_REGEX = /^([0-9a-f]{40})\s+(refs\/\S{1,64})$/;

const COMMIT_REGEX = /^[0-9a-f]{40}$/;
const REF_NAME_REGEX = /^refs\/\S{1,64}$/;

// =============================================================================
// PARSING
// =============================================================================

/** Lines that do not look like `<commit><whitespace><refname>` are ignored. */
export function parseLsRemoteOutput(output: string): ReferenceSnapshot {
  const snapshot: Record<string, string> = {};
  for (const line of output.split(/\r?\n/)) {
    const match = LS_REMOTE_LINE_REGEX.exec(line);
    if (match) {
      snapshot[match[2]] = match[1];
    }
  }
  return snapshot;
}

export function isCommitId(value: string): boolean {
  return COMMIT_REGEX.test(value);
}

export function isRefName(value: string): boolean {
  return REF_NAME_REGEX.test(value);
}

// =============================================================================
// DELTA
// =============================================================================

/**
 * New or moved refs: every entry of `current` that is absent from `previous`
 * or points at a different commit. Deleted refs never appear.
 */
export function computeRefDelta(
  previous: ReferenceSnapshot,
  current: ReferenceSnapshot,
): ReferenceSnapshot {
  const delta: Record<string, string> = {};
  for (const [refName, commit] of Object.entries(current)) {
    if (!Object.hasOwn(previous, refName) || previous[refName] !== commit) {
      delta[refName] = commit;
    }
  }
  return delta;
}

export function snapshotEntries(snapshot: ReferenceSnapshot): TriggeringRef[] {
  return Object.entries(snapshot).map(([refName, commit]) => ({ refName, commit }));
}

export function isEmptySnapshot(snapshot: ReferenceSnapshot): boolean {
  return Object.keys(snapshot).length === 0;
}

// =============================================================================
// DERIVED SUBSTITUTIONS
// =============================================================================

const TAG_PREFIX = "refs/tags/";
const BRANCH_PREFIX = "refs/heads/";

/** TAG_NAME / BRANCH_NAME the way triggered builds see them; empty for other refs. */
export function deriveRefSubstitutions(refName: string): Record<string, string> {
  if (refName.startsWith(TAG_PREFIX)) {
    return { TAG_NAME: refName.slice(TAG_PREFIX.length) };
  }
  if (refName.startsWith(BRANCH_PREFIX)) {
    return { BRANCH_NAME: refName.slice(BRANCH_PREFIX.length) };
  }
  return {};
}
