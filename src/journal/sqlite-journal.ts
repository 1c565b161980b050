import { randomUUID } from "node:crypto";
import fs from "node:fs";
import path from "node:path";

import Database from "better-sqlite3";

import type {
  BuildStepId,
  BuildStepRecord,
  BuildStepRecordInput,
  JournalStore,
  LatestPoll,
  PollId,
  PollRecord,
  PollRecordInput,
} from "../app/orchestrator/ports.js";
import { JournalError } from "../core/errors.js";
import type { JsonObject } from "../core/logger.js";
import { isCommitId, isRefName, type ReferenceSnapshot } from "../core/refs.js";
import { parseJsonObject } from "../core/utils.js";

type PollRow = {
  git_poll_uuid: string;
  update_time: string;
  url: string;
  alias: string;
  previous_uuid: string | null;
  refs_json: string;
  ref_filters_json: string;
};

type BuildStepRow = {
  journal_id: number;
  parent_id: number;
  git_poll_uuid: string;
  update_time: string;
  alias: string;
  ref_name: string;
  ref_commit: string;
  cloud_build_status: string;
};

/**
 * Append-only journal of polls and build steps. Every write is an independent
 * INSERT; nothing is ever updated in place.
 */
export class SqliteJournalStore implements JournalStore {
  private closed = false;

  private constructor(private readonly db: Database.Database) {}

  static open(dbPath: string): SqliteJournalStore {
    try {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
      const db = new Database(dbPath);
      db.pragma("journal_mode = WAL");
      const store = new SqliteJournalStore(db);
      store.ensureSchema();
      return store;
    } catch (err) {
      throw new JournalError(`Failed to open journal at ${dbPath}`, err);
    }
  }

  async latestPoll(targetAlias: string): Promise<LatestPoll | null> {
    const row = this.guard("read latest poll", () =>
      this.db
        .prepare(
          `SELECT git_poll_uuid, refs_json FROM git_poll_journal
           WHERE alias = ?
           ORDER BY update_time DESC, rowid DESC LIMIT 1`,
        )
        .get(targetAlias) as Pick<PollRow, "git_poll_uuid" | "refs_json"> | undefined,
    );
    if (!row) return null;

    return { id: row.git_poll_uuid, snapshot: decodeRefs(row.refs_json) };
  }

  async recordPoll(record: PollRecordInput): Promise<PollId> {
    const id = randomUUID();
    this.guard("record poll", () =>
      this.db
        .prepare(
          `INSERT INTO git_poll_journal
             (git_poll_uuid, update_time, url, alias, previous_uuid, refs_json, ref_filters_json)
           VALUES (@git_poll_uuid, @update_time, @url, @alias, @previous_uuid, @refs_json, @ref_filters_json)`,
        )
        .run({
          git_poll_uuid: id,
          update_time: record.timestamp.toISOString(),
          url: record.targetUrl,
          alias: record.targetAlias,
          previous_uuid: record.linkToPrevious ?? null,
          refs_json: JSON.stringify(Object.entries(record.snapshot)),
          ref_filters_json: JSON.stringify(record.refFilters),
        }),
    );
    return id;
  }

  async recordBuildStep(record: BuildStepRecordInput): Promise<BuildStepId> {
    const result = this.guard("record build step", () =>
      this.db
        .prepare(
          `INSERT INTO cloud_build_journal
             (parent_id, git_poll_uuid, update_time, alias, ref_name, ref_commit, cloud_build_status)
           VALUES (@parent_id, @git_poll_uuid, @update_time, @alias, @ref_name, @ref_commit, @cloud_build_status)`,
        )
        .run({
          parent_id: record.parentId,
          git_poll_uuid: record.pollRecordId,
          update_time: record.timestamp.toISOString(),
          alias: record.targetAlias,
          ref_name: record.triggeringRef.refName,
          ref_commit: record.triggeringRef.commit,
          cloud_build_status: JSON.stringify(record.status),
        }),
    );
    return Number(result.lastInsertRowid);
  }

  /** Most recent polls first. */
  listPolls(targetAlias: string, limit = 20): PollRecord[] {
    const rows = this.guard("list polls", () =>
      this.db
        .prepare(
          `SELECT * FROM git_poll_journal
           WHERE alias = ?
           ORDER BY update_time DESC, rowid DESC LIMIT ?`,
        )
        .all(targetAlias, limit) as PollRow[],
    );

    return rows.map((row) => {
      const record: PollRecord = {
        id: row.git_poll_uuid,
        timestamp: new Date(row.update_time),
        targetUrl: row.url,
        targetAlias: row.alias,
        snapshot: decodeRefs(row.refs_json),
        refFilters: decodeStringArray(row.ref_filters_json),
      };
      if (row.previous_uuid) {
        record.linkToPrevious = row.previous_uuid;
      }
      return record;
    });
  }

  /** Build steps triggered by one poll, in insertion order. */
  listBuildSteps(pollId: PollId): BuildStepRecord[] {
    const rows = this.guard("list build steps", () =>
      this.db
        .prepare(`SELECT * FROM cloud_build_journal WHERE git_poll_uuid = ? ORDER BY journal_id`)
        .all(pollId) as BuildStepRow[],
    );

    return rows.map((row) => {
      const status: JsonObject = parseJsonObject(row.cloud_build_status) ?? {};
      return {
        id: row.journal_id,
        parentId: row.parent_id,
        pollRecordId: row.git_poll_uuid,
        timestamp: new Date(row.update_time),
        targetAlias: row.alias,
        triggeringRef: { refName: row.ref_name, commit: row.ref_commit },
        status: { ...status, id: typeof status.id === "string" ? status.id : "" },
      };
    });
  }

  close(): void {
    if (this.closed) return;
    this.db.close();
    this.closed = true;
  }

  private guard<T>(action: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw new JournalError(`Failed to ${action}`, err);
    }
  }

  private ensureSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS git_poll_journal (
        git_poll_uuid TEXT PRIMARY KEY,
        update_time TEXT NOT NULL,
        url TEXT NOT NULL,
        alias TEXT NOT NULL,
        previous_uuid TEXT,
        refs_json TEXT NOT NULL,
        ref_filters_json TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_git_poll_alias_time ON git_poll_journal (alias, update_time);

      CREATE TABLE IF NOT EXISTS cloud_build_journal (
        journal_id INTEGER PRIMARY KEY AUTOINCREMENT,
        parent_id INTEGER NOT NULL,
        git_poll_uuid TEXT NOT NULL,
        update_time TEXT NOT NULL,
        alias TEXT NOT NULL,
        ref_name TEXT NOT NULL,
        ref_commit TEXT NOT NULL,
        cloud_build_status TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_cloud_build_poll ON cloud_build_journal (git_poll_uuid);
    `);
  }
}

// Stored as [[refname, commit], ...]; malformed pairs are dropped.
function decodeRefs(raw: string): ReferenceSnapshot {
  const snapshot: Record<string, string> = {};
  for (const entry of safeParseArray(raw)) {
    if (!Array.isArray(entry) || entry.length !== 2) continue;
    const [refName, commit]: unknown[] = entry;
    if (typeof refName === "string" && typeof commit === "string") {
      if (isRefName(refName) && isCommitId(commit)) {
        snapshot[refName] = commit;
      }
    }
  }
  return snapshot;
}

function decodeStringArray(raw: string): string[] {
  return safeParseArray(raw).filter((value): value is string => typeof value === "string");
}

function safeParseArray(raw: string): unknown[] {
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed : [];
  } catch {
    return [];
  }
}
