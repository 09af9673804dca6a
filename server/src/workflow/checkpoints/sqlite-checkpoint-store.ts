/**
 * Checkpoint store backed by a better-sqlite3 database.
 */

import Database from "better-sqlite3";
import type { CheckpointData } from "@flowgate/types";
import {
  ALL_INDEXES,
  ALL_TABLES,
  DB_CONFIG,
} from "@flowgate/types/schema";
import type { CheckpointStore } from "./checkpoint-store.js";

interface CheckpointRow {
  checkpoint_id: string;
  execution_id: string;
  workflow_name: string;
  current_state_id: string | null;
  serialized_state: string | null;
  input: string | null;
  created_at: string;
  execution_started_at: string | null;
  metadata: string | null;
  seq: number;
}

function parseMetadata(json: string | null): Record<string, string> | undefined {
  if (json === null) {
    return undefined;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return undefined;
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return undefined;
  }
  const metadata: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === "string") {
      metadata[key] = value;
    }
  }
  return metadata;
}

function rowToCheckpoint(row: CheckpointRow): CheckpointData {
  return {
    checkpointId: row.checkpoint_id,
    executionId: row.execution_id,
    workflowName: row.workflow_name,
    currentStateId: row.current_state_id ?? undefined,
    serializedState: row.serialized_state ?? undefined,
    input: row.input ?? undefined,
    createdAt: row.created_at,
    executionStartedAt: row.execution_started_at ?? undefined,
    metadata: parseMetadata(row.metadata),
  };
}

/**
 * Open (or create) a checkpoint database and apply the schema.
 *
 * @param dbPath - File path, or ":memory:" for a throwaway database
 */
export function initCheckpointDatabase(dbPath: string): Database.Database {
  const db = new Database(dbPath);
  db.exec(DB_CONFIG);
  for (const table of ALL_TABLES) {
    db.exec(table);
  }
  for (const indexes of ALL_INDEXES) {
    db.exec(indexes);
  }
  return db;
}

export class SqliteCheckpointStore implements CheckpointStore {
  constructor(private readonly db: Database.Database) {}

  async save(executionId: string, checkpoint: CheckpointData): Promise<void> {
    const next = this.db
      .prepare<[string], { seq: number | null }>(
        `SELECT MAX(seq) AS seq FROM checkpoints WHERE execution_id = ?`
      )
      .get(executionId);

    this.db
      .prepare(
        `INSERT OR REPLACE INTO checkpoints (
          checkpoint_id,
          execution_id,
          workflow_name,
          current_state_id,
          serialized_state,
          input,
          created_at,
          execution_started_at,
          metadata,
          seq
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        checkpoint.checkpointId,
        executionId,
        checkpoint.workflowName,
        checkpoint.currentStateId ?? null,
        checkpoint.serializedState ?? null,
        checkpoint.input ?? null,
        checkpoint.createdAt,
        checkpoint.executionStartedAt ?? null,
        checkpoint.metadata ? JSON.stringify(checkpoint.metadata) : null,
        (next?.seq ?? 0) + 1
      );
  }

  async load(
    executionId: string,
    checkpointId?: string
  ): Promise<CheckpointData | null> {
    if (checkpointId === undefined) {
      return this.getLatestForExecution(executionId);
    }
    const row = this.db
      .prepare<[string, string], CheckpointRow>(
        `SELECT * FROM checkpoints WHERE execution_id = ? AND checkpoint_id = ?`
      )
      .get(executionId, checkpointId);
    return row ? rowToCheckpoint(row) : null;
  }

  async get(checkpointId: string): Promise<CheckpointData | null> {
    const row = this.db
      .prepare<[string], CheckpointRow>(
        `SELECT * FROM checkpoints WHERE checkpoint_id = ?`
      )
      .get(checkpointId);
    return row ? rowToCheckpoint(row) : null;
  }

  async exists(checkpointId: string): Promise<boolean> {
    const row = this.db
      .prepare<[string], { found: number }>(
        `SELECT 1 AS found FROM checkpoints WHERE checkpoint_id = ?`
      )
      .get(checkpointId);
    return row !== undefined;
  }

  async delete(checkpointId: string): Promise<boolean> {
    const result = this.db
      .prepare(`DELETE FROM checkpoints WHERE checkpoint_id = ?`)
      .run(checkpointId);
    return result.changes > 0;
  }

  async getLatestForExecution(
    executionId: string
  ): Promise<CheckpointData | null> {
    const row = this.db
      .prepare<[string], CheckpointRow>(
        `SELECT * FROM checkpoints
         WHERE execution_id = ?
         ORDER BY seq DESC
         LIMIT 1`
      )
      .get(executionId);
    return row ? rowToCheckpoint(row) : null;
  }

  async getAllForExecution(executionId: string): Promise<CheckpointData[]> {
    return this.db
      .prepare<[string], CheckpointRow>(
        `SELECT * FROM checkpoints WHERE execution_id = ? ORDER BY seq ASC`
      )
      .all(executionId)
      .map(rowToCheckpoint);
  }

  async deleteAllForExecution(executionId: string): Promise<number> {
    const result = this.db
      .prepare(`DELETE FROM checkpoints WHERE execution_id = ?`)
      .run(executionId);
    return result.changes;
  }

  async cleanupOlderThan(maxAgeMs: number): Promise<number> {
    const cutoff = new Date(Date.now() - maxAgeMs).toISOString();
    const result = this.db
      .prepare(`DELETE FROM checkpoints WHERE created_at < ?`)
      .run(cutoff);
    return result.changes;
  }
}
