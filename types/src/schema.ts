/**
 * SQLite schema definition for flowgate checkpoints
 * Shared between CLI and server packages
 */

export const SCHEMA_VERSION = "1.0";

/**
 * Database configuration SQL
 */
export const DB_CONFIG = `
-- Enable WAL mode for better concurrency
PRAGMA journal_mode=WAL;

PRAGMA synchronous=NORMAL;
PRAGMA temp_store=MEMORY;
`;

export const CHECKPOINTS_TABLE = `
CREATE TABLE IF NOT EXISTS checkpoints (
    checkpoint_id TEXT PRIMARY KEY,
    execution_id TEXT NOT NULL,
    workflow_name TEXT NOT NULL,
    current_state_id TEXT,
    serialized_state TEXT,
    input TEXT,
    created_at TEXT NOT NULL,
    execution_started_at TEXT,
    metadata TEXT,
    seq INTEGER NOT NULL
);
`;

export const CHECKPOINTS_INDEXES = `
CREATE INDEX IF NOT EXISTS idx_checkpoints_execution ON checkpoints(execution_id, seq);
CREATE INDEX IF NOT EXISTS idx_checkpoints_created_at ON checkpoints(created_at);
`;

export const ALL_TABLES = [CHECKPOINTS_TABLE];

export const ALL_INDEXES = [CHECKPOINTS_INDEXES];
