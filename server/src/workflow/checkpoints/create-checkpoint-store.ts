import * as fs from "fs";
import * as path from "path";
import type { CheckpointBackend } from "@flowgate/types";
import type { CheckpointStore } from "./checkpoint-store.js";
import { FileSystemCheckpointStore } from "./file-system-checkpoint-store.js";
import { InMemoryCheckpointStore } from "./memory-checkpoint-store.js";
import {
  SqliteCheckpointStore,
  initCheckpointDatabase,
} from "./sqlite-checkpoint-store.js";

export const SQLITE_CHECKPOINT_FILE = "checkpoints.db";

/**
 * Build the configured checkpoint store rooted at `directory`.
 */
export function createCheckpointStore(
  backend: CheckpointBackend,
  directory: string
): CheckpointStore {
  switch (backend) {
    case "memory":
      return new InMemoryCheckpointStore();
    case "filesystem":
      return new FileSystemCheckpointStore(directory);
    case "sqlite":
      fs.mkdirSync(directory, { recursive: true });
      return new SqliteCheckpointStore(
        initCheckpointDatabase(path.join(directory, SQLITE_CHECKPOINT_FILE))
      );
  }
}
