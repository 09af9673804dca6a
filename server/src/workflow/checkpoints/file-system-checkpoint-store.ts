/**
 * Checkpoint store backed by JSON files.
 *
 * Layout: `<root>/checkpoints/<executionId>/<checkpointId>.json`
 *
 * Writes go through a single mutex so a save never interleaves with a
 * delete or cleanup of the same directory. Each file also records a
 * per-execution `sequence`, which orders checkpoints saved within the same
 * millisecond.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { Mutex } from "async-mutex";
import type { CheckpointData } from "@flowgate/types";
import type { CheckpointStore } from "./checkpoint-store.js";
import { toCheckpointData } from "./checkpoint-serializer.js";

const FILE_EXTENSION = ".json";

interface StoredCheckpoint {
  checkpoint: CheckpointData;
  sequence: number;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class FileSystemCheckpointStore implements CheckpointStore {
  private readonly checkpointsDir: string;
  private readonly lock = new Mutex();

  /**
   * @param rootDirectory - Directory that will hold a `checkpoints/` folder
   */
  constructor(rootDirectory: string) {
    this.checkpointsDir = path.join(rootDirectory, "checkpoints");
  }

  private executionDir(executionId: string): string {
    return path.join(this.checkpointsDir, sanitize(executionId));
  }

  private checkpointPath(executionId: string, checkpointId: string): string {
    return path.join(
      this.executionDir(executionId),
      `${sanitize(checkpointId)}${FILE_EXTENSION}`
    );
  }

  async save(executionId: string, checkpoint: CheckpointData): Promise<void> {
    const record: CheckpointData = { ...checkpoint, executionId };
    await this.lock.runExclusive(async () => {
      const dir = this.executionDir(executionId);
      await fs.mkdir(dir, { recursive: true });
      const stored = await this.readAll(dir);
      const sequence =
        stored.reduce((max, entry) => Math.max(max, entry.sequence), 0) + 1;
      const target = this.checkpointPath(executionId, checkpoint.checkpointId);
      const temp = `${target}.tmp`;
      await fs.writeFile(
        temp,
        JSON.stringify({ ...record, sequence }, null, 2),
        "utf8"
      );
      await fs.rename(temp, target);
    });
  }

  async load(
    executionId: string,
    checkpointId?: string
  ): Promise<CheckpointData | null> {
    if (checkpointId === undefined) {
      return this.getLatestForExecution(executionId);
    }
    const entry = await this.readEntry(
      this.checkpointPath(executionId, checkpointId)
    );
    return entry?.checkpoint ?? null;
  }

  async get(checkpointId: string): Promise<CheckpointData | null> {
    const found = await this.findCheckpointFile(checkpointId);
    if (!found) {
      return null;
    }
    return (await this.readEntry(found))?.checkpoint ?? null;
  }

  async exists(checkpointId: string): Promise<boolean> {
    return (await this.findCheckpointFile(checkpointId)) !== null;
  }

  async delete(checkpointId: string): Promise<boolean> {
    return this.lock.runExclusive(async () => {
      const found = await this.findCheckpointFile(checkpointId);
      if (!found) {
        return false;
      }
      await fs.rm(found, { force: true });
      await this.removeIfEmpty(path.dirname(found));
      return true;
    });
  }

  async getLatestForExecution(
    executionId: string
  ): Promise<CheckpointData | null> {
    const all = await this.getAllForExecution(executionId);
    return all.length > 0 ? all[all.length - 1] : null;
  }

  async getAllForExecution(executionId: string): Promise<CheckpointData[]> {
    const stored = await this.readAll(this.executionDir(executionId));
    return stored
      .sort((a, b) => a.sequence - b.sequence)
      .map((entry) => entry.checkpoint);
  }

  async deleteAllForExecution(executionId: string): Promise<number> {
    return this.lock.runExclusive(async () => {
      const dir = this.executionDir(executionId);
      const files = await this.listFiles(dir);
      await fs.rm(dir, { recursive: true, force: true });
      return files.length;
    });
  }

  async cleanupOlderThan(maxAgeMs: number): Promise<number> {
    const cutoff = Date.now() - maxAgeMs;
    return this.lock.runExclusive(async () => {
      let removed = 0;
      for (const dir of await this.listExecutionDirs()) {
        for (const file of await this.listFiles(dir)) {
          const entry = await this.readEntry(file);
          if (entry && Date.parse(entry.checkpoint.createdAt) < cutoff) {
            await fs.rm(file, { force: true });
            removed++;
          }
        }
        await this.removeIfEmpty(dir);
      }
      if (removed > 0) {
        console.log(`[CheckpointStore] Removed ${removed} expired checkpoint(s)`);
      }
      return removed;
    });
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private async readAll(dir: string): Promise<StoredCheckpoint[]> {
    const stored: StoredCheckpoint[] = [];
    for (const file of await this.listFiles(dir)) {
      const entry = await this.readEntry(file);
      if (entry) {
        stored.push(entry);
      }
    }
    return stored;
  }

  private async readEntry(file: string): Promise<StoredCheckpoint | null> {
    let content: string;
    try {
      content = await fs.readFile(file, "utf8");
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      parsed = undefined;
    }
    const checkpoint = toCheckpointData(parsed);
    if (!checkpoint) {
      console.warn(`[CheckpointStore] Ignoring unreadable checkpoint file ${file}`);
      return null;
    }
    const sequence =
      typeof parsed === "object" &&
      parsed !== null &&
      "sequence" in parsed &&
      typeof parsed.sequence === "number"
        ? parsed.sequence
        : 0;
    return { checkpoint, sequence };
  }

  private async listExecutionDirs(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.checkpointsDir, {
        withFileTypes: true,
      });
      return entries
        .filter((entry) => entry.isDirectory())
        .map((entry) => path.join(this.checkpointsDir, entry.name));
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }
  }

  private async listFiles(dir: string): Promise<string[]> {
    try {
      const entries = await fs.readdir(dir);
      return entries
        .filter((name) => name.endsWith(FILE_EXTENSION))
        .map((name) => path.join(dir, name));
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }
  }

  private async findCheckpointFile(checkpointId: string): Promise<string | null> {
    const fileName = `${sanitize(checkpointId)}${FILE_EXTENSION}`;
    for (const dir of await this.listExecutionDirs()) {
      const candidate = path.join(dir, fileName);
      try {
        await fs.access(candidate);
        return candidate;
      } catch (error) {
        if (!isNotFound(error)) {
          throw error;
        }
      }
    }
    return null;
  }

  private async removeIfEmpty(dir: string): Promise<void> {
    const remaining = await fs.readdir(dir).catch((error: unknown) => {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    });
    if (remaining !== null && remaining.length === 0) {
      await fs.rmdir(dir);
    }
  }
}

/**
 * Keep ids usable as file names.
 */
function sanitize(id: string): string {
  return id.replace(/[^A-Za-z0-9._-]/g, "_");
}
