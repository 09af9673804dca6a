import type { CheckpointData } from "@flowgate/types";
import type { CheckpointStore } from "./checkpoint-store.js";

/**
 * Process-local checkpoint store. Checkpoints are lost on exit.
 */
export class InMemoryCheckpointStore implements CheckpointStore {
  // Per execution, in save order
  private readonly byExecution = new Map<string, CheckpointData[]>();

  async save(executionId: string, checkpoint: CheckpointData): Promise<void> {
    const list = this.byExecution.get(executionId) ?? [];
    const copy = { ...checkpoint, executionId };
    const existing = list.findIndex(
      (c) => c.checkpointId === checkpoint.checkpointId
    );
    if (existing >= 0) {
      list.splice(existing, 1);
    }
    list.push(copy);
    this.byExecution.set(executionId, list);
  }

  async load(
    executionId: string,
    checkpointId?: string
  ): Promise<CheckpointData | null> {
    if (checkpointId === undefined) {
      return this.getLatestForExecution(executionId);
    }
    const list = this.byExecution.get(executionId) ?? [];
    return list.find((c) => c.checkpointId === checkpointId) ?? null;
  }

  async get(checkpointId: string): Promise<CheckpointData | null> {
    for (const list of this.byExecution.values()) {
      const found = list.find((c) => c.checkpointId === checkpointId);
      if (found) {
        return found;
      }
    }
    return null;
  }

  async exists(checkpointId: string): Promise<boolean> {
    return (await this.get(checkpointId)) !== null;
  }

  async delete(checkpointId: string): Promise<boolean> {
    for (const [executionId, list] of this.byExecution) {
      const index = list.findIndex((c) => c.checkpointId === checkpointId);
      if (index >= 0) {
        list.splice(index, 1);
        if (list.length === 0) {
          this.byExecution.delete(executionId);
        }
        return true;
      }
    }
    return false;
  }

  async getLatestForExecution(
    executionId: string
  ): Promise<CheckpointData | null> {
    const list = this.byExecution.get(executionId);
    return list && list.length > 0 ? list[list.length - 1] : null;
  }

  async getAllForExecution(executionId: string): Promise<CheckpointData[]> {
    return [...(this.byExecution.get(executionId) ?? [])];
  }

  async deleteAllForExecution(executionId: string): Promise<number> {
    const count = this.byExecution.get(executionId)?.length ?? 0;
    this.byExecution.delete(executionId);
    return count;
  }

  async cleanupOlderThan(maxAgeMs: number): Promise<number> {
    const cutoff = Date.now() - maxAgeMs;
    let removed = 0;
    for (const [executionId, list] of this.byExecution) {
      const kept = list.filter((c) => Date.parse(c.createdAt) >= cutoff);
      removed += list.length - kept.length;
      if (kept.length === 0) {
        this.byExecution.delete(executionId);
      } else {
        this.byExecution.set(executionId, kept);
      }
    }
    return removed;
  }
}
