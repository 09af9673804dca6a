import type { CheckpointData } from "@flowgate/types";

/**
 * Storage contract for execution checkpoints.
 *
 * An execution accumulates checkpoints over time; "latest" means the most
 * recently saved one. Implementations assume a single writer per execution.
 */
export interface CheckpointStore {
  /**
   * Persist a checkpoint under its execution id.
   */
  save(executionId: string, checkpoint: CheckpointData): Promise<void>;

  /**
   * Load a specific checkpoint, or the latest one when no id is given.
   */
  load(
    executionId: string,
    checkpointId?: string
  ): Promise<CheckpointData | null>;

  /**
   * Look a checkpoint up by its own id.
   */
  get(checkpointId: string): Promise<CheckpointData | null>;

  exists(checkpointId: string): Promise<boolean>;

  /**
   * @returns false if nothing was deleted
   */
  delete(checkpointId: string): Promise<boolean>;

  getLatestForExecution(executionId: string): Promise<CheckpointData | null>;

  /**
   * Every checkpoint of an execution, oldest first.
   */
  getAllForExecution(executionId: string): Promise<CheckpointData[]>;

  /**
   * @returns Number of checkpoints removed
   */
  deleteAllForExecution(executionId: string): Promise<number>;

  /**
   * Remove checkpoints created more than `maxAgeMs` ago.
   *
   * @returns Number of checkpoints removed
   */
  cleanupOlderThan(maxAgeMs: number): Promise<number>;
}
