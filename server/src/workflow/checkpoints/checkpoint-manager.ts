/**
 * Checkpoint protocol
 *
 * Turns runtime snapshots into checkpoints (full definition included) and
 * back into resume contexts. The engine talks to this class only; storage
 * details stay behind CheckpointStore.
 */

import { randomUUID } from "crypto";
import type {
  CheckpointData,
  WorkflowDefinition,
  WorkflowExecutionContext,
  WorkflowResumeContext,
  WorkflowRuntimeState,
} from "@flowgate/types";
import { CheckpointResumeError } from "../errors.js";
import type { CheckpointStore } from "./checkpoint-store.js";
import {
  parseResumeContext,
  serializeResumeContext,
} from "./checkpoint-serializer.js";

export class CheckpointManager {
  constructor(private readonly store: CheckpointStore) {}

  /**
   * Persist a snapshot. `nextStateId` is where a resumed execution picks up;
   * the execution context is stored with it.
   *
   * @returns The saved checkpoint
   */
  async save(
    workflow: WorkflowDefinition,
    state: WorkflowRuntimeState,
    nextStateId: string,
    context: WorkflowExecutionContext = {}
  ): Promise<CheckpointData> {
    const resumeContext: WorkflowResumeContext = {
      workflow,
      currentStateId: nextStateId,
      input: state.input,
      executionId: state.executionId,
      startedAt: state.startedAt,
      iterationCount: state.iterationCount,
      outputData: { ...state.outputData },
      workingDirectory: context.workingDirectory,
      metadata: context.metadata ? { ...context.metadata } : undefined,
      parentExecutionId: context.parentExecutionId,
    };

    const checkpoint: CheckpointData = {
      checkpointId: randomUUID(),
      executionId: state.executionId,
      workflowName: workflow.name,
      currentStateId: nextStateId,
      serializedState: serializeResumeContext(resumeContext),
      input: state.input,
      createdAt: new Date().toISOString(),
      executionStartedAt: state.startedAt,
      metadata: {
        completedStateId: state.currentStateId,
        iterationCount: String(state.iterationCount),
      },
    };

    await this.store.save(state.executionId, checkpoint);
    return checkpoint;
  }

  /**
   * Load the latest checkpoint of an execution as a resume context.
   *
   * @throws CheckpointResumeError if there is no checkpoint or its payload
   * cannot be read back
   */
  async loadResumeContext(executionId: string): Promise<WorkflowResumeContext> {
    const checkpoint = await this.store.getLatestForExecution(executionId);
    if (!checkpoint) {
      throw new CheckpointResumeError(
        executionId,
        `No checkpoint found for execution ${executionId}`
      );
    }
    if (checkpoint.serializedState === undefined) {
      throw new CheckpointResumeError(
        executionId,
        `Checkpoint ${checkpoint.checkpointId} has no serialized state`
      );
    }

    const context = parseResumeContext(checkpoint.serializedState);
    if (!context) {
      throw new CheckpointResumeError(
        executionId,
        `Checkpoint ${checkpoint.checkpointId} could not be deserialized`
      );
    }
    return context;
  }

  listCheckpoints(executionId: string): Promise<CheckpointData[]> {
    return this.store.getAllForExecution(executionId);
  }

  get checkpointStore(): CheckpointStore {
    return this.store;
  }
}
