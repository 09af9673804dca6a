/**
 * Workflow Engine Interface
 *
 * Contract for running declarative workflows as state machines, plus the
 * engine's default options.
 */

import type {
  ApprovalDecision,
  WorkflowDefinition,
  WorkflowExecutionContext,
  WorkflowExecutionSummary,
  WorkflowRuntimeState,
} from "@flowgate/types";
import type { WorkflowEventListener } from "./workflow-event-emitter.js";

// =============================================================================
// Options
// =============================================================================

export interface WorkflowEngineOptions {
  /** Delay between evaluations of an unsatisfied trigger */
  triggerPollIntervalMs: number;
  /**
   * Longest a single trigger may stay unsatisfied before the execution
   * fails. Unset waits forever.
   */
  maxTriggerWaitMs?: number;
}

export const DEFAULT_ENGINE_OPTIONS: Readonly<WorkflowEngineOptions> = {
  triggerPollIntervalMs: 5000,
  maxTriggerWaitMs: undefined,
};

export interface ExecuteOptions {
  /** Generated when omitted */
  executionId?: string;
  context?: WorkflowExecutionContext;
}

// =============================================================================
// Interface
// =============================================================================

/**
 * Runs workflow executions and exposes the approval API.
 *
 * Executions are consumed as async streams of immutable snapshots. Failures
 * inside an execution end the stream with a `failed` snapshot; only misuse
 * (invalid definitions, unknown or wrongly staged ids) and cancellation
 * throw.
 */
export interface IWorkflowEngine {
  /**
   * Start an execution at the workflow's start state.
   *
   * @throws WorkflowValidationError if the definition has validation errors
   * @throws ExecutionCancelledError once a cancellation takes effect
   */
  execute(
    workflow: WorkflowDefinition,
    input: string,
    options?: ExecuteOptions
  ): AsyncGenerator<WorkflowRuntimeState, void, undefined>;

  /**
   * Continue an execution from its latest checkpoint.
   *
   * @throws CheckpointResumeError if no usable checkpoint exists
   * @throws ExecutionStateError if the execution is already active
   */
  resumeFromCheckpoint(
    executionId: string
  ): AsyncGenerator<WorkflowRuntimeState, void, undefined>;

  /**
   * @throws ExecutionNotFoundError if the execution is not active
   * @throws ExecutionStateError if it is not waiting for approval
   */
  approve(executionId: string, decision: ApprovalDecision): void;

  /**
   * @throws ExecutionNotFoundError if the execution is not active
   */
  cancel(executionId: string): void;

  /**
   * Latest snapshot of an active execution.
   *
   * @throws ExecutionNotFoundError if the execution is not active
   */
  getState(executionId: string): WorkflowRuntimeState;

  listActive(): WorkflowExecutionSummary[];

  /**
   * @returns Unsubscribe function
   */
  onWorkflowEvent(listener: WorkflowEventListener): () => void;
}
