/**
 * Workflow Event Emitter
 *
 * Typed lifecycle events for running executions, delivered through a set
 * of listeners rather than Node's EventEmitter.
 */

import type {
  ApprovalDecision,
  WorkflowExecutionStatus,
  WorkflowStateType,
} from "@flowgate/types";

// =============================================================================
// Event Types
// =============================================================================

/**
 * Discriminated union of all execution events, keyed by `type`.
 */
export type WorkflowEventPayload =
  // Execution lifecycle
  | ExecutionStartedEvent
  | ExecutionCompletedEvent
  | ExecutionFailedEvent
  | ExecutionCancelledEvent
  // State events
  | StateEnteredEvent
  | StateCompletedEvent
  | WaitingForTriggerEvent
  // Human gate
  | ApprovalRequestedEvent
  | ApprovalResolvedEvent
  // Persistence
  | CheckpointSavedEvent;

export const WorkflowEventType = {
  EXECUTION_STARTED: "execution_started",
  EXECUTION_COMPLETED: "execution_completed",
  EXECUTION_FAILED: "execution_failed",
  EXECUTION_CANCELLED: "execution_cancelled",
  STATE_ENTERED: "state_entered",
  STATE_COMPLETED: "state_completed",
  WAITING_FOR_TRIGGER: "waiting_for_trigger",
  APPROVAL_REQUESTED: "approval_requested",
  APPROVAL_RESOLVED: "approval_resolved",
  CHECKPOINT_SAVED: "checkpoint_saved",
} as const;

interface BaseEvent {
  executionId: string;
  workflowName: string;
  timestamp: number;
}

export interface ExecutionStartedEvent extends BaseEvent {
  type: "execution_started";
  startStateId: string;
  /** True when the execution was rebuilt from a checkpoint */
  resumed: boolean;
  parentExecutionId?: string;
}

export interface ExecutionCompletedEvent extends BaseEvent {
  type: "execution_completed";
  finalStateId: string;
  iterationCount: number;
}

export interface ExecutionFailedEvent extends BaseEvent {
  type: "execution_failed";
  stateId: string;
  error: string;
}

export interface ExecutionCancelledEvent extends BaseEvent {
  type: "execution_cancelled";
  stateId: string;
}

export interface StateEnteredEvent extends BaseEvent {
  type: "state_entered";
  stateId: string;
  stateType: WorkflowStateType;
}

/**
 * Emitted after a state's dispatch, with the status it left behind.
 */
export interface StateCompletedEvent extends BaseEvent {
  type: "state_completed";
  stateId: string;
  status: WorkflowExecutionStatus;
}

export interface WaitingForTriggerEvent extends BaseEvent {
  type: "waiting_for_trigger";
  stateId: string;
  /** Number of unsatisfied evaluations so far */
  attempt: number;
}

export interface ApprovalRequestedEvent extends BaseEvent {
  type: "approval_requested";
  stateId: string;
  timeoutMs: number;
  notifyEmail?: string;
}

export interface ApprovalResolvedEvent extends BaseEvent {
  type: "approval_resolved";
  stateId: string;
  decision: ApprovalDecision;
}

export interface CheckpointSavedEvent extends BaseEvent {
  type: "checkpoint_saved";
  checkpointId: string;
  nextStateId: string;
}

// =============================================================================
// Listener Type
// =============================================================================

export type WorkflowEventListener = (event: WorkflowEventPayload) => void;

// =============================================================================
// Event Emitter Class
// =============================================================================

/**
 * Typed event emitter for execution events.
 *
 * @example
 * ```typescript
 * const emitter = new WorkflowEventEmitter();
 * const unsubscribe = emitter.on((event) => {
 *   if (event.type === "approval_requested") {
 *     notify(event.notifyEmail, event.executionId);
 *   }
 * });
 * unsubscribe();
 * ```
 */
export class WorkflowEventEmitter {
  private listeners = new Set<WorkflowEventListener>();

  /**
   * @returns Unsubscribe function
   */
  on(listener: WorkflowEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  off(listener: WorkflowEventListener): void {
    this.listeners.delete(listener);
  }

  /**
   * Deliver an event to every listener. A throwing listener is logged and
   * the rest still run.
   */
  emit(event: WorkflowEventPayload): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        console.error("[WorkflowEventEmitter] Listener failed:", error);
      }
    }
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  removeAllListeners(): void {
    this.listeners.clear();
  }
}

// =============================================================================
// Helper Functions
// =============================================================================

function base(executionId: string, workflowName: string): BaseEvent {
  return { executionId, workflowName, timestamp: Date.now() };
}

export function createExecutionStartedEvent(
  executionId: string,
  workflowName: string,
  startStateId: string,
  resumed = false,
  parentExecutionId?: string
): ExecutionStartedEvent {
  return {
    type: "execution_started",
    ...base(executionId, workflowName),
    startStateId,
    resumed,
    parentExecutionId,
  };
}

export function createExecutionCompletedEvent(
  executionId: string,
  workflowName: string,
  finalStateId: string,
  iterationCount: number
): ExecutionCompletedEvent {
  return {
    type: "execution_completed",
    ...base(executionId, workflowName),
    finalStateId,
    iterationCount,
  };
}

export function createExecutionFailedEvent(
  executionId: string,
  workflowName: string,
  stateId: string,
  error: string
): ExecutionFailedEvent {
  return {
    type: "execution_failed",
    ...base(executionId, workflowName),
    stateId,
    error,
  };
}

export function createExecutionCancelledEvent(
  executionId: string,
  workflowName: string,
  stateId: string
): ExecutionCancelledEvent {
  return {
    type: "execution_cancelled",
    ...base(executionId, workflowName),
    stateId,
  };
}

export function createStateEnteredEvent(
  executionId: string,
  workflowName: string,
  stateId: string,
  stateType: WorkflowStateType
): StateEnteredEvent {
  return {
    type: "state_entered",
    ...base(executionId, workflowName),
    stateId,
    stateType,
  };
}

export function createStateCompletedEvent(
  executionId: string,
  workflowName: string,
  stateId: string,
  status: WorkflowExecutionStatus
): StateCompletedEvent {
  return {
    type: "state_completed",
    ...base(executionId, workflowName),
    stateId,
    status,
  };
}

export function createWaitingForTriggerEvent(
  executionId: string,
  workflowName: string,
  stateId: string,
  attempt: number
): WaitingForTriggerEvent {
  return {
    type: "waiting_for_trigger",
    ...base(executionId, workflowName),
    stateId,
    attempt,
  };
}

export function createApprovalRequestedEvent(
  executionId: string,
  workflowName: string,
  stateId: string,
  timeoutMs: number,
  notifyEmail?: string
): ApprovalRequestedEvent {
  return {
    type: "approval_requested",
    ...base(executionId, workflowName),
    stateId,
    timeoutMs,
    notifyEmail,
  };
}

export function createApprovalResolvedEvent(
  executionId: string,
  workflowName: string,
  stateId: string,
  decision: ApprovalDecision
): ApprovalResolvedEvent {
  return {
    type: "approval_resolved",
    ...base(executionId, workflowName),
    stateId,
    decision,
  };
}

export function createCheckpointSavedEvent(
  executionId: string,
  workflowName: string,
  checkpointId: string,
  nextStateId: string
): CheckpointSavedEvent {
  return {
    type: "checkpoint_saved",
    ...base(executionId, workflowName),
    checkpointId,
    nextStateId,
  };
}
