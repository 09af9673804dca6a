/**
 * Execution Registry
 *
 * In-memory directory of active executions. This is the entry point for
 * approval delivery, cancellation and status queries while the engine's
 * loop runs elsewhere.
 */

import type {
  ApprovalDecision,
  WorkflowDefinition,
  WorkflowExecutionContext,
  WorkflowExecutionSummary,
  WorkflowRuntimeState,
} from "@flowgate/types";
import { ExecutionNotFoundError, ExecutionStateError } from "./errors.js";

/**
 * How a pending human gate ended, from the engine's point of view.
 */
export type ApprovalGateOutcome =
  | { kind: "decision"; decision: ApprovalDecision }
  | { kind: "cancelled" };

/**
 * Single-slot rendezvous between the engine (waiting) and an external
 * approve/cancel call (resolving). Never rejects.
 */
export class ApprovalGate {
  readonly promise: Promise<ApprovalGateOutcome>;
  private resolver: (outcome: ApprovalGateOutcome) => void = () => {};
  private settled = false;

  constructor(readonly stateId: string) {
    this.promise = new Promise((resolve) => {
      this.resolver = resolve;
    });
  }

  get isSettled(): boolean {
    return this.settled;
  }

  resolve(outcome: ApprovalGateOutcome): void {
    if (this.settled) {
      return;
    }
    this.settled = true;
    this.resolver(outcome);
  }
}

/**
 * Bookkeeping for one active execution.
 */
export class WorkflowExecution {
  readonly abortController = new AbortController();
  approvalGate?: ApprovalGate;

  constructor(
    readonly executionId: string,
    readonly workflow: WorkflowDefinition,
    readonly context: WorkflowExecutionContext,
    public currentState: WorkflowRuntimeState
  ) {}

  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  get isCancelled(): boolean {
    return this.abortController.signal.aborted;
  }

  /**
   * Open a fresh gate for the given human gate state.
   */
  openApprovalGate(stateId: string): ApprovalGate {
    this.approvalGate = new ApprovalGate(stateId);
    return this.approvalGate;
  }

  closeApprovalGate(): void {
    this.approvalGate = undefined;
  }
}

export class ExecutionRegistry {
  private readonly executions = new Map<string, WorkflowExecution>();

  add(execution: WorkflowExecution): void {
    this.executions.set(execution.executionId, execution);
  }

  get(executionId: string): WorkflowExecution | undefined {
    return this.executions.get(executionId);
  }

  has(executionId: string): boolean {
    return this.executions.has(executionId);
  }

  /**
   * Drop an execution, but only if `execution` is still the registered
   * entry for its id.
   */
  remove(execution: WorkflowExecution): void {
    if (this.executions.get(execution.executionId) === execution) {
      this.executions.delete(execution.executionId);
    }
  }

  /**
   * Deliver a human decision to an execution waiting at a gate.
   *
   * @throws ExecutionNotFoundError if the id is unknown
   * @throws ExecutionStateError if the execution is not waiting for approval
   */
  approve(executionId: string, decision: ApprovalDecision): void {
    const execution = this.require(executionId);
    const gate = execution.approvalGate;
    if (
      execution.currentState.status !== "waiting_for_approval" ||
      !gate ||
      gate.isSettled
    ) {
      throw new ExecutionStateError(
        executionId,
        execution.currentState.currentStateId,
        `Execution is not waiting for approval (status: ${execution.currentState.status})`
      );
    }
    gate.resolve({ kind: "decision", decision });
  }

  /**
   * Request cancellation. The engine unwinds at its next check.
   *
   * @throws ExecutionNotFoundError if the id is unknown
   */
  cancel(executionId: string): void {
    const execution = this.require(executionId);
    this.executions.delete(executionId);
    execution.abortController.abort();
    execution.approvalGate?.resolve({ kind: "cancelled" });
  }

  /**
   * @throws ExecutionNotFoundError if the id is unknown
   */
  getState(executionId: string): WorkflowRuntimeState {
    return this.require(executionId).currentState;
  }

  listActive(): WorkflowExecutionSummary[] {
    return [...this.executions.values()].map((execution) => {
      const state = execution.currentState;
      return {
        executionId: execution.executionId,
        workflowName: execution.workflow.name,
        currentState: state.currentStateId,
        status: state.status,
        startedAt: state.startedAt,
        lastUpdatedAt: state.lastUpdatedAt,
      };
    });
  }

  get size(): number {
    return this.executions.size;
  }

  private require(executionId: string): WorkflowExecution {
    const execution = this.executions.get(executionId);
    if (!execution) {
      throw new ExecutionNotFoundError(executionId);
    }
    return execution;
  }
}
