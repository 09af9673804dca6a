/**
 * State Machine Workflow Engine
 *
 * Drives one execution at a time per id through a workflow's states and
 * streams an immutable snapshot at every step. Many executions may run
 * side by side; they share only the execution registry.
 */

import { randomUUID } from "crypto";
import { setTimeout as sleep } from "timers/promises";
import {
  APPROVAL_FEEDBACK_KEY,
  DEFAULT_HUMAN_GATE_TIMEOUT_MS,
  type AgentExecutionResult,
  type ApprovalDecision,
  type HumanGateSettings,
  type TriggerDefinition,
  type WorkflowDefinition,
  type WorkflowExecutionSummary,
  type WorkflowRuntimeState,
  type WorkflowStateDefinition,
} from "@flowgate/types";
import type { AgentExecutor } from "../agent-executor.js";
import { CheckpointManager } from "../checkpoints/checkpoint-manager.js";
import type { CheckpointStore } from "../checkpoints/checkpoint-store.js";
import {
  CheckpointResumeError,
  ExecutionCancelledError,
  ExecutionStateError,
  StepTimeoutError,
  WorkflowValidationError,
} from "../errors.js";
import {
  ExecutionRegistry,
  WorkflowExecution,
  type ApprovalGate,
  type ApprovalGateOutcome,
} from "../execution-registry.js";
import { evaluateExpression } from "../expression-evaluator.js";
import {
  createDefaultTriggerRegistry,
  type TriggerEvaluatorRegistry,
} from "../triggers.js";
import {
  DEFAULT_ENGINE_OPTIONS,
  type ExecuteOptions,
  type IWorkflowEngine,
  type WorkflowEngineOptions,
} from "../workflow-engine.js";
import {
  WorkflowEventEmitter,
  createApprovalRequestedEvent,
  createApprovalResolvedEvent,
  createCheckpointSavedEvent,
  createExecutionCancelledEvent,
  createExecutionCompletedEvent,
  createExecutionFailedEvent,
  createExecutionStartedEvent,
  createStateCompletedEvent,
  createStateEnteredEvent,
  createWaitingForTriggerEvent,
  type WorkflowEventListener,
} from "../workflow-event-emitter.js";
import { validateWorkflow } from "../workflow-validator.js";

// =============================================================================
// Types
// =============================================================================

export interface StateMachineEngineDependencies {
  executor: AgentExecutor;
  /** Defaults to the built-in file, directory and immediate evaluators */
  triggers?: TriggerEvaluatorRegistry;
  /** Without a store no checkpoints are written and resume is unavailable */
  checkpointStore?: CheckpointStore;
  registry?: ExecutionRegistry;
  eventEmitter?: WorkflowEventEmitter;
}

type Snapshots = AsyncGenerator<WorkflowRuntimeState, void, undefined>;

type SnapshotChanges = Partial<Omit<WorkflowRuntimeState, "executionId">>;

type GateWaitOutcome = ApprovalGateOutcome | { kind: "timeout" };

// Largest delay setTimeout honours
const MAX_TIMER_MS = 2_147_483_647;

// =============================================================================
// Helpers
// =============================================================================

function now(): string {
  return new Date().toISOString();
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function findStartState(
  workflow: WorkflowDefinition
): WorkflowStateDefinition | undefined {
  return workflow.states.find((s) => s.type === "start") ?? workflow.states[0];
}

function findState(
  workflow: WorkflowDefinition,
  stateId: string
): WorkflowStateDefinition | undefined {
  return workflow.states.find((s) => s.id === stateId);
}

/**
 * A state ends the run if it is terminal-typed or is called "END".
 */
export function isTerminalState(
  workflow: WorkflowDefinition,
  stateId: string
): boolean {
  return (
    findState(workflow, stateId)?.type === "terminal" ||
    stateId.toUpperCase() === "END"
  );
}

/**
 * Pick the next state: first matching non-default condition, then the
 * default condition, then `next`.
 */
export function resolveNextStateId(
  definition: WorkflowStateDefinition,
  state: WorkflowRuntimeState
): string | undefined {
  for (const condition of definition.conditions) {
    if (!condition.isDefault && evaluateExpression(condition.if, state)) {
      return condition.then;
    }
  }
  const fallback = definition.conditions.find((c) => c.isDefault);
  return fallback?.then ?? definition.next;
}

// =============================================================================
// State Machine Engine
// =============================================================================

/**
 * @example
 * ```typescript
 * const engine = new StateMachineEngine({
 *   executor: new AgentExecutorRegistry().register("builder", build),
 *   checkpointStore: new FileSystemCheckpointStore(".flowgate"),
 * });
 *
 * for await (const snapshot of engine.execute(workflow, "release 1.2")) {
 *   console.log(snapshot.currentStateId, snapshot.status);
 * }
 * ```
 */
export class StateMachineEngine implements IWorkflowEngine {
  private readonly executor: AgentExecutor;
  private readonly triggers: TriggerEvaluatorRegistry;
  private readonly checkpoints?: CheckpointManager;
  private readonly registry: ExecutionRegistry;
  private readonly eventEmitter: WorkflowEventEmitter;
  private readonly options: WorkflowEngineOptions;
  private readonly reportedCancellations = new WeakSet<WorkflowExecution>();

  constructor(
    dependencies: StateMachineEngineDependencies,
    options: Partial<WorkflowEngineOptions> = {}
  ) {
    this.executor = dependencies.executor;
    this.triggers = dependencies.triggers ?? createDefaultTriggerRegistry();
    this.checkpoints = dependencies.checkpointStore
      ? new CheckpointManager(dependencies.checkpointStore)
      : undefined;
    this.registry = dependencies.registry ?? new ExecutionRegistry();
    this.eventEmitter = dependencies.eventEmitter ?? new WorkflowEventEmitter();
    this.options = { ...DEFAULT_ENGINE_OPTIONS, ...options };
    if (
      !Number.isFinite(this.options.triggerPollIntervalMs) ||
      this.options.triggerPollIntervalMs < 1
    ) {
      throw new Error(
        `triggerPollIntervalMs must be at least 1, got ${this.options.triggerPollIntervalMs}`
      );
    }
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  async *execute(
    workflow: WorkflowDefinition,
    input: string,
    options: ExecuteOptions = {}
  ): Snapshots {
    const validation = validateWorkflow(workflow);
    if (!validation.isValid) {
      throw new WorkflowValidationError(workflow.name, validation.errors);
    }

    const executionId = options.executionId ?? randomUUID();
    const active = this.registry.get(executionId);
    if (active) {
      throw new ExecutionStateError(
        executionId,
        active.currentState.currentStateId,
        "Execution id is already in use"
      );
    }

    // Validation guarantees at least one state
    const startState = findStartState(workflow);
    const startedAt = now();
    const initial: WorkflowRuntimeState = {
      executionId,
      workflowName: workflow.name,
      currentStateId: startState?.id ?? "",
      status: "running",
      input,
      startedAt,
      lastUpdatedAt: startedAt,
      iterationCount: 0,
      outputData: {},
    };

    const execution = new WorkflowExecution(
      executionId,
      workflow,
      options.context ?? {},
      initial
    );
    this.registry.add(execution);

    console.log(
      `[StateMachineEngine] Starting execution ${executionId} of '${workflow.name}' at '${initial.currentStateId}'`
    );
    this.eventEmitter.emit(
      createExecutionStartedEvent(
        executionId,
        workflow.name,
        initial.currentStateId,
        false,
        execution.context.parentExecutionId
      )
    );

    yield* this.run(execution);
  }

  async *resumeFromCheckpoint(executionId: string): Snapshots {
    if (!this.checkpoints) {
      throw new CheckpointResumeError(
        executionId,
        "Cannot resume from checkpoint: no checkpoint store is configured"
      );
    }

    const active = this.registry.get(executionId);
    if (active) {
      throw new ExecutionStateError(
        executionId,
        active.currentState.currentStateId,
        "Execution is already active"
      );
    }

    const resume = await this.checkpoints.loadResumeContext(executionId);
    const state: WorkflowRuntimeState = {
      executionId: resume.executionId,
      workflowName: resume.workflow.name,
      currentStateId: resume.currentStateId,
      status: "running",
      input: resume.input,
      startedAt: resume.startedAt,
      lastUpdatedAt: now(),
      iterationCount: resume.iterationCount,
      outputData: resume.outputData,
    };

    const execution = new WorkflowExecution(
      resume.executionId,
      resume.workflow,
      {
        workingDirectory: resume.workingDirectory ?? process.cwd(),
        metadata: resume.metadata,
        parentExecutionId: resume.parentExecutionId,
      },
      state
    );
    this.registry.add(execution);

    console.log(
      `[StateMachineEngine] Resuming execution ${resume.executionId} at '${resume.currentStateId}'`
    );
    this.eventEmitter.emit(
      createExecutionStartedEvent(
        resume.executionId,
        resume.workflow.name,
        resume.currentStateId,
        true,
        resume.parentExecutionId
      )
    );

    yield* this.run(execution);
  }

  // ===========================================================================
  // Approval API
  // ===========================================================================

  approve(executionId: string, decision: ApprovalDecision): void {
    this.registry.approve(executionId, decision);
  }

  cancel(executionId: string): void {
    this.registry.cancel(executionId);
    console.log(`[StateMachineEngine] Cancellation requested for ${executionId}`);
  }

  getState(executionId: string): WorkflowRuntimeState {
    return this.registry.getState(executionId);
  }

  listActive(): WorkflowExecutionSummary[] {
    return this.registry.listActive();
  }

  onWorkflowEvent(listener: WorkflowEventListener): () => void {
    return this.eventEmitter.on(listener);
  }

  // ===========================================================================
  // Main Loop
  // ===========================================================================

  private async *run(execution: WorkflowExecution): Snapshots {
    const { workflow, executionId } = execution;

    try {
      yield execution.currentState;

      while (
        execution.currentState.status === "running" &&
        !isTerminalState(workflow, execution.currentState.currentStateId)
      ) {
        this.throwIfCancelled(execution);

        const stateId = execution.currentState.currentStateId;
        const definition = findState(workflow, stateId);
        if (!definition) {
          yield this.fail(execution, stateId, `State not found: ${stateId}`);
          return;
        }

        this.eventEmitter.emit(
          createStateEnteredEvent(
            executionId,
            workflow.name,
            definition.id,
            definition.type
          )
        );

        try {
          if (definition.trigger) {
            yield* this.waitForTrigger(execution, definition, definition.trigger);
          }
          yield* this.dispatch(execution, definition);
        } catch (error) {
          this.throwIfCancelled(execution);
          this.commit(execution, {
            status: "failed",
            errorMessage: errorMessage(error),
          });
        }

        const state = execution.currentState;
        this.eventEmitter.emit(
          createStateCompletedEvent(
            executionId,
            workflow.name,
            definition.id,
            state.status
          )
        );

        if (state.status === "failed") {
          this.reportFailure(execution, definition.id);
          yield state;
          return;
        }
        if (state.status === "completed") {
          this.reportCompletion(execution);
          yield state;
          return;
        }

        yield state;
        this.throwIfCancelled(execution);

        // A human gate has already moved to its own target
        const nextStateId =
          definition.type === "human_gate"
            ? state.currentStateId
            : resolveNextStateId(definition, state);
        if (nextStateId === undefined) {
          yield this.fail(
            execution,
            definition.id,
            `State '${definition.id}' has no transition to follow`
          );
          return;
        }

        if (this.checkpoints && workflow.settings.enableCheckpointing) {
          try {
            const checkpoint = await this.checkpoints.save(
              workflow,
              state,
              nextStateId,
              execution.context
            );
            this.eventEmitter.emit(
              createCheckpointSavedEvent(
                executionId,
                workflow.name,
                checkpoint.checkpointId,
                nextStateId
              )
            );
          } catch (error) {
            yield this.fail(
              execution,
              definition.id,
              `Failed to save checkpoint: ${errorMessage(error)}`
            );
            return;
          }
        }

        this.commit(execution, { currentStateId: nextStateId });
      }

      this.throwIfCancelled(execution);

      if (
        execution.currentState.status === "running" &&
        isTerminalState(workflow, execution.currentState.currentStateId)
      ) {
        const completed = this.commit(execution, {
          status: "completed",
          completedAt: now(),
        });
        this.reportCompletion(execution);
        yield completed;
      }
    } finally {
      execution.closeApprovalGate();
      this.registry.remove(execution);
    }
  }

  // ===========================================================================
  // Dispatch
  // ===========================================================================

  private async *dispatch(
    execution: WorkflowExecution,
    definition: WorkflowStateDefinition
  ): Snapshots {
    switch (definition.type) {
      case "start":
        this.commit(execution, {});
        return;

      case "agent":
        await this.runAgentState(execution, definition);
        return;

      case "parallel":
        await this.runParallelState(execution, definition);
        return;

      case "human_gate":
        yield* this.runHumanGate(execution, definition);
        return;

      case "escalation":
        console.warn(
          `[StateMachineEngine] Escalation reached at '${definition.id}' in execution ${execution.executionId}`
        );
        this.commit(execution, {
          status: "failed",
          errorMessage: `Escalation triggered at state '${definition.id}'`,
        });
        return;

      case "terminal":
        this.commit(execution, { status: "completed", completedAt: now() });
        return;
    }
  }

  private async runAgentState(
    execution: WorkflowExecution,
    definition: WorkflowStateDefinition
  ): Promise<void> {
    const executorName = definition.executor;
    if (executorName === undefined || executorName.trim() === "") {
      throw new Error(`Agent state '${definition.id}' requires an executor.`);
    }

    const state = execution.currentState;
    const result = await this.withStepTimeout(execution, definition, (signal) =>
      this.invokeExecutor(execution, definition, executorName, state, signal)
    );

    this.commit(execution, {
      outputData: { ...state.outputData, ...result.data },
      iterationCount: state.iterationCount + 1,
    });
  }

  private async runParallelState(
    execution: WorkflowExecution,
    definition: WorkflowStateDefinition
  ): Promise<void> {
    if (definition.executors.length === 0) {
      throw new Error(`Parallel state '${definition.id}' requires executors.`);
    }

    const state = execution.currentState;
    const results = await this.withStepTimeout(execution, definition, (signal) =>
      Promise.allSettled(
        definition.executors.map((name) =>
          this.invokeExecutor(execution, definition, name, state, signal)
        )
      )
    );

    // Merge in declared order; later executors win on key collisions
    const outputData: Record<string, unknown> = { ...state.outputData };
    for (const result of results) {
      if (result.status === "rejected") {
        throw result.reason instanceof Error
          ? result.reason
          : new Error(String(result.reason));
      }
      Object.assign(outputData, result.value.data);
    }

    this.commit(execution, {
      outputData,
      iterationCount: state.iterationCount + 1,
    });
  }

  private async invokeExecutor(
    execution: WorkflowExecution,
    definition: WorkflowStateDefinition,
    executorName: string,
    state: WorkflowRuntimeState,
    signal: AbortSignal
  ): Promise<AgentExecutionResult> {
    const result = await this.executor.execute(
      executorName,
      state.input,
      state.outputData,
      {
        executionId: execution.executionId,
        stateId: definition.id,
        context: execution.context,
        signal,
      }
    );
    if (!result.success) {
      console.warn(
        `[StateMachineEngine] Executor '${executorName}' reported failure at '${definition.id}': ${result.errorMessage ?? "no message"}`
      );
    }
    return result;
  }

  /**
   * Run a step under the state's timeout. The signal handed to the step
   * fires on timeout or cancellation, and the step is abandoned at that
   * point whether or not it honours the signal.
   */
  private async withStepTimeout<T>(
    execution: WorkflowExecution,
    definition: WorkflowStateDefinition,
    step: (signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    const timeoutMs =
      definition.timeoutMs ?? execution.workflow.settings.defaultTimeoutMs;
    const controller = new AbortController();
    const onCancel = () =>
      controller.abort(new ExecutionCancelledError(execution.executionId));

    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener(
        "abort",
        () => reject(controller.signal.reason),
        { once: true }
      );
    });

    const timer = setTimeout(
      () => controller.abort(new StepTimeoutError(definition.id, timeoutMs)),
      Math.min(timeoutMs, MAX_TIMER_MS)
    );
    if (execution.signal.aborted) {
      onCancel();
    } else {
      execution.signal.addEventListener("abort", onCancel, { once: true });
    }

    try {
      return await Promise.race([step(controller.signal), aborted]);
    } finally {
      clearTimeout(timer);
      execution.signal.removeEventListener("abort", onCancel);
    }
  }

  // ===========================================================================
  // Human Gate
  // ===========================================================================

  private async *runHumanGate(
    execution: WorkflowExecution,
    definition: WorkflowStateDefinition
  ): Snapshots {
    const settings: HumanGateSettings = definition.humanGate ?? {
      approvalMode: "always_require",
      timeoutMs: DEFAULT_HUMAN_GATE_TIMEOUT_MS,
    };

    const gate = execution.openApprovalGate(definition.id);
    const waiting = this.commit(execution, { status: "waiting_for_approval" });
    this.eventEmitter.emit(
      createApprovalRequestedEvent(
        execution.executionId,
        execution.workflow.name,
        definition.id,
        settings.timeoutMs,
        settings.notifyEmail
      )
    );
    yield waiting;

    let outcome: GateWaitOutcome;
    try {
      outcome = await this.waitForApproval(execution, gate, settings.timeoutMs);
    } finally {
      execution.closeApprovalGate();
    }

    switch (outcome.kind) {
      case "cancelled":
        throw this.cancellation(execution);

      case "timeout":
        this.commit(execution, {
          status: "failed",
          errorMessage: "Approval timeout exceeded",
        });
        return;

      case "decision": {
        const { decision } = outcome;
        this.eventEmitter.emit(
          createApprovalResolvedEvent(
            execution.executionId,
            execution.workflow.name,
            definition.id,
            decision
          )
        );

        if (decision.approved) {
          this.commit(execution, {
            status: "running",
            currentStateId: settings.onApprove ?? definition.next ?? definition.id,
          });
          return;
        }

        const feedback = decision.feedback?.trim();
        this.commit(execution, {
          status: "running",
          currentStateId: settings.onReject ?? definition.id,
          outputData: feedback
            ? {
                ...execution.currentState.outputData,
                [APPROVAL_FEEDBACK_KEY]: decision.feedback,
              }
            : execution.currentState.outputData,
        });
        return;
      }
    }
  }

  private async waitForApproval(
    execution: WorkflowExecution,
    gate: ApprovalGate,
    timeoutMs: number
  ): Promise<GateWaitOutcome> {
    let timer: NodeJS.Timeout | undefined;
    let onCancel: (() => void) | undefined;

    const timeout = new Promise<GateWaitOutcome>((resolve) => {
      timer = setTimeout(
        () => resolve({ kind: "timeout" }),
        Math.min(timeoutMs, MAX_TIMER_MS)
      );
    });
    const cancelled = new Promise<GateWaitOutcome>((resolve) => {
      onCancel = () => resolve({ kind: "cancelled" });
      if (execution.signal.aborted) {
        onCancel();
      } else {
        execution.signal.addEventListener("abort", onCancel, { once: true });
      }
    });

    try {
      return await Promise.race([gate.promise, timeout, cancelled]);
    } finally {
      clearTimeout(timer);
      if (onCancel) {
        execution.signal.removeEventListener("abort", onCancel);
      }
    }
  }

  // ===========================================================================
  // Triggers
  // ===========================================================================

  /**
   * Poll the trigger until it is satisfied, streaming a waiting snapshot
   * for every unsatisfied evaluation.
   */
  private async *waitForTrigger(
    execution: WorkflowExecution,
    definition: WorkflowStateDefinition,
    trigger: TriggerDefinition
  ): Snapshots {
    const evaluator = this.triggers.getEvaluator(trigger.type);
    const { maxTriggerWaitMs, triggerPollIntervalMs } = this.options;
    const waitStartedAt = Date.now();
    let attempt = 0;

    for (;;) {
      this.throwIfCancelled(execution);

      const satisfied = await evaluator.evaluate(
        trigger,
        {
          workingDirectory: execution.context.workingDirectory,
          stateData: execution.currentState.outputData,
        },
        execution.signal
      );
      if (satisfied) {
        if (execution.currentState.status === "waiting_for_trigger") {
          this.commit(execution, { status: "running" });
        }
        return;
      }

      if (
        maxTriggerWaitMs !== undefined &&
        Date.now() - waitStartedAt >= maxTriggerWaitMs
      ) {
        throw new Error(
          `Trigger wait exceeded at state '${definition.id}' after ${maxTriggerWaitMs}ms`
        );
      }

      attempt++;
      const waiting = this.commit(execution, { status: "waiting_for_trigger" });
      this.eventEmitter.emit(
        createWaitingForTriggerEvent(
          execution.executionId,
          execution.workflow.name,
          definition.id,
          attempt
        )
      );
      yield waiting;

      await sleep(triggerPollIntervalMs, undefined, { signal: execution.signal });
    }
  }

  // ===========================================================================
  // Snapshot Bookkeeping
  // ===========================================================================

  /**
   * Produce the next snapshot and publish it on the execution.
   */
  private commit(
    execution: WorkflowExecution,
    changes: SnapshotChanges
  ): WorkflowRuntimeState {
    const next: WorkflowRuntimeState = {
      ...execution.currentState,
      ...changes,
      lastUpdatedAt: now(),
    };
    execution.currentState = next;
    return next;
  }

  private fail(
    execution: WorkflowExecution,
    stateId: string,
    message: string
  ): WorkflowRuntimeState {
    const failed = this.commit(execution, {
      status: "failed",
      errorMessage: message,
    });
    this.reportFailure(execution, stateId);
    return failed;
  }

  private reportFailure(execution: WorkflowExecution, stateId: string): void {
    const message = execution.currentState.errorMessage ?? "Unknown error";
    console.error(
      `[StateMachineEngine] Execution ${execution.executionId} failed at '${stateId}': ${message}`
    );
    this.eventEmitter.emit(
      createExecutionFailedEvent(
        execution.executionId,
        execution.workflow.name,
        stateId,
        message
      )
    );
  }

  private reportCompletion(execution: WorkflowExecution): void {
    const state = execution.currentState;
    console.log(
      `[StateMachineEngine] Execution ${execution.executionId} completed at '${state.currentStateId}'`
    );
    this.eventEmitter.emit(
      createExecutionCompletedEvent(
        execution.executionId,
        execution.workflow.name,
        state.currentStateId,
        state.iterationCount
      )
    );
  }

  private throwIfCancelled(execution: WorkflowExecution): void {
    if (execution.isCancelled) {
      throw this.cancellation(execution);
    }
  }

  private cancellation(execution: WorkflowExecution): ExecutionCancelledError {
    if (!this.reportedCancellations.has(execution)) {
      this.reportedCancellations.add(execution);
      this.eventEmitter.emit(
        createExecutionCancelledEvent(
          execution.executionId,
          execution.workflow.name,
          execution.currentState.currentStateId
        )
      );
    }
    return new ExecutionCancelledError(execution.executionId);
  }
}
