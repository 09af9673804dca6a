/**
 * Workflow error classes
 *
 * Parse and validation errors block an execution before any state runs.
 * Registry misuse (unknown or wrongly staged execution ids) throws to the
 * caller. Everything that happens inside a running execution is turned into
 * a failed snapshot instead.
 */

import type { WorkflowValidationIssue } from "@flowgate/types";

/**
 * Error thrown when a workflow document cannot be parsed.
 */
export class WorkflowParseError extends Error {
  /** File the document came from, when loaded from disk */
  readonly filePath?: string;
  /** 1-based line of the offending token, when known */
  readonly line?: number;
  /** 1-based column of the offending token, when known */
  readonly column?: number;

  constructor(
    message: string,
    location: { filePath?: string; line?: number; column?: number } = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "WorkflowParseError";
    this.filePath = location.filePath;
    this.line = location.line;
    this.column = location.column;
  }

  /**
   * Human readable location prefix, e.g. "in 'flow.yaml' at line 3, column 5".
   */
  get location(): string {
    let location = this.filePath !== undefined ? `in '${this.filePath}'` : "";
    if (this.line !== undefined) {
      location += `${location ? " " : ""}at line ${this.line}`;
      if (this.column !== undefined) {
        location += `, column ${this.column}`;
      }
    }
    return location;
  }
}

/**
 * Error thrown when an invalid definition is handed to the engine.
 */
export class WorkflowValidationError extends Error {
  readonly workflowName: string;
  readonly errors: WorkflowValidationIssue[];

  constructor(workflowName: string, errors: WorkflowValidationIssue[]) {
    super(
      `Invalid workflow '${workflowName}': ${errors.map((e) => e.message).join(", ")}`
    );
    this.name = "WorkflowValidationError";
    this.workflowName = workflowName;
    this.errors = errors;
  }
}

/**
 * Error thrown when an execution id is not known to the registry.
 */
export class ExecutionNotFoundError extends Error {
  readonly executionId: string;

  constructor(executionId: string) {
    super(`Execution not found: ${executionId}`);
    this.name = "ExecutionNotFoundError";
    this.executionId = executionId;
  }
}

/**
 * Error thrown when an operation is invalid for the execution's current stage.
 */
export class ExecutionStateError extends Error {
  readonly executionId: string;
  readonly currentStateId: string;
  readonly reason: string;

  constructor(executionId: string, currentStateId: string, reason: string) {
    super(
      `Execution ${executionId} at state '${currentStateId}': ${reason}`
    );
    this.name = "ExecutionStateError";
    this.executionId = executionId;
    this.currentStateId = currentStateId;
    this.reason = reason;
  }
}

/**
 * Error thrown when no evaluator is registered for a trigger type.
 */
export class TriggerNotSupportedError extends Error {
  readonly triggerType: string;

  constructor(triggerType: string) {
    super(`Trigger type '${triggerType}' is not supported`);
    this.name = "TriggerNotSupportedError";
    this.triggerType = triggerType;
  }
}

/**
 * Error thrown when an execution cannot be resumed from its checkpoint.
 */
export class CheckpointResumeError extends Error {
  readonly executionId: string;

  constructor(executionId: string, message: string) {
    super(message);
    this.name = "CheckpointResumeError";
    this.executionId = executionId;
  }
}

/**
 * Thrown out of the snapshot stream once a cancellation takes effect.
 */
export class ExecutionCancelledError extends Error {
  readonly executionId: string;

  constructor(executionId: string) {
    super(`Execution ${executionId} was cancelled`);
    this.name = "ExecutionCancelledError";
    this.executionId = executionId;
  }
}

/**
 * Error thrown when an executor outlives its state's timeout.
 */
export class StepTimeoutError extends Error {
  readonly stateId: string;
  readonly timeoutMs: number;

  constructor(stateId: string, timeoutMs: number) {
    super(`State '${stateId}' timed out after ${timeoutMs}ms`);
    this.name = "StepTimeoutError";
    this.stateId = stateId;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Error thrown when a step names an executor nobody registered.
 */
export class UnknownExecutorError extends Error {
  readonly executorName: string;
  readonly availableExecutors: string[];

  constructor(executorName: string, availableExecutors: string[]) {
    super(
      `Unknown executor '${executorName}'. Registered: [${availableExecutors.join(", ")}]`
    );
    this.name = "UnknownExecutorError";
    this.executorName = executorName;
    this.availableExecutors = availableExecutors;
  }
}

/**
 * Error thrown when a workflow template file does not exist.
 */
export class WorkflowTemplateNotFoundError extends Error {
  readonly templateName: string;
  readonly searchedPaths: string[];

  constructor(templateName: string, searchedPaths: string[]) {
    super(
      `Workflow template '${templateName}' not found. Searched: ${searchedPaths.join(", ")}`
    );
    this.name = "WorkflowTemplateNotFoundError";
    this.templateName = templateName;
    this.searchedPaths = searchedPaths;
  }
}

/**
 * Error thrown when template placeholders cannot all be substituted.
 */
export class WorkflowTemplateResolutionError extends Error {
  readonly templateName: string;
  readonly unresolvedParameters: string[];

  constructor(
    templateName: string,
    unresolvedParameters: string[],
    detail?: string,
    options?: { cause?: unknown }
  ) {
    super(
      detail !== undefined
        ? `Failed to resolve workflow template '${templateName}': ${detail}`
        : `Failed to resolve workflow template '${templateName}'. Unresolved parameters: ${unresolvedParameters.join(", ")}`,
      options
    );
    this.name = "WorkflowTemplateResolutionError";
    this.templateName = templateName;
    this.unresolvedParameters = unresolvedParameters;
  }
}
