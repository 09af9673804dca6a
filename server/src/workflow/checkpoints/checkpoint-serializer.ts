/**
 * JSON (de)serialization of checkpoints and resume contexts.
 *
 * Stored payloads are read back through structural guards; anything that
 * does not match the expected shape is treated as unreadable.
 */

import {
  TRIGGER_TYPES,
  WORKFLOW_STATE_TYPES,
  type AgentReference,
  type CheckpointData,
  type ConditionalTransition,
  type HumanGateSettings,
  type TriggerDefinition,
  type TriggerType,
  type WorkflowDefinition,
  type WorkflowResumeContext,
  type WorkflowSettings,
  type WorkflowStateDefinition,
  type WorkflowStateType,
} from "@flowgate/types";

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isOptionalString(value: unknown): value is string | undefined {
  return value === undefined || typeof value === "string";
}

function isOptionalNumber(value: unknown): value is number | undefined {
  return value === undefined || typeof value === "number";
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return isObject(value) && Object.values(value).every((v) => typeof v === "string");
}

function isStateType(value: unknown): value is WorkflowStateType {
  return WORKFLOW_STATE_TYPES.some((type) => type === value);
}

function isTriggerType(value: unknown): value is TriggerType {
  return TRIGGER_TYPES.some((type) => type === value);
}

function safeParse(json: string): unknown {
  try {
    return JSON.parse(json);
  } catch {
    return undefined;
  }
}

// =============================================================================
// Definition guards
// =============================================================================

function toAgent(value: unknown): AgentReference | null {
  if (!isObject(value) || typeof value.ref !== "string" || !isOptionalString(value.alias)) {
    return null;
  }
  return { ref: value.ref, alias: value.alias };
}

function toTrigger(value: unknown): TriggerDefinition | null {
  if (
    !isObject(value) ||
    !isTriggerType(value.type) ||
    !isOptionalString(value.path) ||
    !isOptionalString(value.expression)
  ) {
    return null;
  }
  return { type: value.type, path: value.path, expression: value.expression };
}

function toCondition(value: unknown): ConditionalTransition | null {
  if (
    !isObject(value) ||
    typeof value.then !== "string" ||
    typeof value.isDefault !== "boolean" ||
    !isOptionalString(value.if)
  ) {
    return null;
  }
  return { if: value.if, then: value.then, isDefault: value.isDefault };
}

function toHumanGate(value: unknown): HumanGateSettings | null {
  if (
    !isObject(value) ||
    typeof value.approvalMode !== "string" ||
    typeof value.timeoutMs !== "number" ||
    !isOptionalString(value.onApprove) ||
    !isOptionalString(value.onReject) ||
    !isOptionalString(value.notifyEmail)
  ) {
    return null;
  }
  return {
    approvalMode: value.approvalMode,
    timeoutMs: value.timeoutMs,
    onApprove: value.onApprove,
    onReject: value.onReject,
    notifyEmail: value.notifyEmail,
  };
}

function toState(value: unknown): WorkflowStateDefinition | null {
  if (
    !isObject(value) ||
    typeof value.id !== "string" ||
    !isStateType(value.type) ||
    !isOptionalString(value.executor) ||
    !isOptionalString(value.next) ||
    !isOptionalNumber(value.maxIterations) ||
    !isOptionalNumber(value.timeoutMs) ||
    !Array.isArray(value.executors) ||
    !value.executors.every((e) => typeof e === "string") ||
    !Array.isArray(value.conditions)
  ) {
    return null;
  }

  const conditions = value.conditions.map(toCondition);
  if (conditions.some((c) => c === null)) {
    return null;
  }
  const trigger = value.trigger === undefined ? undefined : toTrigger(value.trigger);
  const humanGate =
    value.humanGate === undefined ? undefined : toHumanGate(value.humanGate);
  if (trigger === null || humanGate === null) {
    return null;
  }

  return {
    id: value.id,
    type: value.type,
    executor: value.executor,
    executors: value.executors.filter((e): e is string => typeof e === "string"),
    trigger,
    next: value.next,
    conditions: conditions.filter((c): c is ConditionalTransition => c !== null),
    humanGate,
    maxIterations: value.maxIterations,
    timeoutMs: value.timeoutMs,
  };
}

function toSettings(value: unknown): WorkflowSettings | null {
  if (
    !isObject(value) ||
    typeof value.defaultTimeoutMs !== "number" ||
    typeof value.defaultMaxIterations !== "number" ||
    typeof value.enableCheckpointing !== "boolean" ||
    typeof value.checkpointDirectory !== "string"
  ) {
    return null;
  }
  return {
    defaultTimeoutMs: value.defaultTimeoutMs,
    defaultMaxIterations: value.defaultMaxIterations,
    enableCheckpointing: value.enableCheckpointing,
    checkpointDirectory: value.checkpointDirectory,
  };
}

export function toWorkflowDefinition(value: unknown): WorkflowDefinition | null {
  if (
    !isObject(value) ||
    typeof value.name !== "string" ||
    typeof value.version !== "string" ||
    !isOptionalString(value.description) ||
    !Array.isArray(value.agents) ||
    !Array.isArray(value.states)
  ) {
    return null;
  }

  const agents = value.agents.map(toAgent);
  const states = value.states.map(toState);
  const settings = toSettings(value.settings);
  if (settings === null) {
    return null;
  }

  const validAgents = agents.filter((a): a is AgentReference => a !== null);
  const validStates = states.filter((s): s is WorkflowStateDefinition => s !== null);
  if (validAgents.length !== agents.length || validStates.length !== states.length) {
    return null;
  }

  return {
    name: value.name,
    version: value.version,
    description: value.description,
    agents: validAgents,
    states: validStates,
    settings,
  };
}

// =============================================================================
// Resume context
// =============================================================================

export function serializeResumeContext(context: WorkflowResumeContext): string {
  return JSON.stringify(context);
}

/**
 * @returns null if the payload is not valid JSON or not a resume context
 */
export function parseResumeContext(json: string): WorkflowResumeContext | null {
  const value = safeParse(json);
  if (
    !isObject(value) ||
    typeof value.currentStateId !== "string" ||
    typeof value.input !== "string" ||
    typeof value.executionId !== "string" ||
    typeof value.startedAt !== "string" ||
    typeof value.iterationCount !== "number" ||
    !isObject(value.outputData) ||
    !isOptionalString(value.workingDirectory) ||
    !isOptionalString(value.parentExecutionId) ||
    (value.metadata !== undefined && !isStringRecord(value.metadata))
  ) {
    return null;
  }

  const workflow = toWorkflowDefinition(value.workflow);
  if (!workflow) {
    return null;
  }

  return {
    workflow,
    currentStateId: value.currentStateId,
    input: value.input,
    executionId: value.executionId,
    startedAt: value.startedAt,
    iterationCount: value.iterationCount,
    outputData: { ...value.outputData },
    workingDirectory: value.workingDirectory,
    metadata: value.metadata === undefined ? undefined : { ...value.metadata },
    parentExecutionId: value.parentExecutionId,
  };
}

// =============================================================================
// Checkpoint records
// =============================================================================

export function toCheckpointData(value: unknown): CheckpointData | null {
  if (
    !isObject(value) ||
    typeof value.checkpointId !== "string" ||
    typeof value.executionId !== "string" ||
    typeof value.workflowName !== "string" ||
    typeof value.createdAt !== "string" ||
    !isOptionalString(value.currentStateId) ||
    !isOptionalString(value.serializedState) ||
    !isOptionalString(value.input) ||
    !isOptionalString(value.executionStartedAt) ||
    (value.metadata !== undefined && !isStringRecord(value.metadata))
  ) {
    return null;
  }

  return {
    checkpointId: value.checkpointId,
    executionId: value.executionId,
    workflowName: value.workflowName,
    currentStateId: value.currentStateId,
    serializedState: value.serializedState,
    input: value.input,
    createdAt: value.createdAt,
    executionStartedAt: value.executionStartedAt,
    metadata: isStringRecord(value.metadata) ? value.metadata : undefined,
  };
}
