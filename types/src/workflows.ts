/**
 * Workflow types for flowgate
 * Declarative state machine workflows: definitions, runtime snapshots and checkpoints
 */

// =============================================================================
// Definition Enums
// =============================================================================

/**
 * Node kinds of a workflow state machine
 */
export type WorkflowStateType =
  | "start" // Passthrough entry point
  | "agent" // Invokes a single executor
  | "parallel" // Fans out to several executors and joins
  | "human_gate" // Blocks until approved or rejected
  | "escalation" // Fails the execution on purpose
  | "terminal"; // Completes the execution

/**
 * Trigger kinds that gate entry into a state
 */
export type TriggerType =
  | "file_exists"
  | "directory_not_empty"
  | "immediate"
  | "expression"; // Reserved, not evaluated at runtime

export const WORKFLOW_STATE_TYPES: readonly WorkflowStateType[] = [
  "start",
  "agent",
  "parallel",
  "human_gate",
  "escalation",
  "terminal",
];

export const TRIGGER_TYPES: readonly TriggerType[] = [
  "file_exists",
  "directory_not_empty",
  "immediate",
  "expression",
];

// =============================================================================
// Definition Model
// =============================================================================

/**
 * Reference to an agent the workflow depends on
 */
export interface AgentReference {
  ref: string;
  alias?: string;
}

export interface TriggerDefinition {
  type: TriggerType;
  path?: string;
  expression?: string;
}

/**
 * One conditional edge. Conditions are evaluated in declared order; the
 * entry marked `isDefault` is only taken when nothing else matched.
 */
export interface ConditionalTransition {
  if?: string;
  then: string;
  isDefault: boolean;
}

export interface HumanGateSettings {
  /** Free-form tag, "always_require" unless overridden */
  approvalMode: string;
  timeoutMs: number;
  onApprove?: string;
  onReject?: string;
  notifyEmail?: string;
}

export interface WorkflowSettings {
  defaultTimeoutMs: number;
  defaultMaxIterations: number;
  enableCheckpointing: boolean;
  /**
   * Read from the document and kept with the definition. Checkpoints are
   * written to the store the engine was built with, which the project
   * configuration chooses.
   */
  checkpointDirectory: string;
}

export interface WorkflowStateDefinition {
  id: string;
  type: WorkflowStateType;
  /** Step name for agent states */
  executor?: string;
  /** Step names for parallel states */
  executors: string[];
  trigger?: TriggerDefinition;
  next?: string;
  conditions: ConditionalTransition[];
  humanGate?: HumanGateSettings;
  maxIterations?: number;
  timeoutMs?: number;
}

/**
 * A loaded workflow document. Never mutated after loading.
 */
export interface WorkflowDefinition {
  name: string;
  version: string;
  description?: string;
  agents: AgentReference[];
  states: WorkflowStateDefinition[];
  settings: WorkflowSettings;
}

export const DEFAULT_HUMAN_GATE_TIMEOUT_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_WORKFLOW_SETTINGS: Readonly<WorkflowSettings> = {
  defaultTimeoutMs: 30 * 60 * 1000,
  defaultMaxIterations: 5,
  enableCheckpointing: true,
  checkpointDirectory: ".flowgate/checkpoints",
};

// =============================================================================
// Validation
// =============================================================================

export type WorkflowValidationCode =
  | "name_required"
  | "no_states"
  | "duplicate_state_id"
  | "unknown_state_reference"
  | "unknown_executor"
  | "no_terminal_state";

export interface WorkflowValidationIssue {
  code: WorkflowValidationCode;
  message: string;
  /** Location inside the document, e.g. "states[CHECK].next" */
  path: string;
}

export interface WorkflowValidationResult {
  isValid: boolean;
  errors: WorkflowValidationIssue[];
  warnings: WorkflowValidationIssue[];
}

// =============================================================================
// Runtime
// =============================================================================

/**
 * Runtime status of one execution
 */
export type WorkflowExecutionStatus =
  | "running"
  | "waiting_for_trigger"
  | "waiting_for_approval"
  | "completed" // Absorbing
  | "failed"; // Absorbing

export type OutputData = Readonly<Record<string, unknown>>;

/**
 * Immutable snapshot of an execution. A new value is produced on every
 * transition.
 */
export interface WorkflowRuntimeState {
  readonly executionId: string;
  readonly workflowName: string;
  readonly currentStateId: string;
  readonly status: WorkflowExecutionStatus;
  readonly input: string;
  readonly startedAt: string;
  readonly lastUpdatedAt: string;
  readonly completedAt?: string;
  readonly errorMessage?: string;
  readonly iterationCount: number;
  readonly outputData: OutputData;
}

/**
 * Caller-supplied context. It is handed to every executor invocation and
 * carried through checkpoints, so a resumed execution sees the same values.
 */
export interface WorkflowExecutionContext {
  /** Base for relative trigger paths */
  workingDirectory?: string;
  metadata?: Record<string, string>;
  /** Set when this execution was started on behalf of another one */
  parentExecutionId?: string;
}

export interface WorkflowExecutionSummary {
  executionId: string;
  workflowName: string;
  currentState: string;
  status: WorkflowExecutionStatus;
  startedAt: string;
  lastUpdatedAt: string;
}

export interface ApprovalDecision {
  approved: boolean;
  feedback?: string;
}

/** OutputData key that receives rejection feedback from a human gate */
export const APPROVAL_FEEDBACK_KEY = "approval_feedback";

/**
 * What an executor hands back to the engine
 */
export interface AgentExecutionResult {
  success: boolean;
  errorMessage?: string;
  data: Record<string, unknown>;
}

// =============================================================================
// Checkpoints
// =============================================================================

/**
 * Everything needed to continue an execution: the full definition travels
 * with the runtime fields.
 */
export interface WorkflowResumeContext {
  workflow: WorkflowDefinition;
  currentStateId: string;
  input: string;
  executionId: string;
  startedAt: string;
  iterationCount: number;
  outputData: Record<string, unknown>;
  workingDirectory?: string;
  metadata?: Record<string, string>;
  parentExecutionId?: string;
}

export interface CheckpointData {
  checkpointId: string;
  executionId: string;
  workflowName: string;
  currentStateId?: string;
  /** JSON of a WorkflowResumeContext */
  serializedState?: string;
  input?: string;
  createdAt: string;
  executionStartedAt?: string;
  metadata?: Record<string, string>;
}
