/**
 * Workflow System Module
 *
 * Declarative state machine workflows: loading, validation, execution,
 * checkpointing and approval.
 */

// Errors
export {
  WorkflowParseError,
  WorkflowValidationError,
  ExecutionNotFoundError,
  ExecutionStateError,
  TriggerNotSupportedError,
  CheckpointResumeError,
  ExecutionCancelledError,
  StepTimeoutError,
  UnknownExecutorError,
  WorkflowTemplateNotFoundError,
  WorkflowTemplateResolutionError,
} from "./errors.js";

// Loading and validation
export {
  YamlWorkflowLoader,
  mapWorkflowDocument,
  type IWorkflowLoader,
} from "./workflow-loader.js";
export { validateWorkflow, getAgentNames } from "./workflow-validator.js";
export {
  WorkflowTemplateResolver,
  type TemplateParameters,
  type TemplateResolverOptions,
  type TemplateValidationResult,
} from "./template-resolver.js";

// Durations
export { parseDuration, formatDuration } from "../utils/duration-parser.js";

// Conditions and triggers
export { evaluateExpression } from "./expression-evaluator.js";
export {
  TriggerEvaluatorRegistry,
  FileExistsTriggerEvaluator,
  DirectoryNotEmptyTriggerEvaluator,
  ImmediateTriggerEvaluator,
  createDefaultTriggerRegistry,
  type TriggerEvaluator,
  type TriggerContext,
} from "./triggers.js";

// Executors
export {
  AgentExecutorRegistry,
  type AgentExecutor,
  type AgentHandler,
  type AgentInvocation,
} from "./agent-executor.js";

// Checkpoints
export type { CheckpointStore } from "./checkpoints/checkpoint-store.js";
export { CheckpointManager } from "./checkpoints/checkpoint-manager.js";
export { InMemoryCheckpointStore } from "./checkpoints/memory-checkpoint-store.js";
export { FileSystemCheckpointStore } from "./checkpoints/file-system-checkpoint-store.js";
export {
  SqliteCheckpointStore,
  initCheckpointDatabase,
} from "./checkpoints/sqlite-checkpoint-store.js";
export { createCheckpointStore } from "./checkpoints/create-checkpoint-store.js";

// Registry
export {
  ExecutionRegistry,
  WorkflowExecution,
  ApprovalGate,
  type ApprovalGateOutcome,
} from "./execution-registry.js";

// Events
export {
  WorkflowEventEmitter,
  WorkflowEventType,
  type WorkflowEventPayload,
  type WorkflowEventListener,
} from "./workflow-event-emitter.js";

// Engine
export {
  DEFAULT_ENGINE_OPTIONS,
  type IWorkflowEngine,
  type WorkflowEngineOptions,
  type ExecuteOptions,
} from "./workflow-engine.js";
export {
  StateMachineEngine,
  findStartState,
  isTerminalState,
  resolveNextStateId,
  type StateMachineEngineDependencies,
} from "./engines/state-machine-engine.js";
