/**
 * Core types for flowgate
 */

export * from "./workflows.js";

/**
 * Project-level configuration (.flowgate/config.json)
 */
export interface FlowgateConfig {
  version: string;
  /** Where named workflow documents live */
  workflowsDirectory: string;
  templatesDirectory: string;
  checkpointBackend: CheckpointBackend;
  checkpointDirectory: string;
  triggerPollIntervalMs: number;
  /** Unset means a trigger may be waited on forever */
  maxTriggerWaitMs?: number;
  port: number;
}

export type CheckpointBackend = "filesystem" | "sqlite" | "memory";
