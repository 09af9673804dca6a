/**
 * Shared state handed to every command handler
 */

import type { FlowgateConfig } from "@flowgate/types";
import {
  createCheckpointStore,
  StateMachineEngine,
  type AgentExecutor,
  type CheckpointStore,
} from "@flowgate/server";
import { resolveProjectPath } from "@flowgate/server/config";

export interface CommandContext {
  projectDir: string;
  config: FlowgateConfig;
  jsonOutput: boolean;
}

export function openCheckpointStore(ctx: CommandContext): CheckpointStore {
  return createCheckpointStore(
    ctx.config.checkpointBackend,
    resolveProjectPath(ctx.projectDir, ctx.config.checkpointDirectory)
  );
}

export function createEngine(
  ctx: CommandContext,
  executor: AgentExecutor,
  checkpointStore: CheckpointStore = openCheckpointStore(ctx)
): StateMachineEngine {
  return new StateMachineEngine(
    { executor, checkpointStore },
    {
      triggerPollIntervalMs: ctx.config.triggerPollIntervalMs,
      maxTriggerWaitMs: ctx.config.maxTriggerWaitMs,
    }
  );
}
