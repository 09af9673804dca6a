/**
 * Agent executor collaborator
 *
 * The engine never knows what a step computes. Agent and parallel states hand
 * a step name, the execution input and the accumulated output data to an
 * AgentExecutor and merge whatever data it returns.
 */

import type {
  AgentExecutionResult,
  OutputData,
  WorkflowExecutionContext,
} from "@flowgate/types";
import { UnknownExecutorError } from "./errors.js";

export interface AgentInvocation {
  executionId: string;
  stateId: string;
  context: WorkflowExecutionContext;
  /** Fires when the state times out or the execution is cancelled */
  signal: AbortSignal;
}

export interface AgentExecutor {
  execute(
    executorName: string,
    input: string,
    contextData: OutputData,
    invocation: AgentInvocation
  ): Promise<AgentExecutionResult>;
}

export type AgentHandler = (
  input: string,
  contextData: OutputData,
  invocation: AgentInvocation
) => Promise<AgentExecutionResult> | AgentExecutionResult;

/**
 * AgentExecutor backed by a table of named handler functions.
 *
 * @example
 * ```typescript
 * const executors = new AgentExecutorRegistry()
 *   .register("builder", async (input) => ({
 *     success: true,
 *     data: { build_success: await build(input) },
 *   }));
 * ```
 */
export class AgentExecutorRegistry implements AgentExecutor {
  private readonly handlers = new Map<string, AgentHandler>();

  register(name: string, handler: AgentHandler): this {
    this.handlers.set(name, handler);
    return this;
  }

  unregister(name: string): boolean {
    return this.handlers.delete(name);
  }

  has(name: string): boolean {
    return this.handlers.has(name);
  }

  getRegisteredNames(): string[] {
    return [...this.handlers.keys()];
  }

  async execute(
    executorName: string,
    input: string,
    contextData: OutputData,
    invocation: AgentInvocation
  ): Promise<AgentExecutionResult> {
    const handler = this.handlers.get(executorName);
    if (!handler) {
      throw new UnknownExecutorError(executorName, this.getRegisteredNames());
    }
    return handler(input, contextData, invocation);
  }
}
