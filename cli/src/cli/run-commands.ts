/**
 * CLI handlers for running and resuming workflow executions
 */

import chalk from "chalk";
import * as readline from "readline";
import type { ApprovalDecision, WorkflowRuntimeState } from "@flowgate/types";
import {
  ExecutionCancelledError,
  WorkflowParseError,
  WorkflowValidationError,
  YamlWorkflowLoader,
  type IWorkflowEngine,
} from "@flowgate/server";
import { createEngine, type CommandContext } from "../context.js";
import {
  loadScriptedResponses,
  ScriptedAgentExecutor,
} from "../scripted-executor.js";

export interface RunOptions {
  input?: string;
  /** Inline JSON or a path to a JSON file */
  responses?: string;
  autoApprove?: boolean;
  executionId?: string;
}

export type ResumeOptions = Omit<RunOptions, "input" | "executionId">;

/**
 * Asks for a decision when an execution reaches a human gate.
 */
export type ApprovalPrompt = (
  state: WorkflowRuntimeState
) => Promise<ApprovalDecision>;

function ask(rl: readline.Interface, question: string): Promise<string> {
  return new Promise((resolve) => {
    rl.question(question, (answer) => resolve(answer));
  });
}

/**
 * Interactive approval through stdin
 */
export async function promptApproval(
  state: WorkflowRuntimeState
): Promise<ApprovalDecision> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  try {
    const answer = await ask(
      rl,
      chalk.yellow(`⏸  Approve state '${state.currentStateId}'?`) +
        chalk.gray(" (y/N): ")
    );
    const approved =
      answer.trim().toLowerCase() === "y" ||
      answer.trim().toLowerCase() === "yes";
    const feedback = await ask(rl, chalk.gray("Feedback (optional): "));
    return {
      approved,
      feedback: feedback.trim() === "" ? undefined : feedback.trim(),
    };
  } finally {
    rl.close();
  }
}

function formatStatus(status: WorkflowRuntimeState["status"]): string {
  switch (status) {
    case "completed":
      return chalk.green(status);
    case "failed":
      return chalk.red(status);
    case "waiting_for_approval":
    case "waiting_for_trigger":
      return chalk.yellow(status);
    default:
      return chalk.blue(status);
  }
}

/**
 * Consume a snapshot stream to the end, answering human gates along the way.
 *
 * @returns The last snapshot, or undefined if the stream yielded nothing
 */
async function driveExecution(
  ctx: CommandContext,
  engine: IWorkflowEngine,
  snapshots: AsyncGenerator<WorkflowRuntimeState, void, undefined>,
  options: ResumeOptions,
  prompt: ApprovalPrompt
): Promise<WorkflowRuntimeState | undefined> {
  let last: WorkflowRuntimeState | undefined;

  for await (const snapshot of snapshots) {
    const changed =
      !last ||
      last.currentStateId !== snapshot.currentStateId ||
      last.status !== snapshot.status;
    if (changed && !ctx.jsonOutput) {
      console.log(
        chalk.gray("  →"),
        chalk.cyan(snapshot.currentStateId),
        formatStatus(snapshot.status)
      );
    }
    last = snapshot;

    if (snapshot.status === "waiting_for_approval") {
      const decision: ApprovalDecision = options.autoApprove
        ? { approved: true }
        : await prompt(snapshot);
      engine.approve(snapshot.executionId, decision);
    }
  }

  return last;
}

function reportOutcome(
  ctx: CommandContext,
  state: WorkflowRuntimeState | undefined
): void {
  if (!state) {
    console.error(chalk.red("✗ Execution produced no state"));
    process.exit(1);
  }

  if (ctx.jsonOutput) {
    console.log(JSON.stringify(state, null, 2));
  } else if (state.status === "completed") {
    console.log(chalk.green("✓ Workflow completed"), chalk.cyan(state.workflowName));
    console.log(chalk.gray(`  Execution: ${state.executionId}`));
    console.log(chalk.gray(`  Final state: ${state.currentStateId}`));
    console.log(chalk.gray(`  Iterations: ${state.iterationCount}`));
    const keys = Object.keys(state.outputData);
    if (keys.length > 0) {
      console.log(chalk.gray(`  Output: ${JSON.stringify(state.outputData)}`));
    }
  } else {
    console.error(chalk.red("✗ Workflow failed"), chalk.cyan(state.workflowName));
    console.error(chalk.gray(`  Execution: ${state.executionId}`));
    console.error(chalk.gray(`  State: ${state.currentStateId}`));
    if (state.errorMessage) {
      console.error(state.errorMessage);
    }
  }

  if (state.status !== "completed") {
    process.exit(1);
  }
}

function reportError(error: unknown, action: string): never {
  if (error instanceof ExecutionCancelledError) {
    console.error(chalk.yellow("⚠ Execution cancelled"), chalk.cyan(error.executionId));
    process.exit(1);
  }
  console.error(chalk.red(`✗ Failed to ${action}`));
  if (error instanceof WorkflowValidationError) {
    for (const issue of error.errors) {
      console.error(chalk.red(`  ${issue.path}: ${issue.message}`));
    }
  } else if (error instanceof WorkflowParseError && error.location) {
    console.error(`${error.message} (${error.location})`);
  } else {
    console.error(error instanceof Error ? error.message : String(error));
  }
  process.exit(1);
}

export async function handleRun(
  ctx: CommandContext,
  file: string,
  options: RunOptions,
  prompt: ApprovalPrompt = promptApproval
): Promise<void> {
  let last: WorkflowRuntimeState | undefined;
  try {
    const workflow = await new YamlWorkflowLoader().loadFromFile(file);
    const executor = new ScriptedAgentExecutor(
      loadScriptedResponses(options.responses)
    );
    const engine = createEngine(ctx, executor);

    if (!ctx.jsonOutput) {
      console.log(chalk.bold(`Running workflow ${workflow.name}`));
    }
    last = await driveExecution(
      ctx,
      engine,
      engine.execute(workflow, options.input ?? "", {
        executionId: options.executionId,
        context: { workingDirectory: ctx.projectDir },
      }),
      options,
      prompt
    );
  } catch (error) {
    reportError(error, "run workflow");
  }
  reportOutcome(ctx, last);
}

export async function handleResume(
  ctx: CommandContext,
  executionId: string,
  options: ResumeOptions,
  prompt: ApprovalPrompt = promptApproval
): Promise<void> {
  let last: WorkflowRuntimeState | undefined;
  try {
    const executor = new ScriptedAgentExecutor(
      loadScriptedResponses(options.responses)
    );
    const engine = createEngine(ctx, executor);

    if (!ctx.jsonOutput) {
      console.log(chalk.bold(`Resuming execution ${executionId}`));
    }
    last = await driveExecution(
      ctx,
      engine,
      engine.resumeFromCheckpoint(executionId),
      options,
      prompt
    );
  } catch (error) {
    reportError(error, "resume execution");
  }
  reportOutcome(ctx, last);
}
