/**
 * CLI handlers for checkpoint maintenance
 */

import chalk from "chalk";
import { formatDuration, parseDuration } from "@flowgate/server";
import { openCheckpointStore, type CommandContext } from "../context.js";

export interface CheckpointCleanOptions {
  olderThan: string;
}

export async function handleCheckpointList(
  ctx: CommandContext,
  executionId: string
): Promise<void> {
  const store = openCheckpointStore(ctx);
  const checkpoints = await store.getAllForExecution(executionId);

  if (ctx.jsonOutput) {
    console.log(
      JSON.stringify(
        checkpoints.map(({ serializedState: _serialized, ...rest }) => rest),
        null,
        2
      )
    );
    return;
  }

  if (checkpoints.length === 0) {
    console.log(chalk.gray(`No checkpoints for execution ${executionId}`));
    return;
  }

  console.log(chalk.bold(`${checkpoints.length} checkpoint(s) for ${executionId}:`));
  for (const checkpoint of checkpoints) {
    console.log(
      chalk.cyan(checkpoint.checkpointId),
      chalk.gray(checkpoint.createdAt),
      checkpoint.currentStateId ?? chalk.gray("(no state)")
    );
  }
}

/**
 * Deletes one checkpoint, or every checkpoint of the execution when no
 * checkpoint id is given.
 */
export async function handleCheckpointDelete(
  ctx: CommandContext,
  executionId: string,
  checkpointId?: string
): Promise<void> {
  const store = openCheckpointStore(ctx);

  if (checkpointId !== undefined) {
    const checkpoint = await store.get(checkpointId);
    if (!checkpoint || checkpoint.executionId !== executionId) {
      console.error(chalk.red("✗ Checkpoint not found"), chalk.cyan(checkpointId));
      process.exit(1);
    }
    await store.delete(checkpointId);
    if (ctx.jsonOutput) {
      console.log(JSON.stringify({ deleted: 1 }));
    } else {
      console.log(chalk.green("✓ Deleted checkpoint"), chalk.cyan(checkpointId));
    }
    return;
  }

  const deleted = await store.deleteAllForExecution(executionId);
  if (ctx.jsonOutput) {
    console.log(JSON.stringify({ deleted }));
  } else {
    console.log(
      chalk.green(`✓ Deleted ${deleted} checkpoint(s) for`),
      chalk.cyan(executionId)
    );
  }
}

export async function handleCheckpointClean(
  ctx: CommandContext,
  options: CheckpointCleanOptions
): Promise<void> {
  let maxAgeMs: number;
  try {
    maxAgeMs = parseDuration(options.olderThan);
  } catch (error) {
    console.error(chalk.red("✗ Invalid --older-than value"));
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }

  const store = openCheckpointStore(ctx);
  const removed = await store.cleanupOlderThan(maxAgeMs);

  if (ctx.jsonOutput) {
    console.log(JSON.stringify({ removed }));
  } else {
    console.log(
      chalk.green(`✓ Removed ${removed} checkpoint(s) older than ${formatDuration(maxAgeMs)}`)
    );
  }
}
