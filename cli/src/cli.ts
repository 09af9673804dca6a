#!/usr/bin/env node

/**
 * flowgate CLI - run and inspect declarative workflows
 */

import { Command } from "commander";
import chalk from "chalk";
import * as path from "path";
import type { FlowgateConfig } from "@flowgate/types";
import { loadFlowgateConfig } from "@flowgate/server/config";
import type { CommandContext } from "./context.js";
import { handleValidate } from "./cli/validate-commands.js";
import { handleRun, handleResume } from "./cli/run-commands.js";
import {
  handleCheckpointList,
  handleCheckpointDelete,
  handleCheckpointClean,
} from "./cli/checkpoint-commands.js";
import {
  handleTemplateList,
  handleTemplateRender,
  handleTemplateValidate,
} from "./cli/template-commands.js";
import { VERSION } from "./version.js";

// Global state
let projectDir: string = process.cwd();
let config: FlowgateConfig | null = null;
let jsonOutput: boolean = false;

/**
 * Get command context
 */
function getContext(): CommandContext {
  if (!config) {
    try {
      config = loadFlowgateConfig(projectDir);
    } catch (error) {
      console.error(chalk.red("Error: Failed to load configuration"));
      console.error(error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  }
  return { projectDir, config, jsonOutput };
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

// Create main program
const program = new Command();

program
  .name("flowgate")
  .description("flowgate - declarative workflow state machines with human gates")
  .version(VERSION)
  .option("-C, --dir <path>", "Project directory (default: current directory)")
  .option("--json", "Output in JSON format")
  .hook("preAction", (thisCommand: Command) => {
    const opts = thisCommand.optsWithGlobals();
    if (typeof opts.dir === "string") projectDir = path.resolve(opts.dir);
    if (opts.json === true) jsonOutput = true;
  });

// ============================================================================
// WORKFLOW COMMANDS
// ============================================================================

program
  .command("validate <file>")
  .description("Parse and validate a workflow document")
  .action(async (file: string) => {
    await handleValidate(getContext(), file);
  });

program
  .command("run <file>")
  .description("Run a workflow to completion")
  .option("-i, --input <text>", "Execution input", "")
  .option(
    "-r, --responses <json>",
    "Scripted executor responses (inline JSON or path to a JSON file)"
  )
  .option("-y, --auto-approve", "Approve every human gate without prompting")
  .option("--execution-id <id>", "Use a fixed execution id")
  .action(async (file: string, options) => {
    await handleRun(getContext(), file, options);
  });

program
  .command("resume <executionId>")
  .description("Continue an execution from its latest checkpoint")
  .option(
    "-r, --responses <json>",
    "Scripted executor responses (inline JSON or path to a JSON file)"
  )
  .option("-y, --auto-approve", "Approve every human gate without prompting")
  .action(async (executionId: string, options) => {
    await handleResume(getContext(), executionId, options);
  });

// ============================================================================
// CHECKPOINT COMMANDS
// ============================================================================

const checkpoints = program
  .command("checkpoints")
  .alias("checkpoint")
  .description("Manage saved checkpoints");

checkpoints
  .command("list <executionId>")
  .description("List checkpoints of an execution, oldest first")
  .action(async (executionId: string) => {
    await handleCheckpointList(getContext(), executionId);
  });

checkpoints
  .command("delete <executionId> [checkpointId]")
  .description("Delete one checkpoint, or all checkpoints of an execution")
  .action(async (executionId: string, checkpointId: string | undefined) => {
    await handleCheckpointDelete(getContext(), executionId, checkpointId);
  });

checkpoints
  .command("clean")
  .description("Remove checkpoints older than a duration")
  .requiredOption("--older-than <duration>", "Age threshold, e.g. 7d or 12h")
  .action(async (options) => {
    await handleCheckpointClean(getContext(), options);
  });

// ============================================================================
// TEMPLATE COMMANDS
// ============================================================================

const template = program
  .command("template")
  .alias("templates")
  .description("Work with workflow templates");

template
  .command("list")
  .description("List available templates")
  .action(async () => {
    await handleTemplateList(getContext());
  });

template
  .command("render <name>")
  .description("Render a template with parameters")
  .option("-p, --param <key=value>", "Template parameter (repeatable)", collect, [])
  .action(async (name: string, options) => {
    await handleTemplateRender(getContext(), name, options);
  });

template
  .command("validate <name>")
  .description("Check a template for syntax problems")
  .action(async (name: string) => {
    await handleTemplateValidate(getContext(), name);
  });

// Parse arguments
program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red("Error:"), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
