/**
 * CLI handler for workflow validation
 */

import chalk from "chalk";
import { YamlWorkflowLoader, WorkflowParseError } from "@flowgate/server";
import type { WorkflowValidationIssue } from "@flowgate/types";
import type { CommandContext } from "../context.js";

function formatIssue(issue: WorkflowValidationIssue): string {
  return `${issue.path}: ${issue.message} (${issue.code})`;
}

export async function handleValidate(
  ctx: CommandContext,
  file: string
): Promise<void> {
  const loader = new YamlWorkflowLoader();

  try {
    const workflow = await loader.loadFromFile(file);
    const result = loader.validate(workflow);

    if (ctx.jsonOutput) {
      console.log(
        JSON.stringify(
          {
            file,
            name: workflow.name,
            isValid: result.isValid,
            errors: result.errors,
            warnings: result.warnings,
          },
          null,
          2
        )
      );
    } else {
      if (result.isValid) {
        console.log(chalk.green("✓ Workflow is valid"), chalk.cyan(workflow.name));
      } else {
        console.log(chalk.red("✗ Workflow is invalid"), chalk.cyan(workflow.name));
      }
      console.log(chalk.gray(`  States: ${workflow.states.length}`));

      for (const error of result.errors) {
        console.log(chalk.red(`  error: ${formatIssue(error)}`));
      }
      for (const warning of result.warnings) {
        console.log(chalk.yellow(`  warning: ${formatIssue(warning)}`));
      }
    }

    if (!result.isValid) {
      process.exit(1);
    }
  } catch (error) {
    if (error instanceof WorkflowParseError) {
      console.error(chalk.red("✗ Failed to parse workflow"));
      console.error(error.message);
      if (error.location) {
        console.error(chalk.gray(`  ${error.location}`));
      }
      process.exit(1);
    }
    throw error;
  }
}
