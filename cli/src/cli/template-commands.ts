/**
 * CLI handlers for workflow templates
 */

import chalk from "chalk";
import {
  WorkflowTemplateResolutionError,
  WorkflowTemplateResolver,
  YamlWorkflowLoader,
  type TemplateParameters,
} from "@flowgate/server";
import { resolveProjectPath } from "@flowgate/server/config";
import type { CommandContext } from "../context.js";

export interface TemplateRenderOptions {
  /** Repeated `key=value` pairs; keys may be dotted */
  param?: string[];
}

function createResolver(ctx: CommandContext): WorkflowTemplateResolver {
  return new WorkflowTemplateResolver(new YamlWorkflowLoader(), {
    templatesDirectory: resolveProjectPath(
      ctx.projectDir,
      ctx.config.templatesDirectory
    ),
  });
}

/**
 * Parse `key=value` pairs into a flat parameter object.
 *
 * @throws Error if a pair has no '=' or an empty key
 */
export function parseTemplateParams(pairs: string[]): TemplateParameters {
  const parameters: TemplateParameters = {};
  for (const pair of pairs) {
    const separator = pair.indexOf("=");
    const key = separator === -1 ? "" : pair.slice(0, separator).trim();
    if (key === "") {
      throw new Error(`Invalid parameter '${pair}'. Expected key=value`);
    }
    parameters[key] = pair.slice(separator + 1);
  }
  return parameters;
}

export async function handleTemplateList(ctx: CommandContext): Promise<void> {
  const templates = await createResolver(ctx).getAvailableTemplates();

  if (ctx.jsonOutput) {
    console.log(JSON.stringify(templates, null, 2));
    return;
  }

  if (templates.length === 0) {
    console.log(chalk.gray("No templates found"));
    return;
  }
  for (const template of templates) {
    console.log(chalk.cyan(template));
  }
}

export async function handleTemplateRender(
  ctx: CommandContext,
  name: string,
  options: TemplateRenderOptions
): Promise<void> {
  try {
    const parameters = parseTemplateParams(options.param ?? []);
    const resolver = createResolver(ctx);
    const rendered = await resolver.renderTemplate(name, parameters);
    // Make sure the result is a loadable workflow before printing it
    const workflow = await resolver.resolve(name, parameters);

    if (ctx.jsonOutput) {
      console.log(JSON.stringify({ name: workflow.name, yaml: rendered }, null, 2));
    } else {
      process.stdout.write(rendered.endsWith("\n") ? rendered : `${rendered}\n`);
    }
  } catch (error) {
    console.error(chalk.red("✗ Failed to render template"), chalk.cyan(name));
    if (error instanceof WorkflowTemplateResolutionError) {
      console.error(error.message);
      for (const parameter of error.unresolvedParameters) {
        console.error(chalk.gray(`  missing: ${parameter}`));
      }
    } else {
      console.error(error instanceof Error ? error.message : String(error));
    }
    process.exit(1);
  }
}

export async function handleTemplateValidate(
  ctx: CommandContext,
  name: string
): Promise<void> {
  const result = await createResolver(ctx).validateTemplate(name);

  if (ctx.jsonOutput) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    if (result.isValid) {
      console.log(chalk.green("✓ Template is valid"), chalk.cyan(name));
    } else {
      console.log(chalk.red("✗ Template is invalid"), chalk.cyan(name));
    }
    if (result.parameters.length > 0) {
      console.log(chalk.gray(`  Parameters: ${result.parameters.join(", ")}`));
    }
    for (const error of result.errors) {
      console.log(chalk.red(`  error: ${error}`));
    }
    for (const warning of result.warnings) {
      console.log(chalk.yellow(`  warning: ${warning}`));
    }
  }

  if (!result.isValid) {
    process.exit(1);
  }
}
