/**
 * Workflow template resolution
 *
 * A template is a workflow YAML document in the templates directory with
 * `{{ dotted.path }}` placeholders. Resolving substitutes the placeholders
 * from a parameter object and loads the result as a workflow.
 */

import * as fs from "fs/promises";
import * as path from "path";
import yaml from "js-yaml";
import type { WorkflowDefinition } from "@flowgate/types";
import {
  WorkflowTemplateNotFoundError,
  WorkflowTemplateResolutionError,
} from "./errors.js";
import type { IWorkflowLoader } from "./workflow-loader.js";

const TEMPLATE_EXTENSION = ".yaml";

const PLACEHOLDER_PATTERN = /\{\{\s*([A-Za-z_][A-Za-z0-9_.]*)\s*\}\}/g;

const PARAMETER_SEGMENT = /^[A-Za-z_][A-Za-z0-9_]*$/;

export interface TemplateResolverOptions {
  templatesDirectory: string;
  /** Fail on placeholders with no parameter (default true) */
  strict?: boolean;
  /**
   * When not strict, replace unknown placeholders with `defaultValue`
   * instead of leaving them in place
   */
  useDefaultForMissing?: boolean;
  defaultValue?: string;
}

export interface TemplateValidationResult {
  templateName: string;
  isValid: boolean;
  errors: string[];
  warnings: string[];
  /** Placeholder paths found, sorted */
  parameters: string[];
}

/**
 * Parameters are either flat dotted keys (`{"goal.name": "x"}`) or nested
 * objects (`{goal: {name: "x"}}`). Keys match case-insensitively.
 */
export type TemplateParameters = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function findKey(
  parameters: Record<string, unknown>,
  key: string
): string | undefined {
  if (key in parameters) {
    return key;
  }
  const lower = key.toLowerCase();
  return Object.keys(parameters).find((k) => k.toLowerCase() === lower);
}

function lookupParameter(
  parameters: TemplateParameters,
  parameterPath: string
): { found: boolean; value?: unknown } {
  const flat = findKey(parameters, parameterPath);
  if (flat !== undefined) {
    return { found: true, value: parameters[flat] };
  }

  let current: unknown = parameters;
  for (const segment of parameterPath.split(".")) {
    if (!isRecord(current)) {
      return { found: false };
    }
    const key = findKey(current, segment);
    if (key === undefined) {
      return { found: false };
    }
    current = current[key];
  }
  return { found: true, value: current };
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }
  if (Array.isArray(value)) {
    return value.map(formatValue).join(",");
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
}

function isValidParameterPath(parameterPath: string): boolean {
  return parameterPath
    .split(".")
    .every((segment) => PARAMETER_SEGMENT.test(segment));
}

export class WorkflowTemplateResolver {
  private readonly templatesDirectory: string;
  private readonly strict: boolean;
  private readonly useDefaultForMissing: boolean;
  private readonly defaultValue: string;

  constructor(
    private readonly loader: IWorkflowLoader,
    options: TemplateResolverOptions
  ) {
    this.templatesDirectory = options.templatesDirectory;
    this.strict = options.strict ?? true;
    this.useDefaultForMissing = options.useDefaultForMissing ?? false;
    this.defaultValue = options.defaultValue ?? "";
  }

  /**
   * @throws WorkflowTemplateNotFoundError if the template file is missing
   * @throws WorkflowTemplateResolutionError on unresolved placeholders or an
   * unloadable result
   */
  async resolve(
    templateName: string,
    parameters: TemplateParameters
  ): Promise<WorkflowDefinition> {
    const rendered = await this.renderTemplate(templateName, parameters);

    try {
      return this.loader.loadFromString(rendered, this.getTemplatePath(templateName));
    } catch (error) {
      throw new WorkflowTemplateResolutionError(
        templateName,
        [],
        error instanceof Error ? error.message : String(error),
        { cause: error }
      );
    }
  }

  /**
   * Read a template file and substitute its placeholders.
   */
  async renderTemplate(
    templateName: string,
    parameters: TemplateParameters
  ): Promise<string> {
    const content = await this.readTemplate(templateName);
    return this.render(templateName, content, parameters);
  }

  /**
   * Substitute placeholders without loading the result.
   *
   * @throws WorkflowTemplateResolutionError on unresolved placeholders
   */
  render(
    templateName: string,
    content: string,
    parameters: TemplateParameters
  ): string {
    const unresolved: string[] = [];

    const rendered = content.replace(
      PLACEHOLDER_PATTERN,
      (placeholder: string, parameterPath: string) => {
        const { found, value } = lookupParameter(parameters, parameterPath);
        if (found) {
          return formatValue(value);
        }
        if (this.strict) {
          unresolved.push(parameterPath);
        }
        return this.useDefaultForMissing ? this.defaultValue : placeholder;
      }
    );

    if (unresolved.length > 0) {
      throw new WorkflowTemplateResolutionError(templateName, unresolved);
    }
    return rendered;
  }

  async templateExists(templateName: string): Promise<boolean> {
    try {
      const stat = await fs.stat(this.getTemplatePath(templateName));
      return stat.isFile();
    } catch {
      return false;
    }
  }

  /**
   * Template names (without extension), sorted.
   */
  async getAvailableTemplates(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.templatesDirectory);
    } catch {
      return [];
    }
    return entries
      .filter((name) => name.toLowerCase().endsWith(TEMPLATE_EXTENSION))
      .map((name) => path.basename(name, path.extname(name)))
      .sort();
  }

  async validateTemplate(templateName: string): Promise<TemplateValidationResult> {
    const templatePath = this.getTemplatePath(templateName);
    const failure = (message: string): TemplateValidationResult => ({
      templateName,
      isValid: false,
      errors: [message],
      warnings: [],
      parameters: [],
    });

    let content: string;
    try {
      content = await fs.readFile(templatePath, "utf8");
    } catch {
      return failure(`Template file not found: ${templatePath}`);
    }

    const errors: string[] = [];
    const warnings: string[] = [];
    const parameters = new Set<string>();

    for (const match of content.matchAll(PLACEHOLDER_PATTERN)) {
      const parameterPath = match[1];
      parameters.add(parameterPath);
      if (!isValidParameterPath(parameterPath)) {
        errors.push(`Invalid parameter path syntax: ${parameterPath}`);
      }
    }

    if (!content.includes("name:")) {
      errors.push("Template must define 'name' field");
    }
    if (!content.includes("states:")) {
      errors.push("Template must define 'states' field");
    }
    if (parameters.size === 0) {
      warnings.push("Template has no parameter placeholders");
    }

    try {
      yaml.load(content.replace(PLACEHOLDER_PATTERN, "placeholder"), {
        schema: yaml.FAILSAFE_SCHEMA,
      });
    } catch (error) {
      const reason =
        error instanceof yaml.YAMLException ? error.reason : String(error);
      errors.push(`Template is not valid YAML: ${reason}`);
    }

    return {
      templateName,
      isValid: errors.length === 0,
      errors,
      warnings,
      parameters: [...parameters].sort(),
    };
  }

  getTemplatePath(templateName: string): string {
    const fileName = templateName.toLowerCase().endsWith(TEMPLATE_EXTENSION)
      ? templateName
      : `${templateName}${TEMPLATE_EXTENSION}`;
    return path.join(this.templatesDirectory, fileName);
  }

  private async readTemplate(templateName: string): Promise<string> {
    const templatePath = this.getTemplatePath(templateName);
    try {
      return await fs.readFile(templatePath, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        throw new WorkflowTemplateNotFoundError(templateName, [
          this.templatesDirectory,
        ]);
      }
      throw error;
    }
  }
}
