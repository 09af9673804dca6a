/**
 * Workflow Loader
 *
 * Parses declarative YAML workflow documents into WorkflowDefinition values.
 *
 * - Keys are matched case-insensitively, with or without underscores
 *   ("human_gate", "humanGate", "HUMAN_GATE" are the same key)
 * - Unknown keys are ignored
 * - Scalars are read as text and converted per field, so "version: 1.0"
 *   stays "1.0"
 */

import yaml from "js-yaml";
import * as fs from "fs/promises";
import * as path from "path";
import {
  DEFAULT_HUMAN_GATE_TIMEOUT_MS,
  DEFAULT_WORKFLOW_SETTINGS,
  type AgentReference,
  type ConditionalTransition,
  type HumanGateSettings,
  type TriggerDefinition,
  type TriggerType,
  type WorkflowDefinition,
  type WorkflowSettings,
  type WorkflowStateDefinition,
  type WorkflowStateType,
  type WorkflowValidationResult,
} from "@flowgate/types";
import { parseDuration } from "../utils/duration-parser.js";
import { WorkflowParseError } from "./errors.js";
import { validateWorkflow } from "./workflow-validator.js";

// =============================================================================
// Interface
// =============================================================================

export interface IWorkflowLoader {
  /**
   * Parse a workflow document.
   *
   * @param filePath - Only used to label parse errors
   * @throws WorkflowParseError on malformed YAML or a missing required field
   */
  loadFromString(content: string, filePath?: string): WorkflowDefinition;

  /**
   * @throws WorkflowParseError if the file is missing or malformed
   */
  loadFromFile(filePath: string): Promise<WorkflowDefinition>;

  /**
   * Load every workflow file directly inside a directory.
   */
  loadFromDirectory(
    directoryPath: string,
    extensions?: string[]
  ): Promise<WorkflowDefinition[]>;

  validate(workflow: WorkflowDefinition): WorkflowValidationResult;
}

// =============================================================================
// Value Readers
// =============================================================================

type YamlMapping = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normalizeKey(key: string): string {
  return key.toLowerCase().replace(/[_-]/g, "");
}

/**
 * Re-key a YAML mapping so lookups ignore case and underscores.
 */
function toMapping(value: unknown, where: string): YamlMapping | undefined {
  if (value === undefined || value === null || value === "") {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new WorkflowParseError(`'${where}' must be a mapping`);
  }
  const mapping: YamlMapping = {};
  for (const [key, entry] of Object.entries(value)) {
    mapping[normalizeKey(key)] = entry;
  }
  return mapping;
}

function readRaw(mapping: YamlMapping, key: string): unknown {
  return mapping[normalizeKey(key)];
}

/**
 * Read a scalar as text. Empty values come back as undefined.
 */
function readString(
  mapping: YamlMapping,
  key: string,
  where: string
): string | undefined {
  const value = readRaw(mapping, key);
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new WorkflowParseError(`'${where}.${key}' must be a scalar value`);
  }
  return value;
}

function readOptionalString(
  mapping: YamlMapping,
  key: string,
  where: string
): string | undefined {
  const value = readString(mapping, key, where);
  return value === undefined || value.trim() === "" ? undefined : value;
}

function readRequiredString(
  mapping: YamlMapping,
  key: string,
  where: string,
  message: string
): string {
  const value = readString(mapping, key, where);
  if (value === undefined) {
    throw new WorkflowParseError(message);
  }
  return value;
}

function readInteger(
  mapping: YamlMapping,
  key: string,
  where: string
): number | undefined {
  const value = readOptionalString(mapping, key, where);
  if (value === undefined) {
    return undefined;
  }
  if (!/^-?\d+$/.test(value.trim())) {
    throw new WorkflowParseError(
      `'${where}.${key}' must be an integer, got '${value}'`
    );
  }
  return parseInt(value, 10);
}

function readBoolean(
  mapping: YamlMapping,
  key: string,
  where: string
): boolean | undefined {
  const value = readOptionalString(mapping, key, where);
  if (value === undefined) {
    return undefined;
  }
  switch (value.trim().toLowerCase()) {
    case "true":
      return true;
    case "false":
      return false;
    default:
      throw new WorkflowParseError(
        `'${where}.${key}' must be true or false, got '${value}'`
      );
  }
}

function readDuration(
  mapping: YamlMapping,
  key: string,
  where: string
): number | undefined {
  const value = readOptionalString(mapping, key, where);
  if (value === undefined) {
    return undefined;
  }
  try {
    return parseDuration(value);
  } catch (error) {
    throw new WorkflowParseError(`Invalid timespan format: '${value}'`, {}, {
      cause: error,
    });
  }
}

function readList(mapping: YamlMapping, key: string, where: string): unknown[] {
  const value = readRaw(mapping, key);
  if (value === undefined || value === null || value === "") {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new WorkflowParseError(`'${where}.${key}' must be a list`);
  }
  return value;
}

function readStringList(
  mapping: YamlMapping,
  key: string,
  where: string
): string[] {
  return readList(mapping, key, where).map((item, index) => {
    if (typeof item !== "string") {
      throw new WorkflowParseError(
        `'${where}.${key}[${index}]' must be a scalar value`
      );
    }
    return item;
  });
}

// =============================================================================
// Enum Parsing
// =============================================================================

function parseStateType(value: string | undefined): WorkflowStateType {
  if (value === undefined) {
    return "agent";
  }
  switch (value.trim().toLowerCase()) {
    case "start":
      return "start";
    case "agent":
      return "agent";
    case "parallel":
      return "parallel";
    case "human_gate":
    case "humangate":
      return "human_gate";
    case "escalation":
      return "escalation";
    case "terminal":
    case "end":
      return "terminal";
    default:
      throw new WorkflowParseError(`Unknown state type: '${value}'`);
  }
}

function parseTriggerType(value: string | undefined): TriggerType {
  if (value === undefined) {
    return "immediate";
  }
  switch (value.trim().toLowerCase()) {
    case "file_exists":
    case "fileexists":
      return "file_exists";
    case "directory_not_empty":
    case "dir_not_empty":
    case "directorynotempty":
      return "directory_not_empty";
    case "immediate":
      return "immediate";
    case "expression":
      return "expression";
    default:
      throw new WorkflowParseError(`Unknown trigger type: '${value}'`);
  }
}

// =============================================================================
// Mapping
// =============================================================================

function mapAgent(value: unknown, index: number): AgentReference {
  const where = `agents[${index}]`;
  const mapping = toMapping(value, where);
  if (!mapping) {
    throw new WorkflowParseError(`Agent reference 'ref' is required.`);
  }
  const ref = readOptionalString(mapping, "ref", where);
  if (ref === undefined) {
    throw new WorkflowParseError(`Agent reference 'ref' is required.`);
  }
  return { ref, alias: readOptionalString(mapping, "alias", where) };
}

function mapTrigger(value: unknown, where: string): TriggerDefinition | undefined {
  const mapping = toMapping(value, where);
  if (!mapping) {
    return undefined;
  }
  return {
    type: parseTriggerType(readOptionalString(mapping, "type", where)),
    path: readOptionalString(mapping, "path", where),
    expression: readOptionalString(mapping, "expression", where),
  };
}

function mapCondition(value: unknown, where: string): ConditionalTransition {
  const mapping = toMapping(value, where);
  const then = mapping && readOptionalString(mapping, "then", where);
  if (!mapping || then === undefined) {
    throw new WorkflowParseError("Condition 'then' is required.");
  }
  return {
    if: readOptionalString(mapping, "if", where),
    then,
    isDefault: readBoolean(mapping, "else", where) ?? false,
  };
}

function mapHumanGate(value: unknown, where: string): HumanGateSettings | undefined {
  const mapping = toMapping(value, where);
  if (!mapping) {
    return undefined;
  }
  return {
    approvalMode:
      readOptionalString(mapping, "approval_mode", where) ?? "always_require",
    timeoutMs:
      readDuration(mapping, "timeout", where) ?? DEFAULT_HUMAN_GATE_TIMEOUT_MS,
    onApprove: readOptionalString(mapping, "on_approve", where),
    onReject: readOptionalString(mapping, "on_reject", where),
    notifyEmail: readOptionalString(mapping, "notify_email", where),
  };
}

function mapState(value: unknown, index: number): WorkflowStateDefinition {
  const mapping = toMapping(value, `states[${index}]`);
  const id = mapping && readOptionalString(mapping, "id", `states[${index}]`);
  if (!mapping || id === undefined) {
    throw new WorkflowParseError("State 'id' is required.");
  }
  const where = `states[${id}]`;

  return {
    id,
    type: parseStateType(readOptionalString(mapping, "type", where)),
    executor: readOptionalString(mapping, "executor", where),
    executors: readStringList(mapping, "executors", where),
    trigger: mapTrigger(readRaw(mapping, "trigger"), `${where}.trigger`),
    next: readOptionalString(mapping, "next", where),
    conditions: readList(mapping, "conditions", where).map((entry, i) =>
      mapCondition(entry, `${where}.conditions[${i}]`)
    ),
    humanGate: mapHumanGate(readRaw(mapping, "human_gate"), `${where}.human_gate`),
    maxIterations: readInteger(mapping, "max_iterations", where),
    timeoutMs: readDuration(mapping, "timeout", where),
  };
}

function mapSettings(value: unknown): WorkflowSettings {
  const mapping = toMapping(value, "settings");
  if (!mapping) {
    return { ...DEFAULT_WORKFLOW_SETTINGS };
  }
  return {
    defaultTimeoutMs:
      readDuration(mapping, "default_timeout", "settings") ??
      DEFAULT_WORKFLOW_SETTINGS.defaultTimeoutMs,
    defaultMaxIterations:
      readInteger(mapping, "default_max_iterations", "settings") ??
      DEFAULT_WORKFLOW_SETTINGS.defaultMaxIterations,
    enableCheckpointing:
      readBoolean(mapping, "enable_checkpointing", "settings") ??
      DEFAULT_WORKFLOW_SETTINGS.enableCheckpointing,
    checkpointDirectory:
      readOptionalString(mapping, "checkpoint_directory", "settings") ??
      DEFAULT_WORKFLOW_SETTINGS.checkpointDirectory,
  };
}

/**
 * Map a parsed YAML document onto the definition model.
 */
export function mapWorkflowDocument(document: unknown): WorkflowDefinition {
  const mapping = toMapping(document, "workflow");
  if (!mapping) {
    throw new WorkflowParseError("Workflow document is empty.");
  }

  return {
    name: readRequiredString(
      mapping,
      "name",
      "workflow",
      "Workflow name is required."
    ),
    version: readOptionalString(mapping, "version", "workflow") ?? "1.0",
    description: readOptionalString(mapping, "description", "workflow"),
    agents: readList(mapping, "agents", "workflow").map(mapAgent),
    states: readList(mapping, "states", "workflow").map(mapState),
    settings: mapSettings(readRaw(mapping, "settings")),
  };
}

// =============================================================================
// Loader
// =============================================================================

function yamlMarkPosition(error: unknown): { line?: number; column?: number } {
  if (!(error instanceof yaml.YAMLException)) {
    return {};
  }
  const mark: unknown = error.mark;
  if (!isRecord(mark)) {
    return {};
  }
  const line = mark["line"];
  const column = mark["column"];
  return {
    line: typeof line === "number" ? line + 1 : undefined,
    column: typeof column === "number" ? column + 1 : undefined,
  };
}

/**
 * Loads workflow definitions from YAML text, files and directories.
 */
export class YamlWorkflowLoader implements IWorkflowLoader {
  loadFromString(content: string, filePath?: string): WorkflowDefinition {
    let document: unknown;
    try {
      document = yaml.load(content, {
        schema: yaml.FAILSAFE_SCHEMA,
        filename: filePath,
      });
    } catch (error) {
      const reason =
        error instanceof yaml.YAMLException ? error.reason : String(error);
      throw new WorkflowParseError(
        `Failed to parse workflow YAML: ${reason}`,
        { filePath, ...yamlMarkPosition(error) },
        { cause: error }
      );
    }

    try {
      return mapWorkflowDocument(document);
    } catch (error) {
      if (error instanceof WorkflowParseError && filePath !== undefined) {
        throw new WorkflowParseError(error.message, { filePath }, { cause: error });
      }
      throw error;
    }
  }

  async loadFromFile(filePath: string): Promise<WorkflowDefinition> {
    let content: string;
    try {
      content = await fs.readFile(filePath, "utf8");
    } catch (error) {
      throw new WorkflowParseError(
        `Workflow file not found: ${filePath}`,
        { filePath },
        { cause: error }
      );
    }
    return this.loadFromString(content, filePath);
  }

  async loadFromDirectory(
    directoryPath: string,
    extensions: string[] = [".yaml", ".yml"]
  ): Promise<WorkflowDefinition[]> {
    let entries;
    try {
      entries = await fs.readdir(directoryPath, { withFileTypes: true });
    } catch (error) {
      throw new Error(`Workflow directory not found: ${directoryPath}`, {
        cause: error,
      });
    }

    const files = entries
      .filter(
        (entry) =>
          entry.isFile() &&
          extensions.includes(path.extname(entry.name).toLowerCase())
      )
      .map((entry) => path.join(directoryPath, entry.name))
      .sort();

    const workflows: WorkflowDefinition[] = [];
    for (const file of files) {
      workflows.push(await this.loadFromFile(file));
    }
    return workflows;
  }

  validate(workflow: WorkflowDefinition): WorkflowValidationResult {
    return validateWorkflow(workflow);
  }
}
