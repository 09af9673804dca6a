/**
 * Runtime configuration
 *
 * Read from `<project>/.flowgate/config.json` (written with defaults when
 * missing), then overridden by environment variables.
 */

import * as fs from "fs";
import * as path from "path";
import type { CheckpointBackend, FlowgateConfig } from "@flowgate/types";

export const CONFIG_DIRECTORY = ".flowgate";
export const CONFIG_FILE = "config.json";

export const DEFAULT_CONFIG: Readonly<FlowgateConfig> = {
  version: "1.0",
  workflowsDirectory: "workflows",
  templatesDirectory: "workflows/templates",
  checkpointBackend: "filesystem",
  checkpointDirectory: ".flowgate",
  triggerPollIntervalMs: 5000,
  maxTriggerWaitMs: undefined,
  port: 3000,
};

const CHECKPOINT_BACKENDS: readonly CheckpointBackend[] = [
  "filesystem",
  "sqlite",
  "memory",
];

function isCheckpointBackend(value: unknown): value is CheckpointBackend {
  return CHECKPOINT_BACKENDS.some((backend) => backend === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseNonNegativeInt(value: string, name: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new Error(`${name} must be a non-negative integer, got '${value}'`);
  }
  return parseInt(value, 10);
}

/**
 * Pick known fields out of a parsed config file. Fields of the wrong type
 * are dropped with a warning.
 */
function readConfigFields(raw: unknown, configPath: string): Partial<FlowgateConfig> {
  if (!isRecord(raw)) {
    console.warn(`[config] ${configPath} is not a JSON object; using defaults`);
    return {};
  }

  const config: Partial<FlowgateConfig> = {};
  const warn = (field: string) =>
    console.warn(`[config] Ignoring invalid '${field}' in ${configPath}`);

  for (const field of [
    "version",
    "workflowsDirectory",
    "templatesDirectory",
    "checkpointDirectory",
  ] as const) {
    const value = raw[field];
    if (value === undefined) continue;
    if (typeof value === "string") {
      config[field] = value;
    } else {
      warn(field);
    }
  }

  for (const field of ["triggerPollIntervalMs", "maxTriggerWaitMs", "port"] as const) {
    const value = raw[field];
    if (value === undefined || value === null) continue;
    // A zero poll interval would spin
    const minimum = field === "triggerPollIntervalMs" ? 1 : 0;
    if (typeof value === "number" && Number.isInteger(value) && value >= minimum) {
      config[field] = value;
    } else {
      warn(field);
    }
  }

  if (raw.checkpointBackend !== undefined) {
    if (isCheckpointBackend(raw.checkpointBackend)) {
      config.checkpointBackend = raw.checkpointBackend;
    } else {
      warn("checkpointBackend");
    }
  }

  return config;
}

function applyEnvironment(
  config: FlowgateConfig,
  env: NodeJS.ProcessEnv
): FlowgateConfig {
  const result = { ...config };

  if (env.FLOWGATE_PORT) {
    result.port = parseNonNegativeInt(env.FLOWGATE_PORT, "FLOWGATE_PORT");
  }
  if (env.FLOWGATE_CHECKPOINT_BACKEND) {
    const backend = env.FLOWGATE_CHECKPOINT_BACKEND.trim().toLowerCase();
    if (!isCheckpointBackend(backend)) {
      throw new Error(
        `FLOWGATE_CHECKPOINT_BACKEND must be one of ${CHECKPOINT_BACKENDS.join(", ")}, got '${env.FLOWGATE_CHECKPOINT_BACKEND}'`
      );
    }
    result.checkpointBackend = backend;
  }
  if (env.FLOWGATE_CHECKPOINT_DIR) {
    result.checkpointDirectory = env.FLOWGATE_CHECKPOINT_DIR;
  }

  return result;
}

/**
 * Write config file
 */
export function writeFlowgateConfig(projectDir: string, config: FlowgateConfig): void {
  const configDir = path.join(projectDir, CONFIG_DIRECTORY);
  fs.mkdirSync(configDir, { recursive: true });
  fs.writeFileSync(
    path.join(configDir, CONFIG_FILE),
    JSON.stringify(config, null, 2),
    "utf8"
  );
}

/**
 * Load the effective configuration for a project directory.
 */
export function loadFlowgateConfig(
  projectDir: string,
  env: NodeJS.ProcessEnv = process.env
): FlowgateConfig {
  const configPath = path.join(projectDir, CONFIG_DIRECTORY, CONFIG_FILE);

  let fileConfig: Partial<FlowgateConfig> = {};
  if (!fs.existsSync(configPath)) {
    writeFlowgateConfig(projectDir, { ...DEFAULT_CONFIG });
  } else {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(configPath, "utf8"));
    } catch (error) {
      throw new Error(`Failed to parse ${configPath}`, { cause: error });
    }
    fileConfig = readConfigFields(raw, configPath);
  }

  return applyEnvironment({ ...DEFAULT_CONFIG, ...fileConfig }, env);
}

/**
 * Resolve a configured directory against the project directory.
 */
export function resolveProjectPath(projectDir: string, configured: string): string {
  return path.resolve(projectDir, configured);
}
