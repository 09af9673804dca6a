/**
 * Executor that replays canned responses, so workflows can be driven from
 * the command line without real step implementations.
 *
 * Responses are keyed by executor name. Each entry is a single response or a
 * list consumed in order (the last one repeats):
 *
 * ```json
 * {
 *   "builder": { "data": { "build_success": true } },
 *   "reviewer": [{ "data": { "approved": false } }, { "data": { "approved": true } }],
 *   "deployer": { "error": "cluster unreachable" }
 * }
 * ```
 */

import * as fs from "fs";
import type { AgentExecutionResult } from "@flowgate/types";
import type { AgentExecutor } from "@flowgate/server";

export type ScriptedResponse =
  | { kind: "result"; result: AgentExecutionResult }
  | { kind: "error"; message: string };

export type ScriptedResponses = Map<string, ScriptedResponse[]>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toResponse(executorName: string, value: unknown): ScriptedResponse {
  if (!isRecord(value)) {
    throw new Error(`Response for '${executorName}' must be an object`);
  }
  if (typeof value.error === "string") {
    return { kind: "error", message: value.error };
  }
  const data = value.data;
  if (data !== undefined && !isRecord(data)) {
    throw new Error(`Response data for '${executorName}' must be an object`);
  }
  return {
    kind: "result",
    result: {
      success: typeof value.success === "boolean" ? value.success : true,
      errorMessage:
        typeof value.errorMessage === "string" ? value.errorMessage : undefined,
      data: data ?? {},
    },
  };
}

/**
 * Parse a responses document.
 *
 * @throws Error on malformed JSON or entries
 */
export function parseScriptedResponses(json: string): ScriptedResponses {
  let document: unknown;
  try {
    document = JSON.parse(json);
  } catch (error) {
    throw new Error(
      `Responses are not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  if (!isRecord(document)) {
    throw new Error("Responses must be a JSON object keyed by executor name");
  }

  const responses: ScriptedResponses = new Map();
  for (const [name, value] of Object.entries(document)) {
    const entries = Array.isArray(value) ? value : [value];
    responses.set(
      name,
      entries.map((entry) => toResponse(name, entry))
    );
  }
  return responses;
}

/**
 * Accepts inline JSON or a path to a JSON file.
 */
export function loadScriptedResponses(source: string | undefined): ScriptedResponses {
  if (source === undefined) {
    return new Map();
  }
  const trimmed = source.trim();
  if (trimmed.startsWith("{")) {
    return parseScriptedResponses(trimmed);
  }
  return parseScriptedResponses(fs.readFileSync(source, "utf8"));
}

export class ScriptedAgentExecutor implements AgentExecutor {
  private readonly calls = new Map<string, number>();

  constructor(private readonly responses: ScriptedResponses) {}

  async execute(executorName: string): Promise<AgentExecutionResult> {
    const count = this.calls.get(executorName) ?? 0;
    this.calls.set(executorName, count + 1);

    const script = this.responses.get(executorName);
    // Unscripted steps succeed without data
    if (!script || script.length === 0) {
      return { success: true, data: {} };
    }

    const response = script[Math.min(count, script.length - 1)];
    if (response.kind === "error") {
      throw new Error(response.message);
    }
    return { ...response.result, data: { ...response.result.data } };
  }

  callCount(executorName: string): number {
    return this.calls.get(executorName) ?? 0;
  }
}
