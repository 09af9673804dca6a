/**
 * Unit tests for the scripted executor used by `flowgate run`
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import type { AgentExecutor, AgentInvocation } from "@flowgate/server";
import {
  loadScriptedResponses,
  parseScriptedResponses,
  ScriptedAgentExecutor,
} from "../../src/scripted-executor.js";

const invocation: AgentInvocation = {
  executionId: "exec-1",
  stateId: "BUILD",
  context: {},
  signal: new AbortController().signal,
};

function run(executor: AgentExecutor, name: string) {
  return executor.execute(name, "", {}, invocation);
}

describe("parseScriptedResponses", () => {
  it("should read single responses and lists", () => {
    const responses = parseScriptedResponses(
      JSON.stringify({
        builder: { data: { build_success: true } },
        reviewer: [{ data: { approved: false } }, { success: false, errorMessage: "meh" }],
        deployer: { error: "cluster unreachable" },
      })
    );

    expect(responses.get("builder")).toEqual([
      {
        kind: "result",
        result: { success: true, errorMessage: undefined, data: { build_success: true } },
      },
    ]);
    expect(responses.get("reviewer")).toHaveLength(2);
    expect(responses.get("deployer")).toEqual([
      { kind: "error", message: "cluster unreachable" },
    ]);
  });

  it("should reject documents that are not objects", () => {
    expect(() => parseScriptedResponses("[]")).toThrow(
      "Responses must be a JSON object keyed by executor name"
    );
    expect(() => parseScriptedResponses("{")).toThrow(/^Responses are not valid JSON: /);
  });

  it("should reject malformed entries", () => {
    expect(() => parseScriptedResponses('{"a": 1}')).toThrow(
      "Response for 'a' must be an object"
    );
    expect(() => parseScriptedResponses('{"a": {"data": [1]}}')).toThrow(
      "Response data for 'a' must be an object"
    );
  });
});

describe("loadScriptedResponses", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "flowgate-responses-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should return no responses when no source is given", () => {
    expect(loadScriptedResponses(undefined).size).toBe(0);
  });

  it("should accept inline JSON", () => {
    expect([...loadScriptedResponses(' {"a": {}}').keys()]).toEqual(["a"]);
  });

  it("should read a JSON file", () => {
    const file = path.join(tempDir, "responses.json");
    fs.writeFileSync(file, '{"b": {"data": {"n": 1}}}');

    expect([...loadScriptedResponses(file).keys()]).toEqual(["b"]);
  });
});

describe("ScriptedAgentExecutor", () => {
  it("should replay responses in order and repeat the last one", async () => {
    const executor = new ScriptedAgentExecutor(
      parseScriptedResponses('{"reviewer": [{"data": {"round": 1}}, {"data": {"round": 2}}]}')
    );

    expect((await run(executor, "reviewer")).data).toEqual({ round: 1 });
    expect((await run(executor, "reviewer")).data).toEqual({ round: 2 });
    expect((await run(executor, "reviewer")).data).toEqual({ round: 2 });
    expect(executor.callCount("reviewer")).toBe(3);
  });

  it("should succeed with no data for unscripted executors", async () => {
    const executor = new ScriptedAgentExecutor(new Map());

    expect(await run(executor, "anything")).toEqual({ success: true, data: {} });
    expect(executor.callCount("anything")).toBe(1);
  });

  it("should throw scripted errors", async () => {
    const executor = new ScriptedAgentExecutor(
      parseScriptedResponses('{"deployer": {"error": "cluster unreachable"}}')
    );

    await expect(run(executor, "deployer")).rejects.toThrow("cluster unreachable");
  });

  it("should hand out copies of the scripted data", async () => {
    const executor = new ScriptedAgentExecutor(
      parseScriptedResponses('{"builder": {"data": {"n": 1}}}')
    );

    const first = await run(executor, "builder");
    first.data.n = 99;

    expect((await run(executor, "builder")).data).toEqual({ n: 1 });
  });
});
