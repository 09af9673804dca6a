/**
 * Unit tests for ExecutionRegistry and ApprovalGate
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  DEFAULT_WORKFLOW_SETTINGS,
  type WorkflowDefinition,
  type WorkflowRuntimeState,
} from "@flowgate/types";
import {
  ApprovalGate,
  ExecutionRegistry,
  WorkflowExecution,
} from "../../../src/workflow/execution-registry.js";
import {
  ExecutionNotFoundError,
  ExecutionStateError,
} from "../../../src/workflow/errors.js";

// =============================================================================
// Test Data Factories
// =============================================================================

const workflow: WorkflowDefinition = {
  name: "review",
  version: "1.0",
  agents: [],
  states: [
    {
      id: "GATE",
      type: "human_gate",
      executors: [],
      conditions: [],
      humanGate: { approvalMode: "always_require", timeoutMs: 60000 },
    },
  ],
  settings: { ...DEFAULT_WORKFLOW_SETTINGS },
};

function createTestState(overrides?: Partial<WorkflowRuntimeState>): WorkflowRuntimeState {
  return {
    executionId: "exec-1",
    workflowName: "review",
    currentStateId: "GATE",
    status: "running",
    input: "",
    startedAt: "2024-01-01T00:00:00.000Z",
    lastUpdatedAt: "2024-01-01T00:00:05.000Z",
    iterationCount: 0,
    outputData: {},
    ...overrides,
  };
}

function createTestExecution(
  executionId = "exec-1",
  state?: Partial<WorkflowRuntimeState>
): WorkflowExecution {
  return new WorkflowExecution(
    executionId,
    workflow,
    { workingDirectory: "/work" },
    createTestState({ executionId, ...state })
  );
}

describe("ApprovalGate", () => {
  it("should resolve once and ignore later outcomes", async () => {
    const gate = new ApprovalGate("GATE");

    gate.resolve({ kind: "decision", decision: { approved: true } });
    gate.resolve({ kind: "cancelled" });

    expect(gate.isSettled).toBe(true);
    expect(await gate.promise).toEqual({
      kind: "decision",
      decision: { approved: true },
    });
  });
});

describe("ExecutionRegistry", () => {
  let registry: ExecutionRegistry;

  beforeEach(() => {
    registry = new ExecutionRegistry();
  });

  describe("approve", () => {
    it("should deliver the decision to the open gate", async () => {
      const execution = createTestExecution("exec-1", { status: "waiting_for_approval" });
      registry.add(execution);
      const gate = execution.openApprovalGate("GATE");

      registry.approve("exec-1", { approved: false, feedback: "needs tests" });

      expect(await gate.promise).toEqual({
        kind: "decision",
        decision: { approved: false, feedback: "needs tests" },
      });
    });

    it("should refuse executions that are not waiting", () => {
      registry.add(createTestExecution());

      expect(() => registry.approve("exec-1", { approved: true })).toThrow(
        ExecutionStateError
      );
      expect(() => registry.approve("exec-1", { approved: true })).toThrow(
        "Execution exec-1 at state 'GATE': Execution is not waiting for approval (status: running)"
      );
    });

    it("should refuse a second decision for the same gate", () => {
      const execution = createTestExecution("exec-1", { status: "waiting_for_approval" });
      registry.add(execution);
      execution.openApprovalGate("GATE");

      registry.approve("exec-1", { approved: true });

      expect(() => registry.approve("exec-1", { approved: true })).toThrow(
        ExecutionStateError
      );
    });

    it("should throw for unknown executions", () => {
      expect(() => registry.approve("ghost", { approved: true })).toThrow(
        "Execution not found: ghost"
      );
    });
  });

  describe("cancel", () => {
    it("should abort, settle the gate, and drop the execution", async () => {
      const execution = createTestExecution("exec-1", { status: "waiting_for_approval" });
      registry.add(execution);
      const gate = execution.openApprovalGate("GATE");

      registry.cancel("exec-1");

      expect(execution.isCancelled).toBe(true);
      expect(await gate.promise).toEqual({ kind: "cancelled" });
      expect(registry.has("exec-1")).toBe(false);
      expect(() => registry.getState("exec-1")).toThrow(ExecutionNotFoundError);
    });

    it("should throw for unknown executions", () => {
      expect(() => registry.cancel("ghost")).toThrow(ExecutionNotFoundError);
    });
  });

  describe("remove", () => {
    it("should leave a newer execution with the same id in place", () => {
      const stale = createTestExecution();
      const current = createTestExecution();
      registry.add(stale);
      registry.add(current);

      registry.remove(stale);

      expect(registry.get("exec-1")).toBe(current);
      registry.remove(current);
      expect(registry.size).toBe(0);
    });
  });

  describe("listActive", () => {
    it("should summarize each active execution", () => {
      registry.add(createTestExecution("exec-1"));
      registry.add(createTestExecution("exec-2", { status: "waiting_for_approval" }));

      expect(registry.listActive()).toEqual([
        {
          executionId: "exec-1",
          workflowName: "review",
          currentState: "GATE",
          status: "running",
          startedAt: "2024-01-01T00:00:00.000Z",
          lastUpdatedAt: "2024-01-01T00:00:05.000Z",
        },
        {
          executionId: "exec-2",
          workflowName: "review",
          currentState: "GATE",
          status: "waiting_for_approval",
          startedAt: "2024-01-01T00:00:00.000Z",
          lastUpdatedAt: "2024-01-01T00:00:05.000Z",
        },
      ]);
    });
  });
});
