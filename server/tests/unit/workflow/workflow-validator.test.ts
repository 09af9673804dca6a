/**
 * Unit tests for workflow validation
 */

import { describe, it, expect } from "vitest";
import {
  DEFAULT_WORKFLOW_SETTINGS,
  type WorkflowDefinition,
  type WorkflowStateDefinition,
} from "@flowgate/types";
import {
  validateWorkflow,
  getAgentNames,
} from "../../../src/workflow/workflow-validator.js";

// =============================================================================
// Test Data Factories
// =============================================================================

function createTestState(
  overrides: Partial<WorkflowStateDefinition> & { id: string }
): WorkflowStateDefinition {
  return {
    type: "agent",
    executors: [],
    conditions: [],
    ...overrides,
  };
}

function createTestWorkflow(
  overrides?: Partial<WorkflowDefinition>
): WorkflowDefinition {
  return {
    name: "test-workflow",
    version: "1.0",
    agents: [{ ref: "agents/builder" }],
    states: [
      createTestState({ id: "START", type: "start", next: "BUILD" }),
      createTestState({ id: "BUILD", executor: "builder", next: "DONE" }),
      createTestState({ id: "DONE", type: "terminal" }),
    ],
    settings: { ...DEFAULT_WORKFLOW_SETTINGS },
    ...overrides,
  };
}

describe("validateWorkflow", () => {
  it("should accept a well-formed workflow with no issues", () => {
    const result = validateWorkflow(createTestWorkflow());

    expect(result).toEqual({ isValid: true, errors: [], warnings: [] });
  });

  it("should require a name", () => {
    const result = validateWorkflow(createTestWorkflow({ name: "  " }));

    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual([
      { code: "name_required", message: "Workflow name is required.", path: "name" },
    ]);
  });

  it("should require at least one state", () => {
    const result = validateWorkflow(createTestWorkflow({ states: [] }));

    expect(result.isValid).toBe(false);
    expect(result.errors.map((e) => e.code)).toEqual(["no_states"]);
  });

  it("should flag each duplicated state id once", () => {
    const result = validateWorkflow(
      createTestWorkflow({
        states: [
          createTestState({ id: "A", next: "DONE" }),
          createTestState({ id: "A", next: "DONE" }),
          createTestState({ id: "A", next: "DONE" }),
          createTestState({ id: "DONE", type: "terminal" }),
        ],
      })
    );

    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual([
      {
        code: "duplicate_state_id",
        message: "Duplicate state ID: 'A'",
        path: "states[A]",
      },
    ]);
  });

  it("should report references to unknown states", () => {
    const result = validateWorkflow(
      createTestWorkflow({
        states: [
          createTestState({ id: "START", type: "start", next: "NOWHERE" }),
          createTestState({
            id: "CHECK",
            conditions: [{ if: "ok", then: "MISSING", isDefault: false }],
          }),
          createTestState({
            id: "GATE",
            type: "human_gate",
            humanGate: {
              approvalMode: "always_require",
              timeoutMs: 1000,
              onApprove: "GONE",
              onReject: "START",
            },
          }),
          createTestState({ id: "DONE", type: "terminal" }),
        ],
      })
    );

    expect(result.errors).toEqual([
      {
        code: "unknown_state_reference",
        message: "State 'START' references non-existent state 'NOWHERE'",
        path: "states[START].next",
      },
      {
        code: "unknown_state_reference",
        message: "State 'CHECK' condition references non-existent state 'MISSING'",
        path: "states[CHECK].conditions[0]",
      },
      {
        code: "unknown_state_reference",
        message: "HumanGate 'GATE' on_approve references non-existent state 'GONE'",
        path: "states[GATE].human_gate.on_approve",
      },
    ]);
  });

  it("should warn about executors missing from the agents list", () => {
    const result = validateWorkflow(
      createTestWorkflow({
        states: [
          createTestState({ id: "BUILD", executor: "deployer", next: "DONE" }),
          createTestState({ id: "DONE", type: "terminal" }),
        ],
      })
    );

    expect(result.isValid).toBe(true);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]).toMatchObject({
      code: "unknown_executor",
      path: "states[BUILD].executor",
    });
  });

  it("should warn when there is no terminal state", () => {
    const result = validateWorkflow(
      createTestWorkflow({
        states: [createTestState({ id: "LOOP", executor: "builder", next: "LOOP" })],
      })
    );

    expect(result.isValid).toBe(true);
    expect(result.warnings.map((w) => w.code)).toEqual(["no_terminal_state"]);
  });

  it("should return no errors or terminal warning for any fully linked chain", () => {
    for (const length of [1, 2, 5, 10]) {
      const states: WorkflowStateDefinition[] = [];
      for (let i = 0; i < length; i++) {
        states.push(
          createTestState({
            id: `S${i}`,
            executor: "builder",
            next: i === length - 1 ? "END" : `S${i + 1}`,
          })
        );
      }
      states.push(createTestState({ id: "END", type: "terminal" }));

      const result = validateWorkflow(createTestWorkflow({ states }));

      expect(result.errors).toEqual([]);
      expect(result.warnings).toEqual([]);
    }
  });
});

describe("getAgentNames", () => {
  it("should use aliases or the last segment of the ref", () => {
    const names = getAgentNames(
      createTestWorkflow({
        agents: [
          { ref: "agents/coder" },
          { ref: "agents/reviewer", alias: "review" },
          { ref: "planner" },
        ],
      })
    );

    expect([...names]).toEqual(["coder", "review", "planner"]);
  });
});
