/**
 * Unit tests for the condition expression evaluator
 */

import { describe, it, expect } from "vitest";
import type { WorkflowRuntimeState } from "@flowgate/types";
import { evaluateExpression } from "../../../src/workflow/expression-evaluator.js";

function createTestState(
  overrides?: Partial<WorkflowRuntimeState>
): WorkflowRuntimeState {
  return {
    executionId: "exec-test",
    workflowName: "test-workflow",
    currentStateId: "CHECK",
    status: "running",
    input: "",
    startedAt: "2024-01-01T00:00:00.000Z",
    lastUpdatedAt: "2024-01-01T00:00:00.000Z",
    iterationCount: 0,
    outputData: {},
    ...overrides,
  };
}

describe("evaluateExpression", () => {
  const running = createTestState();
  const failed = createTestState({ status: "failed" });

  describe("literals", () => {
    it("should treat empty and blank expressions as true", () => {
      expect(evaluateExpression("", running)).toBe(true);
      expect(evaluateExpression("   ", running)).toBe(true);
      expect(evaluateExpression(undefined, running)).toBe(true);
    });

    it("should read boolean keywords in any case", () => {
      expect(evaluateExpression("true", running)).toBe(true);
      expect(evaluateExpression("TRUE", running)).toBe(true);
      expect(evaluateExpression("false", running)).toBe(false);
    });

    it("should treat zero as false and other numbers as true", () => {
      expect(evaluateExpression("0", running)).toBe(false);
      expect(evaluateExpression("42", running)).toBe(true);
      expect(evaluateExpression("-1", running)).toBe(true);
    });
  });

  describe("status keywords", () => {
    it("should combine success and failure with logical operators", () => {
      expect(evaluateExpression("success && failure", running)).toBe(false);
      expect(evaluateExpression("success || failure", running)).toBe(true);
    });

    it("should negate with !", () => {
      expect(evaluateExpression("!success", failed)).toBe(true);
      expect(evaluateExpression("!success", running)).toBe(false);
      expect(evaluateExpression("!!failure", failed)).toBe(true);
    });

    it("should compare the status name", () => {
      expect(evaluateExpression("status == 'running'", running)).toBe(true);
      expect(evaluateExpression("status != 'running'", failed)).toBe(true);
    });

    it("should expose multi-word statuses in snake_case", () => {
      const waiting = createTestState({ status: "waiting_for_approval" });

      expect(evaluateExpression("status == 'waiting_for_approval'", waiting)).toBe(true);
      expect(evaluateExpression("status == 'WAITING_FOR_APPROVAL'", waiting)).toBe(true);
      expect(evaluateExpression("status == 'waitingforapproval'", waiting)).toBe(false);
    });
  });

  describe("output data", () => {
    it("should compare output values", () => {
      const ok = createTestState({ outputData: { result: "ok" } });
      const error = createTestState({ outputData: { result: "error" } });

      expect(evaluateExpression("output.result == 'ok'", ok)).toBe(true);
      expect(evaluateExpression("output.result == 'ok'", error)).toBe(false);
    });

    it("should compare strings case-insensitively", () => {
      const state = createTestState({ outputData: { result: "OK" } });

      expect(evaluateExpression('output.result == "ok"', state)).toBe(true);
    });

    it("should map dotted names onto underscored keys", () => {
      const state = createTestState({ outputData: { build_success: true } });

      expect(evaluateExpression("build.success", state)).toBe(true);
      expect(evaluateExpression("build.success == true", state)).toBe(true);
    });

    it("should read plain identifiers as output keys", () => {
      const state = createTestState({
        outputData: { approved: "yes", skipped: "false", score: "0" },
      });

      expect(evaluateExpression("approved", state)).toBe(true);
      expect(evaluateExpression("skipped", state)).toBe(false);
      expect(evaluateExpression("score", state)).toBe(false);
    });

    it("should treat missing keys as false", () => {
      expect(evaluateExpression("missing", running)).toBe(false);
      expect(evaluateExpression("output.missing == 'x'", running)).toBe(false);
      expect(evaluateExpression("output.missing != 'x'", running)).toBe(true);
    });

    it("should compare numeric strings numerically", () => {
      const state = createTestState({ outputData: { coverage: "85.5" } });

      expect(evaluateExpression("coverage >= 80", state)).toBe(true);
      expect(evaluateExpression("coverage < 80", state)).toBe(false);
    });

    it("should not order non-numeric values", () => {
      const state = createTestState({ outputData: { name: "beta" } });

      expect(evaluateExpression("name > 'alpha'", state)).toBe(false);
    });
  });

  describe("iteration_count", () => {
    it("should be true iff the count reaches the bound", () => {
      for (const [count, expected] of [
        [4, false],
        [5, true],
        [6, true],
      ] as const) {
        const state = createTestState({ iterationCount: count });
        expect(evaluateExpression("iteration_count >= 5", state)).toBe(expected);
      }
    });
  });

  describe("precedence and grouping", () => {
    it("should bind && tighter than ||", () => {
      expect(evaluateExpression("true || false && false", running)).toBe(true);
    });

    it("should respect parentheses", () => {
      expect(evaluateExpression("(true || false) && false", running)).toBe(false);
      expect(evaluateExpression("!(success && failure)", running)).toBe(true);
    });

    it("should combine comparisons", () => {
      const state = createTestState({
        iterationCount: 2,
        outputData: { result: "ok" },
      });

      expect(
        evaluateExpression("output.result == 'ok' && iteration_count < 3", state)
      ).toBe(true);
    });
  });

  describe("malformed input", () => {
    it("should skip characters it does not recognise", () => {
      expect(evaluateExpression("@#$", running)).toBe(true);
      expect(evaluateExpression("true ;", running)).toBe(true);
    });

    it("should not throw on dangling operators", () => {
      expect(evaluateExpression("success &&", running)).toBe(false);
      expect(evaluateExpression("(success", running)).toBe(true);
    });
  });
});
