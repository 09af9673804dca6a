/**
 * Structural validation of workflow definitions.
 *
 * Pure function, never throws: problems come back as a report of blocking
 * errors and non-blocking warnings.
 */

import * as path from "path";
import type {
  WorkflowDefinition,
  WorkflowValidationIssue,
  WorkflowValidationResult,
} from "@flowgate/types";

function isBlank(value: string | undefined): value is undefined {
  return value === undefined || value.trim() === "";
}

/**
 * Names an agent state may use as its executor: the alias when given,
 * otherwise the last segment of the reference.
 */
export function getAgentNames(workflow: WorkflowDefinition): Set<string> {
  return new Set(
    workflow.agents.map((agent) => agent.alias ?? path.basename(agent.ref))
  );
}

export function validateWorkflow(
  workflow: WorkflowDefinition
): WorkflowValidationResult {
  const errors: WorkflowValidationIssue[] = [];
  const warnings: WorkflowValidationIssue[] = [];

  if (isBlank(workflow.name)) {
    errors.push({
      code: "name_required",
      message: "Workflow name is required.",
      path: "name",
    });
  }

  if (workflow.states.length === 0) {
    errors.push({
      code: "no_states",
      message: "Workflow must have at least one state.",
      path: "states",
    });
  }

  const seen = new Map<string, number>();
  for (const state of workflow.states) {
    seen.set(state.id, (seen.get(state.id) ?? 0) + 1);
  }
  for (const [id, count] of seen) {
    if (count > 1) {
      errors.push({
        code: "duplicate_state_id",
        message: `Duplicate state ID: '${id}'`,
        path: `states[${id}]`,
      });
    }
  }

  const stateIds = new Set(seen.keys());
  const agentNames = getAgentNames(workflow);

  const checkReference = (
    target: string | undefined,
    describe: string,
    location: string
  ) => {
    if (!isBlank(target) && !stateIds.has(target)) {
      errors.push({
        code: "unknown_state_reference",
        message: `${describe} references non-existent state '${target}'`,
        path: location,
      });
    }
  };

  for (const state of workflow.states) {
    checkReference(state.next, `State '${state.id}'`, `states[${state.id}].next`);

    state.conditions.forEach((condition, index) => {
      if (isBlank(condition.then) || !stateIds.has(condition.then)) {
        errors.push({
          code: "unknown_state_reference",
          message: `State '${state.id}' condition references non-existent state '${condition.then}'`,
          path: `states[${state.id}].conditions[${index}]`,
        });
      }
    });

    if (state.type === "human_gate" && state.humanGate) {
      checkReference(
        state.humanGate.onApprove,
        `HumanGate '${state.id}' on_approve`,
        `states[${state.id}].human_gate.on_approve`
      );
      checkReference(
        state.humanGate.onReject,
        `HumanGate '${state.id}' on_reject`,
        `states[${state.id}].human_gate.on_reject`
      );
    }

    if (
      state.type === "agent" &&
      !isBlank(state.executor) &&
      !agentNames.has(state.executor)
    ) {
      warnings.push({
        code: "unknown_executor",
        message:
          `State '${state.id}' executor '${state.executor}' not found in agents list. ` +
          "It may be resolved at runtime.",
        path: `states[${state.id}].executor`,
      });
    }
  }

  if (!workflow.states.some((state) => state.type === "terminal")) {
    warnings.push({
      code: "no_terminal_state",
      message:
        "Workflow has no terminal state. Ensure transitions lead to completion.",
      path: "states",
    });
  }

  return { isValid: errors.length === 0, errors, warnings };
}
