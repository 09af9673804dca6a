/**
 * Executions API routes (mapped to /api/executions)
 *
 * HTTP surface of the approval API: start, inspect, approve, cancel and
 * resume workflow executions.
 */

import { Router, Request, Response } from "express";
import { randomUUID } from "crypto";
import * as fs from "fs";
import * as path from "path";
import type {
  ApprovalDecision,
  WorkflowDefinition,
  WorkflowRuntimeState,
} from "@flowgate/types";
import type { CheckpointStore } from "../workflow/checkpoints/checkpoint-store.js";
import {
  CheckpointResumeError,
  ExecutionCancelledError,
  ExecutionNotFoundError,
  ExecutionStateError,
  WorkflowParseError,
  WorkflowValidationError,
} from "../workflow/errors.js";
import type { IWorkflowEngine } from "../workflow/workflow-engine.js";
import type { IWorkflowLoader } from "../workflow/workflow-loader.js";

export interface ExecutionsRouterOptions {
  engine: IWorkflowEngine;
  loader: IWorkflowLoader;
  /** Where `POST /` looks up workflows by name */
  workflowsDirectory: string;
  checkpointStore?: CheckpointStore;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Helper to map execution errors to HTTP status codes
 */
function handleExecutionError(error: unknown, res: Response): void {
  if (
    error instanceof ExecutionNotFoundError ||
    error instanceof CheckpointResumeError
  ) {
    res.status(404).json({ success: false, data: null, message: error.message });
    return;
  }

  if (error instanceof ExecutionStateError) {
    res.status(409).json({ success: false, data: null, message: error.message });
    return;
  }

  if (error instanceof WorkflowValidationError) {
    res.status(400).json({
      success: false,
      data: null,
      message: error.message,
      errors: error.errors,
    });
    return;
  }

  if (error instanceof WorkflowParseError) {
    res.status(400).json({
      success: false,
      data: null,
      message: error.message,
      line: error.line,
      column: error.column,
    });
    return;
  }

  console.error("[executions] Unexpected error:", error);
  res.status(500).json({
    success: false,
    data: null,
    error_data: error instanceof Error ? error.message : String(error),
    message: "Internal server error",
  });
}

/**
 * Consume the rest of a snapshot stream so the execution keeps running
 * after the response is sent.
 */
async function drain(
  executionId: string,
  snapshots: AsyncGenerator<WorkflowRuntimeState, void, undefined>
): Promise<void> {
  try {
    let last: WorkflowRuntimeState | undefined;
    for await (const snapshot of snapshots) {
      last = snapshot;
    }
    if (last) {
      console.log(
        `[executions] Execution ${executionId} finished with status ${last.status}`
      );
    }
  } catch (error) {
    if (error instanceof ExecutionCancelledError) {
      console.log(`[executions] Execution ${executionId} cancelled`);
      return;
    }
    throw error;
  }
}

function findWorkflowFile(directory: string, name: string): string | null {
  for (const extension of [".yaml", ".yml"]) {
    const candidate = path.join(directory, `${name}${extension}`);
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }
  return null;
}

export function createExecutionsRouter(options: ExecutionsRouterOptions): Router {
  const { engine, loader, workflowsDirectory, checkpointStore } = options;
  const router = Router();

  /**
   * GET /api/executions - List active executions
   */
  router.get("/", (_req: Request, res: Response) => {
    res.json({ success: true, data: engine.listActive() });
  });

  /**
   * POST /api/executions - Start an execution
   *
   * Request body:
   * - workflow: string (name of a file in the workflows directory), or
   * - yaml: string (inline workflow document)
   * - input: string
   * - workingDirectory: string
   */
  router.post("/", async (req: Request, res: Response) => {
    try {
      const body: unknown = req.body;
      if (!isRecord(body)) {
        res.status(400).json({
          success: false,
          data: null,
          message: "Request body must be a JSON object",
        });
        return;
      }

      const { workflow: name, yaml, input, workingDirectory } = body;
      let workflow: WorkflowDefinition;

      if (typeof yaml === "string") {
        workflow = loader.loadFromString(yaml);
      } else if (typeof name === "string" && name.trim() !== "") {
        if (name.includes("/") || name.includes("\\") || name.includes("..")) {
          res.status(400).json({
            success: false,
            data: null,
            message: `Invalid workflow name: ${name}`,
          });
          return;
        }
        const file = findWorkflowFile(workflowsDirectory, name);
        if (!file) {
          res.status(404).json({
            success: false,
            data: null,
            message: `Workflow not found: ${name}`,
          });
          return;
        }
        workflow = await loader.loadFromFile(file);
      } else {
        res.status(400).json({
          success: false,
          data: null,
          message: "Either 'workflow' or 'yaml' is required",
        });
        return;
      }

      const validation = loader.validate(workflow);
      if (!validation.isValid) {
        throw new WorkflowValidationError(workflow.name, validation.errors);
      }

      const executionId = randomUUID();
      const snapshots = engine.execute(
        workflow,
        typeof input === "string" ? input : "",
        {
          executionId,
          context: {
            workingDirectory:
              typeof workingDirectory === "string" ? workingDirectory : undefined,
          },
        }
      );

      const first = await snapshots.next();
      drain(executionId, snapshots).catch((error: unknown) =>
        console.error(`[executions] Execution ${executionId} crashed:`, error)
      );

      res.status(201).json({
        success: true,
        data: {
          executionId,
          state: first.done ? null : first.value,
          warnings: validation.warnings,
        },
      });
    } catch (error) {
      handleExecutionError(error, res);
    }
  });

  /**
   * GET /api/executions/:id - Latest snapshot of an active execution
   */
  router.get("/:id", (req: Request, res: Response) => {
    try {
      res.json({ success: true, data: engine.getState(req.params.id) });
    } catch (error) {
      handleExecutionError(error, res);
    }
  });

  /**
   * POST /api/executions/:id/approve - Resolve a pending human gate
   *
   * Request body:
   * - approved: boolean (required)
   * - feedback: string
   */
  router.post("/:id/approve", (req: Request, res: Response) => {
    try {
      const body: unknown = req.body;
      if (!isRecord(body) || typeof body.approved !== "boolean") {
        res.status(400).json({
          success: false,
          data: null,
          message: "'approved' must be a boolean",
        });
        return;
      }
      if (body.feedback !== undefined && typeof body.feedback !== "string") {
        res.status(400).json({
          success: false,
          data: null,
          message: "'feedback' must be a string",
        });
        return;
      }

      const decision: ApprovalDecision = {
        approved: body.approved,
        feedback: body.feedback,
      };
      engine.approve(req.params.id, decision);

      res.json({
        success: true,
        data: { executionId: req.params.id, approved: decision.approved },
        message: decision.approved ? "Approval delivered" : "Rejection delivered",
      });
    } catch (error) {
      handleExecutionError(error, res);
    }
  });

  /**
   * POST /api/executions/:id/cancel - Cancel an active execution
   */
  router.post("/:id/cancel", (req: Request, res: Response) => {
    try {
      engine.cancel(req.params.id);
      res.json({
        success: true,
        data: { executionId: req.params.id },
        message: "Cancellation requested",
      });
    } catch (error) {
      handleExecutionError(error, res);
    }
  });

  /**
   * POST /api/executions/:id/resume - Continue from the latest checkpoint
   */
  router.post("/:id/resume", async (req: Request, res: Response) => {
    try {
      const executionId = req.params.id;
      const snapshots = engine.resumeFromCheckpoint(executionId);
      const first = await snapshots.next();
      drain(executionId, snapshots).catch((error: unknown) =>
        console.error(`[executions] Execution ${executionId} crashed:`, error)
      );

      res.json({
        success: true,
        data: { executionId, state: first.done ? null : first.value },
      });
    } catch (error) {
      handleExecutionError(error, res);
    }
  });

  /**
   * GET /api/executions/:id/checkpoints - Saved checkpoints, oldest first
   */
  router.get("/:id/checkpoints", async (req: Request, res: Response) => {
    try {
      if (!checkpointStore) {
        res.status(503).json({
          success: false,
          data: null,
          message: "Checkpointing is not configured",
        });
        return;
      }
      const checkpoints = await checkpointStore.getAllForExecution(req.params.id);
      res.json({
        success: true,
        data: checkpoints.map(({ serializedState: _serialized, ...rest }) => rest),
      });
    } catch (error) {
      handleExecutionError(error, res);
    }
  });

  return router;
}
