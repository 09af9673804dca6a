/**
 * Trigger evaluators
 *
 * A trigger gates entry into a state. The engine polls the evaluator for the
 * trigger's type until it reports true.
 */

import * as fs from "fs/promises";
import * as path from "path";
import type { TriggerDefinition, TriggerType } from "@flowgate/types";
import { TriggerNotSupportedError } from "./errors.js";

export interface TriggerContext {
  /** Base for relative trigger paths; defaults to the process cwd */
  workingDirectory?: string;
  stateData?: Readonly<Record<string, unknown>>;
}

export interface TriggerEvaluator {
  readonly triggerType: TriggerType;
  evaluate(
    trigger: TriggerDefinition,
    context: TriggerContext,
    signal?: AbortSignal
  ): Promise<boolean>;
}

function resolveTriggerPath(
  trigger: TriggerDefinition,
  context: TriggerContext
): string {
  if (trigger.path === undefined || trigger.path.trim() === "") {
    throw new TypeError(
      `Trigger '${trigger.type}' requires a non-empty path`
    );
  }
  return path.resolve(context.workingDirectory ?? process.cwd(), trigger.path);
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * True once the path (file or directory) exists.
 */
export class FileExistsTriggerEvaluator implements TriggerEvaluator {
  readonly triggerType = "file_exists";

  async evaluate(
    trigger: TriggerDefinition,
    context: TriggerContext
  ): Promise<boolean> {
    return pathExists(resolveTriggerPath(trigger, context));
  }
}

/**
 * True once the directory exists and holds at least one entry. A missing
 * directory is simply unsatisfied.
 */
export class DirectoryNotEmptyTriggerEvaluator implements TriggerEvaluator {
  readonly triggerType = "directory_not_empty";

  async evaluate(
    trigger: TriggerDefinition,
    context: TriggerContext
  ): Promise<boolean> {
    const directory = resolveTriggerPath(trigger, context);
    try {
      const entries = await fs.readdir(directory);
      return entries.length > 0;
    } catch (error) {
      if (isMissingPathError(error)) {
        return false;
      }
      throw error;
    }
  }
}

export class ImmediateTriggerEvaluator implements TriggerEvaluator {
  readonly triggerType = "immediate";

  async evaluate(): Promise<boolean> {
    return true;
  }
}

function isMissingPathError(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

/**
 * Lookup table of trigger evaluators by trigger type.
 */
export class TriggerEvaluatorRegistry {
  private readonly evaluators = new Map<TriggerType, TriggerEvaluator>();

  constructor(evaluators: TriggerEvaluator[] = []) {
    for (const evaluator of evaluators) {
      this.register(evaluator);
    }
  }

  /**
   * Register an evaluator, replacing any previous one for the same type.
   */
  register(evaluator: TriggerEvaluator): void {
    this.evaluators.set(evaluator.triggerType, evaluator);
  }

  has(type: TriggerType): boolean {
    return this.evaluators.has(type);
  }

  /**
   * @throws TriggerNotSupportedError if nothing is registered for the type
   */
  getEvaluator(type: TriggerType): TriggerEvaluator {
    const evaluator = this.evaluators.get(type);
    if (!evaluator) {
      throw new TriggerNotSupportedError(type);
    }
    return evaluator;
  }

  getSupportedTypes(): TriggerType[] {
    return [...this.evaluators.keys()];
  }
}

/**
 * Registry with the built-in evaluators. `expression` triggers have none.
 */
export function createDefaultTriggerRegistry(): TriggerEvaluatorRegistry {
  return new TriggerEvaluatorRegistry([
    new FileExistsTriggerEvaluator(),
    new DirectoryNotEmptyTriggerEvaluator(),
    new ImmediateTriggerEvaluator(),
  ]);
}
