/**
 * Unit tests for the validate command handler
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { DEFAULT_CONFIG } from "@flowgate/server/config";
import { handleValidate } from "../../../src/cli/validate-commands.js";
import type { CommandContext } from "../../../src/context.js";

vi.mock("chalk", () => {
  const identity = (s: string) => s;
  return {
    default: {
      blue: identity,
      cyan: identity,
      green: identity,
      yellow: identity,
      red: identity,
      gray: identity,
      bold: identity,
    },
  };
});

const BUILD_YAML = `
name: build
agents:
  - ref: agents/builder
states:
  - id: START
    type: start
    next: BUILD
  - id: BUILD
    type: agent
    executor: builder
    next: DONE
  - id: DONE
    type: terminal
`;

describe("Validate Command", () => {
  let tempDir: string;
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.error>;

  function createContext(overrides?: Partial<CommandContext>): CommandContext {
    return {
      projectDir: tempDir,
      config: { ...DEFAULT_CONFIG },
      jsonOutput: false,
      ...overrides,
    };
  }

  function writeWorkflow(name: string, content: string): string {
    const file = path.join(tempDir, name);
    fs.writeFileSync(file, content);
    return file;
  }

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "flowgate-cli-validate-"));
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(process, "exit").mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("should report a valid workflow", async () => {
    const file = writeWorkflow("build.yaml", BUILD_YAML);

    await handleValidate(createContext(), file);

    expect(consoleLogSpy).toHaveBeenCalledWith("✓ Workflow is valid", "build");
    expect(consoleLogSpy).toHaveBeenCalledWith("  States: 3");
  });

  it("should print the result as JSON", async () => {
    const file = writeWorkflow("build.yaml", BUILD_YAML);

    await handleValidate(createContext({ jsonOutput: true }), file);

    const output: unknown = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
    expect(output).toEqual({
      file,
      name: "build",
      isValid: true,
      errors: [],
      warnings: [],
    });
  });

  it("should list issues and exit 1 for an invalid workflow", async () => {
    const file = writeWorkflow(
      "dup.yaml",
      "name: dup\nstates:\n  - id: A\n    type: terminal\n  - id: A\n    type: terminal\n"
    );

    await expect(handleValidate(createContext(), file)).rejects.toThrow("process.exit(1)");

    expect(consoleLogSpy).toHaveBeenCalledWith("✗ Workflow is invalid", "dup");
    expect(consoleLogSpy).toHaveBeenCalledWith(
      "  error: states[A]: Duplicate state ID: 'A' (duplicate_state_id)"
    );
  });

  it("should print warnings without failing", async () => {
    const file = writeWorkflow(
      "loop.yaml",
      "name: loop\nstates:\n  - id: A\n    type: agent\n    next: A\n"
    );

    await handleValidate(createContext(), file);

    expect(consoleLogSpy).toHaveBeenCalledWith(
      "  warning: states: Workflow has no terminal state. Ensure transitions lead to completion. (no_terminal_state)"
    );
  });

  it("should report parse failures", async () => {
    const file = writeWorkflow("bad.yaml", "name: x\nstates: [\n");

    await expect(handleValidate(createContext(), file)).rejects.toThrow("process.exit(1)");

    expect(consoleErrorSpy).toHaveBeenCalledWith("✗ Failed to parse workflow");
  });

  it("should report a missing file", async () => {
    const file = path.join(tempDir, "missing.yaml");

    await expect(handleValidate(createContext(), file)).rejects.toThrow("process.exit(1)");

    expect(consoleErrorSpy).toHaveBeenCalledWith(`Workflow file not found: ${file}`);
  });
});
