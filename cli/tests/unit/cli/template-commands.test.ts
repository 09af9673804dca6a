/**
 * Unit tests for template command handlers
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { DEFAULT_CONFIG } from "@flowgate/server/config";
import {
  handleTemplateList,
  handleTemplateRender,
  handleTemplateValidate,
  parseTemplateParams,
} from "../../../src/cli/template-commands.js";
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

const RELEASE_TEMPLATE = `name: "{{ project.name }}-release"
states:
  - id: START
    type: start
    next: BUILD
  - id: BUILD
    type: agent
    executor: "{{ builder }}"
    next: DONE
  - id: DONE
    type: terminal
`;

describe("parseTemplateParams", () => {
  it("should split on the first '=' and keep dotted keys", () => {
    expect(parseTemplateParams(["project.name=api", "filter=a=b", "empty="])).toEqual({
      "project.name": "api",
      filter: "a=b",
      empty: "",
    });
  });

  it("should reject pairs without a key", () => {
    expect(() => parseTemplateParams(["novalue"])).toThrow(
      "Invalid parameter 'novalue'. Expected key=value"
    );
    expect(() => parseTemplateParams(["=x"])).toThrow(
      "Invalid parameter '=x'. Expected key=value"
    );
  });
});

describe("Template Commands", () => {
  let tempDir: string;
  let templatesDir: string;
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

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "flowgate-cli-templates-"));
    templatesDir = path.join(tempDir, DEFAULT_CONFIG.templatesDirectory);
    fs.mkdirSync(templatesDir, { recursive: true });
    fs.writeFileSync(path.join(templatesDir, "release.yaml"), RELEASE_TEMPLATE);

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

  describe("handleTemplateList", () => {
    it("should print one template name per line", async () => {
      fs.writeFileSync(path.join(templatesDir, "hotfix.yaml"), "name: hotfix\nstates: []\n");

      await handleTemplateList(createContext());

      expect(consoleLogSpy.mock.calls).toEqual([["hotfix"], ["release"]]);
    });

    it("should say when there are no templates", async () => {
      fs.rmSync(templatesDir, { recursive: true, force: true });

      await handleTemplateList(createContext());

      expect(consoleLogSpy).toHaveBeenCalledWith("No templates found");
    });

    it("should print JSON", async () => {
      await handleTemplateList(createContext({ jsonOutput: true }));

      expect(consoleLogSpy).toHaveBeenCalledWith(JSON.stringify(["release"], null, 2));
    });
  });

  describe("handleTemplateRender", () => {
    it("should write the rendered workflow to stdout", async () => {
      const writeSpy = vi.spyOn(process.stdout, "write").mockImplementation(() => true);

      await handleTemplateRender(createContext(), "release", {
        param: ["project.name=api", "builder=compiler"],
      });

      expect(writeSpy).toHaveBeenCalledWith(
        RELEASE_TEMPLATE.replace("{{ project.name }}", "api").replace(
          "{{ builder }}",
          "compiler"
        )
      );
    });

    it("should print the name and text as JSON", async () => {
      await handleTemplateRender(createContext({ jsonOutput: true }), "release", {
        param: ["project.name=api", "builder=compiler"],
      });

      const output: unknown = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
      expect(output).toMatchObject({ name: "api-release" });
    });

    it("should list missing parameters and exit 1", async () => {
      await expect(
        handleTemplateRender(createContext(), "release", { param: ["project.name=api"] })
      ).rejects.toThrow("process.exit(1)");

      expect(consoleErrorSpy).toHaveBeenCalledWith("✗ Failed to render template", "release");
      expect(consoleErrorSpy).toHaveBeenCalledWith("  missing: builder");
    });

    it("should report unknown templates", async () => {
      await expect(
        handleTemplateRender(createContext(), "ghost", {})
      ).rejects.toThrow("process.exit(1)");

      expect(consoleErrorSpy).toHaveBeenCalledWith(
        `Workflow template 'ghost' not found. Searched: ${templatesDir}`
      );
    });
  });

  describe("handleTemplateValidate", () => {
    it("should report a valid template and its parameters", async () => {
      await handleTemplateValidate(createContext(), "release");

      expect(consoleLogSpy).toHaveBeenCalledWith("✓ Template is valid", "release");
      expect(consoleLogSpy).toHaveBeenCalledWith("  Parameters: builder, project.name");
    });

    it("should exit 1 for an invalid template", async () => {
      fs.writeFileSync(path.join(templatesDir, "partial.yaml"), "version: '{{ v }}'\n");

      await expect(handleTemplateValidate(createContext(), "partial")).rejects.toThrow(
        "process.exit(1)"
      );

      expect(consoleLogSpy).toHaveBeenCalledWith("✗ Template is invalid", "partial");
      expect(consoleLogSpy).toHaveBeenCalledWith("  error: Template must define 'name' field");
    });
  });
});
