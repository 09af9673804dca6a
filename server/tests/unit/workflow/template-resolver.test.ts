/**
 * Unit tests for WorkflowTemplateResolver
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { WorkflowTemplateResolver } from "../../../src/workflow/template-resolver.js";
import { YamlWorkflowLoader } from "../../../src/workflow/workflow-loader.js";
import {
  WorkflowTemplateNotFoundError,
  WorkflowTemplateResolutionError,
} from "../../../src/workflow/errors.js";

const RELEASE_TEMPLATE = `
name: "{{ project.name }}-release"
version: "1.0"
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

describe("WorkflowTemplateResolver", () => {
  let templatesDir: string;
  let resolver: WorkflowTemplateResolver;

  function writeTemplate(name: string, content: string): void {
    fs.writeFileSync(path.join(templatesDir, name), content);
  }

  beforeEach(() => {
    templatesDir = fs.mkdtempSync(path.join(os.tmpdir(), "flowgate-templates-"));
    resolver = new WorkflowTemplateResolver(new YamlWorkflowLoader(), {
      templatesDirectory: templatesDir,
    });
    writeTemplate("release.yaml", RELEASE_TEMPLATE);
  });

  afterEach(() => {
    fs.rmSync(templatesDir, { recursive: true, force: true });
  });

  describe("resolve", () => {
    it("should substitute nested parameters and load the workflow", async () => {
      const workflow = await resolver.resolve("release", {
        project: { name: "api" },
        builder: "compiler",
      });

      expect(workflow.name).toBe("api-release");
      expect(workflow.states.find((s) => s.id === "BUILD")?.executor).toBe("compiler");
    });

    it("should accept flat dotted keys", async () => {
      const workflow = await resolver.resolve("release", {
        "project.name": "web",
        builder: "bundler",
      });

      expect(workflow.name).toBe("web-release");
    });

    it("should match parameter names case-insensitively", async () => {
      const workflow = await resolver.resolve("release", {
        PROJECT: { Name: "cli" },
        Builder: "tsc",
      });

      expect(workflow.name).toBe("cli-release");
    });

    it("should report unresolved placeholders", async () => {
      const resolving = resolver.resolve("release", { project: { name: "api" } });

      await expect(resolving).rejects.toThrow(WorkflowTemplateResolutionError);
      await expect(resolving).rejects.toThrow(
        "Failed to resolve workflow template 'release'. Unresolved parameters: builder"
      );
    });

    it("should throw WorkflowTemplateNotFoundError for missing templates", async () => {
      const resolving = resolver.resolve("missing", {});

      await expect(resolving).rejects.toThrow(WorkflowTemplateNotFoundError);
      await expect(resolving).rejects.toThrow(
        `Workflow template 'missing' not found. Searched: ${templatesDir}`
      );
    });

    it("should wrap load failures of the rendered document", async () => {
      writeTemplate("broken.yaml", 'version: "{{ v }}"\nstates: []\n');

      await expect(resolver.resolve("broken", { v: "1" })).rejects.toThrow(
        /^Failed to resolve workflow template 'broken': /
      );
    });
  });

  describe("render", () => {
    it("should format lists, objects, dates and nulls", () => {
      const rendered = resolver.render(
        "inline",
        "{{ tags }}|{{ meta }}|{{ when }}|{{ none }}",
        {
          tags: ["a", "b"],
          meta: { retries: 2 },
          when: new Date("2024-01-02T03:04:05.000Z"),
          none: null,
        }
      );

      expect(rendered).toBe('a,b|{"retries":2}|2024-01-02T03:04:05.000Z|');
    });

    it("should leave unknown placeholders in place when not strict", () => {
      const lenient = new WorkflowTemplateResolver(new YamlWorkflowLoader(), {
        templatesDirectory: templatesDir,
        strict: false,
      });

      expect(lenient.render("inline", "run {{ target }}", {})).toBe("run {{ target }}");
    });

    it("should use the default value for unknown placeholders when asked", () => {
      const lenient = new WorkflowTemplateResolver(new YamlWorkflowLoader(), {
        templatesDirectory: templatesDir,
        strict: false,
        useDefaultForMissing: true,
        defaultValue: "n/a",
      });

      expect(lenient.render("inline", "run {{ target }}", {})).toBe("run n/a");
    });
  });

  describe("renderTemplate", () => {
    it("should return the substituted text", async () => {
      const rendered = await resolver.renderTemplate("release", {
        project: { name: "api" },
        builder: "compiler",
      });

      expect(rendered).toContain('name: "api-release"');
      expect(rendered).toContain('executor: "compiler"');
    });
  });

  describe("discovery", () => {
    it("should list template names, sorted and without extension", async () => {
      writeTemplate("broken.yaml", "name: x\n");
      writeTemplate("notes.txt", "not a template");

      expect(await resolver.getAvailableTemplates()).toEqual(["broken", "release"]);
    });

    it("should list nothing for a missing directory", async () => {
      const orphan = new WorkflowTemplateResolver(new YamlWorkflowLoader(), {
        templatesDirectory: path.join(templatesDir, "nope"),
      });

      expect(await orphan.getAvailableTemplates()).toEqual([]);
    });

    it("should check whether a template exists", async () => {
      expect(await resolver.templateExists("release")).toBe(true);
      expect(await resolver.templateExists("release.yaml")).toBe(true);
      expect(await resolver.templateExists("ghost")).toBe(false);
    });
  });

  describe("validateTemplate", () => {
    it("should accept a well-formed template and list its parameters", async () => {
      expect(await resolver.validateTemplate("release")).toEqual({
        templateName: "release",
        isValid: true,
        errors: [],
        warnings: [],
        parameters: ["builder", "project.name"],
      });
    });

    it("should warn when there are no placeholders", async () => {
      writeTemplate("fixed.yaml", "name: fixed\nstates: []\n");

      const result = await resolver.validateTemplate("fixed");

      expect(result.isValid).toBe(true);
      expect(result.warnings).toEqual(["Template has no parameter placeholders"]);
    });

    it("should require name and states", async () => {
      writeTemplate("empty.yaml", "version: '{{ v }}'\n");

      const result = await resolver.validateTemplate("empty");

      expect(result.errors).toEqual([
        "Template must define 'name' field",
        "Template must define 'states' field",
      ]);
    });

    it("should flag malformed parameter paths", async () => {
      writeTemplate("paths.yaml", "name: '{{ a..b }}'\nstates: []\n");

      const result = await resolver.validateTemplate("paths");

      expect(result.isValid).toBe(false);
      expect(result.errors).toEqual(["Invalid parameter path syntax: a..b"]);
    });

    it("should flag YAML that does not parse", async () => {
      writeTemplate("bad.yaml", "name: x\nstates: [\n");

      const result = await resolver.validateTemplate("bad");

      expect(result.isValid).toBe(false);
      expect(result.errors[0]).toMatch(/^Template is not valid YAML: /);
    });

    it("should report a missing file", async () => {
      const result = await resolver.validateTemplate("ghost");

      expect(result.errors).toEqual([
        `Template file not found: ${path.join(templatesDir, "ghost.yaml")}`,
      ]);
    });
  });
});
