/**
 * Unit tests for AgentExecutorRegistry
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  AgentExecutorRegistry,
  type AgentInvocation,
} from "../../../src/workflow/agent-executor.js";
import { UnknownExecutorError } from "../../../src/workflow/errors.js";

function createInvocation(overrides?: Partial<AgentInvocation>): AgentInvocation {
  return {
    executionId: "exec-test",
    stateId: "BUILD",
    context: {},
    signal: new AbortController().signal,
    ...overrides,
  };
}

describe("AgentExecutorRegistry", () => {
  let registry: AgentExecutorRegistry;

  beforeEach(() => {
    registry = new AgentExecutorRegistry();
  });

  it("should dispatch to the handler registered under the name", async () => {
    const handler = vi.fn().mockResolvedValue({
      success: true,
      data: { build_success: true },
    });
    registry.register("builder", handler);
    const invocation = createInvocation();

    const result = await registry.execute(
      "builder",
      "release 1.2",
      { previous: 1 },
      invocation
    );

    expect(result).toEqual({ success: true, data: { build_success: true } });
    expect(handler).toHaveBeenCalledWith("release 1.2", { previous: 1 }, invocation);
  });

  it("should accept synchronous handlers", async () => {
    registry.register("echo", (input) => ({ success: true, data: { echoed: input } }));

    const result = await registry.execute("echo", "hi", {}, createInvocation());

    expect(result.data).toEqual({ echoed: "hi" });
  });

  it("should chain registrations", () => {
    registry
      .register("a", () => ({ success: true, data: {} }))
      .register("b", () => ({ success: true, data: {} }));

    expect(registry.getRegisteredNames()).toEqual(["a", "b"]);
    expect(registry.has("a")).toBe(true);
  });

  it("should fail on unknown names, listing what is registered", async () => {
    registry.register("builder", () => ({ success: true, data: {} }));

    const execution = registry.execute("ghost", "", {}, createInvocation());

    await expect(execution).rejects.toThrow(UnknownExecutorError);
    await expect(execution).rejects.toThrow(
      "Unknown executor 'ghost'. Registered: [builder]"
    );
  });

  it("should forget unregistered handlers", () => {
    registry.register("builder", () => ({ success: true, data: {} }));

    expect(registry.unregister("builder")).toBe(true);
    expect(registry.unregister("builder")).toBe(false);
    expect(registry.has("builder")).toBe(false);
  });

  it("should propagate handler errors", async () => {
    registry.register("flaky", async () => {
      throw new Error("network down");
    });

    await expect(
      registry.execute("flaky", "", {}, createInvocation())
    ).rejects.toThrow("network down");
  });
});
