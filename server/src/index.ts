import { startFlowgateServer } from "./server.js";
import { AgentExecutorRegistry } from "./workflow/agent-executor.js";

// Standalone mode has no step implementations; embedders pass their own
// executor to startFlowgateServer.
const executors = new AgentExecutorRegistry();
console.warn(
  "[server] No executors registered; agent and parallel states will fail until an executor is provided"
);

const flowgate = await startFlowgateServer({
  projectDir: process.cwd(),
  executor: executors,
});

console.log(`flowgate server running on: http://localhost:${flowgate.port}`);

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", reason);
});

async function shutdown(): Promise<void> {
  console.log("\nShutting down server...");

  // Force exit if graceful shutdown hangs
  const forceExit = setTimeout(() => {
    console.error("Shutdown timeout - forcing exit");
    process.exit(1);
  }, 10000);
  forceExit.unref();

  try {
    await flowgate.close();
    console.log("Server closed");
    process.exit(0);
  } catch (error) {
    console.error("Failed to close server:", error);
    process.exit(1);
  }
}

process.on("SIGINT", () => {
  shutdown().catch((error: unknown) => console.error(error));
});
process.on("SIGTERM", () => {
  shutdown().catch((error: unknown) => console.error(error));
});
