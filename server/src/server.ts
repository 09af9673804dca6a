/**
 * Server bootstrap: wires configuration, checkpoint store, engine and the
 * express app together and binds the HTTP port.
 */

import * as http from "http";
import type { FlowgateConfig } from "@flowgate/types";
import { createApp } from "./app.js";
import { loadFlowgateConfig, resolveProjectPath } from "./config.js";
import type { AgentExecutor } from "./workflow/agent-executor.js";
import { createCheckpointStore } from "./workflow/checkpoints/create-checkpoint-store.js";
import { StateMachineEngine } from "./workflow/engines/state-machine-engine.js";
import { YamlWorkflowLoader } from "./workflow/workflow-loader.js";

export interface FlowgateServerOptions {
  projectDir: string;
  executor: AgentExecutor;
  /** Overrides the configured port; 0 picks a free one */
  port?: number;
}

export interface FlowgateServer {
  server: http.Server;
  port: number;
  config: FlowgateConfig;
  engine: StateMachineEngine;
  close(): Promise<void>;
}

function listen(server: http.Server, port: number): Promise<number> {
  return new Promise<number>((resolve, reject) => {
    const errorHandler = (err: NodeJS.ErrnoException) => {
      server.removeListener("listening", listeningHandler);
      reject(err);
    };
    const listeningHandler = () => {
      server.removeListener("error", errorHandler);
      const address = server.address();
      resolve(typeof address === "object" && address !== null ? address.port : port);
    };
    server.once("error", errorHandler);
    server.once("listening", listeningHandler);
    server.listen(port);
  });
}

export async function startFlowgateServer(
  options: FlowgateServerOptions
): Promise<FlowgateServer> {
  const config = loadFlowgateConfig(options.projectDir);
  const checkpointStore = createCheckpointStore(
    config.checkpointBackend,
    resolveProjectPath(options.projectDir, config.checkpointDirectory)
  );
  const loader = new YamlWorkflowLoader();
  const engine = new StateMachineEngine(
    { executor: options.executor, checkpointStore },
    {
      triggerPollIntervalMs: config.triggerPollIntervalMs,
      maxTriggerWaitMs: config.maxTriggerWaitMs,
    }
  );

  const app = createApp({
    engine,
    loader,
    checkpointStore,
    workflowsDirectory: resolveProjectPath(
      options.projectDir,
      config.workflowsDirectory
    ),
  });

  const server = http.createServer(app);
  const port = await listen(server, options.port ?? config.port);
  console.log(`[server] HTTP server bound to port ${port}`);

  return {
    server,
    port,
    config,
    engine,
    close: () =>
      new Promise<void>((resolve, reject) => {
        for (const execution of engine.listActive()) {
          engine.cancel(execution.executionId);
        }
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
