import express, { Request, Response } from "express";
import cors from "cors";
import { createExecutionsRouter, type ExecutionsRouterOptions } from "./routes/executions.js";

/**
 * Build the express application. Kept separate from listening so tests can
 * drive it in process.
 */
export function createApp(options: ExecutionsRouterOptions): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "ok",
      activeExecutions: options.engine.listActive().length,
    });
  });

  app.use("/api/executions", createExecutionsRouter(options));

  // 404 handler for unknown API routes
  app.use("/api", (req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: "Not found",
      message: `API endpoint not found: ${req.method} ${req.path}`,
    });
  });

  return app;
}
