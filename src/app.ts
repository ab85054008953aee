import express from "express";
import helmet from "helmet";
import { createRouter } from "./routes/index.js";
import type { HealthStatus } from "./routes/health.js";

/**
 * Builds the Express application serving operational endpoints.
 */
export function createApp(getStatus: () => HealthStatus): express.Express {
  const app = express();

  /** Disable the X-Powered-By header to reduce fingerprinting. */
  app.disable("x-powered-by");

  /** Adds standard security headers. */
  app.use(helmet());

  /** Application routes. */
  app.use(createRouter(getStatus));

  return app;
}
