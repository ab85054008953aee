/**
 * Health Check Routes
 * Infrastructure endpoints for monitoring and orchestration.
 */

import { Router } from "express";

export interface HealthStatus {
  ready: boolean;
  activeDownloads: number;
}

export function createHealthRouter(getStatus: () => HealthStatus): Router {
  const healthRouter = Router();

  /** Simple health check endpoint. */
  healthRouter.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  /** Readiness check: 503 until the bot is polling. */
  healthRouter.get("/ready", (_req, res) => {
    const status = getStatus();
    res.status(status.ready ? 200 : 503).json(status);
  });

  return healthRouter;
}
