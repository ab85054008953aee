/**
 * Route Aggregator
 * Combines all HTTP routers into a single router.
 */

import { Router } from "express";
import { createHealthRouter, type HealthStatus } from "./health.js";

export function createRouter(getStatus: () => HealthStatus): Router {
  const router = Router();

  /** Register all route modules */
  router.use(createHealthRouter(getStatus));

  return router;
}
