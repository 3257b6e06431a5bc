/**
 * Health check route.
 *
 * GET /health: Liveness probe. Declared in the OpenAPI document
 * as a public operation, so it passes validation like any other route.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  return routes;
}
