/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. Separated from
 * main.ts so tests create the app without starting the HTTP server.
 *
 * Async because the OpenAPI validator loads its document up front.
 */

import { Hono } from "hono";
import {
  oapiRequestValidatorWithOptions,
  type Document,
  type ValidationOptions,
} from "@oapi-guard/validator";
import type { AppEnv } from "./types/api-contract.js";
import { PetStore } from "./services/pet-store.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { createApiKeyAuthenticator } from "./security/api-key.js";
import { createHealthRoutes } from "./routes/health.js";
import { createPetRoutes } from "./routes/pets.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** OpenAPI document object or path to it */
  readonly spec: Document | string;
  /** Keys accepted by the document's apiKey security schemes */
  readonly apiKeys?: ReadonlySet<string>;
  /** Validator options; `authenticate` defaults to the API key check */
  readonly validation?: Omit<ValidationOptions, "authenticate">;
  readonly logFn?: (entry: RequestLogEntry) => void;
  readonly store?: PetStore;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly store: PetStore;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create the Hono application with all middleware and routes.
 *
 * @throws {SpecificationError} if the OpenAPI document cannot be loaded
 */
export async function createApp(options: CreateAppOptions): Promise<AppInstance> {
  const store = options.store ?? new PetStore();

  const validator = await oapiRequestValidatorWithOptions(options.spec, {
    ...options.validation,
    authenticate: createApiKeyAuthenticator(options.apiKeys ?? new Set()),
    onReject: (entry, c) => {
      // Picked up by the request logger.
      c.set("rejection", entry);
      options.validation?.onReject?.(entry, c);
    },
  });

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  app.use("*", async (c, next) => {
    c.set("store", store);
    await next();
  });

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);

  // ─── OpenAPI Validation (every route, health included) ──────────
  app.use("*", validator);

  // ─── Routes ─────────────────────────────────────────────────────
  app.route("/", createHealthRoutes());
  app.route("/pets", createPetRoutes());

  return { app, store };
}
