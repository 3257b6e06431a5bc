/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 */

import type { RejectionLogEntry } from "@oapi-guard/validator";
import type { PetStore } from "../services/pet-store.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Pet store backing the API routes */
    store: PetStore;

    /** Set when the OpenAPI validator turned the request away */
    rejection?: RejectionLogEntry;
  };
}
