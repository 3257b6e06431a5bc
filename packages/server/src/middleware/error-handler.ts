/**
 * Global error handler.
 *
 * Maps domain errors thrown by route handlers to HTTP status codes
 * and a consistent error envelope.
 */

import type { Context } from "hono";
import { createErrorEnvelope } from "../types/error.js";
import type { ApiErrorCode } from "../types/error.js";
import { PetStoreError } from "../services/pet-store.js";
import type { PetStoreErrorCode } from "../services/pet-store.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const ERROR_MAP: Record<
  PetStoreErrorCode,
  { readonly status: 404 | 409; readonly code: ApiErrorCode }
> = {
  PET_NOT_FOUND: { status: 404, code: "NOT_FOUND" },
  PET_EXISTS: { status: 409, code: "CONFLICT" },
};

// =============================================================================
// Handler
// =============================================================================

/**
 * Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (err instanceof PetStoreError) {
    const { status, code } = ERROR_MAP[err.code];
    return c.json(createErrorEnvelope(code, err.message), status);
  }

  // Don't leak internal details
  return c.json(
    createErrorEnvelope("INTERNAL_ERROR", "Internal server error"),
    500,
  );
}
