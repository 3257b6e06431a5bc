/**
 * Tests for the global error handler.
 *
 * Verifies:
 * - PetStoreError codes map to HTTP statuses
 * - unknown errors become 500 without leaking details
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { handleError } from "../../src/middleware/error-handler.js";
import { PetStoreError } from "../../src/services/pet-store.js";

function makeApp(err: Error): Hono {
  const app = new Hono();
  app.onError(handleError);
  app.get("/boom", () => {
    throw err;
  });
  return app;
}

describe("handleError", () => {
  it("maps PET_NOT_FOUND to 404", async () => {
    const res = await makeApp(
      new PetStoreError("PET_NOT_FOUND", "Pet 1 not found"),
    ).request("/boom");

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: "NOT_FOUND", message: "Pet 1 not found" },
    });
  });

  it("maps PET_EXISTS to 409", async () => {
    const res = await makeApp(
      new PetStoreError("PET_EXISTS", "Pet 'Rex' already exists"),
    ).request("/boom");

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({
      error: { code: "CONFLICT", message: "Pet 'Rex' already exists" },
    });
  });

  it("hides unknown errors behind a 500", async () => {
    const res = await makeApp(new Error("database password is test-secret")).request(
      "/boom",
    );

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: { code: "INTERNAL_ERROR", message: "Internal server error" },
    });
  });
});
