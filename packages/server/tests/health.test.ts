/**
 * Tests for the health check endpoint.
 *
 * Verifies:
 * - GET /health returns 200 with status "ok"
 * - the route needs no API key
 * - X-Request-Id is set on responses
 */

import { describe, it, expect } from "vitest";
import { createTestApp, jsonRequest } from "./setup.js";

describe("GET /health", () => {
  it("returns 200 with status ok", async () => {
    const { app } = await createTestApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: "ok",
      timestamp: expect.any(String),
    });
  });

  it("passes response validation", async () => {
    const { app } = await createTestApp({
      validation: { validateResponses: true, includeResponseStatus: true },
    });
    const res = await app.request("/health");

    expect(res.status).toBe(200);
  });

  it("includes a generated X-Request-Id header", async () => {
    const { app } = await createTestApp();
    const res = await app.request("/health");

    expect(res.headers.get("X-Request-Id")).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/,
    );
  });

  it("preserves incoming X-Request-Id", async () => {
    const { app } = await createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, {
        "X-Request-Id": "test-req-123",
      }),
    );

    expect(res.headers.get("X-Request-Id")).toBe("test-req-123");
  });

  it("rejects an undeclared method", async () => {
    const { app } = await createTestApp();
    const res = await app.request("/health", { method: "POST" });

    expect(res.status).toBe(400);
    expect(await res.text()).toBe("method not allowed\n");
  });
});
