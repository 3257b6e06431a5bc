/**
 * Tests for request logging middleware.
 *
 * Verifies:
 * - one entry per request, after the response is produced
 * - validator rejections carry their kind and reason
 * - handler errors are logged without a rejection
 */

import { describe, it, expect } from "vitest";
import type { RequestLogEntry } from "../../src/middleware/logger.js";
import { createTestApp, jsonRequest } from "../setup.js";

describe("loggerMiddleware", () => {
  it("logs method, path, status and request id", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = await createTestApp({ logFn: (e) => entries.push(e) });

    await app.request(
      jsonRequest("/health", "GET", undefined, { "X-Request-Id": "req-1" }),
    );

    expect(entries).toHaveLength(1);
    expect(entries[0]).toEqual({
      method: "GET",
      path: "/health",
      status: 200,
      durationMs: expect.any(Number),
      requestId: "req-1",
      rejection: null,
    });
  });

  it("records the rejection of a non-conformant request", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = await createTestApp({ logFn: (e) => entries.push(e) });

    await app.request("/pets/abc");

    expect(entries).toHaveLength(1);
    expect(entries[0]?.status).toBe(400);
    expect(entries[0]?.rejection).toEqual({
      kind: "request",
      reason: 'parameter "id" in path has an error: must be integer',
    });
  });

  it("records security rejections", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = await createTestApp({ logFn: (e) => entries.push(e) });

    await app.request(jsonRequest("/pets", "POST", { name: "Fido" }));

    expect(entries[0]?.status).toBe(401);
    expect(entries[0]?.rejection).toEqual({
      kind: "security",
      reason: 'security requirements failed: header "X-Api-Key" is missing',
    });
  });

  it("still calls a caller-supplied onReject", async () => {
    const kinds: string[] = [];
    const { app } = await createTestApp({
      validation: { onReject: (entry) => kinds.push(entry.kind) },
    });

    await app.request("/owners");

    expect(kinds).toEqual(["route"]);
  });

  it("logs handler errors without a rejection", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = await createTestApp({ logFn: (e) => entries.push(e) });

    await app.request("/pets/5");

    expect(entries.map((e) => [e.status, e.rejection])).toEqual([[404, null]]);
  });
});
