/**
 * Pet routes.
 *
 * GET    /pets      : List pets (optional ?limit)
 * POST   /pets      : Create a pet
 * GET    /pets/:id  : Get one pet
 * DELETE /pets/:id  : Delete a pet
 *
 * Requests reach these handlers only after the OpenAPI validator
 * accepted them, so parameters and bodies already match the document.
 */

import { Hono } from "hono";
import { z } from "zod";
import type { ZodError } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

// Narrows the body to the store's input type. The OpenAPI validator
// normally rejects bad bodies first; with body checks excluded it does not.
const NewPetSchema = z.object({
  name: z.string(),
  tag: z.string().optional(),
});

export function createPetRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const limit = c.req.query("limit");
    const pets = c.get("store").list(limit === undefined ? undefined : Number(limit));
    return c.json(pets);
  });

  routes.post("/", async (c) => {
    let raw: unknown;
    try {
      raw = await c.req.json();
    } catch {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"),
        400,
      );
    }

    const result = NewPetSchema.safeParse(raw);
    if (!result.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request body validation failed", {
          issues: formatZodErrors(result.error),
        }),
        400,
      );
    }

    const pet = c.get("store").create(result.data);
    return c.json(pet, 201);
  });

  routes.get("/:id", (c) => {
    const pet = c.get("store").get(Number(c.req.param("id")));
    return c.json(pet);
  });

  routes.delete("/:id", (c) => {
    c.get("store").delete(Number(c.req.param("id")));
    return c.body(null, 204);
  });

  return routes;
}

function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
