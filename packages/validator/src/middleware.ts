/**
 * OpenAPI request validation middleware for Hono.
 *
 * Resolves each request to a document operation, validates it, and either
 * rejects it with a formatted error body or hands it to the next handler
 * untouched.
 *
 * Status codes:
 * - 400 unknown route, or a request that does not conform
 * - 401 failed security requirements
 * - 500 aggregated (multiError) or unclassified validation failures
 */

import type { Context, MiddlewareHandler } from "hono";
import type { Document, Request as OpenApiRequest } from "openapi-backend";
import { contentTypeHeader, formatErrorBody } from "./error-body.js";
import { loadSpecification } from "./loader.js";
import { validateResponse } from "./response.js";
import { ErrorResponseContentType } from "./types.js";
import type {
  RejectionLogEntry,
  ValidationFailure,
  ValidationOptions,
} from "./types.js";
import { validateIncomingRequest } from "./validate.js";

// =============================================================================
// Rejections
// =============================================================================

export type RejectionStatus = 400 | 401 | 500;

export interface Rejection {
  readonly status: RejectionStatus;
  readonly kind: RejectionLogEntry["kind"];
  readonly message: string;
}

/**
 * Map a validation failure to the status and message sent to the client.
 */
export function toRejection(failure: ValidationFailure): Rejection {
  switch (failure.kind) {
    case "route":
      return { status: 400, kind: failure.kind, message: failure.message };
    case "security":
      return { status: 401, kind: failure.kind, message: failure.message };
    case "request":
      // Only the summary line reaches the client.
      return { status: 400, kind: failure.kind, message: firstLine(failure.message) };
    case "aggregate":
      return {
        status: 500,
        kind: failure.kind,
        message: `error validating route: ${failure.message}`,
      };
  }
}

function firstLine(message: string): string {
  return message.split("\n", 1)[0] ?? "";
}

function rejectionHeaders(
  contentType: ErrorResponseContentType,
): Record<string, string> {
  return {
    "Content-Type": contentTypeHeader(contentType),
    "X-Content-Type-Options": "nosniff",
  };
}

// =============================================================================
// Request Normalization
// =============================================================================

async function toOpenApiRequest(
  c: Context,
  readBody: boolean,
): Promise<OpenApiRequest> {
  const url = new URL(c.req.url);
  const query: Record<string, string | string[]> = {};
  for (const key of new Set(url.searchParams.keys())) {
    const values = url.searchParams.getAll(key);
    query[key] = values.length === 1 ? (values[0] ?? "") : values;
  }

  // Hono caches the body, so downstream handlers can read it again.
  const body = readBody ? await c.req.text() : "";

  return {
    method: c.req.method,
    path: c.req.path,
    headers: c.req.header(),
    query,
    body: body === "" ? undefined : body,
  };
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Create validation middleware with default options.
 *
 * @throws {SpecificationError} if the document cannot be loaded
 */
export function oapiRequestValidator(
  definition: Document | string,
): Promise<MiddlewareHandler> {
  return oapiRequestValidatorWithOptions(definition, {});
}

/**
 * Create validation middleware.
 *
 * The document is loaded once here; every request afterwards shares the
 * same router and validator.
 *
 * @throws {SpecificationError} if the document cannot be loaded
 */
export async function oapiRequestValidatorWithOptions(
  definition: Document | string,
  options: ValidationOptions = {},
): Promise<MiddlewareHandler> {
  const spec = await loadSpecification(definition, {
    apiRoot: options.apiRoot,
    allErrors: options.multiError,
  });
  const contentType =
    options.errorResponseContentType ?? ErrorResponseContentType.Plain;

  const report = (c: Context, rejection: Rejection): void => {
    options.onReject?.(
      {
        method: c.req.method,
        path: c.req.path,
        status: rejection.status,
        kind: rejection.kind,
        message: rejection.message,
      },
      c,
    );
  };

  return async (c, next) => {
    const request = await toOpenApiRequest(c, options.excludeRequestBody !== true);
    const outcome = await validateIncomingRequest(spec, request, options);

    if (!outcome.ok) {
      const rejection = toRejection(outcome.failure);
      report(c, rejection);
      return c.body(
        formatErrorBody(rejection.message, contentType),
        rejection.status,
        rejectionHeaders(contentType),
      );
    }

    await next();

    if (options.validateResponses !== true) {
      return;
    }

    const error = await validateResponse(
      spec.validator,
      outcome.input.route,
      c.res,
      options,
    );
    if (error !== undefined) {
      const rejection: Rejection = {
        status: 500,
        kind: error.kind,
        message: `response validation failed: ${firstLine(error.message)}`,
      };
      report(c, rejection);
      c.res = new Response(formatErrorBody(rejection.message, contentType), {
        status: rejection.status,
        headers: rejectionHeaders(contentType),
      });
    }
  };
}
