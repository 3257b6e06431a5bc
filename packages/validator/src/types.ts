/**
 * @oapi-guard/validator: Shared types.
 *
 * Options, the per-request validation input, and the closed set of
 * validation failures returned by the validation pipeline.
 */

import type {
  Document,
  Operation,
  ParsedRequest,
  Request as OpenApiRequest,
} from "openapi-backend";
import type { Context } from "hono";
import type { OpenAPIV3 } from "openapi-types";

// =============================================================================
// Error Response Content Types
// =============================================================================

export const ErrorResponseContentType = {
  Plain: "text/plain",
  JSON: "application/json",
  XML: "application/xml",
} as const;

export type ErrorResponseContentType =
  (typeof ErrorResponseContentType)[keyof typeof ErrorResponseContentType];

// =============================================================================
// Route + Request Input
// =============================================================================

/** A document operation matched for an incoming request. */
export interface Route {
  readonly path: string;
  readonly method: string;
  readonly operation: Operation;
  readonly spec: Document;
}

/**
 * Everything one validation pass needs. Built per request, never shared.
 */
export interface RequestValidationInput {
  readonly request: OpenApiRequest;
  readonly route: Route;
  readonly pathParams: Readonly<Record<string, string>>;
  /** Query and cookies as the router parsed them. */
  readonly parsed: ParsedRequest;
}

// =============================================================================
// Authentication
// =============================================================================

export interface AuthenticationInput {
  readonly input: RequestValidationInput;
  readonly schemeName: string;
  readonly scheme: OpenAPIV3.SecuritySchemeObject;
  readonly scopes: readonly string[];
}

/**
 * Verifies one security scheme of a requirement.
 * Resolve to accept, throw (or reject) to refuse.
 */
export type AuthenticationFunc = (
  input: AuthenticationInput,
) => void | Promise<void>;

// =============================================================================
// Options
// =============================================================================

export interface RejectionLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly kind: ValidationFailure["kind"] | ResponseError["kind"];
  readonly message: string;
}

export interface ValidationOptions {
  /** Collect every violation instead of stopping at the first. */
  readonly multiError?: boolean | undefined;
  readonly authenticate?: AuthenticationFunc | undefined;
  readonly excludeRequestBody?: boolean | undefined;
  readonly excludeRequestQueryParams?: boolean | undefined;
  /** Only meaningful together with `validateResponses`. */
  readonly excludeResponseBody?: boolean | undefined;
  readonly validateResponses?: boolean | undefined;
  /** Fail response validation for status codes the operation does not declare. */
  readonly includeResponseStatus?: boolean | undefined;
  readonly errorResponseContentType?: ErrorResponseContentType | undefined;
  /** Base path stripped from request paths before route matching. */
  readonly apiRoot?: string | undefined;
  /** Called for every rejection, with the context of the rejected request. */
  readonly onReject?:
    | ((entry: RejectionLogEntry, c: Context) => void)
    | undefined;
}

// =============================================================================
// Errors
// =============================================================================

/** The OpenAPI document could not be loaded. Raised at construction. */
export class SpecificationError extends Error {
  public readonly kind = "specification" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SpecificationError";
  }
}

export type RouteErrorReason = "path-not-found" | "method-not-allowed";

export class RouteError extends Error {
  public readonly kind = "route" as const;
  public readonly reason: RouteErrorReason;

  constructor(reason: RouteErrorReason) {
    super(
      reason === "path-not-found"
        ? "no matching operation was found"
        : "method not allowed",
    );
    this.name = "RouteError";
    this.reason = reason;
  }
}

export type RequestErrorLocation =
  | "path"
  | "query"
  | "header"
  | "cookie"
  | "body"
  | "request";

/**
 * A request does not conform to its operation. The message is multi-line:
 * a summary first, details after.
 */
export class RequestError extends Error {
  public readonly kind = "request" as const;
  public readonly location: RequestErrorLocation;
  /** Parameter name; undefined unless the error names one. */
  public readonly parameter: string | undefined;

  constructor(
    location: RequestErrorLocation,
    parameter: string | undefined,
    message: string,
  ) {
    super(message);
    this.name = "RequestError";
    this.location = location;
    this.parameter = parameter;
  }
}

export class SecurityRequirementsError extends Error {
  public readonly kind = "security" as const;
  public readonly requirements: readonly OpenAPIV3.SecurityRequirementObject[];
  public readonly errors: readonly Error[];

  constructor(
    requirements: readonly OpenAPIV3.SecurityRequirementObject[],
    errors: readonly Error[],
  ) {
    super(
      `security requirements failed: ${errors.map((e) => e.message).join(" | ")}`,
    );
    this.name = "SecurityRequirementsError";
    this.requirements = requirements;
    this.errors = errors;
  }
}

/** Several collected failures, or a failure the validator did not classify. */
export class AggregateValidationError extends Error {
  public readonly kind = "aggregate" as const;
  public readonly errors: readonly Error[];

  constructor(errors: readonly Error[]) {
    super(errors.map((e) => e.message).join(" | "));
    this.name = "AggregateValidationError";
    this.errors = errors;
  }
}

export class ResponseError extends Error {
  public readonly kind = "response" as const;

  constructor(message: string) {
    super(message);
    this.name = "ResponseError";
  }
}

/** Every way request validation can fail. */
export type ValidationFailure =
  | RouteError
  | SecurityRequirementsError
  | RequestError
  | AggregateValidationError;

export type ValidationOutcome =
  | { readonly ok: true; readonly input: RequestValidationInput }
  | { readonly ok: false; readonly failure: ValidationFailure };
