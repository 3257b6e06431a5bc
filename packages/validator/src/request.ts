/**
 * Request conformance.
 *
 * Runs the OpenAPI validator for a matched route and turns its schema
 * issues into RequestErrors. Checks run in order: parameters, security,
 * body. The first failure wins unless multiError is set.
 */

import type { OpenAPIValidator, ValidationResult } from "openapi-backend";
import {
  AggregateValidationError,
  RequestError,
  SecurityRequirementsError,
} from "./types.js";
import type {
  RequestErrorLocation,
  RequestValidationInput,
  ValidationOptions,
} from "./types.js";
import {
  resolveSecurityRequirements,
  validateSecurityRequirements,
} from "./security.js";

type Issue = NonNullable<ValidationResult["errors"]>[number];

/** Validator sections, keyed as the validator names them. */
const PARAMETER_SECTIONS: Readonly<Record<string, RequestErrorLocation>> = {
  path: "path",
  query: "query",
  header: "header",
  cookie: "cookie",
};

const BODY_PREFIX = "/requestBody";

export type RequestValidationFailure =
  | RequestError
  | SecurityRequirementsError
  | AggregateValidationError;

export interface RequestValidationFlags {
  /** Security already passed for this request; skip it here. */
  readonly securityValidated?: boolean | undefined;
}

export async function validateRequest(
  validator: OpenAPIValidator,
  input: RequestValidationInput,
  options: ValidationOptions,
  flags: RequestValidationFlags = {},
): Promise<RequestValidationFailure | undefined> {
  const multiError = options.multiError === true;

  let issues: readonly Issue[];
  try {
    issues = validator.validateRequest(input.request, input.route.operation)
      .errors ?? [];
  } catch (err: unknown) {
    return new AggregateValidationError([
      err instanceof Error ? err : new Error(String(err)),
    ]);
  }

  const errors = issues
    .map(toRequestError)
    .filter((error) => !isExcluded(error, options));

  const collected: Error[] = [];

  for (const error of errors) {
    if (error.location === "body") continue;
    if (!multiError) return error;
    collected.push(error);
  }

  if (flags.securityValidated !== true) {
    const requirements = resolveSecurityRequirements(input.route);
    if (requirements !== undefined) {
      const error = await validateSecurityRequirements(
        input,
        requirements,
        options.authenticate,
      );
      if (error !== undefined) {
        if (!multiError) return error;
        collected.push(error);
      }
    }
  }

  for (const error of errors) {
    if (error.location !== "body") continue;
    if (!multiError) return error;
    collected.push(error);
  }

  return collected.length > 0
    ? new AggregateValidationError(collected)
    : undefined;
}

function isExcluded(error: RequestError, options: ValidationOptions): boolean {
  return (
    (error.location === "body" && options.excludeRequestBody === true) ||
    (error.location === "query" && options.excludeRequestQueryParams === true)
  );
}

// =============================================================================
// Issue → RequestError
// =============================================================================

export function toRequestError(issue: Issue): RequestError {
  const message = issue.message ?? issue.keyword;
  const detail = `Schema path: ${issue.schemaPath}`;

  if (isBodyIssue(issue)) {
    return new RequestError(
      "body",
      undefined,
      `request body has an error: ${describeBodyIssue(issue, message)}\n${detail}`,
    );
  }

  const [, section = "", rawName, ...rest] = issue.instancePath.split("/");
  const location = PARAMETER_SECTIONS[section];
  if (location === undefined) {
    return new RequestError(
      "request",
      undefined,
      `request has an error: ${message}\n${detail}`,
    );
  }

  let name = rawName === undefined ? undefined : unescapePointer(rawName);
  let summary = message;

  if (name === undefined) {
    if (issue.keyword === "required") {
      name = stringParam(issue, "missingProperty");
      summary = "value is required but missing";
    } else if (issue.keyword === "additionalProperties") {
      name = stringParam(issue, "additionalProperty");
    }
  } else if (rest.length > 0) {
    summary = `Error at "/${rest.join("/")}": ${message}`;
  }

  if (name === undefined) {
    return new RequestError(
      location,
      undefined,
      `${location} parameters have an error: ${summary}\n${detail}`,
    );
  }

  return new RequestError(
    location,
    name,
    `parameter "${name}" in ${location} has an error: ${summary}\n${detail}`,
  );
}

function isBodyIssue(issue: Issue): boolean {
  return (
    issue.schemaPath.startsWith("#/requestBody") ||
    issue.instancePath === BODY_PREFIX ||
    issue.instancePath.startsWith(`${BODY_PREFIX}/`) ||
    (issue.instancePath === "" &&
      stringParam(issue, "missingProperty") === "requestBody")
  );
}

function describeBodyIssue(issue: Issue, message: string): string {
  if (issue.keyword === "parse") {
    return `failed to decode request body: ${message}`;
  }
  if (!issue.instancePath.startsWith(BODY_PREFIX)) {
    return "value is required but missing";
  }

  const pointer = issue.instancePath.slice(BODY_PREFIX.length);
  return pointer === ""
    ? `doesn't match schema: ${message}`
    : `doesn't match schema: Error at "${pointer}": ${message}`;
}

function stringParam(issue: Issue, key: string): string | undefined {
  const params: Record<string, unknown> = issue.params;
  const value = params[key];
  return typeof value === "string" ? value : undefined;
}

function unescapePointer(segment: string): string {
  return segment.replace(/~1/g, "/").replace(/~0/g, "~");
}
