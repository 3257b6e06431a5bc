/**
 * Response conformance.
 *
 * Checks a handler's response against the operation it served:
 * the status code must be declared (when includeResponseStatus is set)
 * and a JSON body must match the response schema (unless excludeResponseBody).
 */

import type { OpenAPIValidator } from "openapi-backend";
import { ResponseError } from "./types.js";
import type { Route, ValidationOptions } from "./types.js";

export async function validateResponse(
  validator: OpenAPIValidator,
  route: Route,
  response: Response,
  options: ValidationOptions,
): Promise<ResponseError | undefined> {
  const status = response.status;

  if (!isStatusDeclared(route, status)) {
    return options.includeResponseStatus === true
      ? new ResponseError(
          `status ${status} is not declared for ${route.method.toUpperCase()} ${route.path}`,
        )
      : undefined;
  }

  if (options.excludeResponseBody === true) {
    return undefined;
  }

  const contentType = response.headers.get("Content-Type") ?? "";
  if (!contentType.includes("json")) {
    return undefined;
  }

  const text = await response.clone().text();
  if (text === "") {
    return undefined;
  }

  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    return new ResponseError(`response body is not valid JSON: ${reason}`);
  }

  const result = validator.validateResponse(body, route.operation, status);
  const issue = result.errors?.[0];
  if (result.valid || issue === undefined) {
    return undefined;
  }

  const message = issue.message ?? issue.keyword;
  const summary =
    issue.instancePath === ""
      ? `response body doesn't match schema: ${message}`
      : `response body doesn't match schema: Error at "${issue.instancePath}": ${message}`;
  return new ResponseError(`${summary}\nSchema path: ${issue.schemaPath}`);
}

function isStatusDeclared(route: Route, status: number): boolean {
  const responses = route.operation.responses ?? {};
  return (
    String(status) in responses ||
    `${Math.floor(status / 100)}XX` in responses ||
    "default" in responses
  );
}
