/**
 * Route resolution.
 *
 * Thin adapter over OpenAPIRouter: resolves a request to its operation
 * and extracts path parameters.
 */

import type {
  Document,
  OpenAPIRouter,
  ParsedRequest,
  Request as OpenApiRequest,
} from "openapi-backend";
import { RequestError, RouteError } from "./types.js";
import type { Route } from "./types.js";

const METHODS = [
  "get",
  "put",
  "post",
  "delete",
  "options",
  "head",
  "patch",
  "trace",
] as const;

export interface RouteMatch {
  readonly route: Route;
  readonly pathParams: Readonly<Record<string, string>>;
  readonly parsed: ParsedRequest;
}

/**
 * Find the operation serving a request.
 *
 * Returns a RouteError when no operation matches; the reason tells
 * an unknown path apart from a known path under another method.
 * A path parameter that does not percent-decode is a RequestError.
 */
export function findRoute(
  router: OpenAPIRouter,
  document: Document,
  request: OpenApiRequest,
): RouteMatch | RouteError | RequestError {
  const operation = router.matchOperation(request);

  if (operation === undefined) {
    const method = request.method.toLowerCase();
    const pathExists = METHODS.some(
      (other) =>
        other !== method &&
        router.matchOperation({ ...request, method: other }) !== undefined,
    );
    return new RouteError(pathExists ? "method-not-allowed" : "path-not-found");
  }

  let parsed: ParsedRequest;
  try {
    parsed = router.parseRequest(request, operation);
  } catch (err: unknown) {
    if (err instanceof URIError) {
      return malformedPathError(request.path, operation.path, err);
    }
    throw err;
  }

  const pathParams: Record<string, string> = {};
  for (const [name, value] of Object.entries(parsed.params)) {
    if (typeof value === "string") {
      pathParams[name] = value;
    }
  }

  return {
    route: {
      path: operation.path,
      method: operation.method,
      operation,
      spec: document,
    },
    pathParams,
    parsed,
  };
}

function malformedPathError(
  requestPath: string,
  template: string,
  err: URIError,
): RequestError {
  const actual = (requestPath.split("?", 1)[0] ?? "").split("/");
  const expected = template.split("/");
  // Align from the end; the request path may still carry the API root.
  const offset = actual.length - expected.length;

  for (const [index, segment] of expected.entries()) {
    const name = /^\{(.+)\}$/.exec(segment)?.[1];
    const value = actual[index + offset];
    if (name === undefined || value === undefined || decodes(value)) {
      continue;
    }
    return new RequestError(
      "path",
      name,
      `parameter "${name}" in path has an error: ${err.message}`,
    );
  }

  return new RequestError(
    "path",
    undefined,
    `path parameters have an error: ${err.message}`,
  );
}

function decodes(segment: string): boolean {
  try {
    decodeURIComponent(segment);
    return true;
  } catch {
    return false;
  }
}
