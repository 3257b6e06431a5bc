/**
 * Specification loading.
 *
 * Builds the router and validator once from an OpenAPI document.
 * Failures surface as a rejected promise so the host decides
 * whether to abort startup.
 */

import {
  OpenAPIBackend,
  type Document,
  type OpenAPIRouter,
  type OpenAPIValidator,
} from "openapi-backend";
import { SpecificationError } from "./types.js";

export interface LoadedSpecification {
  readonly document: Document;
  readonly router: OpenAPIRouter;
  readonly validator: OpenAPIValidator;
}

export interface LoadOptions {
  readonly apiRoot?: string | undefined;
  /** Collect every schema violation of a validator run. */
  readonly allErrors?: boolean | undefined;
}

/**
 * Load, validate and dereference an OpenAPI document.
 *
 * @param definition - Document object or path to a JSON/YAML file
 * @throws {SpecificationError} if the document is invalid
 */
export async function loadSpecification(
  definition: Document | string,
  options: LoadOptions = {},
): Promise<LoadedSpecification> {
  const api = new OpenAPIBackend({
    definition,
    apiRoot: options.apiRoot ?? "/",
    strict: true,
    quick: false,
    validate: true,
    ajvOpts: { allErrors: options.allErrors === true },
  });

  try {
    await api.init();
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SpecificationError(`invalid OpenAPI document: ${reason}`, {
      cause: err,
    });
  }

  // Compiled validators are keyed by operationId.
  const missing = api.router
    .getOperations()
    .filter((op) => op.operationId === undefined || op.operationId === "")
    .map((op) => `${op.method.toUpperCase()} ${op.path}`);
  if (missing.length > 0) {
    throw new SpecificationError(
      `operations without operationId: ${missing.join(", ")}`,
    );
  }

  return {
    document: api.definition,
    router: api.router,
    validator: api.validator,
  };
}
