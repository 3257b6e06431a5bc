/**
 * Validation pipeline: route → security → request conformance.
 */

import type { Request as OpenApiRequest } from "openapi-backend";
import type { LoadedSpecification } from "./loader.js";
import { findRoute } from "./router.js";
import { validateRequest } from "./request.js";
import {
  resolveSecurityRequirements,
  validateSecurityRequirements,
} from "./security.js";
import type {
  RequestValidationInput,
  ValidationOptions,
  ValidationOutcome,
} from "./types.js";

export async function validateIncomingRequest(
  spec: LoadedSpecification,
  request: OpenApiRequest,
  options: ValidationOptions,
): Promise<ValidationOutcome> {
  const match = findRoute(spec.router, spec.document, request);
  if (match instanceof Error) {
    return { ok: false, failure: match };
  }

  const input: RequestValidationInput = {
    request,
    route: match.route,
    pathParams: match.pathParams,
    parsed: match.parsed,
  };

  // Multi-error mode folds security into the aggregate instead.
  const securityFirst = options.multiError !== true;
  if (securityFirst) {
    const requirements = resolveSecurityRequirements(input.route);
    if (requirements !== undefined) {
      const error = await validateSecurityRequirements(
        input,
        requirements,
        options.authenticate,
      );
      if (error !== undefined) {
        return { ok: false, failure: error };
      }
    }
  }

  const failure = await validateRequest(spec.validator, input, options, {
    securityValidated: securityFirst,
  });
  if (failure !== undefined) {
    return { ok: false, failure };
  }

  return { ok: true, input };
}
