/**
 * Security requirement evaluation.
 *
 * Requirements are alternatives: one satisfied requirement is enough.
 * Within a requirement, every named scheme must pass.
 */

import type { OpenAPIV3 } from "openapi-types";
import { SecurityRequirementsError } from "./types.js";
import type {
  AuthenticationFunc,
  RequestValidationInput,
  Route,
} from "./types.js";

/**
 * Operation requirements win over global ones, including an explicit
 * empty list. Undefined means the document declares no security at all.
 */
export function resolveSecurityRequirements(
  route: Route,
): readonly OpenAPIV3.SecurityRequirementObject[] | undefined {
  return route.operation.security ?? route.spec.security;
}

export async function validateSecurityRequirements(
  input: RequestValidationInput,
  requirements: readonly OpenAPIV3.SecurityRequirementObject[],
  authenticate: AuthenticationFunc | undefined,
): Promise<SecurityRequirementsError | undefined> {
  if (requirements.length === 0) {
    return undefined;
  }

  const errors: Error[] = [];
  for (const requirement of requirements) {
    const error = await validateSecurityRequirement(
      input,
      requirement,
      authenticate,
    );
    if (error === undefined) {
      return undefined;
    }
    errors.push(error);
  }

  return new SecurityRequirementsError(requirements, errors);
}

async function validateSecurityRequirement(
  input: RequestValidationInput,
  requirement: OpenAPIV3.SecurityRequirementObject,
  authenticate: AuthenticationFunc | undefined,
): Promise<Error | undefined> {
  const schemes = input.route.spec.components?.securitySchemes ?? {};

  for (const [schemeName, scopes] of Object.entries(requirement)) {
    const scheme = schemes[schemeName];
    if (scheme === undefined || "$ref" in scheme) {
      return new Error(`security scheme "${schemeName}" is not declared`);
    }

    const credentialError = checkCredentialPresent(input, scheme);
    if (credentialError !== undefined) {
      return credentialError;
    }

    if (authenticate === undefined) {
      return new Error("missing authentication function");
    }

    try {
      await authenticate({ input, schemeName, scheme, scopes });
    } catch (err: unknown) {
      return err instanceof Error ? err : new Error(String(err));
    }
  }

  return undefined;
}

/** Only apiKey schemes name the place their credential lives. */
function checkCredentialPresent(
  input: RequestValidationInput,
  scheme: OpenAPIV3.SecuritySchemeObject,
): Error | undefined {
  if (scheme.type !== "apiKey") {
    return undefined;
  }

  const { parsed } = input;
  let present: boolean;
  switch (scheme.in) {
    case "header":
      present = parsed.headers[scheme.name.toLowerCase()] !== undefined;
      break;
    case "query":
      present = parsed.query[scheme.name] !== undefined;
      break;
    case "cookie":
      present = parsed.cookies[scheme.name] !== undefined;
      break;
    default:
      return new Error(`unsupported apiKey location "${scheme.in}"`);
  }

  if (!present) {
    return new Error(`${scheme.in} "${scheme.name}" is missing`);
  }
  return undefined;
}
