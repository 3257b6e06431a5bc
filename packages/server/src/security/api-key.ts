/**
 * API key authentication for the OpenAPI validator.
 *
 * Accepts an apiKey security scheme when the credential it names
 * is one of the configured keys. Other scheme types are refused.
 */

import type { AuthenticationFunc } from "@oapi-guard/validator";

export function createApiKeyAuthenticator(
  keys: ReadonlySet<string>,
): AuthenticationFunc {
  return ({ input, scheme, schemeName }) => {
    if (scheme.type !== "apiKey") {
      throw new Error(`scheme "${schemeName}" of type ${scheme.type} is not supported`);
    }

    const { headers, query, cookies } = input.parsed;
    const source =
      scheme.in === "header"
        ? headers[scheme.name.toLowerCase()]
        : scheme.in === "query"
          ? query[scheme.name]
          : cookies[scheme.name];
    const key = Array.isArray(source) ? source[0] : source;

    if (key === undefined || !keys.has(key)) {
      throw new Error("invalid api key");
    }
  };
}
