/**
 * @oapi-guard/validator: OpenAPI request validation middleware for Hono.
 *
 * @packageDocumentation
 */

// Middleware
export {
  oapiRequestValidator,
  oapiRequestValidatorWithOptions,
  toRejection,
} from "./middleware.js";
export type { Rejection, RejectionStatus } from "./middleware.js";

// Pipeline pieces
export { loadSpecification } from "./loader.js";
export type { LoadedSpecification, LoadOptions } from "./loader.js";
export { findRoute } from "./router.js";
export type { RouteMatch } from "./router.js";
export {
  resolveSecurityRequirements,
  validateSecurityRequirements,
} from "./security.js";
export { validateRequest, toRequestError } from "./request.js";
export type {
  RequestValidationFailure,
  RequestValidationFlags,
} from "./request.js";
export { validateResponse } from "./response.js";
export { validateIncomingRequest } from "./validate.js";
export { formatErrorBody, contentTypeHeader, escapeXml } from "./error-body.js";

// Types + errors
export {
  ErrorResponseContentType,
  SpecificationError,
  RouteError,
  RequestError,
  SecurityRequirementsError,
  AggregateValidationError,
  ResponseError,
} from "./types.js";
export type {
  Route,
  RequestValidationInput,
  AuthenticationInput,
  AuthenticationFunc,
  RejectionLogEntry,
  ValidationOptions,
  RouteErrorReason,
  RequestErrorLocation,
  ValidationFailure,
  ValidationOutcome,
} from "./types.js";
export type { Document } from "openapi-backend";
