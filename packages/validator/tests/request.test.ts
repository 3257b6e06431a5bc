/**
 * Tests for schema issue → RequestError conversion and rejection mapping.
 */

import { describe, it, expect } from "vitest";
import { toRequestError } from "../src/request.js";
import { toRejection } from "../src/middleware.js";
import {
  AggregateValidationError,
  RequestError,
  RouteError,
  SecurityRequirementsError,
} from "../src/types.js";

// =============================================================================
// toRequestError
// =============================================================================

describe("toRequestError", () => {
  it("names the parameter and its location", () => {
    const error = toRequestError({
      keyword: "type",
      instancePath: "/header/x-trace-id",
      schemaPath: "#/properties/header/properties/x-trace-id/type",
      params: { type: "integer" },
      message: "must be integer",
    });

    expect(error.location).toBe("header");
    expect(error.parameter).toBe("x-trace-id");
    expect(error.message).toBe(
      'parameter "x-trace-id" in header has an error: must be integer\n' +
        "Schema path: #/properties/header/properties/x-trace-id/type",
    );
  });

  it("names cookie parameters", () => {
    const error = toRequestError({
      keyword: "type",
      instancePath: "/cookie/session",
      schemaPath: "#/properties/cookie/properties/session/type",
      params: { type: "integer" },
      message: "must be integer",
    });

    expect(error.location).toBe("cookie");
    expect(error.parameter).toBe("session");
    expect(error.message.split("\n")[0]).toBe(
      'parameter "session" in cookie has an error: must be integer',
    );
  });

  it("reports a missing required header", () => {
    const error = toRequestError({
      keyword: "required",
      instancePath: "/header",
      schemaPath: "#/properties/header/required",
      params: { missingProperty: "x-trace-id" },
      message: "must have required property 'x-trace-id'",
    });

    expect(error.location).toBe("header");
    expect(error.message.split("\n")[0]).toBe(
      'parameter "x-trace-id" in header has an error: value is required but missing',
    );
  });

  it("reports a missing required parameter", () => {
    const error = toRequestError({
      keyword: "required",
      instancePath: "/query",
      schemaPath: "#/properties/query/required",
      params: { missingProperty: "limit" },
      message: "must have required property 'limit'",
    });

    expect(error.location).toBe("query");
    expect(error.parameter).toBe("limit");
    expect(error.message.split("\n")[0]).toBe(
      'parameter "limit" in query has an error: value is required but missing',
    );
  });

  it("reports an unknown query parameter", () => {
    const error = toRequestError({
      keyword: "additionalProperties",
      instancePath: "/query",
      schemaPath: "#/properties/query/additionalProperties",
      params: { additionalProperty: "sort" },
      message: "must NOT have additional properties",
    });

    expect(error.parameter).toBe("sort");
    expect(error.message.split("\n")[0]).toBe(
      'parameter "sort" in query has an error: must NOT have additional properties',
    );
  });

  it("points inside array parameters", () => {
    const error = toRequestError({
      keyword: "type",
      instancePath: "/query/ids/1",
      schemaPath: "#/properties/query/properties/ids/items/type",
      params: { type: "integer" },
      message: "must be integer",
    });

    expect(error.message.split("\n")[0]).toBe(
      'parameter "ids" in query has an error: Error at "/1": must be integer',
    );
  });

  it("reports a missing request body", () => {
    const error = toRequestError({
      keyword: "required",
      instancePath: "",
      schemaPath: "#/required",
      params: { missingProperty: "requestBody" },
      message: "must have required property 'requestBody'",
    });

    expect(error.location).toBe("body");
    expect(error.parameter).toBeUndefined();
    expect(error.message.split("\n")[0]).toBe(
      "request body has an error: value is required but missing",
    );
  });

  it("reports a body that could not be decoded", () => {
    const error = toRequestError({
      keyword: "parse",
      instancePath: "",
      schemaPath: "#/requestBody",
      params: {},
      message: "Unexpected end of JSON input",
    });

    expect(error.location).toBe("body");
    expect(error.message.split("\n")[0]).toBe(
      "request body has an error: failed to decode request body: Unexpected end of JSON input",
    );
  });

  it("points inside the body", () => {
    const error = toRequestError({
      keyword: "type",
      instancePath: "/requestBody/owner/name",
      schemaPath: "#/properties/requestBody/properties/owner/properties/name/type",
      params: { type: "string" },
      message: "must be string",
    });

    expect(error.message.split("\n")[0]).toBe(
      'request body has an error: doesn\'t match schema: Error at "/owner/name": must be string',
    );
  });

  it("falls back to the keyword without a message", () => {
    const error = toRequestError({
      keyword: "minimum",
      instancePath: "/path/id",
      schemaPath: "#/properties/path/properties/id/minimum",
      params: { comparison: ">=", limit: 1 },
    });

    expect(error.message.split("\n")[0]).toBe(
      'parameter "id" in path has an error: minimum',
    );
  });
});

// =============================================================================
// toRejection
// =============================================================================

describe("toRejection", () => {
  it("maps route errors to 400", () => {
    expect(toRejection(new RouteError("method-not-allowed"))).toEqual({
      status: 400,
      kind: "route",
      message: "method not allowed",
    });
  });

  it("maps request errors to 400 with the first line only", () => {
    const rejection = toRejection(
      new RequestError("path", "id", "first line\nsecond line\nthird line"),
    );
    expect(rejection).toEqual({ status: 400, kind: "request", message: "first line" });
  });

  it("maps security errors to 401", () => {
    const rejection = toRejection(
      new SecurityRequirementsError([{ ApiKeyAuth: [] }], [
        new Error("a"),
        new Error("b"),
      ]),
    );
    expect(rejection).toEqual({
      status: 401,
      kind: "security",
      message: "security requirements failed: a | b",
    });
  });

  it("maps aggregates to 500", () => {
    const rejection = toRejection(
      new AggregateValidationError([new Error("x"), new Error("y")]),
    );
    expect(rejection).toEqual({
      status: 500,
      kind: "aggregate",
      message: "error validating route: x | y",
    });
  });
});
