import { describe, expect, it } from "vitest";

import {
  ApiError,
  AuthenticationError,
  BadRequest,
  DomainNotAvailable,
  MaintenanceError,
  NoSuchElement,
  OpenProviderError,
  ServiceUnavailable,
  formatApiErrorMessage,
  normalizeError,
  resolveErrorKind,
} from "./errors.js";

describe("resolveErrorKind", () => {
  it("maps known codes to their kinds", () => {
    expect(resolveErrorKind(196)).toBe(AuthenticationError);
    expect(resolveErrorKind(320)).toBe(NoSuchElement);
    expect(resolveErrorKind(321)).toBe(NoSuchElement);
    expect(resolveErrorKind(346)).toBe(DomainNotAvailable);
  });

  it("maps code ranges when no exact entry exists", () => {
    expect(resolveErrorKind(300)).toBe(BadRequest);
    expect(resolveErrorKind(399)).toBe(BadRequest);
    expect(resolveErrorKind(4005)).toBe(MaintenanceError);
  });

  it("falls back to ApiError for any other number", () => {
    for (const code of [0, -1, 1, 299, 400, 3999, 5000, 1.5, Number.NaN]) {
      expect(resolveErrorKind(code)).toBe(ApiError);
    }
  });
});

describe("error kinds", () => {
  it("keep the hierarchy and carry reply details", () => {
    const error = new DomainNotAvailable("Domain not available (346) ", {
      code: 346,
      description: "Domain not available",
    });

    expect(error).toBeInstanceOf(BadRequest);
    expect(error).toBeInstanceOf(ApiError);
    expect(error).toBeInstanceOf(OpenProviderError);
    expect(error.name).toBe("DomainNotAvailable");
    expect(error.code).toBe(346);
    expect(error.description).toBe("Domain not available");
    expect(error.data).toBe("");
  });

  it("treats maintenance replies as unavailability", () => {
    expect(new MaintenanceError("down")).toBeInstanceOf(ServiceUnavailable);
  });
});

describe("formatApiErrorMessage", () => {
  it("keeps the trailing space when there is no data", () => {
    expect(formatApiErrorMessage("Domain not available", 346)).toBe(
      "Domain not available (346) "
    );
  });

  it("appends the data", () => {
    expect(formatApiErrorMessage("Invalid request", 399, "bad period")).toBe(
      "Invalid request (399) bad period"
    );
  });
});

describe("normalizeError", () => {
  it("keeps errors and wraps other values", () => {
    const original = new Error("boom");

    expect(normalizeError(original)).toBe(original);
    expect(normalizeError("socket hang up").message).toBe("socket hang up");
    expect(normalizeError(42).message).toBe("Unexpected error.");
  });
});
