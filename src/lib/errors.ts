import type { ErrorDetails } from "./types.js";

export class OpenProviderError extends Error {
  readonly code: number | null;
  readonly description: string;
  readonly data: string;

  constructor(message: string, { code = null, description, data = "", cause }: ErrorDetails = {}) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "OpenProviderError";
    this.code = code;
    this.description = description ?? message;
    this.data = data;
  }
}

/** Invalid credentials or missing configuration, raised before any request is made. */
export class ConfigurationError extends OpenProviderError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, details);
    this.name = "ConfigurationError";
  }
}

/**
 * The HTTP exchange failed: refused connection, DNS failure, timeout or a
 * non-2xx status. Also used for reply codes that signal API downtime.
 */
export class ServiceUnavailable extends OpenProviderError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, details);
    this.name = "ServiceUnavailable";
  }
}

export class MalformedResponse extends OpenProviderError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, details);
    this.name = "MalformedResponse";
  }
}

export class AttributeNotFound extends OpenProviderError {
  readonly attribute: string;
  readonly candidates: string[];

  constructor(attribute: string, candidates: string[]) {
    super(
      candidates.length > 0
        ? `Model has no attribute '${attribute}' (tried '${candidates.join("', '")}')`
        : `Model has no attribute '${attribute}' (the model is empty)`
    );
    this.name = "AttributeNotFound";
    this.attribute = attribute;
    this.candidates = candidates;
  }
}

// ========================================
// API ERRORS (non-zero reply codes)
// ========================================

export class ApiError extends OpenProviderError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, details);
    this.name = "ApiError";
  }
}

export class AuthenticationError extends ApiError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, details);
    this.name = "AuthenticationError";
  }
}

export class BadRequest extends ApiError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, details);
    this.name = "BadRequest";
  }
}

export class NoSuchElement extends ApiError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, details);
    this.name = "NoSuchElement";
  }
}

export class DomainNotAvailable extends BadRequest {
  constructor(message: string, details?: ErrorDetails) {
    super(message, details);
    this.name = "DomainNotAvailable";
  }
}

export class MaintenanceError extends ServiceUnavailable {
  constructor(message: string, details?: ErrorDetails) {
    super(message, details);
    this.name = "MaintenanceError";
  }
}

export type ErrorKind = new (message: string, details?: ErrorDetails) => OpenProviderError;

interface CodeRange {
  from: number;
  to: number;
  kind: ErrorKind;
}

// Exact codes are checked before ranges.
const EXACT_CODES: ReadonlyMap<number, ErrorKind> = new Map<number, ErrorKind>([
  [196, AuthenticationError],
  [320, NoSuchElement],
  [321, NoSuchElement],
  [346, DomainNotAvailable],
]);

const CODE_RANGES: readonly CodeRange[] = Object.freeze([
  { from: 300, to: 399, kind: BadRequest },
  { from: 4000, to: 4999, kind: MaintenanceError },
]);

export function resolveErrorKind(code: number): ErrorKind {
  const exact = EXACT_CODES.get(code);

  if (exact) {
    return exact;
  }

  const range = CODE_RANGES.find((r) => code >= r.from && code <= r.to);
  return range ? range.kind : ApiError;
}

export function formatApiErrorMessage(
  description: string,
  code: number,
  data: string = ""
): string {
  return `${description} (${code}) ${data}`;
}

export function normalizeError(
  value: unknown,
  fallbackMessage: string = "Unexpected error."
): Error {
  if (value instanceof Error) {
    return value;
  }

  const message =
    typeof value === "string" && value.length > 0 ? value : fallbackMessage;

  return new OpenProviderError(message, { cause: value });
}
