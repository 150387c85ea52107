/**
 * OpenProvider client type definitions using Zod schemas
 */

import type { AxiosInstance, AxiosResponse } from "axios";
import { z } from "zod";

// ========================================
// Credential Schemas
// ========================================

export const CredentialsSchema = z.object({
  username: z.string({ required_error: "Username is required", invalid_type_error: "Username must be a string" })
    .min(1, { message: "Username is required" })
    .describe("OpenProvider account username"),
  password: z.string({ invalid_type_error: "Password must be a string" })
    .describe("Plain text account password")
    .optional(),
  passwordHash: z.string({ invalid_type_error: "Password hash must be a string" })
    .describe("Account password hash, used instead of the plain text password")
    .optional(),
});

export type Credentials = z.infer<typeof CredentialsSchema>;

// ========================================
// Configuration Schemas
// ========================================

export const ClientConfigOptionsSchema = z.object({
  url: z.string({ invalid_type_error: "URL must be a string" })
    .url({ message: "URL must be a valid URL" })
    .describe("API endpoint the envelopes are posted to")
    .optional(),
  timeout: z.number({ invalid_type_error: "Timeout must be a number" })
    .int({ message: "Timeout must be an integer" })
    .nonnegative({ message: "Timeout must be non-negative" })
    .describe("Request timeout in milliseconds, 0 disables it")
    .optional(),
  rejectUnauthorized: z.boolean({ invalid_type_error: "rejectUnauthorized must be a boolean" })
    .describe("Whether to reject unverified TLS certificates")
    .optional(),
  userAgent: z.string({ invalid_type_error: "User agent must be a string" })
    .min(1, { message: "User agent cannot be empty" })
    .describe("User-Agent header sent with every request")
    .optional(),
});

export type ClientConfigOptions = z.infer<typeof ClientConfigOptionsSchema>;

export const ClientOptionsSchema = CredentialsSchema.merge(ClientConfigOptionsSchema);

// ========================================
// XML Types
// ========================================

export interface XmlElement {
  name: string;
  attributes: Record<string, string>;
  text: string;
  children: XmlElement[];
}

export type XmlContent =
  | XmlElement
  | string
  | number
  | boolean
  | Record<string, string | number>
  | null
  | undefined
  | XmlContent[];

// ========================================
// Client Types (not schemas - hold functions and instances)
// ========================================

export type PreRequestHook = (payload: XmlElement, envelope: string) => void;

export type PostRequestHook = (
  response: AxiosResponse<string>,
  tree: XmlElement
) => void;

export interface RequestHooks {
  preRequest?: PreRequestHook;
  postRequest?: PostRequestHook;
}

export type ClientOptions = z.infer<typeof ClientOptionsSchema> & {
  hooks?: RequestHooks;
  http?: AxiosInstance;
};

export interface ErrorDetails {
  code?: number | null;
  description?: string;
  data?: string;
  cause?: unknown;
}

// ========================================
// Validation Helper
// ========================================

/**
 * Validates input against a Zod schema and returns a validation error if invalid
 */
export function validateSchema<T>(
  schema: z.ZodSchema<T>,
  data: unknown,
  errorPrefix: string = "Validation error"
): Error | null {
  const result = schema.safeParse(data);
  if (!result.success) {
    const messages = result.error.errors.map(
      (e) => `${e.path.join(".")}: ${e.message}`
    );
    return new Error(`${errorPrefix}: ${messages.join(", ")}`);
  }
  return null;
}
