import { XMLValidator } from "fast-xml-parser";
import { parseStringPromise } from "xml2js";

import { ConfigurationError, MalformedResponse, normalizeError } from "./errors.js";
import { CredentialsSchema, validateSchema } from "./types.js";
import type { Credentials, XmlContent, XmlElement } from "./types.js";

const ENVELOPE_ROOT = "openXML";

// Keys xml2js uses for the node name, attributes, text and ordered children.
const NAME_KEY = "#name";
const ATTR_KEY = "$";
const CHAR_KEY = "_";
const CHILD_KEY = "$$";

// ========================================
// BUILDERS
// ========================================

/**
 * Builds an element. Strings, numbers and booleans become text, plain
 * objects become attributes, elements become children in order and
 * `null`/`undefined` are skipped.
 */
export function createElement(name: string, ...content: XmlContent[]): XmlElement {
  const element: XmlElement = { name, attributes: {}, text: "", children: [] };

  for (const item of content) {
    appendContent(element, item);
  }

  return element;
}

/**
 * Element holding `value`, or `null` when the value is empty so that the
 * element is left out of its parent.
 */
export function optionalElement(
  name: string,
  value: string | number | null | undefined
): XmlElement | null {
  if (value === undefined || value === null || value === "") {
    return null;
  }

  return createElement(name, value);
}

function appendContent(element: XmlElement, item: XmlContent): void {
  if (item === undefined || item === null) {
    return;
  }

  if (Array.isArray(item)) {
    item.forEach((nested) => appendContent(element, nested));
    return;
  }

  if (typeof item === "string" || typeof item === "number" || typeof item === "boolean") {
    element.text += String(item);
    return;
  }

  if (isXmlElement(item)) {
    element.children.push(item);
    return;
  }

  for (const [key, value] of Object.entries(item)) {
    element.attributes[key] = String(value);
  }
}

function isXmlElement(value: object): value is XmlElement {
  return (
    "name" in value &&
    "children" in value &&
    "attributes" in value &&
    Array.isArray(value.children)
  );
}

// ========================================
// CANONICAL SERIALIZATION
// ========================================

export function serializeCanonical(element: XmlElement): string {
  const attributes = Object.keys(element.attributes)
    .sort(compareAttributeNames)
    .map((key) => ` ${key}="${escapeAttribute(element.attributes[key])}"`)
    .join("");

  const children = element.children.map(serializeCanonical).join("");

  return `<${element.name}${attributes}>${escapeText(element.text)}${children}</${element.name}>`;
}

// Namespace declarations sort ahead of ordinary attributes.
function compareAttributeNames(a: string, b: string): number {
  const aIsNs = a === "xmlns" || a.startsWith("xmlns:");
  const bIsNs = b === "xmlns" || b.startsWith("xmlns:");

  if (aIsNs !== bIsNs) {
    return aIsNs ? -1 : 1;
  }

  if (a === b) {
    return 0;
  }

  return a < b ? -1 : 1;
}

export function escapeText(value: string | number | boolean | null | undefined): string {
  if (value === undefined || value === null) {
    return "";
  }

  return String(value)
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/\r/g, "&#xD;");
}

export function escapeAttribute(value: string | number | boolean | null | undefined): string {
  if (value === undefined || value === null) {
    return "";
  }

  return String(value)
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/"/g, "&quot;")
    .replace(/\t/g, "&#x9;")
    .replace(/\n/g, "&#xA;")
    .replace(/\r/g, "&#xD;");
}

// ========================================
// ENVELOPE
// ========================================

export function validateCredentials(credentials: Credentials): Error | null {
  const validationError = validateSchema(
    CredentialsSchema,
    credentials,
    "Credential validation failed"
  );

  if (validationError) {
    return validationError;
  }

  if (Boolean(credentials.password) === Boolean(credentials.passwordHash)) {
    return new Error("Provide either a password or a password hash.");
  }

  return null;
}

export function buildEnvelope(credentials: Credentials, payload: XmlElement): XmlElement {
  const validationError = validateCredentials(credentials);

  if (validationError) {
    throw new ConfigurationError(validationError.message);
  }

  return createElement(
    ENVELOPE_ROOT,
    createElement(
      "credentials",
      createElement("username", credentials.username),
      optionalElement("password", credentials.password),
      optionalElement("hash", credentials.passwordHash)
    ),
    payload
  );
}

export function renderEnvelope(credentials: Credentials, payload: XmlElement): string {
  return serializeCanonical(buildEnvelope(credentials, payload));
}

// ========================================
// PARSING
// ========================================

export async function parseXml(input: string | Uint8Array): Promise<XmlElement> {
  const xml =
    typeof input === "string" ? input : Buffer.from(input).toString("utf8");

  if (xml.trim() === "") {
    throw new MalformedResponse("Failed to parse XML: the document is empty.");
  }

  // xml2js stops at the end of the first root element, so the whole
  // document is checked first.
  const validation = XMLValidator.validate(xml);

  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new MalformedResponse(
      `Failed to parse XML: ${msg} (line ${line}, column ${col})`
    );
  }

  let parsed: unknown;

  try {
    parsed = await parseStringPromise(xml, {
      explicitRoot: true,
      explicitCharkey: true,
      explicitChildren: true,
      preserveChildrenOrder: true,
      trim: false,
      normalize: false,
    });
  } catch (error) {
    throw new MalformedResponse(
      `Failed to parse XML: ${normalizeError(error).message}`,
      { cause: error }
    );
  }

  if (!isRecord(parsed)) {
    throw new MalformedResponse("Failed to parse XML: the document is empty.");
  }

  const root = Object.entries(parsed)[0];

  if (!root) {
    throw new MalformedResponse("Failed to parse XML: no root element found.");
  }

  return toXmlElement(root[1], root[0]);
}

export async function parseResponse(input: string | Uint8Array): Promise<XmlElement> {
  return parseXml(input);
}

function toXmlElement(node: unknown, fallbackName: string): XmlElement {
  if (!isRecord(node)) {
    // xml2js collapses an empty root element to a string.
    return createElement(
      fallbackName,
      typeof node === "string" && node.trim() !== "" ? node : ""
    );
  }

  const nameValue = node[NAME_KEY];
  const name = typeof nameValue === "string" ? nameValue : fallbackName;

  const attributes: Record<string, string> = {};
  const rawAttributes = node[ATTR_KEY];

  if (isRecord(rawAttributes)) {
    for (const [key, value] of Object.entries(rawAttributes)) {
      attributes[key] = String(value);
    }
  }

  const textValue = node[CHAR_KEY];
  const rawChildren = node[CHILD_KEY];
  const children = Array.isArray(rawChildren)
    ? rawChildren.map((child: unknown) => toXmlElement(child, ""))
    : [];

  return {
    name,
    attributes,
    text: typeof textValue === "string" && textValue.trim() !== "" ? textValue : "",
    children,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ========================================
// TREE HELPERS
// ========================================

export function findChild(
  element: XmlElement | null | undefined,
  name: string
): XmlElement | null {
  return element?.children.find((child) => child.name === name) ?? null;
}

export function findChildren(
  element: XmlElement | null | undefined,
  name: string
): XmlElement[] {
  return element ? element.children.filter((child) => child.name === name) : [];
}

/** Follows a `/`-separated path of child names from `element`. */
export function findPath(
  element: XmlElement | null | undefined,
  path: string
): XmlElement | null {
  let current: XmlElement | null = element ?? null;

  for (const segment of path.split("/").filter(Boolean)) {
    current = findChild(current, segment);
  }

  return current;
}

export function isLeaf(element: XmlElement): boolean {
  return (
    element.children.length === 0 &&
    Object.keys(element.attributes).length === 0
  );
}

export function textContent(element: XmlElement | null | undefined): string {
  if (!element) {
    return "";
  }

  return [element.text, ...element.children.map(textContent)]
    .filter(Boolean)
    .join(" ");
}
