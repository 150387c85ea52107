/**
 * Attribute-style wrappers over parsed API replies.
 *
 * A model resolves a field by checking the overrides passed to its
 * constructor, then a child element of the wrapped subtree, then an
 * attribute of it. Underscore names are looked up in the subtree as
 * camelCase, so `companyName` and `company_name` reach the same element.
 */

import { AttributeNotFound } from "./errors.js";
import { findChild, isLeaf, serializeCanonical, textContent } from "./xml.js";
import type { XmlElement } from "./types.js";

export type ModelValue = string | number | boolean | XmlElement | Model;

export type ModelKind<M extends Model> = new (
  element?: XmlElement | null,
  overrides?: Record<string, ModelValue>
) => M;

export function toCamelCase(name: string): string {
  if (!name.includes("_")) {
    return name;
  }

  const [head = "", ...rest] = name.split("_").filter(Boolean);
  return head + rest.map((part) => part[0].toUpperCase() + part.slice(1)).join("");
}

export class Model {
  protected readonly _element: XmlElement | null;
  protected readonly _overrides: Record<string, ModelValue>;

  constructor(
    element: XmlElement | null = null,
    overrides: Record<string, ModelValue> = {}
  ) {
    this._element = element;
    this._overrides = overrides;
  }

  get element(): XmlElement | null {
    return this._element;
  }

  lookup(name: string): ModelValue | undefined {
    if (Object.prototype.hasOwnProperty.call(this._overrides, name)) {
      return this._overrides[name];
    }

    if (!this._element) {
      return undefined;
    }

    const key = toCamelCase(name);
    const child = findChild(this._element, key);

    if (child) {
      return isLeaf(child) ? child.text : child;
    }

    if (Object.prototype.hasOwnProperty.call(this._element.attributes, key)) {
      return this._element.attributes[key];
    }

    return undefined;
  }

  get(name: string): ModelValue {
    const value = this.lookup(name);

    if (value === undefined) {
      throw new AttributeNotFound(name, this.keys());
    }

    return value;
  }

  has(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  /** String form of a field; throws like `get` when it is missing. */
  text(name: string): string {
    const value = this.get(name);

    if (value instanceof Model) {
      return value.toString();
    }

    if (typeof value === "object") {
      return textContent(value);
    }

    return String(value);
  }

  /** Override keys followed by the distinct child tags of the subtree. */
  keys(): string[] {
    const tags = this._element
      ? this._element.children.map((child) => child.name)
      : [];

    return [...new Set([...Object.keys(this._overrides), ...tags])];
  }

  submodel<M extends Model>(kind: ModelKind<M>, tag: string): M {
    return new kind(findChild(this._element, tag));
  }

  dump(): string {
    return this._element ? serializeCanonical(this._element) : "";
  }
}

// ========================================
// MODEL KINDS
// ========================================

/**
 * A person's name: `initials`, `firstName`, optional `prefix` (as in Dutch
 * "van de") and `lastName`.
 */
export class Name extends Model {
  toString(): string {
    const prefix = this.has("prefix") ? this.text("prefix") : "";

    return [this.text("firstName"), prefix, this.text("lastName")]
      .filter(Boolean)
      .join(" ");
  }
}

/** `name` without the extension, plus `extension`. */
export class Domain extends Model {
  toString(): string {
    return `${this.text("name")}.${this.text("extension")}`;
  }
}

/** `name` with an `ip` or an `ip6` address. */
export class Nameserver extends Model {}

/** DNS record: `type`, `name`, `value`, `prio` (MX only) and `ttl`. */
export class DnsRecord extends Model {}

/** One modification of a record: `date`, `was` and `is`. */
export class History extends Model {}

export class Address extends Model {}

/** `countryCode`, `areaCode` and `subscriberNumber`. */
export class Phone extends Model {
  toString(): string {
    return [
      this.text("countryCode"),
      this.text("areaCode"),
      this.text("subscriberNumber"),
    ].join(" ");
  }
}

export class Reseller extends Model {
  get address(): Address {
    return this.submodel(Address, "address");
  }

  get phone(): Phone {
    return this.submodel(Phone, "phone");
  }

  get fax(): Phone {
    return this.submodel(Phone, "fax");
  }
}

export class Customer extends Model {
  get name(): Name {
    return this.submodel(Name, "name");
  }

  get address(): Address {
    return this.submodel(Address, "address");
  }

  get phone(): Phone {
    return this.submodel(Phone, "phone");
  }

  get fax(): Phone {
    return this.submodel(Phone, "fax");
  }
}

export class SslProduct extends Model {}

export class SslOrder extends Model {}

/** A domain extension (TLD) with its transfer and pricing flags. */
export class Extension extends Model {}
