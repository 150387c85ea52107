import { MalformedResponse } from "./errors.js";
import { Model } from "./models.js";
import type { ModelKind } from "./models.js";
import { findChild, findChildren, findPath, textContent } from "./xml.js";
import type { XmlElement } from "./types.js";

/** A successful reply (code 0) from the API. */
export class Response {
  readonly tree: XmlElement;

  constructor(tree: XmlElement) {
    this.tree = tree;
  }

  get reply(): XmlElement {
    const reply = findReply(this.tree);

    if (!reply) {
      throw new MalformedResponse("The response has no <reply> element.");
    }

    return reply;
  }

  get code(): number {
    return readReplyCode(this.tree);
  }

  get description(): string {
    return textContent(findChild(this.reply, "desc"));
  }

  get data(): XmlElement | null {
    return findChild(this.reply, "data");
  }

  /** Total result count of a search reply, or `null` when absent. */
  get total(): number | null {
    const total = findChild(this.data, "total");

    if (!total) {
      return null;
    }

    const value = Number(total.text);
    return Number.isFinite(value) ? value : null;
  }

  /** Wraps `data`, or its `tag` child when given. */
  asModel<M extends Model>(kind: ModelKind<M>, tag?: string): M {
    const data = this.data;
    return new kind(tag ? findChild(data, tag) : data);
  }

  /** Wraps each `item` of a `data/results/array` listing. */
  asModels<M extends Model>(kind: ModelKind<M>): M[] {
    return findChildren(findPath(this.data, "results/array"), "item").map(
      (item) => new kind(item)
    );
  }

  toModel(): Model {
    return new Model(this.data);
  }
}

/** The `reply` element, which is the document root in bare replies. */
export function findReply(tree: XmlElement): XmlElement | null {
  return tree.name === "reply" ? tree : findChild(tree, "reply");
}

const REPLY_CODE_PATTERN = /^-?\d+$/;

export function readReplyCode(tree: XmlElement): number {
  const text = findChild(findReply(tree), "code")?.text.trim() ?? "";

  if (!REPLY_CODE_PATTERN.test(text)) {
    throw new MalformedResponse("The response has no numeric reply code.");
  }

  return Number(text);
}
