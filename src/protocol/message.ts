/**
 * Message model -- an ordered, key-unique mapping carrying an `@type`
 * discriminator, plus the out-of-band context attached after unpacking.
 */

import { randomUUID } from "node:crypto";

import { MalformedMessageError } from "./errors.js";
import { BASE_DID, isJsonObject, type JsonObject, type JsonValue } from "./types.js";

/**
 * Sender/recipient hints populated by the secure envelope. Every field is
 * null on the plaintext path; `toKey` is set whenever an envelope was opened.
 */
export interface MessageContext {
  readonly fromDid: string | null;
  readonly toDid: string | null;
  readonly fromKey: string | null;
  readonly toKey: string | null;
}

export const EMPTY_CONTEXT: MessageContext = Object.freeze({
  fromDid: null,
  toDid: null,
  fromKey: null,
  toKey: null,
});

/** Parts of a `<base-did>;spec/<family>/<version>/<name>` type URI. */
export interface MessageTypeParts {
  readonly base: string;
  readonly familyName: string;
  readonly version: string;
  readonly name: string;
  /** `<base-did>;spec/<family>/<version>` */
  readonly family: string;
}

const TYPE_PATTERN = /^(.+);spec\/([^/]+)\/([^/]+)\/([^/]+)$/;

/**
 * Split a message type URI into its parts, or return null if it does not
 * have the family/version/name shape.
 */
export function parseMessageType(type: string): MessageTypeParts | null {
  const m = TYPE_PATTERN.exec(type);
  if (m === null) return null;
  const [, base, familyName, version, name] = m;
  return {
    base,
    familyName,
    version,
    name,
    family: `${base};spec/${familyName}/${version}`,
  };
}

/** Family identifier for a protocol family under the agent's base DID. */
export function familyIdentifier(familyName: string, version: string): string {
  return `${BASE_DID};spec/${familyName}/${version}`;
}

/** Full message type for a message name within a family. */
export function messageType(family: string, name: string): string {
  return `${family.replace(/\/+$/, "")}/${name}`;
}

export class Message {
  private readonly _fields: Map<string, JsonValue>;
  private _context: MessageContext | null = null;

  constructor(fields: JsonObject = {}) {
    this._fields = new Map(Object.entries(fields));
  }

  /**
   * Build a message of the given type; `@id` is generated unless supplied.
   */
  static create(type: string, fields: JsonObject = {}): Message {
    const msg = new Message({ "@type": type });
    msg.set("@id", typeof fields["@id"] === "string" ? fields["@id"] : randomUUID());
    for (const [k, v] of Object.entries(fields)) {
      if (k !== "@type" && k !== "@id") msg.set(k, v);
    }
    return msg;
  }

  /** The `@type` discriminator. */
  get type(): string {
    const t = this._fields.get("@type");
    if (typeof t !== "string") {
      throw new MalformedMessageError("Message has no string '@type'");
    }
    return t;
  }

  /** The `@id`, if present. */
  get id(): string | undefined {
    const id = this._fields.get("@id");
    return typeof id === "string" ? id : undefined;
  }

  /** Thread correlation: `~thread.thid` when present, else `@id`. */
  get threadId(): string | undefined {
    const thread = this._fields.get("~thread");
    if (isJsonObject(thread) && typeof thread["thid"] === "string") {
      return thread["thid"];
    }
    return this.id;
  }

  /** Context attached by the secure envelope; null before unpacking. */
  get context(): MessageContext | null {
    return this._context;
  }

  attachContext(context: MessageContext): this {
    this._context = Object.freeze({ ...context });
    return this;
  }

  get size(): number {
    return this._fields.size;
  }

  has(key: string): boolean {
    return this._fields.has(key);
  }

  get(key: string): JsonValue | undefined {
    return this._fields.get(key);
  }

  /** Nested object at `key`, or undefined when absent or not an object. */
  getObject(key: string): JsonObject | undefined {
    const v = this._fields.get(key);
    return isJsonObject(v) ? v : undefined;
  }

  getString(key: string): string | undefined {
    const v = this._fields.get(key);
    return typeof v === "string" ? v : undefined;
  }

  set(key: string, value: JsonValue): this {
    this._fields.set(key, value);
    return this;
  }

  delete(key: string): boolean {
    return this._fields.delete(key);
  }

  keys(): string[] {
    return [...this._fields.keys()];
  }

  entries(): Array<[string, JsonValue]> {
    return [...this._fields.entries()];
  }

  /** Field-for-field copy; the context is not carried over. */
  clone(): Message {
    return new Message(structuredClone(this.toJSON()));
  }

  toJSON(): JsonObject {
    const out: JsonObject = {};
    for (const [k, v] of this._fields) {
      out[k] = v;
    }
    return out;
  }
}

