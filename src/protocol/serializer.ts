/**
 * Lossless Message <-> wire text conversion (UTF-8 JSON).
 */

import { MalformedMessageError, errorMessage } from "./errors.js";
import { Message } from "./message.js";
import { isJsonObject, utf8Decode, utf8Encode } from "./types.js";

/**
 * Serialize a message to UTF-8 JSON bytes. The context is not serialized.
 */
export function serialize(message: Message): Uint8Array {
  return utf8Encode(JSON.stringify(message.toJSON()));
}

/**
 * Parse wire text (or UTF-8 bytes) into a Message.
 *
 * @throws {MalformedMessageError} If the input is not UTF-8 JSON, not an
 *   object, or has no string `@type`.
 */
export function deserialize(wire: string | Uint8Array): Message {
  let parsed: unknown;
  try {
    const text = typeof wire === "string" ? wire : utf8Decode(wire);
    parsed = JSON.parse(text);
  } catch (e) {
    throw new MalformedMessageError(`Not a JSON message: ${errorMessage(e)}`);
  }
  if (!isJsonObject(parsed)) {
    throw new MalformedMessageError("Message must be a JSON object");
  }
  if (typeof parsed["@type"] !== "string") {
    throw new MalformedMessageError("Message has no string '@type'");
  }
  return new Message(parsed);
}
