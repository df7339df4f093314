/**
 * Secure envelope -- turns inbound wire bytes into a Message with context,
 * and outbound Messages into wire bytes.
 *
 * Inbound bytes are first tried as a plaintext message (local and
 * administrative traffic); anything else must be an authenticated-encryption
 * envelope the crypto provider can open.
 */

import { MalformedWireBytesError, errorMessage } from "./errors.js";
import { EMPTY_CONTEXT, type Message } from "./message.js";
import type { CryptoProvider, IdentityStore } from "./provider.js";
import { deserialize, serialize } from "./serializer.js";
import { err, ok, utf8Decode, type Result } from "./types.js";

/** Why inbound bytes could not be turned into a message. */
export interface UnpackFailure {
  readonly error: MalformedWireBytesError;
  /** First characters of the offending bytes, for diagnostics. */
  readonly excerpt: string;
}

const EXCERPT_LENGTH = 200;

/** Printable prefix of raw wire bytes for log lines. */
export function wireExcerpt(wire: Uint8Array | string): string {
  let text: string;
  if (typeof wire === "string") {
    text = wire;
  } else {
    text = Buffer.from(wire.subarray(0, EXCERPT_LENGTH * 4)).toString("utf-8");
  }
  return text.length > EXCERPT_LENGTH ? text.slice(0, EXCERPT_LENGTH) + "..." : text;
}

export class SecureEnvelope {
  private readonly _crypto: CryptoProvider;
  private readonly _identities: IdentityStore;

  constructor(crypto: CryptoProvider, identities: IdentityStore) {
    this._crypto = crypto;
    this._identities = identities;
  }

  /**
   * Unpack inbound wire bytes.
   *
   * Never throws: failures come back as an `UnpackFailure` so the caller can
   * log and drop the message.
   */
  async unpack(wire: Uint8Array | string): Promise<Result<Message, UnpackFailure>> {
    const bytes = typeof wire === "string" ? Buffer.from(wire, "utf-8") : wire;

    const plain = tryPlaintext(bytes);
    if (plain !== null) {
      return ok(plain.attachContext(EMPTY_CONTEXT));
    }

    try {
      const unpacked = await this._crypto.unpackEnvelope(bytes);
      const message = deserialize(unpacked.message);

      const fromKey = unpacked.senderVerkey ?? null;
      const fromDid = fromKey === null ? null : await this._identities.verkeyToDid(fromKey);
      const toDid = await this._identities.verkeyToDid(unpacked.recipientVerkey);

      message.attachContext({
        fromDid,
        toDid,
        fromKey,
        toKey: unpacked.recipientVerkey,
      });
      return ok(message);
    } catch (e) {
      return err({
        error:
          e instanceof MalformedWireBytesError
            ? e
            : new MalformedWireBytesError(`Failed to unpack message: ${errorMessage(e)}`),
        excerpt: wireExcerpt(bytes),
      });
    }
  }

  /**
   * Pack a message for the given recipients. Omitting `senderVerkey` produces
   * an anonymous envelope; providing it produces a sender-authenticated one.
   */
  async pack(
    message: Message,
    recipientVerkeys: readonly string[],
    senderVerkey?: string
  ): Promise<Uint8Array> {
    return this._crypto.packEnvelope(
      recipientVerkeys,
      senderVerkey,
      utf8Decode(serialize(message))
    );
  }
}

function tryPlaintext(bytes: Uint8Array): Message | null {
  try {
    return deserialize(bytes);
  } catch {
    return null;
  }
}
