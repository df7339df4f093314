/**
 * Wallet-backed CryptoProvider built on libsodium.
 *
 * Envelope wire format (UTF-8 JSON):
 *
 *   { protected: b64url(JSON{ enc, typ, alg, recipients: [{ encrypted_key,
 *                                 header: { kid, sender?, iv? } }] }),
 *     iv, ciphertext, tag }
 *
 * A random content key encrypts the message (XChaCha20-Poly1305, with the
 * `protected` string as additional data). Authcrypt boxes the content key
 * from sender to each recipient and seals the sender verkey; Anoncrypt seals
 * the content key only.
 */

import { z } from "zod";

import {
  AgentError,
  MalformedWireBytesError,
  b64Decode,
  b64Encode,
  decodeVerkey,
  didFromVerifyKey,
  encodeVerkey,
  errorMessage,
  generateKeypair,
  signDetached,
  utf8Decode,
  utf8Encode,
  verifyDetached,
  type CryptoProvider,
  type LocalIdentity,
  type UnpackedEnvelope,
} from "../protocol/index.js";
import {
  AEAD_KEY_BYTES,
  AEAD_NONCE_BYTES,
  BOX_NONCE_BYTES,
  aeadDecrypt,
  aeadEncrypt,
  boxDecrypt,
  boxEncrypt,
  randomBytes,
  sealDecrypt,
  sealEncrypt,
} from "../protocol/crypto.js";
import type { Wallet } from "./wallet.js";

const ENC = "xchacha20poly1305_ietf";
const TYP = "JWM/1.0";

const RecipientSchema = z.object({
  encrypted_key: z.string().min(1),
  header: z.object({
    kid: z.string().min(1),
    sender: z.string().optional(),
    iv: z.string().optional(),
  }),
});

const ProtectedSchema = z.object({
  enc: z.literal(ENC),
  typ: z.string(),
  alg: z.enum(["Authcrypt", "Anoncrypt"]),
  recipients: z.array(RecipientSchema).min(1),
});

const EnvelopeSchema = z.object({
  protected: z.string().min(1),
  iv: z.string().min(1),
  ciphertext: z.string(),
  tag: z.string().min(1),
});

type Recipient = z.infer<typeof RecipientSchema>;

function parseJson(bytes: Uint8Array, what: string): unknown {
  try {
    return JSON.parse(utf8Decode(bytes));
  } catch (e) {
    throw new MalformedWireBytesError(`${what} is not JSON: ${errorMessage(e)}`);
  }
}

function requireVerkey(verkey: string): Uint8Array {
  const key = decodeVerkey(verkey);
  if (key === null) {
    throw new AgentError(`Malformed verkey '${verkey}'`);
  }
  return key;
}

export class SodiumCryptoProvider implements CryptoProvider {
  private readonly _wallet: Wallet;

  constructor(wallet: Wallet) {
    this._wallet = wallet;
  }

  async createKey(): Promise<string> {
    const kp = generateKeypair();
    const verkey = encodeVerkey(kp.verifyKey);
    this._wallet.storeKey(verkey, kp);
    return verkey;
  }

  async createLocalIdentity(): Promise<LocalIdentity> {
    const kp = generateKeypair();
    const verkey = encodeVerkey(kp.verifyKey);
    const did = didFromVerifyKey(kp.verifyKey);
    this._wallet.storeKey(verkey, kp);
    this._wallet.storeMyDid(did, verkey);
    return { did, verkey };
  }

  async sign(verkey: string, data: Uint8Array): Promise<Uint8Array> {
    const kp = this._wallet.getKeypair(verkey);
    if (kp === null) {
      throw new AgentError(`No signing key for '${verkey}' in wallet`);
    }
    return signDetached(data, kp.signingKey);
  }

  async verify(verkey: string, data: Uint8Array, signature: Uint8Array): Promise<boolean> {
    const key = decodeVerkey(verkey);
    if (key === null) return false;
    return verifyDetached(data, signature, key);
  }

  async packEnvelope(
    recipientVerkeys: readonly string[],
    senderVerkey: string | undefined,
    plaintext: string
  ): Promise<Uint8Array> {
    if (recipientVerkeys.length === 0) {
      throw new AgentError("Envelope needs at least one recipient");
    }
    const cek = randomBytes(AEAD_KEY_BYTES);

    let recipients: Recipient[];
    if (senderVerkey !== undefined) {
      const sender = this._wallet.getKeypair(senderVerkey);
      if (sender === null) {
        throw new AgentError(`No signing key for sender '${senderVerkey}' in wallet`);
      }
      recipients = recipientVerkeys.map((kid) => {
        const recipientKey = requireVerkey(kid);
        const nonce = randomBytes(BOX_NONCE_BYTES);
        return {
          encrypted_key: b64Encode(boxEncrypt(cek, nonce, sender.signingKey, recipientKey)),
          header: {
            kid,
            sender: b64Encode(sealEncrypt(utf8Encode(senderVerkey), recipientKey)),
            iv: b64Encode(nonce),
          },
        };
      });
    } else {
      recipients = recipientVerkeys.map((kid) => ({
        encrypted_key: b64Encode(sealEncrypt(cek, requireVerkey(kid))),
        header: { kid },
      }));
    }

    const protectedHeader = b64Encode(
      utf8Encode(
        JSON.stringify({
          enc: ENC,
          typ: TYP,
          alg: senderVerkey !== undefined ? "Authcrypt" : "Anoncrypt",
          recipients,
        })
      )
    );
    const iv = randomBytes(AEAD_NONCE_BYTES);
    const sealed = aeadEncrypt(utf8Encode(plaintext), protectedHeader, iv, cek);

    return utf8Encode(
      JSON.stringify({
        protected: protectedHeader,
        iv: b64Encode(iv),
        ciphertext: b64Encode(sealed.ciphertext),
        tag: b64Encode(sealed.tag),
      })
    );
  }

  /**
   * @throws {MalformedWireBytesError} If the bytes are not an envelope
   *   addressed to a key in this wallet, or fail to decrypt.
   */
  async unpackEnvelope(envelope: Uint8Array): Promise<UnpackedEnvelope> {
    const outer = EnvelopeSchema.safeParse(parseJson(envelope, "Envelope"));
    if (!outer.success) {
      throw new MalformedWireBytesError("Not an agent-wire envelope");
    }
    const header = ProtectedSchema.safeParse(
      parseJson(b64Decode(outer.data.protected), "Envelope header")
    );
    if (!header.success) {
      throw new MalformedWireBytesError("Envelope header is malformed");
    }

    const recipient = header.data.recipients.find((r) => this._wallet.hasKey(r.header.kid));
    if (recipient === undefined) {
      throw new MalformedWireBytesError("Envelope is not addressed to any key in this wallet");
    }
    const me = this._wallet.getKeypair(recipient.header.kid);
    if (me === null) {
      throw new MalformedWireBytesError("Recipient key cannot be opened");
    }

    try {
      let cek: Uint8Array;
      let senderVerkey: string | undefined;
      if (header.data.alg === "Authcrypt") {
        const { sender, iv } = recipient.header;
        if (sender === undefined || iv === undefined) {
          throw new MalformedWireBytesError("Authcrypt recipient without sender or iv");
        }
        senderVerkey = utf8Decode(sealDecrypt(b64Decode(sender), me));
        cek = boxDecrypt(
          b64Decode(recipient.encrypted_key),
          b64Decode(iv),
          me.signingKey,
          requireVerkey(senderVerkey)
        );
      } else {
        cek = sealDecrypt(b64Decode(recipient.encrypted_key), me);
      }

      const plaintext = aeadDecrypt(
        { ciphertext: b64Decode(outer.data.ciphertext), tag: b64Decode(outer.data.tag) },
        outer.data.protected,
        b64Decode(outer.data.iv),
        cek
      );
      return {
        message: utf8Decode(plaintext),
        recipientVerkey: recipient.header.kid,
        ...(senderVerkey !== undefined ? { senderVerkey } : {}),
      };
    } catch (e) {
      if (e instanceof MalformedWireBytesError) throw e;
      throw new MalformedWireBytesError(`Envelope failed to decrypt: ${errorMessage(e)}`);
    }
  }
}
