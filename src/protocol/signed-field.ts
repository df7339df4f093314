/**
 * Signed-field protocol: a detached, timestamped signature over an arbitrary
 * sub-document of a message (e.g. `connection~sig`).
 *
 *   sig_data  = b64url(uint64be(unix seconds) || utf8(canonical JSON(payload)))
 *   signature = b64url(sign(signer, raw sig_data bytes))
 */

import { canonicalJson } from "./crypto.js";
import { MalformedSignedFieldError, errorMessage } from "./errors.js";
import type { CryptoProvider } from "./provider.js";
import {
  SIGNATURE_TYPE,
  b64Decode,
  b64Encode,
  err,
  isJsonObject,
  ok,
  utf8Decode,
  utf8Encode,
  type JsonObject,
  type JsonValue,
  type Result,
} from "./types.js";

const TIMESTAMP_BYTES = 8;

export interface SignedField {
  readonly "@type": string;
  readonly signer: string;
  readonly sig_data: string;
  readonly signature: string;
}

export interface VerifiedField {
  readonly payload: JsonValue;
  /** False is a normal outcome; the caller decides whether to reject. */
  readonly verified: boolean;
  /** Unix seconds embedded by the signer. Not checked here. */
  readonly timestamp: number;
  readonly signer: string;
}

/**
 * Sign `payload` with the key behind `signerVerkey`.
 *
 * Reads the wall clock unless `nowMs` is given.
 */
export async function signField(
  crypto: CryptoProvider,
  payload: JsonValue,
  signerVerkey: string,
  nowMs: number = Date.now()
): Promise<SignedField> {
  const body = utf8Encode(canonicalJson(payload));
  const sigData = new Uint8Array(TIMESTAMP_BYTES + body.length);
  new DataView(sigData.buffer).setBigUint64(0, BigInt(Math.floor(nowMs / 1000)), false);
  sigData.set(body, TIMESTAMP_BYTES);

  const signature = await crypto.sign(signerVerkey, sigData);
  return {
    "@type": SIGNATURE_TYPE,
    signer: signerVerkey,
    sig_data: b64Encode(sigData),
    signature: b64Encode(signature),
  };
}

/**
 * Check a signed field against its declared signer and recover the payload.
 *
 * A bad signature is reported through `verified`, not as an error. The
 * error branch is reserved for fields that cannot be decoded at all.
 */
export async function verifySignedField(
  crypto: CryptoProvider,
  field: unknown
): Promise<Result<VerifiedField, MalformedSignedFieldError>> {
  const shape = toSignedField(field);
  if (!shape.ok) return shape;
  const { signer, sig_data, signature } = shape.value;

  const sigDataBytes = b64Decode(sig_data);
  const signatureBytes = b64Decode(signature);
  const verified = await crypto.verify(signer, sigDataBytes, signatureBytes);

  const data = b64Decode(sig_data);
  if (data.length < TIMESTAMP_BYTES) {
    return err(new MalformedSignedFieldError("sig_data shorter than its timestamp prefix"));
  }
  const timestamp = Number(
    new DataView(data.buffer, data.byteOffset, data.byteLength).getBigUint64(0, false)
  );

  let payload: JsonValue;
  try {
    payload = JSON.parse(utf8Decode(data.subarray(TIMESTAMP_BYTES)));
  } catch (e) {
    return err(new MalformedSignedFieldError(`sig_data does not carry JSON: ${errorMessage(e)}`));
  }

  return ok({ payload, verified, timestamp, signer });
}

/** A signed field as a message value. */
export function signedFieldToJson(field: SignedField): JsonObject {
  return {
    "@type": field["@type"],
    signer: field.signer,
    sig_data: field.sig_data,
    signature: field.signature,
  };
}

/**
 * Whether a signature timestamp falls inside `maxAgeSeconds` of `nowMs`.
 * Timestamps from the future are accepted up to the same window.
 */
export function isSignatureFresh(
  timestamp: number,
  maxAgeSeconds: number,
  nowMs: number = Date.now()
): boolean {
  const now = Math.floor(nowMs / 1000);
  return Math.abs(now - timestamp) <= maxAgeSeconds;
}

function toSignedField(field: unknown): Result<SignedField, MalformedSignedFieldError> {
  if (!isJsonObject(field)) {
    return err(new MalformedSignedFieldError("Signed field must be an object"));
  }
  const missing = ["@type", "signer", "sig_data", "signature"].filter(
    (k) => typeof field[k] !== "string"
  );
  if (missing.length > 0) {
    return err(
      new MalformedSignedFieldError(`Signed field missing: ${JSON.stringify(missing)}`)
    );
  }
  return ok(asSignedField(field));
}

function asSignedField(field: JsonObject): SignedField {
  return {
    "@type": String(field["@type"]),
    signer: String(field["signer"]),
    sig_data: String(field["sig_data"]),
    signature: String(field["signature"]),
  };
}
