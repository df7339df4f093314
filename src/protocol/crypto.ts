/**
 * Cryptographic primitives for didwire.
 *
 * Wraps libsodium-wrappers for Ed25519 signing, Curve25519 key exchange,
 * NaCl Box / SealedBox, XChaCha20-Poly1305 AEAD, and SecretBox.
 *
 * This module never hand-rolls crypto -- every operation delegates to libsodium.
 */

import sodium from "libsodium-wrappers";

import { b64Decode, b64Encode, utf8Encode } from "./types.js";

// ---------------------------------------------------------------------------
// Sodium initialization
// ---------------------------------------------------------------------------

/**
 * Promise that resolves when libsodium is ready.
 * Callers must await this before first use of any crypto function.
 */
export const sodiumReady: Promise<void> = sodium.ready;

// ---------------------------------------------------------------------------
// Keys and identifiers
// ---------------------------------------------------------------------------

export interface Keypair {
  /** 64-byte Ed25519 secret key (seed + public). */
  signingKey: Uint8Array;
  /** 32-byte Ed25519 public key. */
  verifyKey: Uint8Array;
  /** 32-byte seed. */
  seed: Uint8Array;
}

/**
 * Generate an Ed25519 keypair.
 */
export function generateKeypair(): Keypair {
  return keypairFromSeed(sodium.randombytes_buf(32));
}

/**
 * Restore an Ed25519 keypair from its 32-byte seed.
 */
export function keypairFromSeed(seed: Uint8Array): Keypair {
  const kp = sodium.crypto_sign_seed_keypair(seed);
  return {
    signingKey: kp.privateKey,
    verifyKey: kp.publicKey,
    seed,
  };
}

/** Verkey string for a public key: URL-safe base64 of its 32 bytes. */
export function encodeVerkey(verifyKey: Uint8Array): string {
  return b64Encode(verifyKey);
}

/**
 * Public key bytes for a verkey string, or null if it is not 32 bytes.
 */
export function decodeVerkey(verkey: string): Uint8Array | null {
  const bytes = b64Decode(verkey);
  return bytes.length === sodium.crypto_sign_PUBLICKEYBYTES ? bytes : null;
}

/**
 * DID for a freshly created identity: the first 16 bytes of its verkey.
 */
export function didFromVerifyKey(verifyKey: Uint8Array): string {
  return b64Encode(verifyKey.slice(0, 16));
}

// ---------------------------------------------------------------------------
// Canonical JSON
// ---------------------------------------------------------------------------

/**
 * Recursively sort all object keys and produce compact JSON.
 */
export function canonicalJson(value: unknown): string {
  if (value === null || value === undefined) {
    return "null";
  }
  if (typeof value === "string") {
    return JSON.stringify(value);
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (Array.isArray(value)) {
    return "[" + value.map((v) => canonicalJson(v)).join(",") + "]";
  }
  if (typeof value === "object") {
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return (
      "{" + entries.map(([k, v]) => JSON.stringify(k) + ":" + canonicalJson(v)).join(",") + "}"
    );
  }
  return JSON.stringify(String(value));
}

// ---------------------------------------------------------------------------
// Signing and verification
// ---------------------------------------------------------------------------

/**
 * Sign data with the Ed25519 signing key, returning the 64-byte signature.
 */
export function signDetached(data: Uint8Array, signingKey: Uint8Array): Uint8Array {
  return sodium.crypto_sign_detached(data, signingKey);
}

/**
 * Verify an Ed25519 detached signature. Malformed inputs verify as false.
 */
export function verifyDetached(
  data: Uint8Array,
  signature: Uint8Array,
  verifyKey: Uint8Array
): boolean {
  if (
    signature.length !== sodium.crypto_sign_BYTES ||
    verifyKey.length !== sodium.crypto_sign_PUBLICKEYBYTES
  ) {
    return false;
  }
  try {
    return sodium.crypto_sign_verify_detached(signature, data, verifyKey);
  } catch {
    return false;
  }
}

// ---------------------------------------------------------------------------
// Curve25519 conversion and NaCl Box / SealedBox
// ---------------------------------------------------------------------------

export function randomBytes(length: number): Uint8Array {
  return sodium.randombytes_buf(length);
}

export const BOX_NONCE_BYTES = 24;

/**
 * Encrypt with NaCl Box from an Ed25519 sender to an Ed25519 recipient.
 */
export function boxEncrypt(
  plaintext: Uint8Array,
  nonce: Uint8Array,
  senderSigningKey: Uint8Array,
  recipientVerifyKey: Uint8Array
): Uint8Array {
  const senderCurve = sodium.crypto_sign_ed25519_sk_to_curve25519(senderSigningKey);
  const recipientCurve = sodium.crypto_sign_ed25519_pk_to_curve25519(recipientVerifyKey);
  return sodium.crypto_box_easy(plaintext, nonce, recipientCurve, senderCurve);
}

/**
 * Open a NaCl Box. Throws on wrong keys or tampered data.
 */
export function boxDecrypt(
  ciphertext: Uint8Array,
  nonce: Uint8Array,
  recipientSigningKey: Uint8Array,
  senderVerifyKey: Uint8Array
): Uint8Array {
  const recipientCurve = sodium.crypto_sign_ed25519_sk_to_curve25519(recipientSigningKey);
  const senderCurve = sodium.crypto_sign_ed25519_pk_to_curve25519(senderVerifyKey);
  return sodium.crypto_box_open_easy(ciphertext, nonce, senderCurve, recipientCurve);
}

/**
 * Encrypt with NaCl SealedBox (anonymous sender).
 */
export function sealEncrypt(plaintext: Uint8Array, recipientVerifyKey: Uint8Array): Uint8Array {
  const recipientCurve = sodium.crypto_sign_ed25519_pk_to_curve25519(recipientVerifyKey);
  return sodium.crypto_box_seal(plaintext, recipientCurve);
}

/**
 * Open a NaCl SealedBox. Throws on wrong keys or tampered data.
 */
export function sealDecrypt(ciphertext: Uint8Array, recipient: Keypair): Uint8Array {
  const curveSk = sodium.crypto_sign_ed25519_sk_to_curve25519(recipient.signingKey);
  const curvePk = sodium.crypto_sign_ed25519_pk_to_curve25519(recipient.verifyKey);
  return sodium.crypto_box_seal_open(ciphertext, curvePk, curveSk);
}

// ---------------------------------------------------------------------------
// Content encryption (XChaCha20-Poly1305)
// ---------------------------------------------------------------------------

export const AEAD_KEY_BYTES = 32;
export const AEAD_NONCE_BYTES = 24;
export const AEAD_TAG_BYTES = 16;

export interface AeadCiphertext {
  ciphertext: Uint8Array;
  tag: Uint8Array;
}

export function aeadEncrypt(
  plaintext: Uint8Array,
  additionalData: string,
  nonce: Uint8Array,
  key: Uint8Array
): AeadCiphertext {
  const combined = sodium.crypto_aead_xchacha20poly1305_ietf_encrypt(
    plaintext,
    utf8Encode(additionalData),
    null,
    nonce,
    key
  );
  return {
    ciphertext: combined.slice(0, combined.length - AEAD_TAG_BYTES),
    tag: combined.slice(combined.length - AEAD_TAG_BYTES),
  };
}

/**
 * Decrypt and authenticate. Throws if the tag does not match.
 */
export function aeadDecrypt(
  sealed: AeadCiphertext,
  additionalData: string,
  nonce: Uint8Array,
  key: Uint8Array
): Uint8Array {
  const combined = new Uint8Array(sealed.ciphertext.length + sealed.tag.length);
  combined.set(sealed.ciphertext, 0);
  combined.set(sealed.tag, sealed.ciphertext.length);
  return sodium.crypto_aead_xchacha20poly1305_ietf_decrypt(
    null,
    combined,
    utf8Encode(additionalData),
    nonce,
    key
  );
}

// ---------------------------------------------------------------------------
// Secrets at rest (SecretBox with a passphrase-derived key)
// ---------------------------------------------------------------------------

/**
 * Derive a 32-byte SecretBox key from a passphrase and per-wallet salt.
 */
export function deriveStorageKey(passphrase: string, salt: Uint8Array): Uint8Array {
  return sodium.crypto_generichash(
    sodium.crypto_secretbox_KEYBYTES,
    utf8Encode(passphrase),
    salt
  );
}

/**
 * Encrypt a secret for storage. Returns nonce || ciphertext.
 */
export function sealSecret(secret: Uint8Array, key: Uint8Array): Uint8Array {
  const nonce = sodium.randombytes_buf(sodium.crypto_secretbox_NONCEBYTES);
  const box = sodium.crypto_secretbox_easy(secret, nonce, key);
  const out = new Uint8Array(nonce.length + box.length);
  out.set(nonce, 0);
  out.set(box, nonce.length);
  return out;
}

/**
 * Decrypt a stored secret, or return null when the key is wrong.
 */
export function openSecret(sealed: Uint8Array, key: Uint8Array): Uint8Array | null {
  const nonce = sealed.slice(0, sodium.crypto_secretbox_NONCEBYTES);
  const box = sealed.slice(sodium.crypto_secretbox_NONCEBYTES);
  try {
    return sodium.crypto_secretbox_open_easy(box, nonce, key);
  } catch {
    return null;
  }
}
