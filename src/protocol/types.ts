/**
 * Core types, constants, and utility functions for the didwire protocol layer.
 */

/** Base DID that every family URI in this agent hangs off. */
export const BASE_DID = "did:sov:BzCbsNYhMrjHiqZDTUASHg";

/** Media type distinguishing agent-wire traffic from ordinary HTTP payloads. */
export const WIRE_CONTENT_TYPE = "application/ssi-agent-wire";

/** Status a receiving transport answers with once bytes are accepted. */
export const ACCEPTED_STATUS = 202;

/** Signature scheme URI carried in every signed field. */
export const SIGNATURE_TYPE = `${BASE_DID};spec/signature/1.0/ed25519Sha512_single`;

/** JSON-compatible values, as carried by a Message. */
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Outcome of an operation whose failure is an expected, reportable result
 * rather than a fault.
 */
export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { readonly ok: false; readonly error: E } {
  return { ok: false, error };
}

/**
 * URL-safe base64 encode, stripping padding.
 */
export function b64Encode(data: Uint8Array): string {
  return Buffer.from(data).toString("base64url");
}

/**
 * URL-safe base64 decode, tolerating missing padding.
 */
export function b64Decode(s: string): Uint8Array {
  return new Uint8Array(Buffer.from(s, "base64url"));
}

export function utf8Encode(s: string): Uint8Array {
  return new TextEncoder().encode(s);
}

export function utf8Decode(data: Uint8Array): string {
  return new TextDecoder("utf-8", { fatal: true }).decode(data);
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Return a canonical UTC timestamp: YYYY-MM-DDTHH:MM:SS.mmmZ
 */
export function utcTimestamp(): string {
  return new Date().toISOString();
}
