/**
 * didwire error hierarchy.
 *
 * Every error carries a `kind` naming its failure category so callers can
 * switch on it instead of on the class.
 */

export type ErrorKind =
  | "Agent"
  | "MalformedWireBytes"
  | "MalformedMessage"
  | "MalformedSignedField"
  | "UnroutableMessage"
  | "DuplicateRegistration"
  | "InvalidHandshakeMessage"
  | "SignatureVerificationFailed"
  | "HandshakeState"
  | "WalletUnavailable"
  | "Delivery"
  | "Configuration";

/** Base error for all didwire errors. */
export class AgentError extends Error {
  readonly kind: ErrorKind;

  constructor(message?: string, kind: ErrorKind = "Agent") {
    super(message);
    this.name = "AgentError";
    this.kind = kind;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Bytes that are neither a plaintext message nor an envelope we can open. */
export class MalformedWireBytesError extends AgentError {
  constructor(message?: string) {
    super(message, "MalformedWireBytes");
    this.name = "MalformedWireBytesError";
  }
}

/** Text that does not parse into a message mapping with an `@type`. */
export class MalformedMessageError extends AgentError {
  constructor(message?: string) {
    super(message, "MalformedMessage");
    this.name = "MalformedMessageError";
  }
}

/** A signed field whose encoding or embedded JSON is broken. */
export class MalformedSignedFieldError extends AgentError {
  constructor(message?: string) {
    super(message, "MalformedSignedField");
    this.name = "MalformedSignedFieldError";
  }
}

/** No family, or no handler within a family, matches the message type. */
export class UnroutableMessageError extends AgentError {
  readonly messageType: string;
  readonly family: string | null;

  constructor(messageType: string, family: string | null = null) {
    super(
      family === null
        ? `No family registered for message type '${messageType}'`
        : `Family '${family}' has no handler for message type '${messageType}'`,
      "UnroutableMessage"
    );
    this.name = "UnroutableMessageError";
    this.messageType = messageType;
    this.family = family;
  }
}

/** A family or message type registered twice. */
export class DuplicateRegistrationError extends AgentError {
  constructor(message?: string) {
    super(message, "DuplicateRegistration");
    this.name = "DuplicateRegistrationError";
  }
}

/** A handshake message is missing a field or has the wrong shape. */
export class InvalidHandshakeMessageError extends AgentError {
  constructor(message?: string) {
    super(message, "InvalidHandshakeMessage");
    this.name = "InvalidHandshakeMessageError";
  }
}

/** A signed field did not verify against its declared signer. */
export class SignatureVerificationError extends AgentError {
  constructor(message?: string) {
    super(message, "SignatureVerificationFailed");
    this.name = "SignatureVerificationError";
  }
}

/** A handshake role was driven out of order. */
export class HandshakeStateError extends AgentError {
  constructor(message?: string) {
    super(message, "HandshakeState");
    this.name = "HandshakeStateError";
  }
}

/** The wallet backing identities and keys is not open or cannot be opened. */
export class WalletUnavailableError extends AgentError {
  constructor(message?: string) {
    super(message, "WalletUnavailable");
    this.name = "WalletUnavailableError";
  }
}

/** An outbound send was not accepted by the receiving endpoint. */
export class DeliveryError extends AgentError {
  readonly status: number;

  constructor(status: number, message?: string) {
    super(message ?? `Delivery failed with status ${status}`, "Delivery");
    this.name = "DeliveryError";
    this.status = status;
  }
}

/** Invalid agent configuration. */
export class ConfigurationError extends AgentError {
  constructor(message?: string) {
    super(message, "Configuration");
    this.name = "ConfigurationError";
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
