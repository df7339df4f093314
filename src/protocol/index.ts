/**
 * didwire protocol layer.
 *
 * Public API re-exports: message model, serializer, signed fields, secure
 * envelope, connection messages, and the libsodium primitives under them.
 */

// Types
export {
  BASE_DID,
  WIRE_CONTENT_TYPE,
  ACCEPTED_STATUS,
  SIGNATURE_TYPE,
  type JsonPrimitive,
  type JsonValue,
  type JsonObject,
  type Result,
  ok,
  err,
  b64Encode,
  b64Decode,
  utf8Encode,
  utf8Decode,
  isJsonObject,
  utcTimestamp,
} from "./types.js";

// Errors
export {
  type ErrorKind,
  AgentError,
  MalformedWireBytesError,
  MalformedMessageError,
  MalformedSignedFieldError,
  UnroutableMessageError,
  DuplicateRegistrationError,
  InvalidHandshakeMessageError,
  SignatureVerificationError,
  HandshakeStateError,
  WalletUnavailableError,
  DeliveryError,
  ConfigurationError,
  errorMessage,
} from "./errors.js";

// Message model and serializer
export {
  Message,
  type MessageContext,
  type MessageTypeParts,
  EMPTY_CONTEXT,
  parseMessageType,
  familyIdentifier,
  messageType,
} from "./message.js";
export { serialize, deserialize } from "./serializer.js";

// Collaborator interfaces
export type {
  CryptoProvider,
  IdentityStore,
  LocalIdentity,
  PairwiseInfo,
  UnpackedEnvelope,
} from "./provider.js";

// Crypto
export {
  sodiumReady,
  type Keypair,
  generateKeypair,
  keypairFromSeed,
  encodeVerkey,
  decodeVerkey,
  didFromVerifyKey,
  canonicalJson,
  signDetached,
  verifyDetached,
} from "./crypto.js";

// Signed fields
export {
  type SignedField,
  type VerifiedField,
  signField,
  verifySignedField,
  isSignatureFresh,
  signedFieldToJson,
} from "./signed-field.js";

// Envelope
export { SecureEnvelope, type UnpackFailure, wireExcerpt } from "./envelope.js";

// Connection messages
export {
  CONNECTIONS_FAMILY,
  INVITE_TYPE,
  REQUEST_TYPE,
  RESPONSE_TYPE,
  CONNECTION_FIELD,
  CONNECTION_SIG_FIELD,
  INVITE_QUERY_PARAM,
  type DIDDoc,
  type ConnectionInfo,
  type Invite,
  type PeerInfo,
  buildDIDDoc,
  buildInvite,
  validateInvite,
  encodeInvite,
  parseInvite,
  buildRequest,
  validateRequest,
  buildResponse,
  validateResponsePreSig,
  validateResponse,
} from "./connection.js";
