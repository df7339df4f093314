/**
 * Connection protocol messages -- Invite, Request, Response -- and the DID
 * document a Request carries.
 *
 *   Invite    { @type, @id, label, recipientKeys: [verkey], serviceEndpoint }
 *   Request   { @type, @id, label, connection: { DID, DIDDoc } }
 *   Response  { @type, @id (= Request @id), connection~sig }
 *
 * The Invite travels out-of-band as `<endpoint>?c_i=<b64url(JSON)>`.
 */

import { z } from "zod";

import { InvalidHandshakeMessageError } from "./errors.js";
import { Message, familyIdentifier, messageType } from "./message.js";
import { deserialize } from "./serializer.js";
import {
  b64Decode,
  b64Encode,
  err,
  ok,
  utf8Decode,
  utf8Encode,
  type JsonObject,
  type Result,
} from "./types.js";

export const CONNECTIONS_FAMILY = familyIdentifier("connections", "1.0");
export const INVITE_TYPE = messageType(CONNECTIONS_FAMILY, "invitation");
export const REQUEST_TYPE = messageType(CONNECTIONS_FAMILY, "request");
export const RESPONSE_TYPE = messageType(CONNECTIONS_FAMILY, "response");

export const CONNECTION_FIELD = "connection";
export const CONNECTION_SIG_FIELD = "connection~sig";
export const INVITE_QUERY_PARAM = "c_i";

const DID_DOC_CONTEXT = "https://w3id.org/did/v1";

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const DIDDocSchema = z.object({
  "@context": z.string(),
  id: z.string().min(1),
  publicKey: z
    .array(
      z.object({
        id: z.string(),
        type: z.string(),
        controller: z.string(),
        publicKeyBase64: z.string().min(1),
      })
    )
    .min(1),
  service: z
    .array(
      z.object({
        id: z.string(),
        type: z.string(),
        recipientKeys: z.array(z.string()).min(1),
        serviceEndpoint: z.string().min(1),
      })
    )
    .min(1),
});

const ConnectionSchema = z.object({
  DID: z.string().min(1),
  DIDDoc: DIDDocSchema,
});

const InviteSchema = z.object({
  "@type": z.literal(INVITE_TYPE),
  "@id": z.string().min(1),
  label: z.string(),
  recipientKeys: z.array(z.string().min(1)).min(1),
  serviceEndpoint: z.string().url(),
});

const RequestSchema = z.object({
  "@type": z.literal(REQUEST_TYPE),
  "@id": z.string().min(1),
  label: z.string(),
  connection: ConnectionSchema,
});

const SignedFieldSchema = z.object({
  "@type": z.string(),
  signer: z.string().min(1),
  sig_data: z.string().min(1),
  signature: z.string().min(1),
});

const ResponsePreSigSchema = z.object({
  "@type": z.literal(RESPONSE_TYPE),
  "@id": z.string().min(1),
  "connection~sig": SignedFieldSchema,
});

const ResponseSchema = z.object({
  "@type": z.literal(RESPONSE_TYPE),
  "@id": z.string().min(1),
  connection: ConnectionSchema,
});

export type DIDDoc = z.infer<typeof DIDDocSchema>;
export type ConnectionInfo = z.infer<typeof ConnectionSchema>;
export type Invite = z.infer<typeof InviteSchema>;

/** Peer addressing recovered from a Request or Response. */
export interface PeerInfo {
  readonly did: string;
  readonly verkey: string;
  readonly endpoint: string;
}

function checkSchema<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  what: string
): Result<T, InvalidHandshakeMessageError> {
  const parsed = schema.safeParse(value);
  if (parsed.success) {
    return ok(parsed.data);
  }
  const issues = parsed.error.issues
    .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    .join("; ");
  return err(new InvalidHandshakeMessageError(`Invalid ${what}: ${issues}`));
}

// ---------------------------------------------------------------------------
// DID document
// ---------------------------------------------------------------------------

/**
 * Build the minimal DID document binding `did` to `verkey` and `endpoint`.
 */
export function buildDIDDoc(did: string, verkey: string, endpoint: string): DIDDoc {
  return {
    "@context": DID_DOC_CONTEXT,
    id: did,
    publicKey: [
      {
        id: `${did}#keys-1`,
        type: "Ed25519VerificationKey2018",
        controller: did,
        publicKeyBase64: verkey,
      },
    ],
    service: [
      {
        id: `${did};indy`,
        type: "IndyAgent",
        recipientKeys: [verkey],
        serviceEndpoint: endpoint,
      },
    ],
  };
}

/**
 * Check that a connection block's DID, key and endpoint agree, and return
 * the peer's addressing.
 */
function checkConnection(
  connection: ConnectionInfo
): Result<PeerInfo, InvalidHandshakeMessageError> {
  const doc = connection.DIDDoc;
  if (doc.id !== connection.DID) {
    return err(new InvalidHandshakeMessageError("DIDDoc id does not match connection DID"));
  }
  const verkey = doc.publicKey[0].publicKeyBase64;
  const service = doc.service[0];
  if (!service.recipientKeys.includes(verkey)) {
    return err(
      new InvalidHandshakeMessageError("DIDDoc service does not list the DIDDoc public key")
    );
  }
  return ok({ did: connection.DID, verkey, endpoint: service.serviceEndpoint });
}

function connectionToJson(did: string, doc: DIDDoc): JsonObject {
  return { DID: did, DIDDoc: doc };
}

// ---------------------------------------------------------------------------
// Invite
// ---------------------------------------------------------------------------

export function buildInvite(label: string, connectionKey: string, endpoint: string): Message {
  return Message.create(INVITE_TYPE, {
    label,
    recipientKeys: [connectionKey],
    serviceEndpoint: endpoint,
  });
}

export function validateInvite(invite: Message): Result<Invite, InvalidHandshakeMessageError> {
  return checkSchema(InviteSchema, invite.toJSON(), "invitation");
}

/**
 * Encode an invite as a URL on `endpoint` with a single `c_i` parameter.
 */
export function encodeInvite(invite: Message, endpoint: string): string {
  const url = new URL(endpoint);
  url.search = "";
  url.searchParams.set(INVITE_QUERY_PARAM, b64Encode(utf8Encode(JSON.stringify(invite.toJSON()))));
  return url.toString();
}

/**
 * Parse an invite URL (reverse of `encodeInvite`) and validate its contents.
 */
export function parseInvite(inviteUrl: string): Result<Message, InvalidHandshakeMessageError> {
  let blob: string | null;
  try {
    blob = new URL(inviteUrl.trim()).searchParams.get(INVITE_QUERY_PARAM);
  } catch {
    return err(new InvalidHandshakeMessageError("Invitation is not a URL"));
  }
  if (blob === null || blob.length === 0) {
    return err(new InvalidHandshakeMessageError(`Invitation URL has no '${INVITE_QUERY_PARAM}'`));
  }

  let invite: Message;
  try {
    invite = deserialize(utf8Decode(b64Decode(blob)));
  } catch {
    return err(new InvalidHandshakeMessageError("Invitation blob is not an encoded message"));
  }
  const checked = validateInvite(invite);
  return checked.ok ? ok(invite) : checked;
}

// ---------------------------------------------------------------------------
// Request
// ---------------------------------------------------------------------------

export function buildRequest(
  label: string,
  did: string,
  verkey: string,
  endpoint: string
): Message {
  return Message.create(REQUEST_TYPE, {
    label,
    [CONNECTION_FIELD]: connectionToJson(did, buildDIDDoc(did, verkey, endpoint)),
  });
}

/**
 * Validate a Request and return the requester's DID, verkey and endpoint.
 */
export function validateRequest(request: Message): Result<PeerInfo, InvalidHandshakeMessageError> {
  const checked = checkSchema(RequestSchema, request.toJSON(), "request");
  if (!checked.ok) return checked;
  return checkConnection(checked.value.connection);
}

// ---------------------------------------------------------------------------
// Response
// ---------------------------------------------------------------------------

/**
 * Build a Response carrying a cleartext `connection`; it is replaced by
 * `connection~sig` before it leaves the agent.
 */
export function buildResponse(
  requestId: string,
  did: string,
  verkey: string,
  endpoint: string
): Message {
  return Message.create(RESPONSE_TYPE, {
    "@id": requestId,
    [CONNECTION_FIELD]: connectionToJson(did, buildDIDDoc(did, verkey, endpoint)),
  });
}

/**
 * Structural checks that must pass before the signature is looked at.
 */
export function validateResponsePreSig(
  response: Message,
  expectedRequestId: string
): Result<void, InvalidHandshakeMessageError> {
  const checked = checkSchema(ResponsePreSigSchema, response.toJSON(), "response");
  if (!checked.ok) return checked;
  if (checked.value["@id"] !== expectedRequestId) {
    return err(new InvalidHandshakeMessageError("Response @id does not match the request @id"));
  }
  return ok(undefined);
}

/**
 * Full validation against the reconstructed plaintext `connection`.
 */
export function validateResponse(
  response: Message,
  expectedRequestId: string
): Result<PeerInfo, InvalidHandshakeMessageError> {
  const checked = checkSchema(ResponseSchema, response.toJSON(), "response");
  if (!checked.ok) return checked;
  if (checked.value["@id"] !== expectedRequestId) {
    return err(new InvalidHandshakeMessageError("Response @id does not match the request @id"));
  }
  return checkConnection(checked.value.connection);
}
