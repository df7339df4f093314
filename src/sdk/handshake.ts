/**
 * Connection handshake roles.
 *
 *   Inviter  Idle -> InviteIssued -> AwaitingRequest -> RequestValidated -> ResponseSent
 *   Invitee  Idle -> InviteParsed -> RequestSent -> AwaitingResponse -> ResponseVerified
 *
 * Each role talks to its peer only through wire messages. An invalid Request
 * is reported to the caller and never answered; an invalid Response is
 * reported to the caller as a handshake failure.
 */

import {
  ACCEPTED_STATUS,
  CONNECTION_FIELD,
  CONNECTION_SIG_FIELD,
  DeliveryError,
  HandshakeStateError,
  InvalidHandshakeMessageError,
  SignatureVerificationError,
  buildInvite,
  buildRequest,
  buildResponse,
  encodeInvite,
  err,
  isSignatureFresh,
  ok,
  parseInvite,
  signField,
  signedFieldToJson,
  validateInvite,
  validateRequest,
  validateResponse,
  validateResponsePreSig,
  verifySignedField,
  type CryptoProvider,
  type Invite,
  type MalformedSignedFieldError,
  type Message,
  type PeerInfo,
  type Result,
  type SecureEnvelope,
} from "../protocol/index.js";
import type { TransportBase } from "./transport/base.js";

export type InviterState =
  | "Idle"
  | "InviteIssued"
  | "AwaitingRequest"
  | "RequestValidated"
  | "ResponseSent";

export type InviteeState =
  | "Idle"
  | "InviteParsed"
  | "RequestSent"
  | "AwaitingResponse"
  | "ResponseVerified";

/** Everything a handshake role needs from its agent. */
export interface HandshakeDeps {
  readonly crypto: CryptoProvider;
  readonly envelope: SecureEnvelope;
  readonly transport: TransportBase;
  /** This agent's inbound endpoint, advertised in invites and DID documents. */
  readonly endpoint: string;
}

export interface IssuedInvite {
  readonly invite: Message;
  readonly url: string;
  /** Single-use key the Request must be addressed to. */
  readonly connectionKey: string;
}

/** A completed handshake, from either side. */
export interface EstablishedConnection {
  readonly myDid: string;
  readonly myVerkey: string;
  readonly peer: PeerInfo;
  /** The peer's label (inviter side) or the invitation label (invitee side). */
  readonly label: string;
  readonly requestId: string;
}

export interface ResponseDelivery extends EstablishedConnection {
  /** Status the requester's endpoint answered with; 202 means accepted. */
  readonly status: number;
}

export type ResponseFailure =
  | InvalidHandshakeMessageError
  | SignatureVerificationError
  | MalformedSignedFieldError;

// ---------------------------------------------------------------------------
// Inviter
// ---------------------------------------------------------------------------

export class InviterHandshake {
  private readonly _deps: HandshakeDeps;
  private _state: InviterState = "Idle";
  private _connectionKey: string | null = null;

  constructor(deps: HandshakeDeps) {
    this._deps = deps;
  }

  /**
   * Pick up an invitation issued earlier (for example by another process
   * sharing the wallet), ready to receive its Request.
   */
  static resume(deps: HandshakeDeps, connectionKey: string): InviterHandshake {
    const role = new InviterHandshake(deps);
    role._connectionKey = connectionKey;
    role._state = "AwaitingRequest";
    return role;
  }

  get state(): InviterState {
    return this._state;
  }

  get connectionKey(): string | null {
    return this._connectionKey;
  }

  /**
   * Create a fresh connection key and an invitation carrying it.
   */
  async issueInvite(label: string): Promise<IssuedInvite> {
    this._expect("Idle");
    const connectionKey = await this._deps.crypto.createKey();
    const invite = buildInvite(label, connectionKey, this._deps.endpoint);
    this._connectionKey = connectionKey;
    this._state = "InviteIssued";
    return { invite, url: encodeInvite(invite, this._deps.endpoint), connectionKey };
  }

  /** The invitation is out; start accepting its Request. */
  open(): void {
    this._expect("InviteIssued");
    this._state = "AwaitingRequest";
  }

  /**
   * Validate a Request and answer it with a signed Response.
   *
   * An invalid Request leaves the role in AwaitingRequest and sends nothing.
   */
  async handleRequest(
    request: Message,
    nowMs: number = Date.now()
  ): Promise<Result<ResponseDelivery, InvalidHandshakeMessageError>> {
    this._expect("AwaitingRequest");
    const connectionKey = this._requireKey();

    const toKey = request.context?.toKey ?? null;
    if (toKey !== null && toKey !== connectionKey) {
      return err(new InvalidHandshakeMessageError("Request is not addressed to this invitation"));
    }
    const validated = validateRequest(request);
    if (!validated.ok) return validated;
    const peer = validated.value;
    const requestId = request.id ?? "";
    this._state = "RequestValidated";

    const me = await this._deps.crypto.createLocalIdentity();
    const response = buildResponse(requestId, me.did, me.verkey, this._deps.endpoint);
    const connection = response.get(CONNECTION_FIELD) ?? null;
    const sig = await signField(this._deps.crypto, connection, connectionKey, nowMs);
    response.set(CONNECTION_SIG_FIELD, signedFieldToJson(sig));
    response.delete(CONNECTION_FIELD);

    const wire = await this._deps.envelope.pack(response, [peer.verkey], me.verkey);
    const status = await this._deps.transport.send(peer.endpoint, wire);
    this._state = "ResponseSent";

    return ok({
      myDid: me.did,
      myVerkey: me.verkey,
      peer,
      label: request.getString("label") ?? "",
      requestId,
      status,
    });
  }

  private _requireKey(): string {
    if (this._connectionKey === null) {
      throw new HandshakeStateError("Inviter has no connection key");
    }
    return this._connectionKey;
  }

  private _expect(state: InviterState): void {
    if (this._state !== state) {
      throw new HandshakeStateError(`Inviter is in ${this._state}, expected ${state}`);
    }
  }
}

// ---------------------------------------------------------------------------
// Invitee
// ---------------------------------------------------------------------------

export interface InviteeOptions {
  /** Reject Responses signed longer ago than this. Null disables the check. */
  readonly maxSignatureAgeSeconds?: number | null;
}

export class InviteeHandshake {
  private readonly _deps: HandshakeDeps;
  private readonly _maxAge: number | null;
  private _state: InviteeState = "Idle";
  private _invite: Invite | null = null;
  private _request: Message | null = null;
  private _myDid: string | null = null;
  private _myVerkey: string | null = null;

  constructor(deps: HandshakeDeps, options: InviteeOptions = {}) {
    this._deps = deps;
    this._maxAge = options.maxSignatureAgeSeconds ?? null;
  }

  get state(): InviteeState {
    return this._state;
  }

  get invite(): Invite | null {
    return this._invite;
  }

  /** `@id` of the Request sent, which the Response must echo. */
  get requestId(): string | null {
    return this._request?.id ?? null;
  }

  get myDid(): string | null {
    return this._myDid;
  }

  get myVerkey(): string | null {
    return this._myVerkey;
  }

  /**
   * Accept an out-of-band invitation, either as its URL or as the message
   * itself.
   */
  parseInvite(invitation: string | Message): Result<Invite, InvalidHandshakeMessageError> {
    this._expect("Idle");
    let message: Message;
    if (typeof invitation === "string") {
      const parsed = parseInvite(invitation);
      if (!parsed.ok) return parsed;
      message = parsed.value;
    } else {
      message = invitation;
    }
    const checked = validateInvite(message);
    if (!checked.ok) return checked;
    this._invite = checked.value;
    this._state = "InviteParsed";
    return checked;
  }

  /**
   * Create a local identity and send a sender-authenticated Request to the
   * invitation's key and endpoint.
   *
   * A non-202 answer leaves the role in RequestSent.
   */
  async sendRequest(
    label: string,
    requestId?: string
  ): Promise<Result<Message, DeliveryError>> {
    this._expect("InviteParsed");
    const invite = this._requireInvite();

    const me = await this._deps.crypto.createLocalIdentity();
    const request = buildRequest(label, me.did, me.verkey, this._deps.endpoint);
    if (requestId !== undefined) request.set("@id", requestId);
    this._myDid = me.did;
    this._myVerkey = me.verkey;
    this._request = request;

    const wire = await this._deps.envelope.pack(request, [invite.recipientKeys[0]], me.verkey);
    this._state = "RequestSent";
    const status = await this._deps.transport.send(invite.serviceEndpoint, wire);
    if (status !== ACCEPTED_STATUS) {
      return err(
        new DeliveryError(status, `Request to ${invite.serviceEndpoint} answered ${status}`)
      );
    }
    this._state = "AwaitingResponse";
    return ok(request);
  }

  /**
   * Verify a Response and recover the inviter's connection.
   *
   * Shape and `@id` are checked before the signature; the reconstructed
   * connection is then validated in full. Any failure leaves the role in
   * AwaitingResponse.
   */
  async handleResponse(
    response: Message,
    nowMs: number = Date.now()
  ): Promise<Result<EstablishedConnection, ResponseFailure>> {
    this._expect("AwaitingResponse");
    const invite = this._requireInvite();
    const requestId = this.requestId ?? "";

    const shape = validateResponsePreSig(response, requestId);
    if (!shape.ok) return shape;

    const verified = await verifySignedField(this._deps.crypto, response.get(CONNECTION_SIG_FIELD));
    if (!verified.ok) return verified;
    const field = verified.value;
    if (!field.verified) {
      return err(new SignatureVerificationError("connection~sig does not verify"));
    }
    if (field.signer !== invite.recipientKeys[0]) {
      return err(new SignatureVerificationError("connection~sig is not signed by the invitation key"));
    }
    if (this._maxAge !== null && !isSignatureFresh(field.timestamp, this._maxAge, nowMs)) {
      return err(new SignatureVerificationError("connection~sig timestamp is outside the allowed window"));
    }

    const promoted = response.clone();
    promoted.delete(CONNECTION_SIG_FIELD);
    promoted.set(CONNECTION_FIELD, field.payload);
    const validated = validateResponse(promoted, requestId);
    if (!validated.ok) return validated;

    this._state = "ResponseVerified";
    return ok({
      myDid: this._myDid ?? "",
      myVerkey: this._myVerkey ?? "",
      peer: validated.value,
      label: invite.label,
      requestId,
    });
  }

  private _requireInvite(): Invite {
    if (this._invite === null) {
      throw new HandshakeStateError("Invitee has no invitation");
    }
    return this._invite;
  }

  private _expect(state: InviteeState): void {
    if (this._state !== state) {
      throw new HandshakeStateError(`Invitee is in ${this._state}, expected ${state}`);
    }
  }
}
