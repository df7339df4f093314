/**
 * connections/1.0 -- drives both handshake roles for the agent and stores
 * the resulting pairwise relationships.
 */

import {
  ACCEPTED_STATUS,
  CONNECTIONS_FAMILY,
  REQUEST_TYPE,
  RESPONSE_TYPE,
  ok,
  utcTimestamp,
  validateRequest,
  type DeliveryError,
  InvalidHandshakeMessageError,
  type Message,
  type Result,
} from "../../protocol/index.js";
import type { Agent } from "../agent.js";
import {
  InviteeHandshake,
  InviterHandshake,
  type EstablishedConnection,
  type IssuedInvite,
  type ResponseFailure,
} from "../handshake.js";
import type { Logger } from "../logger.js";
import { MessageTypeRouter, type AgentModule } from "../router.js";
import { buildAdminMessage } from "./admin.js";
import { INVITATION_RECORD } from "./records.js";

/** How long an unanswered Request is remembered by default: one day. */
export const DEFAULT_PENDING_TTL_MS = 24 * 60 * 60 * 1000;

export interface ConnectionsModuleOptions {
  /** Forget Requests not answered within this many milliseconds. */
  pendingTtlMs?: number;
}

interface PendingRequest {
  readonly role: InviteeHandshake;
  readonly sentAt: number;
}

export class ConnectionsModule implements AgentModule {
  readonly family = CONNECTIONS_FAMILY;
  private readonly _agent: Agent;
  private readonly _log: Logger;
  private readonly _router = new MessageTypeRouter(CONNECTIONS_FAMILY);
  /** Invitee roles waiting for a Response, by Request `@id`. */
  private readonly _pending = new Map<string, PendingRequest>();
  private readonly _pendingTtlMs: number;

  constructor(agent: Agent, options: ConnectionsModuleOptions = {}) {
    this._agent = agent;
    this._pendingTtlMs = options.pendingTtlMs ?? DEFAULT_PENDING_TTL_MS;
    this._log = agent.logger.child("connections");
    this._router.register(REQUEST_TYPE, (m) => this._onRequest(m));
    this._router.register(RESPONSE_TYPE, (m) => this._onResponse(m));
  }

  route(message: Message): Promise<Message | null> {
    return this._router.route(message);
  }

  /** Request ids of handshakes this agent started and has not completed. */
  get pendingRequests(): string[] {
    this._expirePending();
    return [...this._pending.keys()];
  }

  // -- Inviter -------------------------------------------------------------

  /**
   * Issue an invitation and remember its key until a Request arrives.
   */
  async createInvite(label?: string): Promise<IssuedInvite> {
    const role = new InviterHandshake(this._agent.handshakeDeps);
    const inviteLabel = label ?? this._agent.owner ?? this._agent.config.name;
    const issued = await role.issueInvite(inviteLabel);
    this._agent.wallet.addRecord(INVITATION_RECORD, issued.connectionKey, {
      label: inviteLabel,
      url: issued.url,
      created_at: utcTimestamp(),
    });
    role.open();
    this._log.info(`Invitation issued with key ${issued.connectionKey}`);
    return issued;
  }

  private async _onRequest(request: Message): Promise<null> {
    const toKey = request.context?.toKey ?? null;
    const wallet = this._agent.wallet;
    if (toKey === null || wallet.getRecord(INVITATION_RECORD, toKey) === null) {
      this._log.warn("Ignoring connection request for an unknown invitation");
      return null;
    }

    const claimed = validateRequest(request);
    if (claimed.ok && wallet.isLocalDid(claimed.value.did)) {
      this._log.warn(`Ignoring connection request claiming local DID ${claimed.value.did}`);
      return null;
    }

    const role = InviterHandshake.resume(this._agent.handshakeDeps, toKey);
    const result = await role.handleRequest(request);
    if (!result.ok) {
      this._log.warn(`Ignoring invalid connection request: ${result.error.message}`);
      return null;
    }

    const done = result.value;
    wallet.deleteRecord(INVITATION_RECORD, toKey);
    this._storePairwise(done);
    if (done.status !== ACCEPTED_STATUS) {
      this._log.warn(`Connection response to ${done.peer.endpoint} answered ${done.status}`);
    }
    await this._notifyEstablished(done);
    return null;
  }

  // -- Invitee -------------------------------------------------------------

  /**
   * Accept an invitation URL and send the Request. Resolves with the
   * Request `@id` the Response will carry.
   */
  async acceptInvite(
    inviteUrl: string,
    label?: string
  ): Promise<Result<string, InvalidHandshakeMessageError | DeliveryError>> {
    const role = new InviteeHandshake(this._agent.handshakeDeps, {
      maxSignatureAgeSeconds: this._agent.config.maxSignatureAgeSeconds,
    });
    const parsed = role.parseInvite(inviteUrl);
    if (!parsed.ok) {
      this._log.warn(`Rejecting invitation: ${parsed.error.message}`);
      return parsed;
    }

    const sent = await role.sendRequest(label ?? this._agent.owner ?? this._agent.config.name);
    if (!sent.ok) {
      this._log.warn(sent.error.message);
      return sent;
    }
    const requestId = sent.value.id ?? "";
    this._expirePending();
    this._pending.set(requestId, { role, sentAt: Date.now() });
    this._log.info(`Connection request ${requestId} sent to ${parsed.value.serviceEndpoint}`);
    return ok(requestId);
  }

  private async _onResponse(response: Message): Promise<null> {
    const requestId = response.id ?? "";
    this._expirePending();
    const role = this._pending.get(requestId)?.role;
    if (role === undefined) {
      this._log.warn(`Ignoring connection response for unknown request '${requestId}'`);
      return null;
    }

    const result = await role.handleResponse(response);
    if (!result.ok) {
      await this._reportFailure(requestId, result.error);
      return null;
    }
    if (this._agent.wallet.isLocalDid(result.value.peer.did)) {
      this._pending.delete(requestId);
      await this._reportFailure(
        requestId,
        new InvalidHandshakeMessageError(`Response claims local DID ${result.value.peer.did}`)
      );
      return null;
    }

    this._pending.delete(requestId);
    this._storePairwise(result.value);
    await this._notifyEstablished(result.value);
    return null;
  }

  // -- Shared --------------------------------------------------------------

  private _expirePending(now: number = Date.now()): void {
    for (const [requestId, pending] of this._pending) {
      if (now - pending.sentAt >= this._pendingTtlMs) {
        this._pending.delete(requestId);
        this._log.info(`Connection request ${requestId} expired without a response`);
      }
    }
  }

  private async _reportFailure(requestId: string, error: ResponseFailure): Promise<void> {
    this._log.warn(`Connection response rejected: ${error.message}`);
    await this._agent.sendAdminMessage(
      buildAdminMessage("connection_failed", {
        request_id: requestId,
        kind: error.kind,
        reason: error.message,
      })
    );
  }

  private _storePairwise(done: EstablishedConnection): void {
    this._agent.wallet.createPairwise({
      myDid: done.myDid,
      theirDid: done.peer.did,
      theirVerkey: done.peer.verkey,
      theirEndpoint: done.peer.endpoint,
      label: done.label,
    });
    this._log.info(`Connection established with ${done.peer.did}`);
  }

  private async _notifyEstablished(done: EstablishedConnection): Promise<void> {
    await this._agent.sendAdminMessage(
      buildAdminMessage("connection_established", {
        their_did: done.peer.did,
        their_endpoint: done.peer.endpoint,
        my_did: done.myDid,
        label: done.label,
      })
    );
  }
}
