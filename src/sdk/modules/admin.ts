/**
 * admin/1.0 -- messages between the agent and its admin UI.
 *
 * Inbound: `state_request`. Outbound: `state`, plus notifications other
 * modules raise (`connection_established`, `connection_failed`,
 * `message_received`).
 *
 * Answers only ever go to the admin queue. A request packed by any key other
 * than the admin key came from a peer and is ignored.
 */

import {
  Message,
  familyIdentifier,
  messageType,
  type JsonObject,
} from "../../protocol/index.js";
import type { Agent } from "../agent.js";
import type { Logger } from "../logger.js";
import { MessageTypeRouter, type AgentModule } from "../router.js";
import { INVITATION_RECORD } from "./records.js";

export const ADMIN_FAMILY = familyIdentifier("admin", "1.0");
export const STATE_REQUEST_TYPE = messageType(ADMIN_FAMILY, "state_request");
export const STATE_TYPE = messageType(ADMIN_FAMILY, "state");
export const CONNECTION_ESTABLISHED_TYPE = messageType(ADMIN_FAMILY, "connection_established");
export const CONNECTION_FAILED_TYPE = messageType(ADMIN_FAMILY, "connection_failed");
export const MESSAGE_RECEIVED_TYPE = messageType(ADMIN_FAMILY, "message_received");

export function buildAdminMessage(name: string, fields: JsonObject = {}): Message {
  return Message.create(messageType(ADMIN_FAMILY, name), fields);
}

export class AdminModule implements AgentModule {
  readonly family = ADMIN_FAMILY;
  private readonly _agent: Agent;
  private readonly _log: Logger;
  private readonly _router = new MessageTypeRouter(ADMIN_FAMILY);

  constructor(agent: Agent) {
    this._agent = agent;
    this._log = agent.logger.child("admin");
    this._router.register(STATE_REQUEST_TYPE, async () => {
      await this._agent.sendAdminMessage(this.state());
      return null;
    });
  }

  async route(message: Message): Promise<Message | null> {
    const fromKey = message.context?.fromKey ?? null;
    if (fromKey !== null && fromKey !== this._agent.adminKey) {
      this._log.warn(`Ignoring ${message.type} from non-admin key ${fromKey}`);
      return null;
    }
    return this._router.route(message);
  }

  /** Snapshot of the agent for the admin UI. */
  state(): Message {
    const agent = this._agent;
    if (!agent.initialized) {
      return Message.create(STATE_TYPE, { content: { initialized: false } });
    }
    const wallet = agent.wallet;
    const invitations = wallet.listRecords(INVITATION_RECORD).map(
      (r): JsonObject => ({ connection_key: r.id, ...r.value })
    );
    const pairwise = wallet.listPairwise().map(
      (p): JsonObject => ({
        their_did: p.theirDid,
        my_did: p.myDid,
        their_verkey: p.theirVerkey,
        their_endpoint: p.theirEndpoint,
        label: p.label ?? null,
      })
    );
    return Message.create(STATE_TYPE, {
      content: {
        initialized: true,
        agent_name: agent.owner,
        invitations,
        pairwise_connections: pairwise,
      },
    });
  }
}
