/**
 * basicmessage/1.0 -- plain text messages between connected agents.
 *
 *   { @type, @id, ~l10n: { locale: "en" }, sent_time, content }
 */

import { z } from "zod";

import {
  MalformedMessageError,
  Message,
  err,
  familyIdentifier,
  messageType,
  ok,
  utcTimestamp,
  type Result,
} from "../../protocol/index.js";
import type { Agent } from "../agent.js";
import type { Logger } from "../logger.js";
import { MessageTypeRouter, type AgentModule } from "../router.js";
import { buildAdminMessage } from "./admin.js";
import { BASICMESSAGE_RECORD } from "./records.js";

export const BASICMESSAGE_FAMILY = familyIdentifier("basicmessage", "1.0");
export const BASICMESSAGE_TYPE = messageType(BASICMESSAGE_FAMILY, "message");

const BasicMessageSchema = z.object({
  "@type": z.literal(BASICMESSAGE_TYPE),
  "@id": z.string().min(1),
  "~l10n": z.object({ locale: z.string() }).nullable().optional(),
  sent_time: z.string().min(1),
  content: z.string(),
});

export type BasicMessage = z.infer<typeof BasicMessageSchema>;

export function buildBasicMessage(content: string, sentTime: string = utcTimestamp()): Message {
  return Message.create(BASICMESSAGE_TYPE, {
    "~l10n": { locale: "en" },
    sent_time: sentTime,
    content,
  });
}

export function validateBasicMessage(message: Message): Result<BasicMessage, MalformedMessageError> {
  const parsed = BasicMessageSchema.safeParse(message.toJSON());
  if (parsed.success) {
    return ok(parsed.data);
  }
  const issue = parsed.error.issues[0];
  return err(
    new MalformedMessageError(`Invalid basic message: ${issue.path.join(".") || "(root)"}: ${issue.message}`)
  );
}

export class BasicMessageModule implements AgentModule {
  readonly family = BASICMESSAGE_FAMILY;
  private readonly _agent: Agent;
  private readonly _log: Logger;
  private readonly _router = new MessageTypeRouter(BASICMESSAGE_FAMILY);

  constructor(agent: Agent) {
    this._agent = agent;
    this._log = agent.logger.child("basicmessage");
    this._router.register(BASICMESSAGE_TYPE, (m) => this._onMessage(m));
  }

  route(message: Message): Promise<Message | null> {
    return this._router.route(message);
  }

  /**
   * Send `content` to a connected peer and keep a copy in the wallet.
   * Resolves with the receiver's status.
   */
  async send(theirDid: string, content: string): Promise<number> {
    const message = buildBasicMessage(content);
    const status = await this._agent.sendMessageToAgent(theirDid, message);
    this._agent.wallet.addRecord(BASICMESSAGE_RECORD, message.id ?? "", {
      their_did: theirDid,
      direction: "sent",
      sent_time: message.getString("sent_time") ?? "",
      content,
    });
    return status;
  }

  private async _onMessage(message: Message): Promise<null> {
    const fromDid = message.context?.fromDid ?? null;
    if (fromDid === null) {
      this._log.warn("Ignoring basic message from an unknown sender");
      return null;
    }
    const checked = validateBasicMessage(message);
    if (!checked.ok) {
      this._log.warn(checked.error.message);
      return null;
    }

    const { "@id": id, sent_time, content } = checked.value;
    this._agent.wallet.addRecord(BASICMESSAGE_RECORD, id, {
      their_did: fromDid,
      direction: "received",
      sent_time,
      content,
    });
    await this._agent.sendAdminMessage(
      buildAdminMessage("message_received", { from: fromDid, sent_time, content })
    );
    return null;
  }
}
