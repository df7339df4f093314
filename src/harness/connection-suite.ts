/**
 * Connection-protocol conformance scenarios.
 *
 * The suite plays the peer of an agent under test: it owns a wallet, an
 * endpoint on a shared transport and an inbox, and drives one handshake
 * role while the tested agent drives the other. The tested agent is reached
 * only through wire messages and a small driver for out-of-band steps
 * (pasting an invitation, asking for one).
 */

import {
  ACCEPTED_STATUS,
  CONNECTION_FIELD,
  MalformedMessageError,
  SecureEnvelope,
  buildRequest,
  err,
  ok,
  sodiumReady,
  type JsonObject,
  type Message,
} from "../protocol/index.js";
import {
  InviteeHandshake,
  InviterHandshake,
  type EstablishedConnection,
  type HandshakeDeps,
} from "../sdk/handshake.js";
import { AsyncQueue } from "../sdk/queue.js";
import { SodiumCryptoProvider } from "../sdk/sodium-provider.js";
import type { TransportBase } from "../sdk/transport/base.js";
import type { LoopbackTransport } from "../sdk/transport/loopback.js";
import { MEMORY_WALLET, Wallet } from "../sdk/wallet.js";
import { HarnessFailure, expectMessage, expectSilence, type Expectation } from "./expect.js";

export const SUITE_LABEL = "conformance-suite";
export const DEFAULT_TIMEOUT_MS = 5_000;

/** Out-of-band actions on the agent under test. */
export interface TestedAgentDriver {
  /** Hand the tested agent an invitation URL to accept. */
  acceptInvite(url: string): Promise<void>;
  /** Have the tested agent issue an invitation; resolves with its URL. */
  createInvite(): Promise<string>;
}

export interface ScenarioOptions {
  timeoutMs?: number;
}

export class SuiteContext {
  readonly wallet: Wallet;
  readonly crypto: SodiumCryptoProvider;
  readonly envelope: SecureEnvelope;
  readonly transport: TransportBase;
  readonly endpoint: string;
  readonly inbox = new AsyncQueue<Uint8Array>();

  private constructor(wallet: Wallet, transport: TransportBase, endpoint: string) {
    this.wallet = wallet;
    this.crypto = new SodiumCryptoProvider(wallet);
    this.envelope = new SecureEnvelope(this.crypto, wallet);
    this.transport = transport;
    this.endpoint = endpoint;
  }

  /**
   * In-memory suite wallet with `endpoint` attached to `transport`.
   */
  static async create(
    transport: LoopbackTransport,
    endpoint: string = "http://conformance-suite/indy"
  ): Promise<SuiteContext> {
    await sodiumReady;
    const ctx = new SuiteContext(Wallet.open(MEMORY_WALLET, "suite"), transport, endpoint);
    transport.attach(endpoint, (wire) => {
      ctx.inbox.put(wire);
    });
    return ctx;
  }

  get deps(): HandshakeDeps {
    return {
      crypto: this.crypto,
      envelope: this.envelope,
      transport: this.transport,
      endpoint: this.endpoint,
    };
  }

  /**
   * Unpack a received message, failing unless it was encrypted to
   * `expectedToVerkey`.
   */
  async unpack(wire: Uint8Array, expectedToVerkey: string): Promise<Expectation<Message>> {
    const unpacked = await this.envelope.unpack(wire);
    if (!unpacked.ok) {
      return err(new HarnessFailure(`Could not unpack message: ${unpacked.error.error.message}`));
    }
    const toKey = unpacked.value.context?.toKey ?? null;
    if (toKey !== expectedToVerkey) {
      return err(
        new HarnessFailure(`Message addressed to ${toKey ?? "nobody"}, expected ${expectedToVerkey}`)
      );
    }
    return ok(unpacked.value);
  }

  close(): void {
    this.inbox.close();
    this.wallet.close();
  }
}

/**
 * The suite invites; the tested agent must send a valid Request to the
 * invitation key.
 */
export async function connectionStartedBySuite(
  ctx: SuiteContext,
  driver: TestedAgentDriver,
  options: ScenarioOptions = {}
): Promise<Expectation<EstablishedConnection>> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const inviter = new InviterHandshake(ctx.deps);
  const issued = await inviter.issueInvite(SUITE_LABEL);
  inviter.open();

  await driver.acceptInvite(issued.url);

  const wire = await expectMessage(ctx.inbox, timeoutMs);
  if (!wire.ok) return wire;
  const request = await ctx.unpack(wire.value, issued.connectionKey);
  if (!request.ok) return request;

  const result = await inviter.handleRequest(request.value);
  if (!result.ok) {
    return err(new HarnessFailure(`Invalid connection request: ${result.error.message}`));
  }
  if (result.value.status !== ACCEPTED_STATUS) {
    return err(new HarnessFailure(`Tested agent answered the response with ${result.value.status}`));
  }
  return ok(result.value);
}

/**
 * The tested agent invites; its Response to the suite's Request must verify.
 */
export async function connectionStartedByTestedAgent(
  ctx: SuiteContext,
  driver: TestedAgentDriver,
  options: ScenarioOptions = {}
): Promise<Expectation<EstablishedConnection>> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const invitee = new InviteeHandshake(ctx.deps);

  const parsed = invitee.parseInvite(await driver.createInvite());
  if (!parsed.ok) {
    return err(new HarnessFailure(`Invalid invitation: ${parsed.error.message}`));
  }
  const sent = await invitee.sendRequest(SUITE_LABEL);
  if (!sent.ok) {
    return err(new HarnessFailure(sent.error.message));
  }

  const wire = await expectMessage(ctx.inbox, timeoutMs);
  if (!wire.ok) return wire;
  const response = await ctx.unpack(wire.value, invitee.myVerkey ?? "");
  if (!response.ok) return response;

  const result = await invitee.handleResponse(response.value);
  if (!result.ok) {
    return err(new HarnessFailure(`Invalid connection response: ${result.error.message}`));
  }
  return ok(result.value);
}

/**
 * A Request without a DID document must go unanswered. Resolves with the
 * silent wait on success.
 */
export async function badConnectionRequest(
  ctx: SuiteContext,
  driver: TestedAgentDriver,
  options: ScenarioOptions = {}
): Promise<Expectation<number>> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const invitee = new InviteeHandshake(ctx.deps);
  const parsed = invitee.parseInvite(await driver.createInvite());
  if (!parsed.ok) {
    return err(new HarnessFailure(`Invalid invitation: ${parsed.error.message}`));
  }
  const invite = parsed.value;

  const me = await ctx.crypto.createLocalIdentity();
  const request = withoutDIDDoc(buildRequest(SUITE_LABEL, me.did, me.verkey, ctx.endpoint));
  const wire = await ctx.envelope.pack(request, [invite.recipientKeys[0]], me.verkey);
  const status = await ctx.transport.send(invite.serviceEndpoint, wire);
  if (status !== ACCEPTED_STATUS) {
    return err(new HarnessFailure(`Tested agent answered the request with ${status}`));
  }
  return expectSilence(ctx.inbox, timeoutMs);
}

function withoutDIDDoc(request: Message): Message {
  const connection = request.getObject(CONNECTION_FIELD);
  if (connection === undefined) {
    throw new MalformedMessageError("Request has no connection block");
  }
  const stripped: JsonObject = { ...connection };
  delete stripped["DIDDoc"];
  return request.set(CONNECTION_FIELD, stripped);
}
