/**
 * Agent -- owns the wallet, routing table and queues, and runs the
 * single-consumer processing loop.
 *
 *   deliver(bytes) -> inbound queue -> unpack -> FamilyRouter -> handler
 *                                                   |
 *                          reply -> pairwise peer or admin queue
 *
 * One message is processed at a time; a failing message is logged and
 * dropped without affecting the ones behind it.
 */

import {
  ACCEPTED_STATUS,
  AgentError,
  EMPTY_CONTEXT,
  MalformedWireBytesError,
  UnroutableMessageError,
  SecureEnvelope,
  deserialize,
  err,
  errorMessage,
  ok,
  serialize,
  sodiumReady,
  wireExcerpt,
  WalletUnavailableError,
  type Message,
  type Result,
  type UnpackFailure,
} from "../protocol/index.js";
import { AgentConfig, walletPathFor } from "./config.js";
import type { HandshakeDeps } from "./handshake.js";
import { Logger } from "./logger.js";
import { AsyncQueue } from "./queue.js";
import { FamilyRouter, type AgentModule } from "./router.js";
import { SodiumCryptoProvider } from "./sodium-provider.js";
import type { TransportBase } from "./transport/base.js";
import { HTTPTransport } from "./transport/http.js";
import { Wallet } from "./wallet.js";

export type ModuleFactory<M extends AgentModule = AgentModule> = (agent: Agent) => M;

/** What one turn of the processing loop did. */
export type IncomingOutcome = "handled" | "dropped" | "idle" | "closed";

export interface AgentOptions {
  transport?: TransportBase;
  logger?: Logger;
}

const AGENT_RECORD = "agent";
const ENDPOINT_KEY_ID = "endpoint_verkey";

export class Agent {
  readonly config: AgentConfig;
  readonly transport: TransportBase;
  readonly logger: Logger;
  /** Raw wire bytes waiting to be processed. */
  readonly inbound = new AsyncQueue<Uint8Array>();
  /** Messages for the admin UI, drained by the admin socket. */
  readonly adminOutbound = new AsyncQueue<Uint8Array>();

  private readonly _log: Logger;
  private readonly _router = new FamilyRouter();
  private readonly _modules: AgentModule[] = [];
  private _wallet: Wallet | null = null;
  private _crypto: SodiumCryptoProvider | null = null;
  private _envelope: SecureEnvelope | null = null;
  private _owner: string | null = null;
  private _endpointVerkey: string | null = null;
  private _adminKey: string | null = null;
  private _running: boolean = false;

  constructor(config: AgentConfig, options: AgentOptions = {}) {
    this.config = config;
    this.transport = options.transport ?? new HTTPTransport();
    this.logger = options.logger ?? new Logger("didwire", config.logLevel);
    this._log = this.logger.child("agent");
    this._adminKey = config.adminKey;
  }

  // -- Properties ----------------------------------------------------------

  get initialized(): boolean {
    return this._wallet !== null;
  }

  /** Name the open wallet belongs to. */
  get owner(): string | null {
    return this._owner;
  }

  get endpoint(): string {
    return this.config.endpoint;
  }

  /** Long-lived key this agent signs admin traffic with. */
  get endpointVerkey(): string | null {
    return this._endpointVerkey;
  }

  get running(): boolean {
    return this._running;
  }

  get wallet(): Wallet {
    if (this._wallet === null) {
      throw new WalletUnavailableError("Wallet is not connected");
    }
    return this._wallet;
  }

  get crypto(): SodiumCryptoProvider {
    if (this._crypto === null) {
      throw new WalletUnavailableError("Wallet is not connected");
    }
    return this._crypto;
  }

  get envelope(): SecureEnvelope {
    if (this._envelope === null) {
      throw new WalletUnavailableError("Wallet is not connected");
    }
    return this._envelope;
  }

  /** Collaborators a handshake role runs on. */
  get handshakeDeps(): HandshakeDeps {
    return {
      crypto: this.crypto,
      envelope: this.envelope,
      transport: this.transport,
      endpoint: this.endpoint,
    };
  }

  // -- Wallet --------------------------------------------------------------

  /**
   * Create (if needed) and open the wallet for `name`. An ephemeral wallet
   * is deleted first so every run starts empty.
   *
   * @throws {WalletUnavailableError} If the wallet cannot be created or opened.
   */
  async connectWallet(
    name: string = this.config.name,
    passphrase: string | null = this.config.passphrase,
    ephemeral: boolean = this.config.ephemeral,
    path: string = walletPathFor(this.config.dataDir, name, ephemeral)
  ): Promise<void> {
    if (passphrase === null || passphrase === "") {
      throw new WalletUnavailableError("A wallet passphrase is required");
    }
    await sodiumReady;
    if (this._wallet !== null) {
      this.disconnectWallet();
    }

    if (ephemeral) {
      const removed = Wallet.delete(path);
      if (!removed.ok) throw removed.error;
    }
    const created = Wallet.create(path, passphrase);
    if (!created.ok) throw created.error;
    if (created.value === "already-exists") {
      this._log.debug(`Wallet ${path} already exists, opening it`);
    }

    const wallet = Wallet.open(path, passphrase);
    const crypto = new SodiumCryptoProvider(wallet);
    this._wallet = wallet;
    this._crypto = crypto;
    this._envelope = new SecureEnvelope(crypto, wallet);
    this._owner = name;

    const stored = wallet.getRecord(AGENT_RECORD, ENDPOINT_KEY_ID)?.value["verkey"];
    if (typeof stored === "string") {
      this._endpointVerkey = stored;
    } else {
      this._endpointVerkey = await crypto.createKey();
      wallet.addRecord(AGENT_RECORD, ENDPOINT_KEY_ID, { verkey: this._endpointVerkey });
    }
    this._log.info(`Wallet for '${name}' connected`);
  }

  disconnectWallet(): void {
    if (this._wallet !== null) {
      this._wallet.close();
      this._log.info(`Wallet for '${this._owner ?? ""}' disconnected`);
    }
    this._wallet = null;
    this._crypto = null;
    this._envelope = null;
    this._owner = null;
    this._endpointVerkey = null;
  }

  // -- Modules -------------------------------------------------------------

  /**
   * Instantiate a module against this agent and route its family to it.
   *
   * @throws {DuplicateRegistrationError} If the family is already taken.
   */
  registerModule<M extends AgentModule>(factory: ModuleFactory<M>): M {
    const module = factory(this);
    this._router.register(module.family, module);
    this._modules.push(module);
    return module;
  }

  /** The registered module of a given class, or null. */
  getModule<M extends AgentModule>(kind: abstract new (...args: never[]) => M): M | null {
    for (const module of this._modules) {
      if (module instanceof kind) return module;
    }
    return null;
  }

  get families(): string[] {
    return this._router.families;
  }

  // -- Inbound -------------------------------------------------------------

  /** Hand raw wire bytes to the processing loop. False once stopped. */
  deliver(wire: Uint8Array): boolean {
    return this.inbound.put(wire);
  }

  /**
   * Take one message off the inbound queue and process it. Never throws:
   * every failure is logged and the message dropped.
   */
  async handleIncoming(timeoutMs?: number): Promise<IncomingOutcome> {
    const next = await this.inbound.receive(timeoutMs);
    if (next.kind === "closed") return "closed";
    if (next.kind === "timeout") return "idle";

    const wire = next.item;
    try {
      const unpacked = await this._unpack(wire);
      if (!unpacked.ok) {
        this._log.warn(
          `Dropping malformed message: ${unpacked.error.error.message}; raw: ${unpacked.error.excerpt}`
        );
        return "dropped";
      }
      const message = unpacked.value;
      this._log.debug(`Processing ${message.type}`);

      const reply = await this._router.route(message);
      if (reply !== null) {
        await this._dispatchReply(message, reply);
      }
      return "handled";
    } catch (e) {
      if (e instanceof UnroutableMessageError) {
        this._log.warn(`Dropping unroutable message: ${e.message}; raw: ${wireExcerpt(wire)}`);
      } else {
        this._log.error(`Failed to process message: ${errorMessage(e)}; raw: ${wireExcerpt(wire)}`);
      }
      return "dropped";
    }
  }

  /**
   * Process messages in arrival order until `stop()` is called.
   */
  async start(): Promise<void> {
    if (this._running) {
      throw new AgentError("Agent is already running");
    }
    this._running = true;
    this._log.info("Processing loop started");
    try {
      while ((await this.handleIncoming()) !== "closed") {
        // one message per turn
      }
    } finally {
      this._running = false;
      this._log.info("Processing loop stopped");
    }
  }

  /** Close both queues; the loop finishes the message it is on and exits. */
  stop(): void {
    this.inbound.close();
    this.adminOutbound.close();
  }

  private async _unpack(wire: Uint8Array): Promise<Result<Message, UnpackFailure>> {
    if (this._envelope !== null) {
      return this._envelope.unpack(wire);
    }
    // Without a wallet only plaintext (admin) traffic can be read.
    try {
      return ok(deserialize(wire).attachContext(EMPTY_CONTEXT));
    } catch (e) {
      return err({
        error: new MalformedWireBytesError(`Wallet is not connected: ${errorMessage(e)}`),
        excerpt: wireExcerpt(wire),
      });
    }
  }

  private async _dispatchReply(received: Message, reply: Message): Promise<void> {
    const fromDid = received.context?.fromDid ?? null;
    if (fromDid !== null && this._wallet !== null && this._wallet.hasPairwise(fromDid)) {
      await this.sendMessageToAgent(fromDid, reply);
    } else {
      await this.sendAdminMessage(reply);
    }
  }

  // -- Outbound ------------------------------------------------------------

  /**
   * Send to a peer we have a pairwise relationship with.
   */
  async sendMessageToAgent(theirDid: string, message: Message): Promise<number> {
    const info = await this.wallet.pairwiseInfo(theirDid);
    const myVerkey = await this.wallet.localKeyForDid(info.myDid);
    return this.sendMessageToEndpointAndKey(info.theirVerkey, info.theirEndpoint, message, myVerkey);
  }

  /**
   * Pack for `theirVerkey` and send to `endpoint`. Without `myVerkey` the
   * envelope is anonymous. Returns the receiver's status.
   */
  async sendMessageToEndpointAndKey(
    theirVerkey: string,
    endpoint: string,
    message: Message,
    myVerkey?: string
  ): Promise<number> {
    const wire = await this.envelope.pack(message, [theirVerkey], myVerkey);
    const status = await this.transport.send(endpoint, wire);
    if (status !== ACCEPTED_STATUS) {
      this._log.warn(`Delivery of ${message.type} to ${endpoint} answered ${status}`);
    }
    return status;
  }

  // -- Admin ---------------------------------------------------------------

  /** Key of the admin UI; admin messages are packed to it when set. */
  setupAdmin(adminKey: string | null): void {
    this._adminKey = adminKey;
  }

  get adminKey(): string | null {
    return this._adminKey;
  }

  /**
   * Queue a message for the admin UI: packed to the admin key when both
   * keys are known, plain JSON otherwise.
   */
  async sendAdminMessage(message: Message): Promise<void> {
    let wire: Uint8Array;
    if (this._adminKey !== null && this._endpointVerkey !== null && this._envelope !== null) {
      wire = await this._envelope.pack(message, [this._adminKey], this._endpointVerkey);
    } else {
      wire = serialize(message);
    }
    if (!this.adminOutbound.put(wire)) {
      this._log.debug(`Admin queue closed, dropping ${message.type}`);
    }
  }
}
