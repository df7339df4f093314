import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from "vitest";

import {
  DuplicateRegistrationError,
  EMPTY_CONTEXT,
  Message,
  SecureEnvelope,
  WalletUnavailableError,
  deserialize,
  familyIdentifier,
  messageType,
  serialize,
  sodiumReady,
  utf8Encode,
} from "../../src/protocol/index.js";
import { Agent } from "../../src/sdk/agent.js";
import { AgentConfig } from "../../src/sdk/config.js";
import { LogLevel, Logger } from "../../src/sdk/logger.js";
import { AdminModule, STATE_REQUEST_TYPE, STATE_TYPE } from "../../src/sdk/modules/admin.js";
import { MessageTypeRouter, type AgentModule } from "../../src/sdk/router.js";
import { SodiumCryptoProvider } from "../../src/sdk/sodium-provider.js";
import { LoopbackTransport } from "../../src/sdk/transport/loopback.js";
import { MEMORY_WALLET, Wallet } from "../../src/sdk/wallet.js";

const ECHO_FAMILY = familyIdentifier("echo", "1.0");
const ECHO = messageType(ECHO_FAMILY, "echo");
const FAIL = messageType(ECHO_FAMILY, "fail");
const SILENT = messageType(ECHO_FAMILY, "silent");

class EchoModule implements AgentModule {
  readonly family = ECHO_FAMILY;
  readonly seen: Message[] = [];
  private readonly _router = new MessageTypeRouter(ECHO_FAMILY);

  constructor() {
    this._router.register(ECHO, async (m) => {
      this.seen.push(m);
      return Message.create(messageType(ECHO_FAMILY, "echoed"), { text: m.getString("text") ?? "" });
    });
    this._router.register(SILENT, async (m) => {
      this.seen.push(m);
      return null;
    });
    this._router.register(FAIL, async () => {
      throw new Error("handler exploded");
    });
  }

  route(message: Message): Promise<Message | null> {
    return this._router.route(message);
  }
}

let transport: LoopbackTransport;
let agent: Agent;

function makeAgent(logger?: Logger): Agent {
  const config = new AgentConfig({ name: "alice", hostname: "alice.test", logLevel: "none" });
  return new Agent(config, { transport, logger });
}

function wire(type: string, fields: Record<string, string> = {}): Uint8Array {
  return serialize(Message.create(type, fields));
}

/** Next admin message, as plaintext. */
async function nextAdmin(a: Agent): Promise<Message> {
  const received = await a.adminOutbound.receive(1_000);
  if (received.kind !== "item") throw new Error(`admin queue ${received.kind}`);
  return deserialize(received.item);
}

beforeAll(async () => {
  await sodiumReady;
});

beforeEach(async () => {
  transport = new LoopbackTransport();
  agent = makeAgent();
  await agent.connectWallet("alice", "test-secret", false, MEMORY_WALLET);
});

afterEach(() => {
  agent.stop();
  agent.disconnectWallet();
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// Wallet
// ---------------------------------------------------------------------------

describe("Agent wallet", () => {
  it("is initialized once connected", () => {
    expect(agent.initialized).toBe(true);
    expect(agent.owner).toBe("alice");
    expect(typeof agent.endpointVerkey).toBe("string");
    expect(agent.endpoint).toBe("http://alice.test/indy");
  });

  it("forgets everything on disconnect", () => {
    agent.disconnectWallet();
    expect(agent.initialized).toBe(false);
    expect(agent.owner).toBeNull();
    expect(agent.endpointVerkey).toBeNull();
    expect(() => agent.wallet).toThrow(WalletUnavailableError);
  });

  it("requires a passphrase", async () => {
    const other = makeAgent();
    await expect(other.connectWallet("bob", null, false, MEMORY_WALLET)).rejects.toThrow(
      "A wallet passphrase is required"
    );
  });
});

// ---------------------------------------------------------------------------
// Modules
// ---------------------------------------------------------------------------

describe("Agent modules", () => {
  it("registers a module under its family", () => {
    const echo = agent.registerModule(() => new EchoModule());
    expect(agent.families).toEqual([ECHO_FAMILY]);
    expect(agent.getModule(EchoModule)).toBe(echo);
    expect(agent.getModule(AdminModule)).toBeNull();
  });

  it("refuses a second module for a family", () => {
    agent.registerModule(() => new EchoModule());
    expect(() => agent.registerModule(() => new EchoModule())).toThrow(DuplicateRegistrationError);
  });
});

// ---------------------------------------------------------------------------
// Processing loop
// ---------------------------------------------------------------------------

describe("Agent processing", () => {
  it("handles a plaintext message with an empty context", async () => {
    const echo = agent.registerModule(() => new EchoModule());
    agent.deliver(wire(SILENT));

    expect(await agent.handleIncoming(100)).toBe("handled");
    expect(echo.seen).toHaveLength(1);
    expect(echo.seen[0].context).toEqual(EMPTY_CONTEXT);
  });

  it("reports an empty queue as idle", async () => {
    expect(await agent.handleIncoming(10)).toBe("idle");
  });

  it("drops bad messages without affecting the next one", async () => {
    const echo = agent.registerModule(() => new EchoModule());
    agent.deliver(utf8Encode("garbage"));
    agent.deliver(wire(messageType(familyIdentifier("nobody", "1.0"), "x")));
    agent.deliver(wire(FAIL));
    agent.deliver(wire(SILENT));

    expect(await agent.handleIncoming(100)).toBe("dropped");
    expect(await agent.handleIncoming(100)).toBe("dropped");
    expect(await agent.handleIncoming(100)).toBe("dropped");
    expect(await agent.handleIncoming(100)).toBe("handled");
    expect(echo.seen).toHaveLength(1);
  });

  it("logs why a message was dropped", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logged = makeAgent(new Logger("didwire", LogLevel.WARN));
    logged.deliver(utf8Encode('{"no":"type"}'));

    expect(await logged.handleIncoming(100)).toBe("dropped");
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toBe(
      "[didwire:agent] WARN Dropping malformed message: Wallet is not connected: " +
        "Message has no string '@type'; raw: {\"no\":\"type\"}"
    );
  });

  it("sends replies without a known sender to the admin queue", async () => {
    agent.registerModule(() => new EchoModule());
    agent.deliver(wire(ECHO, { text: "hi" }));
    await agent.handleIncoming(100);

    const reply = await nextAdmin(agent);
    expect(reply.type).toBe(messageType(ECHO_FAMILY, "echoed"));
    expect(reply.getString("text")).toBe("hi");
  });

  it("runs until stopped", async () => {
    const echo = agent.registerModule(() => new EchoModule());
    const loop = agent.start();
    expect(agent.running).toBe(true);
    await expect(agent.start()).rejects.toThrow("Agent is already running");

    agent.deliver(wire(SILENT));
    await vi.waitFor(() => expect(echo.seen).toHaveLength(1));
    agent.stop();
    await loop;
    expect(agent.running).toBe(false);
    expect(agent.deliver(wire(SILENT))).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Admin
// ---------------------------------------------------------------------------

describe("Agent admin", () => {
  it("answers a state request", async () => {
    agent.registerModule((a) => new AdminModule(a));
    agent.deliver(wire(STATE_REQUEST_TYPE));
    await agent.handleIncoming(100);

    const state = await nextAdmin(agent);
    expect(state.type).toBe(STATE_TYPE);
    expect(state.get("content")).toEqual({
      initialized: true,
      agent_name: "alice",
      invitations: [],
      pairwise_connections: [],
    });
  });

  it("reports an agent without a wallet as uninitialized", async () => {
    const bare = makeAgent();
    bare.registerModule((a) => new AdminModule(a));
    bare.deliver(wire(STATE_REQUEST_TYPE));
    expect(await bare.handleIncoming(100)).toBe("handled");

    const state = await nextAdmin(bare);
    expect(state.get("content")).toEqual({ initialized: false });
  });

  it("packs admin messages to the admin key", async () => {
    const adminWallet = Wallet.open(MEMORY_WALLET, "test-secret");
    const adminCrypto = new SodiumCryptoProvider(adminWallet);
    const adminKey = await adminCrypto.createKey();
    agent.setupAdmin(adminKey);

    await agent.sendAdminMessage(Message.create(STATE_TYPE, { "@id": "s1" }));
    const received = await agent.adminOutbound.receive(1_000);
    if (received.kind !== "item") throw new Error("no admin message");

    const opened = await new SecureEnvelope(adminCrypto, adminWallet).unpack(received.item);
    expect(opened.ok).toBe(true);
    if (!opened.ok) return;
    expect(opened.value.id).toBe("s1");
    expect(opened.value.context?.fromKey).toBe(agent.endpointVerkey);
    adminWallet.close();
  });

  it("answers a state request packed by the admin key", async () => {
    agent.registerModule((a) => new AdminModule(a));
    const adminWallet = Wallet.open(MEMORY_WALLET, "test-secret");
    const adminCrypto = new SodiumCryptoProvider(adminWallet);
    const adminKey = await adminCrypto.createKey();
    agent.setupAdmin(adminKey);

    const request = await new SecureEnvelope(adminCrypto, adminWallet).pack(
      Message.create(STATE_REQUEST_TYPE),
      [agent.endpointVerkey ?? ""],
      adminKey
    );
    agent.deliver(request);
    expect(await agent.handleIncoming(100)).toBe("handled");

    const received = await agent.adminOutbound.receive(1_000);
    if (received.kind !== "item") throw new Error("no admin message");
    const opened = await new SecureEnvelope(adminCrypto, adminWallet).unpack(received.item);
    expect(opened.ok && opened.value.type).toBe(STATE_TYPE);
    expect(transport.sent).toEqual([]);
    adminWallet.close();
  });

  it("ignores a state request packed by another key", async () => {
    agent.registerModule((a) => new AdminModule(a));
    const otherWallet = Wallet.open(MEMORY_WALLET, "test-secret");
    const otherCrypto = new SodiumCryptoProvider(otherWallet);
    const otherKey = await otherCrypto.createKey();

    const request = await new SecureEnvelope(otherCrypto, otherWallet).pack(
      Message.create(STATE_REQUEST_TYPE),
      [agent.endpointVerkey ?? ""],
      otherKey
    );
    agent.deliver(request);
    expect(await agent.handleIncoming(100)).toBe("handled");

    expect((await agent.adminOutbound.receive(50)).kind).toBe("timeout");
    expect(transport.sent).toEqual([]);
    otherWallet.close();
  });
});

// ---------------------------------------------------------------------------
// Outbound
// ---------------------------------------------------------------------------

describe("Agent outbound", () => {
  it("returns the receiver's status", async () => {
    const status = await agent.sendMessageToEndpointAndKey(
      agent.endpointVerkey ?? "",
      "http://nowhere.test/indy",
      Message.create(ECHO)
    );
    expect(status).toBe(404);
  });
});
