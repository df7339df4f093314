import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from "vitest";

import {
  SuiteContext,
  badConnectionRequest,
  connectionStartedBySuite,
  connectionStartedByTestedAgent,
  type TestedAgentDriver,
} from "../../src/harness/index.js";
import { Message, sodiumReady } from "../../src/protocol/index.js";
import { Agent } from "../../src/sdk/agent.js";
import { AgentConfig } from "../../src/sdk/config.js";
import {
  ConnectionsModule,
  INVITATION_RECORD,
  registerDefaultModules,
} from "../../src/sdk/modules/index.js";
import { LoopbackTransport } from "../../src/sdk/transport/loopback.js";
import { MEMORY_WALLET } from "../../src/sdk/wallet.js";

let transport: LoopbackTransport;
let agent: Agent;
let loop: Promise<void>;
let ctx: SuiteContext;
let driver: TestedAgentDriver;

beforeAll(async () => {
  await sodiumReady;
});

beforeEach(async () => {
  transport = new LoopbackTransport();
  const config = new AgentConfig({ name: "alice", hostname: "alice.test", logLevel: "none" });
  agent = new Agent(config, { transport });
  await agent.connectWallet("alice", "test-secret", false, MEMORY_WALLET);
  registerDefaultModules(agent);
  transport.attach(agent.endpoint, (wire) => {
    agent.deliver(wire);
  });
  loop = agent.start();

  const connections = agent.getModule(ConnectionsModule);
  if (connections === null) throw new Error("connections module missing");
  driver = {
    async acceptInvite(url) {
      const accepted = await connections.acceptInvite(url);
      if (!accepted.ok) throw accepted.error;
    },
    async createInvite() {
      return (await connections.createInvite()).url;
    },
  };
  ctx = await SuiteContext.create(transport);
});

afterEach(async () => {
  agent.stop();
  await loop;
  agent.disconnectWallet();
  ctx.close();
});

describe("connection conformance", () => {
  it("connects when the suite invites", async () => {
    const result = await connectionStartedBySuite(ctx, driver, { timeoutMs: 1_000 });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.peer.endpoint).toBe("http://alice.test/indy");

    await vi.waitFor(() => expect(agent.wallet.listPairwise()).toHaveLength(1));
    const [pairwise] = agent.wallet.listPairwise();
    expect(pairwise.theirDid).toBe(result.value.myDid);
    expect(pairwise.label).toBe("conformance-suite");
  });

  it("connects when the tested agent invites", async () => {
    const result = await connectionStartedByTestedAgent(ctx, driver, { timeoutMs: 1_000 });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.label).toBe("alice");
    expect(result.value.peer.endpoint).toBe("http://alice.test/indy");
    await vi.waitFor(() =>
      expect(agent.wallet.listPairwise().map((p) => p.theirDid)).toEqual([result.value.myDid])
    );
  });

  it("gets no answer to a request without a DID document", async () => {
    const result = await badConnectionRequest(ctx, driver, { timeoutMs: 200 });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toBeGreaterThanOrEqual(200);
    expect(agent.wallet.listPairwise()).toEqual([]);
    expect(agent.wallet.listRecords(INVITATION_RECORD)).toHaveLength(1);
  });

  it("fails when the tested agent never sends a request", async () => {
    const silent: TestedAgentDriver = { ...driver, acceptInvite: async () => {} };
    const result = await connectionStartedBySuite(ctx, silent, { timeoutMs: 50 });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.reason).toBe("No message within 50ms");
  });

  it("fails on a message addressed to another key", async () => {
    const other = await ctx.crypto.createKey();
    const wire = await ctx.envelope.pack(Message.create("x;spec/a/1.0/b"), [other]);
    const result = await ctx.unpack(wire, "expected-key");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.reason).toBe(`Message addressed to ${other}, expected expected-key`);
  });
});
