import { describe, it, expect, beforeAll, beforeEach, afterEach } from "vitest";

import {
  EMPTY_CONTEXT,
  Message,
  SecureEnvelope,
  b64Decode,
  b64Encode,
  serialize,
  sodiumReady,
  utf8Decode,
  utf8Encode,
  wireExcerpt,
  type LocalIdentity,
} from "../../src/protocol/index.js";
import { SodiumCryptoProvider } from "../../src/sdk/sodium-provider.js";
import { MEMORY_WALLET, Wallet } from "../../src/sdk/wallet.js";

const PING = "did:sov:BzCbsNYhMrjHiqZDTUASHg;spec/trust_ping/1.0/ping";

interface Party {
  wallet: Wallet;
  crypto: SodiumCryptoProvider;
  envelope: SecureEnvelope;
  me: LocalIdentity;
}

async function party(): Promise<Party> {
  const wallet = Wallet.open(MEMORY_WALLET, "test-secret");
  const crypto = new SodiumCryptoProvider(wallet);
  const me = await crypto.createLocalIdentity();
  return { wallet, crypto, envelope: new SecureEnvelope(crypto, wallet), me };
}

let alice: Party;
let bob: Party;

beforeAll(async () => {
  await sodiumReady;
});

beforeEach(async () => {
  alice = await party();
  bob = await party();
});

afterEach(() => {
  alice.wallet.close();
  bob.wallet.close();
});

// ---------------------------------------------------------------------------
// Plaintext path
// ---------------------------------------------------------------------------

describe("plaintext messages", () => {
  it("unpack with an all-null context", async () => {
    const msg = Message.create(PING, { "@id": "p1", comment: "hi" });
    const result = await bob.envelope.unpack(serialize(msg));
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.toJSON()).toEqual(msg.toJSON());
    expect(result.value.context).toEqual(EMPTY_CONTEXT);
  });

  it("accept a string", async () => {
    const result = await bob.envelope.unpack(`{"@type":"${PING}","@id":"p2"}`);
    expect(result.ok && result.value.id).toBe("p2");
  });
});

// ---------------------------------------------------------------------------
// Encrypted path
// ---------------------------------------------------------------------------

describe("encrypted envelopes", () => {
  it("authcrypt carries the sender key to the recipient", async () => {
    const msg = Message.create(PING, { "@id": "p1" });
    const wire = await alice.envelope.pack(msg, [bob.me.verkey], alice.me.verkey);

    const result = await bob.envelope.unpack(wire);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.toJSON()).toEqual(msg.toJSON());
    expect(result.value.context).toEqual({
      fromDid: null,
      toDid: bob.me.did,
      fromKey: alice.me.verkey,
      toKey: bob.me.verkey,
    });
  });

  it("resolves the sender DID when the recipient knows it", async () => {
    bob.wallet.storeTheirDid(alice.me.did, alice.me.verkey);
    const wire = await alice.envelope.pack(Message.create(PING), [bob.me.verkey], alice.me.verkey);

    const result = await bob.envelope.unpack(wire);
    expect(result.ok && result.value.context?.fromDid).toBe(alice.me.did);
  });

  it("anoncrypt hides the sender", async () => {
    const wire = await alice.envelope.pack(Message.create(PING), [bob.me.verkey]);

    const result = await bob.envelope.unpack(wire);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.context?.fromKey).toBeNull();
    expect(result.value.context?.fromDid).toBeNull();
    expect(result.value.context?.toKey).toBe(bob.me.verkey);
  });

  it("writes the documented wire layout", async () => {
    const wire = await alice.envelope.pack(Message.create(PING), [bob.me.verkey], alice.me.verkey);
    const outer = JSON.parse(utf8Decode(wire));
    expect(Object.keys(outer)).toEqual(["protected", "iv", "ciphertext", "tag"]);

    const header = JSON.parse(utf8Decode(b64Decode(outer.protected)));
    expect(header.enc).toBe("xchacha20poly1305_ietf");
    expect(header.typ).toBe("JWM/1.0");
    expect(header.alg).toBe("Authcrypt");
    expect(header.recipients).toHaveLength(1);
    expect(header.recipients[0].header.kid).toBe(bob.me.verkey);
    expect(typeof header.recipients[0].header.sender).toBe("string");
  });

  it("refuses to pack for nobody", async () => {
    await expect(alice.envelope.pack(Message.create(PING), [])).rejects.toThrow(
      "Envelope needs at least one recipient"
    );
  });
});

// ---------------------------------------------------------------------------
// Failures
// ---------------------------------------------------------------------------

describe("unpack failures", () => {
  it("report bytes that are neither message nor envelope", async () => {
    const result = await bob.envelope.unpack(utf8Encode("not an envelope"));
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.error.kind).toBe("MalformedWireBytes");
    expect(result.error.excerpt).toBe("not an envelope");
  });

  it("report JSON that is not an envelope", async () => {
    const result = await bob.envelope.unpack('{"hello":"world"}');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.error.message).toBe("Not an agent-wire envelope");
  });

  it("report an envelope for someone else", async () => {
    const carol = await party();
    const wire = await alice.envelope.pack(Message.create(PING), [carol.me.verkey], alice.me.verkey);
    carol.wallet.close();

    const result = await bob.envelope.unpack(wire);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.error.message).toBe("Envelope is not addressed to any key in this wallet");
  });

  it("report a tampered tag", async () => {
    const wire = await alice.envelope.pack(Message.create(PING), [bob.me.verkey], alice.me.verkey);
    const outer = JSON.parse(utf8Decode(wire));
    outer.tag = b64Encode(new Uint8Array(16));

    const result = await bob.envelope.unpack(JSON.stringify(outer));
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.error.kind).toBe("MalformedWireBytes");
    expect(result.error.error.message.startsWith("Envelope failed to decrypt")).toBe(true);
  });
});

describe("wireExcerpt", () => {
  it("keeps short input whole", () => {
    expect(wireExcerpt("abc")).toBe("abc");
  });

  it("truncates long input to 200 characters", () => {
    expect(wireExcerpt("x".repeat(300))).toBe("x".repeat(200) + "...");
  });
});
