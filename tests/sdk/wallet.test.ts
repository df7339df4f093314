import { existsSync, mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { describe, it, expect, beforeAll, beforeEach, afterEach } from "vitest";

import {
  WalletUnavailableError,
  encodeVerkey,
  generateKeypair,
  sodiumReady,
} from "../../src/protocol/index.js";
import { MEMORY_WALLET, Wallet } from "../../src/sdk/wallet.js";

let tmpDir: string;
let path: string;

beforeAll(async () => {
  await sodiumReady;
});

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), "didwire-wallet-"));
  path = join(tmpDir, "wallets", "alice-wallet.db");
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// Lifecycle
// ---------------------------------------------------------------------------

describe("wallet lifecycle", () => {
  it("creates a wallet once", () => {
    expect(Wallet.create(path, "test-secret")).toEqual({ ok: true, value: "created" });
    expect(existsSync(path)).toBe(true);
    expect(Wallet.create(path, "test-secret")).toEqual({ ok: true, value: "already-exists" });
  });

  it("opens with the right passphrase only", () => {
    Wallet.create(path, "test-secret");
    const wallet = Wallet.open(path, "test-secret");
    expect(wallet.isOpen).toBe(true);
    wallet.close();
    expect(wallet.isOpen).toBe(false);

    expect(() => Wallet.open(path, "wrong-secret")).toThrow("Invalid wallet passphrase");
  });

  it("refuses to open a missing wallet", () => {
    expect(() => Wallet.open(path, "test-secret")).toThrow(WalletUnavailableError);
  });

  it("deletes a wallet", () => {
    Wallet.create(path, "test-secret");
    expect(Wallet.delete(path)).toEqual({ ok: true, value: "deleted" });
    expect(existsSync(path)).toBe(false);
    expect(Wallet.delete(path)).toEqual({ ok: true, value: "not-found" });
  });

  it("throws once closed", () => {
    const wallet = Wallet.open(MEMORY_WALLET, "test-secret");
    wallet.close();
    expect(() => wallet.listPairwise()).toThrow("Wallet is closed");
  });
});

// ---------------------------------------------------------------------------
// Keys and DIDs
// ---------------------------------------------------------------------------

describe("wallet keys", () => {
  it("persists keys across reopen", () => {
    Wallet.create(path, "test-secret");
    const kp = generateKeypair();
    const verkey = encodeVerkey(kp.verifyKey);

    const first = Wallet.open(path, "test-secret");
    first.storeKey(verkey, kp);
    first.close();

    const second = Wallet.open(path, "test-secret");
    expect(second.hasKey(verkey)).toBe(true);
    expect(second.getKeypair(verkey)?.verifyKey).toEqual(kp.verifyKey);
    expect(second.getKeypair("unknown")).toBeNull();
    second.close();
  });

  it("maps verkeys to DIDs, preferring our own", async () => {
    const wallet = Wallet.open(MEMORY_WALLET, "test-secret");
    wallet.storeTheirDid("their-did", "shared-key");
    wallet.storeMyDid("my-did", "shared-key");
    wallet.storeTheirDid("peer-did", "peer-key");

    expect(await wallet.verkeyToDid("shared-key")).toBe("my-did");
    expect(await wallet.verkeyToDid("peer-key")).toBe("peer-did");
    expect(await wallet.verkeyToDid("nobody")).toBeNull();
    expect(await wallet.localKeyForDid("my-did")).toBe("shared-key");
    await expect(wallet.localKeyForDid("peer-did")).rejects.toThrow(
      "No local DID 'peer-did' in wallet"
    );
    wallet.close();
  });
});

// ---------------------------------------------------------------------------
// Pairwise
// ---------------------------------------------------------------------------

describe("wallet pairwise", () => {
  it("stores relationships and the peer DID", async () => {
    const wallet = Wallet.open(MEMORY_WALLET, "test-secret");
    const info = {
      myDid: "my-did",
      theirDid: "their-did",
      theirVerkey: "their-key",
      theirEndpoint: "http://bob.test/indy",
      label: "bob",
    };
    wallet.createPairwise(info);

    expect(wallet.hasPairwise("their-did")).toBe(true);
    expect(await wallet.pairwiseInfo("their-did")).toEqual(info);
    expect(wallet.listPairwise()).toEqual([info]);
    expect(await wallet.verkeyToDid("their-key")).toBe("their-did");
    await expect(wallet.pairwiseInfo("stranger")).rejects.toThrow(
      "No pairwise relationship with 'stranger'"
    );
    wallet.close();
  });

  it("refuses a peer DID that is one of ours", async () => {
    const wallet = Wallet.open(MEMORY_WALLET, "test-secret");
    wallet.storeMyDid("my-did", "my-key");
    expect(wallet.isLocalDid("my-did")).toBe(true);
    expect(wallet.isLocalDid("their-did")).toBe(false);

    expect(() =>
      wallet.createPairwise({
        myDid: "other-did",
        theirDid: "my-did",
        theirVerkey: "their-key",
        theirEndpoint: "http://bob.test/indy",
      })
    ).toThrow("Refusing to store local DID 'my-did' as a peer DID");
    expect(await wallet.localKeyForDid("my-did")).toBe("my-key");
    expect(wallet.hasPairwise("my-did")).toBe(false);
    wallet.close();
  });
});

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

describe("wallet records", () => {
  it("adds, updates, lists and deletes", () => {
    const wallet = Wallet.open(MEMORY_WALLET, "test-secret");
    wallet.addRecord("note", "b", { n: 1 });
    wallet.addRecord("note", "a", { n: 2 });
    wallet.addRecord("other", "a", { n: 3 });

    expect(() => wallet.addRecord("note", "a", { n: 4 })).toThrow();

    wallet.updateRecord("note", "b", { n: 10 });
    expect(wallet.getRecord("note", "b")).toEqual({ type: "note", id: "b", value: { n: 10 } });
    expect(wallet.listRecords("note").map((r) => r.id)).toEqual(["b", "a"]);

    expect(wallet.deleteRecord("note", "b")).toBe(true);
    expect(wallet.deleteRecord("note", "b")).toBe(false);
    expect(wallet.getRecord("note", "b")).toBeNull();
    expect(wallet.listRecords("other")).toHaveLength(1);
    wallet.close();
  });
});
