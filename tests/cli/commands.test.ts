import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { connectionsCommand } from "../../src/cli/commands/connections.js";
import { inviteCommand } from "../../src/cli/commands/invite.js";
import { whoamiCommand } from "../../src/cli/commands/whoami.js";
import { findAgentName } from "../../src/cli/helpers.js";
import { parseInvite } from "../../src/protocol/index.js";

const ENV = {
  DIDWIRE_HOST: "alice.test",
  DIDWIRE_LOG_LEVEL: "none",
};

let tmpDir: string;
let saved: Record<string, string | undefined>;

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), "didwire-cli-"));
  saved = {};
  for (const [name, value] of Object.entries({ ...ENV, DIDWIRE_HOME: tmpDir })) {
    saved[name] = process.env[name];
    process.env[name] = value;
  }
  for (const name of ["DIDWIRE_PORT", "DIDWIRE_EPHEMERAL", "DIDWIRE_NAME", "DIDWIRE_PASSPHRASE"]) {
    saved[name] = process.env[name];
    delete process.env[name];
  }
});

afterEach(() => {
  for (const [name, value] of Object.entries(saved)) {
    if (value === undefined) delete process.env[name];
    else process.env[name] = value;
  }
  rmSync(tmpDir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// findAgentName
// ---------------------------------------------------------------------------

describe("findAgentName", () => {
  it("returns null when the directory is missing", () => {
    expect(findAgentName(join(tmpDir, "nope"))).toBeNull();
  });

  it("returns null when no wallet exists", () => {
    const dir = join(tmpDir, "wallets");
    mkdirSync(dir);
    writeFileSync(join(dir, "alice-ephemeral_wallet.db"), "");
    expect(findAgentName(dir)).toBeNull();
  });

  it("returns the first name alphabetically", () => {
    const dir = join(tmpDir, "wallets");
    mkdirSync(dir);
    writeFileSync(join(dir, "bob-wallet.db"), "");
    writeFileSync(join(dir, "alice-wallet.db"), "");
    expect(findAgentName(dir)).toBe("alice");
  });

  it("looks under DIDWIRE_HOME by default", () => {
    mkdirSync(join(tmpDir, "wallets"));
    writeFileSync(join(tmpDir, "wallets", "carol-wallet.db"), "");
    expect(findAgentName()).toBe("carol");
  });
});

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

describe("wallet commands", () => {
  it("create an invitation, then report identity and connections", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const options = { name: "alice", passphrase: "test-secret" };

    await inviteCommand({ ...options, label: "hello" });
    const url = String(log.mock.calls[0][0]);
    expect(url.startsWith("http://alice.test/indy?c_i=")).toBe(true);
    const invite = parseInvite(url);
    expect(invite.ok && invite.value.getString("label")).toBe("hello");

    log.mockClear();
    await whoamiCommand(options);
    const lines = log.mock.calls.map((c) => String(c[0]));
    expect(lines[0]).toBe("Name:     alice");
    expect(lines[1]).toBe("Endpoint: http://alice.test/indy");
    expect(lines[2].startsWith("Verkey:   ")).toBe(true);
    expect(lines[3]).toBe(`Wallet:   ${join(tmpDir, "wallets", "alice-wallet.db")}`);

    log.mockClear();
    await connectionsCommand(options);
    expect(log.mock.calls.map((c) => String(c[0]))).toEqual(["No connections yet."]);
  });

  it("keep the endpoint key across runs", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const options = { name: "alice", passphrase: "test-secret" };
    await inviteCommand(options);

    log.mockClear();
    await whoamiCommand(options);
    const first = String(log.mock.calls[2][0]);
    log.mockClear();
    await whoamiCommand(options);
    expect(String(log.mock.calls[2][0])).toBe(first);
  });
});
