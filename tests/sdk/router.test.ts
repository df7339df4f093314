import { describe, it, expect, vi } from "vitest";

import {
  DuplicateRegistrationError,
  Message,
  UnroutableMessageError,
  familyIdentifier,
  messageType,
} from "../../src/protocol/index.js";
import { FamilyRouter, MessageTypeRouter, type AgentModule } from "../../src/sdk/router.js";

const PING_FAMILY = familyIdentifier("trust_ping", "1.0");
const PING = messageType(PING_FAMILY, "ping");

function moduleFor(family: string) {
  const route = vi.fn(async (_message: Message): Promise<Message | null> => null);
  const module: AgentModule = { family, route };
  return { ...module, route };
}

// ---------------------------------------------------------------------------
// MessageTypeRouter
// ---------------------------------------------------------------------------

describe("MessageTypeRouter", () => {
  it("dispatches on the exact type", async () => {
    const router = new MessageTypeRouter(PING_FAMILY);
    const reply = Message.create(messageType(PING_FAMILY, "ping_response"));
    const handler = vi.fn(async () => reply);
    router.register(PING, handler);

    const msg = Message.create(PING);
    expect(await router.route(msg)).toBe(reply);
    expect(handler).toHaveBeenCalledWith(msg);
  });

  it("refuses a second handler for a type", () => {
    const router = new MessageTypeRouter(PING_FAMILY);
    router.register(PING, async () => null);
    expect(() => router.register(PING, async () => null)).toThrow(DuplicateRegistrationError);
  });

  it("names the family when no handler matches", async () => {
    const router = new MessageTypeRouter(PING_FAMILY + "/");
    const other = messageType(PING_FAMILY, "pong");

    const error = await router.route(Message.create(other)).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(UnroutableMessageError);
    if (!(error instanceof UnroutableMessageError)) return;
    expect(error.messageType).toBe(other);
    expect(error.family).toBe(PING_FAMILY);
  });
});

// ---------------------------------------------------------------------------
// FamilyRouter
// ---------------------------------------------------------------------------

describe("FamilyRouter", () => {
  it("hands messages to the module owning their family", async () => {
    const router = new FamilyRouter();
    const ping = moduleFor(PING_FAMILY);
    router.register(PING_FAMILY, ping);

    const msg = Message.create(PING);
    await router.route(msg);
    expect(ping.route).toHaveBeenCalledTimes(1);
    expect(ping.route).toHaveBeenCalledWith(msg);
  });

  it("raises for an unknown family without calling any module", async () => {
    const router = new FamilyRouter();
    const ping = moduleFor(PING_FAMILY);
    router.register(PING_FAMILY, ping);

    const unknown = messageType(familyIdentifier("other", "1.0"), "x");
    await expect(router.route(Message.create(unknown))).rejects.toThrow(
      `No family registered for message type '${unknown}'`
    );
    expect(ping.route).not.toHaveBeenCalled();
  });

  it("prefers the longest matching family", () => {
    const router = new FamilyRouter();
    const broad = moduleFor("did:example;spec/a");
    const narrow = moduleFor("did:example;spec/a/1.0");
    router.register(broad.family, broad);
    router.register(narrow.family, narrow);

    expect(router.resolve("did:example;spec/a/1.0/x")?.module).toBe(narrow);
    expect(router.resolve("did:example;spec/a/2.0/x")?.module).toBe(broad);
  });

  it("matches whole path segments only", () => {
    const router = new FamilyRouter();
    router.register("did:example;spec/a/1.0", moduleFor("did:example;spec/a/1.0"));
    expect(router.resolve("did:example;spec/a/1.0extra/x")).toBeNull();
  });

  it("treats trailing slashes as the same family", () => {
    const router = new FamilyRouter();
    router.register(PING_FAMILY, moduleFor(PING_FAMILY));
    expect(() => router.register(PING_FAMILY + "/", moduleFor(PING_FAMILY))).toThrow(
      `Module already registered for family '${PING_FAMILY}'`
    );
    expect(router.families).toEqual([PING_FAMILY]);
  });
});
