/**
 * Two-level message dispatch.
 *
 *   FamilyRouter       `@type` prefix (family identifier) -> AgentModule
 *   MessageTypeRouter  exact `@type` -> handler, inside one module
 */

import {
  DuplicateRegistrationError,
  UnroutableMessageError,
  type Message,
} from "../protocol/index.js";

/** Handles one message type; a returned message is a reply. */
export type MessageHandler = (message: Message) => Promise<Message | null>;

/**
 * A protocol family implementation. Registered under its family identifier
 * (`<base-did>;spec/<family>/<version>`).
 */
export interface AgentModule {
  readonly family: string;
  route(message: Message): Promise<Message | null>;
}

function normalizeFamily(family: string): string {
  return family.replace(/\/+$/, "");
}

export class MessageTypeRouter {
  private readonly _family: string | null;
  private readonly _handlers = new Map<string, MessageHandler>();

  constructor(family: string | null = null) {
    this._family = family === null ? null : normalizeFamily(family);
  }

  /**
   * @throws {DuplicateRegistrationError} If `type` already has a handler.
   */
  register(type: string, handler: MessageHandler): void {
    if (this._handlers.has(type)) {
      throw new DuplicateRegistrationError(`Handler already registered for '${type}'`);
    }
    this._handlers.set(type, handler);
  }

  has(type: string): boolean {
    return this._handlers.has(type);
  }

  /**
   * @throws {UnroutableMessageError} If no handler matches `message.type` exactly.
   */
  async route(message: Message): Promise<Message | null> {
    const handler = this._handlers.get(message.type);
    if (handler === undefined) {
      throw new UnroutableMessageError(message.type, this._family ?? "(module)");
    }
    return handler(message);
  }
}

export class FamilyRouter {
  private readonly _modules = new Map<string, AgentModule>();

  /**
   * @throws {DuplicateRegistrationError} If `family` already has a module.
   */
  register(family: string, module: AgentModule): void {
    const key = normalizeFamily(family);
    if (this._modules.has(key)) {
      throw new DuplicateRegistrationError(`Module already registered for family '${key}'`);
    }
    this._modules.set(key, module);
  }

  get families(): string[] {
    return [...this._modules.keys()];
  }

  /**
   * The longest registered family that prefixes `type`, or null.
   */
  resolve(type: string): { family: string; module: AgentModule } | null {
    let best: { family: string; module: AgentModule } | null = null;
    for (const [family, module] of this._modules) {
      const matches = type === family || type.startsWith(family + "/");
      if (matches && (best === null || family.length > best.family.length)) {
        best = { family, module };
      }
    }
    return best;
  }

  /**
   * Hand a message to the module owning its family.
   *
   * @throws {UnroutableMessageError} If no family matches.
   */
  async route(message: Message): Promise<Message | null> {
    const target = this.resolve(message.type);
    if (target === null) {
      throw new UnroutableMessageError(message.type);
    }
    return target.module.route(message);
  }
}
