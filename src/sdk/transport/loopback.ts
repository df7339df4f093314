/**
 * In-process transport: endpoints are keys in a registry shared by every
 * agent (and harness) attached to the same instance.
 */

import { ACCEPTED_STATUS } from "../../protocol/index.js";
import { TransportBase, type InboundSink } from "./base.js";

const NOT_FOUND = 404;

export class LoopbackTransport extends TransportBase {
  private readonly _receivers = new Map<string, InboundSink>();
  private readonly _sent: { endpoint: string; wire: Uint8Array }[] = [];

  /** Route bytes for `endpoint` to `sink`. Replaces any previous receiver. */
  attach(endpoint: string, sink: InboundSink): void {
    this._receivers.set(endpoint, sink);
  }

  detach(endpoint: string): void {
    this._receivers.delete(endpoint);
  }

  /** Everything sent so far, in order, including undeliverable sends. */
  get sent(): readonly { endpoint: string; wire: Uint8Array }[] {
    return this._sent;
  }

  async send(endpoint: string, wire: Uint8Array): Promise<number> {
    this._sent.push({ endpoint, wire });
    const sink = this._receivers.get(endpoint);
    if (sink === undefined) {
      return NOT_FOUND;
    }
    sink(wire);
    return ACCEPTED_STATUS;
  }
}
