/**
 * Abstract transport interface for agent-wire delivery.
 *
 * Implementations:
 * - HTTPTransport: POST to a peer's HTTP endpoint
 * - LoopbackTransport: in-process endpoint registry (tests, local demos)
 *
 * Inbound delivery is the other half: whatever receives bytes hands them to
 * an `InboundSink` (normally `Agent.deliver`).
 */

/** Receives raw inbound wire bytes. */
export type InboundSink = (wire: Uint8Array) => void;

export abstract class TransportBase {
  /**
   * Deliver wire bytes to `endpoint`. Resolves with the receiver's HTTP-style
   * status; 202 means accepted.
   */
  abstract send(endpoint: string, wire: Uint8Array): Promise<number>;
}
