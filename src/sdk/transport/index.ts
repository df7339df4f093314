/**
 * didwire transport layer.
 */

export { TransportBase, type InboundSink } from "./base.js";
export { HTTPTransport, acceptWireMessage, createInboundApp, type InboundResult } from "./http.js";
export { LoopbackTransport } from "./loopback.js";
export {
  AdminSocketServer,
  type AdminClientSocket,
  type AdminSocket,
  type AdminSocketOptions,
} from "./websocket.js";
