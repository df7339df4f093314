/**
 * didwire SDK -- the agent, its wallet and transports, and the protocol
 * modules it runs.
 */

export { Agent, type AgentOptions, type IncomingOutcome, type ModuleFactory } from "./agent.js";
export { AgentConfig, type AgentConfigOptions, walletPathFor } from "./config.js";
export { Logger, LogLevel, logger, parseLogLevel } from "./logger.js";
export { AsyncQueue, type QueueReceive } from "./queue.js";
export { FamilyRouter, MessageTypeRouter, type AgentModule, type MessageHandler } from "./router.js";
export {
  InviteeHandshake,
  InviterHandshake,
  type EstablishedConnection,
  type HandshakeDeps,
  type InviteeOptions,
  type InviteeState,
  type InviterState,
  type IssuedInvite,
  type ResponseDelivery,
  type ResponseFailure,
} from "./handshake.js";
export {
  MEMORY_WALLET,
  Wallet,
  type WalletCreateOutcome,
  type WalletDeleteOutcome,
  type WalletRecord,
} from "./wallet.js";
export { SodiumCryptoProvider } from "./sodium-provider.js";
export * from "./transport/index.js";
export * from "./modules/index.js";
