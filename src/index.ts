/**
 * didwire -- decentralized-identity messaging agent.
 *
 * Top-level package exports: the SDK, plus the protocol layer and the
 * conformance harness as namespaces.
 */

export * from "./sdk/index.js";
export * as protocol from "./protocol/index.js";
export * as harness from "./harness/index.js";
