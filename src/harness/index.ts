/**
 * Conformance harness for the connection protocol.
 */

export {
  HarnessFailure,
  awaitMessage,
  expectMessage,
  expectSilence,
  type AwaitOutcome,
  type Expectation,
} from "./expect.js";
export {
  DEFAULT_TIMEOUT_MS,
  SUITE_LABEL,
  SuiteContext,
  badConnectionRequest,
  connectionStartedBySuite,
  connectionStartedByTestedAgent,
  type ScenarioOptions,
  type TestedAgentDriver,
} from "./connection-suite.js";
