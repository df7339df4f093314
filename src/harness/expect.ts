/**
 * Timeout-bound expectations over an inbox of raw wire messages.
 *
 * A timeout is an outcome, not an error: `expectMessage` turns it into a
 * failure, `expectSilence` into a pass.
 */

import { err, ok, type Result } from "../protocol/index.js";
import type { AsyncQueue } from "../sdk/queue.js";

export type AwaitOutcome =
  | { readonly kind: "message"; readonly bytes: Uint8Array }
  | { readonly kind: "timeout"; readonly elapsedMs: number }
  | { readonly kind: "closed" };

/** Why a conformance step did not pass. */
export class HarnessFailure {
  readonly reason: string;

  constructor(reason: string) {
    this.reason = reason;
  }

  toString(): string {
    return `HarnessFailure: ${this.reason}`;
  }
}

export type Expectation<T> = Result<T, HarnessFailure>;

/** Next message in `inbox`, or a timeout once `timeoutMs` has elapsed. */
export async function awaitMessage(
  inbox: AsyncQueue<Uint8Array>,
  timeoutMs: number
): Promise<AwaitOutcome> {
  const next = await inbox.receive(timeoutMs);
  switch (next.kind) {
    case "item":
      return { kind: "message", bytes: next.item };
    case "timeout":
      return { kind: "timeout", elapsedMs: next.elapsedMs };
    case "closed":
      return { kind: "closed" };
  }
}

export async function expectMessage(
  inbox: AsyncQueue<Uint8Array>,
  timeoutMs: number
): Promise<Expectation<Uint8Array>> {
  const outcome = await awaitMessage(inbox, timeoutMs);
  switch (outcome.kind) {
    case "message":
      return ok(outcome.bytes);
    case "timeout":
      return err(new HarnessFailure(`No message within ${timeoutMs}ms`));
    case "closed":
      return err(new HarnessFailure("Inbox closed while waiting for a message"));
  }
}

/**
 * Pass when nothing arrives within `timeoutMs`; resolves with the elapsed
 * wait.
 */
export async function expectSilence(
  inbox: AsyncQueue<Uint8Array>,
  timeoutMs: number
): Promise<Expectation<number>> {
  const outcome = await awaitMessage(inbox, timeoutMs);
  switch (outcome.kind) {
    case "timeout":
      return ok(outcome.elapsedMs);
    case "message":
      return err(new HarnessFailure(`Expected silence, got ${outcome.bytes.length} bytes`));
    case "closed":
      return err(new HarnessFailure("Inbox closed while waiting for silence"));
  }
}
