/**
 * HTTP transport.
 *
 * Outbound: native fetch POST with the agent-wire content type.
 * Inbound: an express app accepting raw agent-wire bodies and handing them
 * to a sink.
 */

import express, { type Express, type Request, type Response } from "express";

import { ACCEPTED_STATUS, WIRE_CONTENT_TYPE } from "../../protocol/index.js";
import { TransportBase, type InboundSink } from "./base.js";

/** Upper bound for one inbound message body. */
const MAX_BODY = "1mb";

export class HTTPTransport extends TransportBase {
  private readonly _timeoutMs: number;

  constructor(timeoutMs: number = 10_000) {
    super();
    this._timeoutMs = timeoutMs;
  }

  async send(endpoint: string, wire: Uint8Array): Promise<number> {
    const resp = await fetch(endpoint, {
      method: "POST",
      headers: { "Content-Type": WIRE_CONTENT_TYPE },
      body: wire,
      signal: AbortSignal.timeout(this._timeoutMs),
    });
    // Drain so the connection can be reused.
    await resp.arrayBuffer();
    return resp.status;
  }
}

export interface InboundResult {
  status: number;
  body: string;
}

/**
 * Decide what the inbound endpoint answers for one request, delivering the
 * body to `sink` when it is accepted.
 */
export function acceptWireMessage(
  contentType: string | undefined,
  body: Uint8Array | null,
  sink: InboundSink
): InboundResult {
  const mediaType = (contentType ?? "").split(";")[0].trim().toLowerCase();
  if (mediaType !== WIRE_CONTENT_TYPE) {
    return { status: 415, body: `Expected Content-Type ${WIRE_CONTENT_TYPE}` };
  }
  if (body === null || body.length === 0) {
    return { status: 400, body: "Empty message body" };
  }
  sink(body);
  return { status: ACCEPTED_STATUS, body: "Accepted" };
}

/**
 * Express app serving POST `path` (default `/indy`) into `sink`.
 */
export function createInboundApp(sink: InboundSink, path: string = "/indy"): Express {
  const app = express();
  app.post(
    path,
    express.raw({ type: () => true, limit: MAX_BODY }),
    (req: Request, res: Response) => {
      const body: unknown = req.body;
      const bytes = Buffer.isBuffer(body) ? new Uint8Array(body) : null;
      const result = acceptWireMessage(req.get("content-type"), bytes, sink);
      res.status(result.status).type("text/plain").send(result.body);
    }
  );
  return app;
}
