/**
 * Admin socket: a WebSocket server the admin UI connects to.
 *
 * Messages the agent queues for the UI are broadcast to every open socket
 * (and held until one connects); messages a socket sends are delivered to
 * the agent like any inbound wire message.
 */

import type { Server } from "node:http";
import { WebSocketServer, type RawData } from "ws";

import { errorMessage, utf8Decode, utf8Encode } from "../../protocol/index.js";
import type { Logger } from "../logger.js";
import type { AsyncQueue } from "../queue.js";
import type { InboundSink } from "./base.js";

const OPEN = 1;
const DRAIN_POLL_MS = 250;

/** The part of a socket the server writes to. */
export interface AdminSocket {
  readonly readyState: number;
  send(data: string): void;
}

/** A connected UI socket: written to, and listened on for frames. */
export interface AdminClientSocket extends AdminSocket {
  on(event: "message", listener: (data: RawData) => void): unknown;
  on(event: "close", listener: () => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
}

export interface AdminSocketOptions {
  /** Queue of outbound admin messages (the agent's `adminOutbound`). */
  outbound: AsyncQueue<Uint8Array>;
  /** Where messages from the UI go (the agent's `deliver`). */
  inbound: InboundSink;
  logger: Logger;
}

export class AdminSocketServer {
  private readonly _outbound: AsyncQueue<Uint8Array>;
  private readonly _inbound: InboundSink;
  private readonly _log: Logger;
  private readonly _clients = new Set<AdminSocket>();
  private _held: string[] = [];
  private _wss: WebSocketServer | null = null;
  private _running: boolean = false;
  private _drained: Promise<void> | null = null;

  constructor(options: AdminSocketOptions) {
    this._outbound = options.outbound;
    this._inbound = options.inbound;
    this._log = options.logger.child("admin");
  }

  get clientCount(): number {
    return this._clients.size;
  }

  /**
   * Accept sockets on `path` of an existing HTTP server and start draining
   * the outbound queue.
   */
  listen(server: Server, path: string = "/ws"): void {
    const wss = new WebSocketServer({ server, path });
    wss.on("connection", (ws) => this.attachClient(ws));
    wss.on("error", (e: Error) => {
      this._log.warn(`Admin socket server error: ${e.message}`);
    });
    this._wss = wss;
    this.startDraining();
  }

  /** Drain the outbound queue without owning a socket server. */
  startDraining(): void {
    if (this._running) return;
    this._running = true;
    this._drained = this._drain();
  }

  /** Register a connected socket; returns the function that removes it. */
  addClient(socket: AdminSocket): () => void {
    this._clients.add(socket);
    const held = this._held;
    this._held = [];
    for (const text of held) {
      socket.send(text);
    }
    return () => {
      this._clients.delete(socket);
    };
  }

  /** A message from the UI. */
  receiveFromClient(text: string): void {
    if (text.length === 0) return;
    this._inbound(utf8Encode(text));
  }

  async close(): Promise<void> {
    this._running = false;
    if (this._drained !== null) {
      await this._drained;
      this._drained = null;
    }
    const wss = this._wss;
    this._wss = null;
    if (wss !== null) {
      await new Promise<void>((resolve, reject) => {
        for (const client of wss.clients) client.terminate();
        wss.close((e) => (e ? reject(e) : resolve()));
      });
    }
    this._clients.clear();
  }

  /** Wire a freshly connected UI socket into the server. */
  attachClient(ws: AdminClientSocket): void {
    const remove = this.addClient(ws);
    this._log.info("Admin UI connected");
    // A bad frame from the UI surfaces here; ws closes the socket after it.
    ws.on("error", (e: Error) => {
      this._log.warn(`Admin socket error: ${e.message}`);
    });
    ws.on("message", (data: RawData) => {
      try {
        this.receiveFromClient(rawText(data));
      } catch (e) {
        this._log.warn(`Dropping admin socket message: ${errorMessage(e)}`);
      }
    });
    ws.on("close", () => {
      remove();
      this._log.info("Admin UI disconnected");
    });
  }

  private async _drain(): Promise<void> {
    while (this._running) {
      const next = await this._outbound.receive(DRAIN_POLL_MS);
      if (next.kind === "closed") break;
      if (next.kind === "timeout") continue;
      this._broadcast(utf8Decode(next.item));
    }
    this._running = false;
  }

  private _broadcast(text: string): void {
    const open = [...this._clients].filter((c) => c.readyState === OPEN);
    if (open.length === 0) {
      this._held.push(text);
      return;
    }
    for (const client of open) {
      client.send(text);
    }
  }
}

function rawText(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf-8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf-8");
  }
  return data.toString("utf-8");
}
