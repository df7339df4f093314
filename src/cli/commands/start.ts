/**
 * didwire start -- Run the agent: inbound HTTP endpoint, admin socket and
 * the processing loop, until SIGINT or SIGTERM.
 */

import type { Server } from "node:http";

import { errorMessage } from "../../protocol/index.js";
import { Agent } from "../../sdk/agent.js";
import { registerDefaultModules } from "../../sdk/modules/index.js";
import { createInboundApp } from "../../sdk/transport/http.js";
import { AdminSocketServer } from "../../sdk/transport/websocket.js";
import { cliError, loadConfig, type GlobalOptions } from "../helpers.js";

const DEFAULT_PORT = 80;

export async function startCommand(
  options: GlobalOptions & { port?: number; host?: string }
): Promise<void> {
  const config = loadConfig({ ...options, hostname: options.host });
  const agent = new Agent(config);
  try {
    await agent.connectWallet();
  } catch (e) {
    cliError(errorMessage(e));
  }
  registerDefaultModules(agent);

  const app = createInboundApp((wire) => {
    agent.deliver(wire);
  });
  const port = config.port ?? DEFAULT_PORT;
  const server = await new Promise<Server>((resolve, reject) => {
    const s = app.listen(port, () => resolve(s));
    s.once("error", reject);
  });
  const admin = new AdminSocketServer({
    outbound: agent.adminOutbound,
    inbound: (wire) => {
      agent.deliver(wire);
    },
    logger: agent.logger,
  });
  admin.listen(server);

  const shutdown = (): void => agent.stop();
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
  console.log(`Agent '${config.name}' listening on ${config.endpoint}`);

  try {
    await agent.start();
  } finally {
    await admin.close();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    agent.disconnectWallet();
  }
}
