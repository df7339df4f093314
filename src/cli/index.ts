#!/usr/bin/env node
/**
 * didwire CLI -- run an agent and manage its wallet from the command line.
 */

import { Command, InvalidArgumentError } from "commander";

import { connectionsCommand } from "./commands/connections.js";
import { inviteCommand } from "./commands/invite.js";
import { startCommand } from "./commands/start.js";
import { whoamiCommand } from "./commands/whoami.js";
import { cliError, type GlobalOptions } from "./helpers.js";
import { errorMessage } from "../protocol/index.js";

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError("Must be an integer 1-65535.");
  }
  return port;
}

const program = new Command();

program
  .name("didwire")
  .description("Decentralized-identity messaging agent")
  .version("0.1.0");

// Global options: wallet owner and passphrase (env DIDWIRE_NAME / DIDWIRE_PASSPHRASE)
program.option("-n, --name <name>", "Agent (wallet owner) name");
program.option("-p, --passphrase <passphrase>", "Wallet passphrase");

function globals(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

// ---- start -----------------------------------------------------------------
program
  .command("start")
  .description("Run the agent: inbound endpoint, admin socket and processing loop")
  .option("--port <port>", "Port to listen on", parsePort)
  .option("--host <host>", "Hostname advertised in the endpoint")
  .action(async (opts: { port?: number; host?: string }) => {
    await startCommand({ ...globals(), port: opts.port, host: opts.host });
  });

// ---- invite ----------------------------------------------------------------
program
  .command("invite")
  .description("Create an invitation and print its URL")
  .option("-l, --label <label>", "Label shown to the invitee")
  .action(async (opts: { label?: string }) => {
    await inviteCommand({ ...globals(), label: opts.label });
  });

// ---- whoami ----------------------------------------------------------------
program
  .command("whoami")
  .description("Display the agent name, endpoint and endpoint key (offline)")
  .action(async () => {
    await whoamiCommand(globals());
  });

// ---- connections -----------------------------------------------------------
program
  .command("connections")
  .description("List pairwise connections from the wallet")
  .action(async () => {
    await connectionsCommand(globals());
  });

program.parseAsync(process.argv).catch((e: unknown) => cliError(errorMessage(e)));
