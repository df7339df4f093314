/**
 * CLI helper utilities shared across commands.
 */

import { existsSync, readdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

import { errorMessage } from "../protocol/index.js";
import { Agent } from "../sdk/agent.js";
import { AgentConfig, type AgentConfigOptions } from "../sdk/config.js";

const WALLET_SUFFIX = "-wallet.db";

/** Options every command accepts. */
export interface GlobalOptions {
  name?: string;
  passphrase?: string;
}

/**
 * Scan the wallet directory for a `<name>-wallet.db` file and return the
 * agent name.
 *
 * If several exist, return the first alphabetically. If none exist, return
 * null.
 */
export function findAgentName(walletDir?: string): string | null {
  const dir =
    walletDir ??
    join(process.env["DIDWIRE_HOME"] ?? join(homedir(), ".didwire"), "wallets");

  if (!existsSync(dir)) {
    return null;
  }

  const wallets = readdirSync(dir)
    .filter((f) => f.endsWith(WALLET_SUFFIX))
    .sort();

  if (wallets.length === 0) {
    return null;
  }

  return wallets[0].slice(0, -WALLET_SUFFIX.length);
}

/**
 * Build the agent configuration from CLI options, falling back to the only
 * wallet on disk for the name.
 */
export function loadConfig(options: GlobalOptions & AgentConfigOptions): AgentConfig {
  try {
    return new AgentConfig({ ...options, name: options.name ?? findAgentName() });
  } catch (e) {
    cliError(errorMessage(e));
  }
}

/**
 * Open the wallet of an existing agent for a one-shot command.
 *
 * @param mustExist - Fail instead of creating a missing wallet.
 */
export async function openAgent(config: AgentConfig, mustExist: boolean): Promise<Agent> {
  if (mustExist && !existsSync(config.walletPath)) {
    cliError(`No wallet for '${config.name}'. Run \`didwire invite\` or \`didwire start\` first.`);
  }
  const agent = new Agent(config);
  try {
    // One-shot commands never wipe an ephemeral wallet.
    await agent.connectWallet(config.name, config.passphrase, false, config.walletPath);
  } catch (e) {
    cliError(errorMessage(e));
  }
  return agent;
}

/**
 * Print an error message to stderr and exit with code 1.
 */
export function cliError(msg: string): never {
  process.stderr.write(msg + "\n");
  process.exit(1);
}
