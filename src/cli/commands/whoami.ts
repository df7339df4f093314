/**
 * didwire whoami -- Display the agent name, endpoint and endpoint key.
 *
 * OFFLINE: opens the wallet, never the network.
 */

import { loadConfig, openAgent, type GlobalOptions } from "../helpers.js";

export async function whoamiCommand(options: GlobalOptions): Promise<void> {
  const config = loadConfig(options);
  const agent = await openAgent(config, true);
  try {
    console.log(`Name:     ${config.name}`);
    console.log(`Endpoint: ${config.endpoint}`);
    console.log(`Verkey:   ${agent.endpointVerkey ?? ""}`);
    console.log(`Wallet:   ${config.walletPath}`);
  } finally {
    agent.disconnectWallet();
  }
}
