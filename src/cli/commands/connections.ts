/**
 * didwire connections -- List pairwise relationships from the wallet.
 */

import { loadConfig, openAgent, type GlobalOptions } from "../helpers.js";

export async function connectionsCommand(options: GlobalOptions): Promise<void> {
  const agent = await openAgent(loadConfig(options), true);
  try {
    const rows = agent.wallet.listPairwise();
    if (rows.length === 0) {
      console.log("No connections yet.");
      return;
    }

    console.log(`${"THEIR DID".padEnd(24)} ${"LABEL".padEnd(20)} ENDPOINT`);
    for (const row of rows) {
      console.log(`${row.theirDid.padEnd(24)} ${(row.label ?? "").padEnd(20)} ${row.theirEndpoint}`);
    }
  } finally {
    agent.disconnectWallet();
  }
}
