/**
 * didwire invite -- Create an invitation in the wallet and print its URL.
 *
 * The running agent (`didwire start`) picks the invitation up from the
 * shared wallet when the Request arrives.
 */

import { ConnectionsModule } from "../../sdk/modules/connections.js";
import { loadConfig, openAgent, type GlobalOptions } from "../helpers.js";

export async function inviteCommand(
  options: GlobalOptions & { label?: string }
): Promise<void> {
  const config = loadConfig(options);
  const agent = await openAgent(config, false);
  try {
    const connections = agent.registerModule((a) => new ConnectionsModule(a));
    const issued = await connections.createInvite(options.label);
    console.log(issued.url);
  } finally {
    agent.disconnectWallet();
  }
}
