/**
 * Protocol modules shipped with the agent.
 */

import type { Agent } from "../agent.js";
import { AdminModule } from "./admin.js";
import { BasicMessageModule } from "./basicmessage.js";
import { ConnectionsModule } from "./connections.js";

export {
  ADMIN_FAMILY,
  STATE_REQUEST_TYPE,
  STATE_TYPE,
  CONNECTION_ESTABLISHED_TYPE,
  CONNECTION_FAILED_TYPE,
  MESSAGE_RECEIVED_TYPE,
  AdminModule,
  buildAdminMessage,
} from "./admin.js";
export {
  BASICMESSAGE_FAMILY,
  BASICMESSAGE_TYPE,
  BasicMessageModule,
  buildBasicMessage,
  validateBasicMessage,
  type BasicMessage,
} from "./basicmessage.js";
export {
  ConnectionsModule,
  DEFAULT_PENDING_TTL_MS,
  type ConnectionsModuleOptions,
} from "./connections.js";
export { INVITATION_RECORD, BASICMESSAGE_RECORD } from "./records.js";

/** Register the modules a full agent runs with. */
export function registerDefaultModules(agent: Agent): void {
  agent.registerModule((a) => new AdminModule(a));
  agent.registerModule((a) => new ConnectionsModule(a));
  agent.registerModule((a) => new BasicMessageModule(a));
}
