/** Wallet record types written by the protocol modules. */

/** Outstanding invitation, keyed by its connection key. Consumed once. */
export const INVITATION_RECORD = "invitation";

/** Sent or received basic message, keyed by message `@id`. */
export const BASICMESSAGE_RECORD = "basicmessage";
