/**
 * Session Module
 */

export { runSession, GOODBYE_REPLY, CANCEL_REPLY } from './session.js';
export type { SessionDeps, SessionSummary } from './session.js';
