/**
 * Platform Module
 */

export { openUrl, openerCommand } from './browser.js';
export type { OpenerProcess, OpenUrlOptions, SpawnOpener } from './browser.js';
