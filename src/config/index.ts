/**
 * Config module barrel exports.
 *
 * @module config
 */

export { AppConfigSchema, DEFAULT_APP_CONFIG } from './schema.js';
export type { AppConfig } from './schema.js';

export {
  readAppConfig,
  validateAppConfig,
  AppConfigError,
  DEFAULT_CONFIG_PATH,
} from './reader.js';
