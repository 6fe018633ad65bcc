/**
 * @userprofile/observability
 *
 * Structured logging for the profile service.
 */

export { createLogger, redactBearer } from './logger.js';
export type { Logger } from './logger.js';
