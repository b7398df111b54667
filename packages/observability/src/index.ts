/**
 * @crowdfund/observability
 *
 * Structured logging for the campaign escrow packages.
 */

export { createLogger, createCampaignLogger, logger, redactTokens } from './logger.js';
export type { Logger } from 'pino';
