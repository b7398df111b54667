import { logger as defaultLogger, type Logger } from '@crowdfund/observability';
import type { CampaignEvent, CampaignEventEmitter } from './campaign-events.js';

/**
 * Initialize audit logging for campaign events
 * Every event becomes one structured log line; closes that left failed
 * refunds behind are logged at warn so they can be retried
 */
export function initializeCampaignAuditLogging(
  events: CampaignEventEmitter,
  logger: Logger = defaultLogger
) {
  events.on((event) => handleCampaignEvent(event, logger));
  logger.info('Audit logging initialized for campaign events');
}

function handleCampaignEvent(event: CampaignEvent, logger: Logger) {
  const base = {
    event: event.type,
    campaignId: event.campaignId,
    timestamp: event.timestamp.toISOString(),
  };

  switch (event.type) {
    case 'campaign.created':
      logger.info(
        {
          ...base,
          owner: event.owner,
          goalAmount: event.goalAmount,
          deadline: event.deadline.toISOString(),
        },
        'Campaign created'
      );
      break;

    case 'campaign.contributed':
      logger.info(
        {
          ...base,
          contributor: event.contributor,
          amount: event.amount,
          credentialIds: event.credentialIds,
          goalReached: event.goalReached,
        },
        'Contribution recorded'
      );
      break;

    case 'campaign.closed': {
      const entry = {
        ...base,
        owner: event.owner,
        reason: event.reason,
        totalSettled: event.report.totalSettled,
        totalFailed: event.report.totalFailed,
        failed: event.report.failed,
      };
      if (event.report.failed.length > 0) {
        logger.warn(entry, 'Campaign closed with failed refunds');
      } else {
        logger.info(entry, 'Campaign closed');
      }
      break;
    }

    case 'campaign.refunded':
      logger.info(
        { ...base, contributor: event.contributor, amount: event.amount },
        'Contributor refunded'
      );
      break;

    case 'campaign.withdrawn':
      logger.info({ ...base, owner: event.owner, amount: event.amount }, 'Funds withdrawn by owner');
      break;
  }
}
