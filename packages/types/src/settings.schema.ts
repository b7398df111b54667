import { z } from 'zod';

export const DEFAULT_CAMPAIGN_DURATION_SECONDS = 30 * 24 * 60 * 60;

/**
 * Campaign settings as read from the environment
 * - durationSeconds: time from creation until the deadline
 * - minContribution: smallest amount `contribute` accepts
 * - credentialUnit: amount that earns one credential
 */
export const CampaignSettingsSchema = z.object({
  durationSeconds: z.coerce
    .number()
    .int('Duration must be a whole number of seconds')
    .positive('Duration must be positive')
    .default(DEFAULT_CAMPAIGN_DURATION_SECONDS),
  minContribution: z.coerce
    .number()
    .int('Minimum contribution must be a whole number')
    .positive('Minimum contribution must be positive')
    .default(1),
  credentialUnit: z.coerce
    .number()
    .int('Credential unit must be a whole number')
    .positive('Credential unit must be positive')
    .default(1),
});

export type CampaignSettings = z.infer<typeof CampaignSettingsSchema>;
