import { CampaignSettingsSchema, type CampaignSettings } from '@crowdfund/types';

const ENV_KEYS: Record<keyof CampaignSettings, string> = {
  durationSeconds: 'CAMPAIGN_DURATION_SECONDS',
  minContribution: 'CAMPAIGN_MIN_CONTRIBUTION',
  credentialUnit: 'CAMPAIGN_CREDENTIAL_UNIT',
};

function readEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const raw = env[key]?.trim();
  return raw ? raw : undefined;
}

function isSettingsKey(key: unknown): key is keyof CampaignSettings {
  return typeof key === 'string' && key in ENV_KEYS;
}

export function loadCampaignSettings(env: NodeJS.ProcessEnv = process.env): CampaignSettings {
  const parsed = CampaignSettingsSchema.safeParse({
    durationSeconds: readEnv(env, ENV_KEYS.durationSeconds),
    minContribution: readEnv(env, ENV_KEYS.minContribution),
    credentialUnit: readEnv(env, ENV_KEYS.credentialUnit),
  });

  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => {
      const field = issue.path[0];
      const source = isSettingsKey(field) ? ENV_KEYS[field] : 'campaign settings';
      return `${source}: ${issue.message}`;
    });
    throw new Error(`Invalid campaign settings. ${problems.join('; ')}`);
  }

  return parsed.data;
}
