import 'dotenv/config';

export type TrustProxySetting = boolean | number | string;

export function parseTrustProxy(raw: string | undefined): TrustProxySetting {
  const value = (raw || '').trim();
  if (!value || value === 'false') return false;
  if (value === 'true') return true;
  if (/^\d+$/.test(value)) return Number(value);
  return value;
}

export const cfg = {
  port: Number(process.env.PORT || 3000),
  appUrl: process.env.APP_URL || 'http://localhost:3000',

  openai: {
    apiKey: process.env.OPENAI_API_KEY || '',
    model: process.env.OPENAI_MODEL || 'gpt-4o-mini',
  },

  tavily: {
    apiKey: process.env.TAVILY_API_KEY || '',
    baseUrl: (process.env.TAVILY_API_BASE_URL || 'https://api.tavily.com').replace(/\/$/, ''),
  },

  // false, a hop count or a comma-separated list of trusted proxy addresses
  trustProxy: parseTrustProxy(process.env.TRUST_PROXY),

  rateLimit: {
    maxRequests: Number(process.env.RATE_LIMIT_MAX_REQUESTS || 20),
    windowSeconds: Number(process.env.RATE_LIMIT_WINDOW_SECONDS || 60),
  },

  alerts: {
    resendApiKey: process.env.RESEND_API_KEY || '',
    fromEmail: process.env.ALERT_FROM_EMAIL || 'Deal Scout <alerts@localhost>',
    smsEnabled: process.env.SMS_ALERTS_ENABLED === 'true',
    awsRegion: process.env.AWS_REGION || 'us-east-1',
  },
};

export const MODERATION_ENABLED = (process.env.MODERATION_ENABLED ?? 'true') === 'true';
