import { z } from 'zod';
import 'dotenv/config';

const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(3000),
  HOST: z.string().default('0.0.0.0'),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

  // CORS
  CORS_ORIGINS: z.string().default('*'),

  // Storage (one JSON document per account entry)
  DATA_DIR: z.string().default('./data'),

  // Reconciliation
  LOCAL_UTC_OFFSET_HOURS: z.coerce.number().min(-12).max(14).default(8),
  HISTORY_RETENTION_DAYS: z.coerce.number().int().min(0).default(400),
  RECHARGE_ID_RETENTION_DAYS: z.coerce.number().int().min(0).default(400),
  USAGE_DIVERGENCE_TOLERANCE: z.coerce.number().min(0).default(0.2),

  // Polling
  POLL_INTERVAL_MINUTES: z.coerce.number().int().min(1).default(30),
  ENTRY_ID: z.string().min(1).optional(),

  // Upstream account API
  UPSTREAM_TOKEN: z.string().min(1).optional(),
  UPSTREAM_PAYMENT_NO: z.string().default(''),
  UPSTREAM_COMPANY_CODE: z.string().default(''),
  UPSTREAM_CITY_ID: z.string().default(''),
  UPSTREAM_CLIENT_TYPE: z.string().default('gaswx'),
  UPSTREAM_API_SECRET: z.string().default(''),
  UPSTREAM_ANALYSIS_URL: z
    .string()
    .url()
    .default('https://wechatapp.ecej.com/livingpay/v3/xcx/electricity/getEnergyAnalysis.json'),
  UPSTREAM_ORDER_LIST_URL: z.string().url().default('https://oc.ecej.com/v1/order/bizOrderList'),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().min(1000).default(10000),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error('Invalid environment variables:');
    console.error(result.error.format());
    process.exit(1);
  }

  return result.data;
}

export const env = validateEnv();

export const isDev = env.NODE_ENV === 'development';
export const isProd = env.NODE_ENV === 'production';

/**
 * Entry id used for the account configured through the environment.
 * Falls back to the payment number so a restart finds the same state file.
 */
export function defaultEntryId(): string {
  return env.ENTRY_ID ?? (env.UPSTREAM_PAYMENT_NO ? `payment-${env.UPSTREAM_PAYMENT_NO}` : 'default');
}
