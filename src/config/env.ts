import 'dotenv/config';
import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(3000),
  DATABASE_URL: z.string().default('file:./dev.db'),
  LOG_LEVEL: z
    .enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'])
    .default('info'),

  // Dispatch engine
  DISPATCH_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(5),
  DISPATCH_BASE_DELAY_MS: z.coerce.number().int().min(0).default(500),
  DISPATCH_MAX_DELAY_MS: z.coerce.number().int().min(0).default(30_000),
  GATEWAY_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  LEASE_TTL_MS: z.coerce.number().int().positive().default(30_000),
  IDEMPOTENCY_TTL_MS: z.coerce.number().int().positive().default(24 * 60 * 60_000),
  DELIVERY_STRATEGY: z.enum(['fallback', 'broadcast']).default('fallback'),
  RECEIPT_WAIT_MS: z.coerce.number().int().positive().default(60 * 60_000),

  // Background loops
  OUTBOX_POLL_MS: z.coerce.number().int().positive().default(1000),
  OUTBOX_BATCH_SIZE: z.coerce.number().int().positive().default(50),
  WORKER_POLL_MS: z.coerce.number().int().positive().default(5000),

  TEMPLATE_CACHE_SIZE: z.coerce.number().int().positive().default(500),

  // Reported by GET /version
  GIT_SHA: z.string().min(1).optional(),
});

export const env = envSchema.parse(process.env);
export type Env = z.infer<typeof envSchema>;
