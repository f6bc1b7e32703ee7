import { z } from 'zod';
import { DEFAULT_QUEUES } from '@relaunch/shared/constants';

const serverEnvSchema = z.object({
  // Runtime
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.coerce.number().int().min(0).max(5).optional(),
  LOG_FILE: z.string().optional(),
  // Queue store
  REDIS_ADDR: z
    .string()
    .regex(/^[^:\s]+:\d+$/, 'expected host:port')
    .default('localhost:6379'),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_DB: z.coerce.number().int().min(0).default(0),
  SOURCE_LIST: z.string().min(1).default(DEFAULT_QUEUES.source),
  TARGET_QUEUE: z.string().min(1).default(DEFAULT_QUEUES.target),
  // Registry
  CONFIG_FILE: z.string().min(1).default('projects.json'),
  // Timing (ms)
  POLL_TIMEOUT_MS: z.coerce.number().int().min(100).default(5_000),
  ERROR_BACKOFF_MS: z.coerce.number().int().min(0).default(1_000),
  SHUTDOWN_GRACE_MS: z.coerce.number().int().min(0).default(5_000),
});

// Empty strings mean "unset", matching how the variables are usually blanked in compose files
const raw = Object.fromEntries(
  Object.entries(process.env).filter(([, value]) => value !== undefined && value !== ''),
);

const result = serverEnvSchema.safeParse(raw);

if (!result.success) {
  console.error('\n  Missing or invalid environment variables:\n');
  result.error.issues.forEach(i => console.error(`  - ${i.path.join('.')}: ${i.message}`));
  console.error('\n  Copy .env.example to .env\n');
  process.exit(1);
}

export const env = result.data;
export type ServerEnv = typeof env;
