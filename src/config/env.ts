import 'dotenv/config';
import { z } from 'zod';

export const DEFAULT_BASE_URL = 'https://api.synxis.com/pms/v1';

const TRUTHY = ['1', 'true', 'yes', 'on'];

// Env vars arrive as strings; z.coerce.boolean() would read "false" as true.
const flag = z
  .union([z.boolean(), z.string()])
  .transform((v) => (typeof v === 'boolean' ? v : TRUTHY.includes(v.trim().toLowerCase())));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  PMS_CLIENT_ID: z.string().default(''),
  PMS_CLIENT_SECRET: z.string().default(''),
  PMS_BASE_URL: z.string().default(DEFAULT_BASE_URL),
  PMS_PROPERTY_ID: z.string().default(''),
  PMS_TIMEOUT_SECONDS: z.coerce.number().min(1).max(120).default(30),
  PMS_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(3),
  PMS_MOCK_MODE: flag.default(false),

  PMS_ENABLE_HTTP_TRANSPORT: flag.default(false),
  HTTP_HOST: z.string().default('127.0.0.1'),
  HTTP_PORT: z.coerce.number().int().min(1).max(65535).default(3047),
  PMS_PID_FILE: z.string().default(''),

  LOG_LEVEL: z
    .enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'])
    .default('info'),
  LOG_FORMAT: z.enum(['json', 'pretty']).default('json'),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return envSchema.parse(source);
}

export const env = parseEnv(process.env);
