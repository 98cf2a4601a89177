// Environment validation using Zod
import 'dotenv/config';
import { z } from 'zod';
import { ConfigurationError } from '../shared/errors.js';
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from './api.js';

// NODE_ENV and LOG_LEVEL belong to the host app and are only read by the logger
const EnvSchema = z.object({
  LOMOGRAPHY_API_KEY: z.string().min(1).optional(),
  LOMOGRAPHY_BASE_URL: z.url().default(DEFAULT_BASE_URL),
  LOMOGRAPHY_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  // Run the authentication probe when a client is created through `create()`
  LOMOGRAPHY_VERIFY: z.enum(['true', 'false']).default('false').transform((v) => v === 'true'),
});

export type LomographyEnv = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): LomographyEnv {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.'));
    throw new ConfigurationError(`Invalid environment configuration: ${fields.join(', ')}`, parsed.error.issues);
  }
  return parsed.data;
}
