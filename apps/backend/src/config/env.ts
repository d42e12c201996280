import 'dotenv/config';
import path from 'path';
import { z } from 'zod';

const envSchema = z.object({
  // NODE_ENV is set by the tooling (Vitest sets "test"), don't set it in .env
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  CONTENT_DIR: z
    .string()
    .min(1)
    .default('content')
    .transform(value => path.resolve(value)),
  WIKI_TITLE: z.string().min(1).default('wiki'),
  MARKUP: z.string().min(1).default('markdown'),
  REDIS_URL: z.string().min(1).optional(),
  REDIS_NAMESPACE: z.string().default('leafwiki'),
  RENDER_CACHE_TTL: z.coerce.number().int().nonnegative().default(86400),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional()
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Validate a set of environment variables.
 *
 * @param source - Variables to validate, usually `process.env`
 * @throws Error listing the offending fields when validation fails
 */
export function parseEnv(source: NodeJS.ProcessEnv): EnvConfig {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).join(', ');
    throw new Error(`Invalid environment configuration: ${fields}`);
  }

  return parsed.data;
}

export const env: EnvConfig = parseEnv(process.env);
