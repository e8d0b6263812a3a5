import { z } from 'zod';

/**
 * Environment accepted at startup. Passed to ConfigModule.forRoot({ validate }),
 * so ConfigService.get() returns the coerced values below.
 */
const envSchema = z
  .object({
    DATABASE_URL: z.string().min(1),
    SYNC_DATABASE: z.enum(['true', 'false']).default('true'),
    PORT: z.coerce.number().int().positive().default(3000),
    SWAGGER_PATH: z.string().min(1).default('docs'),
    GITHUB_WEBHOOK_SECRET: z.string().default(''),
    DEPLOY_SOURCE_URL_TEMPLATE: z
      .string()
      .includes('{repo}')
      .default('https://github.com/{repo}.git'),
    DEPLOY_SCRIPT_NAME: z.string().min(1).default('deploy.sh'),
    DEPLOY_WORKSPACE_ROOT: z.string().optional(),
    DEPLOY_COMMAND_TIMEOUT_SECONDS: z.coerce.number().int().min(0).default(0),
    DEPLOY_REGISTRY_RETENTION_SECONDS: z.coerce.number().int().min(0).default(3600),
    DEPLOY_STREAM_POLL_MS: z.coerce.number().int().positive().default(1000),
  })
  .passthrough();

export type Env = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): Env {
  const result = envSchema.safeParse(config);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment: ${problems}`);
  }
  return result.data;
}
