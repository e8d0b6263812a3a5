import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { z } from 'zod';

const REPO_FULL_NAME = /^[\w.-]+\/[\w.-]+$/;
const ENV_KEY = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const environmentVariablesSchema = z.record(
  z.string().regex(ENV_KEY, 'Environment variable names must be shell identifiers'),
  z.string(),
);

export const createConfigSchema = z.object({
  repo_id: z.number().int().positive().nullable().optional(),
  repo_full_name: z.string().regex(REPO_FULL_NAME, 'Expected "owner/repo"'),
  branch: z.string().trim().min(1).default('main'),
  auto_deploy: z.boolean().default(false),
  deploy_command: z.string().trim().min(1).default('./deploy.sh'),
  environment_variables: environmentVariablesSchema.default({}),
});

export type CreateConfigInput = z.output<typeof createConfigSchema>;

export class CreateConfigDto {
  @ApiPropertyOptional({ example: 123456789, description: 'GitHub numeric repository id' })
  repo_id?: number | null;

  @ApiProperty({ example: 'octo/shop' })
  repo_full_name!: string;

  @ApiPropertyOptional({ example: 'main', default: 'main' })
  branch?: string;

  @ApiPropertyOptional({ default: false, description: 'Deploy on every push to `branch`' })
  auto_deploy?: boolean;

  @ApiPropertyOptional({ example: './deploy.sh', default: './deploy.sh' })
  deploy_command?: string;

  @ApiPropertyOptional({
    description: 'Passed to the deploy command and written to .env in the workspace',
    example: { NODE_ENV: 'production' },
  })
  environment_variables?: Record<string, string>;
}
