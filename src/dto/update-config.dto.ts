import { ApiPropertyOptional } from '@nestjs/swagger';
import { z } from 'zod';
import { environmentVariablesSchema } from './create-config.dto';

export const updateConfigSchema = z
  .object({
    repo_id: z.number().int().positive().nullable(),
    branch: z.string().trim().min(1),
    auto_deploy: z.boolean(),
    deploy_command: z.string().trim().min(1),
    environment_variables: environmentVariablesSchema,
  })
  .partial()
  .strict();

export type UpdateConfigInput = z.output<typeof updateConfigSchema>;

export class UpdateConfigDto {
  @ApiPropertyOptional({ example: 123456789 })
  repo_id?: number | null;

  @ApiPropertyOptional({ example: 'main' })
  branch?: string;

  @ApiPropertyOptional()
  auto_deploy?: boolean;

  @ApiPropertyOptional({ example: './deploy.sh' })
  deploy_command?: string;

  @ApiPropertyOptional({ description: 'Replaces the whole map', example: { NODE_ENV: 'production' } })
  environment_variables?: Record<string, string>;
}
