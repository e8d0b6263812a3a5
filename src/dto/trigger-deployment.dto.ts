import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { z } from 'zod';

export const triggerDeploymentSchema = z.object({
  repo_full_name: z.string().regex(/^[\w.-]+\/[\w.-]+$/, 'Expected "owner/repo"'),
  // a commit sha, tag or branch name; never something git would read as an option
  commit_sha: z
    .string()
    .trim()
    .min(1)
    .max(100)
    .regex(/^[^-\s][^\s]*$/, 'Invalid commit identifier'),
  branch: z.string().trim().min(1).default('main'),
});

export type TriggerDeploymentInput = z.output<typeof triggerDeploymentSchema>;

export class TriggerDeploymentDto {
  @ApiProperty({ example: 'octo/shop' })
  repo_full_name!: string;

  @ApiProperty({ example: '9fceb02d0ae598e95dc970b74767f19372d61af8' })
  commit_sha!: string;

  @ApiPropertyOptional({ example: 'main', default: 'main' })
  branch?: string;
}
