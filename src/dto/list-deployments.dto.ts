import { z } from 'zod';

export const listDeploymentsQuerySchema = z.object({
  repo_full_name: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(10),
  offset: z.coerce.number().int().min(0).default(0),
});

export type ListDeploymentsQuery = z.output<typeof listDeploymentsQuerySchema>;
