import { z } from 'zod';

const BRANCH_REF_PREFIX = 'refs/heads/';

const pushPayloadSchema = z.object({
  ref: z.string(),
  after: z.string().optional(),
  repository: z.object({
    id: z.number().optional(),
    full_name: z.string().min(1),
  }),
  head_commit: z
    .object({
      id: z.string().min(1),
      message: z.string().optional(),
    })
    .nullable()
    .optional(),
});

export interface PushEvent {
  repoFullName: string;
  branch: string;
  commitSha: string;
}

export type PushEventResult =
  | { kind: 'push'; event: PushEvent }
  | { kind: 'ignored'; reason: string }
  | { kind: 'invalid'; reason: string };

/** Reduces a GitHub delivery to the push that should be deployed, if any. */
export function parsePushEvent(eventType: string, payload: unknown): PushEventResult {
  if (eventType !== 'push') {
    return { kind: 'ignored', reason: `Event '${eventType}' is not handled` };
  }

  const parsed = pushPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    return { kind: 'invalid', reason: parsed.error.issues[0]?.message ?? 'Invalid push payload' };
  }

  const { ref, repository, head_commit } = parsed.data;
  if (!ref.startsWith(BRANCH_REF_PREFIX)) {
    return { kind: 'ignored', reason: `Ref ${ref} is not a branch` };
  }
  // branch deletions carry no head commit
  if (!head_commit) {
    return { kind: 'ignored', reason: 'Push has no head commit' };
  }

  return {
    kind: 'push',
    event: {
      repoFullName: repository.full_name,
      branch: ref.slice(BRANCH_REF_PREFIX.length),
      commitSha: head_commit.id,
    },
  };
}
