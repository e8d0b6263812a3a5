import { ExecutionContext, UnauthorizedException, createParamDecorator } from '@nestjs/common';
import { IncomingHttpHeaders } from 'node:http';

/** The authenticated user, as forwarded by the gateway in front of this service. */
export interface CallerIdentity {
  id: string;
  username: string;
}

function firstHeader(value: string | string[] | undefined): string {
  const raw = Array.isArray(value) ? value[0] : value;
  return raw?.trim() ?? '';
}

export function resolveCaller(headers: IncomingHttpHeaders): CallerIdentity {
  const id = firstHeader(headers['x-user-id']);
  if (!id) {
    throw new UnauthorizedException('Missing X-User-Id header');
  }
  return { id, username: firstHeader(headers['x-user-name']) || id };
}

export const Caller = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): CallerIdentity =>
    resolveCaller(ctx.switchToHttp().getRequest<{ headers: IncomingHttpHeaders }>().headers),
);
