import { createHmac, timingSafeEqual } from 'node:crypto';

/** Checks an `X-Hub-Signature-256` header (`sha256=<hex>`) against the raw request body. */
export function verifyGithubSignature(
  body: Buffer | string,
  signature: string | undefined,
  secret: string,
): boolean {
  if (!signature) return false;
  const expected = 'sha256=' + createHmac('sha256', secret).update(body).digest('hex');
  const provided = Buffer.from(signature);
  const wanted = Buffer.from(expected);
  return provided.length === wanted.length && timingSafeEqual(provided, wanted);
}
