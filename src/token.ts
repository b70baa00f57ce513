import { createHmac, timingSafeEqual } from 'crypto';
import { normalizeIdentifier } from './normalize';

/**
 * Tokens never expire. Rotating the secret is the only way to revoke them.
 */
export function signToken(identifier: string, secret: string): string {
  return createHmac('sha256', secret)
    .update(normalizeIdentifier(identifier), 'utf8')
    .digest('base64url');
}

export function verifyToken(
  identifier: string,
  token: string | null | undefined,
  secret: string
): boolean {
  if (!token) return false;

  try {
    const expected = Buffer.from(signToken(identifier, secret), 'utf8');
    const supplied = Buffer.from(token, 'utf8');
    if (expected.length !== supplied.length) {
      return false;
    }
    return timingSafeEqual(expected, supplied);
  } catch {
    return false;
  }
}

/** Link handed out to a driver (usually printed as a QR code). */
export function buildLookupUrl(baseUrl: string, identifier: string, token: string): string {
  const params = new URLSearchParams({ doc: identifier, t: token });
  return `${baseUrl.replace(/\/+$/, '')}/driver?${params.toString()}`;
}
