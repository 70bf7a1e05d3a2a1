import { timingSafeEqual } from 'node:crypto';
import type { NextRequest } from 'next/server';

export const SERVICE_TOKEN_HEADER = 'x-quality-service-token';

export type AuthContext = { kind: 'service' };

function sameToken(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf8');
  const right = Buffer.from(b, 'utf8');
  return left.length === right.length && timingSafeEqual(left, right);
}

/**
 * Service-token check for the API routes. With no token configured every
 * request is rejected (fail closed).
 */
export function getAuthContext(request: NextRequest, expected: string | null): AuthContext | null {
  const hdr = request.headers.get(SERVICE_TOKEN_HEADER);
  if (expected && hdr && sameToken(hdr, expected)) return { kind: 'service' };
  return null;
}
