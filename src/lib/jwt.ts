import { SignJWT, jwtVerify, type JWTPayload } from 'jose';
import { jwtConfig } from '../config/index.js';

export interface AdminTokenPayload extends JWTPayload {
  sub: string;
  role: 'admin';
}

function getSecret(): Uint8Array {
  return new TextEncoder().encode(jwtConfig.secret);
}

export function parseTtl(ttl: string): number {
  const match = ttl.match(/^(\d+)([smhd])$/);
  if (!match) {
    throw new Error(`Invalid TTL format: ${ttl}`);
  }

  const value = parseInt(match[1] ?? '0', 10);
  const unit = match[2] ?? 's';

  const multipliers: Record<string, number> = {
    s: 1,
    m: 60,
    h: 3600,
    d: 86400,
  };

  return value * (multipliers[unit] ?? 1);
}

export async function signAdminToken(subject: string, ttl?: string): Promise<string> {
  const ttlSeconds = parseTtl(ttl ?? jwtConfig.ttl);

  return new SignJWT({ role: 'admin' } satisfies Partial<AdminTokenPayload>)
    .setProtectedHeader({ alg: 'HS256' })
    .setSubject(subject)
    .setIssuedAt()
    .setExpirationTime(Math.floor(Date.now() / 1000) + ttlSeconds)
    .sign(getSecret());
}

export async function verifyAdminToken(token: string): Promise<AdminTokenPayload | null> {
  try {
    const { payload } = await jwtVerify(token, getSecret());
    if (payload['role'] !== 'admin' || typeof payload.sub !== 'string') {
      return null;
    }
    return { ...payload, sub: payload.sub, role: 'admin' };
  } catch {
    return null;
  }
}
