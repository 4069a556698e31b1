import jwt from 'jsonwebtoken';
import { z } from 'zod';

const ACCESS_TOKEN_TTL_SECONDS = Number(process.env.ACCESS_TOKEN_TTL_SECONDS ?? 15 * 60);

export const ALLOCATION_ROLES = ['logistics_officer', 'logistics_manager', 'admin'] as const;

export type AllocationRole = (typeof ALLOCATION_ROLES)[number];

const accessTokenPayloadSchema = z.object({
  sub: z.string().min(1),
  // Audit columns (`*_by_id`) hold at most 20 characters.
  userName: z.string().trim().min(1).max(20),
  role: z.enum(ALLOCATION_ROLES)
});

export type AccessTokenPayload = z.infer<typeof accessTokenPayloadSchema>;

function getJwtSecret(): string {
  const secret = process.env.JWT_SECRET ?? '';
  if (!secret) {
    throw new Error('JWT_SECRET must be set before starting the API');
  }
  return secret;
}

export function signAccessToken(payload: AccessTokenPayload, expiresInSeconds: number = ACCESS_TOKEN_TTL_SECONDS) {
  return jwt.sign(payload, getJwtSecret(), { expiresIn: expiresInSeconds });
}

export function verifyAccessToken(token: string): AccessTokenPayload {
  const decoded = jwt.verify(token, getJwtSecret());
  const parsed = accessTokenPayloadSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new Error('ACCESS_TOKEN_PAYLOAD_INVALID');
  }
  return parsed.data;
}
