import jwt from 'jsonwebtoken';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { redisClient } from '../connections/redis';
import { appConfig } from '../connections/config/app.config';
import { USER_ROLES } from '../constants';

const UNIT_SECONDS: Record<string, number> = { s: 1, m: 60, h: 3600, d: 86400 };

/**
 * "7d" / "12h" / "900" -> seconds
 */
export const durationToSeconds = (value: string): number => {
  const match = value.trim().match(/^(\d+)\s*([smhd])?$/i);
  if (!match) {
    throw new Error(`Invalid duration: ${value}`);
  }
  const unit = (match[2] ?? 's').toLowerCase();
  return parseInt(match[1], 10) * UNIT_SECONDS[unit];
};

const tokenPayloadSchema = z.object({
  userId: z.number().int().positive(),
  role: z.enum(USER_ROLES),
  jti: z.string().min(1),
  exp: z.number().int(),
});

export type TokenPayload = z.infer<typeof tokenPayloadSchema>;

const revokedKey = (jti: string) => `revoked_token:${jti}`;

export const signAccessToken = (userId: number, role: TokenPayload['role']): string =>
  jwt.sign({ userId, role }, appConfig.jwtSecret, {
    expiresIn: durationToSeconds(appConfig.jwtExpiresIn),
    jwtid: uuidv4(),
  });

/**
 * Verifies signature and expiry and checks the payload shape.
 * Throws JsonWebTokenError / TokenExpiredError / ZodError.
 */
export const decodeAccessToken = (token: string): TokenPayload =>
  tokenPayloadSchema.parse(jwt.verify(token, appConfig.jwtSecret));

/**
 * Denylists the token id until the token would have expired anyway.
 */
export const revokeToken = async (payload: Pick<TokenPayload, 'jti' | 'exp'>): Promise<void> => {
  const ttl = payload.exp - Math.floor(Date.now() / 1000);
  if (ttl <= 0) {
    return;
  }
  await redisClient.set(revokedKey(payload.jti), '1', { EX: ttl });
};

export const isTokenRevoked = async (jti: string): Promise<boolean> =>
  (await redisClient.exists(revokedKey(jti))) === 1;
