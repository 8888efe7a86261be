import crypto from 'crypto';
import { pool } from '../connections';
import { appConfig } from '../connections/config/app.config';
import type { PasswordResetOtp } from '../connections/db/models';

export const generateCode = (length: number = 6): string => {
  const max = 10 ** length;
  return crypto.randomInt(0, max).toString().padStart(length, '0');
};

export const saveResetOtp = async (
  userId: number,
  otp: string,
  expiresInMinutes: number = appConfig.otpExpiresMinutes
): Promise<Date> => {
  const expiresAt = new Date(Date.now() + expiresInMinutes * 60 * 1000);

  await pool.query(
    `INSERT INTO password_reset_otps (user_id, otp, expires_at)
     VALUES ($1, $2, $3)`,
    [userId, otp, expiresAt]
  );

  return expiresAt;
};

/**
 * Finds the newest unused, unexpired code for the user. Returns its id
 * so the caller can mark it used together with the password change.
 */
export const findValidResetOtp = async (userId: number, otp: string): Promise<number | null> => {
  const result = await pool.query<Pick<PasswordResetOtp, 'id'>>(
    `SELECT id FROM password_reset_otps
     WHERE user_id = $1 AND otp = $2
     AND is_used = FALSE AND expires_at > NOW()
     ORDER BY created_at DESC
     LIMIT 1`,
    [userId, otp]
  );

  return result.rows[0]?.id ?? null;
};
