import bcrypt from 'bcryptjs';
import { pool, withTransaction } from '../../connections';
import type { PublicUser, User } from '../../connections/db/models';
import { PUBLIC_USER_COLUMNS } from '../../utils/sql';
import type { RegisterInput, UpdateUserInput } from './auth.validation';

const BCRYPT_ROUNDS = 10;

export const findPublicUserById = async (id: number): Promise<PublicUser | null> => {
  const result = await pool.query<PublicUser>(`SELECT ${PUBLIC_USER_COLUMNS} FROM users WHERE id = $1`, [id]);
  return result.rows[0] ?? null;
};

export const findUserByEmail = async (email: string): Promise<User | null> => {
  const result = await pool.query<User>('SELECT * FROM users WHERE email = $1', [email]);
  return result.rows[0] ?? null;
};

export const emailTaken = async (email: string): Promise<boolean> => {
  const result = await pool.query('SELECT 1 FROM users WHERE email = $1', [email]);
  return result.rows.length > 0;
};

export const createUser = async (input: RegisterInput): Promise<PublicUser> => {
  const passwordHash = await bcrypt.hash(input.password, BCRYPT_ROUNDS);

  const result = await pool.query<PublicUser>(
    `INSERT INTO users (name, username, email, phone_number, password_hash, image_url, location, role)
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
     RETURNING ${PUBLIC_USER_COLUMNS}`,
    [
      input.name,
      input.username ?? null,
      input.email,
      input.phone_number ?? null,
      passwordHash,
      input.image_url ?? null,
      input.location ?? null,
      input.role,
    ]
  );

  return result.rows[0];
};

export const verifyCredentials = async (email: string, password: string): Promise<PublicUser | null> => {
  const user = await findUserByEmail(email);
  if (!user || !(await bcrypt.compare(password, user.password_hash))) {
    return null;
  }
  const { password_hash: _hash, ...publicUser } = user;
  return publicUser;
};

export const updateUser = async (id: number, input: UpdateUserInput): Promise<PublicUser | null> => {
  const updateFields: string[] = [];
  const values: unknown[] = [];

  const assign = (column: string, value: unknown) => {
    values.push(value);
    updateFields.push(`${column} = $${values.length}`);
  };

  if (input.name !== undefined) assign('name', input.name);
  if (input.username !== undefined) assign('username', input.username);
  if (input.phone_number !== undefined) assign('phone_number', input.phone_number);
  if (input.location !== undefined) assign('location', input.location);
  if (input.role !== undefined) assign('role', input.role);
  if (input.favorites !== undefined) assign('favorites', JSON.stringify(input.favorites));

  if (updateFields.length === 0) {
    return findPublicUserById(id);
  }

  values.push(id);
  const result = await pool.query<PublicUser>(
    `UPDATE users SET ${updateFields.join(', ')}, updated_at = CURRENT_TIMESTAMP
     WHERE id = $${values.length}
     RETURNING ${PUBLIC_USER_COLUMNS}`,
    values
  );

  return result.rows[0] ?? null;
};

/**
 * Stores the new image path and returns the previous one for cleanup
 */
export const replaceUserImage = async (
  id: number,
  imagePath: string
): Promise<{ user: PublicUser; previous: string | null } | null> => {
  const previous = await pool.query<{ image_url: string | null }>('SELECT image_url FROM users WHERE id = $1', [id]);
  if (previous.rows.length === 0) {
    return null;
  }

  const result = await pool.query<PublicUser>(
    `UPDATE users SET image_url = $1, updated_at = CURRENT_TIMESTAMP
     WHERE id = $2
     RETURNING ${PUBLIC_USER_COLUMNS}`,
    [imagePath, id]
  );

  return { user: result.rows[0], previous: previous.rows[0].image_url };
};

/**
 * Consumes the reset code and stores the new password hash atomically
 */
export const resetPasswordWithOtp = async (userId: number, otpId: number, password: string): Promise<void> => {
  const passwordHash = await bcrypt.hash(password, BCRYPT_ROUNDS);

  await withTransaction(async (client) => {
    await client.query(
      'UPDATE password_reset_otps SET is_used = TRUE, updated_at = CURRENT_TIMESTAMP WHERE id = $1',
      [otpId]
    );
    await client.query(
      'UPDATE users SET password_hash = $1, updated_at = CURRENT_TIMESTAMP WHERE id = $2',
      [passwordHash, userId]
    );
  });
};
