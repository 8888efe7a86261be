import { describe, it, expect, beforeEach, vi } from 'vitest';
import bcrypt from 'bcryptjs';
import { Readable } from 'stream';
import { fakeDb } from '../../test/mocks/fakeDb';
import { mockRequest, mockResponse } from '../../test/mocks/mockExpress';

const mail = vi.hoisted(() => ({
  sendPasswordResetOtp: vi.fn(async (_to: string, _name: string, _otp: string) => undefined),
}));

const tokens = vi.hoisted(() => ({
  signAccessToken: vi.fn((_userId: number, _role: string) => 'signed-token'),
  revokeToken: vi.fn(async (_payload: { jti: string; exp: number }) => undefined),
}));

const storage = vi.hoisted(() => ({
  saveFile: vi.fn(async () => ({
    path: 'userImage/avatar-1-abcd1234.png',
    originalName: 'avatar.png',
    mimeType: 'image/png',
    size: 3,
  })),
  discardFiles: vi.fn(async (_paths: (string | null | undefined)[]) => undefined),
}));

vi.mock('../../connections', async () => (await import('../../test/mocks/fakeDb')).connectionsMock());
vi.mock('../../utils/mail', () => mail);
vi.mock('../../utils/token', () => tokens);
vi.mock('../upload/localStorage.service', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../upload/localStorage.service')>()),
  saveFile: storage.saveFile,
  discardFiles: storage.discardFiles,
}));

import { login, logout, register, requestPasswordReset, resetPassword, updateImage } from './auth.controller';

const RESET_MESSAGE = 'If that e-mail is registered, a reset code has been sent.';

const farmer = {
  id: 5,
  name: 'Test Farmer',
  username: null,
  email: 'farmer@example.com',
  phone_number: null,
  image_url: null,
  location: null,
  role: 'farmer',
  favorites: [],
};

const authUser = {
  id: 5,
  email: 'farmer@example.com',
  name: 'Test Farmer',
  role: 'farmer' as const,
  tokenId: 'jti-1',
  tokenExpiresAt: 2000000000,
};

beforeEach(() => {
  fakeDb.reset();
  mail.sendPasswordResetOtp.mockReset();
  tokens.revokeToken.mockClear();
  storage.saveFile.mockClear();
  storage.discardFiles.mockClear();
});

describe('register', () => {
  const body = { name: 'Test Farmer', email: 'Farmer@Example.com', password: 'secret-pass', role: 'farmer' };

  it('rejects a taken e-mail with 409', async () => {
    fakeDb.respond('SELECT 1 FROM users WHERE email = $1', [{ exists: 1 }]);
    const { res, statusCode, body: sent } = mockResponse();

    await register(mockRequest({ method: 'POST', body }), res);

    expect(statusCode()).toBe(409);
    expect(sent()).toMatchObject({
      success: false,
      message: 'The email has already been taken.',
      error: { code: 'CONFLICT', details: { email: ['The email has already been taken.'] } },
    });
    expect(fakeDb.find('INSERT INTO users')).toHaveLength(0);
  });

  it('stores a hashed password and returns a token', async () => {
    fakeDb.respond('INSERT INTO users', [farmer]);
    const { res, statusCode, body: sent } = mockResponse();

    await register(mockRequest({ method: 'POST', body }), res);

    expect(statusCode()).toBe(201);
    expect(sent()).toMatchObject({ success: true, data: { user: farmer, token: 'signed-token' } });

    const [insert] = fakeDb.find('INSERT INTO users');
    expect(insert.params[2]).toBe('farmer@example.com');
    expect(insert.params[4]).not.toBe('secret-pass');
    expect(bcrypt.compareSync('secret-pass', String(insert.params[4]))).toBe(true);
  });

  it('answers 422 for an unknown role', async () => {
    const { res, statusCode, body: sent } = mockResponse();

    await register(mockRequest({ method: 'POST', body: { ...body, role: 'moderator' } }), res);

    expect(statusCode()).toBe(422);
    expect(sent()).toMatchObject({ error: { details: { role: ['The selected role is invalid.'] } } });
  });
});

describe('login', () => {
  beforeEach(() => {
    fakeDb.respond('SELECT * FROM users WHERE email = $1', [
      { ...farmer, password_hash: bcrypt.hashSync('secret-pass', 4) },
    ]);
  });

  it('answers 401 for a wrong password', async () => {
    const { res, statusCode, body: sent } = mockResponse();

    await login(mockRequest({ method: 'POST', body: { email: 'farmer@example.com', password: 'wrong-pass' } }), res);

    expect(statusCode()).toBe(401);
    expect(sent()).toMatchObject({ success: false, message: 'Invalid credentials' });
  });

  it('returns the public user and a token', async () => {
    const { res, statusCode, body: sent } = mockResponse();

    await login(mockRequest({ method: 'POST', body: { email: 'farmer@example.com', password: 'secret-pass' } }), res);

    expect(statusCode()).toBe(200);
    expect(sent()).toEqual({
      success: true,
      message: 'Login successful',
      data: { user: farmer, token: 'signed-token' },
    });
  });
});

describe('logout', () => {
  it('revokes the presented token until it expires', async () => {
    const { res, statusCode } = mockResponse();

    await logout(mockRequest({ method: 'POST', user: authUser }), res);

    expect(statusCode()).toBe(200);
    expect(tokens.revokeToken).toHaveBeenCalledWith({ jti: 'jti-1', exp: 2000000000 });
  });
});

describe('requestPasswordReset', () => {
  it('answers the same for an unknown address', async () => {
    const { res, statusCode, body: sent } = mockResponse();

    await requestPasswordReset(mockRequest({ method: 'POST', body: { email: 'nobody@example.com' } }), res);

    expect(statusCode()).toBe(200);
    expect(sent()).toEqual({ success: true, message: RESET_MESSAGE, data: undefined });
    expect(mail.sendPasswordResetOtp).not.toHaveBeenCalled();
  });

  it('stores a six digit code and mails it', async () => {
    fakeDb.respond('SELECT * FROM users WHERE email = $1', [{ ...farmer, password_hash: 'hash' }]);
    const { res, statusCode } = mockResponse();

    await requestPasswordReset(mockRequest({ method: 'POST', body: { email: 'farmer@example.com' } }), res);

    expect(statusCode()).toBe(200);
    const [stored] = fakeDb.find('INSERT INTO password_reset_otps');
    expect(stored.params[0]).toBe(5);
    expect(String(stored.params[1])).toMatch(/^\d{6}$/);
    expect(mail.sendPasswordResetOtp).toHaveBeenCalledWith('farmer@example.com', 'Test Farmer', stored.params[1]);
  });

  it('keeps the same answer when the mail cannot be sent', async () => {
    fakeDb.respond('SELECT * FROM users WHERE email = $1', [{ ...farmer, password_hash: 'hash' }]);
    mail.sendPasswordResetOtp.mockRejectedValue(new Error('Email service is not configured'));
    const { res, statusCode, body: sent } = mockResponse();

    await requestPasswordReset(mockRequest({ method: 'POST', body: { email: 'farmer@example.com' } }), res);

    expect(statusCode()).toBe(200);
    expect(sent()).toEqual({ success: true, message: RESET_MESSAGE, data: undefined });
  });
});

describe('resetPassword', () => {
  const body = {
    email: 'farmer@example.com',
    otp: '123456',
    password: 'new-secret',
    password_confirmation: 'new-secret',
  };

  beforeEach(() => {
    fakeDb.respond('SELECT * FROM users WHERE email = $1', [{ ...farmer, password_hash: 'hash' }]);
  });

  it('answers 422 when no unused, unexpired code matches', async () => {
    const { res, statusCode, body: sent } = mockResponse();

    await resetPassword(mockRequest({ method: 'POST', body }), res);

    expect(statusCode()).toBe(422);
    expect(sent()).toMatchObject({ error: { details: { otp: ['The reset code is invalid or has expired.'] } } });

    const [lookup] = fakeDb.find('FROM password_reset_otps');
    expect(lookup.text).toContain('is_used = FALSE AND expires_at > NOW()');
    expect(lookup.params).toEqual([5, '123456']);
    expect(fakeDb.find('UPDATE users SET password_hash')).toHaveLength(0);
  });

  it('marks the code used and stores the new hash in one transaction', async () => {
    fakeDb.respond('SELECT id FROM password_reset_otps', [{ id: 9 }]);
    const { res, statusCode } = mockResponse();

    await resetPassword(mockRequest({ method: 'POST', body }), res);

    expect(statusCode()).toBe(200);
    expect(fakeDb.find('UPDATE password_reset_otps SET is_used = TRUE')[0].params).toEqual([9]);
    const [update] = fakeDb.find('UPDATE users SET password_hash');
    expect(bcrypt.compareSync('new-secret', String(update.params[0]))).toBe(true);
    expect(fakeDb.queries.map((q) => q.text).filter((text) => text === 'BEGIN' || text === 'COMMIT')).toEqual([
      'BEGIN',
      'COMMIT',
    ]);
  });
});

describe('updateImage', () => {
  const file: Express.Multer.File = {
    fieldname: 'image',
    originalname: 'avatar.png',
    encoding: '7bit',
    mimetype: 'image/png',
    size: 3,
    buffer: Buffer.from('png'),
    stream: Readable.from([]),
    destination: '',
    filename: '',
    path: '',
  };

  const uploadRequest = () => {
    const req = mockRequest({ method: 'POST', user: authUser });
    req.file = file;
    return req;
  };

  it('removes the previous avatar', async () => {
    fakeDb.respond('SELECT image_url FROM users', [{ image_url: 'userImage/old.png' }]);
    fakeDb.respond('UPDATE users SET image_url', [{ ...farmer, image_url: 'userImage/avatar-1-abcd1234.png' }]);
    const { res, statusCode } = mockResponse();

    await updateImage(uploadRequest(), res);

    expect(statusCode()).toBe(200);
    expect(storage.discardFiles).toHaveBeenCalledWith(['userImage/old.png']);
  });

  it('leaves files outside the avatar folder alone', async () => {
    fakeDb.respond('SELECT image_url FROM users', [{ image_url: 'productImages/someone-else.jpg' }]);
    fakeDb.respond('UPDATE users SET image_url', [{ ...farmer, image_url: 'userImage/avatar-1-abcd1234.png' }]);
    const { res, statusCode } = mockResponse();

    await updateImage(uploadRequest(), res);

    expect(statusCode()).toBe(200);
    expect(storage.discardFiles).not.toHaveBeenCalled();
  });
});
