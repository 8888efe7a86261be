import { Response } from 'express';
import { AuthRequest } from '../../types/request.types';
import { AuthResponse } from '../../types/response.types';
import {
  registerSchema,
  loginSchema,
  updateUserSchema,
  requestResetSchema,
  resetPasswordSchema,
} from './auth.validation';
import {
  createUser,
  emailTaken,
  findPublicUserById,
  findUserByEmail,
  replaceUserImage,
  resetPasswordWithOtp,
  updateUser,
  verifyCredentials,
} from './auth.service';
import { requireAuthUser } from '../../middlewares/auth.middleware';
import { generateCode, saveResetOtp, findValidResetOtp } from '../../utils/verification';
import { sendPasswordResetOtp } from '../../utils/mail';
import { revokeToken, signAccessToken } from '../../utils/token';
import { ResponseHandler } from '../../utils/response';
import { HttpError } from '../../utils/errors';
import { logger, auditLog } from '../../utils/logging';
import { discardFiles, isStoredIn, publicUrl, saveFile, UPLOAD_FOLDER } from '../upload/localStorage.service';

const RESET_REQUESTED_MESSAGE = 'If that e-mail is registered, a reset code has been sent.';

export const register = async (req: AuthRequest, res: Response) => {
  try {
    const input = registerSchema.parse(req.body);

    if (await emailTaken(input.email)) {
      logger.warn('[Register] Email already registered', { email: input.email, ip: req.ip });
      return ResponseHandler.conflict(res, 'The email has already been taken.', { email: ['The email has already been taken.'] });
    }

    const user = await createUser(input);
    const token = signAccessToken(user.id, user.role);

    auditLog('USER_REGISTERED', { userId: user.id, email: user.email, role: user.role, ip: req.ip });

    const payload: AuthResponse = { user, token };
    return ResponseHandler.created(res, payload, 'Registration successful');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Registration failed');
  }
};

export const login = async (req: AuthRequest, res: Response) => {
  try {
    const { email, password } = loginSchema.parse(req.body);

    const user = await verifyCredentials(email, password);
    if (!user) {
      logger.warn('[Login] Invalid credentials', { email, ip: req.ip });
      return ResponseHandler.unauthorized(res, 'Invalid credentials');
    }

    const token = signAccessToken(user.id, user.role);
    auditLog('USER_LOGIN', { userId: user.id, ip: req.ip });

    const payload: AuthResponse = { user, token };
    return ResponseHandler.success(res, payload, 'Login successful');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Login failed');
  }
};

export const getProfile = async (req: AuthRequest, res: Response) => {
  try {
    const authUser = requireAuthUser(req);
    const user = await findPublicUserById(authUser.id);
    if (!user) {
      return ResponseHandler.notFound(res, 'User not found');
    }
    return ResponseHandler.success(res, { user });
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to load profile');
  }
};

export const updateDetails = async (req: AuthRequest, res: Response) => {
  try {
    const authUser = requireAuthUser(req);
    const input = updateUserSchema.parse(req.body);

    const user = await updateUser(authUser.id, input);
    if (!user) {
      return ResponseHandler.notFound(res, 'User not found');
    }

    if (input.role !== undefined && input.role !== authUser.role) {
      auditLog('USER_ROLE_CHANGED', { userId: authUser.id, from: authUser.role, to: input.role });
    }

    return ResponseHandler.success(res, { user }, 'Profile updated successfully');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to update profile');
  }
};

export const updateImage = async (req: AuthRequest, res: Response) => {
  try {
    const authUser = requireAuthUser(req);

    if (!req.file) {
      throw HttpError.unprocessable('No image file provided', { image: ['Please provide an image file'] });
    }

    const stored = await saveFile(req.file, UPLOAD_FOLDER.USER_IMAGES);
    const result = await replaceUserImage(authUser.id, stored.path);
    if (!result) {
      await discardFiles([stored.path]);
      return ResponseHandler.notFound(res, 'User not found');
    }

    // only avatars this endpoint stored; a path given at registration may point anywhere under UPLOAD_DIR
    if (isStoredIn(result.previous, UPLOAD_FOLDER.USER_IMAGES)) {
      await discardFiles([result.previous]);
    }

    return ResponseHandler.success(
      res,
      { user: result.user, image_url: publicUrl(stored.path) },
      'Image updated successfully'
    );
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to update image');
  }
};

export const logout = async (req: AuthRequest, res: Response) => {
  try {
    const authUser = requireAuthUser(req);
    await revokeToken({ jti: authUser.tokenId, exp: authUser.tokenExpiresAt });

    auditLog('USER_LOGOUT', { userId: authUser.id, ip: req.ip });
    return ResponseHandler.success(res, undefined, 'Successfully logged out');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Logout failed');
  }
};

export const requestPasswordReset = async (req: AuthRequest, res: Response) => {
  try {
    const { email } = requestResetSchema.parse(req.body);
    const user = await findUserByEmail(email);

    // Same answer either way so the endpoint does not reveal which addresses are registered
    if (!user) {
      logger.info('[Password Reset] Unknown e-mail', { email, ip: req.ip });
      return ResponseHandler.success(res, undefined, RESET_REQUESTED_MESSAGE);
    }

    const otp = generateCode(6);
    await saveResetOtp(user.id, otp);
    try {
      await sendPasswordResetOtp(user.email, user.name, otp);
    } catch (mailError) {
      // the code is stored; a delivery failure must not answer differently from an unknown address
      logger.error('[Password Reset] Failed to send reset code', { userId: user.id, error: mailError });
    }

    auditLog('PASSWORD_RESET_REQUESTED', { userId: user.id, ip: req.ip });
    return ResponseHandler.success(res, undefined, RESET_REQUESTED_MESSAGE);
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to send reset code');
  }
};

export const resetPassword = async (req: AuthRequest, res: Response) => {
  try {
    const { email, otp, password } = resetPasswordSchema.parse(req.body);

    const user = await findUserByEmail(email);
    const otpId = user ? await findValidResetOtp(user.id, otp) : null;

    if (!user || otpId === null) {
      return ResponseHandler.validationError(res, { otp: ['The reset code is invalid or has expired.'] });
    }

    await resetPasswordWithOtp(user.id, otpId, password);

    auditLog('PASSWORD_RESET', { userId: user.id, ip: req.ip });
    return ResponseHandler.success(res, undefined, 'Password has been reset successfully');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to reset password');
  }
};
