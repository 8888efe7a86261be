/**
 * Local Storage Service - files live under UPLOAD_DIR and are served at /uploads
 */

import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { appConfig } from '../../connections/config/app.config';
import { logger } from '../../utils/logging';

export const UPLOAD_FOLDER = {
  USER_IMAGES: 'userImage',
  PRODUCT_IMAGES: 'productImages',
  STORY_IMAGES: 'success_stories',
  COMMUNITY_FILES: 'communityfiles',
} as const;

export type UploadFolder = typeof UPLOAD_FOLDER[keyof typeof UPLOAD_FOLDER];

export interface StoredFile {
  // <folder>/<unique name>, what the database stores
  path: string;
  originalName: string;
  mimeType: string;
  size: number;
}

/**
 * `<base>-<timestamp>-<uuid8><ext>` with the base reduced to safe characters
 */
export const generateFileName = (originalName: string): string => {
  const ext = path.extname(originalName).toLowerCase();
  const baseName = path
    .basename(originalName, path.extname(originalName))
    .replace(/[^a-zA-Z0-9_-]+/g, '_')
    .slice(0, 50) || 'file';
  const timestamp = Date.now();
  const uuid = uuidv4().substring(0, 8);
  return `${baseName}-${timestamp}-${uuid}${ext}`;
};

/**
 * Absolute path for a stored relative path, or null when it would escape UPLOAD_DIR
 */
export const resolveUploadPath = (relativePath: string): string | null => {
  const root = path.resolve(appConfig.uploadDir);
  const target = path.resolve(root, relativePath);
  return target.startsWith(root + path.sep) ? target : null;
};

export const isStoredIn = (relativePath: string | null, folder: UploadFolder): relativePath is string =>
  relativePath !== null && relativePath.startsWith(`${folder}/`) && resolveUploadPath(relativePath) !== null;

export const publicUrl = (relativePath: string | null): string | null =>
  relativePath ? `${appConfig.baseUrl}/uploads/${relativePath}` : null;

export const saveFile = async (file: Express.Multer.File, folder: UploadFolder): Promise<StoredFile> => {
  const targetDir = path.join(appConfig.uploadDir, folder);
  await fs.mkdir(targetDir, { recursive: true });

  const uniqueFileName = generateFileName(file.originalname);
  await fs.writeFile(path.join(targetDir, uniqueFileName), file.buffer);

  return {
    path: `${folder}/${uniqueFileName}`,
    originalName: file.originalname,
    mimeType: file.mimetype,
    size: file.size,
  };
};

/**
 * Saves every file or none: when one write fails the ones already written are removed
 * before the error is rethrown.
 */
export const saveFiles = async (files: Express.Multer.File[], folder: UploadFolder): Promise<StoredFile[]> => {
  const results = await Promise.allSettled(files.map((file) => saveFile(file, folder)));
  const stored = results.flatMap((result) => (result.status === 'fulfilled' ? [result.value] : []));

  const rejected = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
  if (rejected) {
    await discardFiles(stored.map((file) => file.path));
    throw rejected.reason;
  }
  return stored;
};

/**
 * Removes a stored file. Missing files are not an error.
 */
export const deleteFile = async (relativePath: string | null | undefined): Promise<void> => {
  if (!relativePath) {
    return;
  }

  const filePath = resolveUploadPath(relativePath);
  if (!filePath) {
    logger.warn('Refusing to delete file outside upload dir', { relativePath });
    return;
  }

  try {
    await fs.unlink(filePath);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      logger.warn(`File not found: ${filePath}`);
      return;
    }
    throw error;
  }
};

export const deleteFiles = async (relativePaths: (string | null | undefined)[]): Promise<void> => {
  await Promise.all(relativePaths.map((relativePath) => deleteFile(relativePath)));
};

/**
 * Removes files without failing the caller; errors are only logged.
 */
export const discardFiles = async (relativePaths: (string | null | undefined)[]): Promise<void> => {
  try {
    await deleteFiles(relativePaths);
  } catch (error) {
    logger.error('Failed to discard uploaded files', { relativePaths, error });
  }
};
