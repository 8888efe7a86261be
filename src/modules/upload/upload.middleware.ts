/**
 * Multer configuration shared by the upload routes. Files stay in memory
 * until a controller hands them to the local storage service.
 */

import path from 'path';
import multer from 'multer';
import { HttpError } from '../../utils/errors';
import { ATTACHMENT_EXTENSIONS, ATTACHMENT_MAX_SIZE, STORY_IMAGE_MAX_COUNT, STORY_IMAGE_MAX_SIZE } from '../../constants';

interface UploadRules {
  maxFileSize: number;
  allowedMimeTypes?: readonly string[];
  allowedExtensions?: readonly string[];
}

export const IMAGE_MIME_TYPES = ['image/jpeg', 'image/jpg', 'image/png', 'image/gif', 'image/webp'] as const;

export const createUpload = ({ maxFileSize, allowedMimeTypes, allowedExtensions }: UploadRules) =>
  multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: maxFileSize,
    },
    fileFilter: (_req, file, cb) => {
      const ext = path.extname(file.originalname).toLowerCase();
      const mimeOk = !allowedMimeTypes || allowedMimeTypes.includes(file.mimetype);
      const extOk = !allowedExtensions || allowedExtensions.includes(ext);

      if (mimeOk && extOk) {
        cb(null, true);
      } else {
        cb(
          HttpError.unprocessable(`File type ${file.mimetype} is not supported`, {
            [file.fieldname]: [`The ${file.fieldname} must be a file of an allowed type.`],
          })
        );
      }
    },
  });

const imageUpload = createUpload({ maxFileSize: STORY_IMAGE_MAX_SIZE, allowedMimeTypes: IMAGE_MIME_TYPES });

export const userImageUpload = imageUpload.single('image');

export const productImageUpload = imageUpload.single('image');

export const storyImagesUpload = createUpload({
  maxFileSize: STORY_IMAGE_MAX_SIZE,
  allowedMimeTypes: IMAGE_MIME_TYPES,
}).array('images', STORY_IMAGE_MAX_COUNT);

export const messageAttachmentsUpload = createUpload({
  maxFileSize: ATTACHMENT_MAX_SIZE,
  allowedExtensions: ATTACHMENT_EXTENSIONS,
}).array('attachments', 10);

/**
 * Files multer put on the request, whichever of single/array ran
 */
export const uploadedFiles = (files: Express.Request['files']): Express.Multer.File[] =>
  Array.isArray(files) ? files : [];
