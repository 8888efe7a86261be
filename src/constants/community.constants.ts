export const ATTACHMENT_TYPE = {
  IMAGE: 'image',
  VIDEO: 'video',
  AUDIO: 'audio',
  DOCUMENT: 'document',
} as const;

export type AttachmentType = typeof ATTACHMENT_TYPE[keyof typeof ATTACHMENT_TYPE];

export const ATTACHMENT_EXTENSIONS = [
  '.jpg', '.jpeg', '.png', '.gif',
  '.pdf', '.doc', '.docx', '.txt',
  '.mp4', '.avi', '.mov',
  '.mp3', '.wav',
] as const;

export const ATTACHMENT_MAX_SIZE = 10 * 1024 * 1024;
export const STORY_IMAGE_MAX_SIZE = 5 * 1024 * 1024;
export const STORY_IMAGE_MAX_COUNT = 10;

export const PAGE_SIZE = {
  TIPS: 10,
  STORIES: 10,
  COMMENTS: 10,
  MESSAGES: 20,
  REPLIES: 20,
} as const;

export const POLL_LIMIT = 50;
export const LATEST_LIMIT = 10;

export const MESSAGE_MAX_LENGTH = 10000;
export const REPLY_MAX_LENGTH = 5000;

export const attachmentTypeFromMime = (mimeType: string): AttachmentType => {
  if (mimeType.startsWith('image/')) return ATTACHMENT_TYPE.IMAGE;
  if (mimeType.startsWith('video/')) return ATTACHMENT_TYPE.VIDEO;
  if (mimeType.startsWith('audio/')) return ATTACHMENT_TYPE.AUDIO;
  return ATTACHMENT_TYPE.DOCUMENT;
};
