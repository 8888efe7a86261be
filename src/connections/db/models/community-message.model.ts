import type { AttachmentType } from '../../../constants';
import type { UserSummary } from './user.model';

export interface CommunityMessage {
  id: number;
  user_id: number;
  title: string | null;
  content: string;
  category: string | null;
  tags: string[];
  is_pinned: boolean;
  is_announcement: boolean;
  views_count: number;
  likes_count: number;
  replies_count: number;
  last_reply_at: Date | null;
  created_at: Date;
  updated_at: Date;
  deleted_at: Date | null;
}

export interface MessageAttachment {
  id: number;
  community_message_id: number;
  file_name: string;
  file_path: string;
  file_type: AttachmentType;
  mime_type: string;
  file_size: number;
  caption: string | null;
  display_order: number;
  created_at: Date;
  updated_at: Date;
}

export interface MessageReply {
  id: number;
  community_message_id: number;
  user_id: number;
  content: string;
  parent_reply_id: number | null;
  likes_count: number;
  created_at: Date;
  updated_at: Date;
  deleted_at: Date | null;
  user?: UserSummary | null;
  is_liked?: boolean;
}

export interface CommunityMessageWithRelations extends CommunityMessage {
  user: UserSummary | null;
  attachments: MessageAttachment[];
  is_liked?: boolean;
}
