import type { UserSummary } from './user.model';

export interface SuccessStory {
  id: number;
  user_id: number;
  title: string;
  content: string;
  location: string | null;
  crop_type: string | null;
  yield_improvement: string | null;
  yield_unit: string | null;
  is_featured: boolean;
  views_count: number;
  likes_count: number;
  comments_count: number;
  created_at: Date;
  updated_at: Date;
  deleted_at: Date | null;
}

export interface StoryImage {
  id: number;
  success_story_id: number;
  image_path: string;
  caption: string | null;
  display_order: number;
  created_at: Date;
  updated_at: Date;
}

export interface StoryComment {
  id: number;
  success_story_id: number;
  user_id: number;
  comment: string;
  parent_id: number | null;
  created_at: Date;
  updated_at: Date;
  deleted_at: Date | null;
  user?: UserSummary | null;
}

export interface SuccessStoryWithRelations extends SuccessStory {
  user: UserSummary | null;
  images: StoryImage[];
  is_liked?: boolean;
}
