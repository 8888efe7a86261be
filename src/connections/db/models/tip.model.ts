import type { UserSummary } from './user.model';

export interface TipCategory {
  id: number;
  name: string;
  slug: string;
  description: string | null;
  icon: string | null;
  created_at: Date;
  updated_at: Date;
}

export interface Tip {
  id: number;
  user_id: number;
  category_id: number;
  title: string;
  slug: string;
  content: string;
  tags: string[];
  is_featured: boolean;
  views_count: number;
  likes_count: number;
  created_at: Date;
  updated_at: Date;
  deleted_at: Date | null;
}

export interface TipWithRelations extends Tip {
  user: UserSummary | null;
  category: Pick<TipCategory, 'id' | 'name' | 'slug'> | null;
  is_liked?: boolean;
  is_saved?: boolean;
}
