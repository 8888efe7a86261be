import type { Category } from './category.model';
import type { UserSummary } from './user.model';

export interface Product {
  id: number;
  user_id: number;
  category_id: number;
  name: string;
  description: string;
  image: string; // productImages/<file>
  price: string; // DECIMAL(10,2), pg returns numerics as strings
  stock: number;
  location: string | null;
  is_featured: boolean;
  created_at: Date;
  updated_at: Date;
}

export interface ProductWithRelations extends Product {
  category: Pick<Category, 'id' | 'name'> | null;
  user: UserSummary | null;
}
