import type { OrderStatus } from '../../../constants';
import type { UserSummary } from './user.model';

export interface Order {
  id: number;
  user_id: number;
  total_amount: string;
  status: OrderStatus;
  shipping_address: string;
  phone_number: string;
  notes: string | null;
  created_at: Date;
  updated_at: Date;
}

export interface OrderItem {
  id: number;
  order_id: number;
  product_id: number;
  quantity: number;
  unit_price: string;
  total_price: string;
  status: OrderStatus;
  created_at: Date;
  updated_at: Date;
}

export interface OrderItemWithProduct extends OrderItem {
  product: {
    id: number;
    name: string;
    image: string;
    user_id: number;
    seller: UserSummary | null;
  } | null;
}

export interface OrderWithItems extends Order {
  items: OrderItemWithProduct[];
  user?: UserSummary | null;
}
