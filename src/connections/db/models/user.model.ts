import type { UserRole } from '../../../constants';

export interface User {
  id: number;
  name: string;
  username: string | null;
  email: string;
  phone_number: string | null;
  password_hash: string;
  image_url: string | null; // relative to the upload dir
  location: string | null;
  role: UserRole;
  favorites: string[];
  created_at: Date;
  updated_at: Date;
}

export type PublicUser = Omit<User, 'password_hash'>;

// Fields shown when a user is embedded in another resource
export interface UserSummary {
  id: number;
  name: string;
  username: string | null;
  image_url: string | null;
  location: string | null;
  role: UserRole;
}

export interface PasswordResetOtp {
  id: number;
  user_id: number;
  otp: string;
  expires_at: Date;
  is_used: boolean;
  created_at: Date;
  updated_at: Date;
}
