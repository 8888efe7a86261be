import type { PublicUser } from '../connections/db/models';

export interface AuthResponse {
  user: PublicUser;
  token: string;
}

export interface ToggleLikeResponse {
  is_liked: boolean;
  likes_count: number;
}

export type PollingMeta = {
  server_time: string;
  polling_interval: number;
};
