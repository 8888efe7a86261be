/**
 * User Role Constants
 */
export const USER_ROLE = {
  ADMIN: 'admin',
  EXPERT: 'expert',
  FARMER: 'farmer',
  CUSTOMER: 'customer', // default
  MODERATOR: 'moderator',
} as const;

export type UserRole = typeof USER_ROLE[keyof typeof USER_ROLE];

export const USER_ROLES = [
  USER_ROLE.ADMIN,
  USER_ROLE.EXPERT,
  USER_ROLE.FARMER,
  USER_ROLE.CUSTOMER,
  USER_ROLE.MODERATOR,
] as const;

/**
 * Roles a visitor may pick at registration; moderators are appointed.
 */
export const REGISTRABLE_ROLES = [
  USER_ROLE.ADMIN,
  USER_ROLE.EXPERT,
  USER_ROLE.CUSTOMER,
  USER_ROLE.FARMER,
] as const;

/**
 * Roles allowed to edit or delete other users' community content
 */
export const COMMUNITY_MODERATOR_ROLES: readonly UserRole[] = [USER_ROLE.ADMIN, USER_ROLE.MODERATOR];

export const hasRole = (role: string, allowed: readonly UserRole[]): boolean =>
  allowed.some((candidate) => candidate === role);
