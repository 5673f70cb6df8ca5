export const USER_ROLES = ['user', 'admin'] as const;
export type UserRole = (typeof USER_ROLES)[number];

export const PROFILE_VISIBILITIES = ['public', 'private', 'followers_only'] as const;
export type ProfileVisibility = (typeof PROFILE_VISIBILITIES)[number];

export const USERNAME_PATTERN = /^[a-zA-Z0-9_]{3,30}$/;

export interface User {
  id: number;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  role: UserRole;
  isSuperuser: boolean;
  bio: string;
  avatarUrl: string;
  website: string;
  location: string;
  profileVisibility: ProfileVisibility;
  dateJoined: Date;
  lastLogin: Date | null;
  isEmailVerified: boolean;
  isActive: boolean;
  isDeactivated: boolean;
  deactivatedAt: Date | null;
}

export interface UserCreationAttributes {
  username: string;
  email: string;
  password: string;
  firstName: string;
  lastName: string;
  role?: UserRole;
  isSuperuser?: boolean;
  bio?: string;
  isEmailVerified?: boolean;
}

export interface ProfileUpdateAttributes {
  firstName?: string;
  lastName?: string;
  bio?: string;
  avatarUrl?: string;
  website?: string;
  location?: string;
  profileVisibility?: ProfileVisibility;
}

export interface AdminUserUpdateAttributes {
  role?: UserRole;
  isActive?: boolean;
  isDeactivated?: boolean;
}

export interface UserStats {
  followersCount: number;
  followingCount: number;
  postsCount: number;
}

export interface UserProfile extends UserStats {
  id: number;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  fullName: string;
  bio: string;
  avatarUrl: string;
  website: string;
  location: string;
  profileVisibility: ProfileVisibility;
  dateJoined: Date;
  lastLogin: Date | null;
  isFollowing: boolean;
}

export interface UserListItem extends UserStats {
  id: number;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  fullName: string;
  role: UserRole;
  isActive: boolean;
  isDeactivated: boolean;
  dateJoined: Date;
}

export interface UserSummary {
  id: number;
  username: string;
  firstName: string;
  lastName: string;
  avatarUrl: string;
}

export interface Follow {
  id: number;
  followerId: number;
  followingId: number;
  createdAt: Date;
}

export const fullName = (user: Pick<User, 'firstName' | 'lastName'>): string =>
  `${user.firstName} ${user.lastName}`.trim();

export const isAdmin = (user: Pick<User, 'role'>): boolean => user.role === 'admin';

export const canLogIn = (user: Pick<User, 'isActive' | 'isDeactivated'>): boolean =>
  user.isActive && !user.isDeactivated;
