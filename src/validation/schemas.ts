import { z } from 'zod';
import { COMMENT_MAX_LENGTH, POST_CATEGORIES, POST_MAX_LENGTH } from '../models/post.model';
import { PROFILE_VISIBILITIES, USER_ROLES, USERNAME_PATTERN } from '../models/user.model';

const required = (field: string) => z.string({ required_error: `${field} is required.` }).min(1, `${field} may not be blank.`);
const urlOrBlank = (max: number) => z.union([z.string().url('Enter a valid URL.').max(max), z.literal('')]);
const TIME_PATTERN = /^([01]\d|2[0-3]):[0-5]\d(:[0-5]\d)?$/;
const timeOfDay = z.string().regex(TIME_PATTERN, 'Use HH:MM or HH:MM:SS.').nullable();

export const registerSchema = z.object({
  email: z.string({ required_error: 'email is required.' }).trim().email('Enter a valid email address.').max(254),
  username: z
    .string({ required_error: 'username is required.' })
    .regex(USERNAME_PATTERN, 'Username must be 3-30 characters long and contain only letters, numbers, and underscores.'),
  password: required('password'),
  passwordConfirm: required('passwordConfirm'),
  firstName: z.string().max(150).default(''),
  lastName: z.string().max(150).default(''),
});

export const tokenSchema = z.object({ token: required('token') });

export const loginSchema = z.object({
  emailOrUsername: required('emailOrUsername'),
  password: required('password'),
});

export const refreshSchema = z.object({ refreshToken: required('refreshToken') });

export const logoutSchema = z.object({ refreshToken: z.string().optional() });

export const passwordChangeSchema = z.object({
  oldPassword: required('oldPassword'),
  newPassword: required('newPassword'),
  newPasswordConfirm: required('newPasswordConfirm'),
});

export const passwordResetSchema = z.object({
  email: z.string({ required_error: 'email is required.' }).trim().email('Enter a valid email address.'),
});

export const passwordResetConfirmSchema = z.object({
  token: required('token'),
  newPassword: required('newPassword'),
  newPasswordConfirm: required('newPasswordConfirm'),
});

export const profileUpdateSchema = z
  .object({
    firstName: z.string().max(150),
    lastName: z.string().max(150),
    bio: z.string().max(160),
    avatarUrl: urlOrBlank(200),
    website: urlOrBlank(200),
    location: z.string().max(100),
    profileVisibility: z.enum(PROFILE_VISIBILITIES),
  })
  .partial();

const postContent = z
  .string({ required_error: 'content is required.' })
  .trim()
  .min(1, 'Post content cannot be empty.')
  .max(POST_MAX_LENGTH, `Post content cannot exceed ${POST_MAX_LENGTH} characters.`);

export const postCreateSchema = z.object({
  content: postContent,
  imageUrl: z.string().url('Enter a valid URL.').max(200).nullable().optional(),
  category: z.enum(POST_CATEGORIES).optional(),
});

export const postUpdateSchema = postCreateSchema.partial();

export const commentSchema = z.object({
  content: z
    .string({ required_error: 'content is required.' })
    .trim()
    .min(1, 'Comment content cannot be empty.')
    .max(COMMENT_MAX_LENGTH, `Comment cannot exceed ${COMMENT_MAX_LENGTH} characters.`),
});

export const postImageSchema = z.object({
  imageUrl: z.string({ required_error: 'imageUrl is required.' }).url('Enter a valid URL.').max(200),
});

export const notificationUpdateSchema = z
  .object({ isRead: z.boolean(), isArchived: z.boolean() })
  .partial();

export const preferencesUpdateSchema = z
  .object({
    emailFollows: z.boolean(),
    emailLikes: z.boolean(),
    emailComments: z.boolean(),
    emailMentions: z.boolean(),
    emailSystem: z.boolean(),
    pushFollows: z.boolean(),
    pushLikes: z.boolean(),
    pushComments: z.boolean(),
    pushMentions: z.boolean(),
    pushSystem: z.boolean(),
    inAppFollows: z.boolean(),
    inAppLikes: z.boolean(),
    inAppComments: z.boolean(),
    inAppMentions: z.boolean(),
    inAppSystem: z.boolean(),
    quietHoursEnabled: z.boolean(),
    quietHoursStart: timeOfDay,
    quietHoursEnd: timeOfDay,
  })
  .partial();

export const adminUserUpdateSchema = z
  .object({
    role: z.enum(USER_ROLES),
    isActive: z.boolean(),
    isDeactivated: z.boolean(),
  })
  .partial();
