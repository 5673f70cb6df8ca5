import {
  CommentModel,
  FollowModel,
  LikeModel,
  NotificationModel,
  NotificationPreferenceModel,
  PostImageModel,
  PostModel,
  UserModel,
} from '../db/models';
import { Follow, User, UserSummary } from '../models/user.model';
import { Comment, CommentWithAuthor, Like, Post, PostImage, PostWithAuthor } from '../models/post.model';
import { Notification, NotificationPreference, NotificationWithUsers } from '../models/notification.model';

export const toUser = (model: UserModel): User => ({
  id: model.id,
  username: model.username,
  email: model.email,
  firstName: model.firstName,
  lastName: model.lastName,
  role: model.role,
  isSuperuser: model.isSuperuser,
  bio: model.bio,
  avatarUrl: model.avatarUrl,
  website: model.website,
  location: model.location,
  profileVisibility: model.profileVisibility,
  dateJoined: model.dateJoined,
  lastLogin: model.lastLogin,
  isEmailVerified: model.isEmailVerified,
  isActive: model.isActive,
  isDeactivated: model.isDeactivated,
  deactivatedAt: model.deactivatedAt,
});

export const toUserSummary = (model: UserModel): UserSummary => ({
  id: model.id,
  username: model.username,
  firstName: model.firstName,
  lastName: model.lastName,
  avatarUrl: model.avatarUrl,
});

export const toFollow = (model: FollowModel): Follow => ({
  id: model.id,
  followerId: model.followerId,
  followingId: model.followingId,
  createdAt: model.createdAt,
});

export const toPost = (model: PostModel): Post => ({
  id: model.id,
  content: model.content,
  authorId: model.authorId,
  createdAt: model.createdAt,
  updatedAt: model.updatedAt,
  imageUrl: model.imageUrl,
  category: model.category,
  isActive: model.isActive,
  likeCount: model.likeCount,
  commentCount: model.commentCount,
});

const requireAuthor = (model: PostModel | CommentModel): UserModel => {
  if (!model.author) {
    throw new Error(`Author association was not loaded for ${model.constructor.name} ${model.id}`);
  }
  return model.author;
};

export const toPostWithAuthor = (model: PostModel): PostWithAuthor => ({
  ...toPost(model),
  author: toUserSummary(requireAuthor(model)),
});

export const toComment = (model: CommentModel): Comment => ({
  id: model.id,
  content: model.content,
  authorId: model.authorId,
  postId: model.postId,
  createdAt: model.createdAt,
  isActive: model.isActive,
});

export const toCommentWithAuthor = (model: CommentModel): CommentWithAuthor => ({
  ...toComment(model),
  author: toUserSummary(requireAuthor(model)),
});

export const toLike = (model: LikeModel): Like => ({
  id: model.id,
  userId: model.userId,
  postId: model.postId,
  createdAt: model.createdAt,
});

export const toPostImage = (model: PostImageModel): PostImage => ({
  id: model.id,
  postId: model.postId,
  imageUrl: model.imageUrl,
  uploadedAt: model.uploadedAt,
});

export const toNotification = (model: NotificationModel): Notification => ({
  id: model.id,
  recipientId: model.recipientId,
  senderId: model.senderId,
  notificationType: model.notificationType,
  title: model.title,
  message: model.message,
  contentType: model.contentType,
  objectId: model.objectId,
  data: model.data ?? {},
  isRead: model.isRead,
  isArchived: model.isArchived,
  createdAt: model.createdAt,
  readAt: model.readAt,
});

export const toNotificationWithUsers = (model: NotificationModel): NotificationWithUsers => ({
  ...toNotification(model),
  senderUsername: model.sender?.username ?? null,
  recipientUsername: model.recipient?.username ?? '',
});

export const toNotificationPreference = (model: NotificationPreferenceModel): NotificationPreference => ({
  emailFollows: model.emailFollows,
  emailLikes: model.emailLikes,
  emailComments: model.emailComments,
  emailMentions: model.emailMentions,
  emailSystem: model.emailSystem,
  pushFollows: model.pushFollows,
  pushLikes: model.pushLikes,
  pushComments: model.pushComments,
  pushMentions: model.pushMentions,
  pushSystem: model.pushSystem,
  inAppFollows: model.inAppFollows,
  inAppLikes: model.inAppLikes,
  inAppComments: model.inAppComments,
  inAppMentions: model.inAppMentions,
  inAppSystem: model.inAppSystem,
  quietHoursEnabled: model.quietHoursEnabled,
  quietHoursStart: model.quietHoursStart,
  quietHoursEnd: model.quietHoursEnd,
});
