import { DataTypes, Model, Optional, Sequelize } from 'sequelize';
import { ProfileVisibility, UserRole } from '../models/user.model';
import { PostCategory } from '../models/post.model';
import { NotificationData, NotificationType } from '../models/notification.model';

export interface UserAttributes {
  id: number;
  username: string;
  email: string;
  passwordHash: string;
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
  emailVerificationToken: string;
  emailVerificationExpires: Date | null;
  passwordResetToken: string;
  passwordResetExpires: Date | null;
  isActive: boolean;
  isDeactivated: boolean;
  deactivatedAt: Date | null;
}

type UserOptionalAttributes =
  | 'id'
  | 'role'
  | 'isSuperuser'
  | 'bio'
  | 'avatarUrl'
  | 'website'
  | 'location'
  | 'profileVisibility'
  | 'dateJoined'
  | 'lastLogin'
  | 'isEmailVerified'
  | 'emailVerificationToken'
  | 'emailVerificationExpires'
  | 'passwordResetToken'
  | 'passwordResetExpires'
  | 'isActive'
  | 'isDeactivated'
  | 'deactivatedAt';

export class UserModel extends Model<UserAttributes, Optional<UserAttributes, UserOptionalAttributes>> implements UserAttributes {
  public id!: number;
  public username!: string;
  public email!: string;
  public passwordHash!: string;
  public firstName!: string;
  public lastName!: string;
  public role!: UserRole;
  public isSuperuser!: boolean;
  public bio!: string;
  public avatarUrl!: string;
  public website!: string;
  public location!: string;
  public profileVisibility!: ProfileVisibility;
  public dateJoined!: Date;
  public lastLogin!: Date | null;
  public isEmailVerified!: boolean;
  public emailVerificationToken!: string;
  public emailVerificationExpires!: Date | null;
  public passwordResetToken!: string;
  public passwordResetExpires!: Date | null;
  public isActive!: boolean;
  public isDeactivated!: boolean;
  public deactivatedAt!: Date | null;
}

export interface FollowAttributes {
  id: number;
  followerId: number;
  followingId: number;
  createdAt: Date;
}

export class FollowModel extends Model<FollowAttributes, Optional<FollowAttributes, 'id' | 'createdAt'>> implements FollowAttributes {
  public id!: number;
  public followerId!: number;
  public followingId!: number;
  public createdAt!: Date;

  public follower?: UserModel;
  public following?: UserModel;
}

export interface PostAttributes {
  id: number;
  content: string;
  authorId: number;
  imageUrl: string | null;
  category: PostCategory;
  isActive: boolean;
  likeCount: number;
  commentCount: number;
  createdAt: Date;
  updatedAt: Date;
}

type PostOptionalAttributes = 'id' | 'imageUrl' | 'category' | 'isActive' | 'likeCount' | 'commentCount' | 'createdAt' | 'updatedAt';

export class PostModel extends Model<PostAttributes, Optional<PostAttributes, PostOptionalAttributes>> implements PostAttributes {
  public id!: number;
  public content!: string;
  public authorId!: number;
  public imageUrl!: string | null;
  public category!: PostCategory;
  public isActive!: boolean;
  public likeCount!: number;
  public commentCount!: number;
  public createdAt!: Date;
  public updatedAt!: Date;

  public author?: UserModel;
}

export interface CommentAttributes {
  id: number;
  content: string;
  authorId: number;
  postId: number;
  isActive: boolean;
  createdAt: Date;
}

export class CommentModel extends Model<CommentAttributes, Optional<CommentAttributes, 'id' | 'isActive' | 'createdAt'>> implements CommentAttributes {
  public id!: number;
  public content!: string;
  public authorId!: number;
  public postId!: number;
  public isActive!: boolean;
  public createdAt!: Date;

  public author?: UserModel;
}

export interface LikeAttributes {
  id: number;
  userId: number;
  postId: number;
  createdAt: Date;
}

export class LikeModel extends Model<LikeAttributes, Optional<LikeAttributes, 'id' | 'createdAt'>> implements LikeAttributes {
  public id!: number;
  public userId!: number;
  public postId!: number;
  public createdAt!: Date;
}

export interface PostImageAttributes {
  id: number;
  postId: number;
  imageUrl: string;
  uploadedAt: Date;
}

export class PostImageModel extends Model<PostImageAttributes, Optional<PostImageAttributes, 'id' | 'uploadedAt'>> implements PostImageAttributes {
  public id!: number;
  public postId!: number;
  public imageUrl!: string;
  public uploadedAt!: Date;
}

export interface NotificationAttributes {
  id: number;
  recipientId: number;
  senderId: number | null;
  notificationType: NotificationType;
  title: string;
  message: string;
  contentType: string | null;
  objectId: number | null;
  data: NotificationData;
  isRead: boolean;
  isArchived: boolean;
  createdAt: Date;
  readAt: Date | null;
}

type NotificationOptionalAttributes = 'id' | 'senderId' | 'contentType' | 'objectId' | 'data' | 'isRead' | 'isArchived' | 'createdAt' | 'readAt';

export class NotificationModel extends Model<NotificationAttributes, Optional<NotificationAttributes, NotificationOptionalAttributes>> implements NotificationAttributes {
  public id!: number;
  public recipientId!: number;
  public senderId!: number | null;
  public notificationType!: NotificationType;
  public title!: string;
  public message!: string;
  public contentType!: string | null;
  public objectId!: number | null;
  public data!: NotificationData;
  public isRead!: boolean;
  public isArchived!: boolean;
  public createdAt!: Date;
  public readAt!: Date | null;

  public sender?: UserModel | null;
  public recipient?: UserModel;
}

export interface NotificationPreferenceAttributes {
  id: number;
  userId: number;
  emailFollows: boolean;
  emailLikes: boolean;
  emailComments: boolean;
  emailMentions: boolean;
  emailSystem: boolean;
  pushFollows: boolean;
  pushLikes: boolean;
  pushComments: boolean;
  pushMentions: boolean;
  pushSystem: boolean;
  inAppFollows: boolean;
  inAppLikes: boolean;
  inAppComments: boolean;
  inAppMentions: boolean;
  inAppSystem: boolean;
  quietHoursEnabled: boolean;
  quietHoursStart: string | null;
  quietHoursEnd: string | null;
}

export class NotificationPreferenceModel
  extends Model<NotificationPreferenceAttributes, Optional<NotificationPreferenceAttributes, Exclude<keyof NotificationPreferenceAttributes, 'userId'>>>
  implements NotificationPreferenceAttributes
{
  public id!: number;
  public userId!: number;
  public emailFollows!: boolean;
  public emailLikes!: boolean;
  public emailComments!: boolean;
  public emailMentions!: boolean;
  public emailSystem!: boolean;
  public pushFollows!: boolean;
  public pushLikes!: boolean;
  public pushComments!: boolean;
  public pushMentions!: boolean;
  public pushSystem!: boolean;
  public inAppFollows!: boolean;
  public inAppLikes!: boolean;
  public inAppComments!: boolean;
  public inAppMentions!: boolean;
  public inAppSystem!: boolean;
  public quietHoursEnabled!: boolean;
  public quietHoursStart!: string | null;
  public quietHoursEnd!: string | null;
}

export interface RevokedTokenAttributes {
  jti: string;
  userId: number;
  expiresAt: Date;
  revokedAt: Date;
}

export class RevokedTokenModel extends Model<RevokedTokenAttributes, Optional<RevokedTokenAttributes, 'revokedAt'>> implements RevokedTokenAttributes {
  public jti!: string;
  public userId!: number;
  public expiresAt!: Date;
  public revokedAt!: Date;
}

const flag = () => ({ type: DataTypes.BOOLEAN, allowNull: false, defaultValue: true });

export function initModels(sequelize: Sequelize): void {
  UserModel.init(
    {
      id: { type: DataTypes.INTEGER, autoIncrement: true, primaryKey: true },
      username: { type: DataTypes.STRING(30), allowNull: false, unique: true },
      email: { type: DataTypes.STRING(254), allowNull: false, unique: true },
      passwordHash: { type: DataTypes.STRING, allowNull: false },
      firstName: { type: DataTypes.STRING(150), allowNull: false, defaultValue: '' },
      lastName: { type: DataTypes.STRING(150), allowNull: false, defaultValue: '' },
      role: { type: DataTypes.STRING(10), allowNull: false, defaultValue: 'user' },
      isSuperuser: { type: DataTypes.BOOLEAN, allowNull: false, defaultValue: false },
      bio: { type: DataTypes.STRING(160), allowNull: false, defaultValue: '' },
      avatarUrl: { type: DataTypes.STRING(200), allowNull: false, defaultValue: '' },
      website: { type: DataTypes.STRING(200), allowNull: false, defaultValue: '' },
      location: { type: DataTypes.STRING(100), allowNull: false, defaultValue: '' },
      profileVisibility: { type: DataTypes.STRING(20), allowNull: false, defaultValue: 'public' },
      dateJoined: { type: DataTypes.DATE, allowNull: false, defaultValue: DataTypes.NOW },
      lastLogin: { type: DataTypes.DATE, allowNull: true },
      isEmailVerified: { type: DataTypes.BOOLEAN, allowNull: false, defaultValue: false },
      emailVerificationToken: { type: DataTypes.STRING(100), allowNull: false, defaultValue: '' },
      emailVerificationExpires: { type: DataTypes.DATE, allowNull: true },
      passwordResetToken: { type: DataTypes.STRING(100), allowNull: false, defaultValue: '' },
      passwordResetExpires: { type: DataTypes.DATE, allowNull: true },
      isActive: { type: DataTypes.BOOLEAN, allowNull: false, defaultValue: true },
      isDeactivated: { type: DataTypes.BOOLEAN, allowNull: false, defaultValue: false },
      deactivatedAt: { type: DataTypes.DATE, allowNull: true },
    },
    { sequelize, modelName: 'User', tableName: 'users', underscored: true, timestamps: false }
  );

  FollowModel.init(
    {
      id: { type: DataTypes.INTEGER, autoIncrement: true, primaryKey: true },
      followerId: { type: DataTypes.INTEGER, allowNull: false },
      followingId: { type: DataTypes.INTEGER, allowNull: false },
      createdAt: { type: DataTypes.DATE, allowNull: false, defaultValue: DataTypes.NOW },
    },
    {
      sequelize,
      modelName: 'Follow',
      tableName: 'follows',
      underscored: true,
      timestamps: true,
      updatedAt: false,
      indexes: [{ unique: true, fields: ['follower_id', 'following_id'] }],
    }
  );

  PostModel.init(
    {
      id: { type: DataTypes.INTEGER, autoIncrement: true, primaryKey: true },
      content: { type: DataTypes.TEXT, allowNull: false },
      authorId: { type: DataTypes.INTEGER, allowNull: false },
      imageUrl: { type: DataTypes.STRING(200), allowNull: true },
      category: { type: DataTypes.STRING(20), allowNull: false, defaultValue: 'general' },
      isActive: { type: DataTypes.BOOLEAN, allowNull: false, defaultValue: true },
      likeCount: { type: DataTypes.INTEGER, allowNull: false, defaultValue: 0 },
      commentCount: { type: DataTypes.INTEGER, allowNull: false, defaultValue: 0 },
      createdAt: { type: DataTypes.DATE, allowNull: false, defaultValue: DataTypes.NOW },
      updatedAt: { type: DataTypes.DATE, allowNull: false, defaultValue: DataTypes.NOW },
    },
    { sequelize, modelName: 'Post', tableName: 'posts', underscored: true, timestamps: true }
  );

  CommentModel.init(
    {
      id: { type: DataTypes.INTEGER, autoIncrement: true, primaryKey: true },
      content: { type: DataTypes.TEXT, allowNull: false },
      authorId: { type: DataTypes.INTEGER, allowNull: false },
      postId: { type: DataTypes.INTEGER, allowNull: false },
      isActive: { type: DataTypes.BOOLEAN, allowNull: false, defaultValue: true },
      createdAt: { type: DataTypes.DATE, allowNull: false, defaultValue: DataTypes.NOW },
    },
    { sequelize, modelName: 'Comment', tableName: 'comments', underscored: true, timestamps: true, updatedAt: false }
  );

  LikeModel.init(
    {
      id: { type: DataTypes.INTEGER, autoIncrement: true, primaryKey: true },
      userId: { type: DataTypes.INTEGER, allowNull: false },
      postId: { type: DataTypes.INTEGER, allowNull: false },
      createdAt: { type: DataTypes.DATE, allowNull: false, defaultValue: DataTypes.NOW },
    },
    {
      sequelize,
      modelName: 'Like',
      tableName: 'likes',
      underscored: true,
      timestamps: true,
      updatedAt: false,
      indexes: [{ unique: true, fields: ['user_id', 'post_id'] }],
    }
  );

  PostImageModel.init(
    {
      id: { type: DataTypes.INTEGER, autoIncrement: true, primaryKey: true },
      postId: { type: DataTypes.INTEGER, allowNull: false },
      imageUrl: { type: DataTypes.STRING(200), allowNull: false },
      uploadedAt: { type: DataTypes.DATE, allowNull: false, defaultValue: DataTypes.NOW },
    },
    { sequelize, modelName: 'PostImage', tableName: 'post_images', underscored: true, timestamps: false }
  );

  NotificationModel.init(
    {
      id: { type: DataTypes.INTEGER, autoIncrement: true, primaryKey: true },
      recipientId: { type: DataTypes.INTEGER, allowNull: false },
      senderId: { type: DataTypes.INTEGER, allowNull: true },
      notificationType: { type: DataTypes.STRING(20), allowNull: false },
      title: { type: DataTypes.STRING(100), allowNull: false },
      message: { type: DataTypes.STRING(200), allowNull: false },
      contentType: { type: DataTypes.STRING(50), allowNull: true },
      objectId: { type: DataTypes.INTEGER, allowNull: true },
      data: { type: DataTypes.JSON, allowNull: false, defaultValue: {} },
      isRead: { type: DataTypes.BOOLEAN, allowNull: false, defaultValue: false },
      isArchived: { type: DataTypes.BOOLEAN, allowNull: false, defaultValue: false },
      createdAt: { type: DataTypes.DATE, allowNull: false, defaultValue: DataTypes.NOW },
      readAt: { type: DataTypes.DATE, allowNull: true },
    },
    { sequelize, modelName: 'Notification', tableName: 'notifications', underscored: true, timestamps: true, updatedAt: false }
  );

  NotificationPreferenceModel.init(
    {
      id: { type: DataTypes.INTEGER, autoIncrement: true, primaryKey: true },
      userId: { type: DataTypes.INTEGER, allowNull: false, unique: true },
      emailFollows: flag(),
      emailLikes: flag(),
      emailComments: flag(),
      emailMentions: flag(),
      emailSystem: flag(),
      pushFollows: flag(),
      pushLikes: flag(),
      pushComments: flag(),
      pushMentions: flag(),
      pushSystem: flag(),
      inAppFollows: flag(),
      inAppLikes: flag(),
      inAppComments: flag(),
      inAppMentions: flag(),
      inAppSystem: flag(),
      quietHoursEnabled: { type: DataTypes.BOOLEAN, allowNull: false, defaultValue: false },
      quietHoursStart: { type: DataTypes.STRING(8), allowNull: true },
      quietHoursEnd: { type: DataTypes.STRING(8), allowNull: true },
    },
    { sequelize, modelName: 'NotificationPreference', tableName: 'notification_preferences', underscored: true, timestamps: false }
  );

  RevokedTokenModel.init(
    {
      jti: { type: DataTypes.STRING(36), primaryKey: true },
      userId: { type: DataTypes.INTEGER, allowNull: false },
      expiresAt: { type: DataTypes.DATE, allowNull: false },
      revokedAt: { type: DataTypes.DATE, allowNull: false, defaultValue: DataTypes.NOW },
    },
    { sequelize, modelName: 'RevokedToken', tableName: 'revoked_tokens', underscored: true, timestamps: false }
  );

  const cascade = { onDelete: 'CASCADE' as const };

  FollowModel.belongsTo(UserModel, { foreignKey: 'followerId', as: 'follower', ...cascade });
  FollowModel.belongsTo(UserModel, { foreignKey: 'followingId', as: 'following', ...cascade });
  UserModel.hasMany(FollowModel, { foreignKey: 'followerId', as: 'followingLinks', ...cascade });
  UserModel.hasMany(FollowModel, { foreignKey: 'followingId', as: 'followerLinks', ...cascade });

  PostModel.belongsTo(UserModel, { foreignKey: 'authorId', as: 'author', ...cascade });
  UserModel.hasMany(PostModel, { foreignKey: 'authorId', as: 'posts', ...cascade });

  CommentModel.belongsTo(UserModel, { foreignKey: 'authorId', as: 'author', ...cascade });
  CommentModel.belongsTo(PostModel, { foreignKey: 'postId', as: 'post', ...cascade });
  PostModel.hasMany(CommentModel, { foreignKey: 'postId', as: 'comments', ...cascade });

  LikeModel.belongsTo(UserModel, { foreignKey: 'userId', as: 'user', ...cascade });
  LikeModel.belongsTo(PostModel, { foreignKey: 'postId', as: 'post', ...cascade });
  PostModel.hasMany(LikeModel, { foreignKey: 'postId', as: 'likes', ...cascade });

  PostImageModel.belongsTo(PostModel, { foreignKey: 'postId', as: 'post', ...cascade });
  PostModel.hasMany(PostImageModel, { foreignKey: 'postId', as: 'images', ...cascade });

  NotificationModel.belongsTo(UserModel, { foreignKey: 'recipientId', as: 'recipient', ...cascade });
  NotificationModel.belongsTo(UserModel, { foreignKey: 'senderId', as: 'sender', ...cascade });

  NotificationPreferenceModel.belongsTo(UserModel, { foreignKey: 'userId', as: 'user', ...cascade });
  RevokedTokenModel.belongsTo(UserModel, { foreignKey: 'userId', as: 'user', ...cascade });
}
