import winston from 'winston';
import {
  AdminNotificationQuery,
  isQuietHours,
  NotificationCreationAttributes,
  NotificationDetail,
  NotificationListItem,
  NotificationPreference,
  NotificationPreferenceUpdate,
  NotificationQuery,
  NotificationStats,
  NotificationWithUsers,
  notificationText,
  shouldDeliver,
} from '../models/notification.model';
import { Comment, Post } from '../models/post.model';
import { User } from '../models/user.model';
import { NotificationBroker } from '../realtime/notification.broker';
import { NotificationChanges, NotificationRepository } from '../repositories/notification.repository';
import { UserRepository } from '../repositories/user.repository';
import { NotFoundError } from '../utils/errors';
import { errorMessage } from '../utils/logger';
import { mapPage, Page, PageRequest } from '../utils/pagination';
import { extractMentions, truncate } from '../utils/text';

/** The user whose action triggers a notification. */
export type Actor = Pick<User, 'id' | 'username'>;

export const toNotificationListItem = (notification: NotificationWithUsers): NotificationListItem => ({
  id: notification.id,
  senderUsername: notification.senderUsername,
  notificationType: notification.notificationType,
  title: notification.title,
  message: notification.message,
  notificationText: notificationText(notification, notification.senderUsername),
  isRead: notification.isRead,
  isArchived: notification.isArchived,
  createdAt: notification.createdAt,
});

export const toNotificationDetail = (notification: NotificationWithUsers): NotificationDetail => ({
  ...notification,
  notificationText: notificationText(notification, notification.senderUsername),
});

export class NotificationService {
  private notificationRepository: NotificationRepository;
  private userRepository: UserRepository;
  private broker: NotificationBroker;
  private logger: winston.Logger;
  private clock: () => Date;

  constructor(
    notificationRepository: NotificationRepository,
    userRepository: UserRepository,
    broker: NotificationBroker,
    loggerInstance: winston.Logger,
    clock: () => Date = () => new Date()
  ) {
    this.notificationRepository = notificationRepository;
    this.userRepository = userRepository;
    this.broker = broker;
    this.logger = loggerInstance;
    this.clock = clock;
  }

  /**
   * Stores the notification unless the recipient turned off in-app delivery
   * for its type, then pushes it in real time unless push is off or quiet
   * hours are active. Resolves to undefined when nothing was stored.
   */
  async createNotification(input: NotificationCreationAttributes, correlationId?: string): Promise<NotificationWithUsers | undefined> {
    const preference = await this.notificationRepository.getOrCreatePreferences(input.recipientId, correlationId);
    if (!shouldDeliver(preference, input.notificationType, 'inApp')) {
      this.logger.info('NotificationService: In-app delivery disabled by recipient, skipping', {
        correlationId,
        recipientId: input.recipientId,
        notificationType: input.notificationType,
        type: 'ServiceLog.createNotificationSuppressed',
      });
      return undefined;
    }
    return this.storeAndPush(input, preference, correlationId);
  }

  private async storeAndPush(
    input: NotificationCreationAttributes,
    preference: NotificationPreference,
    correlationId?: string
  ): Promise<NotificationWithUsers> {
    const notification = await this.notificationRepository.createNotification(input, correlationId);
    this.logger.info('NotificationService: Notification stored', {
      correlationId,
      notificationId: notification.id,
      recipientId: notification.recipientId,
      notificationType: notification.notificationType,
      type: 'ServiceLog.createNotificationSuccess',
    });

    if (!shouldDeliver(preference, input.notificationType, 'push')) {
      this.logger.debug('NotificationService: Push disabled by recipient', { correlationId, notificationId: notification.id, type: 'ServiceLog.pushSuppressed' });
    } else if (isQuietHours(preference, this.clock())) {
      this.logger.debug('NotificationService: Quiet hours active, not pushing', { correlationId, notificationId: notification.id, type: 'ServiceLog.pushQuietHours' });
    } else {
      await this.push(notification.recipientId, 'notification', { notification: toNotificationListItem(notification) }, correlationId);
    }
    return notification;
  }

  private async push(
    userId: number,
    event: 'notification' | 'notification_update',
    payload: Record<string, unknown>,
    correlationId?: string
  ): Promise<void> {
    try {
      await this.broker.publish({ userId, event, payload });
    } catch (error) {
      this.logger.error('NotificationService: Real-time delivery failed', {
        correlationId,
        userId,
        event,
        error: errorMessage(error),
        type: 'ServiceError.pushNotification',
      });
    }
  }

  async notifyFollow(follower: Actor, following: Actor, correlationId?: string): Promise<void> {
    if (follower.id === following.id) return;
    await this.createNotification({
      recipientId: following.id,
      senderId: follower.id,
      notificationType: 'follow',
      title: 'New Follower',
      message: `${follower.username} started following you`,
      data: { followerId: follower.id, followerUsername: follower.username },
    }, correlationId);
  }

  async notifyLike(liker: Actor, post: Post, correlationId?: string): Promise<void> {
    if (liker.id === post.authorId) return;
    await this.createNotification({
      recipientId: post.authorId,
      senderId: liker.id,
      notificationType: 'like',
      title: 'New Like',
      message: `${liker.username} liked your post`,
      contentType: 'post',
      objectId: post.id,
      data: { postId: post.id, postContent: truncate(post.content) },
    }, correlationId);
  }

  async notifyComment(commenter: Actor, post: Post, comment: Comment, correlationId?: string): Promise<void> {
    if (commenter.id === post.authorId) return;
    await this.createNotification({
      recipientId: post.authorId,
      senderId: commenter.id,
      notificationType: 'comment',
      title: 'New Comment',
      message: `${commenter.username} commented on your post`,
      contentType: 'post',
      objectId: post.id,
      data: {
        postId: post.id,
        commentId: comment.id,
        commentContent: truncate(comment.content),
        postContent: truncate(post.content),
      },
    }, correlationId);
  }

  /** Each mentioned active user is notified once, except the commenter and the post author. */
  async notifyMentions(commenter: Actor, post: Post, comment: Comment, correlationId?: string): Promise<number> {
    const usernames = extractMentions(comment.content);
    if (usernames.length === 0) return 0;

    const mentioned = await this.userRepository.findActiveUsersByUsernames(usernames, correlationId);
    const recipients = mentioned.filter(user => user.id !== commenter.id && user.id !== post.authorId);
    for (const recipient of recipients) {
      await this.createNotification({
        recipientId: recipient.id,
        senderId: commenter.id,
        notificationType: 'mention',
        title: 'Mentioned in Comment',
        message: `${commenter.username} mentioned you in a comment`,
        contentType: 'post',
        objectId: post.id,
        data: { postId: post.id, commentId: comment.id, commentContent: truncate(comment.content) },
      }, correlationId);
    }
    return recipients.length;
  }

  /** Always stored, whatever the in-app preference says; pushed like any other. */
  async sendTestNotification(user: Actor, correlationId?: string): Promise<NotificationWithUsers> {
    const preference = await this.notificationRepository.getOrCreatePreferences(user.id, correlationId);
    return this.storeAndPush({
      recipientId: user.id,
      senderId: user.id,
      notificationType: 'system',
      title: 'Test Notification',
      message: 'This is a test notification to verify the system is working.',
    }, preference, correlationId);
  }

  async listNotifications(userId: number, query: NotificationQuery, pageRequest: PageRequest, correlationId?: string): Promise<Page<NotificationListItem>> {
    const page = await this.notificationRepository.listNotifications({ recipientId: userId, ...query }, pageRequest, correlationId);
    return mapPage(page, toNotificationListItem);
  }

  private async findOwned(userId: number, notificationId: number, correlationId?: string): Promise<NotificationWithUsers> {
    const notification = await this.notificationRepository.findNotificationById(notificationId, correlationId);
    if (!notification || notification.recipientId !== userId) {
      this.logger.warn('NotificationService: Notification not found for user', { correlationId, userId, notificationId, type: 'ServiceLog.notificationNotFound' });
      throw new NotFoundError('Notification not found');
    }
    return notification;
  }

  async getNotification(userId: number, notificationId: number, correlationId?: string): Promise<NotificationDetail> {
    return toNotificationDetail(await this.findOwned(userId, notificationId, correlationId));
  }

  async updateNotification(userId: number, notificationId: number, changes: NotificationChanges, correlationId?: string): Promise<NotificationDetail> {
    await this.findOwned(userId, notificationId, correlationId);
    const updated = await this.notificationRepository.updateNotification(notificationId, changes, this.clock(), correlationId);
    if (!updated) throw new NotFoundError('Notification not found');

    if (Object.keys(changes).length > 0) {
      await this.push(userId, 'notification_update', {
        notificationId,
        updateData: { isRead: updated.isRead, isArchived: updated.isArchived, readAt: updated.readAt },
      }, correlationId);
    }
    return toNotificationDetail(updated);
  }

  async deleteNotification(userId: number, notificationId: number, correlationId?: string): Promise<void> {
    await this.findOwned(userId, notificationId, correlationId);
    await this.notificationRepository.deleteNotification(notificationId, correlationId);
    this.logger.info('NotificationService: Notification deleted', { correlationId, userId, notificationId, type: 'ServiceLog.deleteNotificationSuccess' });
  }

  async markAllRead(userId: number, correlationId?: string): Promise<number> {
    const count = await this.notificationRepository.markAllRead(userId, this.clock(), correlationId);
    this.logger.info('NotificationService: Marked all notifications as read', { correlationId, userId, count, type: 'ServiceLog.markAllReadSuccess' });
    return count;
  }

  async getStats(userId: number, correlationId?: string): Promise<NotificationStats> {
    return this.notificationRepository.getStats(userId, correlationId);
  }

  async countUnread(userId: number, correlationId?: string): Promise<number> {
    return this.notificationRepository.countUnread(userId, correlationId);
  }

  async getPreferences(userId: number, correlationId?: string): Promise<NotificationPreference> {
    return this.notificationRepository.getOrCreatePreferences(userId, correlationId);
  }

  async updatePreferences(userId: number, changes: NotificationPreferenceUpdate, correlationId?: string): Promise<NotificationPreference> {
    const updated = await this.notificationRepository.updatePreferences(userId, changes, correlationId);
    this.logger.info('NotificationService: Preferences updated', { correlationId, userId, fields: Object.keys(changes), type: 'ServiceLog.updatePreferencesSuccess' });
    return updated;
  }

  async adminListNotifications(query: AdminNotificationQuery, pageRequest: PageRequest, correlationId?: string): Promise<Page<NotificationDetail>> {
    const page = await this.notificationRepository.listNotifications({
      recipientUsername: query.recipient,
      type: query.type,
      isRead: query.isRead,
    }, pageRequest, correlationId);
    return mapPage(page, toNotificationDetail);
  }

  async adminDeleteNotification(notificationId: number, correlationId?: string): Promise<void> {
    const deleted = await this.notificationRepository.deleteNotification(notificationId, correlationId);
    if (!deleted) throw new NotFoundError('Notification not found');
    this.logger.info('NotificationService: Notification deleted by admin', { correlationId, notificationId, type: 'ServiceLog.adminDeleteNotificationSuccess' });
  }
}
