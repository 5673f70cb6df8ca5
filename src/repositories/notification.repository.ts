import winston from 'winston';
import { Op, WhereOptions } from 'sequelize';
import { NotificationModel, NotificationPreferenceModel, UserModel } from '../db/models';
import {
  NOTIFICATION_TYPES,
  NotificationCreationAttributes,
  NotificationPreference,
  NotificationPreferenceUpdate,
  NotificationStats,
  NotificationType,
  NotificationWithUsers,
} from '../models/notification.model';
import { Page, PageRequest, toLimitOffset } from '../utils/pagination';
import { BaseRepository } from './base.repository';
import { toNotificationPreference, toNotificationWithUsers } from './mappers';

export interface NotificationListFilter {
  recipientId?: number;
  recipientUsername?: string;
  isRead?: boolean;
  isArchived?: boolean;
  type?: NotificationType;
}

export interface NotificationChanges {
  isRead?: boolean;
  isArchived?: boolean;
}

const userIncludes = (recipientUsername?: string) => [
  { model: UserModel, as: 'sender', required: false },
  {
    model: UserModel,
    as: 'recipient',
    required: true,
    ...(recipientUsername ? { where: { username: recipientUsername } } : {}),
  },
];

export class NotificationRepository extends BaseRepository {
  constructor(loggerInstance: winston.Logger) {
    super('NotificationRepository', loggerInstance);
  }

  async createNotification(data: NotificationCreationAttributes, correlationId?: string): Promise<NotificationWithUsers> {
    return this.execute('createNotification', { recipientId: data.recipientId, type: data.notificationType }, async () => {
      const created = await NotificationModel.create({
        recipientId: data.recipientId,
        senderId: data.senderId,
        notificationType: data.notificationType,
        title: data.title,
        message: data.message,
        contentType: data.contentType ?? null,
        objectId: data.objectId ?? null,
        data: data.data ?? {},
      });
      const reloaded = await NotificationModel.findByPk(created.id, { include: userIncludes() });
      if (!reloaded) throw new Error(`Notification ${created.id} vanished after insert`);
      return toNotificationWithUsers(reloaded);
    }, correlationId);
  }

  async findNotificationById(id: number, correlationId?: string): Promise<NotificationWithUsers | undefined> {
    return this.execute('findNotificationById', { notificationId: id }, async () => {
      const model = await NotificationModel.findByPk(id, { include: userIncludes() });
      return model ? toNotificationWithUsers(model) : undefined;
    }, correlationId);
  }

  /**
   * Applies read/archive changes. Marking as read stamps readAt the first
   * time; marking unread clears it.
   */
  async updateNotification(id: number, changes: NotificationChanges, now: Date, correlationId?: string): Promise<NotificationWithUsers | undefined> {
    return this.execute('updateNotification', { notificationId: id, changes }, async () => {
      const model = await NotificationModel.findByPk(id, { include: userIncludes() });
      if (!model) return undefined;
      const update: { isRead?: boolean; isArchived?: boolean; readAt?: Date | null } = { ...changes };
      if (changes.isRead === true && !model.isRead) update.readAt = now;
      if (changes.isRead === false) update.readAt = null;
      await model.update(update);
      return toNotificationWithUsers(model);
    }, correlationId);
  }

  async deleteNotification(id: number, correlationId?: string): Promise<boolean> {
    return this.execute('deleteNotification', { notificationId: id }, async () => {
      const deleted = await NotificationModel.destroy({ where: { id } });
      return deleted > 0;
    }, correlationId);
  }

  async listNotifications(filter: NotificationListFilter, pageRequest: PageRequest, correlationId?: string): Promise<Page<NotificationWithUsers>> {
    return this.execute('listNotifications', { filter }, async () => {
      const conditions: WhereOptions[] = [];
      if (filter.recipientId !== undefined) conditions.push({ recipientId: filter.recipientId });
      if (filter.isRead !== undefined) conditions.push({ isRead: filter.isRead });
      if (filter.isArchived !== undefined) conditions.push({ isArchived: filter.isArchived });
      if (filter.type) conditions.push({ notificationType: filter.type });

      const { rows, count } = await NotificationModel.findAndCountAll({
        where: { [Op.and]: conditions },
        include: userIncludes(filter.recipientUsername),
        order: [['createdAt', 'DESC'], ['id', 'DESC']],
        ...toLimitOffset(pageRequest),
      });
      return { count, ...pageRequest, results: rows.map(toNotificationWithUsers) };
    }, correlationId);
  }

  /** Returns the number of notifications that changed. */
  async markAllRead(recipientId: number, now: Date, correlationId?: string): Promise<number> {
    return this.execute('markAllRead', { recipientId }, async () => {
      const [affected] = await NotificationModel.update(
        { isRead: true, readAt: now },
        { where: { recipientId, isRead: false } }
      );
      return affected;
    }, correlationId);
  }

  async countUnread(recipientId: number, correlationId?: string): Promise<number> {
    return this.execute('countUnread', { recipientId }, () =>
      NotificationModel.count({ where: { recipientId, isRead: false } }), correlationId);
  }

  async getStats(recipientId: number, correlationId?: string): Promise<NotificationStats> {
    return this.execute('getStats', { recipientId }, async () => {
      const countWhere = (extra: WhereOptions) => NotificationModel.count({ where: { recipientId, ...extra } });
      const [total, unread, archived, ...byType] = await Promise.all([
        countWhere({}),
        countWhere({ isRead: false }),
        countWhere({ isArchived: true }),
        ...NOTIFICATION_TYPES.map(type => countWhere({ notificationType: type })),
      ]);
      const [followCount, likeCount, commentCount, mentionCount, systemCount] = byType;
      return {
        totalNotifications: total,
        unreadCount: unread,
        readCount: total - unread,
        archivedCount: archived,
        followCount,
        likeCount,
        commentCount,
        mentionCount,
        systemCount,
      };
    }, correlationId);
  }

  async getOrCreatePreferences(userId: number, correlationId?: string): Promise<NotificationPreference> {
    return this.execute('getOrCreatePreferences', { userId }, async () => {
      const [model] = await NotificationPreferenceModel.findOrCreate({ where: { userId }, defaults: { userId } });
      return toNotificationPreference(model);
    }, correlationId);
  }

  async updatePreferences(userId: number, changes: NotificationPreferenceUpdate, correlationId?: string): Promise<NotificationPreference> {
    return this.execute('updatePreferences', { userId, fields: Object.keys(changes) }, async () => {
      const [model] = await NotificationPreferenceModel.findOrCreate({ where: { userId }, defaults: { userId } });
      await model.update(changes);
      return toNotificationPreference(model);
    }, correlationId);
  }
}
