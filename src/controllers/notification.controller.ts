import { Request as ExpressRequest, Response } from 'express';
import winston from 'winston';
import { NotificationChanges } from '../repositories/notification.repository';
import { NotificationService } from '../services/notification.service';
import { parseBody, parseId, queryBoolean, queryNotificationType, queryString } from '../validation/parse';
import { notificationUpdateSchema, preferencesUpdateSchema } from '../validation/schemas';
import { BaseController } from './base.controller';

export class NotificationController extends BaseController {
  private notificationService: NotificationService;

  constructor(notificationService: NotificationService, loggerInstance: winston.Logger) {
    super('NotificationController', loggerInstance);
    this.notificationService = notificationService;
  }

  async listNotifications(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'listNotifications', async ({ correlationId, user, page }) => {
      const query = {
        isRead: queryBoolean(req.query.isRead),
        isArchived: queryBoolean(req.query.isArchived),
        type: queryNotificationType(req.query.type),
      };
      res.json(await this.notificationService.listNotifications(user.id, query, page, correlationId));
    });
  }

  async getNotification(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'getNotification', async ({ correlationId, user }) => {
      res.json(await this.notificationService.getNotification(user.id, parseId(req.params.notificationId, 'Notification'), correlationId));
    });
  }

  async updateNotification(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'updateNotification', async ({ correlationId, user }) => {
      const notificationId = parseId(req.params.notificationId, 'Notification');
      const changes = parseBody(notificationUpdateSchema, req.body);
      res.json(await this.notificationService.updateNotification(user.id, notificationId, changes, correlationId));
    });
  }

  private async applyFlag(req: ExpressRequest, res: Response, operation: string, changes: NotificationChanges, message: string) {
    await this.handle(req, res, operation, async ({ correlationId, user }) => {
      const notificationId = parseId(req.params.notificationId, 'Notification');
      await this.notificationService.updateNotification(user.id, notificationId, changes, correlationId);
      res.json({ message });
    });
  }

  async markRead(req: ExpressRequest, res: Response) {
    await this.applyFlag(req, res, 'markRead', { isRead: true }, 'Notification marked as read');
  }

  async archive(req: ExpressRequest, res: Response) {
    await this.applyFlag(req, res, 'archive', { isArchived: true }, 'Notification archived');
  }

  async unarchive(req: ExpressRequest, res: Response) {
    await this.applyFlag(req, res, 'unarchive', { isArchived: false }, 'Notification unarchived');
  }

  async deleteNotification(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'deleteNotification', async ({ correlationId, user }) => {
      await this.notificationService.deleteNotification(user.id, parseId(req.params.notificationId, 'Notification'), correlationId);
      res.json({ message: 'Notification deleted' });
    });
  }

  async markAllRead(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'markAllRead', async ({ correlationId, user }) => {
      const count = await this.notificationService.markAllRead(user.id, correlationId);
      res.json({ message: `${count} notifications marked as read` });
    });
  }

  async getStats(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'getNotificationStats', async ({ correlationId, user }) => {
      res.json(await this.notificationService.getStats(user.id, correlationId));
    });
  }

  async getPreferences(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'getPreferences', async ({ correlationId, user }) => {
      res.json(await this.notificationService.getPreferences(user.id, correlationId));
    });
  }

  async updatePreferences(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'updatePreferences', async ({ correlationId, user }) => {
      const changes = parseBody(preferencesUpdateSchema, req.body);
      res.json(await this.notificationService.updatePreferences(user.id, changes, correlationId));
    });
  }

  async sendTest(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'sendTestNotification', async ({ correlationId, user }) => {
      const notification = await this.notificationService.sendTestNotification(user, correlationId);
      res.status(201).json({ message: 'Test notification sent', notificationId: notification.id });
    });
  }

  async adminListNotifications(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'adminListNotifications', async ({ correlationId, page }) => {
      const query = {
        recipient: queryString(req.query.recipient),
        type: queryNotificationType(req.query.type),
        isRead: queryBoolean(req.query.isRead),
      };
      res.json(await this.notificationService.adminListNotifications(query, page, correlationId));
    });
  }

  async adminDeleteNotification(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'adminDeleteNotification', async ({ correlationId }) => {
      await this.notificationService.adminDeleteNotification(parseId(req.params.notificationId, 'Notification'), correlationId);
      res.json({ message: 'Notification deleted successfully' });
    });
  }
}
