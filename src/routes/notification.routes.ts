import { RequestHandler, Router } from 'express';
import { NotificationController } from '../controllers/notification.controller';

export const setupNotificationRoutes = (controller: NotificationController, authenticate: RequestHandler, requireAdmin: RequestHandler): Router => {
  const router = Router();
  router.use(authenticate);

  router.get('/', (req, res) => controller.listNotifications(req, res));
  router.post('/mark-all-read', (req, res) => controller.markAllRead(req, res));
  router.get('/stats', (req, res) => controller.getStats(req, res));
  router.get('/preferences', (req, res) => controller.getPreferences(req, res));
  router.put('/preferences', (req, res) => controller.updatePreferences(req, res));
  router.patch('/preferences', (req, res) => controller.updatePreferences(req, res));
  router.post('/test', (req, res) => controller.sendTest(req, res));

  router.get('/admin', requireAdmin, (req, res) => controller.adminListNotifications(req, res));
  router.delete('/admin/:notificationId/delete', requireAdmin, (req, res) => controller.adminDeleteNotification(req, res));

  router.get('/:notificationId', (req, res) => controller.getNotification(req, res));
  router.put('/:notificationId', (req, res) => controller.updateNotification(req, res));
  router.patch('/:notificationId', (req, res) => controller.updateNotification(req, res));
  router.post('/:notificationId/read', (req, res) => controller.markRead(req, res));
  router.post('/:notificationId/archive', (req, res) => controller.archive(req, res));
  router.post('/:notificationId/unarchive', (req, res) => controller.unarchive(req, res));
  router.delete('/:notificationId/delete', (req, res) => controller.deleteNotification(req, res));

  return router;
};
