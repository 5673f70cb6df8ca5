import { RequestHandler, Router } from 'express';
import { AdminController } from '../controllers/admin.controller';

export const setupAdminRoutes = (controller: AdminController, authenticate: RequestHandler, requireAdmin: RequestHandler): Router => {
  const router = Router();
  router.use(authenticate, requireAdmin);

  router.get('/users', (req, res) => controller.listUsers(req, res));
  router.get('/users/:userId', (req, res) => controller.getUser(req, res));
  router.put('/users/:userId', (req, res) => controller.updateUser(req, res));
  router.patch('/users/:userId', (req, res) => controller.updateUser(req, res));
  router.post('/users/:userId/deactivate', (req, res) => controller.deactivateUser(req, res));
  router.get('/stats', (req, res) => controller.getStats(req, res));

  return router;
};
