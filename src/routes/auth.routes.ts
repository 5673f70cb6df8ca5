import { RequestHandler, Router } from 'express';
import { AuthController } from '../controllers/auth.controller';

export const setupAuthRoutes = (controller: AuthController, authenticate: RequestHandler): Router => {
  const router = Router();

  router.post('/register', (req, res) => controller.register(req, res));
  router.post('/verify-email', (req, res) => controller.verifyEmail(req, res));
  router.post('/login', (req, res) => controller.login(req, res));
  router.post('/token/refresh', (req, res) => controller.refreshToken(req, res));
  router.post('/logout', authenticate, (req, res) => controller.logout(req, res));
  router.post('/password/change', authenticate, (req, res) => controller.changePassword(req, res));
  router.post('/password/reset', (req, res) => controller.requestPasswordReset(req, res));
  router.post('/password/reset/confirm', (req, res) => controller.confirmPasswordReset(req, res));

  return router;
};
