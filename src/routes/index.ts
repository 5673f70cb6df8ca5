import { Router } from 'express';
import { Container } from '../container';
import { adminOnly, authMiddleware } from '../middleware/auth.middleware';
import { setupAdminRoutes } from './admin.routes';
import { setupAuthRoutes } from './auth.routes';
import { setupFeedRoutes } from './feed.routes';
import { setupNotificationRoutes } from './notification.routes';
import { setupPostRoutes } from './post.routes';
import { setupUserRoutes } from './user.routes';

export const setupApiRoutes = (container: Container): Router => {
  const { controllers, services, repositories, logger } = container;
  const authenticate = authMiddleware(services.tokens, repositories.users, logger);
  const requireAdmin = adminOnly(logger);

  const router = Router();
  router.use('/auth', setupAuthRoutes(controllers.auth, authenticate));
  router.use('/users', setupUserRoutes(controllers.users, authenticate));
  router.use('/posts', setupPostRoutes(controllers.posts, authenticate, requireAdmin));
  router.use('/feed', setupFeedRoutes(controllers.feed, authenticate));
  router.use('/notifications', setupNotificationRoutes(controllers.notifications, authenticate, requireAdmin));
  router.use('/admin', setupAdminRoutes(controllers.admin, authenticate, requireAdmin));
  return router;
};
