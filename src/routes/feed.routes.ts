import { RequestHandler, Router } from 'express';
import { FeedController } from '../controllers/feed.controller';

export const setupFeedRoutes = (controller: FeedController, authenticate: RequestHandler): Router => {
  const router = Router();
  router.use(authenticate);

  router.get('/', (req, res) => controller.personalizedFeed(req, res));
  router.get('/trending', (req, res) => controller.trendingFeed(req, res));
  router.get('/category/:category', (req, res) => controller.categoryFeed(req, res));

  return router;
};
