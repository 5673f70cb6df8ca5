import { RequestHandler, Router } from 'express';
import { UserController } from '../controllers/user.controller';

export const setupUserRoutes = (controller: UserController, authenticate: RequestHandler): Router => {
  const router = Router();
  router.use(authenticate);

  router.get('/', (req, res) => controller.listUsers(req, res));
  router.get('/me', (req, res) => controller.getMe(req, res));
  router.put('/me', (req, res) => controller.updateMe(req, res));
  router.patch('/me', (req, res) => controller.updateMe(req, res));
  router.post('/:userId/follow', (req, res) => controller.follow(req, res));
  router.delete('/:userId/unfollow', (req, res) => controller.unfollow(req, res));
  router.get('/:userId/followers', (req, res) => controller.listFollowers(req, res));
  router.get('/:userId/following', (req, res) => controller.listFollowing(req, res));
  router.get('/:username', (req, res) => controller.getProfile(req, res));

  return router;
};
