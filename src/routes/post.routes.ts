import { RequestHandler, Router } from 'express';
import { PostController } from '../controllers/post.controller';

// Static segments (admin, user, comments) are registered before /:postId.
export const setupPostRoutes = (controller: PostController, authenticate: RequestHandler, requireAdmin: RequestHandler): Router => {
  const router = Router();
  router.use(authenticate);

  router.get('/', (req, res) => controller.listPosts(req, res));
  router.post('/', (req, res) => controller.createPost(req, res));

  router.get('/admin', requireAdmin, (req, res) => controller.adminListPosts(req, res));
  router.get('/admin/comments', requireAdmin, (req, res) => controller.adminListComments(req, res));
  router.delete('/admin/comments/:commentId/delete', requireAdmin, (req, res) => controller.adminDeleteComment(req, res));
  router.delete('/admin/:postId/delete', requireAdmin, (req, res) => controller.adminDeletePost(req, res));

  router.get('/user/:username', (req, res) => controller.listUserPosts(req, res));

  router.get('/comments/:commentId', (req, res) => controller.getComment(req, res));
  router.put('/comments/:commentId', (req, res) => controller.updateComment(req, res));
  router.patch('/comments/:commentId', (req, res) => controller.updateComment(req, res));
  router.delete('/comments/:commentId', (req, res) => controller.deleteComment(req, res));

  router.get('/:postId', (req, res) => controller.getPost(req, res));
  router.put('/:postId', (req, res) => controller.updatePost(req, res));
  router.patch('/:postId', (req, res) => controller.updatePost(req, res));
  router.delete('/:postId', (req, res) => controller.deletePost(req, res));
  router.post('/:postId/like', (req, res) => controller.likePost(req, res));
  router.delete('/:postId/unlike', (req, res) => controller.unlikePost(req, res));
  router.get('/:postId/like-status', (req, res) => controller.likeStatus(req, res));
  router.get('/:postId/comments', (req, res) => controller.listComments(req, res));
  router.post('/:postId/comments', (req, res) => controller.addComment(req, res));
  router.post('/:postId/images', (req, res) => controller.addImage(req, res));

  return router;
};
