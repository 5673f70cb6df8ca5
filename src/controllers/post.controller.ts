import { Request as ExpressRequest, Response } from 'express';
import winston from 'winston';
import { AdminPostQuery, PostQuery } from '../models/post.model';
import { PostService } from '../services/post.service';
import { parseBody, parseId, queryString } from '../validation/parse';
import { commentSchema, postCreateSchema, postImageSchema, postUpdateSchema } from '../validation/schemas';
import { BaseController } from './base.controller';

export const postQuery = (query: ExpressRequest['query']): PostQuery => ({
  category: queryString(query.category),
  author: queryString(query.author),
  search: queryString(query.search),
});

const adminPostQuery = (query: ExpressRequest['query']): AdminPostQuery => {
  const status = queryString(query.status);
  return {
    category: queryString(query.category),
    status: status === 'active' || status === 'inactive' ? status : undefined,
  };
};

export class PostController extends BaseController {
  private postService: PostService;

  constructor(postService: PostService, loggerInstance: winston.Logger) {
    super('PostController', loggerInstance);
    this.postService = postService;
  }

  async listPosts(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'listPosts', async ({ correlationId, user, page }) => {
      res.json(await this.postService.listPosts(user.id, postQuery(req.query), page, correlationId));
    });
  }

  async createPost(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'createPost', async ({ correlationId, user }) => {
      const input = parseBody(postCreateSchema, req.body);
      const post = await this.postService.createPost(user, input, correlationId);
      this.logger.info('PostController: createPost successful', { correlationId, postId: post.id, type: 'ControllerLog.createPostSuccess' });
      res.status(201).json(post);
    });
  }

  async getPost(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'getPost', async ({ correlationId, user }) => {
      res.json(await this.postService.getPostDetail(parseId(req.params.postId, 'Post'), user.id, correlationId));
    });
  }

  async updatePost(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'updatePost', async ({ correlationId, user }) => {
      const postId = parseId(req.params.postId, 'Post');
      const changes = parseBody(postUpdateSchema, req.body);
      res.json(await this.postService.updatePost(postId, user, changes, correlationId));
    });
  }

  async deletePost(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'deletePost', async ({ correlationId, user }) => {
      await this.postService.deletePost(parseId(req.params.postId, 'Post'), user, correlationId);
      res.json({ message: 'Post deleted successfully' });
    });
  }

  async likePost(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'likePost', async ({ correlationId, user }) => {
      const status = await this.postService.likePost(parseId(req.params.postId, 'Post'), user, correlationId);
      res.status(201).json({ message: 'Post liked successfully', ...status });
    });
  }

  async unlikePost(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'unlikePost', async ({ correlationId, user }) => {
      const status = await this.postService.unlikePost(parseId(req.params.postId, 'Post'), user, correlationId);
      res.json({ message: 'Post unliked successfully', ...status });
    });
  }

  async likeStatus(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'likeStatus', async ({ correlationId, user }) => {
      res.json(await this.postService.getLikeStatus(parseId(req.params.postId, 'Post'), user.id, correlationId));
    });
  }

  async listComments(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'listComments', async ({ correlationId, page }) => {
      res.json(await this.postService.listComments(parseId(req.params.postId, 'Post'), page, correlationId));
    });
  }

  async addComment(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'addComment', async ({ correlationId, user }) => {
      const postId = parseId(req.params.postId, 'Post');
      const { content } = parseBody(commentSchema, req.body);
      res.status(201).json(await this.postService.addComment(postId, user, content, correlationId));
    });
  }

  async getComment(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'getComment', async ({ correlationId }) => {
      res.json(await this.postService.getComment(parseId(req.params.commentId, 'Comment'), correlationId));
    });
  }

  async updateComment(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'updateComment', async ({ correlationId, user }) => {
      const commentId = parseId(req.params.commentId, 'Comment');
      const { content } = parseBody(commentSchema, req.body);
      res.json(await this.postService.updateComment(commentId, user, content, correlationId));
    });
  }

  async deleteComment(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'deleteComment', async ({ correlationId, user }) => {
      await this.postService.deleteComment(parseId(req.params.commentId, 'Comment'), user, correlationId);
      res.json({ message: 'Comment deleted successfully' });
    });
  }

  async addImage(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'addImage', async ({ correlationId, user }) => {
      const postId = parseId(req.params.postId, 'Post');
      const { imageUrl } = parseBody(postImageSchema, req.body);
      res.status(201).json(await this.postService.addImage(postId, user, imageUrl, correlationId));
    });
  }

  async listUserPosts(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'listUserPosts', async ({ correlationId, user, page }) => {
      res.json(await this.postService.listUserPosts(req.params.username, user.id, page, correlationId));
    });
  }

  async adminListPosts(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'adminListPosts', async ({ correlationId, user, page }) => {
      res.json(await this.postService.adminListPosts(user, adminPostQuery(req.query), page, correlationId));
    });
  }

  async adminDeletePost(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'adminDeletePost', async ({ correlationId, user }) => {
      await this.postService.adminDeletePost(parseId(req.params.postId, 'Post'), user, correlationId);
      res.json({ message: 'Post deleted successfully' });
    });
  }

  async adminListComments(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'adminListComments', async ({ correlationId, page }) => {
      res.json(await this.postService.adminListComments(page, correlationId));
    });
  }

  async adminDeleteComment(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'adminDeleteComment', async ({ correlationId }) => {
      await this.postService.adminDeleteComment(parseId(req.params.commentId, 'Comment'), correlationId);
      res.json({ message: 'Comment deleted successfully' });
    });
  }
}
