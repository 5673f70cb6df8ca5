import { Request as ExpressRequest, Response } from 'express';
import winston from 'winston';
import { USER_ROLES, UserRole } from '../models/user.model';
import { UserService } from '../services/user.service';
import { parseBody, parseId, queryString } from '../validation/parse';
import { profileUpdateSchema } from '../validation/schemas';
import { BaseController } from './base.controller';

export const queryRole = (value: unknown): UserRole | undefined => {
  const text = queryString(value);
  return USER_ROLES.find(role => role === text);
};

export class UserController extends BaseController {
  private userService: UserService;

  constructor(userService: UserService, loggerInstance: winston.Logger) {
    super('UserController', loggerInstance);
    this.userService = userService;
  }

  async listUsers(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'listUsers', async ({ correlationId, user, page }) => {
      const users = await this.userService.listUsers(user, {
        search: queryString(req.query.search),
        role: queryRole(req.query.role),
      }, page, correlationId);
      res.json(users);
    });
  }

  async getMe(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'getMe', async ({ correlationId, user }) => {
      res.json(await this.userService.getMyProfile(user.id, correlationId));
    });
  }

  async updateMe(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'updateMe', async ({ correlationId, user }) => {
      const changes = parseBody(profileUpdateSchema, req.body);
      res.json(await this.userService.updateMyProfile(user.id, changes, correlationId));
    });
  }

  async getProfile(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'getProfile', async ({ correlationId, user }) => {
      res.json(await this.userService.getProfileByUsername(req.params.username, user.id, correlationId));
    });
  }

  async follow(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'follow', async ({ correlationId, user }) => {
      const target = await this.userService.follow(user, parseId(req.params.userId, 'User'), correlationId);
      res.status(201).json({ message: `Successfully followed ${target.username}` });
    });
  }

  async unfollow(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'unfollow', async ({ correlationId, user }) => {
      const target = await this.userService.unfollow(user.id, parseId(req.params.userId, 'User'), correlationId);
      res.json({ message: `Successfully unfollowed ${target.username}` });
    });
  }

  async listFollowers(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'listFollowers', async ({ correlationId, user, page }) => {
      res.json(await this.userService.listFollowers(parseId(req.params.userId, 'User'), user.id, page, correlationId));
    });
  }

  async listFollowing(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'listFollowing', async ({ correlationId, user, page }) => {
      res.json(await this.userService.listFollowing(parseId(req.params.userId, 'User'), user.id, page, correlationId));
    });
  }
}
