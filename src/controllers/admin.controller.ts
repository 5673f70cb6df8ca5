import { Request as ExpressRequest, Response } from 'express';
import winston from 'winston';
import { AdminService } from '../services/admin.service';
import { parseBody, parseId, queryString } from '../validation/parse';
import { adminUserUpdateSchema } from '../validation/schemas';
import { BaseController } from './base.controller';
import { queryRole } from './user.controller';

export class AdminController extends BaseController {
  private adminService: AdminService;

  constructor(adminService: AdminService, loggerInstance: winston.Logger) {
    super('AdminController', loggerInstance);
    this.adminService = adminService;
  }

  async listUsers(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'adminListUsers', async ({ correlationId, page }) => {
      const query = { search: queryString(req.query.search), role: queryRole(req.query.role) };
      res.json(await this.adminService.listUsers(query, page, correlationId));
    });
  }

  async getUser(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'adminGetUser', async ({ correlationId }) => {
      res.json(await this.adminService.getUser(parseId(req.params.userId, 'User'), correlationId));
    });
  }

  async updateUser(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'adminUpdateUser', async ({ correlationId }) => {
      const userId = parseId(req.params.userId, 'User');
      const changes = parseBody(adminUserUpdateSchema, req.body);
      res.json(await this.adminService.updateUser(userId, changes, correlationId));
    });
  }

  async deactivateUser(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'adminDeactivateUser', async ({ correlationId, user }) => {
      const target = await this.adminService.deactivateUser(parseId(req.params.userId, 'User'), user.id, correlationId);
      res.json({ message: `User ${target.username} deactivated successfully` });
    });
  }

  async getStats(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'adminStats', async ({ correlationId }) => {
      res.json(await this.adminService.getStats(correlationId));
    });
  }
}
