import { Request as ExpressRequest, Response } from 'express';
import winston from 'winston';
import { AuthService } from '../services/auth.service';
import { UserService } from '../services/user.service';
import {
  loginSchema,
  logoutSchema,
  passwordChangeSchema,
  passwordResetConfirmSchema,
  passwordResetSchema,
  refreshSchema,
  registerSchema,
  tokenSchema,
} from '../validation/schemas';
import { parseBody } from '../validation/parse';
import { BaseController } from './base.controller';

export class AuthController extends BaseController {
  private authService: AuthService;
  private userService: UserService;

  constructor(authService: AuthService, userService: UserService, loggerInstance: winston.Logger) {
    super('AuthController', loggerInstance);
    this.authService = authService;
    this.userService = userService;
  }

  async register(req: ExpressRequest, res: Response) {
    await this.handlePublic(req, res, 'register', async ({ correlationId }) => {
      const input = parseBody(registerSchema, req.body);
      const user = await this.authService.register(input, correlationId);
      res.status(201).json({
        message: 'User registered successfully. Please check your email to verify your account.',
        userId: user.id,
      });
    });
  }

  async verifyEmail(req: ExpressRequest, res: Response) {
    await this.handlePublic(req, res, 'verifyEmail', async ({ correlationId }) => {
      const { token } = parseBody(tokenSchema, req.body);
      await this.authService.verifyEmail(token, correlationId);
      res.json({ message: 'Email verified successfully' });
    });
  }

  async login(req: ExpressRequest, res: Response) {
    await this.handlePublic(req, res, 'login', async ({ correlationId }) => {
      const { emailOrUsername, password } = parseBody(loginSchema, req.body);
      const result = await this.authService.login(emailOrUsername, password, correlationId);
      const profile = await this.userService.buildProfile(result.user, result.user.id, correlationId);
      res.json({ accessToken: result.accessToken, refreshToken: result.refreshToken, user: profile });
    });
  }

  async refreshToken(req: ExpressRequest, res: Response) {
    await this.handlePublic(req, res, 'refreshToken', async ({ correlationId }) => {
      const { refreshToken } = parseBody(refreshSchema, req.body);
      const accessToken = await this.authService.refreshAccessToken(refreshToken, correlationId);
      res.json({ accessToken });
    });
  }

  async logout(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'logout', async ({ correlationId, user }) => {
      const { refreshToken } = parseBody(logoutSchema, req.body);
      const revoked = await this.authService.logout(user.id, refreshToken, correlationId);
      if (!revoked) {
        res.status(400).json({ error: 'Invalid token' });
        return;
      }
      res.json({ message: 'Successfully logged out' });
    });
  }

  async changePassword(req: ExpressRequest, res: Response) {
    await this.handle(req, res, 'changePassword', async ({ correlationId, user }) => {
      const input = parseBody(passwordChangeSchema, req.body);
      await this.authService.changePassword(user.id, input, correlationId);
      res.json({ message: 'Password changed successfully' });
    });
  }

  async requestPasswordReset(req: ExpressRequest, res: Response) {
    await this.handlePublic(req, res, 'requestPasswordReset', async ({ correlationId }) => {
      const { email } = parseBody(passwordResetSchema, req.body);
      await this.authService.requestPasswordReset(email, correlationId);
      res.json({ message: 'Password reset email sent' });
    });
  }

  async confirmPasswordReset(req: ExpressRequest, res: Response) {
    await this.handlePublic(req, res, 'confirmPasswordReset', async ({ correlationId }) => {
      const { token, newPassword, newPasswordConfirm } = parseBody(passwordResetConfirmSchema, req.body);
      await this.authService.confirmPasswordReset(token, newPassword, newPasswordConfirm, correlationId);
      res.json({ message: 'Password reset successfully' });
    });
  }
}
