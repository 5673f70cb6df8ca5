import { Response, NextFunction } from 'express';
import winston from 'winston';
import { canLogIn, isAdmin } from '../models/user.model';
import { UserRepository } from '../repositories/user.repository';
import { TokenService } from '../services/token.service';
import { AuthenticatedUser, logError, RequestWithId } from '../utils/logger';

export const bearerToken = (authHeader: string | undefined): string | undefined =>
  authHeader && authHeader.startsWith('Bearer ') ? authHeader.slice('Bearer '.length).trim() || undefined : undefined;

/**
 * Resolves an access token to an active user. Shared by the HTTP middleware
 * and the socket handshake.
 */
export async function authenticateAccessToken(
  token: string,
  tokenService: TokenService,
  userRepository: UserRepository,
  correlationId?: string
): Promise<AuthenticatedUser | null> {
  const payload = await tokenService.verifyToken(token, 'access', correlationId);
  if (!payload) return null;
  const user = await userRepository.findUserById(payload.userId, correlationId);
  if (!user || !canLogIn(user)) return null;
  return { id: user.id, username: user.username, role: user.role };
}

export function authMiddleware(tokenService: TokenService, userRepository: UserRepository, logger: winston.Logger) {
  return async (req: RequestWithId, res: Response, next: NextFunction) => {
    const correlationId = req.id;
    const token = bearerToken(req.headers.authorization);

    if (!token) {
      logger.warn('AuthMiddleware: Unauthorized - Missing or malformed Bearer token', { correlationId, url: req.originalUrl, type: 'AuthMiddleware.Fail.NoToken' });
      return res.status(401).json({ message: 'Unauthorized: Access token is required.', correlationId });
    }

    try {
      const user = await authenticateAccessToken(token, tokenService, userRepository, correlationId);
      if (!user) {
        logger.warn('AuthMiddleware: Unauthorized - Invalid token or inactive user', { correlationId, url: req.originalUrl, type: 'AuthMiddleware.Fail.InvalidToken' });
        return res.status(401).json({ message: 'Unauthorized: Invalid or expired token.', correlationId });
      }
      req.authUserId = user.id;
      req.authUser = user;
      logger.debug('AuthMiddleware: Authorized successfully', { correlationId, authUserId: user.id, url: req.originalUrl, type: 'AuthMiddleware.Success' });
      next();
    } catch (error) {
      logError(error, req, 'AuthMiddleware: Failed to authenticate request');
      res.status(500).json({ message: 'Internal server error', correlationId });
    }
  };
}

/** Mount after authMiddleware. */
export function adminOnly(logger: winston.Logger) {
  return (req: RequestWithId, res: Response, next: NextFunction) => {
    if (!req.authUser || !isAdmin(req.authUser)) {
      logger.warn('AdminOnly: Forbidden - admin role required', { correlationId: req.id, authUserId: req.authUserId, url: req.originalUrl, type: 'AuthMiddleware.Fail.NotAdmin' });
      return res.status(403).json({ message: 'Admin access required', correlationId: req.id });
    }
    next();
  };
}
