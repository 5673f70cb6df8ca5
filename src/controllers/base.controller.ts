import { Request as ExpressRequest, Response } from 'express';
import winston from 'winston';
import { AppError, UnauthorizedError, ValidationError } from '../utils/errors';
import { AuthenticatedUser, errorMessage, RequestWithId } from '../utils/logger';
import { PageRequest, parsePageRequest } from '../utils/pagination';

export interface RequestContext {
  correlationId?: string;
  user: AuthenticatedUser;
  page: PageRequest;
}

export interface PublicRequestContext {
  correlationId?: string;
}

export abstract class BaseController {
  protected logger: winston.Logger;
  private name: string;

  protected constructor(name: string, loggerInstance: winston.Logger) {
    this.name = name;
    this.logger = loggerInstance;
  }

  /** For routes behind authMiddleware. */
  protected async handle(
    req: ExpressRequest,
    res: Response,
    operation: string,
    handler: (ctx: RequestContext) => Promise<void>
  ): Promise<void> {
    const typedReq = req as RequestWithId;
    const correlationId = typedReq.id;
    this.logger.info(`${this.name}: ${operation} initiated`, { correlationId, authUserId: typedReq.authUserId, type: `ControllerLog.${operation}` });
    try {
      if (!typedReq.authUser) {
        throw new UnauthorizedError('Unauthorized: Missing authentication');
      }
      await handler({ correlationId, user: typedReq.authUser, page: parsePageRequest(req.query) });
    } catch (error) {
      this.respondWithError(error, res, operation, correlationId);
    }
  }

  /** For routes open to anonymous callers. */
  protected async handlePublic(
    req: ExpressRequest,
    res: Response,
    operation: string,
    handler: (ctx: PublicRequestContext) => Promise<void>
  ): Promise<void> {
    const correlationId = (req as RequestWithId).id;
    this.logger.info(`${this.name}: ${operation} initiated`, { correlationId, type: `ControllerLog.${operation}` });
    try {
      await handler({ correlationId });
    } catch (error) {
      this.respondWithError(error, res, operation, correlationId);
    }
  }

  private respondWithError(error: unknown, res: Response, operation: string, correlationId?: string): void {
    if (error instanceof ValidationError) {
      this.logger.warn(`${this.name}: ${operation} - Validation failed`, { correlationId, errors: error.errors, type: `ControllerValidationWarn.${operation}` });
      res.status(error.status).json({ message: error.message, errors: error.errors, correlationId });
    } else if (error instanceof AppError) {
      this.logger.warn(`${this.name}: ${operation} failed - ${error.message}`, { correlationId, status: error.status, type: `ControllerUserError.${operation}` });
      res.status(error.status).json({ message: error.message, correlationId });
    } else {
      this.logger.error(`${this.name}: ${operation} - Internal server error`, {
        correlationId,
        error: errorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
        type: `ControllerError.${operation}`,
      });
      res.status(500).json({ message: 'Internal server error', correlationId });
    }
  }
}
