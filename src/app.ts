import express, { Application, Request as ExpressRequest, Response, NextFunction } from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import helmet from 'helmet';
import { Sequelize } from 'sequelize';
import { Container } from './container';
import { setupApiRoutes } from './routes';
import { AppError, NotFoundError } from './utils/errors';
import { assignRequestId, requestLogger, logError, RequestWithId } from './utils/logger';

const statusOf = (err: unknown): number => {
  if (err instanceof AppError) return err.status;
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
};

export class App {
  public app: Application;
  private container: Container;
  private sequelize: Sequelize;

  constructor(container: Container, sequelize: Sequelize) {
    this.app = express();
    this.container = container;
    this.sequelize = sequelize;
    this.config();
    this.routes();
    this.errorHandling();
  }

  private config(): void {
    this.app.use(assignRequestId);
    this.app.use(helmet());

    const allowedOrigins = this.container.config.corsOrigins;
    const corsOptions: cors.CorsOptions = {
      origin: allowedOrigins.includes('*') ? '*' : allowedOrigins,
      methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Correlation-ID'],
      exposedHeaders: ['X-Correlation-ID'],
    };
    this.app.use(cors(corsOptions));
    this.app.use(bodyParser.json());
    this.app.use(bodyParser.urlencoded({ extended: false }));
    this.app.use(requestLogger);
  }

  private routes(): void {
    this.app.get('/health', (req, res, next) => {
      this.health(req, res).catch(next);
    });
    this.app.use('/api', setupApiRoutes(this.container));
  }

  private async health(req: ExpressRequest, res: Response): Promise<void> {
    const redis = await this.container.broker.health();
    try {
      await this.sequelize.authenticate();
      res.json({ status: 'ok', database: 'up', redis });
    } catch (error) {
      logError(error, req, 'Health check: database unreachable');
      res.status(503).json({ status: 'error', database: 'down', redis });
    }
  }

  private errorHandling(): void {
    this.app.use((req: ExpressRequest, res: Response, next: NextFunction) => {
      next(new NotFoundError('Not Found'));
    });

    // Four parameters mark this as the error handler.
    this.app.use((err: unknown, req: ExpressRequest, res: Response, next: NextFunction) => {
      const typedReq = req as RequestWithId;
      const status = statusOf(err);
      if (status >= 500) {
        logError(err, req, 'Unhandled error in Express request lifecycle');
      }
      res.status(status).json({
        message: status >= 500 ? 'Internal server error' : err instanceof Error ? err.message : 'Bad Request',
        correlationId: typedReq.id,
        ...(typedReq.authUserId !== undefined ? { authUserId: typedReq.authUserId } : {}),
        ...(this.container.config.env === 'development' && err instanceof Error && { stack: err.stack }),
      });
    });
  }
}
