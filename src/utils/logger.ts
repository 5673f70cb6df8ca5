import winston from 'winston';
import { NextFunction, Request as ExpressRequest, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { UserRole } from '../models/user.model';

export interface AuthenticatedUser {
  id: number;
  username: string;
  role: UserRole;
}

export interface RequestWithId extends ExpressRequest {
  id?: string;
  authUserId?: number;
  authUser?: AuthenticatedUser;
  startTime?: number;
}

export const CORRELATION_HEADER = 'X-Correlation-ID';

const { combine, timestamp, printf, colorize, errors, json, splat } = winston.format;

let serviceName = process.env.SERVICE_NAME || 'socialconnect-api';

const baseFormat = combine(
  timestamp(),
  errors({ stack: true }),
  splat(),
  winston.format(info => {
    info.service = serviceName;
    return info;
  })()
);

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: baseFormat,
  transports: [],
  defaultMeta: { service: serviceName },
  silent: process.env.NODE_ENV === 'test' && !process.env.LOG_LEVEL,
});

if (process.env.NODE_ENV !== 'production') {
  logger.add(new winston.transports.Console({
    format: combine(
      colorize(),
      printf(({ level, message, timestamp, service, correlationId, authUserId, type, stack, ...rest }) => {
        let log = `${timestamp} [${service}] ${level}`;
        if (correlationId) log += ` [correlationId: ${correlationId}]`;
        if (authUserId) log += ` [authUserId: ${authUserId}]`;
        if (type) log += ` [type: ${type}]`;
        log += `: ${message}`;

        const remainingMeta = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
        log += remainingMeta;

        if (stack) log += `\n${stack}`;
        return log;
      })
    ),
  }));
} else {
  logger.add(new winston.transports.Console({
    format: json(),
  }));
}

/** Applies the validated service name and level once configuration is loaded. */
export function configureLogger(settings: { serviceName: string; logLevel: string }): void {
  serviceName = settings.serviceName;
  logger.level = settings.logLevel;
  logger.defaultMeta = { service: serviceName };
}

/**
 * Reuses the caller's correlation id when one is sent, otherwise mints one,
 * and echoes it back on the response.
 */
export const assignRequestId = (req: ExpressRequest, res: Response, next: NextFunction) => {
  const typedReq = req as RequestWithId;
  const incomingId = req.get(CORRELATION_HEADER);
  typedReq.id = incomingId && incomingId.trim() !== '' ? incomingId : uuidv4();
  res.setHeader(CORRELATION_HEADER, typedReq.id);
  next();
};

export const requestLogger = (req: ExpressRequest, res: Response, next: NextFunction) => {
  const typedReq = req as RequestWithId;
  typedReq.startTime = Date.now();

  let correlationId = typedReq.id;
  if (!correlationId) {
    correlationId = req.get(CORRELATION_HEADER) || uuidv4();
    typedReq.id = correlationId;
  }

  logger.info('Incoming request', {
    correlationId,
    method: req.method,
    url: req.originalUrl,
    ip: req.ip,
    userAgent: req.headers['user-agent'],
    type: 'RequestLog.Start',
  });

  res.on('finish', () => {
    const duration = Date.now() - (typedReq.startTime || Date.now());
    logger.info('Request finished', {
      correlationId,
      authUserId: typedReq.authUserId,
      method: req.method,
      url: req.originalUrl,
      status: res.statusCode,
      durationMs: duration,
      type: 'RequestLog.Finish',
    });
  });

  res.on('error', (err: Error) => {
    logger.error(`Error in response stream: ${err.message}`, {
      correlationId,
      authUserId: typedReq.authUserId,
      method: req.method,
      url: req.originalUrl,
      error: err.message,
      type: 'RequestErrorLog',
    });
  });

  next();
};

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const logError = (err: unknown, req?: ExpressRequest, messagePrefix?: string) => {
  const typedReq = req as RequestWithId | undefined;
  const message = errorMessage(err);

  const errorMeta: Record<string, unknown> = {
    correlationId: typedReq?.id || uuidv4(),
    type: 'ApplicationErrorLog',
  };

  if (typedReq?.authUserId) {
    errorMeta.authUserId = typedReq.authUserId;
  }
  if (req) {
    errorMeta.request = {
      method: req.method,
      url: req.originalUrl,
      ip: req.ip,
    };
  }
  if (err instanceof Error && err.stack) {
    errorMeta.stack = err.stack;
  }

  const finalMessage = messagePrefix ? `${messagePrefix}: ${message}` : message;
  logger.error(finalMessage, errorMeta);
};

export default logger;
