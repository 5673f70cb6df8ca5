import jwt from 'jsonwebtoken';
import winston from 'winston';
import { v4 as uuidv4 } from 'uuid';
import { errorMessage } from '../utils/logger';

export type TokenType = 'access' | 'refresh';

export interface TokenPayload {
  userId: number;
  type: TokenType;
  jti: string;
  expiresAt: Date;
}

export interface TokenSettings {
  secret: string;
  accessTtlSeconds: number;
  refreshTtlSeconds: number;
}

export class TokenService {
  private settings: TokenSettings;
  private logger: winston.Logger;

  constructor(settings: TokenSettings, loggerInstance: winston.Logger) {
    if (!settings.secret) {
      loggerInstance.error('TokenService: JWT_SECRET is not defined. Authentication will fail.', { type: 'ConfigError.TokenService' });
      throw new Error('JWT_SECRET is not defined for TokenService');
    }
    this.settings = settings;
    this.logger = loggerInstance;
  }

  public signAccessToken(userId: number): string {
    return this.sign(userId, 'access', this.settings.accessTtlSeconds);
  }

  public signRefreshToken(userId: number): string {
    return this.sign(userId, 'refresh', this.settings.refreshTtlSeconds);
  }

  private sign(userId: number, type: TokenType, ttlSeconds: number): string {
    return jwt.sign({ userId, type }, this.settings.secret, { expiresIn: ttlSeconds, jwtid: uuidv4() });
  }

  /** Resolves to null for a bad signature, an expired token or a token of the other type. */
  public async verifyToken(token: string, expectedType: TokenType, correlationId?: string): Promise<TokenPayload | null> {
    try {
      const decoded = jwt.verify(token, this.settings.secret);
      if (
        typeof decoded !== 'object' ||
        typeof decoded.userId !== 'number' ||
        typeof decoded.jti !== 'string' ||
        typeof decoded.exp !== 'number'
      ) {
        this.logger.warn('TokenService: Token verification failed - malformed claims', { correlationId, type: 'AuthVerification.Fail.MalformedClaims' });
        return null;
      }
      if (decoded.type !== expectedType) {
        this.logger.warn('TokenService: Token verification failed - wrong token type', { correlationId, expectedType, type: 'AuthVerification.Fail.WrongType' });
        return null;
      }
      return {
        userId: decoded.userId,
        type: expectedType,
        jti: decoded.jti,
        expiresAt: new Date(decoded.exp * 1000),
      };
    } catch (error) {
      this.logger.warn('TokenService: Token verification failed', {
        correlationId,
        tokenPreview: token ? token.substring(0, 15) + '...' : 'No token provided',
        errorName: error instanceof Error ? error.name : 'UnknownError',
        errorMessage: errorMessage(error),
        type: 'AuthVerification.Fail.JwtError',
      });
      return null;
    }
  }
}
