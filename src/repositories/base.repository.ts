import winston from 'winston';
import { Op, Sequelize, WhereOptions } from 'sequelize';
import { errorMessage } from '../utils/logger';

export class DatabaseError extends Error {
  public readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`Database error in ${operation}: ${errorMessage(cause)}`);
    this.name = 'DatabaseError';
    this.operation = operation;
  }
}

/**
 * Case-insensitive substring match that works on both Postgres and SQLite.
 */
export const containsInsensitive = (column: string, term: string): WhereOptions =>
  Sequelize.where(Sequelize.fn('LOWER', Sequelize.col(column)), {
    [Op.like]: `%${term.toLowerCase()}%`,
  });

export abstract class BaseRepository {
  protected readonly logger: winston.Logger;
  private readonly name: string;

  protected constructor(name: string, loggerInstance: winston.Logger) {
    this.name = name;
    this.logger = loggerInstance;
  }

  /**
   * Runs one DB operation with debug tracing; driver failures are rethrown
   * as DatabaseError so callers never see dialect-specific errors.
   */
  protected async execute<T>(
    operation: string,
    meta: Record<string, unknown>,
    fn: () => Promise<T>,
    correlationId?: string
  ): Promise<T> {
    this.logger.debug(`${this.name}: ${operation} initiated`, {
      correlationId,
      ...meta,
      type: `DBLog.${operation}`,
    });
    try {
      return await fn();
    } catch (error) {
      this.logger.error(`${this.name}: Error in ${operation}`, {
        correlationId,
        ...meta,
        error: errorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
        type: `DBError.${operation}`,
      });
      throw new DatabaseError(operation, error);
    }
  }
}
