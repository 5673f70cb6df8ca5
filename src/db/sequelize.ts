import { Sequelize } from 'sequelize';
import winston from 'winston';
import { DatabaseConfig } from '../config/config';
import { initModels } from './models';

export function createSequelize(config: DatabaseConfig, logger?: winston.Logger): Sequelize {
  const logging = logger
    ? (sql: string) => logger.debug('Executing DB statement', { sql, type: 'DBLog.Query' })
    : false;

  const sequelize =
    config.dialect === 'sqlite'
      ? new Sequelize({ dialect: 'sqlite', storage: config.storage, logging })
      : new Sequelize(config.name, config.user, config.password, {
          host: config.host,
          port: config.port,
          dialect: 'postgres',
          logging,
        });

  initModels(sequelize);
  return sequelize;
}

/**
 * Creates missing tables and columns. Existing data is kept.
 */
export async function runMigrations(sequelize: Sequelize, logger: winston.Logger): Promise<void> {
  logger.info('Applying database schema', { dialect: sequelize.getDialect(), type: 'DBLog.Migrate' });
  await sequelize.sync({ alter: sequelize.getDialect() === 'postgres' });
  logger.info('Database schema is up to date', { type: 'DBLog.MigrateSuccess' });
}
