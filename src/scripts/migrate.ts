import { runMigrations } from '../db/sequelize';
import logger from '../utils/logger';
import { runScript } from './context';

void runScript('migrate', async ({ sequelize }) => {
  await runMigrations(sequelize, logger);
});
