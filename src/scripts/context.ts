import * as dotenv from 'dotenv';
import { Sequelize } from 'sequelize';
import { loadConfig } from '../config/config';
import { Container, createContainer } from '../container';
import { createSequelize } from '../db/sequelize';
import { LocalNotificationBroker } from '../realtime/notification.broker';
import logger, { configureLogger, errorMessage } from '../utils/logger';

export interface ScriptContext {
  container: Container;
  sequelize: Sequelize;
}

/**
 * Runs a maintenance task against the configured database, then closes it.
 * Real-time delivery is local to the script.
 */
export async function runScript(name: string, task: (context: ScriptContext) => Promise<void>): Promise<void> {
  dotenv.config();
  const config = loadConfig();
  configureLogger(config);
  const sequelize = createSequelize(config.database);
  const container = createContainer(config, new LocalNotificationBroker(), logger);
  try {
    await sequelize.authenticate();
    await task({ container, sequelize });
  } catch (error) {
    logger.error(`${name} failed`, { error: errorMessage(error), type: `ScriptError.${name}` });
    process.exitCode = 1;
  } finally {
    await sequelize.close();
  }
}
