import * as dotenv from 'dotenv';
import http from 'http';
import { Server as SocketServer } from 'socket.io';
import { App } from './app';
import { AppConfig, loadConfig } from './config/config';
import { createContainer } from './container';
import { createSequelize, runMigrations } from './db/sequelize';
import { configureKafka, disconnectProducer, getKafkaProducer } from './kafka/producer';
import { createNotificationBroker } from './realtime/notification.broker';
import { NotificationGateway, SOCKET_PATH } from './realtime/notification.gateway';
import { ConfigError } from './utils/errors';
import logger, { configureLogger, errorMessage } from './utils/logger';

dotenv.config();

const readConfig = (): AppConfig => {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error('SocialConnect: invalid configuration', { issues: error.issues, type: 'StartupLog.FatalConfigError' });
      process.exit(1);
    }
    throw error;
  }
};

const startService = async () => {
  const config = readConfig();
  configureLogger(config);
  logger.info('SocialConnect API starting...', { env: config.env, type: 'StartupLog.Init' });

  const sequelize = createSequelize(config.database, logger);
  const broker = createNotificationBroker(config.redisUrl, logger);

  try {
    await sequelize.authenticate();
    await runMigrations(sequelize, logger);
    logger.info('Database connection established.', { dialect: config.database.dialect, type: 'StartupLog.DatabaseReady' });

    if (configureKafka({ broker: config.kafka.broker, clientId: config.kafka.clientId })) {
      await getKafkaProducer(logger);
      logger.info('Kafka producer for social events initialized successfully.', { topic: config.kafka.topic, type: 'StartupLog.ProducerReady' });
    } else {
      logger.info('KAFKA_BROKER not set, domain events are disabled.', { type: 'StartupLog.ProducerDisabled' });
    }

    const container = createContainer(config, broker, logger);
    const expressApp = new App(container, sequelize).app;
    const server = http.createServer(expressApp);

    const io = new SocketServer(server, {
      path: SOCKET_PATH,
      cors: { origin: config.corsOrigins.includes('*') ? '*' : config.corsOrigins },
    });
    const gateway = new NotificationGateway(container.services.tokens, container.repositories.users, container.services.notifications, logger);
    await gateway.attach(io, broker);

    server.listen(config.port, () => {
      logger.info(`SocialConnect API is running on port ${config.port}`, { port: config.port, socketPath: SOCKET_PATH, type: 'StartupLog.HttpReady' });
    });

    const closeResources = async () => {
      await new Promise<void>(resolve => io.close(() => resolve()));
      logger.info('Socket.io server closed.', { type: 'ShutdownLog.SocketClosed' });
      await broker.close();
      logger.info('Notification broker closed.', { type: 'ShutdownLog.BrokerClosed' });
      await disconnectProducer(logger);
      await sequelize.close();
      logger.info('Database connection closed.', { type: 'ShutdownLog.DatabaseClosed' });
    };

    const shutdown = (signal: string) => {
      logger.info(`${signal} received. Shutting down SocialConnect API gracefully.`, { signal, type: 'ShutdownLog.SignalReceived' });

      setTimeout(() => {
        logger.error('Could not close connections in time, forcefully shutting down', { timeout: 10000, type: 'ShutdownLog.ForceExit' });
        process.exit(1);
      }, 10000).unref();

      // io.close also closes the HTTP server it is bound to.
      closeResources()
        .then(() => process.exit(0))
        .catch(error => {
          logger.error('Error during shutdown', { error: errorMessage(error), type: 'ShutdownLog.Error' });
          process.exit(1);
        });
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('uncaughtException', error => {
      logger.error('Unhandled synchronous error (uncaughtException):', { error: error.message, stack: error.stack, type: 'FatalErrorLog.UncaughtException' });
      void disconnectProducer(logger).finally(() => process.exit(1));
    });
    process.on('unhandledRejection', reason => {
      logger.error('Unhandled promise rejection:', { reason: errorMessage(reason), type: 'FatalErrorLog.UnhandledRejection' });
    });
  } catch (error) {
    logger.error('Failed to start SocialConnect API.', { error: errorMessage(error), stack: error instanceof Error ? error.stack : undefined, type: 'StartupLog.FatalError' });
    await disconnectProducer(logger).catch(e => logger.error('Error stopping producer during failed startup', { error: errorMessage(e), type: 'ShutdownLog.ProducerFailStop' }));
    await broker.close().catch(e => logger.error('Error closing broker during failed startup', { error: errorMessage(e), type: 'ShutdownLog.BrokerFailStop' }));
    await sequelize.close().catch(e => logger.error('Error closing database during failed startup', { error: errorMessage(e), type: 'ShutdownLog.DatabaseFailStop' }));
    process.exit(1);
  }
};

startService().catch(error => {
  logger.error('SocialConnect API crashed during startup.', { error: errorMessage(error), type: 'StartupLog.FatalError' });
  process.exit(1);
});
