import { Application } from 'express';
import { Sequelize } from 'sequelize';
import { App } from '../../app';
import { loadConfig } from '../../config/config';
import { Container, createContainer } from '../../container';
import { createSequelize, runMigrations } from '../../db/sequelize';
import { User, UserRole } from '../../models/user.model';
import { LocalNotificationBroker, RealtimeMessage } from '../../realtime/notification.broker';
import logger from '../../utils/logger';

export interface TestContext {
  app: Application;
  container: Container;
  sequelize: Sequelize;
  pushed: RealtimeMessage[];
}

export interface TestUser {
  user: User;
  auth: string;
}

export const TEST_PASSWORD = 'S3cure-pass';

/** The full app on an in-memory SQLite database with in-process delivery. */
export async function createTestContext(clock?: () => Date): Promise<TestContext> {
  const config = loadConfig({
    NODE_ENV: 'test',
    JWT_SECRET: 'test-secret',
    DB_DIALECT: 'sqlite',
    DB_STORAGE: ':memory:',
    BCRYPT_ROUNDS: '4',
  });
  const sequelize = createSequelize(config.database);
  await runMigrations(sequelize, logger);

  const broker = new LocalNotificationBroker();
  const pushed: RealtimeMessage[] = [];
  await broker.subscribe(message => pushed.push(message));

  const container = createContainer(config, broker, logger, clock);
  return { app: new App(container, sequelize).app, container, sequelize, pushed };
}

export async function resetDatabase(context: TestContext): Promise<void> {
  await context.sequelize.sync({ force: true });
  context.pushed.length = 0;
}

export async function createUser(
  context: TestContext,
  username: string,
  options: { role?: UserRole; isSuperuser?: boolean } = {}
): Promise<TestUser> {
  const user = await context.container.services.auth.register({
    username,
    email: `${username}@example.com`,
    password: TEST_PASSWORD,
    passwordConfirm: TEST_PASSWORD,
    firstName: username.charAt(0).toUpperCase() + username.slice(1),
    lastName: 'Tester',
    role: options.role,
    isSuperuser: options.isSuperuser,
    isEmailVerified: true,
  });
  return { user, auth: `Bearer ${context.container.services.tokens.signAccessToken(user.id)}` };
}
