import winston from 'winston';
import { AppConfig } from './config/config';
import { AdminController } from './controllers/admin.controller';
import { AuthController } from './controllers/auth.controller';
import { FeedController } from './controllers/feed.controller';
import { NotificationController } from './controllers/notification.controller';
import { PostController } from './controllers/post.controller';
import { UserController } from './controllers/user.controller';
import { EventPublisher } from './kafka/events';
import { NotificationBroker } from './realtime/notification.broker';
import { CommentRepository } from './repositories/comment.repository';
import { FollowRepository } from './repositories/follow.repository';
import { NotificationRepository } from './repositories/notification.repository';
import { PostRepository } from './repositories/post.repository';
import { RevokedTokenRepository } from './repositories/revokedToken.repository';
import { UserRepository } from './repositories/user.repository';
import { AdminService } from './services/admin.service';
import { AuthService } from './services/auth.service';
import { EmailService } from './services/email.service';
import { FeedService } from './services/feed.service';
import { NotificationService } from './services/notification.service';
import { PostService } from './services/post.service';
import { TokenService } from './services/token.service';
import { UserService } from './services/user.service';

export interface Container {
  config: AppConfig;
  logger: winston.Logger;
  broker: NotificationBroker;
  repositories: {
    users: UserRepository;
    follows: FollowRepository;
    posts: PostRepository;
    comments: CommentRepository;
    notifications: NotificationRepository;
    revokedTokens: RevokedTokenRepository;
  };
  services: {
    tokens: TokenService;
    email: EmailService;
    auth: AuthService;
    users: UserService;
    posts: PostService;
    feed: FeedService;
    notifications: NotificationService;
    admin: AdminService;
  };
  controllers: {
    auth: AuthController;
    users: UserController;
    posts: PostController;
    feed: FeedController;
    notifications: NotificationController;
    admin: AdminController;
  };
}

/**
 * Wires repositories, services and controllers. Models must already be
 * initialised on a Sequelize instance (see createSequelize).
 */
export function createContainer(
  config: AppConfig,
  broker: NotificationBroker,
  loggerInstance: winston.Logger,
  clock: () => Date = () => new Date()
): Container {
  const repositories = {
    users: new UserRepository(loggerInstance),
    follows: new FollowRepository(loggerInstance),
    posts: new PostRepository(loggerInstance),
    comments: new CommentRepository(loggerInstance),
    notifications: new NotificationRepository(loggerInstance),
    revokedTokens: new RevokedTokenRepository(loggerInstance),
  };

  const events = new EventPublisher(config.kafka.topic, loggerInstance);
  const tokens = new TokenService(config.jwt, loggerInstance);
  const email = new EmailService({ from: config.emailFrom, publicBaseUrl: config.publicBaseUrl }, loggerInstance);
  const notifications = new NotificationService(repositories.notifications, repositories.users, broker, loggerInstance, clock);
  const users = new UserService(repositories.users, repositories.follows, notifications, events, loggerInstance);
  const auth = new AuthService(
    repositories.users,
    repositories.notifications,
    repositories.revokedTokens,
    tokens,
    email,
    events,
    config.bcryptRounds,
    loggerInstance,
    clock
  );
  const posts = new PostService(repositories.posts, repositories.comments, repositories.users, users, notifications, events, loggerInstance);
  const feed = new FeedService(repositories.posts, repositories.follows, posts, loggerInstance, clock);
  const admin = new AdminService(repositories.users, users, posts, loggerInstance, clock);

  return {
    config,
    logger: loggerInstance,
    broker,
    repositories,
    services: { tokens, email, auth, users, posts, feed, notifications, admin },
    controllers: {
      auth: new AuthController(auth, users, loggerInstance),
      users: new UserController(users, loggerInstance),
      posts: new PostController(posts, loggerInstance),
      feed: new FeedController(feed, loggerInstance),
      notifications: new NotificationController(notifications, loggerInstance),
      admin: new AdminController(admin, loggerInstance),
    },
  };
}
