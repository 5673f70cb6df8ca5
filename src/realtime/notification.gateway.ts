import { Server, Socket } from 'socket.io';
import winston from 'winston';
import { authenticateAccessToken } from '../middleware/auth.middleware';
import { UserRepository } from '../repositories/user.repository';
import { NotificationService } from '../services/notification.service';
import { TokenService } from '../services/token.service';
import { AuthenticatedUser, errorMessage } from '../utils/logger';
import { NotificationBroker, RealtimeMessage } from './notification.broker';

export const SOCKET_PATH = '/ws/notifications';

export const roomFor = (userId: number): string => `user_${userId}`;

/** The slice of a socket.io socket the gateway talks to. */
export interface GatewaySocket {
  id: string;
  join(room: string): Promise<void> | void;
  emit(event: string, payload: unknown): void;
  on(event: string, listener: (payload?: unknown) => void): void;
}

export interface Handshake {
  auth: Record<string, unknown>;
  query: Record<string, unknown>;
}

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export function handshakeToken(handshake: Handshake): string | undefined {
  const candidate = typeof handshake.auth.token === 'string' ? handshake.auth.token : handshake.query.token;
  return typeof candidate === 'string' && candidate.trim() !== '' ? candidate.trim() : undefined;
}

const wrapSocket = (socket: Socket): GatewaySocket => ({
  id: socket.id,
  join: room => socket.join(room),
  emit: (event, payload) => {
    socket.emit(event, payload);
  },
  on: (event, listener) => {
    socket.on(event, listener);
  },
});

export class NotificationGateway {
  private tokenService: TokenService;
  private userRepository: UserRepository;
  private notificationService: NotificationService;
  private logger: winston.Logger;
  private users = new Map<string, AuthenticatedUser>();

  constructor(
    tokenService: TokenService,
    userRepository: UserRepository,
    notificationService: NotificationService,
    loggerInstance: winston.Logger
  ) {
    this.tokenService = tokenService;
    this.userRepository = userRepository;
    this.notificationService = notificationService;
    this.logger = loggerInstance;
  }

  /** Resolves the handshake to a user and remembers it for the socket. */
  async authenticate(socketId: string, handshake: Handshake): Promise<AuthenticatedUser | null> {
    const token = handshakeToken(handshake);
    if (!token) {
      this.logger.warn('NotificationGateway: Connection refused - no token', { socketId, type: 'SocketLog.AuthFail.NoToken' });
      return null;
    }
    const user = await authenticateAccessToken(token, this.tokenService, this.userRepository);
    if (!user) {
      this.logger.warn('NotificationGateway: Connection refused - invalid token', { socketId, type: 'SocketLog.AuthFail.InvalidToken' });
      return null;
    }
    this.users.set(socketId, user);
    return user;
  }

  connectedUser(socketId: string): AuthenticatedUser | undefined {
    return this.users.get(socketId);
  }

  async handleConnection(socket: GatewaySocket): Promise<void> {
    const user = this.users.get(socket.id);
    if (!user) return;

    await socket.join(roomFor(user.id));
    this.logger.info('NotificationGateway: Socket connected', { socketId: socket.id, userId: user.id, type: 'SocketLog.Connected' });
    socket.emit('connection_established', { message: 'Connected to notifications', userId: user.id });

    socket.on('ping', payload => {
      const message = this.readMessage(socket, payload);
      if (!message) return;
      socket.emit('pong', { timestamp: message.timestamp ?? null });
    });

    socket.on('get_notifications', payload => {
      if (!this.readMessage(socket, payload)) return;
      this.notificationService
        .countUnread(user.id)
        .then(unreadCount => socket.emit('notifications_count', { unreadCount }))
        .catch(error => {
          this.logger.error('NotificationGateway: Failed to count unread notifications', { socketId: socket.id, userId: user.id, error: errorMessage(error), type: 'SocketError.countUnread' });
          socket.emit('error', { message: 'Could not load notifications' });
        });
    });

    socket.on('disconnect', () => this.handleDisconnect(socket.id));
  }

  handleDisconnect(socketId: string): void {
    const user = this.users.get(socketId);
    this.users.delete(socketId);
    this.logger.info('NotificationGateway: Socket disconnected', { socketId, userId: user?.id, type: 'SocketLog.Disconnected' });
  }

  /** No payload counts as an empty message. */
  private readMessage(socket: GatewaySocket, payload: unknown): Record<string, unknown> | undefined {
    if (payload === undefined) return {};
    if (isPlainObject(payload)) return payload;
    socket.emit('error', { message: 'Invalid message format' });
    return undefined;
  }

  /** Hooks the gateway into a socket.io server and the broker. */
  async attach(io: Server, broker: NotificationBroker): Promise<void> {
    io.use((socket, next) => {
      const handshake: Handshake = { auth: socket.handshake.auth, query: socket.handshake.query };
      this.authenticate(socket.id, handshake)
        .then(user => next(user ? undefined : new Error('Unauthorized')))
        .catch(error => {
          this.logger.error('NotificationGateway: Handshake failed', { socketId: socket.id, error: errorMessage(error), type: 'SocketError.handshake' });
          next(new Error('Unauthorized'));
        });
    });

    io.on('connection', socket => {
      this.handleConnection(wrapSocket(socket)).catch(error => {
        this.logger.error('NotificationGateway: Connection setup failed', { socketId: socket.id, error: errorMessage(error), type: 'SocketError.connection' });
        socket.disconnect(true);
      });
    });

    await broker.subscribe((message: RealtimeMessage) => {
      io.to(roomFor(message.userId)).emit(message.event, message.payload);
    });
  }
}
