import Redis from 'ioredis';
import winston from 'winston';
import { z } from 'zod';
import { errorMessage } from '../utils/logger';

export const REALTIME_EVENTS = ['notification', 'notification_update'] as const;
export type RealtimeEventName = (typeof REALTIME_EVENTS)[number];

/** One event addressed to every socket of one user. */
export interface RealtimeMessage {
  userId: number;
  event: RealtimeEventName;
  payload: Record<string, unknown>;
}

export type RealtimeHandler = (message: RealtimeMessage) => void;

export type BrokerHealth = 'up' | 'down' | 'disabled';

export interface NotificationBroker {
  publish(message: RealtimeMessage): Promise<void>;
  subscribe(handler: RealtimeHandler): Promise<void>;
  health(): Promise<BrokerHealth>;
  close(): Promise<void>;
}

/** Delivers within this process only. */
export class LocalNotificationBroker implements NotificationBroker {
  private handlers: RealtimeHandler[] = [];

  async publish(message: RealtimeMessage): Promise<void> {
    this.handlers.forEach(handler => handler(message));
  }

  async subscribe(handler: RealtimeHandler): Promise<void> {
    this.handlers.push(handler);
  }

  async health(): Promise<BrokerHealth> {
    return 'disabled';
  }

  async close(): Promise<void> {
    this.handlers = [];
  }
}

const realtimeMessageSchema = z.object({
  userId: z.number().int(),
  event: z.enum(REALTIME_EVENTS),
  payload: z.record(z.unknown()),
});

export const REALTIME_CHANNEL = 'socialconnect:notifications';

/**
 * Redis pub/sub fan-out so that every API process delivers to the sockets
 * it holds. A subscribed ioredis connection cannot issue other commands,
 * hence the separate publisher.
 */
export class RedisNotificationBroker implements NotificationBroker {
  private publisher: Redis;
  private subscriber: Redis;
  private logger: winston.Logger;
  private channel: string;

  constructor(redisUrl: string, loggerInstance: winston.Logger, channel: string = REALTIME_CHANNEL) {
    this.publisher = new Redis(redisUrl);
    this.subscriber = new Redis(redisUrl);
    this.logger = loggerInstance;
    this.channel = channel;

    const onError = (role: string) => (error: Error) =>
      this.logger.error(`RedisNotificationBroker: ${role} connection error`, { error: error.message, type: 'RedisLog.ConnectionError' });
    this.publisher.on('error', onError('publisher'));
    this.subscriber.on('error', onError('subscriber'));
  }

  async publish(message: RealtimeMessage): Promise<void> {
    await this.publisher.publish(this.channel, JSON.stringify(message));
  }

  async subscribe(handler: RealtimeHandler): Promise<void> {
    this.subscriber.on('message', (channel: string, raw: string) => {
      if (channel !== this.channel) return;
      try {
        const parsed = realtimeMessageSchema.safeParse(JSON.parse(raw));
        if (!parsed.success) {
          this.logger.warn('RedisNotificationBroker: Dropping malformed message', { issues: parsed.error.issues.length, type: 'RedisLog.MalformedMessage' });
          return;
        }
        handler(parsed.data);
      } catch (error) {
        this.logger.warn('RedisNotificationBroker: Dropping unreadable message', { error: errorMessage(error), type: 'RedisLog.MalformedMessage' });
      }
    });
    await this.subscriber.subscribe(this.channel);
    this.logger.info('RedisNotificationBroker: Subscribed', { channel: this.channel, type: 'RedisLog.Subscribed' });
  }

  async health(): Promise<BrokerHealth> {
    try {
      const reply = await this.publisher.ping();
      return reply === 'PONG' ? 'up' : 'down';
    } catch (error) {
      this.logger.warn('RedisNotificationBroker: Health check failed', { error: errorMessage(error), type: 'RedisLog.HealthFail' });
      return 'down';
    }
  }

  async close(): Promise<void> {
    await Promise.all([this.subscriber.quit(), this.publisher.quit()]);
  }
}

export function createNotificationBroker(redisUrl: string | undefined, loggerInstance: winston.Logger): NotificationBroker {
  if (redisUrl) {
    loggerInstance.info('Using Redis notification broker', { type: 'StartupLog.Broker' });
    return new RedisNotificationBroker(redisUrl, loggerInstance);
  }
  loggerInstance.info('REDIS_URL not set, using in-process notification broker', { type: 'StartupLog.Broker' });
  return new LocalNotificationBroker();
}
