import { Message, ProducerRecord } from 'kafkajs';
import winston from 'winston';
import { CORRELATION_HEADER, errorMessage } from '../utils/logger';
import { getKafkaProducer, isKafkaEnabled } from './producer';

export interface SocialEventPayloads {
  UserRegistered: { userId: number; username: string; email: string };
  UserFollowed: { followerId: number; followingId: number };
  PostCreated: { postId: number; authorId: number; category: string };
  PostDeleted: { postId: number; authorId: number; deletedBy: number };
  PostLiked: { postId: number; userId: number; likeCount: number };
  CommentCreated: { commentId: number; postId: number; authorId: number };
}

export type SocialEventType = keyof SocialEventPayloads;

export type SocialEvent<T extends SocialEventType> = SocialEventPayloads[T] & {
  eventType: T;
  eventTimestamp: string;
};

export class EventPublisher {
  private topic: string;
  private logger: winston.Logger;

  constructor(topic: string, loggerInstance: winston.Logger) {
    this.topic = topic;
    this.logger = loggerInstance;
  }

  /** Delivery failures are logged and never rethrown. */
  async publish<T extends SocialEventType>(eventType: T, payload: SocialEventPayloads[T], correlationId?: string): Promise<void> {
    if (!isKafkaEnabled()) {
      this.logger.debug(`EventPublisher: Kafka disabled, skipping ${eventType}`, { correlationId, type: 'KafkaProducerLog.Disabled' });
      return;
    }
    const event: SocialEvent<T> = { ...payload, eventType, eventTimestamp: new Date().toISOString() };
    this.logger.info(`EventPublisher: Attempting to send ${eventType} event`, { correlationId, topic: this.topic, type: 'KafkaProducerLog.AttemptSend' });
    try {
      const producer = await getKafkaProducer(this.logger, correlationId);
      const messages: Message[] = [{
        value: JSON.stringify(event),
        headers: correlationId ? { [CORRELATION_HEADER]: correlationId } : undefined,
      }];
      const record: ProducerRecord = {
        topic: this.topic,
        messages,
      };
      await producer.send(record);
      this.logger.info(`EventPublisher: Sent ${eventType} event successfully`, { correlationId, topic: this.topic, type: 'KafkaProducerLog.SentSuccess' });
    } catch (error) {
      this.logger.error(`EventPublisher: Failed to send ${eventType} event to Kafka`, {
        correlationId,
        topic: this.topic,
        error: errorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
        type: 'KafkaProducerLog.SendError',
      });
    }
  }
}
