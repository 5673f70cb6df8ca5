import { Kafka, Partitioners, Producer } from 'kafkajs';
import winston from 'winston';
import { errorMessage } from '../utils/logger';

export interface KafkaSettings {
  broker?: string;
  clientId: string;
}

let kafka: Kafka | null = null;
let clientId = 'socialconnect-api';
let kafkaBroker = '';
let producer: Producer | null = null;
let isProducerConnected = false;

/**
 * Prepares the Kafka client. Without a broker, event publishing stays
 * disabled and getKafkaProducer is never reached.
 */
export const configureKafka = (settings: KafkaSettings): boolean => {
  clientId = settings.clientId;
  if (!settings.broker) {
    kafka = null;
    return false;
  }
  kafkaBroker = settings.broker;
  kafka = new Kafka({
    clientId,
    brokers: [kafkaBroker],
    retry: {
      initialRetryTime: 3000,
      retries: 30,
      maxRetryTime: 30000,
      factor: 2,
      multiplier: 2,
    },
  });
  return true;
};

export const isKafkaEnabled = (): boolean => kafka !== null;

export const getKafkaProducer = async (logger: winston.Logger, correlationId?: string): Promise<Producer> => {
  if (producer && isProducerConnected) {
    return producer;
  }
  if (!kafka) {
    throw new Error('Kafka is not configured (KAFKA_BROKER is unset)');
  }
  const newProducer = kafka.producer({
    createPartitioner: Partitioners.DefaultPartitioner,
    allowAutoTopicCreation: true,
  });
  try {
    await newProducer.connect();
    logger.info(`Kafka Producer [${clientId}] connected to ${kafkaBroker}`, { correlationId, type: 'KafkaProducerLog.Connected' });
    producer = newProducer;
    isProducerConnected = true;
    return producer;
  } catch (error) {
    logger.error(`Kafka Producer [${clientId}] failed to connect`, { correlationId, error: errorMessage(error), type: 'KafkaProducerLog.ConnectError' });
    isProducerConnected = false;
    producer = null;
    throw error;
  }
};

export const disconnectProducer = async (logger: winston.Logger): Promise<void> => {
  if (producer) {
    try {
      await producer.disconnect();
      logger.info(`Kafka Producer [${clientId}] disconnected.`, { type: 'KafkaProducerLog.Disconnected' });
    } catch (error) {
      logger.error(`Error disconnecting Kafka Producer [${clientId}]`, { error: errorMessage(error), type: 'KafkaProducerLog.DisconnectError' });
    } finally {
      producer = null;
      isProducerConnected = false;
    }
  }
};
