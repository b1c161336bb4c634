import { Injectable, OnModuleInit, OnModuleDestroy, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { connect, ChannelModel, Channel, ConsumeMessage, Options, Replies } from 'amqplib';
import { getErrorMessage } from '../common/utils/error.util';

export type MessageHandler = (payload: unknown) => Promise<void>;

const RETRY_HEADER = 'x-retry-count';
const LAST_ERROR_HEADER = 'x-last-error';

/**
 * Thrown by a handler for a message that must not be redelivered. The
 * message goes straight to the dead letter queue.
 */
export class NonRetryableMessageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NonRetryableMessageError';
  }
}

@Injectable()
export class RabbitMQService implements OnModuleInit, OnModuleDestroy {
  private connection: ChannelModel | null = null;
  private channel: Channel | null = null;
  private readonly logger = new Logger(RabbitMQService.name);

  constructor(private configService: ConfigService) {}

  async onModuleInit(): Promise<void> {
    await this.connect();
  }

  async onModuleDestroy(): Promise<void> {
    await this.disconnect();
  }

  async connect(): Promise<void> {
    try {
      const rabbitMQUrl = this.configService.get<string>('rabbitmq.url') || 'amqp://localhost:5672';
      this.logger.log(`Connecting to RabbitMQ at ${rabbitMQUrl}...`);

      this.connection = await connect(rabbitMQUrl);
      this.channel = await this.connection.createChannel();

      const prefetchCount = this.configService.get<number>('rabbitmq.prefetchCount') || 1;
      await this.channel.prefetch(prefetchCount);

      this.logger.log('Successfully connected to RabbitMQ');

      this.connection.on('error', (err) => {
        this.logger.error('RabbitMQ connection error:', err);
      });

      this.connection.on('close', () => {
        this.logger.warn('RabbitMQ connection closed');
      });
    } catch (error) {
      this.logger.error('Failed to connect to RabbitMQ:', error);
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    try {
      if (this.channel) {
        await this.channel.close();
      }
      if (this.connection) {
        await this.connection.close();
      }
      this.logger.log('RabbitMQ connection closed');
    } catch (error) {
      this.logger.error('Error closing RabbitMQ connection:', error);
    } finally {
      this.channel = null;
      this.connection = null;
    }
  }

  getChannel(): Channel {
    if (!this.channel) {
      throw new Error('RabbitMQ channel not initialized');
    }
    return this.channel;
  }

  /**
   * Asserts a durable queue together with its dead letter exchange and queue
   * (`<queue>.dlx`, `<queue>.dlq`).
   */
  async assertQueue(
    queueName: string,
    options?: Options.AssertQueue,
  ): Promise<Replies.AssertQueue> {
    const channel = this.getChannel();
    const dlxName = `${queueName}.dlx`;
    const dlqName = `${queueName}.dlq`;

    await channel.assertExchange(dlxName, 'direct', { durable: true });
    await channel.assertQueue(dlqName, { durable: true });
    await channel.bindQueue(dlqName, dlxName, queueName);

    return await channel.assertQueue(queueName, {
      durable: true,
      deadLetterExchange: dlxName,
      deadLetterRoutingKey: queueName,
      ...options,
    });
  }

  async publishToQueue(queueName: string, message: unknown): Promise<boolean> {
    try {
      await this.assertQueue(queueName);

      const sent = this.getChannel().sendToQueue(queueName, Buffer.from(JSON.stringify(message)), {
        persistent: true,
      });

      if (!sent) {
        this.logger.warn(`Failed to send message to queue ${queueName}`);
      }

      return sent;
    } catch (error) {
      this.logger.error(`Error publishing to queue ${queueName}:`, error);
      throw error;
    }
  }

  async consume(
    queueName: string,
    handler: MessageHandler,
    options?: Options.Consume,
  ): Promise<void> {
    try {
      await this.assertQueue(queueName);

      await this.getChannel().consume(
        queueName,
        async (msg) => {
          if (msg) {
            await this.processMessage(msg, queueName, handler);
          }
        },
        {
          noAck: false,
          ...options,
        },
      );

      this.logger.log(`Consumer registered for queue: ${queueName}`);
    } catch (error) {
      this.logger.error(`Error setting up consumer for ${queueName}:`, error);
      throw error;
    }
  }

  private async processMessage(
    msg: ConsumeMessage,
    queueName: string,
    handler: MessageHandler,
  ): Promise<void> {
    let payload: unknown;
    try {
      payload = JSON.parse(msg.content.toString());
    } catch (error) {
      this.logger.error(`Unparseable message on ${queueName}, sending to DLQ`, error);
      this.getChannel().nack(msg, false, false);
      return;
    }

    try {
      await handler(payload);
      this.getChannel().ack(msg);
    } catch (error) {
      if (error instanceof NonRetryableMessageError) {
        this.logger.error(`Dead-lettering message from ${queueName}: ${error.message}`);
        this.getChannel().nack(msg, false, false);
        return;
      }
      this.logger.error(`Error processing message from ${queueName}:`, error);
      this.handleMessageRetry(msg, queueName, error);
    }
  }

  private handleMessageRetry(msg: ConsumeMessage, queueName: string, error: unknown): void {
    const channel = this.getChannel();
    const previous: unknown = msg.properties.headers?.[RETRY_HEADER];
    const retryCount = (typeof previous === 'number' ? previous : 0) + 1;
    const maxRetries = this.configService.get<number>('rabbitmq.maxRetries') || 3;

    if (retryCount < maxRetries) {
      this.logger.warn(`Requeuing message (retry ${retryCount}/${maxRetries})`);

      channel.publish('', queueName, msg.content, {
        persistent: true,
        headers: {
          ...msg.properties.headers,
          [RETRY_HEADER]: retryCount,
          [LAST_ERROR_HEADER]: getErrorMessage(error),
        },
      });
      channel.ack(msg);
    } else {
      this.logger.error('Max retries reached, sending to DLQ');
      channel.nack(msg, false, false);
    }
  }

  async getQueueMessageCount(queueName: string): Promise<number> {
    try {
      if (!this.channel) {
        this.logger.warn('RabbitMQ channel not initialized');
        return 0;
      }
      const queueInfo = await this.channel.checkQueue(queueName);
      return Number.isFinite(queueInfo.messageCount) ? queueInfo.messageCount : 0;
    } catch (error) {
      this.logger.error(`Error getting message count for ${queueName}: ${getErrorMessage(error)}`);
      return 0;
    }
  }
}
