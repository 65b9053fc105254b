import * as amqplib from 'amqplib';
import type { Channel } from 'amqplib';
import { logger } from '../utils/logger';

type AmqpConnection = Awaited<ReturnType<typeof amqplib.connect>>;

let connection: AmqpConnection | null = null;
let channel: Channel | null = null;

export const CHECKOUT_EVENTS_EXCHANGE = 'checkout.events';
export const DEAD_LETTER_EXCHANGE = 'dlx.checkout';
export const STOCK_EVENTS_QUEUE = 'checkout.stock-events';
export const STOCK_EVENTS_DLQ = 'dlq.checkout.stock-events';

async function connect(): Promise<AmqpConnection> {
     const url = process.env.AMQP_URL || 'amqp://localhost:5672';
     logger.info({ url: url.replace(/:[^:]*@/, ':****@') }, 'Connecting to RabbitMQ');

     const conn = await amqplib.connect(url);

     conn.on('error', (err) => {
          logger.error({ err }, 'RabbitMQ connection error');
     });

     conn.on('close', () => {
          logger.warn('RabbitMQ connection closed, will reconnect on next use');
          connection = null;
          channel = null;
     });

     logger.info('Connected to RabbitMQ');
     return conn;
}

export async function getChannel(): Promise<Channel> {
     if (channel) return channel;

     if (!connection) {
          connection = await connect();
     }

     const ch = await connection.createChannel();
     await setupTopology(ch);

     logger.info('RabbitMQ channel created and configured');

     channel = ch;
     return ch;
}

/**
 * Declare exchanges and queues. Every checkout event lands in the stock
 * events queue; messages rejected by its consumers go to the dead-letter
 * queue.
 */
export async function setupTopology(ch: Channel): Promise<void> {
     await ch.assertExchange(CHECKOUT_EVENTS_EXCHANGE, 'topic', { durable: true });
     await ch.assertExchange(DEAD_LETTER_EXCHANGE, 'topic', { durable: true });

     await ch.assertQueue(STOCK_EVENTS_QUEUE, {
          durable: true,
          deadLetterExchange: DEAD_LETTER_EXCHANGE,
          deadLetterRoutingKey: STOCK_EVENTS_DLQ,
     });
     await ch.assertQueue(STOCK_EVENTS_DLQ, { durable: true });

     await ch.bindQueue(STOCK_EVENTS_QUEUE, CHECKOUT_EVENTS_EXCHANGE, 'checkout.#');
     await ch.bindQueue(STOCK_EVENTS_DLQ, DEAD_LETTER_EXCHANGE, STOCK_EVENTS_DLQ);
}

export function routingKeyFor(eventType: string): string {
     return `checkout.${eventType}`;
}

export async function closeConnection(): Promise<void> {
     if (channel) {
          await channel.close();
          channel = null;
     }
     if (connection) {
          await connection.close();
          connection = null;
     }
     logger.info('RabbitMQ connection closed');
}
