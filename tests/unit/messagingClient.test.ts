import type { Channel } from 'amqplib';
import {
     routingKeyFor,
     setupTopology,
} from '@checkout-stock/shared/src/messaging/client';

describe('Messaging client (Unit)', () => {
     let channel: jest.Mocked<Channel>;

     beforeEach(() => {
          channel = {
               assertExchange: jest.fn().mockResolvedValue({}),
               assertQueue: jest.fn().mockResolvedValue({}),
               bindQueue: jest.fn().mockResolvedValue({}),
          } as unknown as jest.Mocked<Channel>;
     });

     it('should dead-letter the stock events queue', async () => {
          await setupTopology(channel);

          expect(channel.assertExchange).toHaveBeenCalledWith('checkout.events', 'topic', {
               durable: true,
          });
          expect(channel.assertExchange).toHaveBeenCalledWith('dlx.checkout', 'topic', {
               durable: true,
          });
          expect(channel.assertQueue).toHaveBeenCalledWith('checkout.stock-events', {
               durable: true,
               deadLetterExchange: 'dlx.checkout',
               deadLetterRoutingKey: 'dlq.checkout.stock-events',
          });
          expect(channel.bindQueue).toHaveBeenCalledWith(
               'checkout.stock-events',
               'checkout.events',
               'checkout.#'
          );
          expect(channel.bindQueue).toHaveBeenCalledWith(
               'dlq.checkout.stock-events',
               'dlx.checkout',
               'dlq.checkout.stock-events'
          );
     });

     it('should route events by type', () => {
          expect(routingKeyFor('StockReserved')).toBe('checkout.StockReserved');
     });
});
