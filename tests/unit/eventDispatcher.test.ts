import type { Channel } from 'amqplib';
import { PoolClient } from 'pg';
import { EventDispatcher } from '../../services/event-dispatcher/src/event-dispatcher';
import { createMockClient } from '../helpers/mockClient';

describe('EventDispatcher (Unit)', () => {
     let dispatcher: EventDispatcher;
     let mockClient: jest.Mocked<PoolClient>;
     let channel: jest.Mocked<Channel>;

     beforeEach(() => {
          dispatcher = new EventDispatcher({ batchSize: 25, pollIntervalMs: 1000 });
          mockClient = createMockClient();
          channel = { publish: jest.fn().mockReturnValue(true) } as unknown as jest.Mocked<Channel>;
     });

     it('should publish pending events and mark them sent', async () => {
          mockClient.query
               .mockResolvedValueOnce({
                    rows: [
                         {
                              id: '1',
                              type: 'StockReserved',
                              payload: { stockId: 1 },
                              created_at: new Date(),
                         },
                    ],
               } as never)
               .mockResolvedValueOnce({ rows: [], rowCount: 1 } as never);

          await expect(dispatcher.processBatch(mockClient, channel)).resolves.toBe(1);

          expect(mockClient.query).toHaveBeenNthCalledWith(
               1,
               expect.stringContaining('FOR UPDATE SKIP LOCKED'),
               [25]
          );
          expect(channel.publish).toHaveBeenCalledWith(
               'checkout.events',
               'checkout.StockReserved',
               Buffer.from('{"stockId":1}'),
               expect.objectContaining({
                    persistent: true,
                    contentType: 'application/json',
                    messageId: '1',
                    type: 'StockReserved',
               })
          );
          expect(mockClient.query).toHaveBeenNthCalledWith(
               2,
               expect.stringContaining("SET status = 'SENT'"),
               ['1']
          );
     });

     it('should mark an event failed when publishing throws', async () => {
          mockClient.query
               .mockResolvedValueOnce({
                    rows: [
                         {
                              id: 2,
                              type: 'CheckoutUpdated',
                              payload: { checkoutId: 'checkout-1' },
                              created_at: new Date(),
                         },
                    ],
               } as never)
               .mockResolvedValueOnce({ rows: [], rowCount: 1 } as never);
          channel.publish.mockImplementation(() => {
               throw new Error('Channel closed');
          });

          await expect(dispatcher.processBatch(mockClient, channel)).resolves.toBe(0);

          expect(mockClient.query).toHaveBeenNthCalledWith(
               2,
               expect.stringContaining("SET status = 'FAILED'"),
               [2, 'Channel closed']
          );
     });

     it('should do nothing when the outbox is empty', async () => {
          mockClient.query.mockResolvedValueOnce({ rows: [] } as never);

          await expect(dispatcher.processBatch(mockClient, channel)).resolves.toBe(0);
          expect(channel.publish).not.toHaveBeenCalled();
          expect(mockClient.query).toHaveBeenCalledTimes(1);
     });
});
