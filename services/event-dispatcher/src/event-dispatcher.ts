import type { Channel } from 'amqplib';
import { PoolClient } from 'pg';
import { withTransaction } from '@checkout-stock/shared/src/db/client';
import {
     CHECKOUT_EVENTS_EXCHANGE,
     getChannel,
     routingKeyFor,
} from '@checkout-stock/shared/src/messaging/client';
import { createChildLogger } from '@checkout-stock/shared/src/utils/logger';

const log = createChildLogger({ component: 'event-dispatcher' });

export interface EventDispatcherOptions {
     batchSize: number;
     pollIntervalMs: number;
}

interface DomainEventRow {
     id: number | string;
     type: string;
     payload: Record<string, unknown>;
     created_at: Date;
}

export class EventDispatcher {
     private running = false;

     constructor(private readonly options: EventDispatcherOptions) {}

     async start(): Promise<void> {
          this.running = true;
          log.info(this.options, 'Starting event dispatcher');

          while (this.running) {
               try {
                    await withTransaction(async (client) => {
                         const channel = await getChannel();
                         await this.processBatch(client, channel);
                    });
               } catch (error) {
                    log.error({ err: error }, 'Error processing event batch');
               }

               await this.sleep(this.options.pollIntervalMs);
          }
     }

     /**
      * Publish one batch of pending outbox events. Rows are locked with
      * SKIP LOCKED so several dispatchers can run side by side.
      */
     async processBatch(client: PoolClient, channel: Channel): Promise<number> {
          const { rows: events } = await client.query<DomainEventRow>(
               `
      SELECT id, type, payload, created_at
      FROM domain_event
      WHERE status = 'PENDING'
      ORDER BY created_at
      LIMIT $1
      FOR UPDATE SKIP LOCKED
    `,
               [this.options.batchSize]
          );

          if (events.length === 0) {
               return 0;
          }

          log.debug({ eventCount: events.length }, 'Processing event batch');

          let sent = 0;
          for (const event of events) {
               const eventId = String(event.id);
               try {
                    channel.publish(
                         CHECKOUT_EVENTS_EXCHANGE,
                         routingKeyFor(event.type),
                         Buffer.from(JSON.stringify(event.payload)),
                         {
                              persistent: true,
                              contentType: 'application/json',
                              timestamp: Date.now(),
                              messageId: eventId,
                              type: event.type,
                         }
                    );

                    await client.query(
                         `
          UPDATE domain_event
          SET status = 'SENT', updated_at = NOW()
          WHERE id = $1
        `,
                         [event.id]
                    );
                    sent += 1;

                    log.debug({ eventId, type: event.type }, 'Event dispatched');
               } catch (error) {
                    log.error({ err: error, eventId }, 'Failed to dispatch event');

                    await client.query(
                         `
          UPDATE domain_event
          SET status = 'FAILED',
              updated_at = NOW(),
              retry_count = retry_count + 1,
              error = $2
          WHERE id = $1
        `,
                         [event.id, error instanceof Error ? error.message : 'Unknown error']
                    );
               }
          }

          log.info({ dispatched: sent, failed: events.length - sent }, 'Event batch processed');
          return sent;
     }

     stop(): void {
          log.info('Stopping event dispatcher');
          this.running = false;
     }

     private sleep(ms: number): Promise<void> {
          return new Promise((resolve) => setTimeout(resolve, ms));
     }
}
