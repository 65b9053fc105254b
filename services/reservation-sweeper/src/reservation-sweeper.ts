import { PoolClient } from 'pg';
import { withTransaction } from '@checkout-stock/shared/src/db/client';
import { ReservationService } from '@checkout-stock/shared/src/services/reservation-service';
import { Clock, systemClock } from '@checkout-stock/shared/src/utils/clock';
import { createChildLogger } from '@checkout-stock/shared/src/utils/logger';

const log = createChildLogger({ component: 'reservation-sweeper' });

export interface ReservationSweeperOptions {
     batchSize: number;
     intervalMs: number;
}

/**
 * Deletes expired reservation rows. Expired reservations are already ignored
 * by every availability read, so this only keeps the table small.
 */
export class ReservationSweeper {
     private running = false;

     constructor(
          private readonly options: ReservationSweeperOptions,
          private readonly reservationService: ReservationService = new ReservationService(),
          private readonly clock: Clock = systemClock
     ) {}

     async start(): Promise<void> {
          this.running = true;
          log.info(this.options, 'Starting reservation sweeper');

          while (this.running) {
               try {
                    await withTransaction((client) => this.sweep(client));
               } catch (error) {
                    log.error({ err: error }, 'Reservation sweep failed');
               }

               await this.sleep(this.options.intervalMs);
          }
     }

     async sweep(client: PoolClient): Promise<number> {
          const now = this.clock.now();
          const deleted = await this.reservationService.deleteExpired(
               client,
               now,
               this.options.batchSize
          );

          if (deleted > 0) {
               log.info({ deleted, asOf: now.toISOString() }, 'Expired reservations removed');
          }
          return deleted;
     }

     stop(): void {
          log.info('Stopping reservation sweeper');
          this.running = false;
     }

     private sleep(ms: number): Promise<void> {
          return new Promise((resolve) => setTimeout(resolve, ms));
     }
}
