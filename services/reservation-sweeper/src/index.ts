import dotenv from 'dotenv';
import { closePool } from '@checkout-stock/shared/src/db/client';
import { logger } from '@checkout-stock/shared/src/utils/logger';
import { ReservationSweeper } from './reservation-sweeper';

dotenv.config();

const BATCH_SIZE = parseInt(process.env.SWEEP_BATCH_SIZE || '500', 10);
const INTERVAL_MS = parseInt(process.env.SWEEP_INTERVAL_MS || '60000', 10);

async function main() {
     const sweeper = new ReservationSweeper({ batchSize: BATCH_SIZE, intervalMs: INTERVAL_MS });

     const shutdown = async () => {
          logger.info('Shutting down gracefully...');
          sweeper.stop();
          await closePool();
          process.exit(0);
     };

     process.on('SIGINT', shutdown);
     process.on('SIGTERM', shutdown);

     await sweeper.start();
}

main().catch((err) => {
     logger.fatal({ err }, 'Fatal error in reservation sweeper');
     process.exit(1);
});
