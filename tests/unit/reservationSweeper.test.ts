import { ReservationService } from '@checkout-stock/shared/src/services/reservation-service';
import { fixedClock } from '@checkout-stock/shared/src/utils/clock';
import { PoolClient } from 'pg';
import { ReservationSweeper } from '../../services/reservation-sweeper/src/reservation-sweeper';
import { createMockClient } from '../helpers/mockClient';

const NOW = new Date('2026-03-01T10:00:00.000Z');

describe('ReservationSweeper (Unit)', () => {
     let mockClient: jest.Mocked<PoolClient>;
     let reservationService: ReservationService;

     beforeEach(() => {
          mockClient = createMockClient();
          reservationService = new ReservationService();
     });

     it('should delete expired reservations as of the clock', async () => {
          const deleteExpired = jest.spyOn(reservationService, 'deleteExpired').mockResolvedValue(3);
          const sweeper = new ReservationSweeper(
               { batchSize: 200, intervalMs: 1000 },
               reservationService,
               fixedClock(NOW)
          );

          await expect(sweeper.sweep(mockClient)).resolves.toBe(3);
          expect(deleteExpired).toHaveBeenCalledWith(mockClient, NOW, 200);
     });

     it('should pass the batch size to the delete query', async () => {
          mockClient.query.mockResolvedValueOnce({ rows: [], rowCount: 0 } as never);
          const sweeper = new ReservationSweeper(
               { batchSize: 50, intervalMs: 1000 },
               reservationService,
               fixedClock(NOW)
          );

          await expect(sweeper.sweep(mockClient)).resolves.toBe(0);
          expect(mockClient.query).toHaveBeenCalledWith(
               expect.stringContaining('DELETE FROM reservation'),
               [NOW, 50]
          );
     });
});
