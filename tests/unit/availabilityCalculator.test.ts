import {
     isActive,
     activeReservationsFor,
     computeAvailability,
     aggregateAvailability,
} from '@checkout-stock/shared/src/services/availability-calculator';
import { IntegrityViolationError } from '@checkout-stock/shared/src/utils/errors';
import { logger } from '@checkout-stock/shared/src/utils/logger';
import type { Reservation, Stock } from '@checkout-stock/shared/src/types/checkout.types';

const NOW = new Date('2026-03-01T10:00:00.000Z');
const minutesFromNow = (minutes: number) => new Date(NOW.getTime() + minutes * 60_000);

function stock(id: number, quantity: number, variantId = 10): Stock {
     return { id, warehouseId: id, variantId, quantity };
}

let nextId = 1;
function reservation(
     stockId: number,
     quantityReserved: number,
     reservedUntil: Date,
     checkoutId = 'checkout-a'
): Reservation {
     const id = nextId++;
     return {
          id,
          checkoutLineId: `${checkoutId}-line-${id}`,
          checkoutId,
          stockId,
          quantityReserved,
          reservedUntil,
     };
}

describe('Availability calculator', () => {
     describe('isActive', () => {
          it('should treat future expiry as active', () => {
               expect(isActive(reservation(1, 1, minutesFromNow(5)), NOW)).toBe(true);
          });

          it('should treat past expiry as expired', () => {
               expect(isActive(reservation(1, 1, minutesFromNow(-1)), NOW)).toBe(false);
          });

          it('should treat expiry at exactly now as expired', () => {
               expect(isActive(reservation(1, 1, NOW), NOW)).toBe(false);
          });
     });

     describe('activeReservationsFor', () => {
          it('should keep only active reservations on the given stock', () => {
               const active = reservation(1, 2, minutesFromNow(5));
               const reservations = [
                    active,
                    reservation(1, 3, minutesFromNow(-5)),
                    reservation(2, 4, minutesFromNow(5)),
               ];

               expect(activeReservationsFor(reservations, 1, NOW)).toEqual([active]);
          });

          it('should leave out reservations of the excluded checkout', () => {
               const other = reservation(1, 2, minutesFromNow(5), 'checkout-a');
               const own = reservation(1, 1, minutesFromNow(5), 'checkout-b');

               expect(activeReservationsFor([other, own], 1, NOW, 'checkout-b')).toEqual([other]);
          });
     });

     describe('computeAvailability', () => {
          it('should subtract active reservations from the stock quantity', () => {
               const result = computeAvailability(
                    stock(1, 10),
                    [
                         reservation(1, 3, minutesFromNow(5)),
                         reservation(1, 2, minutesFromNow(-5)),
                         reservation(2, 4, minutesFromNow(5)),
                    ],
                    NOW
               );

               expect(result).toEqual({ stockId: 1, quantity: 10, reserved: 3, available: 7, raw: 7 });
          });

          it('should not count the excluded checkout against itself', () => {
               const result = computeAvailability(
                    stock(1, 10),
                    [
                         reservation(1, 5, minutesFromNow(5), 'checkout-a'),
                         reservation(1, 2, minutesFromNow(5), 'checkout-b'),
                    ],
                    NOW,
                    'checkout-a'
               );

               expect(result.reserved).toBe(2);
               expect(result.available).toBe(8);
          });

          it('should clamp a negative balance and log an integrity violation', () => {
               const spy = jest.spyOn(logger, 'error');

               const result = computeAvailability(
                    stock(7, 2),
                    [reservation(7, 5, minutesFromNow(5))],
                    NOW
               );

               expect(result.available).toBe(0);
               expect(result.raw).toBe(-3);
               expect(spy).toHaveBeenCalledWith(
                    { err: expect.any(IntegrityViolationError) },
                    'Reservations exceed stock quantity'
               );
               spy.mockRestore();
          });

          it('should not log when reservations fit the stock', () => {
               const spy = jest.spyOn(logger, 'error');
               computeAvailability(stock(1, 2), [reservation(1, 2, minutesFromNow(5))], NOW);
               expect(spy).not.toHaveBeenCalled();
               spy.mockRestore();
          });

          it('should never report more than the stock quantity', () => {
               const cases: Array<[number, Reservation[]]> = [
                    [0, []],
                    [5, [reservation(1, 1, minutesFromNow(1))]],
                    [5, [reservation(1, 9, minutesFromNow(-1))]],
                    [3, [reservation(1, 4, minutesFromNow(1))]],
               ];

               for (const [quantity, reservations] of cases) {
                    const { available } = computeAvailability(stock(1, quantity), reservations, NOW);
                    expect(available).toBeLessThanOrEqual(quantity);
                    expect(available).toBeGreaterThanOrEqual(0);
               }
          });
     });

     describe('aggregateAvailability', () => {
          it('should sum availability across stocks', () => {
               const total = aggregateAvailability(
                    [stock(1, 2), stock(2, 3)],
                    [reservation(1, 1, minutesFromNow(5))],
                    NOW
               );
               expect(total).toBe(4);
          });

          it('should be zero without stocks', () => {
               expect(aggregateAvailability([], [], NOW)).toBe(0);
          });
     });

     describe('Competing checkouts', () => {
          it('should leave nothing for another checkout while an active reservation holds the stock', () => {
               const usStock = stock(1, 2);
               const heldByA = reservation(1, 2, minutesFromNow(5), 'checkout-a');

               expect(aggregateAvailability([usStock], [heldByA], NOW, 'checkout-b')).toBe(0);
          });

          it('should release the stock once the reservation has expired', () => {
               const usStock = stock(1, 2);
               const heldByA = reservation(1, 2, minutesFromNow(-1), 'checkout-a');

               expect(aggregateAvailability([usStock], [heldByA], NOW, 'checkout-b')).toBe(2);
          });
     });
});
