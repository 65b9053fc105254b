import { Reservation, Stock, StockAvailability } from '../types/checkout.types';
import { IntegrityViolationError } from '../utils/errors';
import { logger } from '../utils/logger';

export function isActive(reservation: Reservation, asOf: Date): boolean {
     return reservation.reservedUntil.getTime() > asOf.getTime();
}

/**
 * Reservations holding stock at `asOf`. Reservations made by lines of
 * `excludeCheckoutId` are left out so a checkout never competes with itself.
 */
export function activeReservationsFor(
     reservations: Reservation[],
     stockId: number,
     asOf: Date,
     excludeCheckoutId?: string
): Reservation[] {
     return reservations.filter(
          (r) =>
               r.stockId === stockId &&
               isActive(r, asOf) &&
               (excludeCheckoutId === undefined || r.checkoutId !== excludeCheckoutId)
     );
}

export function computeAvailability(
     stock: Stock,
     reservations: Reservation[],
     asOf: Date,
     excludeCheckoutId?: string
): StockAvailability {
     const reserved = activeReservationsFor(reservations, stock.id, asOf, excludeCheckoutId).reduce(
          (sum, r) => sum + r.quantityReserved,
          0
     );
     const raw = stock.quantity - reserved;

     if (raw < 0) {
          logger.error(
               { err: new IntegrityViolationError(stock.id, stock.quantity, reserved) },
               'Reservations exceed stock quantity'
          );
     }

     return {
          stockId: stock.id,
          quantity: stock.quantity,
          reserved,
          available: Math.max(raw, 0),
          raw,
     };
}

/**
 * Total quantity that can still be promised from a set of stocks.
 */
export function aggregateAvailability(
     stocks: Stock[],
     reservations: Reservation[],
     asOf: Date,
     excludeCheckoutId?: string
): number {
     return stocks.reduce(
          (sum, stock) =>
               sum + computeAvailability(stock, reservations, asOf, excludeCheckoutId).available,
          0
     );
}
