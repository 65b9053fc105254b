import { PoolClient } from 'pg';
import { insertDomainEvent } from '../db/outbox';
import {
     LineDemand,
     Reservation,
     ReservationReleasedEvent,
     ReserveLineRequest,
     ReserveLinesRequest,
     ReserveRequest,
     Stock,
     StockAvailability,
     StockReservedEvent,
} from '../types/checkout.types';
import { Clock, addMinutes, systemClock } from '../utils/clock';
import {
     CheckoutLineNotFoundError,
     InsufficientStockError,
     InvalidQuantityError,
     StockVariantMismatchError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import { computeAvailability, isActive } from './availability-calculator';
import { StockService } from './stock-service';

interface ReservationRow {
     id: number | string;
     checkout_line_id: string;
     checkout_id: string;
     stock_id: number | string;
     quantity_reserved: number | string;
     reserved_until: Date;
}

export function toReservation(row: ReservationRow): Reservation {
     return {
          id: parseInt(String(row.id), 10),
          checkoutLineId: row.checkout_line_id,
          checkoutId: row.checkout_id,
          stockId: parseInt(String(row.stock_id), 10),
          quantityReserved: parseInt(String(row.quantity_reserved), 10),
          reservedUntil: row.reserved_until,
     };
}

function assertPositive(quantity: number, what: string): void {
     if (!Number.isInteger(quantity) || quantity <= 0) {
          throw new InvalidQuantityError(`${what} must be a positive integer, got ${quantity}`);
     }
}

export class ReservationService {
     constructor(
          private readonly stockService: StockService = new StockService(),
          private readonly clock: Clock = systemClock
     ) {}

     /**
      * Reservations on the given stocks still holding quantity at `asOf`.
      * Expired rows are never returned, whether or not the sweeper has
      * removed them yet.
      */
     async activeReservations(
          client: PoolClient,
          stockIds: number[],
          asOf: Date,
          excludeCheckoutId?: string
     ): Promise<Reservation[]> {
          if (stockIds.length === 0) return [];

          const { rows } = await client.query<ReservationRow>(
               `
      SELECT r.id, r.checkout_line_id, cl.checkout_id, r.stock_id,
             r.quantity_reserved, r.reserved_until
      FROM reservation r
      JOIN checkout_line cl ON cl.id = r.checkout_line_id
      WHERE r.stock_id = ANY($1::bigint[])
        AND r.reserved_until > $2
    `,
               [[...new Set(stockIds)], asOf]
          );

          return rows
               .map(toReservation)
               .filter(
                    (r) =>
                         isActive(r, asOf) &&
                         (excludeCheckoutId === undefined || r.checkoutId !== excludeCheckoutId)
               );
     }

     /**
      * Display-only availability of one stock. Takes no locks.
      */
     async getStockAvailability(
          client: PoolClient,
          stockId: number,
          asOf: Date = this.clock.now()
     ): Promise<StockAvailability> {
          const stock = await this.stockService.getStock(client, stockId);
          const reservations = await this.activeReservations(client, [stockId], asOf);
          return computeAvailability(stock, reservations, asOf);
     }

     /**
      * Hold `quantity` of a single stock for a checkout line. The stock row
      * stays locked until the surrounding transaction ends, so the
      * availability check and the write cannot interleave with another
      * reserver on the same stock. Other lines of the same checkout compete
      * like any other reserver; only the line's own previous hold is ignored.
      */
     async reserve(client: PoolClient, request: ReserveRequest): Promise<Reservation> {
          const { checkoutLineId, stockId, quantity, durationMinutes } = request;

          assertPositive(quantity, 'Quantity');
          assertPositive(durationMinutes, 'Reservation duration');

          const { rows: lines } = await client.query<{
               id: string;
               checkout_id: string;
               product_variant_id: number | string;
          }>(`SELECT id, checkout_id, product_variant_id FROM checkout_line WHERE id = $1`, [
               checkoutLineId,
          ]);
          if (lines.length === 0) {
               throw new CheckoutLineNotFoundError(checkoutLineId);
          }
          const checkoutId = lines[0].checkout_id;
          const variantId = parseInt(String(lines[0].product_variant_id), 10);

          const [stock] = await this.stockService.lockStocks(client, [stockId]);
          if (stock.variantId !== variantId) {
               throw new StockVariantMismatchError(stockId, variantId);
          }
          const now = this.clock.now();

          const others = (await this.activeReservations(client, [stockId], now)).filter(
               (r) => r.checkoutLineId !== checkoutLineId
          );
          const { available } = computeAvailability(stock, others, now);

          if (available < quantity) {
               throw InsufficientStockError.forItems([
                    { variantId: stock.variantId, requested: quantity, available },
               ]);
          }

          const reservedUntil = addMinutes(now, durationMinutes);
          const { rows } = await client.query<{ id: number | string }>(
               `
      INSERT INTO reservation (checkout_line_id, stock_id, quantity_reserved, reserved_until)
      VALUES ($1, $2, $3, $4)
      ON CONFLICT (checkout_line_id, stock_id)
      DO UPDATE SET quantity_reserved = EXCLUDED.quantity_reserved,
                    reserved_until = EXCLUDED.reserved_until
      RETURNING id
    `,
               [checkoutLineId, stockId, quantity, reservedUntil]
          );

          const reservation: Reservation = {
               id: parseInt(String(rows[0].id), 10),
               checkoutLineId,
               checkoutId,
               stockId,
               quantityReserved: quantity,
               reservedUntil,
          };

          await this.recordReserved(client, reservation, now);

          logger.debug(
               { checkoutLineId, stockId, quantity, remaining: available - quantity },
               'Stock reserved'
          );

          return reservation;
     }

     /**
      * Replace every reservation of a line with new ones spread over
      * `stockIds`, filling stocks in ascending id order.
      */
     async reserveLine(client: PoolClient, request: ReserveLineRequest): Promise<Reservation[]> {
          const { checkoutId, durationMinutes, ...line } = request;

          assertPositive(line.quantity, 'Quantity');
          assertPositive(durationMinutes, 'Reservation duration');

          const stocks = await this.stockService.lockStocks(client, line.stockIds);
          return this.allocateLine(client, checkoutId, line, stocks, durationMinutes);
     }

     /**
      * Reserve several lines of one checkout. The stocks of all lines are
      * locked together, in ascending id order, before any line is
      * allocated.
      */
     async reserveLines(client: PoolClient, request: ReserveLinesRequest): Promise<Reservation[]> {
          const { checkoutId, lines, durationMinutes } = request;

          for (const line of lines) {
               assertPositive(line.quantity, 'Quantity');
          }
          assertPositive(durationMinutes, 'Reservation duration');

          const stocks = await this.stockService.lockStocks(
               client,
               lines.flatMap((l) => l.stockIds)
          );

          const created: Reservation[] = [];
          for (const line of lines) {
               const lineStocks = stocks.filter((s) => line.stockIds.includes(s.id));
               created.push(
                    ...(await this.allocateLine(client, checkoutId, line, lineStocks, durationMinutes))
               );
          }
          return created;
     }

     // `stocks` must already be locked by the caller's transaction.
     private async allocateLine(
          client: PoolClient,
          checkoutId: string,
          line: LineDemand,
          stocks: Stock[],
          durationMinutes: number
     ): Promise<Reservation[]> {
          const { checkoutLineId, variantId, quantity } = line;
          const variantStocks = stocks.filter((s) => s.variantId === variantId);
          const now = this.clock.now();

          const others = (
               await this.activeReservations(
                    client,
                    variantStocks.map((s) => s.id),
                    now
               )
          ).filter((r) => r.checkoutLineId !== checkoutLineId);

          const availability = variantStocks.map((stock) => computeAvailability(stock, others, now));
          const total = availability.reduce((sum, a) => sum + a.available, 0);

          if (total < quantity) {
               throw InsufficientStockError.forItems([
                    { variantId, requested: quantity, available: total },
               ]);
          }

          await client.query(`DELETE FROM reservation WHERE checkout_line_id = $1`, [
               checkoutLineId,
          ]);

          const reservedUntil = addMinutes(now, durationMinutes);
          const created: Reservation[] = [];
          let remaining = quantity;

          for (const { stockId, available } of availability) {
               if (remaining === 0) break;
               const take = Math.min(available, remaining);
               if (take === 0) continue;

               const { rows } = await client.query<{ id: number | string }>(
                    `
        INSERT INTO reservation (checkout_line_id, stock_id, quantity_reserved, reserved_until)
        VALUES ($1, $2, $3, $4)
        RETURNING id
      `,
                    [checkoutLineId, stockId, take, reservedUntil]
               );

               const reservation: Reservation = {
                    id: parseInt(String(rows[0].id), 10),
                    checkoutLineId,
                    checkoutId,
                    stockId,
                    quantityReserved: take,
                    reservedUntil,
               };
               await this.recordReserved(client, reservation, now);
               created.push(reservation);
               remaining -= take;
          }

          logger.debug(
               { checkoutId, checkoutLineId, variantId, quantity, stocks: created.length },
               'Checkout line reserved'
          );

          return created;
     }

     /**
      * Drop all reservations of a line. Releasing a line with nothing
      * reserved is a no-op.
      */
     async release(client: PoolClient, checkoutLineId: string): Promise<number> {
          const result = await client.query(
               `DELETE FROM reservation WHERE checkout_line_id = $1 RETURNING id`,
               [checkoutLineId]
          );
          const released = result.rowCount ?? 0;

          if (released > 0) {
               const event: ReservationReleasedEvent = {
                    checkoutLineId,
                    released,
                    timestamp: this.clock.now().toISOString(),
               };
               await insertDomainEvent(client, 'ReservationReleased', event);
          }

          logger.info({ checkoutLineId, released }, 'Reservations released');
          return released;
     }

     async releaseForCheckout(client: PoolClient, checkoutId: string): Promise<number> {
          const result = await client.query(
               `
      DELETE FROM reservation r
      USING checkout_line cl
      WHERE cl.id = r.checkout_line_id
        AND cl.checkout_id = $1
      RETURNING r.id
    `,
               [checkoutId]
          );
          return result.rowCount ?? 0;
     }

     /**
      * Physically remove reservations that expired at or before `asOf`.
      * Rows locked by an in-flight transaction are skipped.
      */
     async deleteExpired(client: PoolClient, asOf: Date, limit: number): Promise<number> {
          const result = await client.query(
               `
      DELETE FROM reservation
      WHERE id IN (
        SELECT id
        FROM reservation
        WHERE reserved_until <= $1
        ORDER BY reserved_until
        LIMIT $2
        FOR UPDATE SKIP LOCKED
      )
    `,
               [asOf, limit]
          );
          return result.rowCount ?? 0;
     }

     private async recordReserved(
          client: PoolClient,
          reservation: Reservation,
          now: Date
     ): Promise<void> {
          const event: StockReservedEvent = {
               checkoutId: reservation.checkoutId,
               checkoutLineId: reservation.checkoutLineId,
               stockId: reservation.stockId,
               quantity: reservation.quantityReserved,
               reservedUntil: reservation.reservedUntil.toISOString(),
               timestamp: now.toISOString(),
          };
          await insertDomainEvent(client, 'StockReserved', event);
     }
}
