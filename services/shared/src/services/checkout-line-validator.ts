import { PoolClient } from 'pg';
import { ValidateLinesRequest, VariantAvailability } from '../types/checkout.types';
import { InsufficientStockError, InsufficientStockItem } from '../utils/errors';
import { logger } from '../utils/logger';
import { aggregateAvailability } from './availability-calculator';
import { ReservationService } from './reservation-service';
import { StockService } from './stock-service';

export class CheckoutLineValidator {
     constructor(
          private readonly stockService: StockService = new StockService(),
          private readonly reservationService: ReservationService = new ReservationService()
     ) {}

     /**
      * Check that every variant in `lines` can be shipped to `countryCode`.
      * Quantities of lines sharing a variant are added up, and availability
      * is summed over all eligible stocks of that variant. With
      * `checkReservations` on, reservations of other checkouts are subtracted;
      * the checkout's own never count against it.
      */
     async validateLines(
          client: PoolClient,
          request: ValidateLinesRequest
     ): Promise<VariantAvailability[]> {
          const { checkoutId, channelId, countryCode, lines, asOf, checkReservations } = request;

          const demand = new Map<number, number>();
          for (const line of lines) {
               demand.set(line.variantId, (demand.get(line.variantId) ?? 0) + line.quantity);
          }
          if (demand.size === 0) return [];

          const stocks = await this.stockService.getEligibleStocks(client, {
               channelId,
               countryCode,
               variantIds: [...demand.keys()],
          });
          const reservations = checkReservations
               ? await this.reservationService.activeReservations(
                      client,
                      stocks.map((s) => s.id),
                      asOf,
                      checkoutId
                 )
               : [];

          const result: VariantAvailability[] = [];
          const insufficient: InsufficientStockItem[] = [];

          for (const [variantId, requested] of demand) {
               const variantStocks = stocks.filter((s) => s.variantId === variantId);
               const available = aggregateAvailability(variantStocks, reservations, asOf);

               if (available < requested) {
                    insufficient.push({ variantId, requested, available });
               }
               result.push({
                    variantId,
                    requested,
                    available,
                    stockIds: variantStocks.map((s) => s.id),
               });
          }

          if (insufficient.length > 0) {
               logger.info(
                    { checkoutId, countryCode, insufficient },
                    'Insufficient stock for checkout lines'
               );
               throw InsufficientStockError.forItems(insufficient);
          }

          return result;
     }
}
