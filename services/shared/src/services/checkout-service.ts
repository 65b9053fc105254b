import { PoolClient } from 'pg';
import {
     SiteSettings,
     getReservationLength,
     isReservationEnabled,
     loadSiteSettings,
} from '../config/site-settings';
import { insertDomainEvent } from '../db/outbox';
import {
     Address,
     Checkout,
     CheckoutLine,
     CheckoutShippingState,
     CheckoutUpdatedEvent,
     LineAvailability,
     UpdateShippingAddressRequest,
     UpdateShippingAddressResult,
     VariantAvailability,
} from '../types/checkout.types';
import { Clock, systemClock } from '../utils/clock';
import { CheckoutNotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';
import { aggregateAvailability } from './availability-calculator';
import { CheckoutLineValidator } from './checkout-line-validator';
import { ReservationService } from './reservation-service';
import { ShippingMethodService } from './shipping-method-service';
import { StockService } from './stock-service';

interface CheckoutRow {
     id: string;
     channel_id: number | string;
     user_id: string | null;
     country: string;
     shipping_address_id: number | string | null;
     shipping_method_id: number | string | null;
     last_change: Date;
}

function toCheckout(row: CheckoutRow): Checkout {
     return {
          id: row.id,
          channelId: parseInt(String(row.channel_id), 10),
          userId: row.user_id,
          country: row.country,
          shippingAddressId:
               row.shipping_address_id === null ? null : parseInt(String(row.shipping_address_id), 10),
          shippingMethodId:
               row.shipping_method_id === null ? null : parseInt(String(row.shipping_method_id), 10),
          lastChange: row.last_change,
     };
}

export function shippingStateOf(
     checkout: Checkout,
     shippingMethodCleared: boolean
): CheckoutShippingState {
     if (checkout.shippingAddressId === null) return 'NO_SHIPPING_ADDRESS';
     return shippingMethodCleared ? 'ADDRESS_SET_METHOD_CLEARED' : 'ADDRESS_SET_METHOD_VALID';
}

function addressParams(address: Address, country: string): Array<string | null> {
     return [
          address.firstName,
          address.lastName,
          address.companyName ?? null,
          address.streetAddress1,
          address.streetAddress2 ?? null,
          address.city,
          address.cityArea ?? null,
          address.postalCode,
          country,
          address.countryArea ?? null,
          address.phone ?? null,
     ];
}

export interface CheckoutServiceOptions {
     stockService?: StockService;
     reservationService?: ReservationService;
     validator?: CheckoutLineValidator;
     shippingMethodService?: ShippingMethodService;
     siteSettings?: SiteSettings;
     clock?: Clock;
}

export class CheckoutService {
     private readonly stockService: StockService;
     private readonly reservationService: ReservationService;
     private readonly validator: CheckoutLineValidator;
     private readonly shippingMethodService: ShippingMethodService;
     private readonly siteSettings: SiteSettings;
     private readonly clock: Clock;

     constructor(options: CheckoutServiceOptions = {}) {
          this.clock = options.clock ?? systemClock;
          this.stockService = options.stockService ?? new StockService();
          this.reservationService =
               options.reservationService ?? new ReservationService(this.stockService, this.clock);
          this.validator =
               options.validator ??
               new CheckoutLineValidator(this.stockService, this.reservationService);
          this.shippingMethodService = options.shippingMethodService ?? new ShippingMethodService();
          this.siteSettings = options.siteSettings ?? loadSiteSettings();
     }

     async getCheckout(client: PoolClient, checkoutId: string, lock = false): Promise<Checkout> {
          const { rows } = await client.query<CheckoutRow>(
               `
      SELECT id, channel_id, user_id, country, shipping_address_id,
             shipping_method_id, last_change
      FROM checkout
      WHERE id = $1
      ${lock ? 'FOR UPDATE' : ''}
    `,
               [checkoutId]
          );

          if (rows.length === 0) {
               throw new CheckoutNotFoundError(checkoutId);
          }

          return toCheckout(rows[0]);
     }

     async getLines(client: PoolClient, checkoutId: string): Promise<CheckoutLine[]> {
          const { rows } = await client.query<{
               id: string;
               checkout_id: string;
               product_variant_id: number | string;
               quantity: number | string;
          }>(
               `
      SELECT id, checkout_id, product_variant_id, quantity
      FROM checkout_line
      WHERE checkout_id = $1
      ORDER BY created_at, id
    `,
               [checkoutId]
          );

          return rows.map((row) => ({
               id: row.id,
               checkoutId: row.checkout_id,
               variantId: parseInt(String(row.product_variant_id), 10),
               quantity: parseInt(String(row.quantity), 10),
          }));
     }

     /**
      * Set the checkout's shipping address. Runs inside the caller's
      * transaction; when the lines cannot be shipped to the new country an
      * InsufficientStockError is thrown before anything is written.
      */
     async updateShippingAddress(
          client: PoolClient,
          request: UpdateShippingAddressRequest
     ): Promise<UpdateShippingAddressResult> {
          const { checkoutId, address } = request;
          const country = address.country.toUpperCase();

          logger.info({ checkoutId, country }, 'Updating checkout shipping address');

          const checkout = await this.getCheckout(client, checkoutId, true);
          const lines = await this.getLines(client, checkoutId);
          const now = this.clock.now();

          const variants = await this.validator.validateLines(client, {
               checkoutId,
               channelId: checkout.channelId,
               countryCode: country,
               lines,
               asOf: now,
               checkReservations: isReservationEnabled(this.siteSettings),
          });

          const shippingAddressId = await this.saveAddress(
               client,
               checkout.shippingAddressId,
               address,
               country
          );

          await client.query(
               `
      UPDATE checkout
      SET shipping_address_id = $2,
          country = $3,
          last_change = $4
      WHERE id = $1
    `,
               [checkoutId, shippingAddressId, country, now]
          );

          const shippingMethodCleared =
               await this.shippingMethodService.updateShippingMethodIfInvalid(
                    client,
                    checkout,
                    country
               );

          await this.refreshReservations(client, checkout, lines, variants);

          const event: CheckoutUpdatedEvent = {
               checkoutId,
               country,
               shippingMethodCleared,
               timestamp: now.toISOString(),
          };
          await insertDomainEvent(client, 'CheckoutUpdated', event);

          const updated: Checkout = {
               ...checkout,
               country,
               shippingAddressId,
               shippingMethodId: shippingMethodCleared ? null : checkout.shippingMethodId,
               lastChange: now,
          };

          logger.info(
               { checkoutId, country, shippingMethodCleared },
               'Checkout shipping address updated'
          );

          return {
               checkout: updated,
               address: { ...address, country },
               shippingMethodCleared,
               state: shippingStateOf(updated, shippingMethodCleared),
          };
     }

     /**
      * Display-only availability for each line at the checkout's current
      * country. Takes no locks.
      */
     async getLineAvailability(
          client: PoolClient,
          checkoutId: string,
          asOf: Date = this.clock.now()
     ): Promise<LineAvailability[]> {
          const checkout = await this.getCheckout(client, checkoutId);
          const lines = await this.getLines(client, checkoutId);
          if (lines.length === 0) return [];

          const stocks = await this.stockService.getEligibleStocks(client, {
               channelId: checkout.channelId,
               countryCode: checkout.country,
               variantIds: lines.map((l) => l.variantId),
          });
          const reservations = isReservationEnabled(this.siteSettings)
               ? await this.reservationService.activeReservations(
                      client,
                      stocks.map((s) => s.id),
                      asOf,
                      checkoutId
                 )
               : [];

          return lines.map((line) => ({
               checkoutLineId: line.id,
               variantId: line.variantId,
               quantity: line.quantity,
               available: aggregateAvailability(
                    stocks.filter((s) => s.variantId === line.variantId),
                    reservations,
                    asOf
               ),
          }));
     }

     private async saveAddress(
          client: PoolClient,
          existingId: number | null,
          address: Address,
          country: string
     ): Promise<number> {
          const params = addressParams(address, country);

          if (existingId !== null) {
               await client.query(
                    `
        UPDATE address
        SET first_name = $1, last_name = $2, company_name = $3,
            street_address_1 = $4, street_address_2 = $5, city = $6,
            city_area = $7, postal_code = $8, country = $9,
            country_area = $10, phone = $11
        WHERE id = $12
      `,
                    [...params, existingId]
               );
               return existingId;
          }

          const { rows } = await client.query<{ id: number | string }>(
               `
      INSERT INTO address (
        first_name, last_name, company_name, street_address_1,
        street_address_2, city, city_area, postal_code, country,
        country_area, phone
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
      RETURNING id
    `,
               params
          );
          return parseInt(String(rows[0].id), 10);
     }

     private async refreshReservations(
          client: PoolClient,
          checkout: Checkout,
          lines: CheckoutLine[],
          variants: VariantAvailability[]
     ): Promise<void> {
          const duration = getReservationLength(this.siteSettings, checkout.userId);
          if (duration === null || lines.length === 0) return;

          await this.reservationService.releaseForCheckout(client, checkout.id);

          await this.reservationService.reserveLines(client, {
               checkoutId: checkout.id,
               lines: lines.map((line) => ({
                    checkoutLineId: line.id,
                    variantId: line.variantId,
                    quantity: line.quantity,
                    stockIds: variants.find((v) => v.variantId === line.variantId)?.stockIds ?? [],
               })),
               durationMinutes: duration,
          });
     }
}
