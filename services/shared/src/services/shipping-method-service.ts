import { PoolClient } from 'pg';
import { Checkout, ShippingMethod } from '../types/checkout.types';
import { logger } from '../utils/logger';

export interface ExcludedShippingMethod {
     id: number;
     reason: string;
}

/**
 * Hook for external systems (e.g. a webhook) that may veto shipping methods
 * for a checkout.
 */
export interface ShippingMethodExclusionProvider {
     excludedShippingMethods(
          checkout: Checkout,
          methods: ShippingMethod[]
     ): Promise<ExcludedShippingMethod[]>;
}

export class ShippingMethodService {
     constructor(private readonly exclusionProvider?: ShippingMethodExclusionProvider) {}

     /**
      * Clear the checkout's shipping method if it cannot ship to
      * `countryCode` any more. Returns true when the method was cleared.
      */
     async updateShippingMethodIfInvalid(
          client: PoolClient,
          checkout: Checkout,
          countryCode: string
     ): Promise<boolean> {
          if (checkout.shippingMethodId === null) return false;

          const { rows } = await client.query<{
               id: number | string;
               name: string;
               shipping_zone_id: number | string;
          }>(
               `
      SELECT sm.id, sm.name, sm.shipping_zone_id
      FROM shipping_method sm
      JOIN shipping_zone sz ON sz.id = sm.shipping_zone_id
      JOIN shipping_zone_channel szc ON szc.shipping_zone_id = sz.id
      WHERE sm.id = $1
        AND szc.channel_id = $2
        AND $3 = ANY(sz.countries)
    `,
               [checkout.shippingMethodId, checkout.channelId, countryCode]
          );

          let reason: string | null = null;

          if (rows.length === 0) {
               reason = `not available for ${countryCode}`;
          } else if (this.exclusionProvider) {
               const methods: ShippingMethod[] = rows.map((row) => ({
                    id: parseInt(String(row.id), 10),
                    name: row.name,
                    shippingZoneId: parseInt(String(row.shipping_zone_id), 10),
               }));
               const excluded = await this.exclusionProvider.excludedShippingMethods(
                    { ...checkout, country: countryCode },
                    methods
               );
               const match = excluded.find((e) => e.id === checkout.shippingMethodId);
               if (match) {
                    reason = match.reason;
               }
          }

          if (reason === null) return false;

          await client.query(
               `
      UPDATE checkout
      SET shipping_method_id = NULL
      WHERE id = $1
    `,
               [checkout.id]
          );

          logger.info(
               { checkoutId: checkout.id, shippingMethodId: checkout.shippingMethodId, reason },
               'Shipping method cleared'
          );

          return true;
     }
}
