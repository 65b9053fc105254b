import { PoolClient } from 'pg';
import { Stock } from '../types/checkout.types';
import { StockNotFoundError } from '../utils/errors';

export interface StockRow {
     id: number | string;
     warehouse_id: number | string;
     product_variant_id: number | string;
     quantity: number | string;
}

// PostgreSQL returns bigint as string
export function toStock(row: StockRow): Stock {
     return {
          id: parseInt(String(row.id), 10),
          warehouseId: parseInt(String(row.warehouse_id), 10),
          variantId: parseInt(String(row.product_variant_id), 10),
          quantity: parseInt(String(row.quantity), 10),
     };
}

export interface EligibleStocksQuery {
     channelId: number;
     countryCode: string;
     variantIds: number[];
}

export class StockService {
     async getQuantity(client: PoolClient, stockId: number): Promise<number> {
          const stock = await this.getStock(client, stockId);
          return stock.quantity;
     }

     async getStock(client: PoolClient, stockId: number): Promise<Stock> {
          const { rows } = await client.query<StockRow>(
               `
      SELECT id, warehouse_id, product_variant_id, quantity
      FROM stock
      WHERE id = $1
    `,
               [stockId]
          );

          if (rows.length === 0) {
               throw new StockNotFoundError(stockId);
          }

          return toStock(rows[0]);
     }

     /**
      * Lock stock rows in ascending id order so concurrent reservers on
      * overlapping stocks always queue in the same order.
      */
     async lockStocks(client: PoolClient, stockIds: number[]): Promise<Stock[]> {
          const ids = [...new Set(stockIds)].sort((a, b) => a - b);
          if (ids.length === 0) return [];

          const { rows } = await client.query<StockRow>(
               `
      SELECT id, warehouse_id, product_variant_id, quantity
      FROM stock
      WHERE id = ANY($1::bigint[])
      ORDER BY id
      FOR UPDATE
    `,
               [ids]
          );

          const stocks = rows.map(toStock);
          const found = new Set(stocks.map((s) => s.id));
          const missing = ids.find((id) => !found.has(id));
          if (missing !== undefined) {
               throw new StockNotFoundError(missing);
          }

          return stocks;
     }

     /**
      * Stocks of the given variants held in warehouses that ship to
      * `countryCode` through a shipping zone assigned to the channel. Takes
      * no locks; writers lock the returned ids with `lockStocks`.
      */
     async getEligibleStocks(client: PoolClient, query: EligibleStocksQuery): Promise<Stock[]> {
          const { channelId, countryCode, variantIds } = query;
          if (variantIds.length === 0) return [];

          const { rows } = await client.query<StockRow>(
               `
      SELECT s.id, s.warehouse_id, s.product_variant_id, s.quantity
      FROM stock s
      WHERE s.product_variant_id = ANY($1::bigint[])
        AND EXISTS (
          SELECT 1
          FROM warehouse_shipping_zone wsz
          JOIN shipping_zone sz ON sz.id = wsz.shipping_zone_id
          JOIN shipping_zone_channel szc ON szc.shipping_zone_id = sz.id
          WHERE wsz.warehouse_id = s.warehouse_id
            AND szc.channel_id = $2
            AND $3 = ANY(sz.countries)
        )
      ORDER BY s.id
    `,
               [[...new Set(variantIds)], channelId, countryCode]
          );

          return rows.map(toStock);
     }
}
