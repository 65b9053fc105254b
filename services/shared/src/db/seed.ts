import { pool, withTransaction } from './client';
import { logger } from '../utils/logger';

async function seedDatabase() {
     try {
          logger.info('Seeding database with sample catalogue and warehouses');

          await withTransaction(async (client) => {
               const { rows: channels } = await client.query<{ id: string }>(`
        INSERT INTO channel (slug, currency_code) VALUES ('default-usd', 'USD')
        ON CONFLICT (slug) DO UPDATE SET currency_code = EXCLUDED.currency_code
        RETURNING id
      `);
               const channelId = channels[0].id;

               const { rows: zones } = await client.query<{ id: string; name: string }>(`
        INSERT INTO shipping_zone (name, countries) VALUES
        ('Americas', ARRAY['US', 'CA']),
        ('Europe', ARRAY['PL', 'DE', 'FR'])
        RETURNING id, name
      `);

               for (const zone of zones) {
                    await client.query(
                         `INSERT INTO shipping_zone_channel (shipping_zone_id, channel_id) VALUES ($1, $2)`,
                         [zone.id, channelId]
                    );

                    const { rows: warehouses } = await client.query<{ id: string }>(
                         `INSERT INTO warehouse (name) VALUES ($1) RETURNING id`,
                         [`${zone.name} Warehouse`]
                    );
                    await client.query(
                         `INSERT INTO warehouse_shipping_zone (warehouse_id, shipping_zone_id) VALUES ($1, $2)`,
                         [warehouses[0].id, zone.id]
                    );

                    await client.query(
                         `INSERT INTO shipping_method (name, shipping_zone_id) VALUES ($1, $2)`,
                         [`${zone.name} Standard`, zone.id]
                    );
               }

               logger.info({ count: zones.length }, 'Inserted shipping zones and warehouses');

               const { rows: variants } = await client.query<{ id: string }>(`
        INSERT INTO product_variant (sku, name) VALUES
        ('TSHIRT-BLUE-M', 'T-Shirt Blue M'),
        ('TSHIRT-BLUE-L', 'T-Shirt Blue L'),
        ('MUG-WHITE', 'White Mug')
        ON CONFLICT (sku) DO NOTHING
        RETURNING id
      `);

               for (const variant of variants) {
                    await client.query(
                         `
          INSERT INTO stock (warehouse_id, product_variant_id, quantity)
          SELECT w.id, $1, 10 FROM warehouse w
          ON CONFLICT DO NOTHING
        `,
                         [variant.id]
                    );
               }

               logger.info({ count: variants.length }, 'Inserted variants and stocks');
          });

          logger.info('Database seeding completed successfully');
     } catch (error) {
          logger.error({ err: error }, 'Seeding failed');
          throw error;
     } finally {
          await pool.end();
     }
}

// Run if executed directly
if (require.main === module) {
     seedDatabase().catch((err) => {
          logger.fatal({ err }, 'Seed error');
          process.exit(1);
     });
}

export { seedDatabase };
