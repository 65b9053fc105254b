import { PoolClient } from 'pg';

export type DomainEventType = 'StockReserved' | 'ReservationReleased' | 'CheckoutUpdated';

// Written in the caller's transaction; the event dispatcher publishes it later.
export async function insertDomainEvent(
     client: PoolClient,
     type: DomainEventType,
     payload: object
): Promise<void> {
     await client.query(
          `
      INSERT INTO domain_event (type, payload)
      VALUES ($1, $2::jsonb)
    `,
          [type, JSON.stringify(payload)]
     );
}
