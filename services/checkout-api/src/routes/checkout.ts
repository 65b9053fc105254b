import { FastifyInstance, FastifyReply } from 'fastify';
import { withConnection, withTransaction } from '@checkout-stock/shared/src/db/client';
import { CheckoutService } from '@checkout-stock/shared/src/services/checkout-service';
import { ReservationService } from '@checkout-stock/shared/src/services/reservation-service';
import { DomainError } from '@checkout-stock/shared/src/utils/errors';
import { logger } from '@checkout-stock/shared/src/utils/logger';
import type { Address } from '@checkout-stock/shared/src/types/checkout.types';
import {
     updateShippingAddressSchema,
     getCheckoutAvailabilitySchema,
     getStockAvailabilitySchema,
     releaseReservationsSchema,
} from '../schemas/checkout.schemas';

export interface CheckoutRoutesOptions {
     checkoutService?: CheckoutService;
     reservationService?: ReservationService;
}

export interface ApiError {
     field: string | null;
     code: string;
     message: string;
}

export function toApiError(error: DomainError): ApiError {
     return { field: error.field, code: error.code, message: error.message };
}

// Domain errors become a structured payload; anything else is logged and
// reported as a 500 without details.
function sendError(reply: FastifyReply, error: unknown, context: string) {
     if (error instanceof DomainError) {
          return reply.code(error.statusCode).send({
               checkout: null,
               errors: [toApiError(error)],
          });
     }

     logger.error({ err: error }, context);
     return reply.code(500).send({
          error: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
     });
}

export async function registerCheckoutRoutes(
     app: FastifyInstance,
     options: CheckoutRoutesOptions = {}
) {
     const reservationService = options.reservationService ?? new ReservationService();
     const checkoutService =
          options.checkoutService ?? new CheckoutService({ reservationService });

     app.post<{
          Params: { checkoutId: string };
          Body: { shippingAddress: Address };
     }>(
          '/checkouts/:checkoutId/shipping-address',
          { schema: updateShippingAddressSchema },
          async (request, reply) => {
               const { checkoutId } = request.params;

               try {
                    const result = await withTransaction((client) =>
                         checkoutService.updateShippingAddress(client, {
                              checkoutId,
                              address: request.body.shippingAddress,
                         })
                    );

                    return reply.code(200).send({
                         checkout: {
                              id: result.checkout.id,
                              country: result.checkout.country,
                              shippingAddress: result.address,
                              shippingMethodId: result.checkout.shippingMethodId,
                              shippingMethodCleared: result.shippingMethodCleared,
                              state: result.state,
                              lastChange: result.checkout.lastChange.toISOString(),
                         },
                         errors: [],
                    });
               } catch (error) {
                    return sendError(reply, error, 'Failed to update shipping address');
               }
          }
     );

     app.get<{ Params: { checkoutId: string } }>(
          '/checkouts/:checkoutId/availability',
          { schema: getCheckoutAvailabilitySchema },
          async (request, reply) => {
               const { checkoutId } = request.params;

               try {
                    const lines = await withConnection((client) =>
                         checkoutService.getLineAvailability(client, checkoutId)
                    );
                    return reply.send({ checkoutId, lines });
               } catch (error) {
                    return sendError(reply, error, 'Failed to get checkout availability');
               }
          }
     );

     app.get<{ Params: { stockId: number } }>(
          '/stocks/:stockId/availability',
          { schema: getStockAvailabilitySchema },
          async (request, reply) => {
               try {
                    const availability = await withConnection((client) =>
                         reservationService.getStockAvailability(client, request.params.stockId)
                    );
                    return reply.send({
                         stockId: availability.stockId,
                         quantity: availability.quantity,
                         reserved: availability.reserved,
                         available: availability.available,
                    });
               } catch (error) {
                    return sendError(reply, error, 'Failed to get stock availability');
               }
          }
     );

     app.delete<{ Params: { lineId: string } }>(
          '/checkout-lines/:lineId/reservations',
          { schema: releaseReservationsSchema },
          async (request, reply) => {
               const { lineId } = request.params;

               try {
                    const released = await withTransaction((client) =>
                         reservationService.release(client, lineId)
                    );
                    return reply.send({ checkoutLineId: lineId, released });
               } catch (error) {
                    return sendError(reply, error, 'Failed to release reservations');
               }
          }
     );
}
