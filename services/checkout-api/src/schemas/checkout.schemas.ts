const errorListSchema = {
     type: 'array',
     items: {
          type: 'object',
          properties: {
               field: { type: 'string', nullable: true, example: 'quantity' },
               code: { type: 'string', example: 'INSUFFICIENT_STOCK' },
               message: {
                    type: 'string',
                    example: 'Insufficient stock for variant 12: requested 1, available 0',
               },
          },
     },
};

const errorResponseSchema = {
     type: 'object',
     properties: {
          checkout: { type: 'null' },
          errors: errorListSchema,
     },
};

const internalErrorSchema = {
     description: 'Internal server error',
     type: 'object',
     properties: {
          error: { type: 'string', example: 'INTERNAL_ERROR' },
          message: { type: 'string', example: 'An unexpected error occurred' },
     },
};

const checkoutIdParams = {
     type: 'object',
     required: ['checkoutId'],
     properties: {
          checkoutId: {
               type: 'string',
               format: 'uuid',
               description: 'Checkout identifier',
          },
     },
};

export const addressSchema = {
     type: 'object',
     required: ['firstName', 'lastName', 'streetAddress1', 'city', 'postalCode', 'country'],
     properties: {
          firstName: { type: 'string', example: 'John' },
          lastName: { type: 'string', example: 'Doe' },
          companyName: { type: 'string' },
          streetAddress1: { type: 'string', example: '1 Main Street' },
          streetAddress2: { type: 'string' },
          city: { type: 'string', example: 'New York' },
          cityArea: { type: 'string' },
          postalCode: { type: 'string', example: '10001' },
          country: {
               type: 'string',
               pattern: '^[A-Za-z]{2}$',
               description: 'ISO 3166-1 alpha-2 country code',
               example: 'US',
          },
          countryArea: { type: 'string', example: 'NY' },
          phone: { type: 'string', example: '+12025550100' },
     },
};

export const updateShippingAddressSchema = {
     tags: ['checkout'],
     summary: 'Set the shipping address of a checkout',
     description:
          'Checks that every line can be shipped to the new country, taking reservations held by other checkouts into account. Clears the shipping method if it no longer applies.',
     params: checkoutIdParams,
     body: {
          type: 'object',
          required: ['shippingAddress'],
          properties: {
               shippingAddress: addressSchema,
          },
     },
     response: {
          200: {
               description: 'Shipping address updated',
               type: 'object',
               properties: {
                    checkout: {
                         type: 'object',
                         properties: {
                              id: { type: 'string' },
                              country: { type: 'string', example: 'US' },
                              shippingAddress: addressSchema,
                              shippingMethodId: { type: 'integer', nullable: true },
                              shippingMethodCleared: { type: 'boolean' },
                              state: {
                                   type: 'string',
                                   enum: [
                                        'NO_SHIPPING_ADDRESS',
                                        'ADDRESS_SET_METHOD_VALID',
                                        'ADDRESS_SET_METHOD_CLEARED',
                                   ],
                              },
                              lastChange: { type: 'string', format: 'date-time' },
                         },
                    },
                    errors: errorListSchema,
               },
          },
          404: { description: 'Checkout not found', ...errorResponseSchema },
          409: { description: 'Insufficient stock', ...errorResponseSchema },
          500: internalErrorSchema,
     },
};

export const getCheckoutAvailabilitySchema = {
     tags: ['checkout'],
     summary: 'Get availability of checkout lines',
     description:
          "Display-only availability of each line at the checkout's current country. The checkout's own reservations are not subtracted.",
     params: checkoutIdParams,
     response: {
          200: {
               type: 'object',
               properties: {
                    checkoutId: { type: 'string' },
                    lines: {
                         type: 'array',
                         items: {
                              type: 'object',
                              properties: {
                                   checkoutLineId: { type: 'string' },
                                   variantId: { type: 'integer' },
                                   quantity: { type: 'integer' },
                                   available: { type: 'integer' },
                              },
                         },
                    },
               },
          },
          404: { description: 'Checkout not found', ...errorResponseSchema },
          500: internalErrorSchema,
     },
};

export const getStockAvailabilitySchema = {
     tags: ['stock'],
     summary: 'Get availability of a stock record',
     params: {
          type: 'object',
          required: ['stockId'],
          properties: {
               stockId: { type: 'integer', minimum: 1, example: 42 },
          },
     },
     response: {
          200: {
               type: 'object',
               properties: {
                    stockId: { type: 'integer', example: 42 },
                    quantity: { type: 'integer', example: 10 },
                    reserved: { type: 'integer', example: 3 },
                    available: { type: 'integer', example: 7 },
               },
          },
          404: { description: 'Stock not found', ...errorResponseSchema },
          500: internalErrorSchema,
     },
};

export const releaseReservationsSchema = {
     tags: ['stock'],
     summary: 'Release reservations held by a checkout line',
     description: 'Idempotent: releasing a line without reservations succeeds with released = 0.',
     params: {
          type: 'object',
          required: ['lineId'],
          properties: {
               lineId: { type: 'string', format: 'uuid' },
          },
     },
     response: {
          200: {
               type: 'object',
               properties: {
                    checkoutLineId: { type: 'string' },
                    released: { type: 'integer', example: 1 },
               },
          },
          500: internalErrorSchema,
     },
};
