// Custom error classes for domain-specific errors

export class DomainError extends Error {
     constructor(
          message: string,
          public readonly code: string,
          public readonly statusCode: number = 400,
          public readonly field: string | null = null
     ) {
          super(message);
          this.name = this.constructor.name;
          Error.captureStackTrace(this, this.constructor);
     }
}

export interface InsufficientStockItem {
     variantId: number;
     requested: number;
     available: number;
}

export class InsufficientStockError extends DomainError {
     constructor(
          message: string,
          public readonly items: InsufficientStockItem[]
     ) {
          super(message, 'INSUFFICIENT_STOCK', 409, 'quantity');
     }

     static forItems(items: InsufficientStockItem[]): InsufficientStockError {
          const details = items
               .map((i) => `variant ${i.variantId}: requested ${i.requested}, available ${i.available}`)
               .join('; ');
          return new InsufficientStockError(`Insufficient stock for ${details}`, items);
     }
}

export class StockNotFoundError extends DomainError {
     constructor(public readonly stockId: number) {
          super(`Stock ${stockId} not found`, 'STOCK_NOT_FOUND', 404);
     }
}

export class CheckoutNotFoundError extends DomainError {
     constructor(public readonly checkoutId: string) {
          super(`Checkout ${checkoutId} not found`, 'CHECKOUT_NOT_FOUND', 404, 'id');
     }
}

export class CheckoutLineNotFoundError extends DomainError {
     constructor(public readonly checkoutLineId: string) {
          super(`Checkout line ${checkoutLineId} not found`, 'CHECKOUT_LINE_NOT_FOUND', 404, 'lineId');
     }
}

export class StockVariantMismatchError extends DomainError {
     constructor(
          public readonly stockId: number,
          public readonly variantId: number
     ) {
          super(
               `Stock ${stockId} does not hold variant ${variantId}`,
               'STOCK_VARIANT_MISMATCH',
               400,
               'stockId'
          );
     }
}

export class InvalidQuantityError extends DomainError {
     constructor(message: string) {
          super(message, 'INVALID_QUANTITY', 400, 'quantity');
     }
}

// Raised when reservations on a stock exceed its quantity. Logged, never
// returned to API callers.
export class IntegrityViolationError extends DomainError {
     constructor(
          public readonly stockId: number,
          public readonly quantity: number,
          public readonly reserved: number
     ) {
          super(
               `Stock ${stockId} has ${reserved} reserved against a quantity of ${quantity}`,
               'INTEGRITY_VIOLATION',
               500
          );
     }
}
