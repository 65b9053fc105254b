// Type definitions for domain models

export interface Stock {
     id: number;
     warehouseId: number;
     variantId: number;
     quantity: number;
}

export interface Reservation {
     id: number;
     checkoutLineId: string;
     checkoutId: string;
     stockId: number;
     quantityReserved: number;
     reservedUntil: Date;
}

export interface CheckoutLine {
     id: string;
     checkoutId: string;
     variantId: number;
     quantity: number;
}

export interface Address {
     firstName: string;
     lastName: string;
     companyName?: string;
     streetAddress1: string;
     streetAddress2?: string;
     city: string;
     cityArea?: string;
     postalCode: string;
     country: string;
     countryArea?: string;
     phone?: string;
}

export interface Checkout {
     id: string;
     channelId: number;
     userId: string | null;
     country: string;
     shippingAddressId: number | null;
     shippingMethodId: number | null;
     lastChange: Date;
}

export interface ShippingMethod {
     id: number;
     name: string;
     shippingZoneId: number;
}

export type CheckoutShippingState =
     | 'NO_SHIPPING_ADDRESS'
     | 'ADDRESS_SET_METHOD_VALID'
     | 'ADDRESS_SET_METHOD_CLEARED';

export interface StockAvailability {
     stockId: number;
     quantity: number;
     reserved: number;
     /** Never negative; see `raw` for the unclamped value */
     available: number;
     raw: number;
}

export interface ReserveRequest {
     checkoutLineId: string;
     stockId: number;
     quantity: number;
     durationMinutes: number;
}

export interface ReserveLineRequest {
     checkoutId: string;
     checkoutLineId: string;
     variantId: number;
     quantity: number;
     stockIds: number[];
     durationMinutes: number;
}

export interface LineDemand {
     checkoutLineId: string;
     variantId: number;
     quantity: number;
     stockIds: number[];
}

export interface ReserveLinesRequest {
     checkoutId: string;
     lines: LineDemand[];
     durationMinutes: number;
}

export interface ValidateLinesRequest {
     checkoutId: string;
     channelId: number;
     countryCode: string;
     lines: CheckoutLine[];
     asOf: Date;
     /** Subtract other checkouts' reservations; off when the site does not reserve stock */
     checkReservations: boolean;
}

export interface VariantAvailability {
     variantId: number;
     requested: number;
     available: number;
     stockIds: number[];
}

export interface UpdateShippingAddressRequest {
     checkoutId: string;
     address: Address;
}

export interface UpdateShippingAddressResult {
     checkout: Checkout;
     address: Address;
     shippingMethodCleared: boolean;
     state: CheckoutShippingState;
}

export interface LineAvailability {
     checkoutLineId: string;
     variantId: number;
     quantity: number;
     available: number;
}

// Domain events written to the outbox
export interface DomainEvent {
     id: number;
     type: string;
     payload: Record<string, unknown>;
     status: 'PENDING' | 'SENT' | 'FAILED';
     createdAt: Date;
}

export interface StockReservedEvent {
     checkoutId: string;
     checkoutLineId: string;
     stockId: number;
     quantity: number;
     reservedUntil: string;
     timestamp: string;
}

export interface ReservationReleasedEvent {
     checkoutLineId: string;
     released: number;
     timestamp: string;
}

export interface CheckoutUpdatedEvent {
     checkoutId: string;
     country: string;
     shippingMethodCleared: boolean;
     timestamp: string;
}
