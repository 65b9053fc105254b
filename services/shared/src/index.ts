// Config
export * from './config/site-settings';

// Database
export * from './db/client';
export * from './db/outbox';

// Messaging
export * from './messaging/client';

// Services
export * from './services/availability-calculator';
export * from './services/stock-service';
export * from './services/reservation-service';
export * from './services/checkout-line-validator';
export * from './services/shipping-method-service';
export * from './services/checkout-service';

// Types
export * from './types/checkout.types';

// Utils
export * from './utils/clock';
export * from './utils/logger';
export * from './utils/errors';
