// Database
export * from './db/client';
export * from './db/pg-errors';

// Messaging
export * from './messaging/client';

// Services
export * from './services/allocation-service';
export * from './services/expiry-scan-service';
export * from './services/fulfillment-service';
export * from './services/order-service';
export * from './services/order-state-machine';
export * from './services/outbox';
export * from './services/return-service';
export * from './services/shipment-service';
export * from './services/stock-ledger';
export * from './services/transaction-log';

// Structures
export * from './structures/selection-stack';
export * from './structures/work-queue';

// Types
export * from './types/fulfillment.types';

// Utils
export * from './utils/errors';
export * from './utils/http';
export * from './utils/identifiers';
export * from './utils/logger';
