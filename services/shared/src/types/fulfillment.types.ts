// Type definitions for domain models

export type BatchStatus = 'AVAILABLE' | 'QUARANTINE' | 'EXPIRED';

export type OrderStatus =
     | 'new'
     | 'allocated'
     | 'picked'
     | 'packed'
     | 'shipped'
     | 'delivered'
     | 'cancelled';

export type OrderAction = 'allocate' | 'deallocate' | 'pick' | 'pack' | 'ship' | 'deliver' | 'cancel';

export type TransactionType = 'RECEIVE' | 'RESERVE' | 'ADJUST' | 'SHIP' | 'RETURN';

export type ShipmentStatus = 'SHIPPED' | 'DELIVERED';

/**
 * Who is performing an operation. Authentication happens upstream; the engine
 * only needs an identifier for the audit trail and whether the actor may use
 * privileged shortcuts.
 */
export interface Actor {
     id: string;
     privileged: boolean;
}

export interface Batch {
     id: number;
     itemId: number;
     sku: string;
     lotNo: string;
     quantity: number;
     availableQty: number;
     expiryDate: string | null;
     status: BatchStatus;
}

export interface InventoryBatch extends Batch {
     eligible: boolean;
}

export interface InventorySummary {
     sku: string;
     totalAvailable: number;
     batches: InventoryBatch[];
}

export interface EligibleBatch {
     id: number;
     lotNo: string;
     availableQty: number;
     expiryDate: string | null;
}

export interface Order {
     id: number;
     orderNo: string;
     customerName: string;
     status: OrderStatus;
     createdAt: Date;
}

export interface OrderItem {
     id: number;
     orderId: number;
     itemId: number;
     sku: string;
     lineNo: number;
     qtyRequested: number;
     qtyAllocated: number;
     qtyPicked: number | null;
     packNotes: string | null;
}

export interface Allocation {
     id: number;
     orderItemId: number;
     itemId: number;
     batchId: number;
     lotNo: string;
     qtyAllocated: number;
}

export interface Shipment {
     id: number;
     orderId: number;
     shipmentNo: string;
     trackingNo: string;
     carrier: string;
     shippingAddress: string;
     notes: string | null;
     status: ShipmentStatus;
     shippedAt: Date;
     deliveredAt: Date | null;
}

export interface OrderDetail extends Order {
     items: OrderItem[];
     allocations: Allocation[];
     shipment: Shipment | null;
}

export interface TransactionLogEntry {
     id: number;
     type: TransactionType;
     qty: number;
     itemId: number | null;
     batchId: number | null;
     orderId: number | null;
     shipmentId: number | null;
     actor: string;
     metadata: Record<string, unknown>;
     createdAt: Date;
}

export interface NewTransactionLogEntry {
     type: TransactionType;
     qty: number;
     actor: string;
     itemId?: number;
     batchId?: number;
     orderId?: number;
     shipmentId?: number;
     metadata?: Record<string, unknown>;
}

// Ties a stock movement to the order or return behind it
export interface LedgerContext {
     orderId?: number;
     metadata?: Record<string, unknown>;
}

// Requests

export interface CreateOrderRequest {
     orderNo?: string;
     customerName: string;
     lines: Array<{ sku: string; quantity: number }>;
}

export interface ShipOrderRequest {
     carrier: string;
     address: string;
     notes?: string;
}

export interface ReceiveBatchRequest {
     sku: string;
     lotNo: string;
     quantity: number;
     expiryDate?: string;
     status?: BatchStatus;
}

export interface AdjustBatchRequest {
     batchId: number;
     quantityDelta: number;
     reason: string;
}

// Results

export interface BatchDraw {
     batchId: number;
     lotNo: string;
     expiryDate: string | null;
     qty: number;
}

export interface AllocationLineResult {
     orderItemId: number;
     itemId: number;
     sku: string;
     requested: number;
     fulfilled: number;
     unfulfilled: number;
     draws: BatchDraw[];
}

export interface AllocationResult {
     orderId: number;
     orderNo: string;
     status: OrderStatus;
     perItem: AllocationLineResult[];
     totalRequested: number;
     totalFulfilled: number;
     fullyAllocated: boolean;
     nothingAvailable: boolean;
}

export type PendingOrderOutcome = 'fully_allocated' | 'partially_allocated' | 'unallocated';

export interface PendingOrderResult {
     orderId: number;
     orderNo: string;
     outcome: PendingOrderOutcome;
     totalRequested: number;
     totalFulfilled: number;
}

export interface PendingAllocationRun {
     ordersProcessed: number;
     fullyAllocated: number;
     partiallyAllocated: number;
     unallocated: number;
     results: PendingOrderResult[];
}

export interface DeallocationResult {
     orderId: number;
     status: OrderStatus;
     releasedQty: number;
     allocationCount: number;
}

export interface AdjustmentLine {
     orderItemId: number;
     sku: string;
     allocated: number;
     previous: number;
     recorded: number;
     delta: number;
}

export interface AdjustmentReport {
     orderId: number;
     status: OrderStatus;
     lines: AdjustmentLine[];
     discrepancies: number;
}

export interface LowStockSignal {
     itemId: number;
     sku: string;
     totalAvailable: number;
     reorderThreshold: number;
}

export interface ExpiryScanResult {
     dryRun: boolean;
     expired: Batch[];
     nearExpiry: Batch[];
}

// Domain events

export type DomainEventType =
     | 'OrderAllocated'
     | 'OrderDeallocated'
     | 'OrderCancelled'
     | 'OrderShipped'
     | 'OrderDelivered'
     | 'LowStockDetected'
     | 'BatchesExpired'
     | 'NearExpiryWarning'
     | 'ReturnRequested'
     | 'ReturnProcessed';

// Returns (RMA)

export type ReturnReason = 'damaged' | 'wrong_item' | 'defective' | 'customer_change' | 'other';
export type ReturnStatus = 'pending' | 'restocked' | 'scrapped' | 'quarantined';
export type ReturnDisposition = 'restock_original' | 'restock_new' | 'quarantine' | 'scrap';

export interface ReturnRecord {
     id: number;
     returnNo: string;
     orderId: number;
     orderItemId: number;
     itemId: number;
     sku: string;
     qtyReturned: number;
     reason: ReturnReason;
     status: ReturnStatus;
     disposition: ReturnDisposition | null;
     qtyAccepted: number | null;
     batchId: number | null;
     notes: string;
     createdBy: string;
     processedBy: string | null;
     createdAt: Date;
     processedAt: Date | null;
}

export interface CreateReturnRequest {
     orderId: number;
     orderItemId: number;
     quantity: number;
     reason: ReturnReason;
     notes?: string;
}

export interface ProcessReturnRequest {
     disposition: ReturnDisposition;
     quantityAccepted?: number;
     notes?: string;
     // Expiry of the batch created by restock_new or quarantine
     expiryDate?: string;
}

export interface ProcessedReturn extends ReturnRecord {
     // Batches the accepted units went into (none when scrapped)
     batches: Batch[];
}
