function errorResponse(description: string, code: string, message: string) {
     return {
          description,
          type: 'object',
          properties: {
               error: { type: 'string', example: code },
               message: { type: 'string', example: message },
          },
     };
}

const internalError = errorResponse('Internal server error', 'INTERNAL_ERROR', 'An unexpected error occurred');
const orderNotFound = errorResponse('Order not found', 'ORDER_NOT_FOUND', 'Order 42 not found');
const invalidTransition = errorResponse(
     'Transition not allowed from the current status, or the update lost a race',
     'INVALID_TRANSITION',
     "Cannot pick order 42 in status 'new': expected status 'allocated'"
);
const missingActor = errorResponse('Missing actor or invalid request', 'ACTOR_REQUIRED', 'x-actor-id header is required');

const orderIdParams = {
     type: 'object',
     required: ['orderId'],
     properties: {
          orderId: { type: 'integer', minimum: 1, description: 'Order id', example: 42 },
     },
};

const actorNote = 'Requires the `x-actor-id` header; `x-actor-role` decides privileged actions.';

const allocationResult = {
     description: 'Allocation outcome per order line',
     type: 'object',
     additionalProperties: true,
     properties: {
          orderId: { type: 'integer', example: 42 },
          orderNo: { type: 'string', example: 'ORD-20250301-0001' },
          status: { type: 'string', example: 'allocated' },
          totalRequested: { type: 'integer', example: 150 },
          totalFulfilled: { type: 'integer', example: 110 },
          fullyAllocated: { type: 'boolean', example: false },
          nothingAvailable: { type: 'boolean', example: false },
          perItem: {
               type: 'array',
               items: {
                    type: 'object',
                    properties: {
                         orderItemId: { type: 'integer' },
                         itemId: { type: 'integer' },
                         sku: { type: 'string' },
                         requested: { type: 'integer' },
                         fulfilled: { type: 'integer' },
                         unfulfilled: { type: 'integer' },
                         draws: {
                              type: 'array',
                              items: {
                                   type: 'object',
                                   properties: {
                                        batchId: { type: 'integer' },
                                        lotNo: { type: 'string' },
                                        expiryDate: { type: 'string', nullable: true, example: '2025-11-20' },
                                        qty: { type: 'integer' },
                                   },
                              },
                         },
                    },
               },
          },
     },
};

const deallocationResult = {
     description: 'Released allocations',
     type: 'object',
     properties: {
          orderId: { type: 'integer', example: 42 },
          status: { type: 'string', example: 'new' },
          releasedQty: { type: 'integer', example: 100 },
          allocationCount: { type: 'integer', example: 2 },
     },
};

const adjustmentReport = {
     description: 'Recorded quantities and discrepancies per line',
     type: 'object',
     properties: {
          orderId: { type: 'integer', example: 42 },
          status: { type: 'string', example: 'picked' },
          discrepancies: { type: 'integer', example: 1 },
          lines: {
               type: 'array',
               items: {
                    type: 'object',
                    properties: {
                         orderItemId: { type: 'integer' },
                         sku: { type: 'string' },
                         allocated: { type: 'integer' },
                         previous: { type: 'integer', description: 'Quantity the prior stage recorded' },
                         recorded: { type: 'integer' },
                         delta: { type: 'integer', description: 'Recorded minus allocated' },
                    },
               },
          },
     },
};

const shipment = {
     description: 'Shipment record',
     type: 'object',
     additionalProperties: true,
     properties: {
          id: { type: 'integer' },
          orderId: { type: 'integer' },
          shipmentNo: { type: 'string', example: 'SHIP-ORD-20250301-0001-20250302143000' },
          trackingNo: { type: 'string', format: 'uuid' },
          carrier: { type: 'string', example: 'UPS' },
          shippingAddress: { type: 'string' },
          notes: { type: 'string', nullable: true },
          status: { type: 'string', example: 'SHIPPED' },
     },
};

const orderDetail = {
     description: 'Order with lines, live allocations and shipment',
     type: 'object',
     additionalProperties: true,
};

export const createOrderSchema = {
     tags: ['orders'],
     summary: 'Create an order',
     description: `Creates an order in status new. Lines keep the request order. ${actorNote}`,
     body: {
          type: 'object',
          required: ['customerName', 'lines'],
          properties: {
               orderNo: {
                    type: 'string',
                    minLength: 1,
                    description: 'Order number; generated as ORD-YYYYMMDD-NNNN when omitted',
               },
               customerName: { type: 'string', minLength: 1, example: 'Corner Grocery' },
               lines: {
                    type: 'array',
                    minItems: 1,
                    items: {
                         type: 'object',
                         required: ['sku', 'quantity'],
                         properties: {
                              sku: { type: 'string', minLength: 1, example: 'SKU-MILK-1L' },
                              quantity: { type: 'integer', minimum: 1, example: 24 },
                         },
                    },
               },
          },
     },
     response: {
          201: orderDetail,
          400: missingActor,
          404: errorResponse('Unknown SKU', 'ITEM_NOT_FOUND', 'Item SKU-MILK-1L not found'),
          409: errorResponse('Order number taken', 'DUPLICATE_ORDER_NO', 'Order number ORD-1 already exists'),
          500: internalError,
     },
};

export const getOrderSchema = {
     tags: ['orders'],
     summary: 'Get an order',
     params: orderIdParams,
     response: {
          200: orderDetail,
          404: orderNotFound,
          500: internalError,
     },
};

export const listOrderTransactionsSchema = {
     tags: ['orders'],
     summary: 'Ledger entries recorded against an order',
     params: orderIdParams,
     response: {
          200: {
               description: 'Transaction log entries, oldest first',
               type: 'object',
               additionalProperties: true,
          },
          500: internalError,
     },
};

function transitionSchema(summary: string, description: string, success: object, body?: object) {
     return {
          tags: ['orders'],
          summary,
          description: `${description} ${actorNote}`,
          params: orderIdParams,
          ...(body ? { body } : {}),
          response: {
               200: success,
               400: missingActor,
               404: orderNotFound,
               409: invalidTransition,
               500: internalError,
          },
     };
}

export const allocateOrderSchema = transitionSchema(
     'Allocate stock to an order (FEFO)',
     'Reserves stock from the earliest-expiring eligible batches. Partial fulfilment is reported, not an error.',
     allocationResult
);

export const deallocateOrderSchema = transitionSchema(
     'Release all allocations of an order',
     'Returns allocated units to their batches; allocated, picked or packed orders go back to new.',
     deallocationResult
);

export const cancelOrderSchema = transitionSchema(
     'Cancel an order',
     'Releases any allocations and closes the order.',
     deallocationResult
);

export const pickOrderSchema = transitionSchema(
     'Record picked quantities',
     'Lines left out are taken as picked in full.',
     adjustmentReport,
     {
          type: 'object',
          properties: {
               lines: {
                    type: 'array',
                    items: {
                         type: 'object',
                         required: ['orderItemId', 'quantity'],
                         properties: {
                              orderItemId: { type: 'integer', minimum: 1 },
                              quantity: { type: 'integer', minimum: 0 },
                         },
                    },
               },
          },
     }
);

export const packOrderSchema = transitionSchema(
     'Record packed quantities and notes',
     'Lines left out keep their picked quantity.',
     adjustmentReport,
     {
          type: 'object',
          properties: {
               lines: {
                    type: 'array',
                    items: {
                         type: 'object',
                         required: ['orderItemId'],
                         properties: {
                              orderItemId: { type: 'integer', minimum: 1 },
                              quantity: { type: 'integer', minimum: 0 },
                              notes: { type: 'string' },
                         },
                    },
               },
          },
     }
);

export const shipOrderSchema = transitionSchema(
     'Ship an order',
     'Consumes the live allocations. Shipping before packing needs a privileged role.',
     shipment,
     {
          type: 'object',
          required: ['carrier', 'address'],
          properties: {
               carrier: { type: 'string', minLength: 1, example: 'UPS' },
               address: { type: 'string', minLength: 1, example: '12 Market St, Springfield' },
               notes: { type: 'string' },
          },
     }
);

export const deliverOrderSchema = transitionSchema(
     'Mark an order delivered',
     'Sets the shipment to DELIVERED.',
     shipment
);

export const getInventorySchema = {
     tags: ['inventory'],
     summary: 'Get batches of a SKU in FEFO order',
     description: 'Returns every batch of the SKU and the total that can be allocated right now',
     params: {
          type: 'object',
          required: ['sku'],
          properties: {
               sku: { type: 'string', description: 'SKU to query', example: 'SKU-MILK-1L' },
          },
     },
     response: {
          200: {
               description: 'Inventory details',
               type: 'object',
               properties: {
                    sku: { type: 'string', example: 'SKU-MILK-1L' },
                    totalAvailable: { type: 'integer', example: 320 },
                    batches: {
                         type: 'array',
                         items: {
                              type: 'object',
                              properties: {
                                   id: { type: 'integer', example: 7 },
                                   lotNo: { type: 'string', example: 'LOT-MILK-0001' },
                                   quantity: { type: 'integer', example: 120 },
                                   availableQty: { type: 'integer', example: 120 },
                                   expiryDate: { type: 'string', nullable: true, example: '2025-11-20' },
                                   status: { type: 'string', example: 'AVAILABLE' },
                                   eligible: { type: 'boolean', example: true },
                              },
                         },
                    },
               },
          },
          500: internalError,
     },
};
