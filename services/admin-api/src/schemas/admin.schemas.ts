const errorBody = {
     type: 'object',
     properties: {
          error: { type: 'string' },
          message: { type: 'string' },
     },
};

const batchIdParams = {
     type: 'object',
     required: ['batchId'],
     properties: {
          batchId: { type: 'integer', minimum: 1, description: 'Batch id', example: 7 },
     },
};

const batch = {
     type: 'object',
     properties: {
          id: { type: 'integer', example: 7 },
          itemId: { type: 'integer', example: 1 },
          sku: { type: 'string', example: 'SKU-MILK-1L' },
          lotNo: { type: 'string', example: 'LOT-MILK-0004' },
          quantity: { type: 'integer', example: 120 },
          availableQty: { type: 'integer', example: 120 },
          expiryDate: { type: 'string', nullable: true, example: '2025-12-01' },
          status: { type: 'string', enum: ['AVAILABLE', 'QUARANTINE', 'EXPIRED'] },
     },
};

export const receiveBatchSchema = {
     tags: ['batches'],
     summary: 'Receive a batch',
     description: 'Books a received lot into stock with a RECEIVE ledger entry. Requires `x-actor-id`.',
     body: {
          type: 'object',
          required: ['sku', 'lotNo', 'quantity'],
          properties: {
               sku: { type: 'string', minLength: 1, example: 'SKU-MILK-1L' },
               lotNo: { type: 'string', minLength: 1, example: 'LOT-MILK-0004' },
               quantity: { type: 'integer', minimum: 1, example: 120 },
               expiryDate: { type: 'string', format: 'date', example: '2025-12-01' },
               status: { type: 'string', enum: ['AVAILABLE', 'QUARANTINE'], default: 'AVAILABLE' },
          },
     },
     response: {
          201: { description: 'Batch received', ...batch },
          400: { description: 'Invalid request', ...errorBody },
          404: { description: 'Unknown SKU', ...errorBody },
          409: { description: 'Lot number already received', ...errorBody },
          500: { description: 'Internal server error', ...errorBody },
     },
};

export const adjustBatchSchema = {
     tags: ['batches'],
     summary: 'Manually adjust available stock',
     description:
          'Adds or removes units from a batch (counts, damage, write-offs). The result must stay within 0 and the received quantity less the units live allocations hold.',
     params: batchIdParams,
     body: {
          type: 'object',
          required: ['quantityDelta', 'reason'],
          properties: {
               quantityDelta: {
                    type: 'integer',
                    description: 'Change in available quantity (positive or negative)',
                    example: -10,
               },
               reason: {
                    type: 'string',
                    minLength: 1,
                    description: 'Reason for adjustment',
                    example: 'Damaged in storage',
               },
          },
     },
     response: {
          200: { description: 'Adjusted batch', ...batch },
          400: { description: 'Adjustment out of range', ...errorBody },
          404: { description: 'Batch not found', ...errorBody },
          500: { description: 'Internal server error', ...errorBody },
     },
};

export const setBatchStatusSchema = {
     tags: ['batches'],
     summary: 'Quarantine, release or expire a batch',
     params: batchIdParams,
     body: {
          type: 'object',
          required: ['status'],
          properties: {
               status: { type: 'string', enum: ['AVAILABLE', 'QUARANTINE', 'EXPIRED'] },
               reason: { type: 'string', example: 'Supplier recall' },
          },
     },
     response: {
          200: { description: 'Batch after the change', ...batch },
          400: { description: 'Invalid request', ...errorBody },
          404: { description: 'Batch not found', ...errorBody },
          500: { description: 'Internal server error', ...errorBody },
     },
};

export const listBatchTransactionsSchema = {
     tags: ['batches'],
     summary: 'Ledger entries recorded against a batch',
     params: batchIdParams,
     response: {
          200: {
               description: 'Batch with its transaction log entries, oldest first',
               type: 'object',
               additionalProperties: true,
          },
          404: { description: 'Batch not found', ...errorBody },
          500: { description: 'Internal server error', ...errorBody },
     },
};

export const expiryScanSchema = {
     tags: ['expiry'],
     summary: 'Run the expiry scan',
     description:
          'Marks AVAILABLE batches past their expiry date as EXPIRED and lists batches expiring within the warning window.',
     body: {
          type: 'object',
          properties: {
               dryRun: { type: 'boolean', default: false },
               warningDays: { type: 'integer', minimum: 0, example: 7 },
          },
     },
     response: {
          200: {
               description: 'Scan result',
               type: 'object',
               properties: {
                    dryRun: { type: 'boolean' },
                    expired: { type: 'array', items: batch },
                    nearExpiry: { type: 'array', items: batch },
               },
          },
          400: { description: 'Invalid request', ...errorBody },
          500: { description: 'Internal server error', ...errorBody },
     },
};

export const allocatePendingSchema = {
     tags: ['orders'],
     summary: 'Allocate every new order',
     description:
          'Runs FEFO allocation over orders in status `new`, oldest first, and reports how each one came out. Requires `x-actor-id`.',
     body: {
          type: 'object',
          nullable: true,
          properties: {
               limit: { type: 'integer', minimum: 1, maximum: 1000, default: 100 },
          },
     },
     response: {
          200: {
               description: 'Run summary',
               type: 'object',
               properties: {
                    ordersProcessed: { type: 'integer' },
                    fullyAllocated: { type: 'integer' },
                    partiallyAllocated: { type: 'integer' },
                    unallocated: { type: 'integer' },
                    results: {
                         type: 'array',
                         items: {
                              type: 'object',
                              properties: {
                                   orderId: { type: 'integer' },
                                   orderNo: { type: 'string' },
                                   outcome: {
                                        type: 'string',
                                        enum: ['fully_allocated', 'partially_allocated', 'unallocated'],
                                   },
                                   totalRequested: { type: 'integer' },
                                   totalFulfilled: { type: 'integer' },
                              },
                         },
                    },
               },
          },
          400: { description: 'Invalid request', ...errorBody },
          500: { description: 'Internal server error', ...errorBody },
     },
};

const returnIdParams = {
     type: 'object',
     required: ['returnId'],
     properties: {
          returnId: { type: 'integer', minimum: 1, description: 'Return id', example: 3 },
     },
};

const returnProperties = {
     id: { type: 'integer', example: 3 },
     returnNo: { type: 'string', example: 'RMA-1A2B3C4D' },
     orderId: { type: 'integer', example: 12 },
     orderItemId: { type: 'integer', example: 31 },
     itemId: { type: 'integer', example: 1 },
     sku: { type: 'string', example: 'SKU-MILK-1L' },
     qtyReturned: { type: 'integer', example: 4 },
     reason: { type: 'string', enum: ['damaged', 'wrong_item', 'defective', 'customer_change', 'other'] },
     status: { type: 'string', enum: ['pending', 'restocked', 'scrapped', 'quarantined'] },
     disposition: { type: 'string', nullable: true, example: 'restock_original' },
     qtyAccepted: { type: 'integer', nullable: true },
     batchId: { type: 'integer', nullable: true },
     notes: { type: 'string' },
     createdBy: { type: 'string' },
     processedBy: { type: 'string', nullable: true },
     createdAt: { type: 'string', format: 'date-time' },
     processedAt: { type: 'string', format: 'date-time', nullable: true },
};

const returnRecord = { type: 'object', properties: returnProperties };

export const createReturnSchema = {
     tags: ['returns'],
     summary: 'Open a return against a shipped order line',
     body: {
          type: 'object',
          required: ['orderId', 'orderItemId', 'quantity', 'reason'],
          properties: {
               orderId: { type: 'integer', minimum: 1, example: 12 },
               orderItemId: { type: 'integer', minimum: 1, example: 31 },
               quantity: { type: 'integer', minimum: 1, example: 4 },
               reason: { type: 'string', enum: ['damaged', 'wrong_item', 'defective', 'customer_change', 'other'] },
               notes: { type: 'string', example: 'Seal broken on arrival' },
          },
     },
     response: {
          201: { description: 'Return opened', ...returnRecord },
          400: { description: 'Invalid request', ...errorBody },
          404: { description: 'Order or order item not found', ...errorBody },
          409: { description: 'Order has not shipped', ...errorBody },
          500: { description: 'Internal server error', ...errorBody },
     },
};

export const listReturnsSchema = {
     tags: ['returns'],
     summary: 'List returns, newest first',
     querystring: {
          type: 'object',
          properties: {
               status: { type: 'string', enum: ['pending', 'restocked', 'scrapped', 'quarantined'] },
               limit: { type: 'integer', minimum: 1, maximum: 500, default: 100 },
          },
     },
     response: {
          200: { description: 'Returns', type: 'array', items: returnRecord },
          400: { description: 'Invalid request', ...errorBody },
          500: { description: 'Internal server error', ...errorBody },
     },
};

export const getReturnSchema = {
     tags: ['returns'],
     summary: 'Get a return',
     params: returnIdParams,
     response: {
          200: { description: 'Return', ...returnRecord },
          404: { description: 'Return not found', ...errorBody },
          500: { description: 'Internal server error', ...errorBody },
     },
};

export const processReturnSchema = {
     tags: ['returns'],
     summary: 'Process a pending return',
     description:
          'Decides where the accepted units go: back into the batches they shipped from, into a new batch, into a quarantined batch, or scrapped. Requires a privileged `x-actor-role`.',
     params: returnIdParams,
     body: {
          type: 'object',
          required: ['disposition'],
          properties: {
               disposition: { type: 'string', enum: ['restock_original', 'restock_new', 'quarantine', 'scrap'] },
               quantityAccepted: { type: 'integer', minimum: 1, example: 4 },
               notes: { type: 'string', example: 'Two cartons resealed' },
               expiryDate: { type: 'string', format: 'date', example: '2025-12-01' },
          },
     },
     response: {
          200: {
               description: 'Processed return with the batches the units went into',
               type: 'object',
               properties: { ...returnProperties, batches: { type: 'array', items: batch } },
          },
          400: { description: 'Invalid request', ...errorBody },
          403: { description: 'Actor is not privileged', ...errorBody },
          404: { description: 'Return not found', ...errorBody },
          409: { description: 'Return already processed or restock does not fit', ...errorBody },
          500: { description: 'Internal server error', ...errorBody },
     },
};
