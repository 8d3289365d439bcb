import { FastifyInstance } from 'fastify';
import { withConnection, withRetryingTransaction } from '@stockroom/shared/src/db/client';
import { ExpiryScanService } from '@stockroom/shared/src/services/expiry-scan-service';
import { FulfillmentService } from '@stockroom/shared/src/services/fulfillment-service';
import { ReturnService } from '@stockroom/shared/src/services/return-service';
import { StockLedger } from '@stockroom/shared/src/services/stock-ledger';
import { TransactionLogService } from '@stockroom/shared/src/services/transaction-log';
import { actorFromRequest, sendError } from '@stockroom/shared/src/utils/http';
import type {
     BatchStatus,
     CreateReturnRequest,
     ProcessReturnRequest,
     ReceiveBatchRequest,
     ReturnStatus,
} from '@stockroom/shared/src/types/fulfillment.types';
import {
     adjustBatchSchema,
     allocatePendingSchema,
     createReturnSchema,
     expiryScanSchema,
     getReturnSchema,
     listBatchTransactionsSchema,
     listReturnsSchema,
     processReturnSchema,
     receiveBatchSchema,
     setBatchStatusSchema,
} from '../schemas/admin.schemas';

const stockLedger = new StockLedger();
const transactionLog = new TransactionLogService();
const expiryScanService = new ExpiryScanService(stockLedger);
const fulfillmentService = new FulfillmentService();
const returnService = new ReturnService(undefined, stockLedger, transactionLog);

interface BatchParams {
     batchId: number;
}

interface ReturnParams {
     returnId: number;
}

export async function registerAdminRoutes(app: FastifyInstance) {
     // Receive a batch into stock
     app.post<{ Body: ReceiveBatchRequest }>(
          '/batches',
          { schema: receiveBatchSchema },
          async (request, reply) => {
               try {
                    const actor = actorFromRequest(request);
                    const batch = await withRetryingTransaction((client) =>
                         stockLedger.receiveBatch(client, request.body, actor)
                    );
                    request.log.info({ batchId: batch.id, lotNo: batch.lotNo }, 'Batch received');
                    return reply.code(201).send(batch);
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to receive batch');
               }
          }
     );

     // Manual adjustment
     app.post<{ Params: BatchParams; Body: { quantityDelta: number; reason: string } }>(
          '/batches/:batchId/adjust',
          { schema: adjustBatchSchema },
          async (request, reply) => {
               try {
                    const actor = actorFromRequest(request);
                    const batch = await withRetryingTransaction((client) =>
                         stockLedger.adjustBatch(
                              client,
                              {
                                   batchId: request.params.batchId,
                                   quantityDelta: request.body.quantityDelta,
                                   reason: request.body.reason,
                              },
                              actor
                         )
                    );
                    request.log.info(
                         { batchId: batch.id, quantityDelta: request.body.quantityDelta },
                         'Manual inventory adjustment applied'
                    );
                    return reply.send(batch);
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to adjust batch');
               }
          }
     );

     // Quarantine, release or expire
     app.post<{ Params: BatchParams; Body: { status: BatchStatus; reason?: string } }>(
          '/batches/:batchId/status',
          { schema: setBatchStatusSchema },
          async (request, reply) => {
               try {
                    const actor = actorFromRequest(request);
                    const batch = await withRetryingTransaction((client) =>
                         stockLedger.setBatchStatus(
                              client,
                              request.params.batchId,
                              request.body.status,
                              actor,
                              request.body.reason
                         )
                    );
                    return reply.send(batch);
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to change batch status');
               }
          }
     );

     app.get<{ Params: BatchParams }>(
          '/batches/:batchId/transactions',
          { schema: listBatchTransactionsSchema },
          async (request, reply) => {
               try {
                    const result = await withConnection(async (client) => {
                         const batch = await stockLedger.findBatch(client, request.params.batchId);
                         const entries = await transactionLog.listForBatch(client, batch.id);
                         return { batch, entries };
                    });
                    return reply.send(result);
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to list batch transactions');
               }
          }
     );

     app.post<{ Body: { dryRun?: boolean; warningDays?: number } }>(
          '/expiry-scan',
          { schema: expiryScanSchema },
          async (request, reply) => {
               try {
                    const actor = actorFromRequest(request);
                    const result = await withRetryingTransaction((client) =>
                         expiryScanService.scan(
                              client,
                              {
                                   dryRun: request.body?.dryRun,
                                   warningDays: request.body?.warningDays,
                              },
                              actor
                         )
                    );
                    return reply.send(result);
               } catch (error) {
                    return sendError(request, reply, error, 'Expiry scan failed');
               }
          }
     );

     // Order queue run over every `new` order
     app.post<{ Body: { limit?: number } | undefined }>(
          '/orders/allocate-pending',
          { schema: allocatePendingSchema },
          async (request, reply) => {
               try {
                    const actor = actorFromRequest(request);
                    const run = await withRetryingTransaction((client) =>
                         fulfillmentService.allocatePending(client, actor, request.body?.limit)
                    );
                    request.log.info(
                         { ordersProcessed: run.ordersProcessed, fullyAllocated: run.fullyAllocated },
                         'Pending orders allocated'
                    );
                    return reply.send(run);
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to allocate pending orders');
               }
          }
     );

     app.post<{ Body: CreateReturnRequest }>(
          '/returns',
          { schema: createReturnSchema },
          async (request, reply) => {
               try {
                    const actor = actorFromRequest(request);
                    const created = await withRetryingTransaction((client) =>
                         returnService.createReturn(client, request.body, actor)
                    );
                    return reply.code(201).send(created);
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to open return');
               }
          }
     );

     app.get<{ Querystring: { status?: ReturnStatus; limit?: number } }>(
          '/returns',
          { schema: listReturnsSchema },
          async (request, reply) => {
               try {
                    const returns = await withConnection((client) =>
                         returnService.listReturns(client, request.query.status, request.query.limit)
                    );
                    return reply.send(returns);
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to list returns');
               }
          }
     );

     app.get<{ Params: ReturnParams }>(
          '/returns/:returnId',
          { schema: getReturnSchema },
          async (request, reply) => {
               try {
                    const found = await withConnection((client) =>
                         returnService.getReturn(client, request.params.returnId)
                    );
                    return reply.send(found);
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to get return');
               }
          }
     );

     app.post<{ Params: ReturnParams; Body: ProcessReturnRequest }>(
          '/returns/:returnId/process',
          { schema: processReturnSchema },
          async (request, reply) => {
               try {
                    const actor = actorFromRequest(request);
                    const processed = await withRetryingTransaction((client) =>
                         returnService.processReturn(client, request.params.returnId, request.body, actor)
                    );
                    request.log.info(
                         { returnNo: processed.returnNo, disposition: processed.disposition },
                         'Return processed'
                    );
                    return reply.send(processed);
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to process return');
               }
          }
     );
}
