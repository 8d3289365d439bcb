import { FastifyInstance } from 'fastify';
import { withConnection, withRetryingTransaction } from '@stockroom/shared/src/db/client';
import { FulfillmentService } from '@stockroom/shared/src/services/fulfillment-service';
import { OrderService } from '@stockroom/shared/src/services/order-service';
import { TransactionLogService } from '@stockroom/shared/src/services/transaction-log';
import { actorFromRequest, sendError } from '@stockroom/shared/src/utils/http';
import type { CreateOrderRequest, ShipOrderRequest } from '@stockroom/shared/src/types/fulfillment.types';
import {
    allocateOrderSchema,
    cancelOrderSchema,
    createOrderSchema,
    deallocateOrderSchema,
    deliverOrderSchema,
    getOrderSchema,
    listOrderTransactionsSchema,
    packOrderSchema,
    pickOrderSchema,
    shipOrderSchema,
} from '../schemas/orders.schemas';

const fulfillmentService = new FulfillmentService();
const orderService = new OrderService();
const transactionLog = new TransactionLogService();

interface OrderParams {
    orderId: number;
}

interface QuantityLine {
    orderItemId: number;
    quantity?: number;
    notes?: string;
}

function quantityMap(lines: QuantityLine[] = []): Map<number, number> {
    const map = new Map<number, number>();
    for (const line of lines) {
        if (line.quantity !== undefined) {
            map.set(line.orderItemId, line.quantity);
        }
    }
    return map;
}

function notesMap(lines: QuantityLine[] = []): Map<number, string> {
    const map = new Map<number, string>();
    for (const line of lines) {
        if (line.notes !== undefined) {
            map.set(line.orderItemId, line.notes);
        }
    }
    return map;
}

export async function registerOrderRoutes(app: FastifyInstance) {
    // Create an order
    app.post<{ Body: CreateOrderRequest }>(
        '/',
        { schema: createOrderSchema },
        async (request, reply) => {
            try {
                actorFromRequest(request);
                const order = await withRetryingTransaction((client) =>
                    orderService.createOrder(client, request.body)
                );
                return reply.code(201).send(order);
            } catch (error) {
                return sendError(request, reply, error, 'Failed to create order');
            }
        }
    );

    // Get an order with its lines, allocations and shipment
    app.get<{ Params: OrderParams }>(
        '/:orderId',
        { schema: getOrderSchema },
        async (request, reply) => {
            try {
                const order = await withConnection((client) =>
                    orderService.getOrder(client, request.params.orderId)
                );
                return reply.send(order);
            } catch (error) {
                return sendError(request, reply, error, 'Failed to get order');
            }
        }
    );

    // Ledger entries for an order
    app.get<{ Params: OrderParams }>(
        '/:orderId/transactions',
        { schema: listOrderTransactionsSchema },
        async (request, reply) => {
            try {
                const entries = await withConnection((client) =>
                    transactionLog.listForOrder(client, request.params.orderId)
                );
                return reply.send({ orderId: request.params.orderId, entries });
            } catch (error) {
                return sendError(request, reply, error, 'Failed to list order transactions');
            }
        }
    );

    app.post<{ Params: OrderParams }>(
        '/:orderId/allocate',
        { schema: allocateOrderSchema },
        async (request, reply) => {
            try {
                const actor = actorFromRequest(request);
                const result = await withRetryingTransaction((client) =>
                    fulfillmentService.allocate(client, request.params.orderId, actor)
                );
                request.log.info(
                    {
                        orderId: result.orderId,
                        totalFulfilled: result.totalFulfilled,
                        totalRequested: result.totalRequested,
                    },
                    'Order allocated'
                );
                return reply.send(result);
            } catch (error) {
                return sendError(request, reply, error, 'Failed to allocate order');
            }
        }
    );

    app.post<{ Params: OrderParams }>(
        '/:orderId/deallocate',
        { schema: deallocateOrderSchema },
        async (request, reply) => {
            try {
                const actor = actorFromRequest(request);
                const result = await withRetryingTransaction((client) =>
                    fulfillmentService.deallocate(client, request.params.orderId, actor)
                );
                return reply.send(result);
            } catch (error) {
                return sendError(request, reply, error, 'Failed to deallocate order');
            }
        }
    );

    app.post<{ Params: OrderParams; Body: { lines?: QuantityLine[] } }>(
        '/:orderId/pick',
        { schema: pickOrderSchema },
        async (request, reply) => {
            try {
                const actor = actorFromRequest(request);
                const picked = quantityMap(request.body?.lines);
                const report = await withRetryingTransaction((client) =>
                    fulfillmentService.pick(client, request.params.orderId, actor, picked)
                );
                return reply.send(report);
            } catch (error) {
                return sendError(request, reply, error, 'Failed to record picking');
            }
        }
    );

    app.post<{ Params: OrderParams; Body: { lines?: QuantityLine[] } }>(
        '/:orderId/pack',
        { schema: packOrderSchema },
        async (request, reply) => {
            try {
                const actor = actorFromRequest(request);
                const lines = request.body?.lines;
                const report = await withRetryingTransaction((client) =>
                    fulfillmentService.pack(
                        client,
                        request.params.orderId,
                        actor,
                        quantityMap(lines),
                        notesMap(lines)
                    )
                );
                return reply.send(report);
            } catch (error) {
                return sendError(request, reply, error, 'Failed to record packing');
            }
        }
    );

    app.post<{ Params: OrderParams; Body: ShipOrderRequest }>(
        '/:orderId/ship',
        { schema: shipOrderSchema },
        async (request, reply) => {
            try {
                const actor = actorFromRequest(request);
                const shipment = await withRetryingTransaction((client) =>
                    fulfillmentService.ship(client, request.params.orderId, actor, request.body)
                );
                return reply.send(shipment);
            } catch (error) {
                return sendError(request, reply, error, 'Failed to ship order');
            }
        }
    );

    app.post<{ Params: OrderParams }>(
        '/:orderId/deliver',
        { schema: deliverOrderSchema },
        async (request, reply) => {
            try {
                const actor = actorFromRequest(request);
                const shipment = await withRetryingTransaction((client) =>
                    fulfillmentService.deliver(client, request.params.orderId, actor)
                );
                return reply.send(shipment);
            } catch (error) {
                return sendError(request, reply, error, 'Failed to deliver order');
            }
        }
    );

    app.post<{ Params: OrderParams }>(
        '/:orderId/cancel',
        { schema: cancelOrderSchema },
        async (request, reply) => {
            try {
                const actor = actorFromRequest(request);
                const result = await withRetryingTransaction((client) =>
                    fulfillmentService.cancel(client, request.params.orderId, actor)
                );
                return reply.send(result);
            } catch (error) {
                return sendError(request, reply, error, 'Failed to cancel order');
            }
        }
    );
}
