import { FastifyInstance } from 'fastify';
import { withConnection } from '@stockroom/shared/src/db/client';
import { StockLedger } from '@stockroom/shared/src/services/stock-ledger';
import { sendError } from '@stockroom/shared/src/utils/http';
import { getInventorySchema } from '../schemas/orders.schemas';

const stockLedger = new StockLedger();

export async function registerInventoryRoutes(app: FastifyInstance) {
    // Batches of a SKU in FEFO order
    app.get<{ Params: { sku: string } }>(
        '/:sku',
        { schema: getInventorySchema },
        async (request, reply) => {
            try {
                const summary = await withConnection((client) =>
                    stockLedger.getAvailableInventory(client, request.params.sku)
                );
                return reply.send(summary);
            } catch (error) {
                return sendError(request, reply, error, 'Failed to get inventory');
            }
        }
    );
}
