// src/api/orderRoutes.ts
import type { FastifyInstance } from 'fastify';
import type { OrderQueue } from '../core/queue/orderQueue.js';
import type { OrderExecutor } from '../workers/orderExecutor.js';
import {
  bulkOrdersSchema,
  executeSchema,
  listOrdersQuerySchema,
  orderIdParamsSchema,
  orderInputSchema,
  toOrderResponse,
} from './schemas.js';

export type OrderRoutesOptions = {
  queue: OrderQueue;
  executor: OrderExecutor;
};

export default async function orderRoutes(app: FastifyInstance, opts: OrderRoutesOptions) {
  const { queue, executor } = opts;

  /** Queue one order */
  app.post('/orders', async (req, reply) => {
    const draft = orderInputSchema.parse(req.body);
    const order = queue.create(draft);
    return reply.code(201).send({ success: true, order: toOrderResponse(order) });
  });

  /** Queue several orders; items are accepted or rejected one by one */
  app.post('/orders/bulk', async (req, reply) => {
    const { orders } = bulkOrdersSchema.parse(req.body);
    const results = queue.bulkCreate(orders);
    const created: ReturnType<typeof toOrderResponse>[] = [];
    const rejected: Array<{ index: number; error: string; message: string }> = [];
    for (const r of results) {
      if (r.ok) created.push(toOrderResponse(r.order));
      else rejected.push({ index: r.index, error: r.error, message: r.message });
    }
    return reply.code(201).send({ success: rejected.length === 0, orders: created, rejected });
  });

  app.get('/orders', async (req) => {
    const { status, limit } = listOrdersQuerySchema.parse(req.query);
    return { orders: queue.list({ status, limit }).map(toOrderResponse) };
  });

  app.get('/orders/queued', async () => {
    return { orders: queue.list({ status: 'QUEUED' }).map(toOrderResponse) };
  });

  app.get('/orders/:id', async (req) => {
    const { id } = orderIdParamsSchema.parse(req.params);
    return { order: toOrderResponse(queue.require(id)) };
  });

  app.put('/orders/:id', async (req) => {
    const { id } = orderIdParamsSchema.parse(req.params);
    const draft = orderInputSchema.parse(req.body);
    return { success: true, order: toOrderResponse(queue.update(id, draft)) };
  });

  app.delete('/orders/:id', async (req) => {
    const { id } = orderIdParamsSchema.parse(req.params);
    const order = queue.delete(id);
    return { success: true, order_id: order.id, status: order.status.toLowerCase() };
  });

  /** Cancel everything still queued */
  app.delete('/orders', async () => {
    const count = queue.clearQueued();
    return { success: true, deleted_count: count };
  });

  /** Size, sign and submit queued orders */
  app.post('/orders/execute', async (req) => {
    const { ids } = executeSchema.parse(req.body);
    const result = await executor.executeBatch(ids);
    return {
      executed: result.executed.map(toOrderResponse),
      failed: result.failed,
      not_found: result.notFound,
      debug: result.debug.map((d) => ({ local_id: d.localId, symbol: d.symbol, result: d.result })),
    };
  });
}
