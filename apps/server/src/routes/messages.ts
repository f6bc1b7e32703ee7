/**
 * HTTP ingress for lifecycle directives.
 *
 * `POST /` takes a single directive body and answers only after the dispatcher
 * settles. The body is decoded as JSON whatever its Content-Type says. Every other method on the route is rejected with 405.
 *
 * @module routes/messages
 */
import express, { Router } from 'express';
import { DispatchError, type Dispatcher } from '../services/dispatch/dispatcher.js';
import { logger } from '../lib/logger.js';

/**
 * Create the directive ingress router.
 *
 * @param dispatcher - Shared dispatcher, the same instance the queue consumer uses
 */
export function createMessagesRouter(dispatcher: Pick<Dispatcher, 'dispatch'>): Router {
  const router = Router();

  router.post('/', express.json({ type: () => true }), async (req, res) => {
    try {
      await dispatcher.dispatch(req.body);
      return res.json({ status: 'success', message: 'Message processed successfully' });
    } catch (err) {
      if (err instanceof DispatchError) {
        const status = err.code === 'INVALID_DIRECTIVE' ? 400 : 500;
        if (status === 500) {
          logger.error(`[HTTP] Error processing message: ${err.message}`);
        } else {
          logger.warn(`[HTTP] Rejected message: ${err.message}`);
        }
        return res.status(status).json({ error: err.message, code: err.code });
      }
      const message = err instanceof Error ? err.message : 'Dispatch failed';
      logger.error('[HTTP] Unexpected dispatch failure:', err);
      return res.status(500).json({ error: message, code: 'INTERNAL_ERROR' });
    }
  });

  router.all('/', (_req, res) => {
    res.set('Allow', 'POST');
    res.status(405).json({ error: 'Method not allowed', code: 'METHOD_NOT_ALLOWED' });
  });

  return router;
}
