import express from 'express';
import { createMessagesRouter } from './routes/messages.js';
import { createHealthRouter, type HealthDeps } from './routes/health.js';
import { errorHandler, notFoundHandler } from './middleware/error-handler.js';
import { requestLogger } from './middleware/request-logger.js';
import type { Dispatcher } from './services/dispatch/dispatcher.js';

/** Collaborators the HTTP surface is built around. */
export interface AppDeps extends HealthDeps {
  dispatcher: Pick<Dispatcher, 'dispatch'>;
}

export function createApp(deps: AppDeps) {
  const app = express();

  app.disable('x-powered-by');
  app.use(requestLogger);

  app.use('/messages', createMessagesRouter(deps.dispatcher));
  app.use('/health', createHealthRouter(deps));

  app.use(notFoundHandler);
  // Error handler (must be after routes)
  app.use(errorHandler);

  return app;
}
