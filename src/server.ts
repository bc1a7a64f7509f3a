/**
 * HTTP server: liveness endpoint for external uptime monitors
 */

import { Hono } from 'hono';
import { serve, ServerType } from '@hono/node-server';
import { healthRoute } from './routes/health';
import { Logger, describeError, noopLogger } from './utils/logger';

export function createApp(logger: Logger = noopLogger): Hono {
  const app = new Hono();
  app.route('/', healthRoute);

  app.notFound((c) => c.json({ error: 'Not Found' }, 404));
  app.onError((error, c) => {
    logger.error(`Unhandled request error: ${describeError(error)}`);
    return c.json({ error: 'Internal Server Error' }, 500);
  });

  return app;
}

export interface StartServerOptions {
  port: number;
  logger?: Logger;
  /** Called once, when the server starts accepting connections */
  onListening?: (port: number) => void;
}

export function startServer(app: Hono, options: StartServerOptions): ServerType {
  const logger = options.logger ?? noopLogger;
  return serve({ fetch: app.fetch, port: options.port }, (info) => {
    logger.info(`listening on :${info.port}`);
    options.onListening?.(info.port);
  });
}
