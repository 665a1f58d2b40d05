import { zValidator } from '@hono/zod-validator';
import { Hono } from 'hono';
import { logger as requestLogger } from 'hono/logger';
import type { HealthController } from './controllers/health.controller.js';
import type { MessagingController } from './controllers/messaging.controller.js';
import type { UsersController } from './controllers/users.controller.js';
import type { WebhookController } from './controllers/webhook.controller.js';
import {
  broadcastMessageSchema,
  historyQuerySchema,
  multicastMessageSchema,
  pushMessageSchema,
} from './dtos/messaging.dto.js';
import { AppError } from './errors.js';
import { logger } from './logger.js';

const log = logger.child({ service: 'http' });

export interface ControllerProvider {
  getHealthController(): HealthController;
  getWebhookController(): WebhookController;
  getUsersController(): UsersController;
  getMessagingController(): MessagingController;
}

export function createApp(container: ControllerProvider): Hono {
  const app = new Hono();

  // Middleware de logging
  app.use('*', requestLogger((message) => log.info(message)));

  // Health check
  app.get('/', (c) => container.getHealthController().getRoot(c));
  app.get('/health', (c) => container.getHealthController().getHealth(c));

  // Webhook de LINE
  app.post('/webhook', (c) => container.getWebhookController().handleWebhook(c));

  // ============================================
  // API ADMINISTRATIVA
  // ============================================
  app.get('/api/users', (c) => container.getUsersController().listUsers(c));

  app.get('/api/users/:userId', (c) =>
    container.getUsersController().getUser(c, c.req.param('userId'))
  );

  app.get('/api/users/:userId/history', zValidator('query', historyQuerySchema), (c) =>
    container.getUsersController().getHistory(c, c.req.param('userId'), c.req.valid('query'))
  );

  app.post('/api/push', zValidator('json', pushMessageSchema), (c) =>
    container.getMessagingController().push(c, c.req.valid('json'))
  );

  app.post('/api/multicast', zValidator('json', multicastMessageSchema), (c) =>
    container.getMessagingController().multicast(c, c.req.valid('json'))
  );

  app.post('/api/broadcast', zValidator('json', broadcastMessageSchema), (c) =>
    container.getMessagingController().broadcast(c, c.req.valid('json'))
  );

  app.onError((err, c) => {
    if (err instanceof AppError) {
      log.warn({ err, path: c.req.path }, 'Error de aplicación');
      return c.json({ detail: err.message, code: err.code }, err.statusCode);
    }
    log.error({ err, path: c.req.path }, 'Error no controlado');
    return c.json({ detail: 'Internal server error' }, 500);
  });

  return app;
}
