import type { Context } from 'hono';

export class HealthController {
  getRoot(c: Context) {
    return c.json({ name: 'line-chat-relay', status: 'running' });
  }

  getHealth(c: Context) {
    return c.json({ status: 'healthy' });
  }
}
