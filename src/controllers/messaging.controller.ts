import type { Context } from 'hono';
import type {
  BroadcastMessageDTO,
  MulticastMessageDTO,
  PushMessageDTO,
} from '../dtos/messaging.dto.js';
import type { MessagingGateway } from '../services/line.service.js';

/**
 * Envío manual de mensajes (push / multicast / broadcast)
 * Si LINE falla se responde 500
 */
export class MessagingController {
  constructor(private messaging: MessagingGateway) {}

  async push(c: Context, body: PushMessageDTO) {
    const success = await this.messaging.pushText(body.user_id, body.message);
    if (!success) {
      return c.json({ detail: 'Failed to send message' }, 500);
    }
    return c.json({ status: 'success', message: 'Message sent' });
  }

  async multicast(c: Context, body: MulticastMessageDTO) {
    const success = await this.messaging.multicastText(body.user_ids, body.message);
    if (!success) {
      return c.json({ detail: 'Failed to send messages' }, 500);
    }
    return c.json({ status: 'success', message: 'Message sent to multiple users' });
  }

  async broadcast(c: Context, body: BroadcastMessageDTO) {
    const success = await this.messaging.broadcastText(body.message);
    if (!success) {
      return c.json({ detail: 'Failed to broadcast message' }, 500);
    }
    return c.json({ status: 'success', message: 'Message broadcasted' });
  }
}
