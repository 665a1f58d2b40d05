import type { Context } from 'hono';
import type { HistoryQueryDTO } from '../dtos/messaging.dto.js';
import type { ChatHistoryRepository } from '../repositories/chat-history.repository.js';
import type { UserService } from '../services/user.service.js';

/**
 * Consultas administrativas de usuarios e historial
 */
export class UsersController {
  constructor(
    private userService: UserService,
    private chatHistory: ChatHistoryRepository
  ) {}

  async listUsers(c: Context) {
    const users = await this.userService.listUsers();
    return c.json({ users });
  }

  /** 404 vía NotFoundError → app.onError */
  async getUser(c: Context, lineUserId: string) {
    const user = await this.userService.getUser(lineUserId);
    return c.json(user);
  }

  async getHistory(c: Context, lineUserId: string, query: HistoryQueryDTO) {
    const history = await this.chatHistory.recent(lineUserId, query.limit);
    return c.json({ history });
  }
}
