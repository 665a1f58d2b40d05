import type { ChatMessageRecord, ChatRole } from '../db/models/chat-message.model.js';

/**
 * Un mensaje del historial de chat de un usuario
 */
export class ConversationTurn {
  constructor(
    public id: string,
    public lineUserId: string,
    public role: ChatRole,
    public content: string,
    public createdAt: Date
  ) {}

  static create(data: ChatMessageRecord): ConversationTurn {
    return new ConversationTurn(
      String(data._id),
      data.lineUserId,
      data.role,
      data.content,
      data.createdAt
    );
  }
}
