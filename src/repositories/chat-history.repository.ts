import type { ChatMessageModel, ChatMessageRecord, ChatRole } from '../db/models/chat-message.model.js';
import { ConversationTurn } from '../domain/conversation-turn.js';

export interface ChatHistoryRepository {
    append(lineUserId: string, role: ChatRole, content: string): Promise<ConversationTurn>;
    /** Últimos `limit` mensajes, ordenados del más viejo al más nuevo */
    recent(lineUserId: string, limit: number): Promise<ConversationTurn[]>;
    /** Borra todo el historial del usuario y devuelve cuántos mensajes eliminó */
    clear(lineUserId: string): Promise<number>;
}

/**
 * Historial de chat en la colección chat_history
 */
export class MongoChatHistoryRepository implements ChatHistoryRepository {

    constructor(private model: ChatMessageModel) {}

    async append(lineUserId: string, role: ChatRole, content: string): Promise<ConversationTurn> {
        const doc = await this.model.create({ lineUserId, role, content });
        return new ConversationTurn(String(doc._id), doc.lineUserId, doc.role, doc.content, doc.createdAt);
    }

    async recent(lineUserId: string, limit: number): Promise<ConversationTurn[]> {
        // _id desempata mensajes guardados en el mismo milisegundo
        const data: ChatMessageRecord[] = await this.model
            .find({ lineUserId })
            .sort({ createdAt: -1, _id: -1 })
            .limit(limit)
            .lean<ChatMessageRecord[]>()
            .exec();

        return data.reverse().map((record) => ConversationTurn.create(record));
    }

    async clear(lineUserId: string): Promise<number> {
        const result = await this.model.deleteMany({ lineUserId }).exec();
        return result.deletedCount;
    }
}
