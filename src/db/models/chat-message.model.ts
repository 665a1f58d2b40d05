import { Schema, type Connection, type Model, type Types } from 'mongoose';

export type ChatRole = 'user' | 'assistant';

export interface ChatMessageAttributes {
  lineUserId: string;
  role: ChatRole;
  content: string;
  createdAt: Date;
}

export type ChatMessageRecord = ChatMessageAttributes & { _id: Types.ObjectId };

export type ChatMessageModel = Model<ChatMessageAttributes>;

const chatMessageSchema = new Schema<ChatMessageAttributes>(
  {
    lineUserId: { type: String, required: true, index: true },
    role: { type: String, enum: ['user', 'assistant'], required: true },
    content: { type: String, required: true },
  },
  {
    timestamps: { createdAt: true, updatedAt: false },
    collection: 'chat_history',
  },
);

// Historial reciente por usuario: find({ lineUserId }).sort({ createdAt: -1 })
chatMessageSchema.index({ lineUserId: 1, createdAt: -1 });

export function createChatMessageModel(connection: Connection): ChatMessageModel {
  return (
    connection.models.ChatMessage ??
    connection.model<ChatMessageAttributes>('ChatMessage', chatMessageSchema)
  );
}
