import { ChatMessage } from '../models/ChatMessage';

export type ChatRole = 'user' | 'assistant';

export interface ChatEntry {
  role: ChatRole;
  content: string;
  timestamp: Date;
}

export interface ChatHistoryStore {
  append(userId: string, role: ChatRole, content: string): Promise<void>;
  /** Last `limit` messages, oldest first. */
  recent(userId: string, limit: number): Promise<ChatEntry[]>;
}

export class MongoChatHistoryStore implements ChatHistoryStore {
  async append(userId: string, role: ChatRole, content: string): Promise<void> {
    await ChatMessage.create({ userId, role, content, timestamp: new Date() });
  }

  async recent(userId: string, limit: number): Promise<ChatEntry[]> {
    const docs = await ChatMessage.find({ userId }).sort({ timestamp: -1 }).limit(limit).lean();

    return docs.reverse().map(doc => ({
      role: doc.role === 'assistant' ? 'assistant' : 'user',
      content: doc.content,
      timestamp: doc.timestamp,
    }));
  }
}
