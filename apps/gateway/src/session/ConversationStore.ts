/**
 * In-memory tables for sessions and their conversations.
 *
 * Plain storage with no locking and no activity bookkeeping; the
 * SessionManager owns those rules. Nothing here survives a restart.
 */
import type { MessageRole } from "@local-assistant/shared";

export interface Message {
  readonly id: string;
  readonly role: MessageRole;
  readonly content: string;
  readonly timestamp: Date;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface Conversation {
  id: string;
  createdAt: Date;
  /** Append-only; order is the chat history */
  messages: Message[];
}

export interface Session {
  id: string;
  conversationId: string;
  createdAt: Date;
  lastActivityAt: Date;
  messageCount: number;
  active: boolean;
}

export class ConversationStore {
  private sessions: Map<string, Session> = new Map();
  private conversations: Map<string, Conversation> = new Map();

  putSession(session: Session, conversation: Conversation): void {
    this.conversations.set(conversation.id, conversation);
    this.sessions.set(session.id, session);
  }

  getSession(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  /**
   * Remove a session and the conversation it owns.
   */
  deleteSession(sessionId: string): Session | undefined {
    const session = this.sessions.get(sessionId);
    if (!session) return undefined;
    this.sessions.delete(sessionId);
    this.conversations.delete(session.conversationId);
    return session;
  }

  getConversation(conversationId: string): Conversation | undefined {
    return this.conversations.get(conversationId);
  }

  appendMessage(conversationId: string, message: Message): boolean {
    const conversation = this.conversations.get(conversationId);
    if (!conversation) return false;
    conversation.messages.push(message);
    return true;
  }

  listSessions(): Session[] {
    return Array.from(this.sessions.values());
  }

  countSessions(): number {
    return this.sessions.size;
  }

  countConversations(): number {
    return this.conversations.size;
  }

  countMessages(): number {
    let total = 0;
    for (const conversation of this.conversations.values()) {
      total += conversation.messages.length;
    }
    return total;
  }
}
