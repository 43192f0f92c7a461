/**
 * Session Manager for the assistant gateway.
 *
 * Owns session lifecycle (create, lookup, end), message appends and
 * context-window extraction. Appends and removals for a conversation are
 * serialized through a per-conversation lock; different sessions never
 * wait on each other.
 */

import { randomUUID } from "node:crypto";
import { EventEmitter } from "node:events";
import type { MessageRole } from "@local-assistant/shared";
import { SYSTEM_PRIMER } from "../config/constants.js";
import { gatewayLogs } from "../logs/index.js";
import { GatewayError } from "../monitoring/ErrorRegistry.js";
import {
  ConversationStore,
  type Conversation,
  type Message,
  type Session,
} from "./ConversationStore.js";
import { KeyedMutex } from "./KeyedMutex.js";

export type { Conversation, Message, Session } from "./ConversationStore.js";

/**
 * Role and content pair sent to the inference backend.
 */
export interface ContextMessage {
  role: MessageRole;
  content: string;
}

export interface SessionStats {
  activeSessions: number;
  totalConversations: number;
  totalMessages: number;
}

export interface SessionManagerConfig {
  /** First message of every conversation */
  systemPrimer?: string;
  /** Backing tables (default: a fresh in-memory store) */
  store?: ConversationStore;
  /** Session id generator for callers that supply none */
  generateId?: () => string;
}

/** Listener arguments per event */
export interface SessionManagerEvents {
  sessionCreated: [{ sessionId: string }];
  sessionEnded: [{ sessionId: string }];
}

export class SessionManager extends EventEmitter<SessionManagerEvents> {
  private store: ConversationStore;
  private locks = new KeyedMutex();
  private systemPrimer: string;
  private generateId: () => string;

  constructor(config: SessionManagerConfig = {}) {
    super();
    this.store = config.store ?? new ConversationStore();
    this.systemPrimer = config.systemPrimer ?? SYSTEM_PRIMER;
    this.generateId = config.generateId ?? randomUUID;
  }

  /**
   * Create a session with a fresh conversation seeded with the system primer.
   * A caller-supplied id that is already live returns that session.
   */
  createSession(sessionId?: string): Session {
    const id = sessionId ?? this.generateId();

    const existing = this.store.getSession(id);
    if (existing) {
      existing.lastActivityAt = new Date();
      return existing;
    }

    const now = new Date();
    const conversation: Conversation = {
      id: randomUUID(),
      createdAt: now,
      messages: [createMessage("system", this.systemPrimer)],
    };

    const session: Session = {
      id,
      conversationId: conversation.id,
      createdAt: now,
      lastActivityAt: now,
      messageCount: 0,
      active: true,
    };

    this.store.putSession(session, conversation);
    gatewayLogs.info("SessionManager", `Created new session: ${id}`);
    this.emit("sessionCreated", { sessionId: id });

    return session;
  }

  /**
   * Look up a session. A hit counts as activity.
   */
  getSession(sessionId: string): Session | undefined {
    const session = this.store.getSession(sessionId);
    if (session) {
      session.lastActivityAt = new Date();
    }
    return session;
  }

  /**
   * Look up a session without refreshing its activity.
   */
  peekSession(sessionId: string): Session | undefined {
    return this.store.getSession(sessionId);
  }

  /**
   * Get the conversation behind a session, without refreshing activity.
   */
  getConversation(sessionId: string): Conversation | undefined {
    const session = this.store.getSession(sessionId);
    if (!session) return undefined;
    return this.store.getConversation(session.conversationId);
  }

  /**
   * End a session: mark it inactive and drop it with its conversation.
   * @returns false when the session was not live (no-op)
   */
  async endSession(sessionId: string): Promise<boolean> {
    const session = this.store.getSession(sessionId);
    if (!session) return false;

    return this.locks.runExclusive(session.conversationId, () => {
      const removed = this.store.deleteSession(sessionId);
      if (!removed) return false;

      removed.active = false;
      gatewayLogs.info("SessionManager", `Ended session: ${sessionId}`);
      this.emit("sessionEnded", { sessionId });
      return true;
    });
  }

  /**
   * Append a message to the session's conversation.
   * @throws GatewayError SessionNotFound when the session is unknown or ended
   */
  async addMessage(
    sessionId: string,
    role: MessageRole,
    content: string,
    metadata: Record<string, unknown> = {},
  ): Promise<Message> {
    const session = this.store.getSession(sessionId);
    if (!session) {
      throw new GatewayError("SessionNotFound", `Session not found: ${sessionId}`, { sessionId });
    }

    return this.locks.runExclusive(session.conversationId, () => {
      // The session may have been ended, or ended and recreated under the
      // same id, while this append waited for the lock.
      if (this.store.getSession(sessionId) !== session) {
        throw new GatewayError("SessionNotFound", `Session not found: ${sessionId}`, { sessionId });
      }

      const message = createMessage(role, content, metadata);
      if (!this.store.appendMessage(session.conversationId, message)) {
        throw new GatewayError(
          "ConversationNotFound",
          `Conversation not found: ${session.conversationId}`,
          { sessionId, conversationId: session.conversationId },
        );
      }

      session.messageCount += 1;
      session.lastActivityAt = new Date();

      gatewayLogs.audit(
        sessionId,
        "message_added",
        `conversation:${session.conversationId}`,
        `Message added: role=${role}, length=${content.length}`,
      );

      return message;
    });
  }

  /**
   * The most recent `maxMessages` messages, oldest first.
   * Unknown sessions yield an empty list.
   */
  getContext(sessionId: string, maxMessages: number): ContextMessage[] {
    const session = this.getSession(sessionId);
    if (!session || maxMessages <= 0) return [];

    const conversation = this.store.getConversation(session.conversationId);
    if (!conversation) return [];

    return conversation.messages
      .slice(-maxMessages)
      .map((m) => ({ role: m.role, content: m.content }));
  }

  /**
   * List all live sessions.
   */
  listSessions(): Session[] {
    return this.store.listSessions();
  }

  getStats(): SessionStats {
    return {
      activeSessions: this.store.countSessions(),
      totalConversations: this.store.countConversations(),
      totalMessages: this.store.countMessages(),
    };
  }
}

function createMessage(
  role: MessageRole,
  content: string,
  metadata: Record<string, unknown> = {},
): Message {
  return Object.freeze({
    id: randomUUID(),
    role,
    content,
    timestamp: new Date(),
    metadata: Object.freeze({ ...metadata }),
  });
}
