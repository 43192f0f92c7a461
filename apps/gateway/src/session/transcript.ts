/**
 * Conversation export as structured data or a markdown transcript.
 * Timestamps are rendered in UTC.
 */
import type { ChatMessage, SessionSummary } from "@local-assistant/shared";
import type { Conversation, Message, Session } from "./ConversationStore.js";

export interface ConversationExport {
  sessionId: string;
  createdAt: string;
  messages: ChatMessage[];
}

export function toChatMessage(message: Message): ChatMessage {
  return {
    id: message.id,
    role: message.role,
    content: message.content,
    timestamp: message.timestamp.toISOString(),
    metadata: { ...message.metadata },
  };
}

export function toSessionSummary(session: Session): SessionSummary {
  return {
    sessionId: session.id,
    conversationId: session.conversationId,
    createdAt: session.createdAt.toISOString(),
    lastActivityAt: session.lastActivityAt.toISOString(),
    messageCount: session.messageCount,
    active: session.active,
  };
}

export function exportConversationJson(sessionId: string, conversation: Conversation): ConversationExport {
  return {
    sessionId,
    createdAt: conversation.createdAt.toISOString(),
    messages: conversation.messages.map(toChatMessage),
  };
}

export function exportConversationMarkdown(sessionId: string, conversation: Conversation): string {
  let md = "# Conversation Export\n\n";
  md += `**Session ID:** ${sessionId}\n`;
  md += `**Date:** ${formatDateTime(conversation.createdAt)}\n\n`;

  for (const message of conversation.messages) {
    const role = message.role.charAt(0).toUpperCase() + message.role.slice(1);
    md += `## ${role} (${formatTime(message.timestamp)})\n\n${message.content}\n\n`;
  }

  return md;
}

/**
 * Download name for a markdown export.
 */
export function transcriptFilename(sessionId: string): string {
  // Ids are caller-supplied and end up in a header
  return `conversation_${sessionId.slice(0, 8).replace(/[^\w.-]/g, "_")}.md`;
}

function formatDateTime(date: Date): string {
  // YYYY-MM-DD HH:mm:ss
  return date.toISOString().slice(0, 19).replace("T", " ");
}

function formatTime(date: Date): string {
  return date.toISOString().slice(11, 19);
}
