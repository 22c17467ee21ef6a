export type ConversationRole = 'user' | 'model';

/**
 * One entry in a session's conversation history. Entries are recorded for
 * text the client sends and for model text collected over a completed turn.
 */
export interface ConversationEntry {
  role: ConversationRole;
  content: string;
  type: 'text';
  /** ISO timestamp of when the entry was recorded. */
  timestamp: string;
}
