/**
 * Chat persistence types
 *
 * Each chat is one JSON file holding a log of conversations.
 */

import { z } from 'zod';
import type { Message } from '../core/types.js';

const contentPartSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), text: z.string() }),
  z.object({ type: z.literal('image_url'), image_url: z.object({ url: z.string() }) }),
  z.object({
    type: z.literal('file'),
    file: z.object({ filename: z.string(), file_data: z.string() }),
  }),
]);

export const messageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.union([z.string(), z.array(contentPartSchema)]),
});

export const conversationSchema = z.object({
  timestamp: z.string(),
  messages: z.array(messageSchema),
  response: z.string(),
  outputs: z
    .array(
      z.object({
        name: z.string(),
        type: z.string(),
        definition: z.string().nullish(),
      }),
    )
    .optional(),
});

export const chatFileSchema = z.object({
  chat_id: z.string(),
  created_at: z.string(),
  conversations: z.array(conversationSchema),
});

export type Conversation = z.output<typeof conversationSchema>;
export type ChatFile = z.output<typeof chatFileSchema>;
export type OutputRecord = NonNullable<Conversation['outputs']>[number];

export interface ChatSummary {
  chatId: string;
  createdAt: string;
  conversationCount: number;
}

export interface PersistentChatResult {
  chatId: string;
  messages: Message[];
}

// ============================================================================
// Events
// ============================================================================

export interface ChatEvents {
  'chat:created': { chatId: string };
  'conversation:added': { chatId: string; conversationCount: number };
  'chat:repaired': { chatId: string; backupPath: string };
  'chat:deleted': { chatId: string };
}

export type ChatEventName = keyof ChatEvents;
export type ChatEventHandler<T extends ChatEventName> = (payload: ChatEvents[T]) => void;

export interface ChatManagerConfig {
  storageDir: string;
  /** Conversations replayed as context */
  maxHistory?: number;
}
