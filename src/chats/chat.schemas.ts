import type { Chat } from 'telegraf/types';
import { z } from 'zod';

/**
 * The subset of a Telegram chat kept in Redis: enough to address it, render
 * a user link, and show it in the reply menu.
 */
export const StoredChatSchema = z.object({
  id: z.number().int(),
  type: z.enum(['private', 'group', 'supergroup', 'channel']),
  title: z.string().optional(),
  username: z.string().optional(),
  first_name: z.string().optional(),
  last_name: z.string().optional(),
});

export type StoredChat = z.infer<typeof StoredChatSchema>;

/** Recent chats, most recent last */
export const ChatListSchema = z.array(StoredChatSchema);

export const ChatIdSchema = z.number().int();

/**
 * Written when a user stops the bot, or when a send fails because the user
 * blocked it.
 */
export const StoppedMarkerSchema = z.object({
  /** ISO-8601 timestamp with offset */
  stoppedAt: z.string().datetime({ offset: true }),
  blocked: z.boolean(),
});

export type StoppedMarker = z.infer<typeof StoppedMarkerSchema>;

export function toStoredChat(chat: Chat): StoredChat {
  const stored: StoredChat = { id: chat.id, type: chat.type };
  if ('title' in chat) {
    stored.title = chat.title;
  }
  if ('username' in chat && chat.username !== undefined) {
    stored.username = chat.username;
  }
  if ('first_name' in chat) {
    stored.first_name = chat.first_name;
  }
  if ('last_name' in chat && chat.last_name !== undefined) {
    stored.last_name = chat.last_name;
  }
  return stored;
}
