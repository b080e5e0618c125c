/**
 * Relay state keys. The Redis client adds the `relay:` namespace.
 */
export const CHAT_KEYS = {
  CURRENT_CHAT: 'current-chat',
  ADMIN_CHAT_ID: 'admin-chat-id',
  GROUP_CHAT: 'group-chat',
  WAIT_REPLY_FROM: 'wait-reply-from',
  CHAT_LIST: 'chat-list',
} as const;

export function chatKey(chatId: number): string {
  return `chat:${chatId}`;
}

export function stoppedKey(chatId: number): string {
  return `stopped:${chatId}`;
}
