import type { Chat, User } from 'telegraf/types';
import { REPLY_CALLBACK_PATTERN } from '../common/constants';
import type { SenderRole } from './relay.types';

export function isGroupChat(chat: Chat): boolean {
  return chat.type === 'group' || chat.type === 'supergroup';
}

export function isAdmin(from: User | undefined, adminUsername: string): boolean {
  return from?.username === adminUsername;
}

/**
 * Private chats split by sender into admin and user; group and supergroup
 * chats are the operator group whoever writes. Channels are not served.
 */
export function senderRole(
  chat: Chat,
  from: User | undefined,
  adminUsername: string,
): SenderRole {
  if (chat.type === 'private') {
    return isAdmin(from, adminUsername) ? 'admin' : 'user';
  }
  return isGroupChat(chat) ? 'group' : 'ignored';
}

/**
 * Extracts the chat id from reply-menu callback data, or null when the data
 * is not a reply button.
 */
export function parseReplyCallbackData(data: string): number | null {
  const match = REPLY_CALLBACK_PATTERN.exec(data);
  if (!match) {
    return null;
  }
  return Number.parseInt(match[1], 10);
}
