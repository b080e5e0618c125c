import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PinoLogger } from 'nestjs-pino';
import type { Chat } from 'telegraf/types';
import { JsonStoreService } from '../redis/json-store.service';
import { CHAT_KEYS, chatKey } from './chat.keys';
import {
  ChatIdSchema,
  ChatListSchema,
  type StoredChat,
  StoredChatSchema,
  toStoredChat,
} from './chat.schemas';

/** Recent chats shown in the reply menu when not configured */
export const DEFAULT_CHAT_LIST_SIZE = 10;

/**
 * Relay state shared by every update handler: who the operator is replying
 * to, where operator messages come from, and which users wrote recently.
 */
@Injectable()
export class ChatStateService {
  private readonly chatListSize: number;

  constructor(
    private readonly logger: PinoLogger,
    private readonly store: JsonStoreService,
    configService: ConfigService,
  ) {
    this.logger.setContext(ChatStateService.name);
    this.chatListSize =
      configService.get<number>('chats.listSize') ?? DEFAULT_CHAT_LIST_SIZE;
  }

  getCurrentChat(): Promise<StoredChat | null> {
    return this.store.get(CHAT_KEYS.CURRENT_CHAT, StoredChatSchema);
  }

  async setCurrentChat(chat: StoredChat | null): Promise<void> {
    await this.store.set(CHAT_KEYS.CURRENT_CHAT, chat);
  }

  getAdminChatId(): Promise<number | null> {
    return this.store.get(CHAT_KEYS.ADMIN_CHAT_ID, ChatIdSchema);
  }

  async setAdminChatId(chatId: number): Promise<void> {
    await this.store.set(CHAT_KEYS.ADMIN_CHAT_ID, chatId);
  }

  getGroupChat(): Promise<StoredChat | null> {
    return this.store.get(CHAT_KEYS.GROUP_CHAT, StoredChatSchema);
  }

  async setGroupChat(chat: Chat | null): Promise<void> {
    await this.store.set(
      CHAT_KEYS.GROUP_CHAT,
      chat ? toStoredChat(chat) : null,
    );
  }

  /** Operator member whose next message is the reply */
  getWaitReplyFrom(): Promise<number | null> {
    return this.store.get(CHAT_KEYS.WAIT_REPLY_FROM, ChatIdSchema);
  }

  async setWaitReplyFrom(userId: number | null): Promise<void> {
    await this.store.set(CHAT_KEYS.WAIT_REPLY_FROM, userId);
  }

  /**
   * Forgets both the awaited operator member and the current reply target.
   */
  async clearReplyTarget(): Promise<void> {
    await this.setWaitReplyFrom(null);
    await this.setCurrentChat(null);
  }

  /**
   * Where user messages go: the operator group when configured, otherwise
   * the admin's private chat. Null when neither is known yet.
   */
  async getOperatorChatId(): Promise<number | null> {
    const group = await this.getGroupChat();
    if (group) {
      return group.id;
    }
    return this.getAdminChatId();
  }

  getKnownChat(chatId: number): Promise<StoredChat | null> {
    return this.store.get(chatKey(chatId), StoredChatSchema);
  }

  async rememberChat(chat: Chat): Promise<void> {
    await this.store.set(chatKey(chat.id), toStoredChat(chat));
  }

  async getChatList(): Promise<StoredChat[]> {
    return (await this.store.get(CHAT_KEYS.CHAT_LIST, ChatListSchema)) ?? [];
  }

  /**
   * Appends a chat not yet on the list, evicting the oldest entries above
   * the configured size. A chat already listed keeps its position.
   */
  async addToChatList(chat: Chat): Promise<void> {
    const list = await this.getChatList();
    if (list.some(item => item.id === chat.id)) {
      return;
    }

    list.push(toStoredChat(chat));
    const evicted = list.splice(0, Math.max(0, list.length - this.chatListSize));
    await this.store.set(CHAT_KEYS.CHAT_LIST, list);

    if (evicted.length > 0) {
      this.logger.debug(
        { evicted: evicted.map(item => item.id) },
        'Evicted chats from recent list',
      );
    }
  }

  async removeFromChatList(chatId: number): Promise<void> {
    const list = await this.getChatList();
    await this.store.set(
      CHAT_KEYS.CHAT_LIST,
      list.filter(item => item.id !== chatId),
    );
  }
}
