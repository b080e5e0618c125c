import { Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import { InjectBot } from 'nestjs-telegraf';
import { Telegraf } from 'telegraf';
import type { ChatMember, InlineKeyboardMarkup, User } from 'telegraf/types';
import { type MediaGroupEntry, toMediaGroup } from './media-group';

export interface SendTextOptions {
  /** Parse the text as Telegram HTML */
  html?: boolean;
  /** Suppress the link preview under the message */
  disableLinkPreview?: boolean;
  replyMarkup?: InlineKeyboardMarkup;
}

/**
 * Outbound Telegram calls used by the relay and the album forwarder.
 *
 * Failures propagate to the caller: the album forwarder reports them through
 * its task group, update handlers through Telegraf's error hook.
 */
@Injectable()
export class BroadcastService {
  constructor(
    private readonly logger: PinoLogger,
    @InjectBot() private readonly bot: Telegraf,
  ) {
    this.logger.setContext(BroadcastService.name);
  }

  async sendText(
    chatId: number | string,
    text: string,
    options: SendTextOptions = {},
  ): Promise<void> {
    await this.bot.telegram.sendMessage(chatId, text, {
      parse_mode: options.html ? 'HTML' : undefined,
      link_preview_options: options.disableLinkPreview
        ? { is_disabled: true }
        : undefined,
      reply_markup: options.replyMarkup,
    });
  }

  /**
   * Replaces the text of a message the bot sent earlier (the reply menu).
   */
  async editText(
    chatId: number,
    messageId: number,
    text: string,
    options: Omit<SendTextOptions, 'replyMarkup'> = {},
  ): Promise<void> {
    await this.bot.telegram.editMessageText(chatId, messageId, undefined, text, {
      parse_mode: options.html ? 'HTML' : undefined,
      link_preview_options: options.disableLinkPreview
        ? { is_disabled: true }
        : undefined,
    });
  }

  /** Forwards a message keeping its "Forwarded from" header. */
  async forward(
    toChatId: number,
    fromChatId: number,
    messageId: number,
  ): Promise<void> {
    await this.bot.telegram.forwardMessage(toChatId, fromChatId, messageId);
  }

  /** Sends a copy of a message without any link to the original. */
  async copy(
    toChatId: number,
    fromChatId: number,
    messageId: number,
  ): Promise<void> {
    await this.bot.telegram.copyMessage(toChatId, fromChatId, messageId);
  }

  async answerCallback(callbackQueryId: string): Promise<void> {
    await this.bot.telegram.answerCbQuery(callbackQueryId);
  }

  async leaveChat(chatId: number): Promise<void> {
    await this.bot.telegram.leaveChat(chatId);
    this.logger.info({ chatId }, 'Left chat');
  }

  getChatMember(chatId: number, userId: number): Promise<ChatMember> {
    return this.bot.telegram.getChatMember(chatId, userId);
  }

  /** The bot's own account. */
  getMe(): Promise<User> {
    return this.bot.telegram.getMe();
  }

  /**
   * Sends collected album entries to `chatId` as one media group.
   */
  async sendComposite(
    chatId: number | string,
    entries: readonly MediaGroupEntry[],
  ): Promise<void> {
    if (entries.length === 0) {
      throw new Error('Cannot send an empty media group');
    }
    await this.bot.telegram.sendMediaGroup(chatId, toMediaGroup(entries));
    this.logger.debug(
      { chatId, count: entries.length },
      'Media group delivered',
    );
  }
}
