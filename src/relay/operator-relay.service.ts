import { Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import type { Chat, User } from 'telegraf/types';
import { ChatStateService } from '../chats/chat-state.service';
import type { StoredChat } from '../chats/chat.schemas';
import { StoppedService } from '../chats/stopped.service';
import { BOT_MESSAGES } from '../common/constants';
import { escapeHtml, userLink } from '../common/html';
import { BroadcastService } from '../transport/telegram/broadcast.service';
import { BotCommandsService } from './bot-commands.service';
import { blockedAtNotice, memberMention, replyKeyboard } from './relay.format';
import type { RelayMessage, ReplyCallback, SentMessage } from './relay.types';
import { ReplyTargetService } from './reply-target.service';

/** Escaped group title for HTML notices */
function chatTitle(chat: Chat | StoredChat): string {
  const title = 'title' in chat ? chat.title : undefined;
  return escapeHtml(title ?? String(chat.id));
}

/**
 * Handles the operator side: the admin's private chat, the operator group,
 * and the reply menu shared by both.
 */
@Injectable()
export class OperatorRelayService {
  constructor(
    private readonly logger: PinoLogger,
    private readonly chatState: ChatStateService,
    private readonly stoppedService: StoppedService,
    private readonly replyTarget: ReplyTargetService,
    private readonly botCommands: BotCommandsService,
    private readonly broadcastService: BroadcastService,
  ) {
    this.logger.setContext(OperatorRelayService.name);
  }

  async adminStart(message: SentMessage): Promise<void> {
    this.logger.info({ chatId: message.chat.id }, 'Start command from admin');
    await this.chatState.setAdminChatId(message.chat.id);
    await this.broadcastService.sendText(
      message.chat.id,
      BOT_MESSAGES.ADMIN_HELP,
    );
  }

  async adminHelp(message: SentMessage): Promise<void> {
    await this.broadcastService.sendText(
      message.chat.id,
      BOT_MESSAGES.ADMIN_HELP,
    );
  }

  async adminReset(message: SentMessage): Promise<void> {
    this.logger.info({}, 'Reset command from admin');
    await this.chatState.clearReplyTarget();
    await this.broadcastService.sendText(
      message.chat.id,
      BOT_MESSAGES.STATE_RESET,
    );
  }

  async addToGroup(message: SentMessage): Promise<void> {
    if (await this.chatState.getGroupChat()) {
      await this.broadcastService.sendText(
        message.chat.id,
        BOT_MESSAGES.ALREADY_IN_GROUP,
      );
      return;
    }

    const me = await this.broadcastService.getMe();
    const link = `tg://resolve?domain=${me.username ?? ''}&startgroup=startgroup`;
    await this.broadcastService.sendText(
      message.chat.id,
      BOT_MESSAGES.addToGroupLink(link),
      { html: true, disableLinkPreview: true },
    );
  }

  async removeFromGroup(message: SentMessage): Promise<void> {
    const group = await this.chatState.getGroupChat();
    if (!group) {
      await this.broadcastService.sendText(
        message.chat.id,
        BOT_MESSAGES.NOT_IN_GROUP,
      );
      return;
    }

    try {
      await this.broadcastService.leaveChat(group.id);
    } catch (error) {
      this.logger.error({ err: error, chatId: group.id }, 'Leave chat error');
    }
    await this.broadcastService.sendText(
      message.chat.id,
      BOT_MESSAGES.removedFromGroup(chatTitle(group)),
      { html: true, disableLinkPreview: true },
    );
    await this.chatState.setGroupChat(null);
    await this.chatState.setCurrentChat(null);
  }

  async adminReply(message: SentMessage): Promise<void> {
    const group = await this.chatState.getGroupChat();
    if (group) {
      await this.broadcastService.sendText(
        message.chat.id,
        BOT_MESSAGES.acceptingInGroup(chatTitle(group)),
        { html: true },
      );
      return;
    }
    if ((await this.chatState.getWaitReplyFrom()) !== null) {
      await this.broadcastService.sendText(
        message.chat.id,
        BOT_MESSAGES.ALREADY_WAITING,
      );
      return;
    }
    await this.sendReplyMenu(message.chat.id);
  }

  /**
   * A non-command message in the admin chat is the reply to the chosen
   * user, unless the operator works from a group.
   */
  async adminMessage(message: SentMessage): Promise<void> {
    const group = await this.chatState.getGroupChat();
    if (group) {
      await this.broadcastService.sendText(
        message.chat.id,
        BOT_MESSAGES.acceptingInGroup(chatTitle(group)),
        { html: true, disableLinkPreview: true },
      );
      this.logger.info({}, 'Ignore message in private chat with admin');
      return;
    }

    const waitReplyFrom = await this.chatState.getWaitReplyFrom();
    if (waitReplyFrom === null && !message.media_group_id) {
      this.logger.info({}, 'Ignore message from admin');
      return;
    }

    await this.replyTarget.send(message);
    await this.chatState.clearReplyTarget();
  }

  async groupStart(message: SentMessage): Promise<void> {
    if (await this.chatState.getGroupChat()) {
      this.logger.info(
        { chatId: message.chat.id },
        'Attempt to start in another group',
      );
      return;
    }

    await this.chatState.setGroupChat(message.chat);
    await this.chatState.setCurrentChat(null);
    await this.botCommands.setGroupCommands(message.chat.id);

    const adminChatId = await this.chatState.getAdminChatId();
    if (adminChatId === null) {
      await this.broadcastService.sendText(
        message.from.id,
        BOT_MESSAGES.BOT_BROKEN,
      );
      this.logger.error({}, 'Admin chat id is not set');
      return;
    }
    await this.broadcastService.sendText(
      adminChatId,
      BOT_MESSAGES.startedInGroup(chatTitle(message.chat)),
      { html: true, disableLinkPreview: true },
    );
    this.logger.info({ chatId: message.chat.id }, 'Started in group');
  }

  async groupHelp(message: SentMessage): Promise<void> {
    await this.broadcastService.sendText(
      message.chat.id,
      BOT_MESSAGES.GROUP_HELP,
    );
  }

  async groupReply(message: SentMessage): Promise<void> {
    const group = await this.chatState.getGroupChat();
    if (group && group.id !== message.chat.id) {
      await this.broadcastService.leaveChat(message.chat.id);
      return;
    }
    if (!group) {
      await this.broadcastService.sendText(
        message.chat.id,
        BOT_MESSAGES.NOT_ACCEPTING,
      );
      return;
    }

    const waitReplyFrom = await this.chatState.getWaitReplyFrom();
    if (waitReplyFrom !== null) {
      const member = await this.broadcastService.getChatMember(
        message.chat.id,
        waitReplyFrom,
      );
      await this.broadcastService.sendText(
        message.chat.id,
        BOT_MESSAGES.alreadyWaitingFor(memberMention(member)),
        { html: true },
      );
      return;
    }
    await this.sendReplyMenu(message.chat.id);
  }

  /**
   * The awaited member's next message in the operator group is the reply.
   * Album items pass regardless so later items reach their session.
   */
  async groupMessage(message: SentMessage): Promise<void> {
    const group = await this.chatState.getGroupChat();
    if (group && group.id !== message.chat.id) {
      await this.broadcastService.leaveChat(message.chat.id);
      return;
    }

    const waitReplyFrom = await this.chatState.getWaitReplyFrom();
    if (waitReplyFrom !== message.from.id && !message.media_group_id) {
      this.logger.info(
        { chatId: message.chat.id, userId: message.from.id },
        'Ignore group message',
      );
      return;
    }

    await this.replyTarget.send(message);
    await this.chatState.clearReplyTarget();
  }

  async membersJoined(message: RelayMessage, members: User[]): Promise<void> {
    const me = await this.broadcastService.getMe();
    if (!members.some(member => member.id === me.id)) {
      return;
    }

    const adminChatId = await this.chatState.getAdminChatId();
    if (adminChatId === null) {
      this.logger.error({}, 'Admin chat id is not set');
      return;
    }
    await this.broadcastService.sendText(
      adminChatId,
      BOT_MESSAGES.addedToGroup(chatTitle(message.chat)),
      { html: true, disableLinkPreview: true },
    );
    this.logger.info({ chatId: message.chat.id }, 'Bot added to group');

    const group = await this.chatState.getGroupChat();
    if (group && group.id !== message.chat.id) {
      await this.broadcastService.leaveChat(message.chat.id);
    } else if (group) {
      await this.botCommands.setGroupCommands(message.chat.id);
    }
  }

  async memberLeft(message: RelayMessage, member: User): Promise<void> {
    const me = await this.broadcastService.getMe();
    if (member.id !== me.id) {
      return;
    }

    const adminChatId = await this.chatState.getAdminChatId();
    if (adminChatId === null) {
      this.logger.error({}, 'Admin chat id is not set');
      return;
    }
    await this.broadcastService.sendText(
      adminChatId,
      BOT_MESSAGES.leftGroup(chatTitle(message.chat)),
      { html: true, disableLinkPreview: true },
    );

    const group = await this.chatState.getGroupChat();
    if (group?.id === message.chat.id) {
      await this.chatState.setGroupChat(null);
      this.logger.info({ chatId: message.chat.id }, 'Forget group chat');
    }
  }

  /**
   * A press on a reply-menu button: the pressing member becomes the one whose
   * next message is delivered to the chosen user.
   */
  async replyCallback(callback: ReplyCallback): Promise<void> {
    const { menuChatId, menuMessageId, targetChatId } = callback;
    await this.broadcastService.answerCallback(callback.callbackQueryId);

    const target = await this.chatState.getKnownChat(targetChatId);
    if (!target) {
      await this.broadcastService.editText(
        menuChatId,
        menuMessageId,
        BOT_MESSAGES.CANNOT_SEND,
      );
      this.logger.info(
        { chatId: targetChatId, fromId: callback.fromId },
        'Skip reply to unknown user',
      );
      return;
    }

    const stopped = await this.stoppedService.get(targetChatId);
    if (stopped) {
      await this.broadcastService.editText(
        menuChatId,
        menuMessageId,
        blockedAtNotice(target, stopped),
        { html: true },
      );
      return;
    }

    await this.chatState.setWaitReplyFrom(callback.fromId);
    await this.chatState.setCurrentChat(target);
    await this.broadcastService.editText(
      menuChatId,
      menuMessageId,
      BOT_MESSAGES.enterMessageFor(userLink(target)),
      { html: true, disableLinkPreview: true },
    );
  }

  private async sendReplyMenu(chatId: number): Promise<void> {
    const chats = await this.chatState.getChatList();
    if (chats.length === 0) {
      await this.broadcastService.sendText(chatId, BOT_MESSAGES.NOBODY_TO_REPLY);
      return;
    }
    await this.broadcastService.sendText(chatId, BOT_MESSAGES.CHOOSE_USER, {
      replyMarkup: replyKeyboard(chats),
    });
  }
}
