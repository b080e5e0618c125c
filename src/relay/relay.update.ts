import { ConfigService } from '@nestjs/config';
import { PinoLogger } from 'nestjs-pino';
import {
  Action,
  Command,
  Help,
  InjectBot,
  On,
  Start,
  Update,
} from 'nestjs-telegraf';
import type { Context } from 'telegraf';
import { Telegraf } from 'telegraf';
import { REPLY_CALLBACK_PATTERN } from '../common/constants';
import { OperatorRelayService } from './operator-relay.service';
import { isAdmin, parseReplyCallbackData, senderRole } from './relay.filters';
import type { RelayMessage, SentMessage } from './relay.types';
import { UserRelayService } from './user-relay.service';

function hasSender(message: RelayMessage | undefined): message is SentMessage {
  return message?.from !== undefined;
}

/**
 * Telegram update entry points. Each command is served by the handler of
 * the sender's role; a command sent by another role is treated as a plain
 * message, so a user typing /reset simply has it relayed.
 */
@Update()
export class RelayUpdate {
  private readonly adminUsername: string;

  constructor(
    private readonly logger: PinoLogger,
    private readonly userRelay: UserRelayService,
    private readonly operatorRelay: OperatorRelayService,
    @InjectBot() bot: Telegraf,
    configService: ConfigService,
  ) {
    this.logger.setContext(RelayUpdate.name);
    this.adminUsername = configService.getOrThrow<string>(
      'telegram.adminUsername',
    );

    bot.catch((error, ctx) => {
      this.logger.error(
        { err: error, updateId: ctx.update.update_id },
        'Update handling error',
      );
    });
  }

  @Start()
  async onStart(ctx: Context): Promise<void> {
    const message = ctx.message;
    if (!hasSender(message)) return;

    switch (this.role(message)) {
      case 'user':
        return this.userRelay.start(message);
      case 'admin':
        return this.operatorRelay.adminStart(message);
      case 'group':
        if (isAdmin(message.from, this.adminUsername)) {
          return this.operatorRelay.groupStart(message);
        }
        return this.operatorRelay.groupMessage(message);
      case 'ignored':
        return;
    }
  }

  @Help()
  async onHelp(ctx: Context): Promise<void> {
    const message = ctx.message;
    if (!hasSender(message)) return;

    switch (this.role(message)) {
      case 'user':
        return this.userRelay.help(message);
      case 'admin':
        return this.operatorRelay.adminHelp(message);
      case 'group':
        return this.operatorRelay.groupHelp(message);
      case 'ignored':
        return;
    }
  }

  @Command('stop')
  async onStop(ctx: Context): Promise<void> {
    const message = ctx.message;
    if (!hasSender(message)) return;

    if (this.role(message) === 'user') {
      return this.userRelay.stop(message);
    }
    return this.route(message);
  }

  @Command('reset')
  async onReset(ctx: Context): Promise<void> {
    const message = ctx.message;
    if (!hasSender(message)) return;

    if (this.role(message) === 'admin') {
      return this.operatorRelay.adminReset(message);
    }
    return this.route(message);
  }

  @Command('add_to_group')
  async onAddToGroup(ctx: Context): Promise<void> {
    const message = ctx.message;
    if (!hasSender(message)) return;

    if (this.role(message) === 'admin') {
      return this.operatorRelay.addToGroup(message);
    }
    return this.route(message);
  }

  @Command('remove_from_group')
  async onRemoveFromGroup(ctx: Context): Promise<void> {
    const message = ctx.message;
    if (!hasSender(message)) return;

    if (this.role(message) === 'admin') {
      return this.operatorRelay.removeFromGroup(message);
    }
    return this.route(message);
  }

  @Command('reply')
  async onReply(ctx: Context): Promise<void> {
    const message = ctx.message;
    if (!hasSender(message)) return;

    switch (this.role(message)) {
      case 'admin':
        return this.operatorRelay.adminReply(message);
      case 'group':
        return this.operatorRelay.groupReply(message);
      default:
        return this.route(message);
    }
  }

  @On('new_chat_members')
  async onNewChatMembers(ctx: Context): Promise<void> {
    const message = ctx.message;
    if (!message || !('new_chat_members' in message)) return;

    this.logger.info({ chatId: message.chat.id }, 'New group members');
    if (this.role(message) === 'group') {
      await this.operatorRelay.membersJoined(message, message.new_chat_members);
    }
  }

  @On('left_chat_member')
  async onLeftChatMember(ctx: Context): Promise<void> {
    const message = ctx.message;
    if (!message || !('left_chat_member' in message)) return;

    this.logger.info({ chatId: message.chat.id }, 'Group member left');
    if (this.role(message) === 'group') {
      await this.operatorRelay.memberLeft(message, message.left_chat_member);
    }
  }

  @Action(REPLY_CALLBACK_PATTERN)
  async onReplyCallback(ctx: Context): Promise<void> {
    const query = ctx.callbackQuery;
    if (!query || !('data' in query) || !query.message) return;

    const targetChatId = parseReplyCallbackData(query.data);
    if (targetChatId === null) return;

    this.logger.info({ fromId: query.from.id }, 'Reply callback query');
    await this.operatorRelay.replyCallback({
      callbackQueryId: query.id,
      fromId: query.from.id,
      menuChatId: query.message.chat.id,
      menuMessageId: query.message.message_id,
      targetChatId,
    });
  }

  @On('message')
  async onMessage(ctx: Context): Promise<void> {
    const message = ctx.message;
    if (!hasSender(message)) return;

    await this.route(message);
  }

  private role(message: RelayMessage) {
    return senderRole(message.chat, message.from, this.adminUsername);
  }

  private async route(message: SentMessage): Promise<void> {
    switch (this.role(message)) {
      case 'user':
        return this.userRelay.relay(message);
      case 'admin':
        return this.operatorRelay.adminMessage(message);
      case 'group':
        return this.operatorRelay.groupMessage(message);
      case 'ignored':
        this.logger.debug({ chatId: message.chat.id }, 'Ignore update');
        return;
    }
  }
}
