import { Injectable, OnApplicationBootstrap } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import { InjectBot } from 'nestjs-telegraf';
import { Telegraf } from 'telegraf';
import { ChatStateService } from '../chats/chat-state.service';
import {
  ADMIN_COMMANDS,
  GROUP_COMMANDS,
  USER_COMMANDS,
} from '../common/constants';
import { isForbiddenError } from '../transport/telegram/telegram-errors';

/**
 * Publishes the command menus: user commands in every private chat, admin
 * commands in the admin chat, group commands in the operator group.
 */
@Injectable()
export class BotCommandsService implements OnApplicationBootstrap {
  constructor(
    private readonly logger: PinoLogger,
    @InjectBot() private readonly bot: Telegraf,
    private readonly chatState: ChatStateService,
  ) {
    this.logger.setContext(BotCommandsService.name);
  }

  async onApplicationBootstrap(): Promise<void> {
    await this.registerAll();
  }

  async registerAll(): Promise<void> {
    const adminChatId = await this.chatState.getAdminChatId();
    const groupChat = await this.chatState.getGroupChat();

    await this.bot.telegram.deleteMyCommands();
    await this.bot.telegram.setMyCommands(USER_COMMANDS, {
      scope: { type: 'all_private_chats' },
    });
    if (adminChatId !== null) {
      await this.bot.telegram.setMyCommands(ADMIN_COMMANDS, {
        scope: { type: 'chat', chat_id: adminChatId },
      });
    }
    if (groupChat) {
      try {
        await this.setGroupCommands(groupChat.id);
      } catch (error) {
        if (!isForbiddenError(error)) {
          throw error;
        }
        this.logger.info(
          { chatId: groupChat.id, description: error.description },
          'Cannot set commands in group chat',
        );
      }
    }
    this.logger.info(
      { adminChatId, groupChatId: groupChat?.id ?? null },
      'Bot commands registered',
    );
  }

  async setGroupCommands(chatId: number): Promise<void> {
    await this.bot.telegram.setMyCommands(GROUP_COMMANDS, {
      scope: { type: 'chat', chat_id: chatId },
    });
  }
}
