import { Module } from '@nestjs/common';
import { AlbumModule } from '../album/album.module';
import { ChatsModule } from '../chats/chats.module';
import { BroadcastModule } from '../transport/telegram/broadcast.module';
import { BotCommandsService } from './bot-commands.service';
import { OperatorRelayService } from './operator-relay.service';
import { RelayUpdate } from './relay.update';
import { ReplyTargetService } from './reply-target.service';
import { UserRelayService } from './user-relay.service';

@Module({
  imports: [AlbumModule, BroadcastModule, ChatsModule],
  providers: [
    RelayUpdate,
    UserRelayService,
    OperatorRelayService,
    ReplyTargetService,
    BotCommandsService,
  ],
})
export class RelayModule {}
