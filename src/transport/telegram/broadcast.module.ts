import { Module } from '@nestjs/common';
import { BroadcastService } from './broadcast.service';

/**
 * Outbound message sending via Telegram.
 *
 * The Telegraf instance comes from the root `TelegrafModule.forRootAsync`,
 * which registers it globally for `@InjectBot()`.
 */
@Module({
  providers: [BroadcastService],
  exports: [BroadcastService],
})
export class BroadcastModule {}
