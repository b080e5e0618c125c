import { Module } from '@nestjs/common';
import { RedisModule } from '../redis/redis.module';
import { ChatStateService } from './chat-state.service';
import { StoppedService } from './stopped.service';

@Module({
  imports: [RedisModule],
  providers: [ChatStateService, StoppedService],
  exports: [ChatStateService, StoppedService],
})
export class ChatsModule {}
