import { Module } from '@nestjs/common';
import { JsonStoreService } from './json-store.service';
import { RedisService } from './redis.service';

@Module({
  providers: [RedisService, JsonStoreService],
  exports: [RedisService, JsonStoreService],
})
export class RedisModule {}
