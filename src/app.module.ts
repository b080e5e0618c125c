import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TelegrafModule } from 'nestjs-telegraf';
import { AlbumModule } from './album/album.module';
import { ChatsModule } from './chats/chats.module';
import { configuration } from './config/configuration';
import { validateEnv } from './config/env.schema';
import { HealthModule } from './health/health.module';
import { LoggingModule } from './logging/logging.module';
import { RedisModule } from './redis/redis.module';
import { RelayModule } from './relay/relay.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      validate: validateEnv,
    }),
    LoggingModule,
    HealthModule,
    TelegrafModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        token: configService.getOrThrow<string>('telegram.botToken'),
      }),
      inject: [ConfigService],
    }),
    RedisModule,
    ChatsModule,
    AlbumModule,
    RelayModule,
  ],
})
export class AppModule {}
