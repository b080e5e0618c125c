import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { PinoLogger } from 'nestjs-pino';

/** Base delay multiplier (ms) for Redis reconnection attempts */
const RETRY_BASE_DELAY_MS = 50;
/** Maximum delay (ms) between Redis reconnection attempts */
const RETRY_MAX_DELAY_MS = 2000;
/** Every relay key lives under this namespace */
export const REDIS_KEY_PREFIX = 'relay:';

/**
 * Owns the single ioredis connection shared by the storage services.
 * Keys passed to the client are namespaced with {@link REDIS_KEY_PREFIX}.
 */
@Injectable()
export class RedisService implements OnModuleDestroy {
  private readonly client: Redis;

  constructor(
    private readonly logger: PinoLogger,
    private readonly configService: ConfigService,
  ) {
    this.logger.setContext(RedisService.name);
    this.client = new Redis({
      host: this.configService.get<string>('redis.host'),
      port: this.configService.get<number>('redis.port'),
      password: this.configService.get<string>('redis.password'),
      keyPrefix: REDIS_KEY_PREFIX,
      retryStrategy: times =>
        Math.min(times * RETRY_BASE_DELAY_MS, RETRY_MAX_DELAY_MS),
      lazyConnect: false,
    });

    this.client.on('error', error => {
      this.logger.error({ err: error }, 'Redis connection error');
    });

    this.client.on('connect', () => {
      this.logger.info({ prefix: REDIS_KEY_PREFIX }, 'Redis connected');
    });
  }

  getClient(): Redis {
    return this.client;
  }

  async onModuleDestroy(): Promise<void> {
    await this.client.quit();
    this.logger.info({}, 'Redis connection closed');
  }
}
