import { Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import type { z } from 'zod';
import { RedisService } from './redis.service';

/**
 * JSON key-value access on top of Redis.
 *
 * Values are validated with a zod schema on read; a value that fails
 * validation is logged and reported as absent. Storing `null` deletes the key.
 */
@Injectable()
export class JsonStoreService {
  constructor(
    private readonly logger: PinoLogger,
    private readonly redisService: RedisService,
  ) {
    this.logger.setContext(JsonStoreService.name);
  }

  async get<S extends z.ZodTypeAny>(
    key: string,
    schema: S,
  ): Promise<z.infer<S> | null> {
    const raw = await this.redisService.getClient().get(key);
    if (raw === null) {
      return null;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      this.logger.warn({ key, err: error }, 'Stored value is not valid JSON');
      return null;
    }

    const result = schema.safeParse(data);
    if (!result.success) {
      this.logger.warn(
        { key, error: result.error.message },
        'Stored value failed validation, treating as absent',
      );
      return null;
    }
    return result.data;
  }

  async set(key: string, value: unknown): Promise<void> {
    const redis = this.redisService.getClient();
    if (value === null || value === undefined) {
      await redis.del(key);
      return;
    }
    await redis.set(key, JSON.stringify(value));
  }

  async delete(key: string): Promise<void> {
    await this.redisService.getClient().del(key);
  }
}
