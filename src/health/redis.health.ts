import { Injectable } from '@nestjs/common';
import {
  HealthCheckError,
  HealthIndicator,
  type HealthIndicatorResult,
} from '@nestjs/terminus';
import { RedisService } from '../redis/redis.service';

@Injectable()
export class RedisHealthIndicator extends HealthIndicator {
  constructor(private readonly redisService: RedisService) {
    super();
  }

  /**
   * Checks Redis connectivity by issuing a PING command.
   * Returns healthy when the response is 'PONG'.
   */
  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    let message: string;
    try {
      const response = await this.redisService.getClient().ping();
      if (response === 'PONG') {
        return this.getStatus(key, true);
      }
      message = `Unexpected response: ${response}`;
    } catch (error) {
      message = `Redis ping failed: ${error}`;
    }
    throw new HealthCheckError(message, this.getStatus(key, false, { message }));
  }
}
