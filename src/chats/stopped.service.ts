import { Injectable } from '@nestjs/common';
import { format, formatISO, parseISO } from 'date-fns';
import { JsonStoreService } from '../redis/json-store.service';
import { stoppedKey } from './chat.keys';
import { type StoppedMarker, StoppedMarkerSchema } from './chat.schemas';

/** How a stop time appears in operator notices */
const STOPPED_AT_FORMAT = 'yyyy-MM-dd HH:mm:ss xxx';

/**
 * Per-user markers recording that the user stopped or blocked the bot.
 * Operators cannot reply to a stopped user until the user writes again.
 */
@Injectable()
export class StoppedService {
  constructor(private readonly store: JsonStoreService) {}

  get(chatId: number): Promise<StoppedMarker | null> {
    return this.store.get(stoppedKey(chatId), StoppedMarkerSchema);
  }

  async set(
    chatId: number,
    blocked = false,
    now: Date = new Date(),
  ): Promise<StoppedMarker> {
    const marker: StoppedMarker = { stoppedAt: formatISO(now), blocked };
    await this.store.set(stoppedKey(chatId), marker);
    return marker;
  }

  async delete(chatId: number): Promise<void> {
    await this.store.delete(stoppedKey(chatId));
  }

  /**
   * Clears the marker if present. Returns true when the user had been
   * stopped, so the caller can greet them back.
   */
  async resume(chatId: number): Promise<boolean> {
    if (!(await this.get(chatId))) {
      return false;
    }
    await this.delete(chatId);
    return true;
  }
}

/**
 * Stop time in the server's local zone, e.g. `2026-03-01 09:30:00 +01:00`.
 */
export function formatStoppedAt(marker: StoppedMarker): string {
  return format(parseISO(marker.stoppedAt), STOPPED_AT_FORMAT);
}
