import { Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PinoLogger } from 'nestjs-pino';
import { BOT_MESSAGES } from '../common/constants';
import { userLink } from '../common/html';
import { BroadcastService } from '../transport/telegram/broadcast.service';
import type { MediaGroupEntry } from '../transport/telegram/media-group';
import { AlbumBuffer } from './album-buffer';
import { toMediaGroupEntry } from './album-media';
import type {
  AlbumAssembly,
  AlbumDestination,
  AlbumItem,
  AlbumSession,
} from './album.types';
import { TaskGroup } from './task-group';

/** How long a media group may stay quiet before it counts as complete */
export const DEFAULT_ALBUM_WAIT_TIMEOUT_MS = 1000;

/**
 * Reassembles Telegram albums and forwards each one as a single media group.
 *
 * Telegram delivers every item of an album as its own update, sharing a
 * `media_group_id` and carrying no "last item" marker. The forwarder keeps
 * one session per group id: the first item creates it and spawns an assembly
 * task, later items are appended to its buffer. The task drains the buffer
 * until no item arrives within the wait timeout, then sends:
 *
 * 1. an optional "From <user>" notice to the destination,
 * 2. the supported items as one media group,
 * 3. a delivery count (or an "unsupported type" count) back to the origin chat.
 *
 * The session is removed when its task ends, whatever the outcome. Delivery
 * errors are logged from the task group; they never reach `submit`.
 */
@Injectable()
export class AlbumForwarderService implements OnModuleInit, OnModuleDestroy {
  private readonly sessions = new Map<string, AlbumSession>();
  private readonly waitTimeoutMs: number;
  private tasks: TaskGroup | null = null;

  constructor(
    private readonly logger: PinoLogger,
    private readonly broadcastService: BroadcastService,
    configService: ConfigService,
  ) {
    this.logger.setContext(AlbumForwarderService.name);
    this.waitTimeoutMs =
      configService.get<number>('album.waitTimeoutMs') ??
      DEFAULT_ALBUM_WAIT_TIMEOUT_MS;
  }

  onModuleInit(): void {
    this.start();
  }

  async onModuleDestroy(): Promise<void> {
    await this.stop();
  }

  /** Number of albums currently being collected or delivered. */
  get activeSessionCount(): number {
    return this.sessions.size;
  }

  hasSession(groupId: string): boolean {
    return this.sessions.has(groupId);
  }

  start(): void {
    if (this.tasks) {
      throw new Error('Album forwarder already started');
    }
    this.tasks = new TaskGroup((error, taskName) => {
      this.logger.error({ err: error, task: taskName }, 'Album forward error');
    });
    this.logger.info(
      { waitTimeoutMs: this.waitTimeoutMs },
      'Album forwarder started',
    );
  }

  /**
   * Aborts albums still waiting for items and waits for every assembly task
   * to finish. Albums already being sent complete their sends first.
   */
  async stop(): Promise<void> {
    const tasks = this.requireStarted();
    this.tasks = null;
    await tasks.close();

    if (this.sessions.size > 0) {
      throw new Error(
        `Album forwarder stopped with ${this.sessions.size} live sessions`,
      );
    }
    this.logger.info({}, 'Album forwarder stopped');
  }

  /**
   * Hands an album item to the forwarder and returns immediately.
   *
   * @param item Message carrying a `media_group_id`
   * @param destination Where the album goes; required for the first item of
   *   a group, ignored for the rest
   * @param announceSenderInfo Precede the album with a "From <user>" notice;
   *   only read from the first item
   */
  submit(
    item: AlbumItem,
    destination?: AlbumDestination,
    announceSenderInfo = false,
  ): void {
    const tasks = this.requireStarted();
    const groupId = item.media_group_id;
    if (!groupId) {
      throw new Error('Album item must have a media_group_id');
    }

    const session = this.sessions.get(groupId);
    if (session) {
      if (!session.buffer.push(item)) {
        this.logger.warn(
          { groupId, messageId: item.message_id },
          'Skip album item arriving after its group was assembled',
        );
      }
      return;
    }

    if (destination === undefined) {
      this.logger.warn(
        { groupId, messageId: item.message_id },
        'Skip album item as latecomer',
      );
      return;
    }

    const buffer = new AlbumBuffer<AlbumItem>();
    buffer.push(item);
    const created: AlbumSession = {
      groupId,
      destination,
      announceSenderInfo,
      buffer,
    };
    this.sessions.set(groupId, created);
    tasks.spawn(`album:${groupId}`, signal => this.assemble(created, signal));
    this.logger.debug({ groupId, destination }, 'Album session created');
  }

  private requireStarted(): TaskGroup {
    if (!this.tasks) {
      throw new Error('Album forwarder not started');
    }
    return this.tasks;
  }

  private async assemble(
    session: AlbumSession,
    signal: AbortSignal,
  ): Promise<void> {
    try {
      const assembly = await this.collect(session, signal);
      if (assembly) {
        await this.deliver(session, assembly);
      }
    } finally {
      session.buffer.close();
      this.sessions.delete(session.groupId);
    }
  }

  /**
   * Drains the session buffer until it stays empty for the wait timeout.
   * Returns null when shutdown interrupted the wait.
   */
  private async collect(
    session: AlbumSession,
    signal: AbortSignal,
  ): Promise<AlbumAssembly | null> {
    const entries: MediaGroupEntry[] = [];
    let itemCount = 0;
    let originChat: AlbumAssembly['originChat'] = null;

    for (;;) {
      const read = await session.buffer.next(this.waitTimeoutMs, signal);

      if (read.status === 'timeout') {
        session.buffer.close();
        return { entries, itemCount, originChat };
      }

      if (read.status === 'aborted') {
        const unread = session.buffer.close().length;
        this.logger.warn(
          { groupId: session.groupId, dropped: itemCount + unread },
          'Album assembly interrupted by shutdown',
        );
        return null;
      }

      itemCount++;
      originChat = read.item.chat;
      const entry = toMediaGroupEntry(read.item);
      if (entry) {
        entries.push(entry);
      }
    }
  }

  private async deliver(
    session: AlbumSession,
    { entries, itemCount, originChat }: AlbumAssembly,
  ): Promise<void> {
    const { groupId, destination, announceSenderInfo } = session;

    if (!originChat) {
      this.logger.debug({ groupId }, 'No album items to forward');
      return;
    }

    if (entries.length > 0) {
      if (announceSenderInfo) {
        await this.broadcastService.sendText(
          destination,
          BOT_MESSAGES.from(userLink(originChat)),
          { html: true },
        );
      }
      await this.broadcastService.sendComposite(destination, entries);
      await this.broadcastService.sendText(
        originChat.id,
        BOT_MESSAGES.albumForwarded(entries.length),
      );
      this.logger.debug(
        { groupId, count: entries.length },
        'Forwarded album items',
      );
      return;
    }

    await this.broadcastService.sendText(
      originChat.id,
      BOT_MESSAGES.albumUnsupported(itemCount),
    );
    this.logger.debug(
      { groupId, count: itemCount },
      'Failed to forward album items of unsupported type',
    );
  }
}
