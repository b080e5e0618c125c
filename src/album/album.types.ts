import type {
  Audio,
  Chat,
  Document,
  MessageEntity,
  PhotoSize,
  Video,
} from 'telegraf/types';
import type { MediaGroupEntry } from '../transport/telegram/media-group';
import type { AlbumBuffer } from './album-buffer';

/**
 * The parts of an incoming Telegram message the album forwarder reads.
 * Any message delivered by Telegraf is structurally assignable to it.
 */
export interface AlbumItem {
  message_id: number;
  chat: Chat;
  media_group_id?: string;
  caption?: string;
  caption_entities?: MessageEntity[];
  audio?: Audio;
  document?: Document;
  photo?: PhotoSize[];
  video?: Video;
}

/** Chat id or `@channel` username a finished album is sent to. */
export type AlbumDestination = number | string;

/**
 * Live state of one media group being collected.
 *
 * Routing (`destination`, `announceSenderInfo`) is captured by the
 * assembly task when the session is created and never changes afterwards.
 */
export interface AlbumSession {
  groupId: string;
  destination: AlbumDestination;
  announceSenderInfo: boolean;
  buffer: AlbumBuffer<AlbumItem>;
}

/** What one assembly task collected before the burst went quiet. */
export interface AlbumAssembly {
  entries: MediaGroupEntry[];
  itemCount: number;
  originChat: Chat | null;
}
