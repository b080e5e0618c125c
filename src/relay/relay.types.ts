import type { Sticker, User } from 'telegraf/types';
import type { AlbumItem } from '../album/album.types';

/**
 * The parts of an incoming message the relay routes on. Every Telegraf
 * message is structurally assignable to it.
 */
export interface RelayMessage extends AlbumItem {
  from?: User;
  sticker?: Sticker;
}

/** A relay message whose sender is known. */
export interface SentMessage extends RelayMessage {
  from: User;
}

/** Who sent an update and from what kind of chat. */
export type SenderRole = 'user' | 'admin' | 'group' | 'ignored';

export interface ReplyCallback {
  callbackQueryId: string;
  fromId: number;
  /** Chat and message holding the reply menu */
  menuChatId: number;
  menuMessageId: number;
  /** Chat id carried in the button's callback data */
  targetChatId: number;
}
