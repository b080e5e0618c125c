import { Markup } from 'telegraf';
import type { ChatMember, InlineKeyboardMarkup } from 'telegraf/types';
import { BOT_MESSAGES, REPLY_PREFIX } from '../common/constants';
import { type PersonLike, userLink, userName } from '../common/html';
import type { StoredChat, StoppedMarker } from '../chats/chat.schemas';
import { formatStoppedAt } from '../chats/stopped.service';

const REPLY_MENU_COLUMNS = 2;

/**
 * Inline keyboard of recent chats, two per row, each button carrying
 * `reply|<chat id>`.
 */
export function replyKeyboard(
  chats: readonly StoredChat[],
): InlineKeyboardMarkup {
  const buttons = chats.map(chat =>
    Markup.button.callback(userName(chat), `${REPLY_PREFIX}|${chat.id}`),
  );
  return Markup.inlineKeyboard(buttons, { columns: REPLY_MENU_COLUMNS })
    .reply_markup;
}

/** "<user> blocked me at <time>." for a stopped user */
export function blockedAtNotice(
  person: PersonLike,
  marker: StoppedMarker,
): string {
  return BOT_MESSAGES.blockedAt(userLink(person), formatStoppedAt(marker));
}

/** `@username` when the member has one, otherwise a profile link. */
export function memberMention(member: ChatMember): string {
  const { user } = member;
  return user.username ? `@${user.username}` : userLink(user);
}
