const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;',
};

/**
 * Escapes text for Telegram's HTML parse mode.
 */
export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char);
}

/**
 * A user, or the private chat with one. Telegram `User`, private `Chat`
 * and the stored chat shape all fit.
 */
export interface PersonLike {
  id: number;
  first_name?: string;
  last_name?: string;
}

/**
 * Display name: first name, plus last name when present.
 * Private chats always carry a first name; anything else is a caller bug.
 */
export function userName(person: PersonLike): string {
  if (!person.first_name) {
    throw new Error(`Chat ${person.id} has no first name`);
  }
  return person.last_name
    ? `${person.first_name} ${person.last_name}`
    : person.first_name;
}

/**
 * HTML mention link that opens the user's profile.
 */
export function userLink(person: PersonLike): string {
  return `<a href="tg://user?id=${person.id}">${escapeHtml(userName(person))}</a>`;
}
