import type { BotCommand } from 'telegraf/types';

const USER_HELP = `Send a message or ask a question.

You can also use these commands:
/help - Help
/stop - Stop and receive no more messages`;

const ADMIN_HELP = `/help - Help
/reply - Reply to a user
/add_to_group - Add to a group
/remove_from_group - Remove from the group
/reset - Reset state`;

const GROUP_HELP = `/help - Help
/reply - Reply to a user`;

/**
 * Texts the bot sends. HTML-formatted entries expect already escaped input
 * (user links come from `userLink`).
 */
export const BOT_MESSAGES = {
  USER_HELP,
  ADMIN_HELP,
  GROUP_HELP,

  WELCOME_BACK: 'Welcome back!',
  BOT_BROKEN: 'Something broke inside the bot.',
  NO_CURRENT_USER: 'No current user.',
  STATE_RESET: 'State reset.',
  ALREADY_IN_GROUP: 'Already in a group.',
  NOT_IN_GROUP: 'Not in a group.',
  ALREADY_WAITING: 'Already waiting for a message.',
  NOT_ACCEPTING: 'Not accepting messages.',
  NOBODY_TO_REPLY: 'Nobody to reply to.',
  CHOOSE_USER: 'Choose a user to reply to.',
  CANNOT_SEND: 'Error. Message cannot be sent.',

  from: (link: string) => `From ${link}`,
  blockedAt: (link: string, when: string) => `${link} blocked me at ${when}.`,
  blocked: (link: string) => `${link} blocked me.`,
  messageSent: (link: string) => `Message sent to ${link}.`,
  enterMessageFor: (link: string) => `Enter a message for ${link}.`,
  alreadyWaitingFor: (member: string) =>
    `Already waiting for a message from ${member}.`,
  acceptingInGroup: (title: string) =>
    `Accepting messages in group <b>${title}</b>.`,
  addToGroupLink: (link: string) =>
    `To add the bot to a group <a href="${link}">follow this link</a>.`,
  removedFromGroup: (title: string) => `Removed from group <b>${title}</b>.`,
  startedInGroup: (title: string) => `Started in <b>${title}</b>.`,
  addedToGroup: (title: string) => `Added to group <b>${title}</b>.`,
  leftGroup: (title: string) => `Left group <b>${title}</b>.`,
  albumForwarded: (count: number) => `Forwarded album items: ${count}`,
  albumUnsupported: (count: number) =>
    `Could not forward ${count} album items of unsupported type.`,
};

export const USER_COMMANDS: BotCommand[] = [
  { command: 'help', description: 'Help' },
  { command: 'stop', description: 'Stop and receive no more messages' },
];

export const ADMIN_COMMANDS: BotCommand[] = [
  { command: 'help', description: 'Help' },
  { command: 'reply', description: 'Reply to a user' },
  { command: 'add_to_group', description: 'Add to a group' },
  { command: 'remove_from_group', description: 'Remove from the group' },
  { command: 'reset', description: 'Reset state' },
];

export const GROUP_COMMANDS: BotCommand[] = [
  { command: 'help', description: 'Help' },
  { command: 'reply', description: 'Reply to a user' },
];

/** Callback data prefix of reply-menu buttons: `reply|<chat id>` */
export const REPLY_PREFIX = 'reply';
export const REPLY_CALLBACK_PATTERN = new RegExp(`^${REPLY_PREFIX}\\|(-?\\d+)$`);
