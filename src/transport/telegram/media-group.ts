import type { Telegram } from 'telegraf';

/** Media accepted by a single `sendMediaGroup` call. */
export type MediaGroup = Parameters<Telegram['sendMediaGroup']>[1];

/** One entry of an outgoing media group, of any supported kind. */
export type MediaGroupEntry = MediaGroup[number];

export type AudioEntry = Extract<MediaGroupEntry, { type: 'audio' }>;
export type DocumentEntry = Extract<MediaGroupEntry, { type: 'document' }>;
export type PhotoEntry = Extract<MediaGroupEntry, { type: 'photo' }>;
export type VideoEntry = Extract<MediaGroupEntry, { type: 'video' }>;

function isAudio(entry: MediaGroupEntry): entry is AudioEntry {
  return entry.type === 'audio';
}

function isDocument(entry: MediaGroupEntry): entry is DocumentEntry {
  return entry.type === 'document';
}

function isVisual(entry: MediaGroupEntry): entry is PhotoEntry | VideoEntry {
  return entry.type === 'photo' || entry.type === 'video';
}

/**
 * Narrows collected entries to a media group Telegram accepts.
 *
 * An album is either all audio, all documents, or photos and videos in any
 * mix. Telegram never delivers anything else under one media_group_id, so a
 * mixed list is rejected rather than split.
 */
export function toMediaGroup(entries: readonly MediaGroupEntry[]): MediaGroup {
  const audio = entries.filter(isAudio);
  if (audio.length === entries.length) return audio;

  const documents = entries.filter(isDocument);
  if (documents.length === entries.length) return documents;

  const visual = entries.filter(isVisual);
  if (visual.length === entries.length) return visual;

  const kinds = [...new Set(entries.map(entry => entry.type))].join(', ');
  throw new Error(`Media group mixes incompatible kinds: ${kinds}`);
}
