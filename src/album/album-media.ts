import type { PhotoSize } from 'telegraf/types';
import type { MediaGroupEntry } from '../transport/telegram/media-group';
import type { AlbumItem } from './album.types';

/**
 * Picks the photo variant with the greatest file size. Variants without a
 * reported size count as zero; on a tie the earliest variant wins.
 */
export function largestPhoto(sizes: readonly PhotoSize[]): PhotoSize | null {
  let best: PhotoSize | null = null;
  for (const size of sizes) {
    if (best === null || (size.file_size ?? 0) > (best.file_size ?? 0)) {
      best = size;
    }
  }
  return best;
}

/**
 * Translates an album item into an outgoing media group entry.
 *
 * Kinds are checked in the order audio, document, photo, video. Returns null
 * for anything else (locations, polls, stickers...), which the forwarder
 * counts but cannot resend.
 */
export function toMediaGroupEntry(item: AlbumItem): MediaGroupEntry | null {
  const { caption, caption_entities } = item;

  if (item.audio) {
    return {
      type: 'audio',
      media: item.audio.file_id,
      caption,
      caption_entities,
      duration: item.audio.duration,
      performer: item.audio.performer,
      title: item.audio.title,
    };
  }

  if (item.document) {
    return {
      type: 'document',
      media: item.document.file_id,
      caption,
      caption_entities,
    };
  }

  if (item.photo) {
    const photo = largestPhoto(item.photo);
    if (photo) {
      return {
        type: 'photo',
        media: photo.file_id,
        caption,
        caption_entities,
      };
    }
  }

  if (item.video) {
    return {
      type: 'video',
      media: item.video.file_id,
      caption,
      caption_entities,
      width: item.video.width,
      height: item.video.height,
      duration: item.video.duration,
    };
  }

  return null;
}
