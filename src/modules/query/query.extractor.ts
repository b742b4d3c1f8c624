import type { Query } from './query.types.js';

export interface InboundMessage {
  chatId: string;
  messageId: string;
  text?: string;
  caption?: string;
  document?: { fileName?: string };
  video?: { fileName?: string };
  photo?: boolean;
}

/** Stable query id for a channel message, so edits and deletes can find the run. */
export function messageQueryId(chatId: string, messageId: string): string {
  return `${chatId}:${messageId}`;
}

/**
 * Pick the movie reference out of a channel message.
 * Precedence: text, document filename, photo caption, video caption,
 * video filename, then any remaining caption.
 */
export function extractQuery(message: InboundMessage): Query | null {
  const id = messageQueryId(message.chatId, message.messageId);
  const caption = message.caption?.trim();

  if (message.text?.trim()) {
    return { id, raw: message.text, source: 'text' };
  }

  const documentName = message.document?.fileName?.trim();
  if (documentName) {
    return { id, raw: documentName, source: 'filename' };
  }

  if (message.photo && caption) {
    return { id, raw: caption, source: 'caption' };
  }

  if (message.video) {
    if (caption) return { id, raw: caption, source: 'caption' };
    const videoName = message.video.fileName?.trim();
    if (videoName) return { id, raw: videoName, source: 'filename' };
  }

  if (caption) {
    return { id, raw: caption, source: 'caption' };
  }

  return null;
}
