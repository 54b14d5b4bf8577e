export interface ModerationCallback {
  callbackId: string;
  action: string;
  commentId: string;
  message?: { messageId: number; text: string };
}

function isRecord(val: unknown): val is Record<string, unknown> {
  return typeof val === 'object' && val !== null;
}

/**
 * Pulls the moderation button press out of a Bot API update. Anything else
 * (plain messages, malformed callback data) yields null.
 */
export function parseModerationCallback(update: unknown): ModerationCallback | null {
  if (!isRecord(update)) return null;
  const cb = update.callback_query;
  if (!isRecord(cb)) return null;
  const { id, data, message } = cb;
  if (typeof id !== 'string' || typeof data !== 'string') return null;

  const sep = data.indexOf(':');
  if (sep <= 0 || sep === data.length - 1) return null;
  const action = data.slice(0, sep);
  const commentId = data.slice(sep + 1);

  let parsedMessage: ModerationCallback['message'];
  if (isRecord(message) && typeof message.message_id === 'number') {
    parsedMessage = {
      messageId: message.message_id,
      text: typeof message.text === 'string' ? message.text : '',
    };
  }
  return { callbackId: id, action, commentId, message: parsedMessage };
}
