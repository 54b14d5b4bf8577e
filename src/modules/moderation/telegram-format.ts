export const TELEGRAM_TEXT_LIMIT = 4000;
const EMPTY_BODY = '[no text]';

export interface ModerationNotice {
  commentId: string;
  chapterId: string;
  authorName: string;
  contentHtml: string;
}

export const MODERATION_ACTIONS = {
  approve: { status: 'approved', label: '✅ Approve', result: '✅ Approved' },
  reject: { status: 'rejected', label: '❌ Reject', result: '❌ Rejected' },
} as const;

export type ModerationAction = keyof typeof MODERATION_ACTIONS;

export function isModerationAction(value: string): value is ModerationAction {
  return Object.prototype.hasOwnProperty.call(MODERATION_ACTIONS, value);
}

export interface InlineKeyboardButton {
  text: string;
  callback_data: string;
}

export interface InlineKeyboardMarkup {
  inline_keyboard: InlineKeyboardButton[][];
}

export function moderationKeyboard(commentId: string): InlineKeyboardMarkup {
  return {
    inline_keyboard: [
      [
        { text: MODERATION_ACTIONS.approve.label, callback_data: `approve:${commentId}` },
        { text: MODERATION_ACTIONS.reject.label, callback_data: `reject:${commentId}` },
      ],
    ],
  };
}

export function escapeTelegramHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function attr(tag: string, name: string): string | undefined {
  const m = new RegExp(`\\s${name}="([^"]*)"`).exec(tag);
  return m ? m[1] : undefined;
}

/**
 * Rewrites sanitized comment HTML into the subset Telegram's HTML parse
 * mode accepts. Input is expected to come from the comment sanitizer.
 */
export function toTelegramHtml(html: string): string {
  if (!html) return EMPTY_BODY;
  let out = html
    .replace(/<h[1-6]>/g, '<b>')
    .replace(/<\/h[1-6]>/g, '</b>\n')
    .replace(/<p>/g, '')
    .replace(/<\/p>/g, '\n\n')
    .replace(/<br\s*\/?>/g, '\n')
    .replace(/<\/?(ul|ol)>/g, (m) => (m.startsWith('</') ? '\n' : ''))
    .replace(/<li>/g, '• ')
    .replace(/<\/li>/g, '\n')
    .replace(/<(\/?)strong>/g, '<$1b>')
    .replace(/<(\/?)em>/g, '<$1i>')
    // 链接：去掉 rel；没有 href 的只保留文字
    .replace(/<a rel="[^"]*">([\s\S]*?)<\/a>/g, '$1')
    .replace(/(<a href="[^"]*") rel="[^"]*">/g, '$1>')
    .replace(/<img\b[^>]*>/g, (tag) => {
      const src = attr(tag, 'src');
      const alt = attr(tag, 'alt') || 'image';
      return src ? `<a href="${src}">[🖼 ${alt}]</a>` : `[🖼 ${alt}]`;
    });
  out = out.trim();
  return out || EMPTY_BODY;
}

function stripTags(html: string): string {
  return html.replace(/<[^>]*>/g, '');
}

// 截断时不留下半个实体
function truncateEscaped(text: string, max: number): string {
  if (text.length <= max) return text;
  return text.slice(0, max).replace(/&[#a-z0-9]*$/i, '') + '...';
}

export function buildModerationText(notice: ModerationNotice): string {
  const header =
    '💬 <b>New comment</b>\n\n' +
    `👤 Author: ${escapeTelegramHtml(notice.authorName)}\n` +
    `📖 Chapter: <code>${escapeTelegramHtml(notice.chapterId)}</code>\n\n` +
    '📝 Text:\n';
  const rich = header + toTelegramHtml(notice.contentHtml);
  if (rich.length <= TELEGRAM_TEXT_LIMIT) return rich;

  // 富文本过长时改用纯文本，避免截断破坏标签
  const plain = stripTags(toTelegramHtml(notice.contentHtml)).trim() || EMPTY_BODY;
  return header + truncateEscaped(plain, TELEGRAM_TEXT_LIMIT - header.length - 3);
}
