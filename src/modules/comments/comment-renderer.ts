import { Marked } from 'marked';
import sanitizeHtml from 'sanitize-html';

// GFM 扩展，但关闭表格与围栏代码块
const markdown = new Marked({
  gfm: true,
  breaks: false,
  tokenizer: {
    table() {
      return undefined;
    },
    fences() {
      return undefined;
    },
  },
});

function isAbsoluteHttpUrl(value: string | undefined): value is string {
  if (!value) return false;
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

const SANITIZE_OPTIONS: sanitizeHtml.IOptions = {
  allowedTags: [
    'p', 'br', 'strong', 'b', 'em', 'i', 'code', 'pre', 'blockquote',
    'h1', 'h2', 'h3', 'h4', 'h5', 'h6',
    'ul', 'ol', 'li',
    'a', 'img',
  ],
  allowedAttributes: {
    a: ['href', 'rel'],
    img: ['src', 'alt', 'title'],
  },
  allowedSchemes: ['http', 'https'],
  allowedSchemesByTag: {},
  allowProtocolRelative: false,
  disallowedTagsMode: 'discard',
  transformTags: {
    a: (tagName, attribs) => ({
      tagName,
      attribs: {
        ...(isAbsoluteHttpUrl(attribs.href) ? { href: attribs.href } : {}),
        rel: 'nofollow noreferrer',
      },
    }),
    img: (tagName, attribs) => {
      const { src, ...rest } = attribs;
      return {
        tagName,
        attribs: isAbsoluteHttpUrl(src) ? { src, ...rest } : rest,
      };
    },
  },
  // 没有可用 src 的图片整体丢弃
  exclusiveFilter: (frame) => frame.tag === 'img' && !frame.attribs.src,
};

export function sanitizeCommentHtml(html: string): string {
  return sanitizeHtml(html, SANITIZE_OPTIONS).trim();
}

/** Markdown → sanitized HTML safe to embed in a page. */
export function renderCommentMarkdown(source: string): string {
  const html = markdown.parse(source, { async: false });
  if (typeof html !== 'string') {
    throw new Error('markdown renderer returned a promise');
  }
  return sanitizeCommentHtml(html);
}
