import {
  buildModerationText,
  escapeTelegramHtml,
  isModerationAction,
  moderationKeyboard,
  TELEGRAM_TEXT_LIMIT,
  toTelegramHtml,
} from '../telegram-format';

const HEADER =
  '💬 <b>New comment</b>\n\n👤 Author: Quiet Owl\n📖 Chapter: <code>chp_aaaa1111</code>\n\n📝 Text:\n';

describe('toTelegramHtml', () => {
  it('flattens paragraphs and maps strong/em', () => {
    expect(toTelegramHtml('<p>Hello <strong>there</strong> <em>you</em></p>')).toBe(
      'Hello <b>there</b> <i>you</i>',
    );
  });

  it('renders headings bold and lists as bullets', () => {
    expect(toTelegramHtml('<h2>Title</h2><ul><li>a</li><li>b</li></ul>')).toBe(
      '<b>Title</b>\n• a\n• b',
    );
  });

  it('strips rel from links and unwraps links without href', () => {
    expect(
      toTelegramHtml(
        '<p><a href="https://x.test" rel="nofollow noreferrer">x</a> <a rel="nofollow noreferrer">y</a></p>',
      ),
    ).toBe('<a href="https://x.test">x</a> y');
  });

  it('turns images into labelled links', () => {
    expect(toTelegramHtml('<img src="https://i.test/a.png" alt="cat" />')).toBe(
      '<a href="https://i.test/a.png">[🖼 cat]</a>',
    );
    expect(toTelegramHtml('<img src="https://i.test/a.png" />')).toBe(
      '<a href="https://i.test/a.png">[🖼 image]</a>',
    );
  });

  it('uses a placeholder for empty bodies', () => {
    expect(toTelegramHtml('')).toBe('[no text]');
    expect(toTelegramHtml('<p></p>')).toBe('[no text]');
  });
});

describe('buildModerationText', () => {
  const notice = {
    commentId: 'cmt_aaaa1111',
    chapterId: 'chp_aaaa1111',
    authorName: 'Quiet Owl',
    contentHtml: '<p>hi</p>',
  };

  it('prefixes the body with author and chapter', () => {
    expect(buildModerationText(notice)).toBe(HEADER + 'hi');
  });

  it('escapes the author name', () => {
    expect(buildModerationText({ ...notice, authorName: 'A<b>&' })).toContain(
      '👤 Author: A&lt;b&gt;&amp;\n',
    );
  });

  it('falls back to truncated plain text when too long', () => {
    const text = buildModerationText({
      ...notice,
      contentHtml: `<p><strong>${'a'.repeat(5000)}</strong></p>`,
    });
    expect(text).toHaveLength(TELEGRAM_TEXT_LIMIT);
    expect(text.startsWith(HEADER + 'aaa')).toBe(true);
    expect(text.endsWith('a...')).toBe(true);
    expect(text).not.toContain('<b>a');
  });

  it('never cuts an entity in half', () => {
    const room = TELEGRAM_TEXT_LIMIT - HEADER.length - 3;
    const text = buildModerationText({
      ...notice,
      contentHtml: `<p>${'a'.repeat(room - 2)}${'&amp;'.repeat(1000)}</p>`,
    });
    expect(text).toBe(HEADER + 'a'.repeat(room - 2) + '...');
  });
});

describe('moderation keyboard', () => {
  it('encodes action and comment id in callback data', () => {
    expect(moderationKeyboard('cmt_aaaa1111')).toEqual({
      inline_keyboard: [
        [
          { text: '✅ Approve', callback_data: 'approve:cmt_aaaa1111' },
          { text: '❌ Reject', callback_data: 'reject:cmt_aaaa1111' },
        ],
      ],
    });
  });

  it('recognises only known actions', () => {
    expect(isModerationAction('approve')).toBe(true);
    expect(isModerationAction('reject')).toBe(true);
    expect(isModerationAction('ban')).toBe(false);
    expect(isModerationAction('toString')).toBe(false);
  });
});

describe('escapeTelegramHtml', () => {
  it('escapes the three reserved characters', () => {
    expect(escapeTelegramHtml('<a & b>')).toBe('&lt;a &amp; b&gt;');
  });
});
