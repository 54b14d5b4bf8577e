import { parseModerationCallback } from '../telegram-update';

describe('parseModerationCallback', () => {
  it('extracts action, comment id and message', () => {
    expect(
      parseModerationCallback({
        update_id: 1,
        callback_query: {
          id: 'cb1',
          data: 'approve:cmt_aaaa1111',
          message: { message_id: 17, text: 'New comment' },
        },
      }),
    ).toEqual({
      callbackId: 'cb1',
      action: 'approve',
      commentId: 'cmt_aaaa1111',
      message: { messageId: 17, text: 'New comment' },
    });
  });

  it('splits on the first colon only', () => {
    expect(
      parseModerationCallback({ callback_query: { id: 'cb1', data: 'reject:a:b' } }),
    ).toEqual({ callbackId: 'cb1', action: 'reject', commentId: 'a:b', message: undefined });
  });

  it.each([
    [{ update_id: 1, message: { text: 'hi' } }],
    [{ callback_query: { id: 'cb1', data: 'approve' } }],
    [{ callback_query: { id: 'cb1', data: ':cmt_aaaa1111' } }],
    [{ callback_query: { id: 'cb1', data: 'approve:' } }],
    [{ callback_query: { data: 'approve:cmt_aaaa1111' } }],
    [null],
  ])('returns null for %j', (update) => {
    expect(parseModerationCallback(update)).toBeNull();
  });
});
