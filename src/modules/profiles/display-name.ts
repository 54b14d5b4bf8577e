import sanitizeHtml from 'sanitize-html';
import { pickRandom } from '../../utils/secure-random';

const ADJECTIVES = [
  'Unknown', 'Mysterious', 'Mystic', 'Ancient', 'Shadow',
  'Strange', 'Forgotten', 'Lonely', 'Quiet', 'Swift',
  'Wise', 'Brave', 'Wild', 'Free', 'Proud',
] as const;

const ANIMALS = [
  'Jackal', 'Wolf', 'Raven', 'Falcon', 'Bear',
  'Fox', 'Hedgehog', 'Badger', 'Lynx', 'Owl',
  'Eagle', 'Ferret', 'Raccoon', 'Gopher', 'Beaver',
] as const;

export const DISPLAY_NAME_MAX_LENGTH = 15;

const ALLOWED_NAME_RE = /^[\p{L}\p{N} ]+$/u;

export function randomDisplayName(): string {
  return `${pickRandom(ADJECTIVES)} ${pickRandom(ANIMALS)}`;
}

export type DisplayNameResult =
  | { ok: true; name: string }
  | { ok: false; reason: string };

export function normalizeDisplayName(raw: string): DisplayNameResult {
  // 去掉所有标签，文本内容保留
  const stripped = sanitizeHtml(raw, { allowedTags: [], allowedAttributes: {} });
  const name = stripped.replace(/\s+/g, ' ').trim();
  if (name.length === 0) {
    return { ok: false, reason: 'Display name must not be empty' };
  }
  if ([...name].length > DISPLAY_NAME_MAX_LENGTH) {
    return {
      ok: false,
      reason: `Display name must be at most ${DISPLAY_NAME_MAX_LENGTH} characters`,
    };
  }
  if (!ALLOWED_NAME_RE.test(name)) {
    return {
      ok: false,
      reason: 'Display name may contain only letters, digits and spaces',
    };
  }
  return { ok: true, name };
}
