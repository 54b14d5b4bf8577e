import type { CookieBag, CookieEntry } from '../../types/cookie-bag.interface';

export const COOKIE_PREFIX = 'inkwell';

const COOKIE_NAME_RE = new RegExp(`^${COOKIE_PREFIX}_[a-z0-9_]{1,50}$`);
const COOKIE_VALUE_RE = /^[A-Za-z0-9_-]{1,200}$/;

export function isValidCookieName(name: string): boolean {
  return COOKIE_NAME_RE.test(name);
}

export function isValidCookieValue(value: string): boolean {
  return COOKIE_VALUE_RE.test(value);
}

export function isCookieEntry(val: unknown): val is CookieEntry {
  if (typeof val !== 'object' || val === null) return false;
  if (!('value' in val) || !('updated_at' in val)) return false;
  const { value, updated_at } = val;
  return (
    typeof value === 'string' &&
    typeof updated_at === 'number' &&
    Number.isFinite(updated_at)
  );
}

/** Drops malformed entries silently; never throws. */
export function filterValidCookies(input: unknown): CookieBag {
  const out: CookieBag = {};
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    return out;
  }
  for (const [name, entry] of Object.entries(input)) {
    if (!isValidCookieName(name)) continue;
    if (!isCookieEntry(entry)) continue;
    if (!isValidCookieValue(entry.value)) continue;
    out[name] = { value: entry.value, updated_at: entry.updated_at };
  }
  return out;
}

/**
 * Last-write-wins per key on the client-supplied `updated_at`. Ties keep the
 * stored value, so replaying the same bag is a no-op.
 */
export function mergeCookies(existing: CookieBag, incoming: CookieBag): CookieBag {
  const merged: CookieBag = { ...existing };
  for (const [name, entry] of Object.entries(incoming)) {
    const current = merged[name];
    if (!current || entry.updated_at > current.updated_at) {
      merged[name] = entry;
    }
  }
  return merged;
}
