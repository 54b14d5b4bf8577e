import {
  filterValidCookies,
  isValidCookieName,
  isValidCookieValue,
  mergeCookies,
} from '../cookie-bag';
import type { CookieBag } from '../../../types/cookie-bag.interface';

describe('cookie bag', () => {
  describe('validation', () => {
    it('accepts prefixed lowercase names only', () => {
      expect(isValidCookieName('inkwell_theme')).toBe(true);
      expect(isValidCookieName('inkwell_font_size_2')).toBe(true);
      expect(isValidCookieName('inkwell_')).toBe(false);
      expect(isValidCookieName('inkwell_Theme')).toBe(false);
      expect(isValidCookieName('other_theme')).toBe(false);
      expect(isValidCookieName(`inkwell_${'a'.repeat(51)}`)).toBe(false);
    });

    it('accepts url-safe values up to 200 chars', () => {
      expect(isValidCookieValue('dark')).toBe(true);
      expect(isValidCookieValue('a-b_C9')).toBe(true);
      expect(isValidCookieValue('')).toBe(false);
      expect(isValidCookieValue('has space')).toBe(false);
      expect(isValidCookieValue('<script>')).toBe(false);
      expect(isValidCookieValue('x'.repeat(201))).toBe(false);
    });

    it('filters out every malformed entry', () => {
      const input = {
        inkwell_theme: { value: 'dark', updated_at: 10 },
        inkwell_bad_value: { value: 'a;b', updated_at: 10 },
        foreign_cookie: { value: 'x', updated_at: 10 },
        inkwell_no_ts: { value: 'x' },
        inkwell_str_ts: { value: 'x', updated_at: '10' },
        inkwell_nan: { value: 'x', updated_at: Number.NaN },
        inkwell_scalar: 'x',
      };
      expect(filterValidCookies(input)).toEqual({
        inkwell_theme: { value: 'dark', updated_at: 10 },
      });
    });

    it('returns an empty bag for non-object input', () => {
      expect(filterValidCookies(null)).toEqual({});
      expect(filterValidCookies(['x'])).toEqual({});
      expect(filterValidCookies('inkwell_theme')).toEqual({});
    });
  });

  describe('mergeCookies', () => {
    const existing: CookieBag = {
      inkwell_theme: { value: 'light', updated_at: 100 },
      inkwell_font: { value: 'serif', updated_at: 100 },
    };

    it('takes the newer side per key and keeps one-sided keys', () => {
      const incoming: CookieBag = {
        inkwell_theme: { value: 'dark', updated_at: 200 },
        inkwell_font: { value: 'sans', updated_at: 50 },
        inkwell_width: { value: 'wide', updated_at: 1 },
      };
      expect(mergeCookies(existing, incoming)).toEqual({
        inkwell_theme: { value: 'dark', updated_at: 200 },
        inkwell_font: { value: 'serif', updated_at: 100 },
        inkwell_width: { value: 'wide', updated_at: 1 },
      });
    });

    it('keeps the stored value on equal timestamps', () => {
      const incoming: CookieBag = {
        inkwell_theme: { value: 'dark', updated_at: 100 },
      };
      expect(mergeCookies(existing, incoming).inkwell_theme.value).toBe('light');
    });

    it('is idempotent', () => {
      const incoming: CookieBag = {
        inkwell_theme: { value: 'dark', updated_at: 200 },
      };
      const once = mergeCookies(existing, incoming);
      expect(mergeCookies(once, incoming)).toEqual(once);
    });

    it('does not mutate its inputs', () => {
      const incoming: CookieBag = {
        inkwell_theme: { value: 'dark', updated_at: 200 },
      };
      mergeCookies(existing, incoming);
      expect(existing.inkwell_theme.value).toBe('light');
    });
  });
});
