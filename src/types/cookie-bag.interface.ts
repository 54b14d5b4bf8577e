export interface CookieEntry {
  value: string;
  /** Client-side modification time (ms since epoch), compared verbatim. */
  updated_at: number;
}

export type CookieBag = Record<string, CookieEntry>;
