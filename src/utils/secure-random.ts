import { randomBytes, randomInt } from 'crypto';

// 同步码字母表：去掉 0/O/1/I，避免手抄时混淆
export const SYNC_CODE_ALPHABET = 'ABCDEFGHJKLMNPQRSTUVWXYZ23456789';
export const SYNC_CODE_LENGTH = 8;

const ID_ALPHABET = 'abcdefghijklmnopqrstuvwxyz0123456789';
const ID_LENGTH = 8;

export type EntityIdPrefix = 'nvl_' | 'chp_' | 'usr_' | 'cmt_' | 'src_';

function randomString(alphabet: string, length: number): string {
  let out = '';
  for (let i = 0; i < length; i++) {
    out += alphabet[randomInt(alphabet.length)];
  }
  return out;
}

/** 64 hex chars (32 random bytes). */
export function newSecretToken(): string {
  return randomBytes(32).toString('hex');
}

/** 16 hex chars, consumed by the front end's identicon renderer. */
export function newAvatarSeed(): string {
  return randomBytes(8).toString('hex');
}

export function newSyncCode(): string {
  return randomString(SYNC_CODE_ALPHABET, SYNC_CODE_LENGTH);
}

export function newEntityId(prefix: EntityIdPrefix): string {
  return prefix + randomString(ID_ALPHABET, ID_LENGTH);
}

export function pickRandom<T>(list: readonly T[]): T {
  if (list.length === 0) throw new Error('pickRandom: empty list');
  return list[randomInt(list.length)];
}
