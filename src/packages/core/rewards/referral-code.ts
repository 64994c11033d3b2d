import { randomInt } from 'crypto';

export const REFERRAL_CODE_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
export const MIN_CODE_LENGTH = 6;
export const MAX_CODE_LENGTH = 8;

/** Returns an integer in [0, maxExclusive) */
export type RandomIndex = (maxExclusive: number) => number;

const cryptoIndex: RandomIndex = (maxExclusive) => randomInt(maxExclusive);

export function generateReferralCode(length: number, randomIndex: RandomIndex = cryptoIndex): string {
  let code = '';
  for (let i = 0; i < length; i++) {
    code += REFERRAL_CODE_ALPHABET.charAt(randomIndex(REFERRAL_CODE_ALPHABET.length));
  }
  return code;
}
