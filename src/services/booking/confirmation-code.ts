import { randomInt } from 'crypto';

import { ConfigurationError } from '@core/errors/configuration.error.js';

/** Returns an integer in `[min, maxExclusive)`. */
export type RandomInt = (min: number, maxExclusive: number) => number;

export const cryptoRandomInt: RandomInt = (min, maxExclusive) => randomInt(min, maxExclusive);

const MIN_CODE = 100000;
const MAX_CODE_EXCLUSIVE = 1000000;

/** Six digits, no leading zero, so it reads back cleanly over the phone. */
export function generateConfirmationCode(random: RandomInt = cryptoRandomInt): string {
  return String(random(MIN_CODE, MAX_CODE_EXCLUSIVE));
}

export function generateUniqueCode(
  isTaken: (code: string) => boolean,
  maxAttempts: number,
  random: RandomInt = cryptoRandomInt,
): string {
  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    const code = generateConfirmationCode(random);
    if (!isTaken(code)) return code;
  }
  throw new ConfigurationError(
    `Could not allocate a confirmation number after ${maxAttempts} attempts`,
  );
}
