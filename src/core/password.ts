import { randomInt, scrypt, timingSafeEqual } from 'crypto';

const ALPHANUMERIC = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

/** Derived key length in bytes */
export const PASSWORD_HASH_LENGTH = 64;

/**
 * Random string drawn uniformly from [a-zA-Z0-9] using the CSPRNG.
 */
export function randomAlphanumeric(length: number): string {
  let out = '';
  for (let i = 0; i < length; i++) {
    out += ALPHANUMERIC[randomInt(ALPHANUMERIC.length)];
  }
  return out;
}

export function hashPassword(password: string, salt: string): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(password, salt, PASSWORD_HASH_LENGTH, (error, derivedKey) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(derivedKey);
    });
  });
}

export async function verifyPassword(
  password: string,
  salt: string,
  expectedHash: Buffer
): Promise<boolean> {
  return hashesEqual(await hashPassword(password, salt), expectedHash);
}

export function hashesEqual(actual: Buffer, expected: Buffer): boolean {
  return actual.length === expected.length && timingSafeEqual(actual, expected);
}

/**
 * Constant-time string comparison (length is not hidden).
 */
export function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf-8');
  const right = Buffer.from(b, 'utf-8');
  return left.length === right.length && timingSafeEqual(left, right);
}
