import { timingSafeEqual, randomBytes, scrypt as scryptCallback } from 'node:crypto';
import {
  SCRYPT_COST,
  SCRYPT_BLOCK_SIZE,
  SCRYPT_PARALLELIZATION,
  SCRYPT_KEY_LENGTH,
  SCRYPT_SALT_LENGTH,
} from '../config/constants.js';

/**
 * One-way password hashing
 */
export interface IPasswordHasher {
  hash(password: string): Promise<string>;
  verify(password: string, hash: string): Promise<boolean>;
}

/**
 * Promisified scrypt function
 */
function scryptAsync(
  password: string,
  salt: Buffer,
  keyLength: number,
  options: { N: number; r: number; p: number }
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scryptCallback(password, salt, keyLength, options, (err, derivedKey) => {
      if (err) reject(err);
      else resolve(derivedKey);
    });
  });
}

function parseIntegerSegment(segment: string | undefined): number | null {
  if (!segment || !/^\d+$/.test(segment)) {
    return null;
  }
  return parseInt(segment, 10);
}

/**
 * scrypt password hasher
 * Hash format: $scrypt$N$r$p$salt$hash
 */
export class ScryptPasswordHasher implements IPasswordHasher {
  constructor(
    private readonly cost: number = SCRYPT_COST,
    private readonly blockSize: number = SCRYPT_BLOCK_SIZE,
    private readonly parallelization: number = SCRYPT_PARALLELIZATION
  ) {}

  async hash(password: string): Promise<string> {
    const salt = randomBytes(SCRYPT_SALT_LENGTH);
    const N = this.cost;
    const r = this.blockSize;
    const p = this.parallelization;

    const hash = await scryptAsync(password, salt, SCRYPT_KEY_LENGTH, { N, r, p });

    return `$scrypt$${N}$${r}$${p}$${salt.toString('base64')}$${hash.toString('base64')}`;
  }

  async verify(password: string, hash: string): Promise<boolean> {
    const parts = hash.split('$');

    // Expected format: $scrypt$N$r$p$salt$hash
    if (parts.length !== 7 || parts[1] !== 'scrypt') {
      return false;
    }

    const N = parseIntegerSegment(parts[2]);
    const r = parseIntegerSegment(parts[3]);
    const p = parseIntegerSegment(parts[4]);
    if (N === null || r === null || p === null) {
      return false;
    }

    const salt = Buffer.from(parts[5] ?? '', 'base64');
    const storedHash = Buffer.from(parts[6] ?? '', 'base64');
    if (storedHash.length === 0) {
      return false;
    }

    const derivedHash = await scryptAsync(password, salt, storedHash.length, { N, r, p });

    return timingSafeEqual(storedHash, derivedHash);
  }
}
