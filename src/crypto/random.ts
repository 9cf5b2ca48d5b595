import { randomBytes, randomUUID } from 'node:crypto';
import { JTI_LENGTH } from '../config/constants.js';

/**
 * Generate cryptographically secure random bytes as base64url string
 */
export function generateRandomBase64Url(length: number): string {
  return randomBytes(length)
    .toString('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_')
    .replace(/=/g, '');
}

/**
 * Generate a unique JWT ID (jti)
 */
export function generateJti(): string {
  return generateRandomBase64Url(JTI_LENGTH);
}

/**
 * Generate a unique ID for stored records
 */
export function generateId(): string {
  return randomUUID();
}
