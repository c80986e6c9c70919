// Document hash codes
// Full format: {2-letter type prefix}-{12 alphanumeric}, e.g. CM-A1B2C3D4E5F6
// Short format: the even-position characters of the 12-char body, e.g. ABCDEF

import * as crypto from 'crypto';
import { HashCode, ShortCode } from '../../domain-types';
import { InvalidFormatError, MalformedCodeError } from '../../errors';

const CODE_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
const BODY_LENGTH = 12;

export const FULL_CODE_PATTERN = /^[A-Z]{2}-[A-Z0-9]{12}$/;
export const SHORT_CODE_PATTERN = /^[A-Z0-9]{6}$/;
const PREFIX_PATTERN = /^[A-Z]{2}$/;

export type CodeKind = 'FULL' | 'SHORT';

export function normalizeCode(raw: string): string {
  return raw.trim().toUpperCase();
}

export function isValidHashCode(code: string): code is HashCode {
  return FULL_CODE_PATTERN.test(code);
}

export function isValidShortCode(code: string): code is ShortCode {
  return SHORT_CODE_PATTERN.test(code);
}

/**
 * Classifies an already-normalized code. Returns null when it is neither shape.
 */
export function classifyCode(normalized: string): CodeKind | null {
  if (isValidHashCode(normalized)) return 'FULL';
  if (isValidShortCode(normalized)) return 'SHORT';
  return null;
}

// crypto.randomInt rejects out-of-range draws, so every character is equally likely
function randomBody(): string {
  let body = '';
  for (let i = 0; i < BODY_LENGTH; i++) {
    body += CODE_ALPHABET[crypto.randomInt(CODE_ALPHABET.length)];
  }
  return body;
}

export function generateHashCode(typePrefix: string): HashCode {
  const prefix = normalizeCode(typePrefix);
  if (!PREFIX_PATTERN.test(prefix)) {
    throw new InvalidFormatError(`Invalid document type prefix: '${typePrefix}'. Expected two letters`, {
      typePrefix,
    });
  }
  return `${prefix}-${randomBody()}` as HashCode;
}

export function deriveShortCode(hashCode: string): ShortCode {
  const normalized = hashCode.toUpperCase();
  if (!isValidHashCode(normalized)) {
    throw new MalformedCodeError(hashCode);
  }

  const body = normalized.slice(3);
  let shortCode = '';
  for (let i = 0; i < BODY_LENGTH; i += 2) {
    shortCode += body[i];
  }
  return shortCode as ShortCode;
}

export function typePrefixOf(hashCode: HashCode): string {
  return hashCode.slice(0, 2);
}

// Format for display (with a space for readability)
export function formatHashCodeForDisplay(code: string): string {
  return code.replace(/-/g, ' ');
}
