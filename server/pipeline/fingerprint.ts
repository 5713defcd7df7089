import { createHash } from 'node:crypto';
import { EmptyContentError } from '../errors';

/**
 * Canonical form hashed into a fingerprint: NFKC-normalized, every whitespace
 * run (tabs, newlines, non-breaking spaces) collapsed to one space, trimmed.
 * Case and markup are left as submitted.
 */
export const normalizeForFingerprint = (text: string): string =>
  text.normalize('NFKC').replace(/\s+/g, ' ').trim();

/** 64-char lowercase hex SHA-256 of the normalized text. */
export const generateFingerprint = (text: string): string => {
  const normalized = normalizeForFingerprint(text);
  if (!normalized) {
    throw new EmptyContentError();
  }
  return createHash('sha256').update(normalized, 'utf8').digest('hex');
};

export const isFingerprint = (value: string): boolean => /^[0-9a-f]{64}$/.test(value);
