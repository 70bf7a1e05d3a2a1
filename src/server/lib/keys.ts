import { createHash } from 'node:crypto';
import { ValidationError } from './errors';
import type { MetricKey } from './metric-definitions';

export const MAX_KEY_BYTES = 1024;
export const KEY_SEPARATOR = '|';
export const DIGEST_PREFIX = 'h-';

// Table-store keys may not contain / \ # ? or control characters.
const FORBIDDEN_KEY_CHARS = /[\/\\#?\u0000-\u001f\u007f-\u009f]/;

// A surrogate without its pair. UTF-8 encoding would replace it with U+FFFD.
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

export type DerivedKeys = {
  /** Partition holding the identity's metric rows. */
  partitionKey: string;
  /** Row of the identity's entry in the metadata partition. */
  rowKey: string;
};

export function keyByteLength(key: string): number {
  return Buffer.byteLength(key, 'utf8');
}

export function isValidStorageKey(key: string): boolean {
  return key.length > 0 && keyByteLength(key) <= MAX_KEY_BYTES && !FORBIDDEN_KEY_CHARS.test(key);
}

export function assertStorageKey(key: string, what: string): string {
  if (!key) throw new ValidationError(`${what} is empty`);
  if (keyByteLength(key) > MAX_KEY_BYTES) {
    throw new ValidationError(`${what} exceeds ${MAX_KEY_BYTES} bytes (${keyByteLength(key)})`);
  }
  if (FORBIDDEN_KEY_CHARS.test(key)) {
    throw new ValidationError(`${what} contains a character the table store does not allow`);
  }
  return key;
}

function requireText(value: string, field: string): string {
  if (typeof value !== 'string' || value === '') {
    throw new ValidationError(`${field} must be non-empty text`);
  }
  if (LONE_SURROGATE.test(value)) throw new ValidationError(`${field} is not well-formed text`);
  return value;
}

function isSafeComponent(value: string): boolean {
  return !value.includes(KEY_SEPARATOR) && !FORBIDDEN_KEY_CHARS.test(value);
}

/**
 * Digest of the literal pair. Each field is length-prefixed so that no two
 * distinct pairs share an encoding, whatever characters they contain.
 */
export function identityDigest(projectId: string, branch: string): string {
  requireText(projectId, 'projectId');
  requireText(branch, 'branch');
  const encoded = `${projectId.length}:${projectId}${KEY_SEPARATOR}${branch.length}:${branch}`;
  return DIGEST_PREFIX + createHash('sha256').update(encoded, 'utf8').digest('hex');
}

/**
 * Map a (project, branch) identity to its storage keys.
 *
 * The literal form `project|branch` is used when both fields are free of the
 * separator and of forbidden characters and the result fits the length bound.
 * Otherwise the keys are a SHA-256 digest of the pair. A literal key always
 * contains the separator and a digest never does, so the two forms are disjoint
 * and the mapping is injective.
 */
export function deriveKeys(projectId: string, branch: string): DerivedKeys {
  requireText(projectId, 'projectId');
  requireText(branch, 'branch');

  let key = `${projectId}${KEY_SEPARATOR}${branch}`;
  if (!isSafeComponent(projectId) || !isSafeComponent(branch) || keyByteLength(key) > MAX_KEY_BYTES) {
    key = identityDigest(projectId, branch);
  }

  assertStorageKey(key, 'Derived key');
  return { partitionKey: key, rowKey: key };
}

/** Row key of one metric observation inside an identity's partition. */
export function dataRowKey(observedAt: Date, metric: MetricKey): string {
  return assertStorageKey(`${observedAt.toISOString()}${KEY_SEPARATOR}${metric}`, 'Row key');
}
