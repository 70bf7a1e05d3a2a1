import { ValidationError } from '../src/server/lib/errors';
import {
  DIGEST_PREFIX,
  MAX_KEY_BYTES,
  dataRowKey,
  deriveKeys,
  identityDigest,
  isValidStorageKey,
} from '../src/server/lib/keys';
import { METADATA_PARTITION } from '../src/server/lib/metrics-store';

describe('deriveKeys', () => {
  it('uses the literal form for safe identities', () => {
    expect(deriveKeys('my-org_api', 'main')).toEqual({ partitionKey: 'my-org_api|main', rowKey: 'my-org_api|main' });
  });

  it('keeps unicode that the store accepts', () => {
    expect(deriveKeys('prøject', 'feature/ü').partitionKey).toBe(identityDigest('prøject', 'feature/ü'));
    expect(deriveKeys('prøject', 'fëature').partitionKey).toBe('prøject|fëature');
  });

  it('switches to a digest when a field holds the separator', () => {
    const keys = deriveKeys('a|b', 'c');
    expect(keys.partitionKey).toBe(identityDigest('a|b', 'c'));
    expect(keys.partitionKey.startsWith(DIGEST_PREFIX)).toBe(true);
    expect(keys.partitionKey).toHaveLength(DIGEST_PREFIX.length + 64);
  });

  it.each([
    ['slash', 'feature/login'],
    ['backslash', 'a\\b'],
    ['hash', 'fix#12'],
    ['question mark', 'why?'],
    ['tab', 'a\tb'],
    ['DEL', 'a\u007fb'],
    ['C1 control', 'a\u0085b'],
  ])('digests a branch containing a %s', (_label, branch) => {
    const keys = deriveKeys('proj', branch);
    expect(keys.partitionKey).toBe(identityDigest('proj', branch));
    expect(isValidStorageKey(keys.partitionKey)).toBe(true);
  });

  it('digests an identity whose literal form exceeds the byte bound', () => {
    const project = 'p'.repeat(MAX_KEY_BYTES);
    const keys = deriveKeys(project, 'main');
    expect(keys.partitionKey).toBe(identityDigest(project, 'main'));
  });

  it('counts UTF-8 bytes, not characters, against the bound', () => {
    // 342 three-byte characters = 1026 bytes, well under 1024 characters
    const project = '€'.repeat(342);
    expect(deriveKeys(project, 'x').partitionKey.startsWith(DIGEST_PREFIX)).toBe(true);
    const fits = '€'.repeat(340);
    expect(deriveKeys(fits, 'x').partitionKey).toBe(`${fits}|x`);
  });

  it('keeps partition key and row key equal', () => {
    for (const [p, b] of [
      ['a', 'b'],
      ['a/b', 'c'],
    ]) {
      const keys = deriveKeys(p, b);
      expect(keys.rowKey).toBe(keys.partitionKey);
    }
  });

  it.each([
    ['', 'main', 'projectId must be non-empty text'],
    ['proj', '', 'branch must be non-empty text'],
    ['p\uD800/x', 'main', 'projectId is not well-formed text'],
    ['proj', 'x\uDC00', 'branch is not well-formed text'],
  ])('rejects %j / %j', (project, branch, message) => {
    expect(() => deriveKeys(project, branch)).toThrow(ValidationError);
    expect(() => deriveKeys(project, branch)).toThrow(message);
  });

  it('accepts whitespace-only fields', () => {
    expect(deriveKeys('proj', ' ')).toEqual({ partitionKey: 'proj| ', rowKey: 'proj| ' });
    expect(deriveKeys('proj', '\t').partitionKey).toBe(identityDigest('proj', '\t'));
  });

  it('accepts paired surrogates', () => {
    expect(deriveKeys('proj-\uD83D\uDE00', 'main').partitionKey).toBe('proj-\uD83D\uDE00|main');
  });

  it('maps distinct identities to distinct keys', () => {
    const corpus: Array<[string, string]> = [
      ['a', 'b'],
      ['a|b', 'c'],
      ['a', 'b|c'],
      ['a|', 'b'],
      ['a', '|b'],
      ['ab', 'c'],
      ['a', 'bc'],
      ['a/b', 'c'],
      ['a', 'b/c'],
      ['a\\b', 'c'],
      ['a#b', 'c'],
      ['a?b', 'c'],
      ['a\nb', 'c'],
      ['a', 'b\n'],
      ['1:a', 'b'],
      ['1', ':ab'],
      ['h-abc', 'main'],
      ['h', '-abc|main'],
      ['proj', 'main'],
      ['proj ', 'main'],
      [' proj', 'main'],
      ['Proj', 'main'],
      ['proj', 'Main'],
      ['p'.repeat(1100), 'main'],
      ['p'.repeat(1099), 'pmain'],
      ['p\uFFFD/x', 'main'],
      ['p\uD83D\uDE00/x', 'main'],
      ['proj', ' '],
      ['proj', '  '],
    ];
    const seen = new Map<string, string>();
    for (const [project, branch] of corpus) {
      const { partitionKey } = deriveKeys(project, branch);
      const label = JSON.stringify([project, branch]);
      expect(seen.get(partitionKey)).toBeUndefined();
      seen.set(partitionKey, label);
    }
    expect(seen.size).toBe(corpus.length);
  });

  it('never derives the metadata partition name', () => {
    expect(deriveKeys('METADATA', 'PROJECTS').partitionKey).not.toBe(METADATA_PARTITION);
    expect(deriveKeys('METADATA_PROJECTS', 'main').partitionKey).toBe('METADATA_PROJECTS|main');
  });

  it('produces keys that satisfy the store constraints', () => {
    const inputs: Array<[string, string]> = [
      ['a', 'b'],
      ['x'.repeat(5000), 'y'],
      ['ctrl\u0000', 'z'],
      ['sp ace', 'feature/x?y#z'],
    ];
    for (const [p, b] of inputs) {
      const { partitionKey } = deriveKeys(p, b);
      expect(Buffer.byteLength(partitionKey, 'utf8')).toBeLessThanOrEqual(MAX_KEY_BYTES);
      expect(partitionKey).not.toMatch(/[\/\\#?\u0000-\u001f\u007f-\u009f]/);
    }
  });
});

describe('dataRowKey', () => {
  it('joins the ISO timestamp and metric', () => {
    expect(dataRowKey(new Date('2024-03-01T12:00:00Z'), 'coverage')).toBe('2024-03-01T12:00:00.000Z|coverage');
  });
});

describe('isValidStorageKey', () => {
  it('rejects empty, oversized and forbidden keys', () => {
    expect(isValidStorageKey('')).toBe(false);
    expect(isValidStorageKey('k'.repeat(MAX_KEY_BYTES + 1))).toBe(false);
    expect(isValidStorageKey('a/b')).toBe(false);
    expect(isValidStorageKey('k'.repeat(MAX_KEY_BYTES))).toBe(true);
  });
});
