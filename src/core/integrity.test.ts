// Integrity tests

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  canonicalize,
  computeSignature,
  formatSignatureHeader,
  extractSignature,
  extractSourceId,
  verifySignature
} from './integrity.js';
import type { Subject } from '../models/project-index.js';
import { createTestRFC, createTestClause, createTestWorkItem } from '../testing/fixtures.js';

const rfcSubject = (clauses = [createTestClause()]): Subject => ({
  type: 'rfc',
  id: 'RFC-0001',
  rfc: createTestRFC(),
  clauses
});

/**
 * Rebuild a JSON-like value with every object's keys inserted in reverse order
 */
function reverseKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(reverseKeys);
  if (value !== null && typeof value === 'object') {
    const entries: [string, unknown][] = Object.entries(value);
    return Object.fromEntries(entries.reverse().map(([key, member]) => [key, reverseKeys(member)]));
  }
  return value;
}

describe('canonicalize', () => {
  it('should sort keys at every level', () => {
    expect(canonicalize({ b: 1, a: { d: true, c: null } })).toBe('{"a":{"c":null,"d":true},"b":1}');
  });

  it('should preserve array order', () => {
    expect(canonicalize({ list: ['z', 'a'] })).toBe('{"list":["z","a"]}');
  });

  it('should drop undefined members', () => {
    expect(canonicalize({ a: undefined, b: 'x' })).toBe('{"b":"x"}');
  });

  it('should escape strings like JSON', () => {
    expect(canonicalize('line\n"quoted"')).toBe('"line\\n\\"quoted\\""');
  });

  it('should be insensitive to key insertion order', () => {
    fc.assert(
      fc.property(fc.jsonValue(), value => {
        expect(canonicalize(reverseKeys(value))).toBe(canonicalize(value));
      })
    );
  });
});

describe('computeSignature', () => {
  it('should return a 64-character lowercase hex string', () => {
    expect(computeSignature(rfcSubject())).toMatch(/^[a-f0-9]{64}$/);
  });

  it('should not depend on the order clauses are listed in', () => {
    const a = createTestClause({ id: 'C-ALPHA', title: 'Alpha' });
    const b = createTestClause({ id: 'C-BETA', title: 'Beta' });
    const c = createTestClause({ id: 'C-GAMMA', title: 'Gamma' });
    const expected = computeSignature(rfcSubject([a, b, c]));

    fc.assert(
      fc.property(fc.shuffledSubarray([a, b, c], { minLength: 3, maxLength: 3 }), clauses => {
        expect(computeSignature(rfcSubject(clauses))).toBe(expected);
      })
    );
  });

  it('should not depend on the key order of the record', () => {
    const item = createTestWorkItem({ refs: ['RFC-0001'], notes: ['first'] });
    const reordered = {
      acceptanceCriteria: item.acceptanceCriteria,
      notes: item.notes,
      description: item.description,
      refs: item.refs,
      created: item.created,
      status: item.status,
      title: item.title,
      id: item.id,
      type: item.type
    };
    expect(computeSignature({ type: 'work', id: item.id, item: reordered })).toBe(
      computeSignature({ type: 'work', id: item.id, item })
    );
  });

  it('should change when any clause text changes', () => {
    const before = computeSignature(rfcSubject());
    const after = computeSignature(rfcSubject([createTestClause({ text: 'Records MUST be stored as JSON.' })]));
    expect(after).not.toBe(before);
  });
});

describe('signature header', () => {
  const signature = 'a'.repeat(64);

  it('should format the two banner lines', () => {
    expect(formatSignatureHeader('RFC-0001', signature)).toBe(
      `<!-- GENERATED: do not edit. source=RFC-0001 -->\n<!-- signature: sha256:${signature} -->`
    );
  });

  it('should extract what it formats', () => {
    const markdown = `${formatSignatureHeader('WI-0001', signature)}\n\n# WI-0001: Task\n`;
    expect(extractSignature(markdown)).toBe(signature);
    expect(extractSourceId(markdown)).toBe('WI-0001');
  });

  it('should return null when no signature line exists', () => {
    expect(extractSignature('# Hand written\n')).toBeNull();
  });
});

describe('verifySignature', () => {
  it('should accept a projection of the current source', () => {
    const subject = rfcSubject();
    const markdown = formatSignatureHeader('RFC-0001', computeSignature(subject));
    expect(verifySignature(subject, markdown).valid).toBe(true);
  });

  it('should report a stale projection as a mismatch', () => {
    const markdown = formatSignatureHeader('RFC-0001', computeSignature(rfcSubject()));
    const changed = rfcSubject([createTestClause({ status: 'deprecated' })]);
    const result = verifySignature(changed, markdown);
    expect(result).toMatchObject({ valid: false, reason: 'mismatch' });
  });

  it('should report a projection without a signature line as missing', () => {
    expect(verifySignature(rfcSubject(), '# RFC-0001\n')).toMatchObject({ valid: false, reason: 'missing' });
  });
});
