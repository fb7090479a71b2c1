// Canonical signatures for rendered projections

import { createHash } from 'crypto';
import type { Subject } from '../models/project-index.js';
import type { Clause } from '../models/rfc.js';
import { ValidationError } from './errors.js';

/**
 * Version of the canonical form. Part of the hashed tree, so changing the
 * algorithm invalidates every existing projection.
 */
export const SIGNATURE_VERSION = 1;

const GENERATED_PREFIX = '<!-- GENERATED: do not edit. source=';
const SIGNATURE_PREFIX = '<!-- signature: sha256:';
const COMMENT_SUFFIX = ' -->';
const SIGNATURE_LINE = /^<!-- signature: sha256:([0-9a-f]{64}) -->$/;

function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Serialize a value to compact JSON with object keys sorted at every level.
 * Array order is kept and `undefined` object members are dropped.
 */
export function canonicalize(value: unknown): string {
  if (Array.isArray(value)) {
    const items: unknown[] = value;
    return `[${items.map(item => (item === undefined ? 'null' : canonicalize(item))).join(',')}]`;
  }

  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'boolean':
      return value ? 'true' : 'false';
    case 'number':
      if (!Number.isFinite(value)) {
        throw new ValidationError(`Cannot canonicalize non-finite number ${value}`);
      }
      return JSON.stringify(value);
    case 'object': {
      if (value === null) return 'null';
      const entries: [string, unknown][] = Object.entries(value);
      const members = entries
        .filter(([, member]) => member !== undefined)
        .sort(([a], [b]) => compareKeys(a, b))
        .map(([key, member]) => `${JSON.stringify(key)}:${canonicalize(member)}`);
      return `{${members.join(',')}}`;
    }
    default:
      throw new ValidationError(`Cannot canonicalize a value of type ${typeof value}`);
  }
}

/**
 * The tree that gets hashed. RFC clauses are sorted by id so that their
 * order on disk never affects the signature.
 */
export function signatureTree(subject: Subject): Record<string, unknown> {
  switch (subject.type) {
    case 'rfc': {
      const clauses: Clause[] = [...subject.clauses].sort((a, b) => compareKeys(a.id, b.id));
      return { signatureVersion: SIGNATURE_VERSION, kind: 'rfc', artifact: subject.rfc, clauses };
    }
    case 'adr':
      return { signatureVersion: SIGNATURE_VERSION, kind: 'adr', artifact: subject.adr };
    case 'work':
      return { signatureVersion: SIGNATURE_VERSION, kind: 'work', artifact: subject.item };
  }
}

/**
 * SHA-256 over the canonical form, as 64 lowercase hex characters
 */
export function computeSignature(subject: Subject): string {
  return createHash('sha256').update(canonicalize(signatureTree(subject)), 'utf8').digest('hex');
}

/**
 * The two comment lines every projection starts with
 */
export function formatSignatureHeader(sourceId: string, signature: string): string {
  return `${GENERATED_PREFIX}${sourceId}${COMMENT_SUFFIX}\n${SIGNATURE_PREFIX}${signature}${COMMENT_SUFFIX}`;
}

/**
 * Find the embedded signature in a rendered projection
 */
export function extractSignature(markdown: string): string | null {
  for (const line of markdown.split(/\r?\n/)) {
    const match = SIGNATURE_LINE.exec(line.trim());
    if (match?.[1]) return match[1];
  }
  return null;
}

/**
 * Find the source id named in the generated banner
 */
export function extractSourceId(markdown: string): string | null {
  for (const line of markdown.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed.startsWith(GENERATED_PREFIX) && trimmed.endsWith(COMMENT_SUFFIX)) {
      return trimmed.slice(GENERATED_PREFIX.length, -COMMENT_SUFFIX.length);
    }
  }
  return null;
}

export type VerificationResult =
  | { valid: true; signature: string }
  | { valid: false; reason: 'missing'; expected: string }
  | { valid: false; reason: 'mismatch'; expected: string; actual: string };

/**
 * Compare the signature embedded in a projection with the current source
 */
export function verifySignature(subject: Subject, markdown: string): VerificationResult {
  const expected = computeSignature(subject);
  const actual = extractSignature(markdown);

  if (actual === null) {
    return { valid: false, reason: 'missing', expected };
  }
  if (actual !== expected) {
    return { valid: false, reason: 'mismatch', expected, actual };
  }
  return { valid: true, signature: actual };
}
