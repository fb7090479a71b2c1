// Input validation and sanitization utilities

import { ValidationError, SecurityError } from './errors.js';
import type { ArtifactType, BumpLevel } from '../models/types.js';

/**
 * Valid artifact ID patterns
 */
export const ID_PATTERNS: Record<ArtifactType, RegExp> = {
  rfc: /^RFC-\d{4}$/,
  clause: /^C-[A-Z0-9]+(?:-[A-Z0-9]+)*$/,
  adr: /^ADR-\d{4}$/,
  work: /^WI-(?:\d{4}-\d{2}-\d{2}-\d{3}|\d{4})$/
};

const ID_FORMAT_HINTS: Record<ArtifactType, string> = {
  rfc: 'RFC-NNNN',
  clause: 'RFC-NNNN:C-NAME',
  adr: 'ADR-NNNN',
  work: 'WI-YYYY-MM-DD-NNN or WI-NNNN'
};

/**
 * Semantic version, with optional pre-release and build metadata
 */
export const SEMVER_PATTERN =
  /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?(?:\+([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?$/;

export const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Path traversal patterns
 */
const PATH_TRAVERSAL_PATTERNS = [
  /\.\./,           // Parent directory
  /^[/\\]/,         // Absolute path
  /^[a-zA-Z]:/,     // Windows drive letter
  /[/\\]/,          // Any separator
  /\0/,             // Null byte
];

/**
 * Maximum lengths for various fields
 */
export const MAX_LENGTHS = {
  id: 120,
  title: 200,
  owner: 100
};

/**
 * A global id split into its parts. For a clause, `id` is RFC-NNNN:C-NAME.
 */
export type ParsedId =
  | { type: 'rfc' | 'adr' | 'work'; id: string }
  | { type: 'clause'; id: string; rfcId: string; clauseId: string };

/**
 * Split a global id into its parts, or null when it matches no known format
 */
export function parseArtifactId(id: string): ParsedId | null {
  const separator = id.indexOf(':');
  if (separator !== -1) {
    const rfcId = id.slice(0, separator);
    const clauseId = id.slice(separator + 1);
    if (ID_PATTERNS.rfc.test(rfcId) && ID_PATTERNS.clause.test(clauseId)) {
      return { type: 'clause', id, rfcId, clauseId };
    }
    return null;
  }
  if (ID_PATTERNS.rfc.test(id)) return { type: 'rfc', id };
  if (ID_PATTERNS.adr.test(id)) return { type: 'adr', id };
  if (ID_PATTERNS.work.test(id)) return { type: 'work', id };
  return null;
}

/**
 * Validates and normalizes a global artifact ID
 */
export function validateId(id: string, type?: ArtifactType): ParsedId {
  if (!id || typeof id !== 'string') {
    throw new ValidationError('ID is required', 'id');
  }

  const trimmed = id.trim().toUpperCase();

  if (trimmed.length > MAX_LENGTHS.id) {
    throw new ValidationError(`ID exceeds maximum length of ${MAX_LENGTHS.id}`, 'id');
  }

  for (const pattern of PATH_TRAVERSAL_PATTERNS) {
    if (pattern.test(trimmed)) {
      throw new SecurityError(`Invalid ID: potential path traversal detected`, { id });
    }
  }

  const parsed = parseArtifactId(trimmed);
  if (!parsed) {
    const expected = type ? ID_FORMAT_HINTS[type] : Object.values(ID_FORMAT_HINTS).join(', ');
    throw new ValidationError(`Invalid ID format "${id}". Expected: ${expected}`, 'id');
  }
  if (type && parsed.type !== type) {
    throw new ValidationError(`Expected a ${type} ID (${ID_FORMAT_HINTS[type]}), got "${id}"`, 'id');
  }

  return parsed;
}

/**
 * Derive a clause id from a free-form name: "Error handling" -> C-ERROR-HANDLING
 */
export function toClauseId(name: string): string {
  const body = name
    .trim()
    .toUpperCase()
    .replace(/^C-/, '')
    .replace(/[^A-Z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');

  if (body.length === 0) {
    throw new ValidationError(`Cannot derive a clause id from "${name}"`, 'name');
  }

  return `C-${body}`;
}

export function isSemver(version: string): boolean {
  return SEMVER_PATTERN.test(version);
}

export function validateVersion(version: string, field = 'version'): string {
  const trimmed = version.trim().replace(/^v/, '');
  if (!isSemver(trimmed)) {
    throw new ValidationError(`Invalid semantic version "${version}"`, field);
  }
  return trimmed;
}

/**
 * Raise a version by one level. Pre-release and build metadata are dropped.
 */
export function bumpVersion(version: string, level: BumpLevel): string {
  const match = SEMVER_PATTERN.exec(version);
  if (!match) {
    throw new ValidationError(`Invalid semantic version "${version}"`, 'version');
  }
  const major = Number(match[1]);
  const minor = Number(match[2]);
  const patch = Number(match[3]);

  switch (level) {
    case 'major':
      return `${major + 1}.0.0`;
    case 'minor':
      return `${major}.${minor + 1}.0`;
    case 'patch':
      return `${major}.${minor}.${patch + 1}`;
  }
}

export function validateDate(date: string, field = 'date'): string {
  if (!DATE_PATTERN.test(date) || Number.isNaN(Date.parse(date))) {
    throw new ValidationError(`Invalid date "${date}". Expected: YYYY-MM-DD`, field);
  }
  return date;
}

/**
 * Validates and sanitizes a title
 */
export function validateTitle(title: string): string {
  if (!title || typeof title !== 'string') {
    throw new ValidationError('Title is required', 'title');
  }

  const trimmed = title.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('Title cannot be empty', 'title');
  }

  if (trimmed.length > MAX_LENGTHS.title) {
    throw new ValidationError(`Title exceeds maximum length of ${MAX_LENGTHS.title}`, 'title');
  }

  return trimmed;
}

export function validateOwner(owner: string): string {
  const trimmed = owner.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('Owner cannot be empty', 'owners');
  }

  if (trimmed.length > MAX_LENGTHS.owner) {
    throw new ValidationError(`Owner exceeds maximum length of ${MAX_LENGTHS.owner}`, 'owners');
  }

  return trimmed;
}

/**
 * Rejects a path component that could escape its parent directory
 */
export function sanitizePath(pathComponent: string): string {
  if (!pathComponent || typeof pathComponent !== 'string') {
    throw new SecurityError('Invalid path component');
  }

  for (const pattern of PATH_TRAVERSAL_PATTERNS) {
    if (pattern.test(pathComponent)) {
      throw new SecurityError('Path traversal detected', { path: pathComponent });
    }
  }

  return pathComponent;
}
