// Core type definitions for docgov

// Artifact types. A clause is addressed as RFC-NNNN:C-NAME.
export const ARTIFACT_TYPES = ['rfc', 'clause', 'adr', 'work'] as const;
export type ArtifactType = (typeof ARTIFACT_TYPES)[number];

// Artifact types that have their own rendered projection
export const RENDERABLE_TYPES = ['rfc', 'adr', 'work'] as const;
export type RenderableType = (typeof RENDERABLE_TYPES)[number];

// Status types
export const RFC_STATUSES = ['draft', 'normative', 'deprecated'] as const;
export type RFCStatus = (typeof RFC_STATUSES)[number];

export const RFC_PHASES = ['spec', 'impl', 'test', 'stable'] as const;
export type RFCPhase = (typeof RFC_PHASES)[number];

export const CLAUSE_KINDS = ['normative', 'informative'] as const;
export type ClauseKind = (typeof CLAUSE_KINDS)[number];

export const CLAUSE_STATUSES = ['active', 'superseded', 'deprecated'] as const;
export type ClauseStatus = (typeof CLAUSE_STATUSES)[number];

export const ADR_STATUSES = ['proposed', 'accepted', 'rejected', 'superseded'] as const;
export type ADRStatus = (typeof ADR_STATUSES)[number];

export const WORK_ITEM_STATUSES = ['queue', 'active', 'done', 'cancelled'] as const;
export type WorkItemStatus = (typeof WORK_ITEM_STATUSES)[number];

export const CRITERION_STATUSES = ['pending', 'done', 'cancelled'] as const;
export type CriterionStatus = (typeof CRITERION_STATUSES)[number];

// Changelog categories, in Keep a Changelog section order. `chore` is never published.
export const CHANGELOG_CATEGORIES = ['added', 'changed', 'deprecated', 'removed', 'fixed', 'security', 'chore'] as const;
export type ChangelogCategory = (typeof CHANGELOG_CATEGORIES)[number];

export type BumpLevel = 'major' | 'minor' | 'patch';

/**
 * Type guard for membership in one of the closed value lists above
 */
export function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some(candidate => candidate === value);
}
