// Reference models

import type { ArtifactType } from './types.js';

/**
 * Where a reference was found
 * - refs: a structured `refs` array
 * - superseded-by: a `supersededBy` field
 * - mention: an inline mention inside a content field
 * - source: an inline mention inside an external source file
 */
export type ReferenceSurface = 'refs' | 'superseded-by' | 'mention' | 'source';

export interface ReferenceOccurrence {
  /** Referring artifact id, or the file path for external sources */
  sourceId: string;
  targetId: string;
  surface: ReferenceSurface;
  /** Content field the mention sits in */
  field?: string;
  file?: string;
  line?: number;
}

/**
 * Lifecycle state of a reference target
 */
export type TargetState = { state: 'active' } | { state: 'outdated'; reason: string };

export interface IndexEntry {
  id: string;
  type: ArtifactType;
  title: string;
  lifecycle: TargetState;
}

export interface ResolvedRef extends ReferenceOccurrence {
  target: IndexEntry;
}

export interface ResolvedRefs {
  resolved: ResolvedRef[];
}
