// Artifact union and shared fields

import type { ArtifactType } from './types.js';
import type { RFC, Clause } from './rfc.js';
import type { ADR } from './adr.js';
import type { WorkItem } from './work-item.js';

/**
 * Fields every stored record carries
 */
export interface ArtifactBase {
  id: string;
  type: ArtifactType;
  title: string;
}

/**
 * Any record the store can hold
 */
export type Artifact = RFC | Clause | ADR | WorkItem;

/**
 * Global id of a record: clauses are scoped by their RFC
 */
export function globalId(artifact: Artifact): string {
  return artifact.type === 'clause' ? `${artifact.rfcId}:${artifact.id}` : artifact.id;
}
