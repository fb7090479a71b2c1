// In-memory view of the whole store, loaded fresh per invocation

import type { Artifact } from './artifact.js';
import type { RFC, Clause } from './rfc.js';
import type { ADR } from './adr.js';
import type { WorkItem, Release } from './work-item.js';

export interface RFCEntry {
  rfc: RFC;
  /** Every clause file under the RFC directory, sorted by id */
  clauses: Clause[];
}

export interface ProjectIndex {
  rfcs: RFCEntry[];
  adrs: ADR[];
  workItems: WorkItem[];
  /** Newest first */
  releases: Release[];
}

/**
 * An artifact that has its own markdown projection
 */
export type Subject =
  | { type: 'rfc'; id: string; rfc: RFC; clauses: Clause[] }
  | { type: 'adr'; id: string; adr: ADR }
  | { type: 'work'; id: string; item: WorkItem };

export function findRFC(index: ProjectIndex, id: string): RFCEntry | undefined {
  return index.rfcs.find(entry => entry.rfc.id === id);
}

/**
 * Look up a clause by its global id (RFC-NNNN:C-NAME)
 */
export function findClause(index: ProjectIndex, qualifiedId: string): Clause | undefined {
  const [rfcId, clauseId] = qualifiedId.split(':');
  if (!rfcId || !clauseId) return undefined;
  return findRFC(index, rfcId)?.clauses.find(clause => clause.id === clauseId);
}

export function findArtifact(index: ProjectIndex, id: string): Artifact | undefined {
  if (id.includes(':')) return findClause(index, id);
  if (id.startsWith('RFC-')) return findRFC(index, id)?.rfc;
  if (id.startsWith('ADR-')) return index.adrs.find(adr => adr.id === id);
  if (id.startsWith('WI-')) return index.workItems.find(item => item.id === id);
  return undefined;
}

export function findSubject(index: ProjectIndex, id: string): Subject | undefined {
  const entry = findRFC(index, id);
  if (entry) return { type: 'rfc', id, rfc: entry.rfc, clauses: entry.clauses };
  const adr = index.adrs.find(candidate => candidate.id === id);
  if (adr) return { type: 'adr', id, adr };
  const item = index.workItems.find(candidate => candidate.id === id);
  if (item) return { type: 'work', id, item };
  return undefined;
}

/**
 * Every renderable subject, RFCs first, each group sorted by id
 */
export function allSubjects(index: ProjectIndex): Subject[] {
  return [
    ...index.rfcs.map((entry): Subject => ({ type: 'rfc', id: entry.rfc.id, rfc: entry.rfc, clauses: entry.clauses })),
    ...index.adrs.map((adr): Subject => ({ type: 'adr', id: adr.id, adr })),
    ...index.workItems.map((item): Subject => ({ type: 'work', id: item.id, item }))
  ];
}
