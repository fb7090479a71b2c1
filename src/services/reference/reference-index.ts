// Bidirectional id index: id -> entry and id -> structural referrers

import type { ProjectIndex } from '../../models/project-index.js';
import type { RFC, Clause } from '../../models/rfc.js';
import type { ADR } from '../../models/adr.js';
import type { IndexEntry, ReferenceOccurrence, TargetState } from '../../models/reference.js';

const ACTIVE: TargetState = { state: 'active' };

function rfcState(rfc: RFC): TargetState {
  return rfc.status === 'deprecated' ? { state: 'outdated', reason: `${rfc.id} is deprecated` } : ACTIVE;
}

function clauseState(rfc: RFC, clause: Clause): TargetState {
  const id = `${rfc.id}:${clause.id}`;
  if (clause.status === 'superseded') {
    const by = clause.supersededBy ? ` by ${rfc.id}:${clause.supersededBy}` : '';
    return { state: 'outdated', reason: `${id} is superseded${by}` };
  }
  if (clause.status === 'deprecated') {
    return { state: 'outdated', reason: `${id} is deprecated` };
  }
  if (rfc.status === 'deprecated') {
    return { state: 'outdated', reason: `${id} belongs to deprecated ${rfc.id}` };
  }
  return ACTIVE;
}

function adrState(adr: ADR): TargetState {
  if (adr.status !== 'superseded') return ACTIVE;
  const by = adr.supersededBy ? ` by ${adr.supersededBy}` : '';
  return { state: 'outdated', reason: `${adr.id} is superseded${by}` };
}

/**
 * Structural references only: refs arrays and supersededBy links
 */
export function structuralReferences(index: ProjectIndex): ReferenceOccurrence[] {
  const occurrences: ReferenceOccurrence[] = [];

  for (const { rfc, clauses } of index.rfcs) {
    for (const clause of clauses) {
      if (clause.supersededBy) {
        occurrences.push({
          sourceId: `${rfc.id}:${clause.id}`,
          targetId: `${rfc.id}:${clause.supersededBy}`,
          surface: 'superseded-by',
          field: 'supersededBy'
        });
      }
    }
  }

  for (const adr of index.adrs) {
    for (const targetId of adr.refs) {
      occurrences.push({ sourceId: adr.id, targetId, surface: 'refs', field: 'refs' });
    }
    if (adr.supersededBy) {
      occurrences.push({ sourceId: adr.id, targetId: adr.supersededBy, surface: 'superseded-by', field: 'supersededBy' });
    }
  }

  for (const item of index.workItems) {
    for (const targetId of item.refs) {
      occurrences.push({ sourceId: item.id, targetId, surface: 'refs', field: 'refs' });
    }
  }

  return occurrences;
}

export class ReferenceIndex {
  private readonly entries = new Map<string, IndexEntry>();
  private readonly referrers = new Map<string, Set<string>>();

  private constructor() {}

  /**
   * Build the index for one invocation's snapshot of the store
   */
  static build(index: ProjectIndex): ReferenceIndex {
    const refIndex = new ReferenceIndex();

    for (const { rfc, clauses } of index.rfcs) {
      refIndex.add({ id: rfc.id, type: 'rfc', title: rfc.title, lifecycle: rfcState(rfc) });
      for (const clause of clauses) {
        refIndex.add({
          id: `${rfc.id}:${clause.id}`,
          type: 'clause',
          title: clause.title,
          lifecycle: clauseState(rfc, clause)
        });
      }
    }
    for (const adr of index.adrs) {
      refIndex.add({ id: adr.id, type: 'adr', title: adr.title, lifecycle: adrState(adr) });
    }
    for (const item of index.workItems) {
      refIndex.add({ id: item.id, type: 'work', title: item.title, lifecycle: ACTIVE });
    }

    for (const occurrence of structuralReferences(index)) {
      const set = refIndex.referrers.get(occurrence.targetId) ?? new Set<string>();
      set.add(occurrence.sourceId);
      refIndex.referrers.set(occurrence.targetId, set);
    }

    return refIndex;
  }

  private add(entry: IndexEntry): void {
    this.entries.set(entry.id, entry);
  }

  lookup(id: string): IndexEntry | undefined {
    return this.entries.get(id);
  }

  /**
   * Ids holding a structural reference to `id`, sorted
   */
  referrersOf(id: string): string[] {
    return [...(this.referrers.get(id) ?? [])].sort();
  }
}
