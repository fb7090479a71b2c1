// Lifecycle tables: status graphs, the RFC status/phase matrix and the gates built on them

import type {
  ArtifactType,
  RFCStatus,
  RFCPhase,
  ClauseStatus,
  ADRStatus,
  WorkItemStatus
} from '../../models/types.js';
import type { RFC } from '../../models/rfc.js';
import type { WorkItem } from '../../models/work-item.js';
import { createDiagnostic, type Diagnostic } from '../../models/diagnostic.js';

/**
 * Allowed forward edges per state. States mapping to [] are terminal.
 */
export type TransitionTable<S extends string> = Readonly<Record<S, readonly S[]>>;

export const RFC_STATUS_TRANSITIONS: TransitionTable<RFCStatus> = {
  draft: ['normative'],
  normative: ['deprecated'],
  deprecated: []
};

export const RFC_PHASE_TRANSITIONS: TransitionTable<RFCPhase> = {
  spec: ['impl'],
  impl: ['test'],
  test: ['stable'],
  stable: []
};

export const CLAUSE_TRANSITIONS: TransitionTable<ClauseStatus> = {
  active: ['superseded', 'deprecated'],
  superseded: [],
  deprecated: []
};

export const ADR_TRANSITIONS: TransitionTable<ADRStatus> = {
  proposed: ['accepted', 'rejected'],
  accepted: ['superseded'],
  rejected: [],
  superseded: []
};

export const WORK_ITEM_TRANSITIONS: TransitionTable<WorkItemStatus> = {
  queue: ['active', 'cancelled'],
  active: ['done', 'cancelled'],
  done: [],
  cancelled: []
};

/**
 * Compatibility of an RFC (status, phase) pair
 */
export type Compatibility = 'allowed' | 'warn' | 'forbidden';

export const STATUS_PHASE_TABLE: Readonly<Record<RFCStatus, Readonly<Record<RFCPhase, Compatibility>>>> = {
  draft: { spec: 'allowed', impl: 'forbidden', test: 'forbidden', stable: 'forbidden' },
  normative: { spec: 'allowed', impl: 'allowed', test: 'allowed', stable: 'allowed' },
  deprecated: { spec: 'warn', impl: 'forbidden', test: 'forbidden', stable: 'allowed' }
};

const STATUS_PHASE_REASONS: Partial<Record<`${RFCStatus}/${RFCPhase}`, string>> = {
  'draft/impl': 'a draft RFC may not leave the spec phase',
  'draft/test': 'a draft RFC may not leave the spec phase',
  'draft/stable': 'a draft RFC can never be stable',
  'deprecated/impl': 'a deprecated RFC cannot be under implementation',
  'deprecated/test': 'a deprecated RFC cannot be under test',
  'deprecated/spec': 'RFC was deprecated before any implementation'
};

export function canTransition<S extends string>(table: TransitionTable<S>, from: S, to: S): boolean {
  return table[from].includes(to);
}

export function statusPhaseCompatibility(status: RFCStatus, phase: RFCPhase): Compatibility {
  return STATUS_PHASE_TABLE[status][phase];
}

/**
 * Check a transition against its table
 *
 * @returns [] when the edge exists, otherwise one INVALID_TRANSITION
 */
export function checkTransition<S extends string>(
  table: TransitionTable<S>,
  kind: ArtifactType | 'phase',
  artifactId: string,
  from: S,
  to: S
): Diagnostic[] {
  if (canTransition(table, from, to)) return [];
  const allowed = table[from];
  const hint = allowed.length > 0 ? `allowed: ${allowed.join(', ')}` : `${from} is terminal`;
  return [
    createDiagnostic('INVALID_TRANSITION', artifactId, `Invalid ${kind} transition ${from} -> ${to} (${hint})`)
  ];
}

/**
 * Look up a (status, phase) pair in the compatibility table
 */
export function checkStatusPhase(rfcId: string, status: RFCStatus, phase: RFCPhase): Diagnostic[] {
  const compatibility = statusPhaseCompatibility(status, phase);
  if (compatibility === 'allowed') return [];

  const reason = STATUS_PHASE_REASONS[`${status}/${phase}`] ?? 'incompatible status and phase';
  const code = compatibility === 'forbidden' ? 'STATUS_PHASE_FORBIDDEN' : 'STATUS_PHASE_WARNING';
  return [createDiagnostic(code, rfcId, `status=${status} with phase=${phase}: ${reason}`)];
}

/**
 * A work item may be done only with criteria, none of them pending
 */
export function checkCompletionGate(item: WorkItem): Diagnostic[] {
  if (item.acceptanceCriteria.length === 0) {
    return [createDiagnostic('CRITERIA_INCOMPLETE', item.id, 'Cannot complete a work item without acceptance criteria')];
  }
  const pending = item.acceptanceCriteria.filter(criterion => criterion.status === 'pending');
  if (pending.length > 0) {
    const list = pending.map(criterion => `"${criterion.text}"`).join(', ');
    return [createDiagnostic('CRITERIA_INCOMPLETE', item.id, `${pending.length} acceptance criteria still pending: ${list}`)];
  }
  return [];
}

/**
 * Whether the content of an RFC and its clauses may be edited right now.
 * Draft: always. Normative: only while amendable. Deprecated: never.
 */
export function checkAmendment(rfc: RFC): Diagnostic[] {
  switch (rfc.status) {
    case 'draft':
      return [];
    case 'normative':
      return rfc.amendable
        ? []
        : [createDiagnostic('AMENDMENT_NOT_OPEN', rfc.id, `${rfc.id} is normative; open an amendment before editing it`)];
    case 'deprecated':
      return [createDiagnostic('AMENDMENT_NOT_OPEN', rfc.id, `${rfc.id} is deprecated and can no longer be amended`)];
  }
}
