// Read-only views of the store: list, status counts and field lookup

import * as yaml from 'yaml';
import {
  RFC_STATUSES,
  RFC_PHASES,
  CLAUSE_STATUSES,
  ADR_STATUSES,
  WORK_ITEM_STATUSES,
  isOneOf,
  type ArtifactType,
  type RFCStatus,
  type RFCPhase,
  type ClauseStatus,
  type ADRStatus,
  type WorkItemStatus
} from '../../models/types.js';
import { globalId, type Artifact } from '../../models/artifact.js';
import type { RFC, Clause } from '../../models/rfc.js';
import type { ADR } from '../../models/adr.js';
import type { WorkItem } from '../../models/work-item.js';
import { validateId } from '../../core/validation.js';
import { NotFoundError, ValidationError } from '../../core/errors.js';
import type { FileStore } from '../storage/file-store.js';
import { FIELD_ALIASES } from '../edit/edit-service.js';

const STATUSES_BY_TYPE: Readonly<Record<ArtifactType, readonly string[]>> = {
  rfc: RFC_STATUSES,
  clause: CLAUSE_STATUSES,
  adr: ADR_STATUSES,
  work: WORK_ITEM_STATUSES
};

export interface ListOptions {
  /** Only records in this status */
  status?: string;
  /** At most this many rows */
  limit?: number;
}

/**
 * One row of `list`
 */
export interface ListEntry {
  id: string;
  title: string;
  status: string;
  phase?: RFCPhase;
  version?: string;
}

export interface StatusCount<T extends string> {
  status: T;
  count: number;
}

export interface StatusSummary {
  rfc: StatusCount<RFCStatus>[];
  phases: StatusCount<RFCPhase>[];
  clause: StatusCount<ClauseStatus>[];
  adr: StatusCount<ADRStatus>[];
  work: StatusCount<WorkItemStatus>[];
}

function countBy<T extends string>(keys: readonly T[], values: readonly T[]): StatusCount<T>[] {
  return keys.map(status => ({ status, count: values.filter(value => value === status).length }));
}

function toListEntry(artifact: Artifact): ListEntry {
  const entry: ListEntry = { id: globalId(artifact), title: artifact.title, status: artifact.status };
  if (artifact.type === 'rfc') {
    entry.phase = artifact.phase;
    entry.version = artifact.version;
  }
  return entry;
}

function unknownField(type: ArtifactType, field: string): never {
  throw new ValidationError(`Unknown ${type} field "${field}"`, 'field');
}

function rfcField(rfc: RFC, field: string): string {
  switch (field) {
    case 'title': return rfc.title;
    case 'version': return rfc.version;
    case 'status': return rfc.status;
    case 'phase': return rfc.phase;
    case 'owners': return rfc.owners.join(', ');
    case 'created': return rfc.created;
    case 'updated': return rfc.updated ?? '';
    case 'amendable': return String(rfc.amendable);
    case 'sections': return rfc.sections.map(section => `${section.title}: ${section.clauses.join(', ')}`).join('\n');
    case 'changelog': return rfc.changelog.map(entry => `${entry.version} (${entry.date}) ${entry.summary}`).join('\n');
  }
  return unknownField('rfc', field);
}

function clauseField(clause: Clause, field: string): string {
  switch (field) {
    case 'title': return clause.title;
    case 'text': return clause.text;
    case 'kind': return clause.kind;
    case 'status': return clause.status;
    case 'since': return clause.since ?? '';
    case 'supersededBy': return clause.supersededBy ?? '';
  }
  return unknownField('clause', field);
}

function adrField(adr: ADR, field: string): string {
  switch (field) {
    case 'title': return adr.title;
    case 'status': return adr.status;
    case 'date': return adr.date;
    case 'supersededBy': return adr.supersededBy ?? '';
    case 'refs': return adr.refs.join(', ');
    case 'context': return adr.context;
    case 'decision': return adr.decision;
    case 'consequences': return adr.consequences;
    case 'alternatives': return adr.alternatives.map(alternative => alternative.text).join('\n');
  }
  return unknownField('adr', field);
}

function workItemField(item: WorkItem, field: string): string {
  switch (field) {
    case 'title': return item.title;
    case 'status': return item.status;
    case 'created': return item.created;
    case 'started': return item.started ?? '';
    case 'completed': return item.completed ?? '';
    case 'refs': return item.refs.join(', ');
    case 'description': return item.description;
    case 'notes': return item.notes.join('\n');
    case 'acceptanceCriteria':
      return item.acceptanceCriteria.map(criterion => `[${criterion.status}] ${criterion.text}`).join('\n');
  }
  return unknownField('work', field);
}

/**
 * Text form of one field. Lists are joined with ", ", multi-line entries
 * one per line.
 */
export function formatField(artifact: Artifact, field: string): string {
  const name = FIELD_ALIASES[field] ?? field;
  switch (artifact.type) {
    case 'rfc':
      return rfcField(artifact, name);
    case 'clause':
      return clauseField(artifact, name);
    case 'adr':
      return adrField(artifact, name);
    case 'work':
      return workItemField(artifact, name);
  }
}

export class QueryService {
  constructor(private readonly store: FileStore) {}

  list(type: ArtifactType, options: ListOptions = {}): ListEntry[] {
    const { status, limit } = options;
    if (status !== undefined && !isOneOf(STATUSES_BY_TYPE[type], status)) {
      throw new ValidationError(
        `Invalid ${type} status "${status}". Expected one of: ${STATUSES_BY_TYPE[type].join(', ')}`,
        'status'
      );
    }
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
      throw new ValidationError(`Limit must be a positive integer, got ${limit}`, 'limit');
    }

    const entries = this.store
      .loadAll(type)
      .filter(artifact => status === undefined || artifact.status === status)
      .map(toListEntry);
    return limit === undefined ? entries : entries.slice(0, limit);
  }

  status(): StatusSummary {
    const rfcs = this.store.loadRFCs();
    const clauses = rfcs.flatMap(rfc => this.store.loadClauses(rfc.id));
    return {
      rfc: countBy(RFC_STATUSES, rfcs.map(rfc => rfc.status)),
      phases: countBy(RFC_PHASES, rfcs.map(rfc => rfc.phase)),
      clause: countBy(CLAUSE_STATUSES, clauses.map(clause => clause.status)),
      adr: countBy(ADR_STATUSES, this.store.loadADRs().map(adr => adr.status)),
      work: countBy(WORK_ITEM_STATUSES, this.store.loadWorkItems().map(item => item.status))
    };
  }

  /**
   * One record as YAML, or the text of one of its fields
   */
  get(id: string, field?: string): string {
    const parsed = validateId(id);
    const artifact = this.store.get(parsed.id);
    if (!artifact) {
      throw new NotFoundError('Artifact', parsed.id);
    }
    return field === undefined ? yaml.stringify(artifact) : formatField(artifact, field);
  }
}
