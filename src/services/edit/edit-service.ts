// Field-level edits to stored records

import type { Artifact } from '../../models/artifact.js';
import type { ArtifactType, ChangelogCategory, CriterionStatus } from '../../models/types.js';
import { CLAUSE_KINDS, isOneOf } from '../../models/types.js';
import type { RFC, Clause } from '../../models/rfc.js';
import type { ADR } from '../../models/adr.js';
import type { WorkItem, AcceptanceCriterion } from '../../models/work-item.js';
import { findArtifact, findRFC, type ProjectIndex } from '../../models/project-index.js';
import { applied, hasErrors, refused, type OperationResult } from '../../models/diagnostic.js';
import {
  validateId,
  validateTitle,
  validateOwner,
  validateVersion,
  validateDate
} from '../../core/validation.js';
import { NotFoundError, ValidationError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import type { FileStore } from '../storage/file-store.js';
import { isoDate } from '../id-generator.js';
import { checkAmendment, checkCompletionGate } from '../lifecycle/state-machine.js';
import { createCriterion } from '../work/work-service.js';

export type FieldShape = 'scalar' | 'list';

/**
 * Fields each record type exposes to edits. Lifecycle fields are absent on purpose.
 */
export const EDITABLE_FIELDS: Readonly<Record<ArtifactType, Readonly<Record<string, FieldShape>>>> = {
  rfc: { title: 'scalar', version: 'scalar', owners: 'list' },
  clause: { title: 'scalar', text: 'scalar', kind: 'scalar', since: 'scalar', supersededBy: 'scalar' },
  adr: {
    title: 'scalar',
    date: 'scalar',
    context: 'scalar',
    decision: 'scalar',
    consequences: 'scalar',
    supersededBy: 'scalar',
    refs: 'list',
    alternatives: 'list'
  },
  work: { title: 'scalar', description: 'scalar', refs: 'list', notes: 'list', acceptanceCriteria: 'list' }
};

export const FIELD_ALIASES: Readonly<Record<string, string>> = {
  acceptance_criteria: 'acceptanceCriteria',
  criteria: 'acceptanceCriteria',
  superseded_by: 'supersededBy'
};

const LIFECYCLE_FIELDS = ['id', 'type', 'rfcId', 'status', 'phase', 'amendable', 'created', 'started', 'completed'];

export type MatchMode = 'exact' | 'substring' | 'index' | 'regex';

export interface MatchOptions {
  /** Default: case-insensitive substring */
  mode?: MatchMode;
  /** Act on every match instead of requiring exactly one */
  all?: boolean;
}

export interface AddOptions {
  /** Criterion category, instead of a prefix in the text */
  category?: ChangelogCategory;
}

/**
 * Indices of the entries a pattern selects
 */
export function findMatches(values: readonly string[], pattern: string, mode: MatchMode = 'substring'): number[] {
  const indices = values.map((_, i) => i);
  switch (mode) {
    case 'exact':
      return indices.filter(i => values[i] === pattern);
    case 'substring': {
      const needle = pattern.toLowerCase();
      return indices.filter(i => values[i]?.toLowerCase().includes(needle));
    }
    case 'index': {
      if (!/^-?\d+$/.test(pattern.trim())) {
        throw new ValidationError(`Invalid index "${pattern}"`, 'match');
      }
      const n = parseInt(pattern, 10);
      const i = n < 0 ? values.length + n : n;
      return i >= 0 && i < values.length ? [i] : [];
    }
    case 'regex': {
      let regex: RegExp;
      try {
        regex = new RegExp(pattern);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ValidationError(`Invalid regular expression "${pattern}": ${reason}`, 'match');
      }
      return indices.filter(i => regex.test(values[i] ?? ''));
    }
  }
}

/**
 * Applies set, add, remove and tick to one record at a time. RFC and clause
 * edits require the RFC to accept content changes.
 */
export class EditService {
  constructor(
    private readonly store: FileStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  set(index: ProjectIndex, id: string, field: string, value: string): OperationResult {
    return this.edit(index, id, field, 'scalar', artifact => this.setField(index, artifact, this.canonicalField(field), value));
  }

  add(index: ProjectIndex, id: string, field: string, value: string, options: AddOptions = {}): OperationResult {
    return this.edit(index, id, field, 'list', artifact => this.addEntry(artifact, this.canonicalField(field), value, options));
  }

  remove(index: ProjectIndex, id: string, field: string, pattern: string, options: MatchOptions = {}): OperationResult {
    return this.edit(index, id, field, 'list', artifact => {
      const name = this.canonicalField(field);
      const selected = new Set(this.select(this.listValues(artifact, name), name, pattern, options));
      return this.filterEntries(artifact, name, i => !selected.has(i));
    });
  }

  /**
   * Set the status of matching acceptance criteria
   */
  tick(
    index: ProjectIndex,
    id: string,
    field: string,
    pattern: string,
    status: CriterionStatus,
    options: MatchOptions = {}
  ): OperationResult {
    return this.edit(index, id, field, 'list', artifact => {
      const name = this.canonicalField(field);
      if (artifact.type !== 'work' || name !== 'acceptanceCriteria') {
        throw new ValidationError(`Only work item acceptanceCriteria can be ticked`, 'field');
      }
      const selected = new Set(this.select(this.listValues(artifact, name), name, pattern, options));
      return {
        ...artifact,
        acceptanceCriteria: artifact.acceptanceCriteria.map((criterion, i) => (selected.has(i) ? { ...criterion, status } : criterion))
      };
    });
  }

  // Plumbing

  private canonicalField(field: string): string {
    return FIELD_ALIASES[field] ?? field;
  }

  private edit(
    index: ProjectIndex,
    id: string,
    field: string,
    shape: FieldShape,
    change: (artifact: Artifact) => Artifact
  ): OperationResult {
    const parsed = validateId(id);
    const artifact = findArtifact(index, parsed.id);
    if (!artifact) {
      throw new NotFoundError('Artifact', parsed.id);
    }

    const name = this.canonicalField(field);
    const fields = EDITABLE_FIELDS[artifact.type];
    if (LIFECYCLE_FIELDS.includes(name)) {
      throw new ValidationError(`Field "${name}" is managed by lifecycle operations`, 'field');
    }
    const declared = fields[name];
    if (!declared) {
      throw new ValidationError(
        `Unknown ${artifact.type} field "${name}". Editable: ${Object.keys(fields).join(', ')}`,
        'field'
      );
    }
    if (declared !== shape) {
      throw new ValidationError(
        declared === 'list' ? `"${name}" is a list; use add or remove` : `"${name}" is a single value; use set`,
        'field'
      );
    }

    const rfcId = artifact.type === 'rfc' ? artifact.id : artifact.type === 'clause' ? artifact.rfcId : null;
    if (rfcId) {
      const entry = findRFC(index, rfcId);
      if (!entry) throw new NotFoundError('RFC', rfcId);
      const diagnostics = checkAmendment(entry.rfc);
      if (hasErrors(diagnostics)) return refused(diagnostics);
    }

    let updated = change(artifact);
    // A done item keeps satisfying the gate it passed
    if (updated.type === 'work' && updated.status === 'done') {
      const diagnostics = checkCompletionGate(updated);
      if (hasErrors(diagnostics)) return refused(diagnostics);
    }
    if (updated.type === 'rfc') {
      updated = { ...updated, updated: isoDate(this.now()) };
    }
    this.store.save(updated);
    logger.info(`${parsed.id}: edited ${name}`);
    return applied();
  }

  private select(values: string[], field: string, pattern: string, options: MatchOptions): number[] {
    const matches = findMatches(values, pattern, options.mode);
    if (matches.length === 0) {
      throw new ValidationError(`No ${field} entry matches "${pattern}"`, 'match');
    }
    if (matches.length > 1 && !options.all) {
      throw new ValidationError(`${matches.length} ${field} entries match "${pattern}"; pass all to act on every match`, 'match');
    }
    return matches;
  }

  // Scalars

  private setField(index: ProjectIndex, artifact: Artifact, field: string, value: string): Artifact {
    switch (artifact.type) {
      case 'rfc':
        return this.setRFCField(artifact, field, value);
      case 'clause':
        return this.setClauseField(index, artifact, field, value);
      case 'adr':
        return this.setADRField(index, artifact, field, value);
      case 'work':
        return this.setWorkItemField(artifact, field, value);
    }
  }

  private setRFCField(rfc: RFC, field: string, value: string): RFC {
    switch (field) {
      case 'title':
        return { ...rfc, title: validateTitle(value) };
      case 'version':
        return { ...rfc, version: validateVersion(value) };
    }
    throw new ValidationError(`Field "${field}" cannot be set on rfc`, 'field');
  }

  private setClauseField(index: ProjectIndex, clause: Clause, field: string, value: string): Clause {
    switch (field) {
      case 'title':
        return { ...clause, title: validateTitle(value) };
      case 'text':
        return { ...clause, text: value };
      case 'kind':
        if (!isOneOf(CLAUSE_KINDS, value)) {
          throw new ValidationError(`Invalid clause kind "${value}". Expected: ${CLAUSE_KINDS.join(', ')}`, 'kind');
        }
        return { ...clause, kind: value };
      case 'since':
        return { ...clause, since: validateVersion(value, 'since') };
      case 'supersededBy': {
        if (value.trim() === '') return { ...clause, supersededBy: undefined };
        const target = value.trim().toUpperCase().split(':').pop() ?? '';
        const replacement = findRFC(index, clause.rfcId)?.clauses.find(candidate => candidate.id === target);
        if (target === clause.id || !replacement || replacement.status !== 'active') {
          throw new ValidationError(`supersededBy must name another active clause of ${clause.rfcId}`, 'supersededBy');
        }
        return { ...clause, supersededBy: target };
      }
    }
    throw new ValidationError(`Field "${field}" cannot be set on clause`, 'field');
  }

  private setADRField(index: ProjectIndex, adr: ADR, field: string, value: string): ADR {
    switch (field) {
      case 'title':
        return { ...adr, title: validateTitle(value) };
      case 'date':
        return { ...adr, date: validateDate(value) };
      case 'context':
        return { ...adr, context: value };
      case 'decision':
        return { ...adr, decision: value };
      case 'consequences':
        return { ...adr, consequences: value };
      case 'supersededBy': {
        if (value.trim() === '') return { ...adr, supersededBy: undefined };
        const target = validateId(value, 'adr').id;
        if (target === adr.id || !index.adrs.some(candidate => candidate.id === target)) {
          throw new ValidationError(`supersededBy must name another existing ADR`, 'supersededBy');
        }
        return { ...adr, supersededBy: target };
      }
    }
    throw new ValidationError(`Field "${field}" cannot be set on adr`, 'field');
  }

  private setWorkItemField(item: WorkItem, field: string, value: string): WorkItem {
    switch (field) {
      case 'title':
        return { ...item, title: validateTitle(value) };
      case 'description':
        return { ...item, description: value };
    }
    throw new ValidationError(`Field "${field}" cannot be set on work`, 'field');
  }

  // Lists

  private listValues(artifact: Artifact, field: string): string[] {
    if (artifact.type === 'rfc' && field === 'owners') return artifact.owners;
    if (artifact.type === 'adr' && field === 'refs') return artifact.refs;
    if (artifact.type === 'adr' && field === 'alternatives') return artifact.alternatives.map(alt => alt.text);
    if (artifact.type === 'work' && field === 'refs') return artifact.refs;
    if (artifact.type === 'work' && field === 'notes') return artifact.notes;
    if (artifact.type === 'work' && field === 'acceptanceCriteria') {
      return artifact.acceptanceCriteria.map(criterion => criterion.text);
    }
    throw new ValidationError(`Field "${field}" is not a list on ${artifact.type}`, 'field');
  }

  private addEntry(artifact: Artifact, field: string, value: string, options: AddOptions): Artifact {
    const text = value.trim();
    if (text.length === 0) {
      throw new ValidationError(`Cannot add an empty value to ${field}`, field);
    }

    if (field === 'refs' && (artifact.type === 'adr' || artifact.type === 'work')) {
      const ref = validateId(text).id;
      if (artifact.refs.includes(ref)) {
        throw new ValidationError(`${ref} is already in refs`, 'refs');
      }
      return { ...artifact, refs: [...artifact.refs, ref] };
    }

    switch (artifact.type) {
      case 'rfc':
        return { ...artifact, owners: [...artifact.owners, validateOwner(text)] };
      case 'adr':
        return { ...artifact, alternatives: [...artifact.alternatives, { text, pros: [], cons: [] }] };
      case 'work': {
        if (field === 'notes') return { ...artifact, notes: [...artifact.notes, text] };
        const criterion: AcceptanceCriterion = options.category
          ? { text, status: 'pending', category: options.category }
          : createCriterion(text);
        return { ...artifact, acceptanceCriteria: [...artifact.acceptanceCriteria, criterion] };
      }
      case 'clause':
        throw new ValidationError(`Clauses have no list fields`, 'field');
    }
  }

  private filterEntries(artifact: Artifact, field: string, keep: (i: number) => boolean): Artifact {
    const pick = <T>(values: T[]): T[] => values.filter((_, i) => keep(i));
    switch (artifact.type) {
      case 'rfc':
        return { ...artifact, owners: pick(artifact.owners) };
      case 'adr':
        return field === 'refs' ? { ...artifact, refs: pick(artifact.refs) } : { ...artifact, alternatives: pick(artifact.alternatives) };
      case 'work':
        if (field === 'refs') return { ...artifact, refs: pick(artifact.refs) };
        if (field === 'notes') return { ...artifact, notes: pick(artifact.notes) };
        return { ...artifact, acceptanceCriteria: pick(artifact.acceptanceCriteria) };
      case 'clause':
        throw new ValidationError(`Clauses have no list fields`, 'field');
    }
  }
}
