// Lifecycle operations: transitions, amendments, deletions and releases

import type { BumpLevel } from '../../models/types.js';
import { RFC_STATUSES, RFC_PHASES, CLAUSE_STATUSES, ADR_STATUSES, WORK_ITEM_STATUSES, isOneOf } from '../../models/types.js';
import type { RFC, Clause } from '../../models/rfc.js';
import type { ADR } from '../../models/adr.js';
import type { WorkItem } from '../../models/work-item.js';
import { findArtifact, findRFC, type ProjectIndex, type RFCEntry } from '../../models/project-index.js';
import {
  createDiagnostic,
  hasErrors,
  applied,
  refused,
  type Diagnostic,
  type OperationResult
} from '../../models/diagnostic.js';
import { validateId, bumpVersion, isSemver, validateDate } from '../../core/validation.js';
import { NotFoundError, ValidationError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import type { FileStore } from '../storage/file-store.js';
import { isoDate } from '../id-generator.js';
import { ReferenceIndex } from '../reference/reference-index.js';
import { ReferenceService } from '../reference/reference-service.js';
import { unreleasedWorkItems } from '../render/changelog.js';
import {
  RFC_STATUS_TRANSITIONS,
  RFC_PHASE_TRANSITIONS,
  CLAUSE_TRANSITIONS,
  ADR_TRANSITIONS,
  WORK_ITEM_TRANSITIONS,
  checkTransition,
  checkStatusPhase,
  checkCompletionGate,
  checkAmendment
} from './state-machine.js';

export interface TransitionOptions {
  /** Replacement id, required when superseding a clause or an ADR */
  by?: string;
}

export interface TransitionResult extends OperationResult {
  id: string;
  from: string;
  to: string;
}

export interface BumpResult extends OperationResult {
  version?: string;
}

export interface LifecycleServiceOptions {
  now: () => Date;
  references: ReferenceService;
}

/**
 * Applies lifecycle changes after the state machine approves them.
 * Every method takes the index loaded for this invocation and persists
 * through the store; refusals come back as diagnostics.
 */
export class LifecycleService {
  private options: LifecycleServiceOptions;

  constructor(private readonly store: FileStore, options: Partial<LifecycleServiceOptions> = {}) {
    this.options = { now: () => new Date(), references: new ReferenceService(), ...options };
  }

  private today(): string {
    return isoDate(this.options.now());
  }

  // Transitions

  transition(index: ProjectIndex, id: string, target: string, options: TransitionOptions = {}): TransitionResult {
    const parsed = validateId(id);
    const artifact = findArtifact(index, parsed.id);
    if (!artifact) {
      throw new NotFoundError('Artifact', parsed.id);
    }

    switch (artifact.type) {
      case 'rfc':
        return this.transitionRFC(artifact, target);
      case 'clause': {
        const entry = findRFC(index, artifact.rfcId);
        if (!entry) throw new NotFoundError('RFC', artifact.rfcId);
        return this.transitionClause(entry, artifact, target, options.by);
      }
      case 'adr':
        return this.transitionADR(index, artifact, target, options.by);
      case 'work':
        return this.transitionWorkItem(artifact, target);
    }
  }

  private finish(
    id: string,
    from: string,
    to: string,
    diagnostics: Diagnostic[],
    persist: () => void
  ): TransitionResult {
    if (hasErrors(diagnostics)) {
      logger.debug('Transition refused', { id, from, to, codes: diagnostics.map(d => d.code) });
      return { ...refused(diagnostics), id, from, to };
    }
    persist();
    logger.info(`${id}: ${from} -> ${to}`);
    return { ...applied(diagnostics), id, from, to };
  }

  private transitionRFC(rfc: RFC, target: string): TransitionResult {
    if (isOneOf(RFC_STATUSES, target)) {
      const diagnostics = checkTransition(RFC_STATUS_TRANSITIONS, 'rfc', rfc.id, rfc.status, target);
      if (diagnostics.length === 0) {
        diagnostics.push(...checkStatusPhase(rfc.id, target, rfc.phase));
      }
      return this.finish(rfc.id, rfc.status, target, diagnostics, () => {
        // A status change closes any open amendment
        this.store.save({ ...rfc, status: target, amendable: false, updated: this.today() });
      });
    }

    if (isOneOf(RFC_PHASES, target)) {
      const diagnostics = checkTransition(RFC_PHASE_TRANSITIONS, 'phase', rfc.id, rfc.phase, target);
      if (diagnostics.length === 0) {
        diagnostics.push(...checkStatusPhase(rfc.id, rfc.status, target));
      }
      return this.finish(rfc.id, rfc.phase, target, diagnostics, () => {
        this.store.save({ ...rfc, phase: target, updated: this.today() });
      });
    }

    throw new ValidationError(
      `Unknown RFC target "${target}". Expected a status (${RFC_STATUSES.join(', ')}) or phase (${RFC_PHASES.join(', ')})`,
      'target'
    );
  }

  private transitionClause(entry: RFCEntry, clause: Clause, target: string, by?: string): TransitionResult {
    if (!isOneOf(CLAUSE_STATUSES, target)) {
      throw new ValidationError(`Unknown clause status "${target}"`, 'target');
    }
    const id = `${entry.rfc.id}:${clause.id}`;
    const diagnostics = checkTransition(CLAUSE_TRANSITIONS, 'clause', id, clause.status, target);

    let supersededBy: string | undefined;
    if (target === 'superseded') {
      if (!by) throw new ValidationError('Superseding a clause requires the replacing clause id', 'by');
      const normalized = by.trim().toUpperCase();
      const [scope, name] = normalized.includes(':') ? normalized.split(':') : [entry.rfc.id, normalized];
      const replacement = entry.clauses.find(candidate => candidate.id === name);
      if (scope !== entry.rfc.id) {
        diagnostics.push(createDiagnostic('INVALID_SUPERSESSION', id, `Replacement ${by} is not in ${entry.rfc.id}`));
      } else if (name === clause.id) {
        diagnostics.push(createDiagnostic('INVALID_SUPERSESSION', id, 'Clause cannot supersede itself'));
      } else if (!replacement) {
        diagnostics.push(createDiagnostic('INVALID_SUPERSESSION', id, `Replacement ${entry.rfc.id}:${name} does not exist`));
      } else if (replacement.status !== 'active') {
        diagnostics.push(createDiagnostic('INVALID_SUPERSESSION', id, `Replacement ${entry.rfc.id}:${name} is ${replacement.status}`));
      }
      supersededBy = name;
    } else if (by) {
      throw new ValidationError(`"by" only applies when superseding`, 'by');
    }

    return this.finish(id, clause.status, target, diagnostics, () => {
      this.store.save({ ...clause, status: target, supersededBy });
    });
  }

  private transitionADR(index: ProjectIndex, adr: ADR, target: string, by?: string): TransitionResult {
    if (!isOneOf(ADR_STATUSES, target)) {
      throw new ValidationError(`Unknown ADR status "${target}"`, 'target');
    }
    const diagnostics = checkTransition(ADR_TRANSITIONS, 'adr', adr.id, adr.status, target);

    let supersededBy: string | undefined = adr.supersededBy;
    if (target === 'superseded') {
      if (!by) throw new ValidationError('Superseding an ADR requires the replacing ADR id', 'by');
      const replacementId = validateId(by, 'adr').id;
      const replacement = index.adrs.find(candidate => candidate.id === replacementId);
      if (replacementId === adr.id) {
        diagnostics.push(createDiagnostic('INVALID_SUPERSESSION', adr.id, 'ADR cannot supersede itself'));
      } else if (!replacement) {
        diagnostics.push(createDiagnostic('INVALID_SUPERSESSION', adr.id, `Replacement ${replacementId} does not exist`));
      } else if (replacement.status === 'superseded' || replacement.status === 'rejected') {
        diagnostics.push(createDiagnostic('INVALID_SUPERSESSION', adr.id, `Replacement ${replacementId} is ${replacement.status}`));
      }
      supersededBy = replacementId;
    } else if (by) {
      throw new ValidationError(`"by" only applies when superseding`, 'by');
    }

    return this.finish(adr.id, adr.status, target, diagnostics, () => {
      this.store.save({ ...adr, status: target, supersededBy });
    });
  }

  private transitionWorkItem(item: WorkItem, target: string): TransitionResult {
    if (!isOneOf(WORK_ITEM_STATUSES, target)) {
      throw new ValidationError(`Unknown work item status "${target}"`, 'target');
    }
    const diagnostics = checkTransition(WORK_ITEM_TRANSITIONS, 'work', item.id, item.status, target);
    if (diagnostics.length === 0 && target === 'done') {
      diagnostics.push(...checkCompletionGate(item));
    }

    return this.finish(item.id, item.status, target, diagnostics, () => {
      const today = this.today();
      const updated: WorkItem = { ...item, status: target };
      if (target === 'active' && !updated.started) updated.started = today;
      if (target === 'done' || target === 'cancelled') updated.completed = today;
      this.store.save(updated);
    });
  }

  // Amendments

  /**
   * Open a normative RFC for content edits. A draft is always editable.
   */
  amend(index: ProjectIndex, rfcId: string): OperationResult {
    const rfc = this.requireRFC(index, rfcId).rfc;
    switch (rfc.status) {
      case 'draft':
        return applied();
      case 'deprecated':
        return refused(checkAmendment(rfc));
      case 'normative':
        if (!rfc.amendable) {
          this.store.save({ ...rfc, amendable: true, updated: this.today() });
          logger.info(`${rfc.id}: amendment opened`);
        }
        return applied();
    }
  }

  /**
   * Raise the version, record a changelog entry and close the amendment
   */
  bump(index: ProjectIndex, rfcId: string, level: BumpLevel, summary: string, changes: string[] = []): BumpResult {
    const rfc = this.requireRFC(index, rfcId).rfc;
    if (summary.trim().length === 0) {
      throw new ValidationError('A changelog summary is required', 'summary');
    }

    const diagnostics = checkAmendment(rfc);
    if (hasErrors(diagnostics)) {
      return refused(diagnostics);
    }

    const version = bumpVersion(rfc.version, level);
    const today = this.today();
    this.store.save({
      ...rfc,
      version,
      amendable: false,
      updated: today,
      changelog: [...rfc.changelog, { version, date: today, summary: summary.trim(), changes }]
    });
    logger.info(`${rfc.id}: ${rfc.version} -> ${version}`);
    return { ...applied(), version };
  }

  // Deletion

  /**
   * Hard-delete a clause of a draft RFC or a queued work item, when nothing references it
   */
  delete(index: ProjectIndex, id: string): OperationResult {
    const parsed = validateId(id);
    const artifact = findArtifact(index, parsed.id);
    if (!artifact) {
      throw new NotFoundError('Artifact', parsed.id);
    }

    const refIndex = ReferenceIndex.build(index);
    switch (artifact.type) {
      case 'rfc':
      case 'adr':
        return refused([
          createDiagnostic('DELETE_FORBIDDEN', artifact.id, `${artifact.type.toUpperCase()} records are append-only`)
        ]);
      case 'clause': {
        const entry = this.requireRFC(index, artifact.rfcId);
        if (entry.rfc.status !== 'draft') {
          return refused([
            createDiagnostic(
              'DELETE_FORBIDDEN',
              parsed.id,
              `Clauses can only be deleted from a draft RFC (${entry.rfc.id} is ${entry.rfc.status})`
            )
          ]);
        }
        const blocked = this.options.references.checkDeletion(refIndex, parsed.id);
        if (blocked.length > 0) return refused(blocked);

        // Parent first: a crash leaves an orphan file, never a dangling section entry
        const sections = entry.rfc.sections.map(section => ({
          ...section,
          clauses: section.clauses.filter(clauseId => clauseId !== artifact.id)
        }));
        this.store.save({ ...entry.rfc, sections, updated: this.today() });
        this.store.deleteRecord(parsed.id);
        logger.info(`${parsed.id}: deleted`);
        return applied();
      }
      case 'work': {
        if (artifact.status !== 'queue') {
          return refused([
            createDiagnostic('DELETE_FORBIDDEN', artifact.id, `Only queued work items can be deleted (status is ${artifact.status})`)
          ]);
        }
        const blocked = this.options.references.checkDeletion(refIndex, artifact.id);
        if (blocked.length > 0) return refused(blocked);

        this.store.deleteRecord(artifact.id);
        logger.info(`${artifact.id}: deleted`);
        return applied();
      }
    }
  }

  // Releases

  /**
   * Record every done work item not yet in a release under a new version
   */
  release(index: ProjectIndex, version: string, date: string = this.today()): OperationResult {
    validateDate(date);
    const id = `release:${version}`;

    if (!isSemver(version)) {
      return refused([createDiagnostic('RELEASE_REFUSED', id, `"${version}" is not a semantic version`)]);
    }
    if (index.releases.some(release => release.version === version)) {
      return refused([createDiagnostic('RELEASE_REFUSED', id, `Version ${version} has already been released`)]);
    }
    const items = unreleasedWorkItems(index);
    if (items.length === 0) {
      return refused([createDiagnostic('RELEASE_REFUSED', id, 'No unreleased done work items')]);
    }

    this.store.saveReleases([{ version, date, refs: items.map(item => item.id) }, ...index.releases]);
    logger.info(`Released ${version}`, { items: items.length });
    return applied();
  }

  private requireRFC(index: ProjectIndex, rfcId: string): RFCEntry {
    const entry = findRFC(index, validateId(rfcId, 'rfc').id);
    if (!entry) throw new NotFoundError('RFC', rfcId);
    return entry;
  }
}
