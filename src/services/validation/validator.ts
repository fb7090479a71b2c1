// Store-level validation: lifecycle tables and structural consistency

import type { ArtifactType } from '../../models/types.js';
import type { Clause } from '../../models/rfc.js';
import type { ADR } from '../../models/adr.js';
import type { WorkItem } from '../../models/work-item.js';
import type { ProjectIndex, RFCEntry } from '../../models/project-index.js';
import { createDiagnostic, sortDiagnostics, type Diagnostic } from '../../models/diagnostic.js';
import { isSemver } from '../../core/validation.js';
import { checkStatusPhase, checkCompletionGate } from '../lifecycle/state-machine.js';

/**
 * Validates every record of the index and returns all problems at once.
 * Business rules never throw.
 */
export class ProjectValidator {
  validate(index: ProjectIndex, type?: ArtifactType): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];

    for (const entry of index.rfcs) {
      if (!type || type === 'rfc') diagnostics.push(...this.validateRFC(entry));
      if (!type || type === 'clause') {
        for (const clause of entry.clauses) {
          diagnostics.push(...this.validateClause(entry, clause));
        }
      }
    }

    if (!type || type === 'adr') {
      for (const adr of index.adrs) {
        diagnostics.push(...this.validateADR(adr, index));
      }
    }

    if (!type || type === 'work') {
      for (const item of index.workItems) {
        diagnostics.push(...this.validateWorkItem(item));
      }
    }

    if (!type) {
      diagnostics.push(...this.validateReleases(index));
    }

    return sortDiagnostics(diagnostics);
  }

  validateRFC({ rfc, clauses }: RFCEntry): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];

    if (!isSemver(rfc.version)) {
      diagnostics.push(createDiagnostic('INVALID_VERSION', rfc.id, `Version "${rfc.version}" is not a semantic version`));
    }

    diagnostics.push(...checkStatusPhase(rfc.id, rfc.status, rfc.phase));

    if (rfc.changelog.length === 0) {
      diagnostics.push(createDiagnostic('MISSING_CHANGELOG', rfc.id, 'RFC has no changelog entries'));
    }
    for (const entry of rfc.changelog) {
      if (!isSemver(entry.version)) {
        diagnostics.push(
          createDiagnostic('INVALID_VERSION', rfc.id, `Changelog version "${entry.version}" is not a semantic version`)
        );
      }
    }

    const existing = new Set(clauses.map(clause => clause.id));
    const listed = new Set<string>();
    for (const section of rfc.sections) {
      for (const clauseId of section.clauses) {
        if (listed.has(clauseId)) {
          diagnostics.push(createDiagnostic('DUPLICATE_CLAUSE', rfc.id, `Clause ${clauseId} is listed more than once`));
        }
        listed.add(clauseId);
        if (!existing.has(clauseId)) {
          diagnostics.push(
            createDiagnostic('MISSING_CLAUSE', rfc.id, `Section "${section.title}" lists missing clause ${clauseId}`)
          );
        }
      }
    }

    for (const clause of clauses) {
      if (!listed.has(clause.id)) {
        diagnostics.push(
          createDiagnostic('ORPHAN_CLAUSE', `${rfc.id}:${clause.id}`, 'Clause file is not listed in any section')
        );
      }
    }

    return diagnostics;
  }

  validateClause({ rfc, clauses }: RFCEntry, clause: Clause): Diagnostic[] {
    const id = `${rfc.id}:${clause.id}`;
    const diagnostics: Diagnostic[] = [];

    if (clause.since === undefined) {
      diagnostics.push(createDiagnostic('MISSING_SINCE', id, 'Clause does not record the version that introduced it'));
    } else if (!isSemver(clause.since)) {
      diagnostics.push(createDiagnostic('INVALID_VERSION', id, `since "${clause.since}" is not a semantic version`));
    }

    if (clause.supersededBy !== undefined) {
      const target = clauses.find(candidate => candidate.id === clause.supersededBy);
      if (clause.status !== 'superseded') {
        diagnostics.push(
          createDiagnostic('INVALID_SUPERSESSION', id, `supersededBy is set but status is ${clause.status}`)
        );
      }
      if (clause.supersededBy === clause.id) {
        diagnostics.push(createDiagnostic('INVALID_SUPERSESSION', id, 'Clause cannot supersede itself'));
      } else if (!target) {
        diagnostics.push(
          createDiagnostic('INVALID_SUPERSESSION', id, `Superseding clause ${rfc.id}:${clause.supersededBy} does not exist`)
        );
      } else if (target.status !== 'active') {
        diagnostics.push(
          createDiagnostic('INVALID_SUPERSESSION', id, `Superseding clause ${rfc.id}:${target.id} is ${target.status}`)
        );
      }
    } else if (clause.status === 'superseded') {
      diagnostics.push(createDiagnostic('INVALID_SUPERSESSION', id, 'Superseded clause does not name its replacement'));
    }

    return diagnostics;
  }

  validateADR(adr: ADR, index: ProjectIndex): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];

    if (adr.refs.length === 0) {
      diagnostics.push(createDiagnostic('ADR_WITHOUT_REFS', adr.id, 'ADR does not reference anything'));
    }

    if (adr.supersededBy !== undefined) {
      if (adr.status !== 'superseded') {
        diagnostics.push(createDiagnostic('INVALID_SUPERSESSION', adr.id, `supersededBy is set but status is ${adr.status}`));
      }
      if (adr.supersededBy === adr.id) {
        diagnostics.push(createDiagnostic('INVALID_SUPERSESSION', adr.id, 'ADR cannot supersede itself'));
      } else if (!index.adrs.some(candidate => candidate.id === adr.supersededBy)) {
        diagnostics.push(
          createDiagnostic('INVALID_SUPERSESSION', adr.id, `Superseding ADR ${adr.supersededBy} does not exist`)
        );
      }
    } else if (adr.status === 'superseded') {
      diagnostics.push(createDiagnostic('INVALID_SUPERSESSION', adr.id, 'Superseded ADR does not name its replacement'));
    }

    return diagnostics;
  }

  validateWorkItem(item: WorkItem): Diagnostic[] {
    return item.status === 'done' ? checkCompletionGate(item) : [];
  }

  validateReleases(index: ProjectIndex): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];
    const seen = new Set<string>();
    const workIds = new Set(index.workItems.map(item => item.id));

    for (const release of index.releases) {
      const id = `release:${release.version}`;
      if (!isSemver(release.version)) {
        diagnostics.push(createDiagnostic('INVALID_VERSION', id, `Release version "${release.version}" is not a semantic version`));
      }
      if (seen.has(release.version)) {
        diagnostics.push(createDiagnostic('RELEASE_REFUSED', id, `Version ${release.version} is released more than once`));
      }
      seen.add(release.version);
      for (const ref of release.refs) {
        if (!workIds.has(ref)) {
          diagnostics.push(createDiagnostic('DANGLING_REFERENCE', id, `Unknown id ${ref} referenced in release`));
        }
      }
    }

    return diagnostics;
  }
}
