// RFC and clause allocation

import type { RFC, Clause, Section } from '../../models/rfc.js';
import type { ClauseKind } from '../../models/types.js';
import type { ProjectIndex } from '../../models/project-index.js';
import { findRFC } from '../../models/project-index.js';
import { hasErrors, refused, type OperationResult } from '../../models/diagnostic.js';
import { validateId, validateTitle, validateOwner, validateVersion } from '../../core/validation.js';
import { NotFoundError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import type { FileStore } from '../storage/file-store.js';
import { IdGenerator, isoDate } from '../id-generator.js';
import { checkAmendment } from '../lifecycle/state-machine.js';

/**
 * Data for creating a new RFC
 */
export interface CreateRFCData {
  title: string;
  owners?: string[];
  /** Initial version (default 0.1.0) */
  version?: string;
  /** Section titles to start with */
  sections?: string[];
}

/**
 * Data for adding a clause to an RFC
 */
export interface CreateClauseData {
  /** Free-form name the clause id is derived from */
  name: string;
  title?: string;
  text?: string;
  kind?: ClauseKind;
  /** Section to list the clause in; created when missing (default: the last section) */
  section?: string;
  /** Version that introduces the clause (default: the RFC version) */
  since?: string;
}

export interface CreateResult<T> extends OperationResult {
  record?: T;
}

const DEFAULT_SECTION = 'Specification';
const DEFAULT_VERSION = '0.1.0';

/**
 * Allocates new RFCs and clauses. Clauses are only added while the RFC
 * accepts content changes.
 */
export class RFCService {
  constructor(
    private readonly store: FileStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Creates a draft RFC in the spec phase with an initial changelog entry
   */
  newRfc(index: ProjectIndex, data: CreateRFCData): RFC {
    const today = isoDate(this.now());
    const version = validateVersion(data.version ?? DEFAULT_VERSION);

    const rfc: RFC = {
      type: 'rfc',
      id: new IdGenerator(index).generateId('rfc'),
      title: validateTitle(data.title),
      version,
      status: 'draft',
      phase: 'spec',
      owners: (data.owners ?? []).map(validateOwner),
      created: today,
      amendable: false,
      sections: (data.sections ?? []).map((title): Section => ({ title: validateTitle(title), clauses: [] })),
      changelog: [{ version, date: today, summary: 'Initial draft', changes: [] }]
    };

    this.store.save(rfc);
    logger.info(`Created ${rfc.id}`, { title: rfc.title });
    return rfc;
  }

  /**
   * Writes the clause file, then lists it in the parent RFC
   */
  newClause(index: ProjectIndex, rfcId: string, data: CreateClauseData): CreateResult<Clause> {
    const entry = findRFC(index, validateId(rfcId, 'rfc').id);
    if (!entry) {
      throw new NotFoundError('RFC', rfcId);
    }

    const diagnostics = checkAmendment(entry.rfc);
    if (hasErrors(diagnostics)) {
      return refused(diagnostics);
    }

    const clause: Clause = {
      type: 'clause',
      id: IdGenerator.clauseId(entry, data.name),
      rfcId: entry.rfc.id,
      title: validateTitle(data.title ?? data.name),
      kind: data.kind ?? 'normative',
      status: 'active',
      text: data.text ?? '',
      since: validateVersion(data.since ?? entry.rfc.version, 'since')
    };

    const sectionTitle = data.section?.trim() || entry.rfc.sections.at(-1)?.title || DEFAULT_SECTION;
    const match = entry.rfc.sections.findIndex(section => section.title.toLowerCase() === sectionTitle.toLowerCase());
    const sections: Section[] = match >= 0
      ? entry.rfc.sections.map((section, i) => (i === match ? { ...section, clauses: [...section.clauses, clause.id] } : section))
      : [...entry.rfc.sections, { title: sectionTitle, clauses: [clause.id] }];

    this.store.save(clause);
    this.store.save({ ...entry.rfc, sections, updated: isoDate(this.now()) });
    logger.info(`Created ${entry.rfc.id}:${clause.id}`, { section: sectionTitle });
    return { applied: true, diagnostics, record: clause };
  }
}
