// ADR allocation

import type { ADR } from '../../models/adr.js';
import type { ProjectIndex } from '../../models/project-index.js';
import { validateId, validateTitle } from '../../core/validation.js';
import { logger } from '../../core/logger.js';
import type { FileStore } from '../storage/file-store.js';
import { IdGenerator, isoDate } from '../id-generator.js';

/**
 * Data for creating a new ADR
 */
export interface CreateADRData {
  title: string;
  refs?: string[];
  context?: string;
  decision?: string;
  consequences?: string;
}

export class ADRService {
  constructor(
    private readonly store: FileStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Creates a proposed ADR dated today. Refs are checked for format only;
   * whether they resolve is reported by `check`.
   */
  newAdr(index: ProjectIndex, data: CreateADRData): ADR {
    const adr: ADR = {
      type: 'adr',
      id: new IdGenerator(index).generateId('adr'),
      title: validateTitle(data.title),
      status: 'proposed',
      date: isoDate(this.now()),
      refs: (data.refs ?? []).map(ref => validateId(ref).id),
      context: data.context ?? '[Describe the forces at play]',
      decision: data.decision ?? '[Describe the decision]',
      consequences: data.consequences ?? '[Describe the resulting context]',
      alternatives: []
    };

    this.store.save(adr);
    logger.info(`Created ${adr.id}`, { title: adr.title });
    return adr;
  }
}
