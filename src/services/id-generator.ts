// ID allocation for new records

import type { ProjectIndex, RFCEntry } from '../models/project-index.js';
import type { WorkIdStrategy } from './config/config-service.js';
import { toClauseId } from '../core/validation.js';
import { ValidationError } from '../core/errors.js';

export type AllocatableType = 'rfc' | 'adr' | 'work';

/**
 * Maps artifact types to their ID prefixes
 */
const TYPE_PREFIXES: Record<AllocatableType, string> = {
  rfc: 'RFC',
  adr: 'ADR',
  work: 'WI'
};

export interface IdGeneratorOptions {
  workStrategy: WorkIdStrategy;
  /** Injectable clock for date-based work item ids */
  now: () => Date;
}

const DEFAULT_OPTIONS: IdGeneratorOptions = {
  workStrategy: 'date',
  now: () => new Date()
};

/**
 * Calendar date of a Date in UTC, as YYYY-MM-DD
 */
export function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Derives the next free id from the records already in the index.
 * Nothing is persisted: the store itself is the counter.
 */
export class IdGenerator {
  private options: IdGeneratorOptions;

  constructor(private index: ProjectIndex, options: Partial<IdGeneratorOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  private existingIds(type: AllocatableType): string[] {
    switch (type) {
      case 'rfc':
        return this.index.rfcs.map(entry => entry.rfc.id);
      case 'adr':
        return this.index.adrs.map(adr => adr.id);
      case 'work':
        return this.index.workItems.map(item => item.id);
    }
  }

  /**
   * Generates the next unique ID for the given artifact type
   * @returns RFC-NNNN, ADR-NNNN, or a work item id in the configured strategy
   */
  generateId(type: AllocatableType): string {
    if (type === 'work' && this.options.workStrategy === 'date') {
      return this.nextDatedWorkId();
    }

    let highest = 0;
    for (const id of this.existingIds(type)) {
      const parsed = IdGenerator.parseId(id);
      if (parsed && parsed.type === type && parsed.date === undefined) {
        highest = Math.max(highest, parsed.number);
      }
    }

    return `${TYPE_PREFIXES[type]}-${(highest + 1).toString().padStart(4, '0')}`;
  }

  private nextDatedWorkId(): string {
    const today = isoDate(this.options.now());
    let highest = 0;
    for (const id of this.existingIds('work')) {
      const parsed = IdGenerator.parseId(id);
      if (parsed?.date === today) {
        highest = Math.max(highest, parsed.number);
      }
    }
    return `WI-${today}-${(highest + 1).toString().padStart(3, '0')}`;
  }

  /**
   * Derive a clause id from a name, rejecting one the RFC already has
   */
  static clauseId(entry: RFCEntry, name: string): string {
    const id = toClauseId(name);
    if (entry.clauses.some(clause => clause.id === id)) {
      throw new ValidationError(`Clause ${entry.rfc.id}:${id} already exists`, 'name');
    }
    return id;
  }

  /**
   * Parses an ID to extract its type, number, and for dated work items the day
   */
  static parseId(id: string): { type: AllocatableType; number: number; date?: string } | null {
    const dated = /^WI-(\d{4}-\d{2}-\d{2})-(\d{3,})$/.exec(id);
    if (dated?.[1] && dated[2]) {
      return { type: 'work', number: parseInt(dated[2], 10), date: dated[1] };
    }

    const match = /^(RFC|ADR|WI)-(\d{4,})$/.exec(id);
    if (!match?.[1] || !match[2]) {
      return null;
    }

    const prefixToType: Record<string, AllocatableType> = {
      RFC: 'rfc',
      ADR: 'adr',
      WI: 'work'
    };

    const type = prefixToType[match[1]];
    if (!type) {
      return null;
    }

    return { type, number: parseInt(match[2], 10) };
  }
}
