// Work item allocation

import type { WorkItem, AcceptanceCriterion } from '../../models/work-item.js';
import type { ProjectIndex } from '../../models/project-index.js';
import { validateId, validateTitle } from '../../core/validation.js';
import { ValidationError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import type { FileStore } from '../storage/file-store.js';
import type { WorkIdStrategy } from '../config/config-service.js';
import { IdGenerator, isoDate } from '../id-generator.js';
import { parseCategory } from '../render/changelog.js';

/**
 * Data for creating a new work item
 */
export interface CreateWorkItemData {
  title: string;
  description?: string;
  refs?: string[];
  /** Criteria text, each with an optional category prefix */
  criteria?: string[];
  /** Start the item right away instead of queueing it */
  active?: boolean;
}

export interface WorkItemServiceOptions {
  workStrategy: WorkIdStrategy;
  now: () => Date;
}

/**
 * Build a pending criterion from text with an optional `category:` prefix
 */
export function createCriterion(text: string): AcceptanceCriterion {
  const parsed = parseCategory(text);
  if (parsed.text.length === 0) {
    throw new ValidationError('Acceptance criterion text cannot be empty', 'acceptanceCriteria');
  }
  return { text: parsed.text, status: 'pending', category: parsed.category };
}

export class WorkItemService {
  private options: WorkItemServiceOptions;

  constructor(private readonly store: FileStore, options: Partial<WorkItemServiceOptions> = {}) {
    this.options = { workStrategy: 'date', now: () => new Date(), ...options };
  }

  newWorkItem(index: ProjectIndex, data: CreateWorkItemData): WorkItem {
    const today = isoDate(this.options.now());
    const generator = new IdGenerator(index, this.options);

    const item: WorkItem = {
      type: 'work',
      id: generator.generateId('work'),
      title: validateTitle(data.title),
      status: data.active ? 'active' : 'queue',
      created: today,
      started: data.active ? today : undefined,
      refs: (data.refs ?? []).map(ref => validateId(ref).id),
      description: data.description ?? '',
      notes: [],
      acceptanceCriteria: (data.criteria ?? []).map(createCriterion)
    };

    this.store.save(item);
    logger.info(`Created ${item.id}`, { title: item.title, status: item.status });
    return item;
  }
}
