// Work item and release models

import type { ArtifactBase } from './artifact.js';
import type { WorkItemStatus, CriterionStatus, ChangelogCategory } from './types.js';

export interface AcceptanceCriterion {
  text: string;
  status: CriterionStatus;
  category: ChangelogCategory;
}

/**
 * Tracked unit of work, stored at work/<id>.yaml
 */
export interface WorkItem extends ArtifactBase {
  type: 'work';
  status: WorkItemStatus;
  created: string;
  started?: string;
  completed?: string;
  refs: string[];
  description: string;
  notes: string[];
  acceptanceCriteria: AcceptanceCriterion[];
}

/**
 * A published version and the work items it shipped, kept in releases.yaml
 */
export interface Release {
  version: string;
  date: string;
  refs: string[];
}
