// RFC and clause models

import type { ArtifactBase } from './artifact.js';
import type { RFCStatus, RFCPhase, ClauseKind, ClauseStatus } from './types.js';

/**
 * Ordered group of clause ids inside an RFC
 */
export interface Section {
  title: string;
  clauses: string[];
}

/**
 * One released version of an RFC
 */
export interface RFCChangelogEntry {
  version: string;
  date: string;
  summary: string;
  changes: string[];
}

/**
 * RFC record, stored at rfc/<id>/rfc.yaml
 */
export interface RFC extends ArtifactBase {
  type: 'rfc';
  version: string;
  status: RFCStatus;
  phase: RFCPhase;
  owners: string[];
  created: string;
  updated?: string;
  /** Set by amend(), cleared by bump(). Gates content edits of a normative RFC. */
  amendable: boolean;
  sections: Section[];
  changelog: RFCChangelogEntry[];
}

/**
 * Clause record, stored at rfc/<rfcId>/clauses/<id>.yaml
 */
export interface Clause extends ArtifactBase {
  type: 'clause';
  rfcId: string;
  kind: ClauseKind;
  status: ClauseStatus;
  text: string;
  /** Version of the RFC that introduced the clause */
  since?: string;
  /** Clause id in the same RFC */
  supersededBy?: string;
}
