// ADR model

import type { ArtifactBase } from './artifact.js';
import type { ADRStatus } from './types.js';

/**
 * An option that was considered and not chosen
 */
export interface Alternative {
  text: string;
  pros: string[];
  cons: string[];
  rejectionReason?: string;
}

/**
 * Architecture decision record, stored at adr/<id>.yaml
 */
export interface ADR extends ArtifactBase {
  type: 'adr';
  status: ADRStatus;
  date: string;
  supersededBy?: string;
  refs: string[];
  context: string;
  decision: string;
  consequences: string;
  alternatives: Alternative[];
}
